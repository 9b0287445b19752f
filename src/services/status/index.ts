import { mkdir, readFile, rename, rm, writeFile } from 'fs/promises';
import { basename, dirname, join } from 'path';
import { z } from 'zod';
import { SignalState, StatusSnapshot } from '../tracker/types.js';
import { toIsoSeconds } from '../../utils/duration.js';
import { createLogger } from '../../utils/logger.js';

const logger = createLogger('StatusPublisher');

/**
 * Anything the monitor loop can hand a snapshot to
 */
export interface StatusSink {
    publish(snapshot: StatusSnapshot): Promise<void>;
}

/**
 * On-disk snapshot format shared with the viewer
 */
export interface StatusDocument {
    timestamp: string;
    internet: { state: SignalState };
    dns: { state: SignalState };
}

/**
 * Status as a reader should display it
 */
export interface StatusView {
    internet: SignalState;
    dns: SignalState;
    timestamp: string | null;
    fresh: boolean;
}

export function toStatusDocument(snapshot: StatusSnapshot): StatusDocument {
    return {
        timestamp: toIsoSeconds(snapshot.timestamp),
        internet: { state: snapshot.internet },
        dns: { state: snapshot.dns },
    };
}

export function serializeSnapshot(snapshot: StatusSnapshot): string {
    return `${JSON.stringify(toStatusDocument(snapshot), null, 2)}\n`;
}

/**
 * StatusPublisher: writes the snapshot the viewer polls
 *
 * The document goes to a temp file in the same directory and is renamed
 * over the target, so readers see the old or the new record, never half.
 */
export class StatusPublisher implements StatusSink {
    constructor(public readonly path: string) { }

    /**
     * Replace the published snapshot; failures are logged, never thrown
     */
    public async publish(snapshot: StatusSnapshot): Promise<void> {
        const directory = dirname(this.path);
        const tempPath = join(directory, `.${basename(this.path)}.${process.pid}.tmp`);

        try {
            await mkdir(directory, { recursive: true });
            await writeFile(tempPath, serializeSnapshot(snapshot), 'utf8');
            await rename(tempPath, this.path);
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            logger.error(`Failed to publish status to ${this.path}: ${message}`);
            await rm(tempPath, { force: true }).catch(() => undefined);
        }
    }
}

const StateSchema = z.enum(['up', 'down', 'warning', 'unknown']).catch('unknown');

const StatusDocumentSchema = z.object({
    timestamp: z.string().catch(''),
    internet: z.object({ state: StateSchema }).catch({ state: 'unknown' as const }),
    dns: z.object({ state: StateSchema }).catch({ state: 'unknown' as const }),
});

const TIMESTAMP_PATTERN = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})Z$/;

const UNKNOWN_VIEW: StatusView = { internet: 'unknown', dns: 'unknown', timestamp: null, fresh: false };

/**
 * Parse "2025-12-07T12:34:56Z"; null for anything else, including impossible dates
 */
export function parseStatusTimestamp(value: string): Date | null {
    const match = value.match(TIMESTAMP_PATTERN);
    if (!match) return null;

    const [year, month, day, hour, minute, second] = match.slice(1).map(Number);
    const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second));
    return toIsoSeconds(date) === value ? date : null;
}

/**
 * Apply the viewer's staleness rule to a decoded status document.
 *
 * With maxAgeSeconds <= 0 the stored states are trusted as they are.
 * Otherwise an unparseable timestamp, a timestamp in the future, or one
 * older than maxAgeSeconds turns both states into unknown.
 */
export function evaluateStatus(raw: unknown, maxAgeSeconds: number, now: Date = new Date()): StatusView {
    const parsed = StatusDocumentSchema.safeParse(raw);
    if (!parsed.success) return UNKNOWN_VIEW;

    const doc = parsed.data;
    const view: StatusView = {
        internet: doc.internet.state,
        dns: doc.dns.state,
        timestamp: doc.timestamp || null,
        fresh: true,
    };

    if (maxAgeSeconds <= 0) return view;

    const stamped = parseStatusTimestamp(doc.timestamp);
    if (!stamped) return { ...UNKNOWN_VIEW, timestamp: view.timestamp };

    const ageSeconds = (now.getTime() - stamped.getTime()) / 1000;
    if (ageSeconds < 0 || ageSeconds > maxAgeSeconds) {
        return { ...UNKNOWN_VIEW, timestamp: view.timestamp };
    }
    return view;
}

/**
 * Staleness limit for the healthcheck: the configured max age, or three
 * sampling intervals when the configured check is disabled
 */
export function healthcheckMaxAgeSeconds(statusMaxAgeSeconds: number, intervalSeconds: number): number {
    return statusMaxAgeSeconds > 0 ? statusMaxAgeSeconds : 3 * intervalSeconds;
}

/**
 * Read the published snapshot the way the viewer does; unknown on any failure
 */
export async function readStatus(path: string, maxAgeSeconds: number, now: Date = new Date()): Promise<StatusView> {
    let content: string;
    try {
        content = await readFile(path, 'utf8');
    } catch {
        return UNKNOWN_VIEW;
    }

    let raw: unknown;
    try {
        raw = JSON.parse(content);
    } catch {
        logger.debug(`Status file ${path} is not valid JSON`);
        return UNKNOWN_VIEW;
    }

    return evaluateStatus(raw, maxAgeSeconds, now);
}
