import { appendFile, mkdir, readFile, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { toJournalTimestamp } from '../../utils/duration.js';
import { createLogger } from '../../utils/logger.js';

const logger = createLogger('ConnectionJournal');

/**
 * Anything that records operational events for the operator
 */
export interface EventJournal {
    append(ok: boolean, message: string): Promise<void>;
}

/**
 * ConnectionJournal: the append-only connection log
 *
 * Each entry is one line, `2025-12-07 12:34:56 (+) message`, with the
 * timestamp in UTC and `(-)` marking problems. Lines are written with a
 * single append so a concurrent reader never sees half an entry.
 * Rotation is left to the operator.
 */
export class ConnectionJournal implements EventJournal {
    private directoryReady = false;

    constructor(public readonly path: string) { }

    /**
     * Append an entry; failures are reported to the diagnostic log only
     */
    public async append(ok: boolean, message: string, at: Date = new Date()): Promise<void> {
        const line = formatJournalLine(ok, message, at);
        try {
            await this.ensureDirectory();
            await appendFile(this.path, line, 'utf8');
        } catch (error) {
            logger.error(`Failed to append to ${this.path}: ${describe(error)}`, { entry: line.trimEnd() });
        }
    }

    /**
     * Last `limit` lines, oldest first; empty when the file is missing
     */
    public async tail(limit: number): Promise<string[]> {
        let content: string;
        try {
            content = await readFile(this.path, 'utf8');
        } catch (error) {
            if (isMissingFile(error)) return [];
            throw error;
        }

        const lines = content.split('\n').filter(line => line.length > 0);
        return limit > 0 ? lines.slice(-limit) : lines;
    }

    /**
     * Truncate the journal, creating it when missing
     */
    public async clear(): Promise<void> {
        await this.ensureDirectory();
        await writeFile(this.path, '', 'utf8');
        logger.info(`Cleared ${this.path}`);
    }

    private async ensureDirectory(): Promise<void> {
        if (this.directoryReady) return;
        await mkdir(dirname(this.path), { recursive: true });
        this.directoryReady = true;
    }
}

export function formatJournalLine(ok: boolean, message: string, at: Date): string {
    const flattened = message.replace(/\r?\n/g, ' ');
    return `${toJournalTimestamp(at)} ${ok ? '(+)' : '(-)'} ${flattened}\n`;
}

function isMissingFile(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function describe(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
