import { dirname, join } from 'path';
import { z } from 'zod';
import { isValidTimeZone } from '../utils/duration.js';

/**
 * Every leaf falls back to its own default when missing or malformed,
 * so one bad value never discards the rest of the file.
 */
function withDefaults<T extends z.ZodTypeAny>(schema: T) {
    return schema.catch(() => schema.parse({}));
}

/**
 * Reachability probe (batch ping)
 */
export const ReachabilityConfigSchema = z.object({
    /** Host or address to ping */
    host: z.string().min(1).catch('8.8.8.8'),
    /** Probe executable; must accept `-c <count> <host>` */
    command: z.string().min(1).catch('fping'),
    /** Echo requests per sample */
    pingCount: z.number().int().min(1).max(20).catch(5),
    /** Kill the probe after this long (ms) */
    timeoutMs: z.number().int().min(500).catch(20000),
});

/**
 * DNS probe
 */
export const DnsConfigSchema = z.object({
    /** Hostname that must resolve */
    hostname: z.string().min(1).catch('www.google.com'),
    /** Lookup deadline (ms) */
    timeoutMs: z.number().int().min(100).catch(5000),
});

/**
 * Consecutive bad samples before a signal alerts
 */
export const ThresholdsConfigSchema = z.object({
    reachability: z.number().int().min(1).catch(3),
    latency: z.number().int().min(1).catch(3),
    dns: z.number().int().min(1).catch(3),
    packetLoss: z.number().int().min(1).catch(3),
});

export const PacketLossConfigSchema = z.object({
    /** Debounce non-zero loss while the host is reachable */
    enabled: z.boolean().catch(true),
    /** Loss strictly above this percentage is bad */
    thresholdPercent: z.number().min(0).max(99).catch(0),
});

export const NotifierConfigSchema = z.object({
    /** Pushover credentials file; unset disables push delivery */
    credentialsPath: z.string().min(1).optional().catch(undefined),
    /** Delivery deadline (ms) */
    timeoutMs: z.number().int().min(500).catch(5000),
});

/**
 * Raw configuration as written by the operator
 */
export const RawConfigSchema = z.object({
    reachability: withDefaults(ReachabilityConfigSchema),
    dns: withDefaults(DnsConfigSchema),
    /** Sampling cadence (seconds) */
    intervalSeconds: z.number().int().min(5).catch(60),
    thresholds: withDefaults(ThresholdsConfigSchema),
    /** Average round-trip strictly above this is bad (ms) */
    latencyThresholdMs: z.number().positive().catch(1000),
    packetLoss: withDefaults(PacketLossConfigSchema),
    /** Append-only connection journal */
    logPath: z.string().min(1).catch('/var/log/connection.log'),
    /** Status snapshot file; defaults to connection_status.json beside the journal */
    statusPath: z.string().min(1).optional().catch(undefined),
    /** Snapshots older than this read as unknown; 0 or negative disables the check */
    statusMaxAgeSeconds: z.number().int().catch(300),
    /** Journal lines shown by the viewer */
    logLines: z.number().int().min(1).catch(100),
    /** IANA zone used for human-facing timestamps in notifications */
    displayTimeZone: z.string().refine(isValidTimeZone).catch('America/New_York'),
    notifier: withDefaults(NotifierConfigSchema),
});

/** Allowance beyond one second per echo for process start and the last reply */
const PING_SLACK_MS = 2000;

/**
 * Shortest deadline in which a healthy batch ping of `pingCount` echoes completes
 */
export function minimumPingTimeoutMs(pingCount: number): number {
    return pingCount * 1000 + PING_SLACK_MS;
}

/**
 * Shortest interval whose probe budget (half the interval) fits the ping deadline
 */
export function minimumIntervalSeconds(pingCount: number): number {
    return Math.ceil((2 * minimumPingTimeoutMs(pingCount)) / 1000);
}

/**
 * Resolved configuration: derived paths filled in and probe deadlines
 * clamped to half the sampling interval, so a hung probe cannot stall a cycle.
 *
 * The ping deadline never drops below what the configured echo count needs;
 * an interval too short for that is raised to the smallest one that fits.
 */
export const AppConfigSchema = RawConfigSchema.transform((raw) => {
    const pingFloorMs = minimumPingTimeoutMs(raw.reachability.pingCount);
    const intervalSeconds = Math.max(raw.intervalSeconds, minimumIntervalSeconds(raw.reachability.pingCount));
    const probeBudgetMs = Math.floor((intervalSeconds * 1000) / 2);

    return {
        ...raw,
        intervalSeconds,
        reachability: {
            ...raw.reachability,
            timeoutMs: Math.min(Math.max(raw.reachability.timeoutMs, pingFloorMs), probeBudgetMs),
        },
        dns: {
            ...raw.dns,
            timeoutMs: Math.min(raw.dns.timeoutMs, probeBudgetMs),
        },
        statusPath: raw.statusPath ?? join(dirname(raw.logPath), 'connection_status.json'),
    };
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

/**
 * Defaults used when no configuration is supplied or it cannot be read
 */
export const DEFAULT_CONFIG: AppConfig = AppConfigSchema.parse({});
