/**
 * A metric read from probe output, or the reason it could not be read.
 * There is no implicit zero: callers must branch on `kind`.
 */
export type Measurement<T> =
    | { kind: 'value'; value: T }
    | { kind: 'unknown'; reason: string };

export function measured<T>(value: T): Measurement<T> {
    return { kind: 'value', value };
}

export function unknownMeasurement<T>(reason: string): Measurement<T> {
    return { kind: 'unknown', reason };
}

/**
 * Reachability classification of one batch ping
 */
export type Reachability = 'up' | 'down' | 'unknown';

/**
 * One probe cycle's measurement
 */
export interface SampleResult {
    reachability: Reachability;
    /** Integer 0..100 */
    lossPercent: Measurement<number>;
    avgLatencyMs: Measurement<number>;
    dnsResolved: boolean;
    sampledAt: Date;
    /** Failure reasons worth a journal line */
    issues: string[];
}

/**
 * Statistics extracted from a ping report
 */
export interface PingReport {
    lossPercent: Measurement<number>;
    avgLatencyMs: Measurement<number>;
}

/**
 * How an external probe process ended
 */
export type CommandOutcome =
    | { kind: 'exited'; code: number; stdout: string; stderr: string }
    | { kind: 'timeout'; stdout: string; stderr: string }
    | { kind: 'spawn-error'; message: string };

export type CommandRunner = (
    command: string,
    args: string[],
    timeoutMs: number
) => Promise<CommandOutcome>;

export type HostResolver = (hostname: string, timeoutMs: number) => Promise<boolean>;
