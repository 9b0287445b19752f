/**
 * Independently debounced health dimensions
 */
export type SignalName = 'reachability' | 'latency' | 'dns' | 'packetLoss';

/**
 * User-facing classification of a signal
 */
export type SignalState = 'up' | 'down' | 'warning' | 'unknown';

/**
 * Debounce phase of one counter
 */
export type CounterPhase = 'healthy' | 'suspect' | 'alerted';

/**
 * Edge reported by a counter after one sample
 */
export type HysteresisTransition =
    | { kind: 'none' }
    | { kind: 'triggered'; count: number; since: Date; peakValue: number | null }
    | { kind: 'recovered'; count: number; since: Date; durationSeconds: number; peakValue: number | null };

export interface CounterMetrics {
    phase: CounterPhase;
    consecutiveBadCount: number;
    badSince: Date | null;
    notified: boolean;
    triggerThreshold: number;
}

export type NotificationKind = 'triggered' | 'recovered';

/**
 * One notification per alert edge; transient
 */
export interface NotificationEvent {
    kind: NotificationKind;
    signal: SignalName;
    title: string;
    message: string;
    at: Date;
}

/**
 * Externally published view of the connection
 */
export interface StatusSnapshot {
    timestamp: Date;
    internet: SignalState;
    dns: SignalState;
}

export interface TrackerUpdate {
    events: NotificationEvent[];
    snapshot: StatusSnapshot;
}

export interface TrackerConfig {
    reachabilityHost: string;
    dnsHostname: string;
    thresholds: Record<SignalName, number>;
    latencyThresholdMs: number;
    packetLoss: { enabled: boolean; thresholdPercent: number };
    displayTimeZone: string;
}
