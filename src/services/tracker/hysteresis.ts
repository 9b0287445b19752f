import { CounterMetrics, CounterPhase, HysteresisTransition, SignalName } from './types.js';
import { elapsedSeconds } from '../../utils/duration.js';

const NO_TRANSITION: HysteresisTransition = { kind: 'none' };

/**
 * Consecutive-bad-sample debounce for one signal
 *
 * healthy -> suspect(1..threshold-1) -> alerted
 *
 * - The threshold-th consecutive bad sample triggers, exactly once per run
 * - Any good sample resets the run; if the run had alerted it reports recovery
 *   with the time elapsed since the run's first bad sample
 * - Samples that cannot be classified are simply not recorded
 *
 * Invariants: notified implies count >= threshold; badSince is set iff count > 0.
 */
export class HysteresisCounter {
    private consecutiveBadCount: number = 0;
    private badSince: Date | null = null;
    private notified: boolean = false;
    private peakValue: number | null = null;

    constructor(
        public readonly signal: SignalName,
        public readonly triggerThreshold: number
    ) { }

    /**
     * Record a bad sample; `value` is the offending measurement, if any
     */
    public recordBad(at: Date, value?: number): HysteresisTransition {
        this.consecutiveBadCount++;
        if (this.badSince === null) {
            this.badSince = at;
        }
        if (value !== undefined && (this.peakValue === null || value > this.peakValue)) {
            this.peakValue = value;
        }

        if (this.notified || this.consecutiveBadCount < this.triggerThreshold) {
            return NO_TRANSITION;
        }

        this.notified = true;
        return {
            kind: 'triggered',
            count: this.consecutiveBadCount,
            since: this.badSince,
            peakValue: this.peakValue,
        };
    }

    /**
     * Record a good sample
     */
    public recordGood(at: Date): HysteresisTransition {
        const wasNotified = this.notified;
        const count = this.consecutiveBadCount;
        const since = this.badSince;
        const peakValue = this.peakValue;

        this.consecutiveBadCount = 0;
        this.badSince = null;
        this.notified = false;
        this.peakValue = null;

        if (!wasNotified || since === null) {
            return NO_TRANSITION;
        }

        return {
            kind: 'recovered',
            count,
            since,
            durationSeconds: elapsedSeconds(since, at),
            peakValue,
        };
    }

    public getPhase(): CounterPhase {
        if (this.notified) return 'alerted';
        return this.consecutiveBadCount > 0 ? 'suspect' : 'healthy';
    }

    public isAlerted(): boolean {
        return this.notified;
    }

    public getMetrics(): CounterMetrics {
        return {
            phase: this.getPhase(),
            consecutiveBadCount: this.consecutiveBadCount,
            badSince: this.badSince,
            notified: this.notified,
            triggerThreshold: this.triggerThreshold,
        };
    }
}
