import { HysteresisCounter } from './hysteresis.js';
import * as notices from './messages.js';
import {
    CounterMetrics,
    HysteresisTransition,
    NotificationEvent,
    SignalName,
    SignalState,
    StatusSnapshot,
    TrackerConfig,
    TrackerUpdate,
} from './types.js';
import { SampleResult } from '../sampler/types.js';
import { AppConfig } from '../../config/schema.js';
import { createLogger } from '../../utils/logger.js';

const logger = createLogger('HealthTracker');

/**
 * HealthTracker: debounced connection health
 *
 * Owns one HysteresisCounter per signal and turns each SampleResult into
 * zero or more notification events plus the snapshot to publish.
 *
 * - Reachability is evaluated on every classifiable sample
 * - Latency, packet loss and DNS only while this sample reached the host;
 *   without reachability they are meaningless, not separate faults
 * - Unknown measurements leave the matching counter untouched
 */
export class HealthTracker {
    private readonly counters: Record<SignalName, HysteresisCounter>;
    private lastReachability: SampleResult['reachability'] = 'unknown';
    private lastSampledAt: Date | null = null;

    constructor(private readonly config: TrackerConfig) {
        this.counters = {
            reachability: new HysteresisCounter('reachability', config.thresholds.reachability),
            latency: new HysteresisCounter('latency', config.thresholds.latency),
            dns: new HysteresisCounter('dns', config.thresholds.dns),
            packetLoss: new HysteresisCounter('packetLoss', config.thresholds.packetLoss),
        };
    }

    /**
     * Build the tracker settings from the application configuration
     */
    public static fromConfig(config: AppConfig): HealthTracker {
        return new HealthTracker({
            reachabilityHost: config.reachability.host,
            dnsHostname: config.dns.hostname,
            thresholds: config.thresholds,
            latencyThresholdMs: config.latencyThresholdMs,
            packetLoss: config.packetLoss,
            displayTimeZone: config.displayTimeZone,
        });
    }

    /**
     * Feed one sample through every signal
     */
    public update(sample: SampleResult): TrackerUpdate {
        const at = sample.sampledAt;
        const events: NotificationEvent[] = [];
        const collect = (signal: SignalName, transition: HysteresisTransition, current?: number) => {
            const event = this.toEvent(signal, transition, at, current);
            if (event) events.push(event);
        };

        this.lastReachability = sample.reachability;
        this.lastSampledAt = at;

        if (sample.reachability === 'down') {
            collect('reachability', this.counters.reachability.recordBad(at));
        } else if (sample.reachability === 'up') {
            collect('reachability', this.counters.reachability.recordGood(at));
        }

        if (sample.reachability === 'up') {
            if (sample.avgLatencyMs.kind === 'value') {
                const latency = sample.avgLatencyMs.value;
                collect(
                    'latency',
                    latency > this.config.latencyThresholdMs
                        ? this.counters.latency.recordBad(at, latency)
                        : this.counters.latency.recordGood(at),
                    latency
                );
            }

            if (this.config.packetLoss.enabled && sample.lossPercent.kind === 'value') {
                const loss = sample.lossPercent.value;
                collect(
                    'packetLoss',
                    loss > this.config.packetLoss.thresholdPercent
                        ? this.counters.packetLoss.recordBad(at, loss)
                        : this.counters.packetLoss.recordGood(at),
                    loss
                );
            }

            collect(
                'dns',
                sample.dnsResolved ? this.counters.dns.recordGood(at) : this.counters.dns.recordBad(at)
            );
        }

        const snapshot = this.getSnapshot(at);
        for (const event of events) {
            logger.info(`${event.kind === 'triggered' ? 'Alert' : 'Recovery'} [${event.signal}]: ${event.message}`);
        }

        return { events, snapshot };
    }

    /**
     * Snapshot of the published signals as of the last sample
     */
    public getSnapshot(timestamp: Date = this.lastSampledAt ?? new Date()): StatusSnapshot {
        const states = this.getSignalStates();
        return { timestamp, internet: states.internet, dns: states.dns };
    }

    /**
     * Classification of every signal plus the combined internet state
     */
    public getSignalStates(): Record<SignalName | 'internet', SignalState> {
        const reached = this.lastReachability === 'up';
        const gated = (signal: SignalName, bad: SignalState): SignalState => {
            if (!reached) return 'unknown';
            return this.counters[signal].isAlerted() ? bad : 'up';
        };

        const reachability: SignalState = this.lastReachability === 'unknown'
            ? 'unknown'
            : this.counters.reachability.isAlerted() ? 'down' : 'up';
        const latency = gated('latency', 'warning');
        const packetLoss = this.config.packetLoss.enabled ? gated('packetLoss', 'warning') : 'unknown';
        const dns = gated('dns', 'down');

        // Degradation alerts outlive a single unreachable sample until they recover
        const degraded = this.counters.latency.isAlerted()
            || (this.config.packetLoss.enabled && this.counters.packetLoss.isAlerted());
        const internet: SignalState = reachability === 'up' && degraded ? 'warning' : reachability;

        return { internet, reachability, latency, packetLoss, dns };
    }

    /**
     * Raw debounce state of every counter
     */
    public getCounterMetrics(): Record<SignalName, CounterMetrics> {
        return {
            reachability: this.counters.reachability.getMetrics(),
            latency: this.counters.latency.getMetrics(),
            dns: this.counters.dns.getMetrics(),
            packetLoss: this.counters.packetLoss.getMetrics(),
        };
    }

    private toEvent(
        signal: SignalName,
        transition: HysteresisTransition,
        at: Date,
        current?: number
    ): NotificationEvent | null {
        if (transition.kind === 'none') return null;

        if (transition.kind === 'recovered') {
            const notice = notices.recovered(
                signal,
                transition.since,
                transition.durationSeconds,
                this.config.displayTimeZone,
                transition.peakValue
            );
            return { kind: 'recovered', signal, at, ...notice };
        }

        const notice = this.triggeredNotice(signal, transition.count, current ?? transition.peakValue ?? 0);
        return { kind: 'triggered', signal, at, ...notice };
    }

    private triggeredNotice(signal: SignalName, count: number, value: number): notices.Notice {
        const threshold = this.counters[signal].triggerThreshold;
        switch (signal) {
            case 'reachability':
                return notices.reachabilityTriggered(this.config.reachabilityHost, count, threshold);
            case 'latency':
                return notices.latencyTriggered(value);
            case 'dns':
                return notices.dnsTriggered(this.config.dnsHostname, count, threshold);
            case 'packetLoss':
                return notices.packetLossTriggered(value);
        }
    }
}

export * from './types.js';
export { HysteresisCounter } from './hysteresis.js';
