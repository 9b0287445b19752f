import { EventEmitter } from 'events';
import { EventJournal } from '../journal/index.js';
import { Notifier } from '../notifier/types.js';
import { SampleResult } from '../sampler/types.js';
import { StatusSink } from '../status/index.js';
import { HealthTracker } from '../tracker/index.js';
import { NotificationEvent, StatusSnapshot } from '../tracker/types.js';
import { createLogger } from '../../utils/logger.js';

const logger = createLogger('MonitorLoop');

export interface SampleSource {
    probe(): Promise<SampleResult>;
}

export interface MonitorDependencies {
    sampler: SampleSource;
    tracker: HealthTracker;
    journal: EventJournal;
    publisher: StatusSink;
    notifier: Notifier;
}

export interface CycleReport {
    sample: SampleResult;
    events: NotificationEvent[];
    snapshot: StatusSnapshot;
    durationMs: number;
}

/**
 * MonitorLoop: fixed-cadence sampling
 *
 * Features:
 * - One cycle at a time: probe, classify, journal, notify, publish
 * - Cadence measured from each cycle's start; a slow cycle shortens the
 *   following wait instead of skipping a cycle
 * - A single timer per cycle, no polling
 * - Emits 'cycle' with the CycleReport after every cycle
 */
export class MonitorLoop extends EventEmitter {
    private timer: NodeJS.Timeout | null = null;
    private running: boolean = false;
    private cycleCount: number = 0;

    constructor(
        private readonly deps: MonitorDependencies,
        private readonly intervalMs: number
    ) {
        super();
    }

    /**
     * Start sampling; the first cycle runs immediately
     */
    public async start(): Promise<void> {
        if (this.running) return;
        this.running = true;

        logger.info(`Starting monitor loop, interval ${this.intervalMs / 1000}s`);
        await this.deps.journal.append(true, 'Starting Internet Monitor Service');
        this.schedule(0);
    }

    /**
     * Disarm the pending timer; a cycle already in flight finishes on its own
     */
    public stop(): void {
        this.running = false;
        if (this.timer) {
            clearTimeout(this.timer);
            this.timer = null;
        }
    }

    public isRunning(): boolean {
        return this.running;
    }

    public getCycleCount(): number {
        return this.cycleCount;
    }

    /**
     * Run one complete cycle. Never rejects for failures of the tooling
     * around the monitor: journal, notifier and publisher all absorb their own errors.
     */
    public async runCycle(): Promise<CycleReport> {
        const startedAt = Date.now();
        const { sampler, tracker, journal, publisher } = this.deps;

        const sample = await sampler.probe();
        for (const issue of sample.issues) {
            await journal.append(false, issue);
        }

        const { events, snapshot } = tracker.update(sample);
        for (const event of events) {
            await journal.append(event.kind === 'recovered', `Alert: ${event.message}`);
        }

        await Promise.all(events.map(event => this.dispatch(event)));
        await publisher.publish(snapshot);

        this.cycleCount++;
        const report: CycleReport = { sample, events, snapshot, durationMs: Date.now() - startedAt };
        this.emit('cycle', report);
        return report;
    }

    private schedule(delayMs: number): void {
        if (!this.running) return;
        this.timer = setTimeout(() => {
            this.timer = null;
            void this.tick();
        }, delayMs);
    }

    private async tick(): Promise<void> {
        const startedAt = Date.now();
        try {
            await this.runCycle();
        } catch (error) {
            logger.error('Monitor cycle failed', error instanceof Error ? error : { error: String(error) });
        }

        const elapsed = Date.now() - startedAt;
        if (elapsed > this.intervalMs) {
            logger.warn(`Cycle took ${elapsed}ms, longer than the ${this.intervalMs}ms interval`);
        }
        this.schedule(Math.max(0, this.intervalMs - elapsed));
    }

    /**
     * Deliver one notification; failures are journaled, not retried
     */
    private async dispatch(event: NotificationEvent): Promise<void> {
        try {
            await this.deps.notifier.send(event.message, event.title);
            logger.debug(`Notification sent via ${this.deps.notifier.name}: ${event.title}`);
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            logger.warn(`Failed to send ${event.title} notification: ${reason}`);
            await this.deps.journal.append(false, `Failed to send notification "${event.title}: ${event.message}": ${reason}`);
        }
    }
}
