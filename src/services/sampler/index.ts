import { runCommand } from './command.js';
import { resolveHost } from './dns.js';
import { parsePingReport } from './ping.js';
import {
    CommandOutcome,
    CommandRunner,
    HostResolver,
    PingReport,
    Reachability,
    SampleResult,
    unknownMeasurement,
} from './types.js';
import { AppConfig } from '../../config/schema.js';
import { createLogger } from '../../utils/logger.js';

const logger = createLogger('Sampler');

export type SamplerConfig = Pick<AppConfig, 'reachability' | 'dns'>;

/**
 * Sampler: one connectivity measurement per cycle
 *
 * - Batch ping of the reachability target, report parsed leniently
 * - Single DNS lookup of the configured hostname
 * - Tool failures become `unknown`/`down` fields, never exceptions
 */
export class Sampler {
    private readonly run: CommandRunner;
    private readonly resolve: HostResolver;

    constructor(
        private readonly config: SamplerConfig,
        deps: { runCommand?: CommandRunner; resolveHost?: HostResolver } = {}
    ) {
        this.run = deps.runCommand ?? runCommand;
        this.resolve = deps.resolveHost ?? resolveHost;
    }

    /**
     * Probe reachability and DNS; never rejects
     */
    public async probe(): Promise<SampleResult> {
        const sampledAt = new Date();
        const { host, command, pingCount, timeoutMs } = this.config.reachability;

        const [outcome, dnsResolved] = await Promise.all([
            this.run(command, ['-c', String(pingCount), host], timeoutMs),
            this.resolveDns(),
        ]);

        const issues: string[] = [];
        const { reachability, report } = classifyOutcome(outcome, command, issues);

        if (reachability === 'up' && report.avgLatencyMs.kind === 'unknown') {
            issues.push(report.avgLatencyMs.reason);
        }
        if (!dnsResolved) {
            logger.debug(`DNS lookup of ${this.config.dns.hostname} failed`);
        }

        for (const issue of issues) {
            logger.warn(issue);
        }

        logger.debug(`Sample: ${reachability}`, {
            loss: report.lossPercent.kind === 'value' ? report.lossPercent.value : null,
            avgLatencyMs: report.avgLatencyMs.kind === 'value' ? report.avgLatencyMs.value : null,
            dnsResolved,
        });

        return {
            reachability,
            lossPercent: report.lossPercent,
            avgLatencyMs: report.avgLatencyMs,
            dnsResolved,
            sampledAt,
            issues,
        };
    }

    private async resolveDns(): Promise<boolean> {
        try {
            return await this.resolve(this.config.dns.hostname, this.config.dns.timeoutMs);
        } catch (error) {
            logger.warn(`DNS resolver threw: ${error instanceof Error ? error.message : String(error)}`);
            return false;
        }
    }
}

/**
 * Map a finished probe process to a reachability verdict.
 *
 * - loss parsed: 100% is down, anything less is up
 * - loss unparsed: exit 1 (no replies) or 2 (address not found) is down;
 *   exit 0 or an unexpected code is unknown, so a parse failure never reads as up
 * - timeout is down, a tool that cannot be started is unknown
 */
export function classifyOutcome(
    outcome: CommandOutcome,
    command: string,
    issues: string[]
): { reachability: Reachability; report: PingReport } {
    if (outcome.kind === 'spawn-error') {
        const reason = `Unable to run ${command}: ${outcome.message}`;
        issues.push(reason);
        return {
            reachability: 'unknown',
            report: { lossPercent: unknownMeasurement(reason), avgLatencyMs: unknownMeasurement(reason) },
        };
    }

    const report = parsePingReport(`${outcome.stdout}\n${outcome.stderr}`);

    if (outcome.kind === 'timeout') {
        issues.push(`${command} timed out`);
        return { reachability: 'down', report };
    }

    if (report.lossPercent.kind === 'value') {
        return { reachability: report.lossPercent.value >= 100 ? 'down' : 'up', report };
    }

    if (outcome.code === 1 || outcome.code === 2) {
        return { reachability: 'down', report };
    }

    issues.push(`${report.lossPercent.reason} (exit code ${outcome.code})`);
    return { reachability: 'unknown', report };
}

export * from './types.js';
export { parsePingReport } from './ping.js';
