import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { MonitorServices } from './server.js';
import { Measurement } from '../services/sampler/types.js';

function describeMeasurement(measurement: Measurement<number>): number | string {
    return measurement.kind === 'value' ? measurement.value : `unknown (${measurement.reason})`;
}

/**
 * Register MCP tools
 */
export function registerTools(server: McpServer, services: MonitorServices) {
    // 1. check-connection - Live tracker state, straight from memory
    server.tool(
        'check-connection',
        {},
        async () => {
            const report = {
                signals: services.tracker.getSignalStates(),
                counters: services.tracker.getCounterMetrics(),
                cycles: services.loop.getCycleCount(),
                running: services.loop.isRunning(),
            };
            return {
                content: [{ type: 'text', text: JSON.stringify(report, null, 2) }]
            };
        }
    );

    // 2. read-log - Journal tail
    server.tool(
        'read-log',
        {
            lines: z.number().int().min(1).max(1000).optional().describe('Number of lines to return (defaults to logLines)'),
        },
        async ({ lines }) => {
            const entries = await services.journal.tail(lines ?? services.config.logLines);
            if (entries.length === 0) {
                return {
                    content: [{ type: 'text', text: `Journal ${services.journal.path} is empty.` }]
                };
            }
            return {
                content: [{ type: 'text', text: entries.join('\n') }]
            };
        }
    );

    // 3. clear-log - Truncate the journal
    server.tool(
        'clear-log',
        {},
        async () => {
            try {
                await services.journal.clear();
                return {
                    content: [{ type: 'text', text: `Journal ${services.journal.path} cleared.` }]
                };
            } catch (error) {
                const message = error instanceof Error ? error.message : String(error);
                return {
                    content: [{ type: 'text', text: `Failed to clear journal: ${message}` }],
                    isError: true,
                };
            }
        }
    );

    // 4. probe-now - One-off sample, not fed to the tracker
    server.tool(
        'probe-now',
        {},
        async () => {
            const sample = await services.sampler.probe();
            const report = {
                reachability: sample.reachability,
                lossPercent: describeMeasurement(sample.lossPercent),
                avgLatencyMs: describeMeasurement(sample.avgLatencyMs),
                dnsResolved: sample.dnsResolved,
                sampledAt: sample.sampledAt.toISOString(),
                issues: sample.issues,
            };
            return {
                content: [{ type: 'text', text: JSON.stringify(report, null, 2) }]
            };
        }
    );
}
