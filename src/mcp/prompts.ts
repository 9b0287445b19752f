import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { MonitorServices } from './server.js';

/**
 * Register MCP prompts
 */
export function registerPrompts(server: McpServer, services: MonitorServices) {
    // 1. diagnose-connection
    server.prompt(
        'diagnose-connection',
        'Walk through the live state and journal to explain connection problems',
        () => ({
            messages: [
                {
                    role: 'user',
                    content: {
                        type: 'text',
                        text: `Diagnose the Internet connection monitored by Uplink Sentry.

The monitor pings ${services.config.reachability.host} and resolves ${services.config.dns.hostname} every ${services.config.intervalSeconds} seconds.

Please:
1. Call 'check-connection' for the live signal states and debounce counters.
2. Call 'read-log' to review recent outages, recoveries and probe failures.
3. If the picture is unclear, call 'probe-now' for a fresh sample.

Then report:
1. Current state: whether the connection is up, degraded (latency or packet loss) or down, and whether DNS works.
2. Recent incidents: when they started and how long they lasted.
3. Likely causes, distinguishing an upstream outage from a local DNS or probe tooling problem.
4. Suggested next steps for the operator.`,
                    },
                },
            ],
        })
    );
}
