import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { MonitorServices } from './server.js';
import { readStatus } from '../services/status/index.js';

/**
 * Register MCP resources
 */
export function registerResources(server: McpServer, services: MonitorServices) {
    // 1. status://connection - Published snapshot, as the dashboard would show it
    server.resource(
        'connection-status',
        'status://connection',
        {
            description: 'Last published connection status; stale snapshots read as unknown',
            mimeType: 'application/json',
        },
        async () => {
            const { statusPath, statusMaxAgeSeconds } = services.config;
            const view = await readStatus(statusPath, statusMaxAgeSeconds);
            return {
                contents: [
                    {
                        uri: 'status://connection',
                        mimeType: 'application/json',
                        text: JSON.stringify(view, null, 2),
                    },
                ],
            };
        }
    );

    // 2. log://connection - Tail of the connection journal
    server.resource(
        'connection-log',
        'log://connection',
        {
            description: 'Most recent connection journal entries, oldest first',
            mimeType: 'text/plain',
        },
        async () => {
            const lines = await services.journal.tail(services.config.logLines);
            return {
                contents: [
                    {
                        uri: 'log://connection',
                        mimeType: 'text/plain',
                        text: lines.join('\n'),
                    },
                ],
            };
        }
    );

    // 3. config://current - View current configuration
    server.resource(
        'config-current',
        'config://current',
        {
            description: 'Current active configuration',
            mimeType: 'application/json',
        },
        async () => {
            return {
                contents: [
                    {
                        uri: 'config://current',
                        mimeType: 'application/json',
                        text: JSON.stringify(services.config, null, 2),
                    },
                ],
            };
        }
    );
}
