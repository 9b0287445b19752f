import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { ConfigLoader } from '../config/index.js';
import { AppConfig } from '../config/schema.js';
import { ConnectionJournal } from '../services/journal/index.js';
import { MonitorLoop, SampleSource } from '../services/monitor/index.js';
import { createNotifier } from '../services/notifier/index.js';
import { Sampler } from '../services/sampler/index.js';
import { StatusPublisher } from '../services/status/index.js';
import { HealthTracker } from '../services/tracker/index.js';
import { createLogger } from '../utils/logger.js';
import { registerResources } from './resources.js';
import { registerTools } from './tools.js';
import { registerPrompts } from './prompts.js';

const logger = createLogger('UplinkSentryServer');

/**
 * Everything the MCP handlers can reach
 */
export interface MonitorServices {
    config: AppConfig;
    sampler: SampleSource;
    tracker: HealthTracker;
    journal: ConnectionJournal;
    loop: MonitorLoop;
}

/**
 * Uplink Sentry
 *
 * Orchestrates:
 * - ConfigLoader (Configuration)
 * - MonitorLoop (Sampler -> HealthTracker -> Journal/Notifier/StatusPublisher)
 * - MCP Interface (status and journal viewer, diagnostics)
 */
export class UplinkSentryServer {
    private server: McpServer;
    private configLoader: ConfigLoader;
    private services: MonitorServices | null = null;

    constructor(configLoader: ConfigLoader = new ConfigLoader()) {
        this.configLoader = configLoader;
        this.server = new McpServer({
            name: 'uplink-sentry',
            version: '1.0.0',
        });
    }

    /**
     * Start monitoring and serve MCP on stdio
     */
    public async start(): Promise<void> {
        const config = await this.configLoader.initialize();
        const services = this.createServices(config);
        this.services = services;

        this.initializeMcp(services);
        this.setupEventListeners(services.loop);

        await services.loop.start();

        const transport = new StdioServerTransport();
        await this.server.connect(transport);

        logger.info('Uplink Sentry running: monitor loop active, MCP on stdio');
    }

    /**
     * Stop the monitor loop and close the MCP transport
     */
    public async stop(): Promise<void> {
        this.services?.loop.stop();
        await this.server.close();
    }

    private createServices(config: AppConfig): MonitorServices {
        const sampler = new Sampler(config);
        const tracker = HealthTracker.fromConfig(config);
        const journal = new ConnectionJournal(config.logPath);
        const publisher = new StatusPublisher(config.statusPath);
        const notifier = createNotifier(config.notifier);

        const loop = new MonitorLoop(
            { sampler, tracker, journal, publisher, notifier },
            config.intervalSeconds * 1000
        );

        return { config, sampler, tracker, journal, loop };
    }

    /**
     * Register all MCP capabilities
     */
    private initializeMcp(services: MonitorServices) {
        registerResources(this.server, services);
        registerTools(this.server, services);
        registerPrompts(this.server, services);
    }

    private setupEventListeners(loop: MonitorLoop) {
        loop.on('cycle', ({ events, snapshot, durationMs }) => {
            logger.debug(`Cycle finished in ${durationMs}ms: internet=${snapshot.internet} dns=${snapshot.dns}`);
            if (events.length > 0) {
                logger.info(`Cycle produced ${events.length} notification(s)`);
            }
        });
    }
}
