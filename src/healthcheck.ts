#!/usr/bin/env node
import { ConfigLoader } from './config/index.js';
import { healthcheckMaxAgeSeconds, readStatus } from './services/status/index.js';
import { createLogger } from './utils/logger.js';

const logger = createLogger('Healthcheck');

/**
 * Container healthcheck: exit 0 while the monitor keeps publishing
 */
async function main(): Promise<number> {
    const config = await new ConfigLoader().initialize();
    const maxAge = healthcheckMaxAgeSeconds(config.statusMaxAgeSeconds, config.intervalSeconds);
    const view = await readStatus(config.statusPath, maxAge);

    if (view.fresh) {
        logger.info(`Status fresh (${view.timestamp}): internet=${view.internet} dns=${view.dns}`);
        return 0;
    }

    logger.error(`Status at ${config.statusPath} is missing or older than ${maxAge}s (timestamp: ${view.timestamp ?? 'none'})`);
    return 1;
}

main().then(
    (code) => process.exit(code),
    (error) => {
        logger.error('Healthcheck failed:', error);
        process.exit(1);
    }
);
