import { PushoverNotifier } from './pushover.js';
import { Notifier } from './types.js';
import { AppConfig } from '../../config/schema.js';
import { createLogger } from '../../utils/logger.js';

const logger = createLogger('Notifier');

/**
 * Stand-in when no push channel is configured; the journal still records everything
 */
export class SilentNotifier implements Notifier {
    public readonly name = 'silent';

    public async send(message: string, title: string): Promise<void> {
        logger.info(`Notification (no channel configured): ${title}: ${message}`);
    }
}

/**
 * Pick the notifier for the configured channel
 */
export function createNotifier(config: AppConfig['notifier']): Notifier {
    if (!config.credentialsPath) {
        logger.info('No notifier credentials configured, push notifications disabled');
        return new SilentNotifier();
    }

    logger.info(`Push notifications via Pushover (credentials: ${config.credentialsPath})`);
    return new PushoverNotifier(config.credentialsPath, config.timeoutMs);
}

export * from './types.js';
export { PushoverNotifier, PUSHOVER_API_URL } from './pushover.js';
