import { readFile } from 'fs/promises';
import { Notifier, PushoverCredentials, PushoverCredentialsSchema } from './types.js';
import { createLogger } from '../../utils/logger.js';

const logger = createLogger('PushoverNotifier');

export const PUSHOVER_API_URL = 'https://api.pushover.net/1/messages.json';

/**
 * Pushover delivery
 *
 * Credentials are read from a JSON file on first use and cached.
 * Each send is bounded by `timeoutMs`; HTTP and API errors reject.
 */
export class PushoverNotifier implements Notifier {
    public readonly name = 'pushover';
    private credentials: PushoverCredentials | null = null;

    constructor(
        private readonly credentialsPath: string,
        private readonly timeoutMs: number
    ) { }

    public async send(message: string, title: string): Promise<void> {
        const credentials = await this.loadCredentials();

        const body = new URLSearchParams({
            token: credentials.apiToken,
            user: credentials.userKey,
            title,
            message,
        });
        if (credentials.device) {
            body.set('device', credentials.device);
        }

        const controller = new AbortController();
        const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

        try {
            const response = await fetch(PUSHOVER_API_URL, {
                method: 'POST',
                signal: controller.signal,
                headers: {
                    'Content-Type': 'application/x-www-form-urlencoded',
                    'User-Agent': 'uplink-sentry/1.0',
                },
                body: body.toString(),
            });

            if (!response.ok) {
                const detail = await response.text().catch(() => '');
                throw new Error(`HTTP ${response.status}: ${response.statusText}${detail ? ` ${detail}` : ''}`);
            }

            logger.debug(`Pushover notification sent: ${title}`);
        } catch (error) {
            if (controller.signal.aborted) {
                throw new Error(`Pushover request timed out after ${this.timeoutMs}ms`);
            }
            throw error;
        } finally {
            clearTimeout(timeout);
        }
    }

    private async loadCredentials(): Promise<PushoverCredentials> {
        if (this.credentials) return this.credentials;

        const content = await readFile(this.credentialsPath, 'utf8');
        const result = PushoverCredentialsSchema.safeParse(JSON.parse(content));
        if (!result.success) {
            throw new Error(`Invalid Pushover credentials in ${this.credentialsPath}: ${result.error.issues.map(i => i.path.join('.') || i.message).join(', ')}`);
        }

        this.credentials = result.data;
        return this.credentials;
    }
}
