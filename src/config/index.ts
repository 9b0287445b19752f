import { readFile } from 'fs/promises';
import { AppConfig, AppConfigSchema, DEFAULT_CONFIG, RawConfigSchema } from './schema.js';
import { logger } from '../utils/logger.js';

export const CONFIG_ENV_VAR = 'UPLINK_SENTRY_CONFIG';

/**
 * ConfigLoader: startup configuration for the monitor
 *
 * Features:
 * - Reads UPLINK_SENTRY_CONFIG as inline JSON or as a path to a JSON file
 * - Validates with Zod; malformed fields fall back to their defaults
 * - Falls back to full defaults when nothing usable is found
 *
 * Startup is never aborted by a bad configuration.
 */
export class ConfigLoader {
    private config: AppConfig;
    private source: string | null;

    constructor(source: string | null = process.env[CONFIG_ENV_VAR] ?? null) {
        this.source = source && source.trim() ? source.trim() : null;
        this.config = DEFAULT_CONFIG;
    }

    /**
     * Get current configuration
     */
    public getConfig(): AppConfig {
        return this.config;
    }

    /**
     * Resolve the configuration from the environment
     */
    public async initialize(): Promise<AppConfig> {
        if (!this.source) {
            logger.info(`${CONFIG_ENV_VAR} not set, using default configuration`);
            this.config = DEFAULT_CONFIG;
            return this.config;
        }

        if (this.source.startsWith('{')) {
            logger.info(`${CONFIG_ENV_VAR} detected as JSON string, parsing directly`);
            this.config = this.parse(this.source, 'environment JSON');
            return this.config;
        }

        logger.info(`Loading configuration from file: ${this.source}`);
        try {
            const content = await readFile(this.source, 'utf8');
            this.config = this.parse(content, this.source);
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            logger.warn(`Failed to read config file ${this.source}: ${message}. Using defaults.`);
            this.config = DEFAULT_CONFIG;
        }
        return this.config;
    }

    private parse(content: string, origin: string): AppConfig {
        let rawData: unknown;
        try {
            rawData = JSON.parse(content);
        } catch (error) {
            logger.error(`Failed to parse JSON from ${origin}: ${error}`);
            return DEFAULT_CONFIG;
        }

        const result = AppConfigSchema.safeParse(rawData);
        if (!result.success) {
            logger.error(`Configuration from ${origin} is not an object, using defaults`);
            return DEFAULT_CONFIG;
        }

        const config = result.data;
        const requested = RawConfigSchema.parse(rawData).intervalSeconds;
        if (requested !== config.intervalSeconds) {
            logger.warn(
                `intervalSeconds ${requested} is too short for ${config.reachability.pingCount} echoes, ` +
                `using ${config.intervalSeconds}`
            );
        }
        logger.info(
            `Loaded configuration from ${origin}: ping ${config.reachability.host} every ${config.intervalSeconds}s, ` +
            `DNS ${config.dns.hostname}, journal ${config.logPath}`
        );
        return config;
    }
}
