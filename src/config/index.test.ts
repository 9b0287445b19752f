import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { ConfigLoader } from './index.js';
import { logger } from '../utils/logger.js';
import { DEFAULT_CONFIG } from './schema.js';

// Mock logger to avoid cluttering test output
vi.mock('../utils/logger.js', () => ({
    logger: {
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
        debug: vi.fn(),
    },
    createLogger: () => ({
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
        debug: vi.fn(),
    }),
}));

describe('ConfigLoader', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await mkdtemp(join(tmpdir(), 'uplink-config-'));
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    it('should load default config when no source is set', async () => {
        const loader = new ConfigLoader(null);
        const config = await loader.initialize();

        expect(config).toEqual(DEFAULT_CONFIG);
        expect(config.reachability.host).toBe('8.8.8.8');
        expect(config.reachability.pingCount).toBe(5);
        expect(config.dns.hostname).toBe('www.google.com');
        expect(config.intervalSeconds).toBe(60);
        expect(config.thresholds).toEqual({ reachability: 3, latency: 3, dns: 3, packetLoss: 3 });
        expect(config.latencyThresholdMs).toBe(1000);
        expect(config.statusPath).toBe('/var/log/connection_status.json');
        expect(config.statusMaxAgeSeconds).toBe(300);
        expect(config.notifier.credentialsPath).toBeUndefined();
    });

    it('should parse an inline JSON string', async () => {
        const loader = new ConfigLoader(JSON.stringify({
            reachability: { host: '1.1.1.1', pingCount: 3 },
            intervalSeconds: 30,
            logPath: '/data/monitor/connection.log',
        }));

        const config = await loader.initialize();

        expect(config.reachability.host).toBe('1.1.1.1');
        expect(config.reachability.pingCount).toBe(3);
        expect(config.reachability.command).toBe('fping');
        expect(config.intervalSeconds).toBe(30);
        expect(config.statusPath).toBe('/data/monitor/connection_status.json');
        expect(loader.getConfig()).toBe(config);
    });

    it('should fall back per field when values are malformed', async () => {
        const loader = new ConfigLoader(JSON.stringify({
            reachability: { host: '9.9.9.9', pingCount: 'five' },
            thresholds: { reachability: 0, dns: 4 },
            latencyThresholdMs: -10,
            displayTimeZone: 'Mars/Olympus_Mons',
            statusMaxAgeSeconds: 0,
        }));

        const config = await loader.initialize();

        expect(config.reachability.host).toBe('9.9.9.9');
        expect(config.reachability.pingCount).toBe(5);
        expect(config.thresholds).toEqual({ reachability: 3, latency: 3, dns: 4, packetLoss: 3 });
        expect(config.latencyThresholdMs).toBe(1000);
        expect(config.displayTimeZone).toBe('America/New_York');
        expect(config.statusMaxAgeSeconds).toBe(0);
    });

    it('should clamp probe timeouts to half the interval', async () => {
        const loader = new ConfigLoader(JSON.stringify({
            intervalSeconds: 10,
            reachability: { pingCount: 2, timeoutMs: 60000 },
            dns: { timeoutMs: 2000 },
        }));

        const config = await loader.initialize();

        expect(config.intervalSeconds).toBe(10);
        expect(config.reachability.timeoutMs).toBe(5000);
        expect(config.dns.timeoutMs).toBe(2000);
    });

    it('should raise an interval too short for the echo count', async () => {
        const loader = new ConfigLoader(JSON.stringify({ intervalSeconds: 5 }));

        const config = await loader.initialize();

        expect(config.reachability.pingCount).toBe(5);
        expect(config.intervalSeconds).toBe(14);
        expect(config.reachability.timeoutMs).toBe(7000);
        expect(config.dns.timeoutMs).toBe(5000);
        expect(logger.warn).toHaveBeenCalledWith('intervalSeconds 5 is too short for 5 echoes, using 14');
    });

    it('should give a single echo the shortest workable interval', async () => {
        const config = await new ConfigLoader(JSON.stringify({
            intervalSeconds: 5,
            reachability: { pingCount: 1 },
        })).initialize();

        expect(config.intervalSeconds).toBe(6);
        expect(config.reachability.timeoutMs).toBe(3000);
    });

    it('should not let the ping deadline fall below what the echoes need', async () => {
        const config = await new ConfigLoader(JSON.stringify({
            reachability: { pingCount: 3, timeoutMs: 1000 },
        })).initialize();

        expect(config.intervalSeconds).toBe(60);
        expect(config.reachability.timeoutMs).toBe(5000);
    });

    it('should fallback to defaults if the inline JSON is invalid', async () => {
        const loader = new ConfigLoader('{ invalid config ');
        const config = await loader.initialize();

        expect(config).toEqual(DEFAULT_CONFIG);
    });

    it('should read a config file path', async () => {
        const path = join(dir, 'config.json');
        await writeFile(path, JSON.stringify({
            dns: { hostname: 'example.org' },
            notifier: { credentialsPath: '/etc/uplink/pushover.json' },
        }));

        const config = await new ConfigLoader(path).initialize();

        expect(config.dns.hostname).toBe('example.org');
        expect(config.notifier.credentialsPath).toBe('/etc/uplink/pushover.json');
        expect(config.notifier.timeoutMs).toBe(5000);
    });

    it('should fallback to defaults when the file is missing or not an object', async () => {
        const missing = await new ConfigLoader(join(dir, 'missing.json')).initialize();
        expect(missing).toEqual(DEFAULT_CONFIG);

        const path = join(dir, 'array.json');
        await writeFile(path, '[1, 2, 3]');
        const notObject = await new ConfigLoader(path).initialize();
        expect(notObject).toEqual(DEFAULT_CONFIG);
    });
});
