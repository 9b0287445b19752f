import { describe, it, expect, vi } from 'vitest';
import { Sampler } from './index.js';
import { CommandOutcome, CommandRunner, HostResolver } from './types.js';

vi.mock('../../utils/logger.js', () => ({
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

const config = {
    reachability: { host: '192.0.2.1', command: 'fping', pingCount: 5, timeoutMs: 20000 },
    dns: { hostname: 'example.com', timeoutMs: 5000 },
};

function samplerFor(outcome: CommandOutcome, dnsResolved = true) {
    const runCommand = vi.fn<CommandRunner>().mockResolvedValue(outcome);
    const resolveHost = vi.fn<HostResolver>().mockResolvedValue(dnsResolved);
    return { sampler: new Sampler(config, { runCommand, resolveHost }), runCommand, resolveHost };
}

describe('Sampler', () => {
    it('should invoke the ping tool with count and host and resolve the DNS target', async () => {
        const { sampler, runCommand, resolveHost } = samplerFor({
            kind: 'exited',
            code: 0,
            stdout: '',
            stderr: '192.0.2.1 : xmt/rcv/%loss = 5/5/0%, min/avg/max = 10.0/12.5/15.0\n',
        });

        const sample = await sampler.probe();

        expect(runCommand).toHaveBeenCalledWith('fping', ['-c', '5', '192.0.2.1'], 20000);
        expect(resolveHost).toHaveBeenCalledWith('example.com', 5000);
        expect(sample.reachability).toBe('up');
        expect(sample.lossPercent).toEqual({ kind: 'value', value: 0 });
        expect(sample.avgLatencyMs).toEqual({ kind: 'value', value: 12.5 });
        expect(sample.dnsResolved).toBe(true);
        expect(sample.issues).toEqual([]);
        expect(sample.sampledAt).toBeInstanceOf(Date);
    });

    it('should treat reported total loss as a valid down sample', async () => {
        const { sampler } = samplerFor({
            kind: 'exited',
            code: 1,
            stdout: '',
            stderr: '192.0.2.1 : xmt/rcv/%loss = 5/0/100%\n',
        }, false);

        const sample = await sampler.probe();

        expect(sample.reachability).toBe('down');
        expect(sample.lossPercent).toEqual({ kind: 'value', value: 100 });
        expect(sample.dnsResolved).toBe(false);
        expect(sample.issues).toEqual([]);
    });

    it('should treat a non-zero exit without a report as down', async () => {
        const { sampler } = samplerFor({ kind: 'exited', code: 2, stdout: '', stderr: 'address not found\n' });

        const sample = await sampler.probe();

        expect(sample.reachability).toBe('down');
        expect(sample.lossPercent.kind).toBe('unknown');
    });

    it('should not count an unparseable successful run as up', async () => {
        const { sampler } = samplerFor({ kind: 'exited', code: 0, stdout: 'all good?\n', stderr: '' });

        const sample = await sampler.probe();

        expect(sample.reachability).toBe('unknown');
        expect(sample.issues).toEqual(['Unable to parse ping output to get packet loss (exit code 0)']);
    });

    it('should report a missing tool as unknown with the reason', async () => {
        const { sampler } = samplerFor({ kind: 'spawn-error', message: 'spawn fping ENOENT' });

        const sample = await sampler.probe();

        expect(sample.reachability).toBe('unknown');
        expect(sample.lossPercent).toEqual({ kind: 'unknown', reason: 'Unable to run fping: spawn fping ENOENT' });
        expect(sample.issues).toEqual(['Unable to run fping: spawn fping ENOENT']);
    });

    it('should treat a probe timeout as down', async () => {
        const { sampler } = samplerFor({ kind: 'timeout', stdout: '', stderr: '' });

        const sample = await sampler.probe();

        expect(sample.reachability).toBe('down');
        expect(sample.issues).toEqual(['fping timed out']);
    });

    it('should record a missing latency on an otherwise healthy sample', async () => {
        const { sampler } = samplerFor({
            kind: 'exited',
            code: 0,
            stdout: '5 packets transmitted, 5 received, 0% packet loss, time 4005ms\n',
            stderr: '',
        });

        const sample = await sampler.probe();

        expect(sample.reachability).toBe('up');
        expect(sample.avgLatencyMs.kind).toBe('unknown');
        expect(sample.issues).toEqual(['Unable to parse ping output to get ping time']);
    });

    it('should report DNS failure when the resolver throws', async () => {
        const runCommand = vi.fn<CommandRunner>().mockResolvedValue({
            kind: 'exited',
            code: 0,
            stdout: '',
            stderr: '192.0.2.1 : xmt/rcv/%loss = 5/5/0%, min/avg/max = 1.0/2.0/3.0\n',
        });
        const resolveHost = vi.fn<HostResolver>().mockRejectedValue(new Error('resolver exploded'));
        const sampler = new Sampler(config, { runCommand, resolveHost });

        const sample = await sampler.probe();

        expect(sample.dnsResolved).toBe(false);
        expect(sample.reachability).toBe('up');
    });
});
