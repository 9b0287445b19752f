import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { ConnectionJournal, formatJournalLine } from './index.js';

const { errorSpy } = vi.hoisted(() => ({ errorSpy: vi.fn() }));

vi.mock('../../utils/logger.js', () => ({
    logger: {
        info: vi.fn(),
        warn: vi.fn(),
        error: errorSpy,
        debug: vi.fn(),
    },
    createLogger: () => ({
        info: vi.fn(),
        warn: vi.fn(),
        error: errorSpy,
        debug: vi.fn(),
    }),
}));

describe('ConnectionJournal', () => {
    let dir: string;
    let journal: ConnectionJournal;

    beforeEach(async () => {
        dir = await mkdtemp(join(tmpdir(), 'uplink-journal-'));
        journal = new ConnectionJournal(join(dir, 'logs', 'connection.log'));
        errorSpy.mockClear();
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    it('should format entries with a UTC timestamp and status marker', () => {
        const at = new Date('2026-03-01T10:00:05.900Z');

        expect(formatJournalLine(true, 'Starting monitor', at)).toBe('2026-03-01 10:00:05 (+) Starting monitor\n');
        expect(formatJournalLine(false, 'line one\nline two', at)).toBe('2026-03-01 10:00:05 (-) line one line two\n');
    });

    it('should append lines and create the directory', async () => {
        await journal.append(true, 'Starting monitor', new Date('2026-03-01T10:00:00Z'));
        await journal.append(false, 'Alert: Internet is DOWN!', new Date('2026-03-01T10:03:00Z'));

        const content = await readFile(journal.path, 'utf8');
        expect(content).toBe(
            '2026-03-01 10:00:00 (+) Starting monitor\n' +
            '2026-03-01 10:03:00 (-) Alert: Internet is DOWN!\n'
        );
    });

    it('should return the last lines in order', async () => {
        for (let i = 1; i <= 5; i++) {
            await journal.append(true, `entry ${i}`, new Date('2026-03-01T10:00:00Z'));
        }

        expect(await journal.tail(2)).toEqual([
            '2026-03-01 10:00:00 (+) entry 4',
            '2026-03-01 10:00:00 (+) entry 5',
        ]);
        expect(await journal.tail(0)).toHaveLength(5);
    });

    it('should return nothing for a missing journal', async () => {
        expect(await journal.tail(10)).toEqual([]);
    });

    it('should clear the journal', async () => {
        await journal.append(true, 'entry', new Date('2026-03-01T10:00:00Z'));
        await journal.clear();

        expect(await readFile(journal.path, 'utf8')).toBe('');
        expect(await journal.tail(10)).toEqual([]);
    });

    it('should swallow write failures into the diagnostic log', async () => {
        const blocker = join(dir, 'not-a-directory');
        await writeFile(blocker, 'x');
        const broken = new ConnectionJournal(join(blocker, 'connection.log'));

        await expect(broken.append(false, 'lost entry')).resolves.toBeUndefined();
        expect(errorSpy).toHaveBeenCalledTimes(1);
    });
});
