import { spawn } from 'child_process';
import { CommandOutcome } from './types.js';

/** Per-stream capture limit */
const MAX_CAPTURE_BYTES = 64 * 1024;

/**
 * Run an external probe with a hard deadline.
 *
 * Resolves with how the process ended; never rejects. A process still
 * running at the deadline is killed and reported as a timeout.
 */
export function runCommand(command: string, args: string[], timeoutMs: number): Promise<CommandOutcome> {
    return new Promise((resolve) => {
        let stdout = '';
        let stderr = '';
        let settled = false;
        let timedOut = false;

        const finish = (outcome: CommandOutcome) => {
            if (settled) return;
            settled = true;
            clearTimeout(timer);
            resolve(outcome);
        };

        const child = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });

        const timer = setTimeout(() => {
            timedOut = true;
            child.kill('SIGKILL');
            finish({ kind: 'timeout', stdout, stderr });
        }, timeoutMs);

        child.stdout?.on('data', (chunk: Buffer) => {
            if (stdout.length < MAX_CAPTURE_BYTES) stdout += chunk.toString('utf8');
        });
        child.stderr?.on('data', (chunk: Buffer) => {
            if (stderr.length < MAX_CAPTURE_BYTES) stderr += chunk.toString('utf8');
        });

        child.on('error', (error: Error) => {
            finish({ kind: 'spawn-error', message: error.message });
        });

        child.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
            if (timedOut) return;
            if (code === null) {
                finish({ kind: 'spawn-error', message: `${command} terminated by ${signal ?? 'unknown signal'}` });
                return;
            }
            finish({ kind: 'exited', code, stdout, stderr });
        });
    });
}
