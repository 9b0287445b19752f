import { lookup } from 'dns/promises';

/**
 * Resolve a hostname through the OS resolver within a deadline.
 * One attempt, no retry: false on error or timeout.
 */
export async function resolveHost(hostname: string, timeoutMs: number): Promise<boolean> {
    let timer: NodeJS.Timeout | undefined;

    const timedOut = new Promise<false>((resolve) => {
        timer = setTimeout(() => resolve(false), timeoutMs);
    });

    const resolved = lookup(hostname)
        .then(() => true)
        .catch(() => false);

    try {
        return await Promise.race([resolved, timedOut]);
    } finally {
        clearTimeout(timer);
    }
}
