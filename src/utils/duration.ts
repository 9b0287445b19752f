/**
 * Render a duration as "1 hour, 1 minute, 1 second".
 *
 * Zero-valued units are left out, hours are not folded into days, and the
 * result is never empty: `formatDuration(0)` is "0 seconds".
 */
export function formatDuration(totalSeconds: number): string {
    const safe = Number.isFinite(totalSeconds) ? Math.max(0, Math.floor(totalSeconds)) : 0;

    const hours = Math.floor(safe / 3600);
    const minutes = Math.floor((safe % 3600) / 60);
    const seconds = safe % 60;

    const parts: string[] = [];
    if (hours > 0) parts.push(pluralize(hours, 'hour'));
    if (minutes > 0) parts.push(pluralize(minutes, 'minute'));
    if (seconds > 0 || parts.length === 0) parts.push(pluralize(seconds, 'second'));

    return parts.join(', ');
}

function pluralize(count: number, unit: string): string {
    return `${count} ${count === 1 ? unit : `${unit}s`}`;
}

/**
 * Whole seconds elapsed between two instants, floored, never negative
 */
export function elapsedSeconds(from: Date, to: Date): number {
    return Math.max(0, Math.floor((to.getTime() - from.getTime()) / 1000));
}

/**
 * Format an instant in the operator's display time zone,
 * e.g. "Feb 23, 2026, 11:59:30 PM EST"
 */
export function formatLocalTime(date: Date, timeZone: string): string {
    return date.toLocaleString('en-US', {
        timeZone,
        month: 'short',
        day: 'numeric',
        year: 'numeric',
        hour: 'numeric',
        minute: '2-digit',
        second: '2-digit',
        hour12: true,
        timeZoneName: 'short',
    });
}

/**
 * True when the runtime knows the IANA zone name
 */
export function isValidTimeZone(timeZone: string): boolean {
    try {
        new Intl.DateTimeFormat('en-US', { timeZone });
        return true;
    } catch {
        return false;
    }
}

/**
 * ISO 8601 UTC with second precision: "2025-12-07T12:34:56Z"
 */
export function toIsoSeconds(date: Date): string {
    return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

/**
 * Journal timestamp in UTC: "2025-12-07 12:34:56"
 */
export function toJournalTimestamp(date: Date): string {
    return date.toISOString().slice(0, 19).replace('T', ' ');
}
