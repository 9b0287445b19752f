import { NotificationEvent, SignalName } from './types.js';
import { formatDuration, formatLocalTime } from '../../utils/duration.js';

export type Notice = Pick<NotificationEvent, 'title' | 'message'>;

export function reachabilityTriggered(host: string, count: number, threshold: number): Notice {
    return {
        title: 'Internet Outage',
        message: `Internet is DOWN! Ping to ${host} has failed (${count}/${threshold})`,
    };
}

export function latencyTriggered(avgLatencyMs: number): Notice {
    return {
        title: 'High Latency',
        message: `High Internet latency has been detected. Average latency: ${formatMs(avgLatencyMs)}ms`,
    };
}

export function dnsTriggered(hostname: string, count: number, threshold: number): Notice {
    return {
        title: 'DNS Failure',
        message: `DNS resolution of ${hostname} has failed (${count}/${threshold})`,
    };
}

export function packetLossTriggered(lossPercent: number): Notice {
    return {
        title: 'Packet Loss',
        message: `Internet packet loss of ${lossPercent}% detected`,
    };
}

/**
 * Recovery notice; `peakValue` is only meaningful for packet loss
 */
export function recovered(
    signal: SignalName,
    since: Date,
    durationSeconds: number,
    timeZone: string,
    peakValue: number | null
): Notice {
    const tail = `that started ${formatLocalTime(since, timeZone)} which was for ${formatDuration(durationSeconds)} in length`;

    switch (signal) {
        case 'reachability':
            return { title: 'Internet Recovered', message: `Internet is back from outage ${tail}` };
        case 'latency':
            return { title: 'Latency Recovered', message: `Internet has recovered from high latency ${tail}` };
        case 'dns':
            return { title: 'DNS Recovered', message: `DNS has recovered from failure ${tail}` };
        case 'packetLoss':
            return {
                title: 'Packet Loss Recovered',
                message: `Internet has recovered from packet loss of ${peakValue ?? 0}% ${tail}`,
            };
    }
}

function formatMs(value: number): string {
    return Number.isInteger(value) ? String(value) : value.toFixed(1);
}
