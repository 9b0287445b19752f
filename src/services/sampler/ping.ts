import { Measurement, PingReport, measured, unknownMeasurement } from './types.js';

/**
 * Loss patterns, tried in order:
 *   fping:  "8.8.8.8 : xmt/rcv/%loss = 5/5/0%, min/avg/max = 9.8/11.2/13.0"
 *   ping:   "5 packets transmitted, 5 received, 0% packet loss, time 4006ms"
 *   BSD:    "5 packets transmitted, 5 packets received, 0.0% packet loss"
 */
const LOSS_PATTERNS: RegExp[] = [
    /xmt\/rcv\/%loss\s*=\s*\d+\/\d+\/(\d+(?:\.\d+)?)%/,
    /(\d+(?:\.\d+)?)%\s+packet loss/,
];

/**
 *   fping:  "min/avg/max = 9.8/11.2/13.0"
 *   ping:   "rtt min/avg/max/mdev = 9.812/11.204/13.001/1.120 ms"
 *   BSD:    "round-trip min/avg/max/stddev = 9.8/11.2/13.0/1.1 ms"
 */
const LATENCY_PATTERN = /min\/avg\/max(?:\/(?:mdev|stddev))?\s*=\s*(\d+(?:\.\d+)?)\/(\d+(?:\.\d+)?)\/(\d+(?:\.\d+)?)/;

/**
 * Extract loss and average latency from a ping tool's textual report.
 * Anything that does not match is `unknown`, never zero.
 */
export function parsePingReport(output: string): PingReport {
    return {
        lossPercent: parseLoss(output),
        avgLatencyMs: parseAverageLatency(output),
    };
}

function parseLoss(output: string): Measurement<number> {
    for (const pattern of LOSS_PATTERNS) {
        const match = output.match(pattern);
        if (!match) continue;

        const value = Number(match[1]);
        if (Number.isFinite(value) && value >= 0 && value <= 100) {
            return measured(Math.round(value));
        }
    }
    return unknownMeasurement('Unable to parse ping output to get packet loss');
}

function parseAverageLatency(output: string): Measurement<number> {
    const match = output.match(LATENCY_PATTERN);
    if (!match) {
        return unknownMeasurement('Unable to parse ping output to get ping time');
    }

    const avg = Number(match[2]);
    if (!Number.isFinite(avg) || avg < 0) {
        return unknownMeasurement(`Implausible average latency in ping output: ${match[2]}`);
    }
    return measured(avg);
}
