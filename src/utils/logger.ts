import winston from 'winston';

const { combine, timestamp, printf, colorize, errors } = winston.format;

/**
 * Diagnostic line format: `2025-01-01 12:00:00 [info] [MonitorLoop]: message {meta}`
 */
const logFormat = printf(({ level, message, timestamp, context, stack, ...metadata }) => {
    const scope = typeof context === 'string' ? ` [${context}]` : '';
    let msg = `${timestamp} [${level}]${scope}: ${message}`;

    if (Object.keys(metadata).length > 0) {
        msg += ` ${JSON.stringify(metadata)}`;
    }

    if (typeof stack === 'string') {
        msg += `\n${stack}`;
    }

    return msg;
});

/**
 * Winston logger for the monitor process
 *
 * - Everything goes to stderr: stdout carries the MCP stdio transport
 * - Level from LOG_LEVEL (default: info)
 * - This is the diagnostic log; outage history lives in the connection journal
 */
export const logger = winston.createLogger({
    level: process.env.LOG_LEVEL || 'info',
    format: combine(
        errors({ stack: true }),
        timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        logFormat
    ),
    transports: [
        new winston.transports.Console({
            stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'],
            format: combine(
                errors({ stack: true }),
                colorize({ all: true }),
                timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
                logFormat
            ),
        }),
    ],
});

/**
 * Create a child logger with a specific context
 */
export function createLogger(context: string): winston.Logger {
    return logger.child({ context });
}
