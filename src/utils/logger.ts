/**
 * Asterisk WS Kit — Structured Logger (Pino)
 *
 * Every connection logs through a child of the root logger so that
 * lines from concurrent sockets can be told apart by `component`
 * and `tag`.
 */

import pino from 'pino';

const LOG_LEVEL = process.env['LOG_LEVEL'] ?? 'info';
const NODE_ENV = process.env['NODE_ENV'] ?? 'development';

/**
 * Root logger instance.
 * In development, use pino-pretty transport for human-readable output.
 * In production, emit raw JSON (fastest path).
 */
export const logger = pino({
    level: LOG_LEVEL,
    base: {
        service: 'asterisk-ws-kit',
        env: NODE_ENV,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    // Credentials travel in config objects and handshake headers
    redact: {
        paths: [
            'credentials.password',
            '*.credentials.password',
            'headers.authorization',
        ],
        censor: '[REDACTED]',
    },
    ...(NODE_ENV === 'development'
        ? {
            transport: {
                target: 'pino-pretty',
                options: {
                    colorize: true,
                    translateTime: 'SYS:HH:MM:ss.l',
                    ignore: 'pid,hostname',
                },
            },
        }
        : {}),
});

/**
 * Create a child logger for one component, optionally scoped by a tag
 * (connection id, channel name).
 */
export function createComponentLogger(component: string, tag?: string | null): pino.Logger {
    return tag ? logger.child({ component, tag }) : logger.child({ component });
}

/**
 * Mask the `api_key` query parameter of a websocket URL.
 * Example: "ws://h:8088/ari/events?app=a&api_key=u:p" → "...&api_key=u:***"
 */
export function redactUrl(url: string): string {
    return url.replace(/([?&]api_key=)([^&:]*)(?::|%3A)[^&]*/i, '$1$2:***');
}

/**
 * Convert high-resolution nanosecond bigint to milliseconds.
 */
export function nsToMs(ns: bigint): number {
    return Number(ns) / 1_000_000;
}

/**
 * Compute the difference between two hrtime bigints in milliseconds.
 */
export function hrtimeDiffMs(startNs: bigint, endNs: bigint): number {
    return nsToMs(endNs - startNs);
}
