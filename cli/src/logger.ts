import pino, { type DestinationStream, type Logger } from 'pino';
import type { LogLevel } from './config.js';

/**
 * JSON logger on stderr; stdout carries the composed text.
 */
export function createLogger(level: LogLevel, destination: DestinationStream = pino.destination(2)): Logger {
    return pino(
        {
            name: 'jamo-compose',
            level,
            timestamp: pino.stdTimeFunctions.isoTime,
        },
        destination
    );
}
