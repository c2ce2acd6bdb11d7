import pino from 'pino';

export type Logger = pino.Logger;

/**
 * Package logger, used when callers do not pass their own.
 */
export const logger: Logger = pino({ name: 'aseprite-sheet', level: 'warn' });
