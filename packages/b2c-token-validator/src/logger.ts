import { pino, type Logger } from 'pino';

/**
 * Logger used when the caller does not inject one.
 */
export const createSilentLogger = (): Logger => pino({ level: 'silent' });
