import { pino, type Logger } from 'pino';

/** Used when the caller passes no logger. */
export const silentLogger: Logger = pino({ level: 'silent' });

export interface RunOptions {
  logger?: Logger;
}
