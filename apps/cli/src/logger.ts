import { destination, levels, multistream, pino } from 'pino';
import type { LevelWithSilent, Logger, StreamEntry } from 'pino';

export interface LoggerOptions {
  level: LevelWithSilent;
  /** Also write debug-and-above JSON lines here; parent directories are created. */
  file?: string;
}

function levelValue(level: LevelWithSilent): number {
  return levels.values[level] ?? Infinity;
}

export function createLogger(options: LoggerOptions): Logger {
  if (!options.file) {
    return pino({ level: options.level });
  }

  const streams: StreamEntry[] = [{ level: 'debug', stream: destination({ dest: options.file, mkdir: true, sync: true }) }];
  if (options.level !== 'silent') {
    streams.push({ level: options.level, stream: process.stdout });
  }

  const level = levelValue(options.level) < levelValue('debug') ? options.level : 'debug';
  return pino({ level }, multistream(streams));
}
