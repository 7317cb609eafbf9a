import { mkdirSync, writeFileSync } from 'node:fs';
import * as path from 'node:path';

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/** `<prefix>_YYYYMMDD_HHmmss.txt` in local time. */
export function resultsFilename(prefix: string, date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${prefix}_${day}_${time}.txt`;
}

export interface WriteResultsOptions {
  filename?: string;
  prefix?: string;
  now?: Date;
}

/** Write `text` into `outDir`, creating it first. Returns the file path. */
export function writeResults(outDir: string, text: string, options: WriteResultsOptions = {}): string {
  const filename = options.filename ?? resultsFilename(options.prefix ?? 'tournament_results', options.now ?? new Date());
  mkdirSync(outDir, { recursive: true });
  const file = path.join(outDir, filename);
  writeFileSync(file, text, 'utf-8');
  return file;
}
