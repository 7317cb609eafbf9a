import type { PayoffModel } from '@dilemma/engine-core';
import type { TournamentResult } from './types.js';

export interface ReportOptions {
  /** Adds a `Time:` line. */
  generatedAt?: Date;
  title?: string;
}

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/** Local time as `YYYY-MM-DD HH:mm:ss`. */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/** Plain-text report: parameters, then one `rank. name: score` line per entrant. */
export function formatTournamentReport(
  config: Readonly<PayoffModel>,
  result: TournamentResult,
  options: ReportOptions = {},
): string {
  const lines = [options.title ?? 'Tournament results'];
  if (options.generatedAt) {
    lines.push(`Time: ${formatTimestamp(options.generatedAt)}`);
  }
  lines.push(
    `Payoffs: defectWin=${config.defectWin}, mutualCooperate=${config.mutualCooperate}, ` +
      `mutualDefect=${config.mutualDefect}, cooperateLoss=${config.cooperateLoss}`,
    `Rounds per match: ${config.roundsPerMatch}, matches per pair: ${config.matchesPerPair}`,
    '',
    'Final ranking:',
  );
  for (const entry of result.ranking) {
    lines.push(`${entry.rank}. ${entry.name}: ${entry.score.toFixed(2)}`);
  }
  return lines.join('\n') + '\n';
}
