import { defaultRandom, mulberry32 } from '@dilemma/engine-core';
import type { PayoffModel } from '@dilemma/engine-core';
import type { StrategyOptions } from '@dilemma/strategies';
import { createRoster, createStrategy, listStrategiesWithInfo } from '@dilemma/strategies';
import {
  describeMatchResult,
  formatTimestamp,
  formatTournamentReport,
  runMatch,
  runTournament,
} from '@dilemma/engine-arena';
import type { Logger } from 'pino';
import type { CliConfig } from './config.js';
import { writeResults } from './results.js';

function strategyOptions(config: CliConfig, model: Readonly<PayoffModel>): StrategyOptions {
  return {
    random: config.seed === undefined ? defaultRandom : mulberry32(config.seed),
    payoffs: model,
  };
}

/** Full round-robin; writes the report and returns its path. */
export function runTournamentCommand(
  config: CliConfig,
  model: Readonly<PayoffModel>,
  logger: Logger,
  now: Date = new Date(),
): string {
  const roster = createRoster(config.strategies, strategyOptions(config, model));
  const result = runTournament(model, roster, { logger });

  for (const entry of result.ranking) {
    logger.info(`${entry.rank}. ${entry.name}: ${entry.score.toFixed(2)}`);
  }

  const report = formatTournamentReport(model, result, { generatedAt: now });
  const file = writeResults(config.outDir, report, { filename: config.output, now });
  logger.info({ file }, 'results saved');
  return file;
}

/** One pair-run between agent1 and agent2; writes the summary and returns its path. */
export function runMatchCommand(
  config: CliConfig,
  model: Readonly<PayoffModel>,
  logger: Logger,
  now: Date = new Date(),
): string {
  const options = strategyOptions(config, model);
  const a = createStrategy(config.agent1, options);
  const b = createStrategy(config.agent2, options);

  logger.info({ a: a.name, b: b.name, rounds: model.roundsPerMatch, matches: model.matchesPerPair }, 'match started');
  const result = runMatch(model, a, b, { logger });
  const summary = describeMatchResult(a.name, b.name, result);
  logger.info(summary);

  const text = `Match results\nTime: ${formatTimestamp(now)}\n${summary}\n`;
  const file = writeResults(config.outDir, text, { filename: config.output, prefix: 'match_results', now });
  logger.info({ file }, 'results saved');
  return file;
}

/** One line per registered strategy: key, aliases, description. */
export function listCommand(): string {
  return listStrategiesWithInfo()
    .map((info) => {
      const aliases = info.aliases.length > 0 ? ` (${info.aliases.join(', ')})` : '';
      return `${info.key}${aliases}: ${info.description}`;
    })
    .join('\n');
}
