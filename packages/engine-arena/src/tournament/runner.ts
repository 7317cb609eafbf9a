import { firstQuartile, mean, RosterError, SharedInstanceError } from '@dilemma/engine-core';
import type { PayoffModel } from '@dilemma/engine-core';
import type { Strategy } from '@dilemma/strategies';
import { silentLogger, type RunOptions } from '../logger.js';
import { runMatch } from '../match/runner.js';
import { assignIds, rankScores } from './ranking.js';
import type { Entrant, Pairing, TournamentResult } from './types.js';

/**
 * Round-robin over every unordered pair of the roster. Each slot must hold
 * its own Strategy instance.
 *
 * Pipeline:
 * 1. Assign unique ids (duplicate names get a numeric suffix)
 * 2. One pair-run per i < j via runMatch
 * 3. First quartile of each side's match totals is its pair contribution
 * 4. Mean of contributions per entrant
 * 5. Stable descending ranking
 */
export function runTournament(
  config: Readonly<PayoffModel>,
  roster: readonly Strategy[],
  options: RunOptions = {},
): TournamentResult {
  if (roster.length < 2) {
    throw new RosterError(roster.length);
  }
  const seen = new Set<Strategy>();
  for (const strategy of roster) {
    if (seen.has(strategy)) throw new SharedInstanceError(strategy.name);
    seen.add(strategy);
  }

  const log = options.logger ?? silentLogger;
  const startedAt = Date.now();

  const ids = assignIds(roster.map((s) => s.name));
  const entrants: Entrant[] = roster.map((strategy, i) => ({ id: ids[i], strategy }));
  const contributions = new Map<string, number[]>(ids.map((id) => [id, []]));
  const totalPairs = (entrants.length * (entrants.length - 1)) / 2;

  log.info(
    { entrants: ids, rounds: config.roundsPerMatch, matches: config.matchesPerPair },
    'tournament started',
  );

  const pairings: Pairing[] = [];
  for (let i = 0; i < entrants.length; i++) {
    for (let j = i + 1; j < entrants.length; j++) {
      const a = entrants[i];
      const b = entrants[j];
      const result = runMatch(config, a.strategy, b.strategy, { logger: log });
      const scoreA = firstQuartile(result.scoresA);
      const scoreB = firstQuartile(result.scoresB);

      contributions.get(a.id)?.push(scoreA);
      contributions.get(b.id)?.push(scoreB);
      pairings.push({ a: a.id, b: b.id, result, scoreA, scoreB });

      log.info(
        { a: a.id, b: b.id, scoreA, scoreB, completed: pairings.length, total: totalPairs },
        'pair finished',
      );
    }
  }

  const scores = new Map<string, number>(ids.map((id) => [id, mean(contributions.get(id) ?? [])]));
  const ranking = rankScores(ids, scores);

  log.info({ durationMs: Date.now() - startedAt, ranking }, 'tournament finished');

  return { entrants: ids, pairings, scores, ranking };
}
