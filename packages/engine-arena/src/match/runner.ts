import { computePayoff, isAction, ProtocolViolationError, SharedInstanceError } from '@dilemma/engine-core';
import type { Action, PayoffModel } from '@dilemma/engine-core';
import type { Strategy } from '@dilemma/strategies';
import { silentLogger, type RunOptions } from '../logger.js';
import type { MatchResult } from './types.js';

/**
 * Play `matchesPerPair` matches of `roundsPerMatch` rounds between two strategies.
 *
 * Both strategies are reset before every match. Each round A sees
 * (own, opponent) = (historyA, historyB) and B the mirror. A strategy that
 * returns anything but an Action aborts the run with ProtocolViolationError;
 * the match in progress is not recorded. The same instance on both sides
 * throws SharedInstanceError.
 */
export function runMatch(
  config: Readonly<PayoffModel>,
  a: Strategy,
  b: Strategy,
  options: RunOptions = {},
): MatchResult {
  if (a === b) throw new SharedInstanceError(a.name);

  const log = (options.logger ?? silentLogger).child({ a: a.name, b: b.name });
  const result: MatchResult = { scoresA: [], scoresB: [], historiesA: [], historiesB: [] };

  for (let match = 0; match < config.matchesPerPair; match++) {
    a.reset();
    b.reset();

    const historyA: Action[] = [];
    const historyB: Action[] = [];
    let totalA = 0;
    let totalB = 0;

    for (let round = 0; round < config.roundsPerMatch; round++) {
      const moveA: unknown = a.decide(historyA, historyB);
      const moveB: unknown = b.decide(historyB, historyA);
      if (!isAction(moveA)) throw new ProtocolViolationError(a.name, moveA, round);
      if (!isAction(moveB)) throw new ProtocolViolationError(b.name, moveB, round);

      const [payoffA, payoffB] = computePayoff(config, moveA, moveB);
      historyA.push(moveA);
      historyB.push(moveB);
      totalA += payoffA;
      totalB += payoffB;

      if (log.isLevelEnabled('trace')) {
        log.trace({ match, round, moveA, moveB, payoffA, payoffB }, 'round');
      }
    }

    result.scoresA.push(totalA);
    result.scoresB.push(totalB);
    result.historiesA.push(historyA);
    result.historiesB.push(historyB);
    log.debug({ match, scoreA: totalA, scoreB: totalB }, 'match finished');
  }

  return result;
}
