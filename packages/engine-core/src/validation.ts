import { ConfigurationError } from './errors.js';
import type { PayoffModel, PayoffTable } from './types.js';
import { EngineError } from './types.js';

const PAYOFF_KEYS = ['defectWin', 'mutualCooperate', 'mutualDefect', 'cooperateLoss'] as const;

/** Name of the first payoff that is not a finite integer, or null. */
export function findInvalidPayoff(p: PayoffTable): (typeof PAYOFF_KEYS)[number] | null {
  for (const key of PAYOFF_KEYS) {
    if (!Number.isInteger(p[key])) return key;
  }
  return null;
}

export function validatePayoffValues(p: PayoffTable): EngineError | null {
  return findInvalidPayoff(p) === null ? null : EngineError.INVALID_PAYOFF;
}

export function validatePayoffOrder(p: PayoffTable): EngineError | null {
  const { defectWin, mutualCooperate, mutualDefect, cooperateLoss } = p;
  if (!(defectWin > mutualCooperate && mutualCooperate > mutualDefect && mutualDefect >= cooperateLoss)) {
    return EngineError.INVALID_PAYOFF_ORDER;
  }
  return null;
}

export function validateRounds(roundsPerMatch: number): EngineError | null {
  if (!Number.isInteger(roundsPerMatch) || roundsPerMatch <= 0) {
    return EngineError.INVALID_ROUNDS;
  }
  return null;
}

export function validateMatches(matchesPerPair: number): EngineError | null {
  if (!Number.isInteger(matchesPerPair) || matchesPerPair <= 0) {
    return EngineError.INVALID_MATCHES;
  }
  return null;
}

/** Validate a full PayoffModel. Returns first error found, or null. */
export function validatePayoffModel(model: PayoffModel): { error: EngineError; detail?: string } | null {
  const bad = findInvalidPayoff(model);
  if (bad) return { error: EngineError.INVALID_PAYOFF, detail: `${bad}=${model[bad]}` };

  const orderErr = validatePayoffOrder(model);
  if (orderErr) {
    const { defectWin, mutualCooperate, mutualDefect, cooperateLoss } = model;
    return {
      error: orderErr,
      detail: `defectWin(${defectWin}) > mutualCooperate(${mutualCooperate}) > mutualDefect(${mutualDefect}) >= cooperateLoss(${cooperateLoss})`,
    };
  }

  const rErr = validateRounds(model.roundsPerMatch);
  if (rErr) return { error: rErr, detail: `roundsPerMatch=${model.roundsPerMatch}` };

  const mErr = validateMatches(model.matchesPerPair);
  if (mErr) return { error: mErr, detail: `matchesPerPair=${model.matchesPerPair}` };

  return null;
}

const MESSAGES: Record<EngineError, string> = {
  [EngineError.INVALID_PAYOFF]: 'Payoffs must be integers',
  [EngineError.INVALID_PAYOFF_ORDER]: 'Payoffs must satisfy defectWin > mutualCooperate > mutualDefect >= cooperateLoss',
  [EngineError.INVALID_ROUNDS]: 'roundsPerMatch must be a positive integer',
  [EngineError.INVALID_MATCHES]: 'matchesPerPair must be a positive integer',
  [EngineError.PROTOCOL_VIOLATION]: 'Protocol violation',
  [EngineError.INSUFFICIENT_ROSTER]: 'Not enough strategies',
  [EngineError.UNKNOWN_STRATEGY]: 'Unknown strategy',
  [EngineError.INVALID_OPTION]: 'Invalid option',
  [EngineError.SHARED_INSTANCE]: 'Strategy instance used twice',
};

/**
 * Build the immutable PayoffModel shared by every match of a run.
 * Throws ConfigurationError on the first failed check.
 */
export function createPayoffModel(input: PayoffModel): Readonly<PayoffModel> {
  const failure = validatePayoffModel(input);
  if (failure) {
    const message = failure.detail ? `${MESSAGES[failure.error]}: ${failure.detail}` : MESSAGES[failure.error];
    throw new ConfigurationError(failure.error, message, failure.detail);
  }

  return Object.freeze({
    defectWin: input.defectWin,
    mutualCooperate: input.mutualCooperate,
    mutualDefect: input.mutualDefect,
    cooperateLoss: input.cooperateLoss,
    roundsPerMatch: input.roundsPerMatch,
    matchesPerPair: input.matchesPerPair,
  });
}
