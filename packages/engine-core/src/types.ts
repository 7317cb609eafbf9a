/** A single round's choice. */
export type Action = 'COOPERATE' | 'DEFECT';

export const ACTIONS: readonly Action[] = ['COOPERATE', 'DEFECT'];

/** Payoff parameters and match sizing. Ordering: defectWin > mutualCooperate > mutualDefect >= cooperateLoss. */
export interface PayoffModel {
  /** Defector's score when the other side cooperates. */
  defectWin: number;
  mutualCooperate: number;
  mutualDefect: number;
  /** Cooperator's score when the other side defects. */
  cooperateLoss: number;
  roundsPerMatch: number;
  matchesPerPair: number;
}

/** Just the four scores, for callers that only need the table. */
export type PayoffTable = Pick<
  PayoffModel,
  'defectWin' | 'mutualCooperate' | 'mutualDefect' | 'cooperateLoss'
>;

/** Uniform draw on [0, 1). */
export type RandomSource = () => number;

/** Engine error codes. */
export enum EngineError {
  INVALID_PAYOFF = 'INVALID_PAYOFF',
  INVALID_PAYOFF_ORDER = 'INVALID_PAYOFF_ORDER',
  INVALID_ROUNDS = 'INVALID_ROUNDS',
  INVALID_MATCHES = 'INVALID_MATCHES',
  PROTOCOL_VIOLATION = 'PROTOCOL_VIOLATION',
  INSUFFICIENT_ROSTER = 'INSUFFICIENT_ROSTER',
  UNKNOWN_STRATEGY = 'UNKNOWN_STRATEGY',
  INVALID_OPTION = 'INVALID_OPTION',
  SHARED_INSTANCE = 'SHARED_INSTANCE',
}

export function isAction(value: unknown): value is Action {
  return value === 'COOPERATE' || value === 'DEFECT';
}

export function flip(action: Action): Action {
  return action === 'COOPERATE' ? 'DEFECT' : 'COOPERATE';
}
