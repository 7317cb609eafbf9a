import type { Action, PayoffTable, RandomSource } from '@dilemma/engine-core';

/**
 * A named, stateful decision policy.
 *
 * `decide` sees only prior rounds: its own history first, the opponent's second.
 * `reset` clears per-match state and keeps name and structural configuration.
 * Instances are not reentrant; one match at a time.
 */
export interface Strategy {
  readonly name: string;
  decide(own: readonly Action[], opponent: readonly Action[]): Action;
  reset(): void;
}

/** Construction options shared by every catalog entry. */
export interface StrategyOptions {
  /** Display name; defaults to the policy's own name. */
  name?: string;
  /** Uniform [0,1) source for probabilistic policies. Defaults to Math.random. */
  random?: RandomSource;
  /** Payoff table for policies that score hypothetical play (Hybrid). */
  payoffs?: PayoffTable;
}
