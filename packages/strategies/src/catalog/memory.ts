import type { Action, RandomSource } from '@dilemma/engine-core';
import { defaultRandom } from '@dilemma/engine-core';
import { cooperateRate, cooperateWith, titForTat } from '../history.js';
import type { Strategy, StrategyOptions } from '../types.js';

const INITIAL_COOP_PROB = 0.7;
const MEDIUM_LOOKBACK = 15;

/** Cooperation probability rescaled from a cooperate fraction into [low, low + span]. */
function band(low: number, span: number, rate: number): number {
  return low + rate * span;
}

/** Last 3 opponent moves → cooperation probability in [0.3, 0.7]. */
export class ShortMemory implements Strategy {
  readonly name: string;
  private readonly random: RandomSource;
  private coopProb = INITIAL_COOP_PROB;

  constructor(options: StrategyOptions = {}) {
    this.name = options.name ?? 'ShortMemory';
    this.random = options.random ?? defaultRandom;
  }

  decide(_own: readonly Action[], opponent: readonly Action[]): Action {
    if (opponent.length >= 3) {
      this.coopProb = band(0.3, 0.4, cooperateRate(opponent.slice(-3)));
    }
    return cooperateWith(this.coopProb, this.random());
  }

  reset(): void {
    this.coopProb = INITIAL_COOP_PROB;
  }
}

/** Last ≤15 opponent moves → cooperation probability in [0.2, 0.8]. */
export class MediumMemory implements Strategy {
  readonly name: string;
  private readonly random: RandomSource;
  private coopProb = INITIAL_COOP_PROB;

  constructor(options: StrategyOptions = {}) {
    this.name = options.name ?? 'MediumMemory';
    this.random = options.random ?? defaultRandom;
  }

  decide(_own: readonly Action[], opponent: readonly Action[]): Action {
    if (opponent.length > 0) {
      this.coopProb = band(0.2, 0.6, cooperateRate(opponent.slice(-MEDIUM_LOOKBACK)));
    }
    return cooperateWith(this.coopProb, this.random());
  }

  reset(): void {
    this.coopProb = INITIAL_COOP_PROB;
  }
}

/** Whole opponent history → cooperation probability in [0.2, 0.8]. */
export class LongMemory implements Strategy {
  readonly name: string;
  private readonly random: RandomSource;
  private coopProb = INITIAL_COOP_PROB;

  constructor(options: StrategyOptions = {}) {
    this.name = options.name ?? 'LongMemory';
    this.random = options.random ?? defaultRandom;
  }

  decide(_own: readonly Action[], opponent: readonly Action[]): Action {
    if (opponent.length > 0) {
      this.coopProb = band(0.2, 0.6, cooperateRate(opponent));
    }
    return cooperateWith(this.coopProb, this.random());
  }

  reset(): void {
    this.coopProb = INITIAL_COOP_PROB;
  }
}

/** Tit-for-tat for 5 rounds, then MediumMemory. */
export class TitForTatStartMediumMemory implements Strategy {
  readonly name: string;
  private readonly random: RandomSource;
  private coopProb = INITIAL_COOP_PROB;

  constructor(options: StrategyOptions = {}) {
    this.name = options.name ?? 'TitForTatStartMediumMemory';
    this.random = options.random ?? defaultRandom;
  }

  decide(_own: readonly Action[], opponent: readonly Action[]): Action {
    if (opponent.length < 5) return titForTat(opponent);
    this.coopProb = band(0.2, 0.6, cooperateRate(opponent.slice(-MEDIUM_LOOKBACK)));
    return cooperateWith(this.coopProb, this.random());
  }

  reset(): void {
    this.coopProb = INITIAL_COOP_PROB;
  }
}
