import type { Action, RandomSource } from '@dilemma/engine-core';
import { clamp, defaultRandom } from '@dilemma/engine-core';
import { cooperateWith, last } from '../history.js';
import type { Strategy, StrategyOptions } from '../types.js';

/** Creeps its defection probability up while the opponent tolerates it; backs off hard when punished. */
export class Inching implements Strategy {
  readonly name: string;
  private readonly random: RandomSource;
  private defectRate = 0;

  constructor(options: StrategyOptions = {}) {
    this.name = options.name ?? 'Inching';
    this.random = options.random ?? defaultRandom;
  }

  decide(_own: readonly Action[], opponent: readonly Action[]): Action {
    const theirs = last(opponent);
    if (theirs === undefined) return 'COOPERATE';

    if (theirs === 'COOPERATE') {
      this.defectRate = Math.min(0.7, this.defectRate + 0.05);
    } else {
      this.defectRate = Math.max(0, this.defectRate - 0.2);
    }

    return this.random() < this.defectRate ? 'DEFECT' : 'COOPERATE';
  }

  reset(): void {
    this.defectRate = 0;
  }

  get rate(): number {
    return this.defectRate;
  }
}

const TRUST_WARMUP_ROUNDS = 3;
const TRUST_PENALTY = 0.3;

/** Three guaranteed cooperations, then cooperates with probability equal to its trust level. */
export class TrustBuilding implements Strategy {
  readonly name: string;
  private readonly random: RandomSource;
  private readonly forgiveness = 0.1;
  private trust = 1;

  constructor(options: StrategyOptions = {}) {
    this.name = options.name ?? 'TrustBuilding';
    this.random = options.random ?? defaultRandom;
  }

  decide(_own: readonly Action[], opponent: readonly Action[]): Action {
    if (opponent.length < TRUST_WARMUP_ROUNDS) return 'COOPERATE';

    if (last(opponent) === 'DEFECT') {
      this.trust = clamp(this.trust - TRUST_PENALTY, 0, 1);
    } else {
      this.trust = clamp(this.trust + this.forgiveness, 0, 1);
    }

    return cooperateWith(this.trust, this.random());
  }

  reset(): void {
    this.trust = 1;
  }

  get trustLevel(): number {
    return this.trust;
  }
}

/** Cooperates after agreement; after disagreement cooperates 2 times in 7. */
export class Consensus implements Strategy {
  readonly name: string;
  private readonly random: RandomSource;

  constructor(options: StrategyOptions = {}) {
    this.name = options.name ?? 'Consensus';
    this.random = options.random ?? defaultRandom;
  }

  decide(own: readonly Action[], opponent: readonly Action[]): Action {
    const mine = last(own);
    const theirs = last(opponent);
    if (mine === undefined || theirs === undefined) return 'COOPERATE';
    if (mine === theirs) return 'COOPERATE';
    return cooperateWith(2 / 7, this.random());
  }

  reset(): void {}
}

/**
 * Tit-for-tat whose cooperation probability decays by 0.01 per round
 * to a floor of 0.5. Only cooperation is ever downgraded.
 */
export class Probe implements Strategy {
  readonly name: string;
  private readonly random: RandomSource;
  private coopProb = 1;
  private rounds = 0;

  constructor(options: StrategyOptions = {}) {
    this.name = options.name ?? 'Probe';
    this.random = options.random ?? defaultRandom;
  }

  decide(_own: readonly Action[], opponent: readonly Action[]): Action {
    const theirs = last(opponent);
    if (theirs === undefined) return 'COOPERATE';

    this.rounds++;
    if (this.coopProb > 0.5) {
      this.coopProb = Math.max(0.5, 1 - 0.01 * this.rounds);
    }

    if (theirs === 'COOPERATE' && this.random() > this.coopProb) {
      return 'DEFECT';
    }
    return theirs;
  }

  reset(): void {
    this.coopProb = 1;
    this.rounds = 0;
  }

  get cooperationProbability(): number {
    return this.coopProb;
  }
}

/** Answers cooperation with cooperation 90% of the time; always answers defection in kind. */
export class Capped implements Strategy {
  readonly name: string;
  private readonly random: RandomSource;

  constructor(options: StrategyOptions = {}) {
    this.name = options.name ?? 'Capped';
    this.random = options.random ?? defaultRandom;
  }

  decide(_own: readonly Action[], opponent: readonly Action[]): Action {
    const theirs = last(opponent);
    if (theirs === undefined) return 'COOPERATE';
    if (theirs === 'COOPERATE') return cooperateWith(0.9, this.random());
    return 'DEFECT';
  }

  reset(): void {}
}
