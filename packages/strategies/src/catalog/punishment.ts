import type { Action, RandomSource } from '@dilemma/engine-core';
import { defaultRandom } from '@dilemma/engine-core';
import { cooperateWith, last } from '../history.js';
import type { Strategy, StrategyOptions } from '../types.js';

/**
 * Gradual retaliation. Each time the opponent defects against our cooperation,
 * the defection count grows and revenge lasts that many rounds.
 */
export class Gradual implements Strategy {
  readonly name: string;
  private revenge = 0;
  private defections = 0;

  constructor(options: StrategyOptions = {}) {
    this.name = options.name ?? 'Gradual';
  }

  decide(own: readonly Action[], opponent: readonly Action[]): Action {
    if (opponent.length === 0) return 'COOPERATE';

    if (last(opponent) === 'DEFECT' && last(own) === 'COOPERATE') {
      this.defections++;
      this.revenge = this.defections;
    }

    if (this.revenge > 0) {
      this.revenge--;
      return 'DEFECT';
    }
    return 'COOPERATE';
  }

  reset(): void {
    this.revenge = 0;
    this.defections = 0;
  }
}

/** Longest streak PunishmentEscalation will commit to. */
const MAX_ESCALATION = 5;

/** Tit-for-tat whose follow-up punishment grows with the opponent's total defections. */
export class PunishmentEscalation implements Strategy {
  readonly name: string;
  private defections = 0;
  private streak = 0;

  constructor(options: StrategyOptions = {}) {
    this.name = options.name ?? 'PunishmentEscalation';
  }

  decide(_own: readonly Action[], opponent: readonly Action[]): Action {
    if (opponent.length === 0) return 'COOPERATE';

    if (this.streak > 0) {
      this.streak--;
      return 'DEFECT';
    }

    if (last(opponent) === 'DEFECT') {
      this.defections++;
      this.streak = Math.min(MAX_ESCALATION, Math.floor(this.defections / 2));
      return 'DEFECT';
    }
    return 'COOPERATE';
  }

  reset(): void {
    this.defections = 0;
    this.streak = 0;
  }
}

/**
 * Punishment length picked from the opponent's running defection rate:
 * > 0.5 → 3 rounds, > 0.3 → 2, else 1.
 */
export class AdaptivePunishment implements Strategy {
  readonly name: string;
  private level = 1;
  private defections = 0;
  private rounds = 0;
  private streak = 0;

  constructor(options: StrategyOptions = {}) {
    this.name = options.name ?? 'AdaptivePunishment';
  }

  decide(_own: readonly Action[], opponent: readonly Action[]): Action {
    if (opponent.length === 0) return 'COOPERATE';

    this.rounds++;

    if (this.streak > 0) {
      this.streak--;
      return 'DEFECT';
    }

    if (last(opponent) === 'DEFECT') {
      this.defections++;
      const rate = this.defections / this.rounds;
      if (rate > 0.5) {
        this.level = 3;
      } else if (rate > 0.3) {
        this.level = 2;
      } else {
        this.level = 1;
      }
      this.streak = this.level;
      return 'DEFECT';
    }
    return 'COOPERATE';
  }

  reset(): void {
    this.level = 1;
    this.defections = 0;
    this.rounds = 0;
    this.streak = 0;
  }
}

const REVENGE_ROUNDS = 2;
const FORGIVENESS_HORIZON = 5;

/**
 * Two rounds of revenge after being exploited, then probabilistic cooperation
 * that warms up with every calm round until the forgiveness horizon is reached.
 */
export class GradualForgiving implements Strategy {
  readonly name: string;
  private readonly random: RandomSource;
  private revenge = 0;
  private horizon = 0;
  private sinceDefection = 0;

  constructor(options: StrategyOptions = {}) {
    this.name = options.name ?? 'GradualForgiving';
    this.random = options.random ?? defaultRandom;
  }

  decide(own: readonly Action[], opponent: readonly Action[]): Action {
    if (opponent.length === 0) return 'COOPERATE';

    const theirs = last(opponent);
    if (theirs === 'DEFECT') {
      this.sinceDefection = 0;
    } else {
      this.sinceDefection++;
    }

    if (theirs === 'DEFECT' && last(own) === 'COOPERATE') {
      this.revenge = REVENGE_ROUNDS;
      this.horizon = FORGIVENESS_HORIZON;
    }

    if (this.revenge > 0) {
      this.revenge--;
      return 'DEFECT';
    }

    if (this.sinceDefection >= this.horizon) {
      this.horizon = 0;
      return 'COOPERATE';
    }

    return cooperateWith(Math.min(0.9, 0.5 + this.sinceDefection * 0.1), this.random());
  }

  reset(): void {
    this.revenge = 0;
    this.horizon = 0;
    this.sinceDefection = 0;
  }
}

/** Punishment counter in [0, 5]: cooperation pays it down by 1, defection adds 2. */
export class RewardPunishment implements Strategy {
  readonly name: string;
  private counter = 0;

  constructor(options: StrategyOptions = {}) {
    this.name = options.name ?? 'RewardPunishment';
  }

  decide(_own: readonly Action[], opponent: readonly Action[]): Action {
    const theirs = last(opponent);
    if (theirs === undefined) return 'COOPERATE';

    if (theirs === 'COOPERATE') {
      this.counter = Math.max(0, this.counter - 1);
      return 'COOPERATE';
    }

    this.counter = Math.min(5, this.counter + 2);
    return this.counter > 0 ? 'DEFECT' : 'COOPERATE';
  }

  reset(): void {
    this.counter = 0;
  }

  get punishment(): number {
    return this.counter;
  }
}
