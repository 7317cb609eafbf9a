import type { Action, RandomSource } from '@dilemma/engine-core';
import { defaultRandom, flip } from '@dilemma/engine-core';
import { last, titForTat } from '../history.js';
import type { Strategy, StrategyOptions } from '../types.js';

export class AlwaysCooperate implements Strategy {
  readonly name: string;

  constructor(options: StrategyOptions = {}) {
    this.name = options.name ?? 'AlwaysCooperate';
  }

  decide(): Action {
    return 'COOPERATE';
  }

  reset(): void {}
}

export class AlwaysDefect implements Strategy {
  readonly name: string;

  constructor(options: StrategyOptions = {}) {
    this.name = options.name ?? 'AlwaysDefect';
  }

  decide(): Action {
    return 'DEFECT';
  }

  reset(): void {}
}

/** Coin flip every round. */
export class RandomStrategy implements Strategy {
  readonly name: string;
  private readonly random: RandomSource;

  constructor(options: StrategyOptions = {}) {
    this.name = options.name ?? 'Random';
    this.random = options.random ?? defaultRandom;
  }

  decide(): Action {
    return this.random() < 0.5 ? 'DEFECT' : 'COOPERATE';
  }

  reset(): void {}
}

export class TitForTat implements Strategy {
  readonly name: string;

  constructor(options: StrategyOptions = {}) {
    this.name = options.name ?? 'TitForTat';
  }

  decide(_own: readonly Action[], opponent: readonly Action[]): Action {
    return titForTat(opponent);
  }

  reset(): void {}
}

/** Defects only when the opponent defected in at least 2 of the last 3 rounds. */
export class ForgivingTitForTat implements Strategy {
  readonly name: string;

  constructor(options: StrategyOptions = {}) {
    this.name = options.name ?? 'ForgivingTitForTat';
  }

  decide(_own: readonly Action[], opponent: readonly Action[]): Action {
    if (opponent.length < 3) return 'COOPERATE';
    const defections = opponent.slice(-3).filter((a) => a === 'DEFECT').length;
    return defections >= 2 ? 'DEFECT' : 'COOPERATE';
  }

  reset(): void {}
}

/** Cooperates until the first defection it sees, then defects for the rest of the match. */
export class Grudge implements Strategy {
  readonly name: string;
  private grudge = false;

  constructor(options: StrategyOptions = {}) {
    this.name = options.name ?? 'Grudge';
  }

  decide(_own: readonly Action[], opponent: readonly Action[]): Action {
    if (opponent.length === 0) return 'COOPERATE';
    if (opponent.includes('DEFECT')) {
      this.grudge = true;
    }
    return this.grudge ? 'DEFECT' : 'COOPERATE';
  }

  reset(): void {
    this.grudge = false;
  }

  /** True once the opponent has defected this match. */
  get triggered(): boolean {
    return this.grudge;
  }
}

/**
 * Win-stay, lose-shift. A round counts as a win when the opponent cooperated:
 * repeat own last move; otherwise switch.
 */
export class WinStayLoseShift implements Strategy {
  readonly name: string;

  constructor(options: StrategyOptions = {}) {
    this.name = options.name ?? 'WinStayLoseShift';
  }

  decide(own: readonly Action[], opponent: readonly Action[]): Action {
    const mine = last(own);
    const theirs = last(opponent);
    if (mine === undefined || theirs === undefined) return 'COOPERATE';
    return theirs === 'COOPERATE' ? mine : flip(mine);
  }

  reset(): void {}
}

/**
 * Lookup over last round's (own, opponent) outcome:
 * (C, C) → C, (D, C) → D, (C, D) → D, (D, D) → C.
 */
export class Pavlov implements Strategy {
  readonly name: string;
  private readonly opening: Action = 'COOPERATE';

  constructor(options: StrategyOptions = {}) {
    this.name = options.name ?? 'Pavlov';
  }

  decide(own: readonly Action[], opponent: readonly Action[]): Action {
    const mine = last(own);
    const theirs = last(opponent);
    if (mine === undefined || theirs === undefined) return this.opening;
    if (theirs === 'COOPERATE') return mine;
    return mine === 'COOPERATE' ? 'DEFECT' : 'COOPERATE';
  }

  reset(): void {}
}

/** Fixed cycle C, C, D regardless of the opponent. */
export class TwoCoopOneDefect implements Strategy {
  readonly name: string;
  private position = 0;

  constructor(options: StrategyOptions = {}) {
    this.name = options.name ?? 'TwoCoopOneDefect';
  }

  decide(): Action {
    const action: Action = this.position === 2 ? 'DEFECT' : 'COOPERATE';
    this.position = (this.position + 1) % 3;
    return action;
  }

  reset(): void {
    this.position = 0;
  }
}
