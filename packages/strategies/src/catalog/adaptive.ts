import type { Action, PayoffTable } from '@dilemma/engine-core';
import { computePayoff } from '@dilemma/engine-core';
import { cooperateRate, titForTat } from '../history.js';
import type { Strategy, StrategyOptions } from '../types.js';

/** Opponent cooperation rate ≥ 0.7 → cooperate, ≤ 0.3 → defect, otherwise tit-for-tat. */
export class AdaptiveAgent implements Strategy {
  readonly name: string;
  private cooperation = 0;

  constructor(options: StrategyOptions = {}) {
    this.name = options.name ?? 'AdaptiveAgent';
  }

  decide(_own: readonly Action[], opponent: readonly Action[]): Action {
    if (opponent.length === 0) return 'COOPERATE';

    this.cooperation = cooperateRate(opponent);
    if (this.cooperation >= 0.7) return 'COOPERATE';
    if (this.cooperation <= 0.3) return 'DEFECT';
    return titForTat(opponent);
  }

  reset(): void {
    this.cooperation = 0;
  }
}

export type HybridPolicy = 'TIT_FOR_TAT' | 'ALWAYS_DEFECT' | 'ALWAYS_COOPERATE';

type Policy = (own: readonly Action[], opponent: readonly Action[]) => Action;

/** Evaluation order doubles as the tie-break order. */
const POLICIES: Record<HybridPolicy, Policy> = {
  TIT_FOR_TAT: (_own, opponent) => titForTat(opponent),
  ALWAYS_DEFECT: () => 'DEFECT',
  ALWAYS_COOPERATE: () => 'COOPERATE',
};

const POLICY_ORDER: readonly HybridPolicy[] = ['TIT_FOR_TAT', 'ALWAYS_DEFECT', 'ALWAYS_COOPERATE'];

/** Rounds between re-evaluations, and the size of the replay window. */
const EVALUATION_WINDOW = 10;

/** Table used when none is supplied. */
export const HYBRID_DEFAULT_PAYOFFS: PayoffTable = {
  defectWin: 5,
  mutualCooperate: 3,
  mutualDefect: 1,
  cooperateLoss: -2,
};

/**
 * Every 10 rounds replays tit-for-tat, always-defect and always-cooperate
 * against the opponent's last 10 moves and switches to the best scorer.
 */
export class Hybrid implements Strategy {
  readonly name: string;
  private readonly payoffs: PayoffTable;
  private current: HybridPolicy = 'TIT_FOR_TAT';
  private performance: Record<HybridPolicy, number> = { TIT_FOR_TAT: 0, ALWAYS_DEFECT: 0, ALWAYS_COOPERATE: 0 };
  private rounds = 0;
  private lastSwitch = 0;

  constructor(options: StrategyOptions = {}) {
    this.name = options.name ?? 'Hybrid';
    this.payoffs = options.payoffs ?? HYBRID_DEFAULT_PAYOFFS;
  }

  decide(own: readonly Action[], opponent: readonly Action[]): Action {
    this.rounds++;

    if (this.rounds - this.lastSwitch >= EVALUATION_WINDOW) {
      this.evaluate(own, opponent);
      this.lastSwitch = this.rounds;
    }

    return POLICIES[this.current](own, opponent);
  }

  reset(): void {
    this.current = 'TIT_FOR_TAT';
    this.performance = { TIT_FOR_TAT: 0, ALWAYS_DEFECT: 0, ALWAYS_COOPERATE: 0 };
    this.rounds = 0;
    this.lastSwitch = 0;
  }

  get policy(): HybridPolicy {
    return this.current;
  }

  get scores(): Readonly<Record<HybridPolicy, number>> {
    return this.performance;
  }

  /**
   * Replay each policy over the window. Round 0 of the replay starts from an
   * empty history; round i sees the first i moves of the window.
   */
  private evaluate(own: readonly Action[], opponent: readonly Action[]): void {
    if (opponent.length < EVALUATION_WINDOW) return;

    const recentOpponent = opponent.slice(-EVALUATION_WINDOW);
    const recentOwn = own.slice(-EVALUATION_WINDOW);
    const performance: Record<HybridPolicy, number> = { TIT_FOR_TAT: 0, ALWAYS_DEFECT: 0, ALWAYS_COOPERATE: 0 };

    for (const name of POLICY_ORDER) {
      let score = 0;
      for (let i = 0; i < EVALUATION_WINDOW; i++) {
        const action =
          i === 0 && opponent.length <= EVALUATION_WINDOW
            ? 'COOPERATE'
            : POLICIES[name](recentOwn.slice(0, i), recentOpponent.slice(0, i));
        score += computePayoff(this.payoffs, action, recentOpponent[i])[0];
      }
      performance[name] = score;
    }

    let best = POLICY_ORDER[0];
    for (const name of POLICY_ORDER) {
      if (performance[name] > performance[best]) best = name;
    }

    this.performance = performance;
    this.current = best;
  }
}
