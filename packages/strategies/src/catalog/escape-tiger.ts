import type { Action } from '@dilemma/engine-core';
import { last } from '../history.js';
import type { Strategy, StrategyOptions } from '../types.js';

/** Behaviour modes. */
export type TigerMode = 'COOPERATING' | 'PROBING' | 'EXPLOITING';

/** Mutual-cooperation streak that triggers a probe. */
const PROBE_AFTER = 5;

/**
 * Response to the opponent's last move while probing or exploiting.
 * Key: current mode → opponent's last action → next mode and own move.
 */
const REACTIONS: Record<Exclude<TigerMode, 'COOPERATING'>, Record<Action, { next: TigerMode; play: Action }>> = {
  PROBING: {
    COOPERATE: { next: 'EXPLOITING', play: 'DEFECT' },
    DEFECT: { next: 'COOPERATING', play: 'COOPERATE' },
  },
  EXPLOITING: {
    COOPERATE: { next: 'EXPLOITING', play: 'DEFECT' },
    DEFECT: { next: 'COOPERATING', play: 'COOPERATE' },
  },
};

/**
 * After 5 rounds of mutual cooperation, defects once as a probe.
 * An unpunished probe turns into exploitation until the opponent retaliates;
 * a punished one returns to cooperation.
 */
export class EscapeTiger implements Strategy {
  readonly name: string;
  private streak = 0;
  private state: TigerMode = 'COOPERATING';

  constructor(options: StrategyOptions = {}) {
    this.name = options.name ?? 'EscapeTiger';
  }

  decide(own: readonly Action[], opponent: readonly Action[]): Action {
    const theirs = last(opponent);
    if (theirs === undefined) return 'COOPERATE';

    if (last(own) === 'COOPERATE' && theirs === 'COOPERATE') {
      this.streak++;
    } else {
      this.streak = 0;
    }

    if (this.state !== 'COOPERATING') {
      const { next, play } = REACTIONS[this.state][theirs];
      this.state = next;
      return play;
    }

    if (this.streak >= PROBE_AFTER) {
      this.state = 'PROBING';
      this.streak = 0;
      return 'DEFECT';
    }
    return 'COOPERATE';
  }

  reset(): void {
    this.streak = 0;
    this.state = 'COOPERATING';
  }

  get mode(): TigerMode {
    return this.state;
  }
}
