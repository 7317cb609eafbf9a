import type { Action } from '@dilemma/engine-core';

export function last(history: readonly Action[]): Action | undefined {
  return history[history.length - 1];
}

export function countOf(history: readonly Action[], action: Action): number {
  let n = 0;
  for (const a of history) {
    if (a === action) n++;
  }
  return n;
}

/** Share of COOPERATE in the list; 0 when empty. */
export function cooperateRate(history: readonly Action[]): number {
  return history.length === 0 ? 0 : countOf(history, 'COOPERATE') / history.length;
}

/** Cooperate first, then copy the opponent's last move. */
export function titForTat(opponent: readonly Action[]): Action {
  return last(opponent) ?? 'COOPERATE';
}

/** True when `history[start..start+window.length)` equals `window`. */
export function matchesAt(history: readonly Action[], start: number, window: readonly Action[]): boolean {
  for (let k = 0; k < window.length; k++) {
    if (history[start + k] !== window[k]) return false;
  }
  return true;
}

/** COOPERATE with the given probability. */
export function cooperateWith(probability: number, draw: number): Action {
  return draw < probability ? 'COOPERATE' : 'DEFECT';
}
