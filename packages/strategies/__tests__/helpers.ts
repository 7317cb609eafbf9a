import type { Action } from '@dilemma/engine-core';
import type { Strategy } from '../src/types.js';

/** 'CCD' → ['COOPERATE', 'COOPERATE', 'DEFECT']. Any other letter is rejected. */
export function moves(script: string): Action[] {
  return [...script].map((c) => {
    if (c === 'C') return 'COOPERATE';
    if (c === 'D') return 'DEFECT';
    throw new Error(`bad move letter: ${c}`);
  });
}

/** ['COOPERATE', 'DEFECT'] → 'CD'. */
export function letters(history: readonly Action[]): string {
  return history.map((a) => (a === 'COOPERATE' ? 'C' : 'D')).join('');
}

/**
 * Play `strategy` against a scripted opponent. Round k shows the strategy the
 * first k moves of both sides. Returns the strategy's moves as letters.
 */
export function replay(strategy: Strategy, opponentScript: string): string {
  const opponent = moves(opponentScript);
  const own: Action[] = [];
  for (let k = 0; k < opponent.length; k++) {
    own.push(strategy.decide(own.slice(), opponent.slice(0, k)));
  }
  return letters(own);
}
