import type { Action, RandomSource } from '@dilemma/engine-core';
import { defaultRandom } from '@dilemma/engine-core';
import { countOf, last, matchesAt, titForTat } from '../history.js';
import type { Strategy, StrategyOptions } from '../types.js';

/**
 * Takes the opponent's last 3 moves and looks for the same run earlier in the
 * history. If any earlier occurrence was followed by a defection, defects first.
 */
export class PatternDetector implements Strategy {
  readonly name: string;
  readonly patternLength = 3;

  constructor(options: StrategyOptions = {}) {
    this.name = options.name ?? 'PatternDetector';
  }

  decide(_own: readonly Action[], opponent: readonly Action[]): Action {
    const L = this.patternLength;
    const n = opponent.length;
    if (n < L + 1) return 'COOPERATE';

    const recent = opponent.slice(-L);
    for (let i = 0; i < n - L * 2; i++) {
      if (matchesAt(opponent, i, recent) && opponent[i + L] === 'DEFECT') {
        return 'DEFECT';
      }
    }
    return 'COOPERATE';
  }

  reset(): void {}
}

/**
 * Length-4 pattern matcher on top of tit-for-tat. Needs 12 rounds of history
 * and at least 2 earlier occurrences of the current window; predicts the
 * opponent's next move by majority over every historical continuation.
 */
export class PatternMatchingTitForTat implements Strategy {
  readonly name: string;
  readonly patternLength = 4;
  readonly minOccurrences = 2;

  constructor(options: StrategyOptions = {}) {
    this.name = options.name ?? 'PatternMatchingTitForTat';
  }

  decide(_own: readonly Action[], opponent: readonly Action[]): Action {
    if (opponent.length === 0) return 'COOPERATE';

    if (opponent.length >= this.patternLength * 3) {
      const pattern = this.findPattern(opponent);
      if (pattern && this.predictNext(opponent, pattern) === 'DEFECT') {
        return 'DEFECT';
      }
    }
    return titForTat(opponent);
  }

  reset(): void {}

  /** The current window if it occurred often enough before, else null. */
  private findPattern(history: readonly Action[]): readonly Action[] | null {
    const L = this.patternLength;
    if (history.length < L * 2) return null;

    const recent = history.slice(-L);
    let occurrences = 0;
    for (let i = 0; i <= history.length - L * 2; i++) {
      if (matchesAt(history, i, recent)) occurrences++;
    }
    return occurrences >= this.minOccurrences ? recent : null;
  }

  private predictNext(history: readonly Action[], pattern: readonly Action[]): Action {
    const L = pattern.length;
    const continuations: Action[] = [];
    for (let i = 0; i < history.length - L; i++) {
      if (matchesAt(history, i, pattern)) {
        continuations.push(history[i + L]);
      }
    }

    if (continuations.length > 0 && countOf(continuations, 'DEFECT') / continuations.length > 0.5) {
      return 'DEFECT';
    }
    return 'COOPERATE';
  }
}

const FREQUENCY_WARMUP = 5;

/**
 * Tracks the opponent's defection rate conditioned on our own previous move
 * and plays against the tendency it sees; falls back to tit-for-tat.
 */
export class FrequencyAnalysis implements Strategy {
  readonly name: string;
  private afterCooperateDefects = 0;
  private afterCooperateTotal = 0;
  private afterDefectDefects = 0;
  private afterDefectTotal = 0;

  constructor(options: StrategyOptions = {}) {
    this.name = options.name ?? 'FrequencyAnalysis';
  }

  decide(own: readonly Action[], opponent: readonly Action[]): Action {
    if (own.length > 1 && opponent.length > 1) {
      const answered = last(opponent) === 'DEFECT';
      if (own[own.length - 2] === 'COOPERATE') {
        this.afterCooperateTotal++;
        if (answered) this.afterCooperateDefects++;
      } else {
        this.afterDefectTotal++;
        if (answered) this.afterDefectDefects++;
      }
    }

    if (opponent.length < FREQUENCY_WARMUP) return 'COOPERATE';

    const afterCooperate = this.afterCooperateDefects / Math.max(1, this.afterCooperateTotal);
    const afterDefect = this.afterDefectDefects / Math.max(1, this.afterDefectTotal);

    if (afterCooperate > 0.6) return 'DEFECT';
    if (afterDefect > afterCooperate + 0.3) return 'COOPERATE';
    if (afterCooperate > 0.4 && afterDefect > 0.4) return 'DEFECT';
    return titForTat(opponent);
  }

  reset(): void {
    this.afterCooperateDefects = 0;
    this.afterCooperateTotal = 0;
    this.afterDefectDefects = 0;
    this.afterDefectTotal = 0;
  }
}

/** Candidate rhythms, checked in this order. */
export const RHYTHMS: readonly (readonly Action[])[] = [
  ['DEFECT'],
  ['COOPERATE'],
  ['DEFECT', 'COOPERATE'],
  ['COOPERATE', 'COOPERATE', 'DEFECT'],
  ['COOPERATE', 'DEFECT', 'DEFECT'],
];

const RHYTHM_WARMUP = 6;
const RHYTHM_THRESHOLD = 0.7;
const EXPLOIT_RATE = 0.1;

/** Share of history positions that agree with `pattern` repeated from index 0. */
export function rhythmFit(history: readonly Action[], pattern: readonly Action[]): number {
  if (history.length === 0 || pattern.length === 0) return 0;
  let matches = 0;
  for (let i = 0; i < history.length; i++) {
    if (history[i] === pattern[i % pattern.length]) matches++;
  }
  return matches / history.length;
}

/**
 * Fits the opponent to a small library of periodic rhythms once 6 rounds are in.
 * A detected rhythm is kept for the rest of the match: predicted defections are
 * pre-empted and a pure cooperator is exploited 10% of the time.
 */
export class RhythmDetector implements Strategy {
  readonly name: string;
  private readonly random: RandomSource;
  private rhythm: readonly Action[] | null = null;
  private confidence = 0;

  constructor(options: StrategyOptions = {}) {
    this.name = options.name ?? 'RhythmDetector';
    this.random = options.random ?? defaultRandom;
  }

  decide(_own: readonly Action[], opponent: readonly Action[]): Action {
    if (opponent.length < RHYTHM_WARMUP) return 'COOPERATE';

    if (!this.rhythm) {
      for (const candidate of RHYTHMS) {
        const fit = rhythmFit(opponent, candidate);
        if (fit > RHYTHM_THRESHOLD && fit > this.confidence) {
          this.rhythm = candidate;
          this.confidence = fit;
        }
      }
    }

    if (this.rhythm) {
      const predicted = this.rhythm[opponent.length % this.rhythm.length];
      if (predicted === 'DEFECT') return 'DEFECT';
      if (this.rhythm.length === 1 && this.random() < EXPLOIT_RATE) return 'DEFECT';
      return 'COOPERATE';
    }

    return titForTat(opponent);
  }

  reset(): void {
    this.rhythm = null;
    this.confidence = 0;
  }

  get detected(): readonly Action[] | null {
    return this.rhythm;
  }
}
