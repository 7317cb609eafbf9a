import type { Action } from '@dilemma/engine-core';

/**
 * Outcome of one pair-run: per-match totals and full action histories for
 * both sides. Index i of every array belongs to match i.
 */
export interface MatchResult {
  scoresA: number[];
  scoresB: number[];
  historiesA: Action[][];
  historiesB: Action[][];
}

export interface SideSummary {
  average: number;
  minimum: number;
  median: number;
  firstQuartile: number;
}

export interface MatchSummary {
  matches: number;
  a: SideSummary;
  b: SideSummary;
  winsA: number;
  winsB: number;
  draws: number;
}
