import type { Strategy } from '@dilemma/strategies';
import type { MatchResult } from '../match/types.js';

/** A roster slot with its tournament-unique id. */
export interface Entrant {
  id: string;
  strategy: Strategy;
}

/** One unordered pair and its first-quartile contribution per side. */
export interface Pairing {
  a: string;
  b: string;
  result: MatchResult;
  scoreA: number;
  scoreB: number;
}

export interface RankingEntry {
  rank: number;
  name: string;
  score: number;
}

export interface TournamentResult {
  /** Ids in roster order. */
  entrants: string[];
  pairings: Pairing[];
  /** Mean pair contribution per id. */
  scores: ReadonlyMap<string, number>;
  ranking: RankingEntry[];
}
