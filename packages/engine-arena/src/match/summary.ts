import { firstQuartile, mean, minimum, upperMedian } from '@dilemma/engine-core';
import type { MatchResult, MatchSummary, SideSummary } from './types.js';

function summarizeSide(scores: readonly number[]): SideSummary {
  return {
    average: mean(scores),
    minimum: minimum(scores),
    median: upperMedian(scores),
    firstQuartile: firstQuartile(scores),
  };
}

/** Per-side statistics and win/loss/draw counts over every match of a pair-run. */
export function summarizeMatch(result: MatchResult): MatchSummary {
  let winsA = 0;
  let winsB = 0;
  let draws = 0;
  for (let i = 0; i < result.scoresA.length; i++) {
    const diff = result.scoresA[i] - result.scoresB[i];
    if (diff > 0) winsA++;
    else if (diff < 0) winsB++;
    else draws++;
  }

  return {
    matches: result.scoresA.length,
    a: summarizeSide(result.scoresA),
    b: summarizeSide(result.scoresB),
    winsA,
    winsB,
    draws,
  };
}

function formatSide(name: string, side: SideSummary): string {
  return `  ${name}: avg ${side.average.toFixed(2)}, min ${side.minimum}, median ${side.median}, q1 ${side.firstQuartile.toFixed(2)}`;
}

/** Multi-line text summary of a pair-run. */
export function describeMatchResult(nameA: string, nameB: string, result: MatchResult): string {
  const s = summarizeMatch(result);
  return [
    `${nameA} vs ${nameB}: ${s.matches} matches`,
    formatSide(nameA, s.a),
    formatSide(nameB, s.b),
    `  Wins: ${nameA} ${s.winsA}, ${nameB} ${s.winsB}, draws ${s.draws}`,
  ].join('\n');
}
