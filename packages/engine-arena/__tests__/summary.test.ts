import { describe, it, expect } from 'vitest';
import { describeMatchResult, summarizeMatch } from '../src/match/summary.js';
import type { MatchResult } from '../src/match/types.js';

function makeResult(scoresA: number[], scoresB: number[]): MatchResult {
  return { scoresA, scoresB, historiesA: scoresA.map(() => []), historiesB: scoresB.map(() => []) };
}

describe('summarizeMatch', () => {
  it('computes per-side statistics and win counts', () => {
    const summary = summarizeMatch(makeResult([10, 4, 7], [6, 4, 9]));

    expect(summary.matches).toBe(3);
    expect(summary.a).toEqual({ average: 7, minimum: 4, median: 7, firstQuartile: 5.5 });
    expect(summary.b.minimum).toBe(4);
    expect(summary.b.median).toBe(6);
    expect(summary.b.firstQuartile).toBe(5);
    expect(summary.b.average).toBeCloseTo(19 / 3, 10);
    expect([summary.winsA, summary.winsB, summary.draws]).toEqual([1, 1, 1]);
  });

  it('uses the upper median for an even count', () => {
    expect(summarizeMatch(makeResult([1, 2, 3, 4], [0, 0, 0, 0])).a.median).toBe(3);
  });

  it('is all zeros for an empty result', () => {
    const summary = summarizeMatch(makeResult([], []));
    expect(summary.matches).toBe(0);
    expect(summary.a).toEqual({ average: 0, minimum: 0, median: 0, firstQuartile: 0 });
    expect([summary.winsA, summary.winsB, summary.draws]).toEqual([0, 0, 0]);
  });
});

describe('describeMatchResult', () => {
  it('renders a four-line summary', () => {
    expect(describeMatchResult('Dove', 'Hawk', makeResult([10, 4, 7], [6, 4, 9]))).toBe(
      [
        'Dove vs Hawk: 3 matches',
        '  Dove: avg 7.00, min 4, median 7, q1 5.50',
        '  Hawk: avg 6.33, min 4, median 6, q1 5.00',
        '  Wins: Dove 1, Hawk 1, draws 1',
      ].join('\n'),
    );
  });
});
