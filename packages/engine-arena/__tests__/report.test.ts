import { describe, it, expect } from 'vitest';
import { createPayoffModel } from '@dilemma/engine-core';
import { formatTimestamp, formatTournamentReport } from '../src/tournament/report.js';
import type { TournamentResult } from '../src/tournament/types.js';

const config = createPayoffModel({
  defectWin: 5,
  mutualCooperate: 3,
  mutualDefect: 1,
  cooperateLoss: 0,
  roundsPerMatch: 10,
  matchesPerPair: 3,
});

function makeResult(): TournamentResult {
  return {
    entrants: ['AlwaysCooperate', 'AlwaysDefect', 'TitForTat'],
    pairings: [],
    scores: new Map([
      ['AlwaysCooperate', 15],
      ['AlwaysDefect', 32],
      ['TitForTat', 19.5],
    ]),
    ranking: [
      { rank: 1, name: 'AlwaysDefect', score: 32 },
      { rank: 2, name: 'TitForTat', score: 19.5 },
      { rank: 3, name: 'AlwaysCooperate', score: 15 },
    ],
  };
}

describe('formatTimestamp', () => {
  it('zero-pads every field', () => {
    expect(formatTimestamp(new Date(2026, 0, 2, 3, 4, 5))).toBe('2026-01-02 03:04:05');
  });
});

describe('formatTournamentReport', () => {
  it('renders parameters and the ranking with 2 decimals', () => {
    expect(formatTournamentReport(config, makeResult(), { generatedAt: new Date(2026, 0, 2, 3, 4, 5) })).toBe(
      [
        'Tournament results',
        'Time: 2026-01-02 03:04:05',
        'Payoffs: defectWin=5, mutualCooperate=3, mutualDefect=1, cooperateLoss=0',
        'Rounds per match: 10, matches per pair: 3',
        '',
        'Final ranking:',
        '1. AlwaysDefect: 32.00',
        '2. TitForTat: 19.50',
        '3. AlwaysCooperate: 15.00',
        '',
      ].join('\n'),
    );
  });

  it('omits the time line without a date and honours the title', () => {
    const text = formatTournamentReport(config, makeResult(), { title: 'Spring cup' });
    expect(text.split('\n').slice(0, 2)).toEqual([
      'Spring cup',
      'Payoffs: defectWin=5, mutualCooperate=3, mutualDefect=1, cooperateLoss=0',
    ]);
  });
});
