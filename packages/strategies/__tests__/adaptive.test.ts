import { describe, expect, it } from 'vitest';
import { AdaptiveAgent, Hybrid, HYBRID_DEFAULT_PAYOFFS } from '../src/catalog/adaptive.js';
import { moves, replay } from './helpers.js';

describe('AdaptiveAgent', () => {
  const s = new AdaptiveAgent();

  it('cooperates first', () => {
    expect(s.decide([], [])).toBe('COOPERATE');
  });

  it('follows the opponent cooperation rate', () => {
    expect(s.decide([], moves('CCCD'))).toBe('COOPERATE');
    expect(s.decide([], moves('CDDD'))).toBe('DEFECT');
  });

  it('plays tit-for-tat in the middle band', () => {
    expect(s.decide([], moves('CD'))).toBe('DEFECT');
    expect(s.decide([], moves('DC'))).toBe('COOPERATE');
  });
});

describe('Hybrid', () => {
  it('defaults to the 5/3/1/-2 table', () => {
    expect(HYBRID_DEFAULT_PAYOFFS).toEqual({ defectWin: 5, mutualCooperate: 3, mutualDefect: 1, cooperateLoss: -2 });
  });

  it('starts as tit-for-tat and switches to always-defect against a defector', () => {
    const s = new Hybrid();
    expect(replay(s, 'D'.repeat(20))).toBe('C' + 'D'.repeat(19));
    expect(s.policy).toBe('ALWAYS_DEFECT');
    expect(s.scores).toEqual({ TIT_FOR_TAT: 7, ALWAYS_DEFECT: 10, ALWAYS_COOPERATE: -20 });
  });

  it('learns to exploit a cooperator on the second evaluation', () => {
    const s = new Hybrid();
    expect(replay(s, 'C'.repeat(20))).toBe('C'.repeat(19) + 'D');
    expect(s.scores).toEqual({ TIT_FOR_TAT: 30, ALWAYS_DEFECT: 50, ALWAYS_COOPERATE: 30 });
  });

  it('scores with the supplied table', () => {
    const s = new Hybrid({ payoffs: { defectWin: 4, mutualCooperate: 3, mutualDefect: 1, cooperateLoss: 0 } });
    replay(s, 'C'.repeat(20));
    expect(s.scores).toEqual({ TIT_FOR_TAT: 30, ALWAYS_DEFECT: 40, ALWAYS_COOPERATE: 30 });
  });

  it('reset returns to tit-for-tat with zero scores', () => {
    const s = new Hybrid();
    replay(s, 'D'.repeat(20));
    s.reset();
    expect(s.policy).toBe('TIT_FOR_TAT');
    expect(s.scores).toEqual({ TIT_FOR_TAT: 0, ALWAYS_DEFECT: 0, ALWAYS_COOPERATE: 0 });
  });
});
