import { describe, expect, it } from 'vitest';
import { sequenceRandom } from '@dilemma/engine-core';
import { LongMemory, MediumMemory, ShortMemory, TitForTatStartMediumMemory } from '../src/catalog/memory.js';
import { moves } from './helpers.js';

describe('ShortMemory', () => {
  it('starts at 0.7 before 3 rounds of history', () => {
    expect(new ShortMemory({ random: sequenceRandom([0.69]) }).decide([], [])).toBe('COOPERATE');
    expect(new ShortMemory({ random: sequenceRandom([0.71]) }).decide([], [])).toBe('DEFECT');
  });

  it('maps the last 3 moves into [0.3, 0.7]', () => {
    // 2 of 3 cooperated: 0.3 + 0.4 * 2/3 ≈ 0.567
    const opponent = moves('DCCD');
    expect(new ShortMemory({ random: sequenceRandom([0.56]) }).decide([], opponent.slice(0, 3))).toBe('COOPERATE');
    expect(new ShortMemory({ random: sequenceRandom([0.57]) }).decide([], opponent.slice(0, 3))).toBe('DEFECT');
  });

  it('keeps the last probability until reset', () => {
    const s = new ShortMemory({ random: sequenceRandom([0.5]) });
    expect(s.decide(moves('CCC'), moves('DDD'))).toBe('DEFECT');
    expect(s.decide([], [])).toBe('DEFECT');
    s.reset();
    expect(s.decide([], [])).toBe('COOPERATE');
  });
});

describe('MediumMemory', () => {
  it('looks only at the last 15 moves', () => {
    const opponent = moves('DDDDD' + 'C'.repeat(15));
    expect(new MediumMemory({ random: sequenceRandom([0.79]) }).decide([], opponent)).toBe('COOPERATE');
    expect(new MediumMemory({ random: sequenceRandom([0.81]) }).decide([], opponent)).toBe('DEFECT');
  });

  it('drops to 0.2 against a defector', () => {
    expect(new MediumMemory({ random: sequenceRandom([0.19]) }).decide([], moves('DDDD'))).toBe('COOPERATE');
    expect(new MediumMemory({ random: sequenceRandom([0.21]) }).decide([], moves('DDDD'))).toBe('DEFECT');
  });
});

describe('LongMemory', () => {
  it('uses the whole history', () => {
    // 0.2 + 0.6 * 3/4 = 0.65
    expect(new LongMemory({ random: sequenceRandom([0.64]) }).decide([], moves('CCCD'))).toBe('COOPERATE');
    expect(new LongMemory({ random: sequenceRandom([0.66]) }).decide([], moves('CCCD'))).toBe('DEFECT');
  });
});

describe('TitForTatStartMediumMemory', () => {
  it('plays tit-for-tat for the first 5 rounds', () => {
    const s = new TitForTatStartMediumMemory({ random: sequenceRandom([0]) });
    expect(s.decide([], [])).toBe('COOPERATE');
    expect(s.decide(moves('C'), moves('D'))).toBe('DEFECT');
    expect(s.decide(moves('CCCC'), moves('CCCD'))).toBe('DEFECT');
  });

  it('switches to medium memory afterwards', () => {
    const s = new TitForTatStartMediumMemory({ random: sequenceRandom([0.9]) });
    expect(s.decide(moves('CCCCC'), moves('CCCCC'))).toBe('DEFECT');
  });
});
