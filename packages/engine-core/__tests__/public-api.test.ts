import { describe, expect, it } from 'vitest';
import * as api from '../src/index.js';

/**
 * Public API surface test.
 * Verifies that every function, class and enum exported from index.ts
 * is actually accessible at runtime.
 */
describe('Public API (@dilemma/engine-core)', () => {
  describe('function exports', () => {
    it.each([
      'computePayoff',
      'validatePayoffModel',
      'validatePayoffOrder',
      'validatePayoffValues',
      'findInvalidPayoff',
      'validateRounds',
      'validateMatches',
      'createPayoffModel',
      'defaultRandom',
      'mulberry32',
      'sequenceRandom',
      'mean',
      'minimum',
      'upperMedian',
      'percentile',
      'firstQuartile',
      'clamp',
      'isAction',
      'flip',
    ] as const)('exports %s', (name) => {
      expect(typeof api[name]).toBe('function');
    });
  });

  describe('error classes', () => {
    it('all extend GameError', () => {
      expect(new api.RosterError(1)).toBeInstanceOf(api.GameError);
      expect(new api.ProtocolViolationError('x', 'PASS', 0)).toBeInstanceOf(api.GameError);
      expect(new api.UnknownStrategyError('x', [])).toBeInstanceOf(api.GameError);
      expect(new api.SharedInstanceError('x')).toBeInstanceOf(api.GameError);
      expect(new api.ConfigurationError(api.EngineError.INVALID_ROUNDS, 'bad')).toBeInstanceOf(api.GameError);
    });

    it('ProtocolViolationError reports a 1-based round', () => {
      const err = new api.ProtocolViolationError('Rogue', 'PASS', 4);
      expect(err.code).toBe(api.EngineError.PROTOCOL_VIOLATION);
      expect(err.message).toBe('Strategy "Rogue" returned "PASS" in round 5; expected COOPERATE or DEFECT');
    });

    it('UnknownStrategyError lists available keys', () => {
      const err = new api.UnknownStrategyError('nope', ['grudge', 'tit-for-tat']);
      expect(err.message).toBe('Unknown strategy: nope. Available: grudge, tit-for-tat');
    });
  });

  describe('enum exports', () => {
    it('exports EngineError with all members', () => {
      expect(api.EngineError.INVALID_PAYOFF).toBe('INVALID_PAYOFF');
      expect(api.EngineError.INVALID_PAYOFF_ORDER).toBe('INVALID_PAYOFF_ORDER');
      expect(api.EngineError.INVALID_ROUNDS).toBe('INVALID_ROUNDS');
      expect(api.EngineError.INVALID_MATCHES).toBe('INVALID_MATCHES');
      expect(api.EngineError.PROTOCOL_VIOLATION).toBe('PROTOCOL_VIOLATION');
      expect(api.EngineError.INSUFFICIENT_ROSTER).toBe('INSUFFICIENT_ROSTER');
      expect(api.EngineError.UNKNOWN_STRATEGY).toBe('UNKNOWN_STRATEGY');
      expect(api.EngineError.INVALID_OPTION).toBe('INVALID_OPTION');
      expect(api.EngineError.SHARED_INSTANCE).toBe('SHARED_INSTANCE');
    });
  });

  describe('action helpers', () => {
    it('isAction accepts only the two actions', () => {
      expect(api.isAction('COOPERATE')).toBe(true);
      expect(api.isAction('DEFECT')).toBe(true);
      expect(api.isAction('cooperate')).toBe(false);
      expect(api.isAction(undefined)).toBe(false);
    });

    it('flip swaps actions', () => {
      expect(api.flip('COOPERATE')).toBe('DEFECT');
      expect(api.flip('DEFECT')).toBe('COOPERATE');
    });

    it('ACTIONS lists both', () => {
      expect(api.ACTIONS).toEqual(['COOPERATE', 'DEFECT']);
    });
  });

  describe('end-to-end through public API', () => {
    it('createPayoffModel → computePayoff', () => {
      const model = api.createPayoffModel({
        defectWin: 5,
        mutualCooperate: 3,
        mutualDefect: 1,
        cooperateLoss: 0,
        roundsPerMatch: 1,
        matchesPerPair: 1,
      });
      expect(api.computePayoff(model, 'DEFECT', 'COOPERATE')).toEqual([5, 0]);
    });
  });
});
