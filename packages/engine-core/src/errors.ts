import { EngineError } from './types.js';

/** Base class for every error the engine throws. */
export class GameError extends Error {
  readonly code: EngineError;

  constructor(code: EngineError, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Malformed payoff ordering, non-positive round/match counts or a bad command-line option. */
export class ConfigurationError extends GameError {
  readonly detail?: string;

  constructor(code: EngineError, message: string, detail?: string) {
    super(code, message);
    this.detail = detail;
  }
}

/** A strategy returned something other than an Action. Aborts the match in progress. */
export class ProtocolViolationError extends GameError {
  readonly strategy: string;
  readonly value: unknown;
  readonly round: number;

  constructor(strategy: string, value: unknown, round: number) {
    super(
      EngineError.PROTOCOL_VIOLATION,
      `Strategy "${strategy}" returned ${JSON.stringify(value) ?? String(value)} in round ${round + 1}; expected COOPERATE or DEFECT`,
    );
    this.strategy = strategy;
    this.value = value;
    this.round = round;
  }
}

/** Fewer than two strategies supplied to a tournament. */
export class RosterError extends GameError {
  readonly size: number;

  constructor(size: number) {
    super(EngineError.INSUFFICIENT_ROSTER, `A tournament needs at least 2 strategies, got ${size}`);
    this.size = size;
  }
}

/** One strategy instance given two roster slots, or both sides of a match. */
export class SharedInstanceError extends GameError {
  readonly strategy: string;

  constructor(strategy: string) {
    super(
      EngineError.SHARED_INSTANCE,
      `Strategy instance "${strategy}" appears more than once; every slot needs its own instance`,
    );
    this.strategy = strategy;
  }
}

/** Registry lookup for a key that was never registered. */
export class UnknownStrategyError extends GameError {
  readonly key: string;
  readonly available: readonly string[];

  constructor(key: string, available: readonly string[]) {
    super(EngineError.UNKNOWN_STRATEGY, `Unknown strategy: ${key}. Available: ${available.join(', ')}`);
    this.key = key;
    this.available = available;
  }
}
