// Types
export type { Action, PayoffModel, PayoffTable, RandomSource } from './types.js';
export { ACTIONS, EngineError, isAction, flip } from './types.js';

// Errors
export {
  GameError,
  ConfigurationError,
  ProtocolViolationError,
  RosterError,
  SharedInstanceError,
  UnknownStrategyError,
} from './errors.js';

// Payoffs
export { computePayoff } from './payoff.js';

// Validation
export {
  validatePayoffModel,
  validatePayoffValues,
  findInvalidPayoff,
  validatePayoffOrder,
  validateRounds,
  validateMatches,
  createPayoffModel,
} from './validation.js';

// Randomness
export { defaultRandom, mulberry32, sequenceRandom } from './rng.js';

// Statistics
export { mean, minimum, upperMedian, percentile, firstQuartile } from './stats.js';

// Utils
export { clamp } from './utils.js';
