// Interface
export type { Strategy, StrategyOptions } from './types.js';

// Catalog
export {
  AlwaysCooperate,
  AlwaysDefect,
  RandomStrategy,
  TitForTat,
  ForgivingTitForTat,
  Grudge,
  WinStayLoseShift,
  Pavlov,
  TwoCoopOneDefect,
} from './catalog/basic.js';
export {
  Gradual,
  PunishmentEscalation,
  AdaptivePunishment,
  GradualForgiving,
  RewardPunishment,
} from './catalog/punishment.js';
export { Inching, TrustBuilding, Consensus, Probe, Capped } from './catalog/probabilistic.js';
export { ShortMemory, MediumMemory, LongMemory, TitForTatStartMediumMemory } from './catalog/memory.js';
export { EscapeTiger } from './catalog/escape-tiger.js';
export type { TigerMode } from './catalog/escape-tiger.js';
export {
  PatternDetector,
  PatternMatchingTitForTat,
  FrequencyAnalysis,
  RhythmDetector,
  RHYTHMS,
  rhythmFit,
} from './catalog/pattern.js';
export { AdaptiveAgent, Hybrid, HYBRID_DEFAULT_PAYOFFS } from './catalog/adaptive.js';
export type { HybridPolicy } from './catalog/adaptive.js';

// Registry
export {
  createStrategy,
  listStrategies,
  getStrategyInfo,
  listStrategiesWithInfo,
  registerStrategy,
  createRoster,
} from './registry.js';
export type { StrategyConstructor, StrategyInfo } from './registry.js';
