/**
 * Strategy Registry
 *
 * Registers every catalog policy under a kebab-case key and builds instances or
 * whole rosters from keys.
 */

import { UnknownStrategyError } from '@dilemma/engine-core';
import { AdaptiveAgent, Hybrid } from './catalog/adaptive.js';
import {
  AlwaysCooperate,
  AlwaysDefect,
  ForgivingTitForTat,
  Grudge,
  Pavlov,
  RandomStrategy,
  TitForTat,
  TwoCoopOneDefect,
  WinStayLoseShift,
} from './catalog/basic.js';
import { EscapeTiger } from './catalog/escape-tiger.js';
import { LongMemory, MediumMemory, ShortMemory, TitForTatStartMediumMemory } from './catalog/memory.js';
import { FrequencyAnalysis, PatternDetector, PatternMatchingTitForTat, RhythmDetector } from './catalog/pattern.js';
import { Capped, Consensus, Inching, Probe, TrustBuilding } from './catalog/probabilistic.js';
import {
  AdaptivePunishment,
  Gradual,
  GradualForgiving,
  PunishmentEscalation,
  RewardPunishment,
} from './catalog/punishment.js';
import type { Strategy, StrategyOptions } from './types.js';

export type StrategyConstructor = new (options?: StrategyOptions) => Strategy;

interface RegistryEntry {
  create: StrategyConstructor;
  description: string;
}

// Registry of all available strategies, in default roster order
const STRATEGIES: Record<string, RegistryEntry> = {
  'tit-for-tat': { create: TitForTat, description: 'Cooperate first, then copy the opponent.' },
  'always-defect': { create: AlwaysDefect, description: 'Always defect.' },
  'always-cooperate': { create: AlwaysCooperate, description: 'Always cooperate.' },
  'random': { create: RandomStrategy, description: 'Fair coin every round.' },
  'forgiving-tit-for-tat': {
    create: ForgivingTitForTat,
    description: 'Defect only after 2 opponent defections in the last 3 rounds.',
  },
  'gradual': { create: Gradual, description: 'Revenge as long as the opponent has defected in total.' },
  'pattern-detector': { create: PatternDetector, description: 'Pre-empt defections that followed the current 3-move run.' },
  'adaptive': { create: AdaptiveAgent, description: 'Follow the opponent\'s overall cooperation rate.' },
  'win-stay-lose-shift': { create: WinStayLoseShift, description: 'Keep the last move after a win, switch after a loss.' },
  'two-coop-one-defect': { create: TwoCoopOneDefect, description: 'Cooperate, cooperate, defect, repeat.' },
  'reward-punishment': { create: RewardPunishment, description: 'Punishment counter fed by defections, drained by cooperation.' },
  'escape-tiger': { create: EscapeTiger, description: 'Probe after 5 calm rounds; exploit if unpunished.' },
  'inching': { create: Inching, description: 'Slowly raise defection odds while tolerated.' },
  'trust-building': { create: TrustBuilding, description: 'Cooperate with probability equal to trust.' },
  'grudge': { create: Grudge, description: 'Defect forever after the first defection.' },
  'punishment-escalation': {
    create: PunishmentEscalation,
    description: 'Tit-for-tat with punishment growing with total defections.',
  },
  'consensus': { create: Consensus, description: 'Cooperate after agreement, rarely after disagreement.' },
  'probe': { create: Probe, description: 'Tit-for-tat with slowly decaying cooperation.' },
  'capped': { create: Capped, description: 'Return cooperation 90% of the time, defection always.' },
  'short-memory': { create: ShortMemory, description: 'Cooperation odds from the last 3 rounds.' },
  'medium-memory': { create: MediumMemory, description: 'Cooperation odds from the last 15 rounds.' },
  'long-memory': { create: LongMemory, description: 'Cooperation odds from the whole match.' },
  'tit-for-tat-start-medium-memory': {
    create: TitForTatStartMediumMemory,
    description: 'Tit-for-tat for 5 rounds, then medium memory.',
  },
  'adaptive-punishment': { create: AdaptivePunishment, description: 'Punishment length from the opponent\'s defection rate.' },
  'gradual-forgiving': { create: GradualForgiving, description: 'Short revenge, then warming cooperation.' },
  'pattern-matching-tit-for-tat': {
    create: PatternMatchingTitForTat,
    description: 'Tit-for-tat that pre-empts predicted defections from 4-move patterns.',
  },
  'frequency-analysis': { create: FrequencyAnalysis, description: 'Play against the opponent\'s conditional defection rates.' },
  'rhythm-detector': { create: RhythmDetector, description: 'Detect a periodic opponent and pre-empt it.' },
  'hybrid': { create: Hybrid, description: 'Switch between tit-for-tat, always-defect and always-cooperate every 10 rounds.' },
  'pavlov': { create: Pavlov, description: 'Repeat after a good outcome, change after a bad one.' },
};

// Aliases for convenience
const ALIASES: Record<string, string> = {
  'tft': 'tit-for-tat',
  'alld': 'always-defect',
  'allc': 'always-cooperate',
  'rand': 'random',
  'ftft': 'forgiving-tit-for-tat',
  'wsls': 'win-stay-lose-shift',
  'grim': 'grudge',
  'default': 'tit-for-tat',
};

function resolveKey(key: string): string {
  const k = key.trim().toLowerCase();
  return ALIASES[k] ?? k;
}

/**
 * Create a strategy instance by key or alias
 */
export function createStrategy(key: string, options: StrategyOptions = {}): Strategy {
  const entry = STRATEGIES[resolveKey(key)];
  if (!entry) {
    throw new UnknownStrategyError(key, listStrategies());
  }
  return new entry.create(options);
}

/**
 * List all available strategy keys
 */
export function listStrategies(): string[] {
  return Object.keys(STRATEGIES);
}

export interface StrategyInfo {
  key: string;
  name: string;
  description: string;
  aliases: string[];
}

/**
 * Get strategy info (key, display name, description, aliases)
 */
export function getStrategyInfo(key: string): StrategyInfo | null {
  const resolved = resolveKey(key);
  const entry = STRATEGIES[resolved];
  if (!entry) {
    return null;
  }

  const aliases = Object.entries(ALIASES)
    .filter(([_, target]) => target === resolved)
    .map(([alias]) => alias);

  return {
    key: resolved,
    name: new entry.create().name,
    description: entry.description,
    aliases,
  };
}

/**
 * List all strategies with descriptions
 */
export function listStrategiesWithInfo(): StrategyInfo[] {
  const infos: StrategyInfo[] = [];
  for (const key of listStrategies()) {
    const info = getStrategyInfo(key);
    if (info) infos.push(info);
  }
  return infos;
}

/**
 * Register a custom strategy
 */
export function registerStrategy(key: string, create: StrategyConstructor, description = ''): void {
  STRATEGIES[resolveKey(key)] = { create, description };
}

/**
 * Build one fresh instance per key, in order. Every instance shares the same
 * options (random source, payoff table). Defaults to the whole catalog.
 */
export function createRoster(keys: readonly string[] = listStrategies(), options: StrategyOptions = {}): Strategy[] {
  return keys.map((key) => createStrategy(key, options));
}
