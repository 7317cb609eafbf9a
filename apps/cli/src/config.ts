import { z } from 'zod';
import minimist from 'minimist';
import * as path from 'node:path';
import { ConfigurationError, createPayoffModel, EngineError } from '@dilemma/engine-core';
import type { PayoffModel } from '@dilemma/engine-core';

// ─── Flags ─────────────────────────────────────────────────
// Short payoff names are kept as aliases of the long ones.
const STRING_FLAGS = ['mode', 'agent1', 'agent2', 'strategies', 'out-dir', 'output', 'log-level', 'log-file'];
const BOOLEAN_FLAGS = ['version', 'help'];
const ALIASES: Record<string, string> = {
  'defect-win': 'beat',
  'mutual-cooperate': 'wwin',
  'mutual-defect': 'llost',
  'cooperate-loss': 'beaten',
  'log-file': 'log',
  help: 'h',
};

export type CliArgs = minimist.ParsedArgs;

export function parseArgs(argv: readonly string[]): CliArgs {
  return minimist([...argv], { string: STRING_FLAGS, boolean: BOOLEAN_FLAGS, alias: ALIASES });
}

// ─── Schema ────────────────────────────────────────────────
const int = z.coerce.number().int();

export const cliConfigSchema = z.object({
  defectWin: int.default(5),
  mutualCooperate: int.default(3),
  mutualDefect: int.default(1),
  cooperateLoss: int.default(0),
  rounds: int.default(500),
  matches: int.default(30),
  mode: z
    .enum(['tournament', 'match', 'individual', 'list'])
    .default('tournament')
    .transform((mode) => (mode === 'individual' ? 'match' : mode)),
  agent1: z.string().min(1).default('tit-for-tat'),
  agent2: z.string().min(1).default('random'),
  /** Comma-separated registry keys; whole catalog when absent. */
  strategies: z
    .string()
    .optional()
    .transform((list) => {
      if (list === undefined) return undefined;
      const keys = list.split(',').map((k) => k.trim()).filter((k) => k.length > 0);
      return keys.length > 0 ? keys : undefined;
    }),
  seed: int.optional(),
  outDir: z.string().min(1).default('logs'),
  /** Results file name inside outDir; timestamped when absent. */
  output: z.string().min(1).optional(),
  logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  logFile: z.string().min(1).optional(),
});

export type CliConfig = z.infer<typeof cliConfigSchema>;

/** Flatten parsed flags and the environment into the schema's input shape. */
export function readCliInput(args: CliArgs, env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  return {
    defectWin: args['defect-win'],
    mutualCooperate: args['mutual-cooperate'],
    mutualDefect: args['mutual-defect'],
    cooperateLoss: args['cooperate-loss'],
    rounds: args.rounds,
    matches: args.matches,
    mode: args.mode,
    agent1: args.agent1,
    agent2: args.agent2,
    strategies: args.strategies,
    seed: args.seed,
    outDir: args['out-dir'],
    output: args.output,
    logLevel: args['log-level'] ?? env.LOG_LEVEL,
    logFile: args['log-file'],
  };
}

/** Validate raw input. Every zod issue is folded into one ConfigurationError. */
export function parseCliConfig(input: unknown): CliConfig {
  const parsed = cliConfigSchema.safeParse(input);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ConfigurationError(EngineError.INVALID_OPTION, `Invalid option ${detail}`, detail);
  }
  return parsed.data;
}

/** `--log-file` when given; a tournament otherwise logs to `<outDir>/tournament.log`. */
export function resolveLogFile(config: CliConfig): string | undefined {
  if (config.logFile) return config.logFile;
  return config.mode === 'tournament' ? path.join(config.outDir, 'tournament.log') : undefined;
}

/** Payoff part of the config through the engine's own checks. */
export function payoffModelFromConfig(config: CliConfig): Readonly<PayoffModel> {
  return createPayoffModel({
    defectWin: config.defectWin,
    mutualCooperate: config.mutualCooperate,
    mutualDefect: config.mutualDefect,
    cooperateLoss: config.cooperateLoss,
    roundsPerMatch: config.rounds,
    matchesPerPair: config.matches,
  });
}
