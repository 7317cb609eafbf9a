import { readFileSync } from 'node:fs';
import type { Logger } from 'pino';
import { parseArgs, parseCliConfig, payoffModelFromConfig, readCliInput, resolveLogFile } from './config.js';
import { listCommand, runMatchCommand, runTournamentCommand } from './commands.js';
import { createLogger } from './logger.js';

const USAGE = `Usage: dilemma-arena [options]

  --mode <tournament|match|list>   what to run (default tournament)
  --defect-win, --beat <n>         score for defecting on a cooperator (5)
  --mutual-cooperate, --wwin <n>   score for mutual cooperation (3)
  --mutual-defect, --llost <n>     score for mutual defection (1)
  --cooperate-loss, --beaten <n>   score for cooperating with a defector (0)
  --rounds <n>                     rounds per match (500)
  --matches <n>                    matches per pair (30)
  --agent1 <key>, --agent2 <key>   strategies for match mode
  --strategies <k1,k2,...>         tournament roster (whole catalog)
  --seed <n>                       reproducible random source
  --out-dir <dir>                  results directory (logs)
  --output <file>                  results file name
  --log-level <level>              console log level (LOG_LEVEL, info)
  --log-file, --log <file>         also log debug output to a file
                                   (tournament default: <out-dir>/tournament.log)
  --version, --help`;

function readVersion(): string {
  const raw: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf-8'));
  if (typeof raw === 'object' && raw !== null && 'version' in raw && typeof raw.version === 'string') {
    return raw.version;
  }
  return '0.0.0';
}

/** Run the CLI. Returns the process exit code. */
export function main(argv: readonly string[], env: NodeJS.ProcessEnv = process.env): number {
  const args = parseArgs(argv);
  if (args.version) {
    process.stdout.write(`${readVersion()}\n`);
    return 0;
  }
  if (args.help) {
    process.stdout.write(`${USAGE}\n`);
    return 0;
  }

  let logger: Logger = createLogger({ level: 'info' });
  try {
    const config = parseCliConfig(readCliInput(args, env));
    logger = createLogger({ level: config.logLevel, file: resolveLogFile(config) });

    if (config.mode === 'list') {
      process.stdout.write(`${listCommand()}\n`);
      return 0;
    }

    const model = payoffModelFromConfig(config);
    if (config.mode === 'match') {
      runMatchCommand(config, model, logger);
    } else {
      runTournamentCommand(config, model, logger);
    }
    return 0;
  } catch (err) {
    logger.error({ err }, err instanceof Error ? err.message : String(err));
    return 1;
  }
}
