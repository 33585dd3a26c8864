import { Command, CommanderError, InvalidArgumentError } from 'commander';
import { loadConfig, requireQueryConfig } from './config.js';
import { runFetchLoop } from './pipeline/fetch-loop.js';
import { mergeSnapshots } from './pipeline/merger.js';
import { AnalyticsQueryClient } from './query/analytics-client.js';
import type { QueryClient } from './types/query.js';
import { systemClock, type Clock } from './utils/date.js';
import { logger } from './utils/logger.js';

export interface CliArgs {
  forceUpdate: boolean;
}

export interface RunOptions {
  env?: NodeJS.ProcessEnv;
  clock?: Clock;
  /** Replaces the HTTP client built from config */
  queryClient?: QueryClient;
  /** Receives the merged output path */
  writeOut?: (line: string) => void;
}

function parseBooleanFlag(value: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (normalized === 'true') return true;
  if (normalized === 'false') return false;
  throw new InvalidArgumentError('Expected "true" or "false".');
}

export function parseCliArgs(argv: string[]): CliArgs {
  const program = new Command()
    .name('pmex-borrowers')
    .description('Fetch PMEX borrower snapshots and merge them into one address list')
    .option(
      '--force-update [value]',
      'fetch new monthly snapshots before merging (true/false)',
      parseBooleanFlag,
      false,
    )
    .exitOverride()
    .configureOutput({ writeErr: (str) => process.stderr.write(str) });

  program.parse(argv, { from: 'user' });
  const opts = program.opts<{ forceUpdate: boolean }>();
  return { forceUpdate: opts.forceUpdate };
}

/** Runs one fetch-and-merge cycle and returns the process exit code. */
export async function run(argv: string[], options: RunOptions = {}): Promise<number> {
  const clock = options.clock ?? systemClock;
  const writeOut = options.writeOut ?? ((line: string) => process.stdout.write(`${line}\n`));

  let args: CliArgs;
  try {
    args = parseCliArgs(argv);
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode;
    throw err;
  }

  let ownedClient: AnalyticsQueryClient | null = null;
  try {
    const config = loadConfig(options.env ?? process.env);
    if (config.LOG_LEVEL) logger.level = config.LOG_LEVEL;
    logger.info({ dataDir: config.DATA_DIR, forceUpdate: args.forceUpdate }, 'Starting run');

    if (args.forceUpdate) {
      let client = options.queryClient;
      if (!client) {
        ownedClient = new AnalyticsQueryClient(requireQueryConfig(config));
        client = ownedClient;
      }
      await runFetchLoop({
        dataDir: config.DATA_DIR,
        client,
        clock,
        addressColumn: config.QUERY_ADDRESS_COLUMN,
        maxIterations: config.MAX_FETCH_ITERATIONS,
      });
    }

    const outputPath = mergeSnapshots(config.DATA_DIR, clock);
    writeOut(outputPath);
    return 0;
  } catch (err) {
    if (err instanceof Error) {
      logger.debug({ err }, 'Run failed');
      logger.fatal({ error: err.name }, err.message);
    } else {
      logger.fatal({ error: String(err) }, 'Run failed');
    }
    return 1;
  } finally {
    await ownedClient?.close();
  }
}
