/**
 * schema-ledger commands
 *
 * Commands:
 *   upgrade [target]    - Apply revisions up to target (default: head)
 *   downgrade <target>  - Reverse revisions down to target ('base' for all)
 *   current             - Show the recorded revision
 *   history             - List revisions, newest first
 *   stamp <target>      - Record a revision without running it
 *   check               - Validate the chain and its downgrades
 */

import { loadConfig } from '../config.js';
import type { LedgerConfig } from '../config.js';
import { errorMessage, isLedgerError } from '../ledger/errors.js';
import { MigrationLedger } from '../ledger/MigrationLedger.js';
import type { MigrationResult } from '../ledger/MigrationLedger.js';
import { checkReversible } from '../ledger/operations.js';
import { RevisionChain } from '../ledger/RevisionChain.js';
import { BASE, HEAD } from '../ledger/types.js';
import type { Revision } from '../ledger/types.js';
import { createLogger } from '../logger.js';
import type { LogSink, Logger } from '../logger.js';
import { allRevisions } from '../revisions/index.js';
import { SqliteSchemaDriver } from '../storage/SqliteSchemaDriver.js';

export interface CliOutput {
  out(line: string): void;
  err(line: string): void;
}

export interface CliContext {
  env?: NodeJS.ProcessEnv;
  /** Replaces the console; log lines are written uncoloured */
  output?: CliOutput;
  revisions?: Revision[];
}

export interface ParsedArgs {
  command: string;
  positionals: string[];
  databasePath?: string;
  dryRun: boolean;
}

export function parseArgs(args: string[]): ParsedArgs {
  const positionals: string[] = [];
  let databasePath: string | undefined;
  let dryRun = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--dry-run') {
      dryRun = true;
    } else if (arg === '--database') {
      const value = args[++i];
      if (value === undefined || value.startsWith('--')) {
        throw new Error('--database requires a path');
      }
      databasePath = value;
    } else if (arg.startsWith('--database=')) {
      databasePath = arg.slice('--database='.length);
    } else {
      positionals.push(arg);
    }
  }

  const [command = 'help', ...rest] = positionals;
  return { command, positionals: rest, databasePath, dryRun };
}

const consoleOutput: CliOutput = {
  out: line => console.log(line),
  err: line => console.error(line),
};

const USAGE = [
  'Usage: schema-ledger <command> [options]',
  '',
  'Commands:',
  '  upgrade [target]     Apply revisions up to target (default: head)',
  '  downgrade <target>   Reverse revisions down to target (base for all)',
  '  current              Show the recorded revision',
  '  history              List revisions, newest first',
  '  stamp <target>       Record a revision without running it',
  '  check                Validate the chain and its downgrades',
  '  help                 Show this help',
  '',
  'Options:',
  '  --database <path>    SQLite database file (default: $SCHEMA_LEDGER_DATABASE)',
  '  --dry-run            Show what would run without changing anything',
];

function printResult(result: MigrationResult, logger: Logger): void {
  if (result.dryRun && result.revisions.length > 0) {
    logger.info(`Dry run: ${result.revisions.length} revision(s), nothing changed`);
  }
}

function requireTarget(command: string, positionals: string[]): string {
  const [target] = positionals;
  if (!target) {
    throw new Error(`${command} requires a target revision`);
  }
  return target;
}

function checkCommand(revisions: Revision[], logger: Logger): number {
  const chain = RevisionChain.fromRevisions(revisions);
  let failures = 0;
  for (const revision of chain.list()) {
    const issue = checkReversible(revision);
    if (issue) {
      logger.warn(`Revision ${issue.revisionId}: ${issue.reason}`);
      failures++;
    }
  }

  if (failures > 0) {
    logger.error(`${failures} revision(s) do not invert cleanly`);
    return 1;
  }
  logger.success(`${chain.length} revisions, head ${chain.tip?.id ?? BASE}, all downgrades invert their upgrades`);
  return 0;
}

async function ledgerCommand(
  parsed: ParsedArgs,
  config: LedgerConfig,
  revisions: Revision[],
  logger: Logger,
  output: CliOutput
): Promise<number> {
  // Validate the chain before touching the database
  const chain = RevisionChain.fromRevisions(revisions);
  const driver = await SqliteSchemaDriver.open({ databasePath: config.databasePath, logger });

  try {
    const ledger = new MigrationLedger(chain, driver, { logger });
    const runOptions = { dryRun: parsed.dryRun };

    switch (parsed.command) {
      case 'upgrade':
        printResult(await ledger.upgradeTo(parsed.positionals[0] ?? HEAD, runOptions), logger);
        return 0;
      case 'downgrade':
        printResult(
          await ledger.downgradeTo(requireTarget('downgrade', parsed.positionals), runOptions),
          logger
        );
        return 0;
      case 'stamp':
        await ledger.stamp(requireTarget('stamp', parsed.positionals));
        return 0;
      case 'current': {
        const current = await ledger.current();
        output.out(current ?? `${BASE} (no revision applied)`);
        return 0;
      }
      case 'history': {
        const entries = await ledger.history();
        for (const entry of [...entries].reverse()) {
          const flags = `${entry.isHead ? ' (head)' : ''}${entry.isCurrent ? ' (current)' : ''}`;
          output.out(`${entry.parentId ?? BASE} -> ${entry.id}${flags}, ${entry.message}`);
        }
        return 0;
      }
      default:
        throw new Error(`Unknown command: ${parsed.command}`);
    }
  } finally {
    await driver.close();
  }
}

const LEDGER_COMMANDS = new Set(['upgrade', 'downgrade', 'current', 'history', 'stamp']);

/**
 * Run one command and return the process exit code
 */
export async function runCli(args: string[], context: CliContext = {}): Promise<number> {
  const output = context.output ?? consoleOutput;
  const sink: LogSink | undefined = context.output
    ? (level, line) => (level === 'error' || level === 'warn' ? output.err(line) : output.out(line))
    : undefined;
  const revisions = context.revisions ?? allRevisions;

  // Errors raised before the configuration is known are always reported
  let logger = createLogger({ sink });
  let debug = false;

  try {
    const parsed = parseArgs(args);
    const config = loadConfig(
      context.env ?? process.env,
      parsed.databasePath !== undefined ? { databasePath: parsed.databasePath } : {}
    );
    logger = createLogger({ level: config.logLevel, sink });
    debug = config.debug;

    if (['help', '--help', '-h'].includes(parsed.command)) {
      USAGE.forEach(line => output.out(line));
      return 0;
    }
    if (parsed.command === 'check') {
      return checkCommand(revisions, logger);
    }
    if (!LEDGER_COMMANDS.has(parsed.command)) {
      logger.error(`Unknown command: ${parsed.command}`);
      USAGE.forEach(line => output.err(line));
      return 1;
    }
    return await ledgerCommand(parsed, config, revisions, logger, output);
  } catch (error) {
    logger.error(errorMessage(error));
    if (isLedgerError(error)) {
      logger.debug(`Error code: ${error.code}`);
    }
    if (debug && error instanceof Error && error.stack) {
      output.err(error.stack);
    }
    return 1;
  }
}
