/**
 * CLI Entry Point for the report updater
 *
 * Parses command-line arguments, resolves the run parameters and runs one
 * update of the query folder's reports.
 *
 * @module cli
 */

import type { EventEmitter } from 'node:events';
import { parseArgs } from 'node:util';
import { buildParams, type CliParams, type UpdateParams } from './config.js';
import { errorMessage } from './errors.js';
import { isLogLevel, LOG_LEVELS } from './logger.js';
import { runUpdate, type UpdateResult } from './orchestrator.js';
import { deletePidFile, ownsPidFile } from './storage/pid-lock.js';

/** Version extracted from package.json */
export const VERSION = '1.0.0';

/**
 * Display help text and exit.
 */
function showHelp(): void {
  console.log(`
Report Updater v${VERSION}

Usage:
  update-reports <query-folder> <output-folder> [options]

Periodically executes the SQL queries and scripts of a query folder and
appends their results to TSV reports in the output folder.

Arguments:
  query-folder               Folder with config.yaml, *.sql files and scripts
  output-folder              Folder to write the TSV reports to

Options:
  -c, --config-path <path>   Yaml configuration file (default: <query-folder>/config.yaml)
  --pid-file <path>          Lock file (default: <query-folder>/.reportupdater.pid)
  -l, --log-level <level>    ${LOG_LEVELS.join(' | ')} (default: warning)
  --log-file <path>          Append log lines to this file instead of stderr
  --help, -h                 Show this help message
  --version, -v              Show version number

Environment Variables:
  REPORT_UPDATER_LOG_LEVEL   Default log level
  REPORT_UPDATER_LOG_FILE    Default log file

Examples:
  update-reports queries/browser output/browser
  update-reports queries/browser output/browser -l info --log-file /var/log/updater.log
`);
  process.exit(0);
}

/**
 * Display version and exit.
 */
function showVersion(): void {
  console.log(`v${VERSION}`);
  process.exit(0);
}

function usageError(message: string): never {
  console.error(`Error: ${message}`);
  console.error('Run with --help for usage information');
  process.exit(1);
}

/**
 * Parse command-line arguments.
 *
 * @param argv - Command-line arguments (defaults to process.argv)
 */
export function parseCliArgs(argv: string[] = process.argv): CliParams {
  let parsed: ReturnType<typeof parseOptions>;
  try {
    parsed = parseOptions(argv.slice(2));
  } catch (error) {
    usageError(errorMessage(error));
  }
  const { values, positionals } = parsed;

  if (values.help) {
    showHelp();
  }
  if (values.version) {
    showVersion();
  }

  const [queryFolder, outputFolder, ...extra] = positionals;
  if (!queryFolder || !outputFolder) {
    usageError('<query-folder> and <output-folder> are required');
  }
  if (extra.length > 0) {
    usageError(`unexpected arguments: ${extra.join(' ')}`);
  }

  const cliArgs: CliParams = { queryFolder, outputFolder };

  if (values['config-path']) {
    cliArgs.configPath = values['config-path'];
  }

  if (values['pid-file']) {
    cliArgs.pidFilePath = values['pid-file'];
  }

  if (values['log-level']) {
    const level = values['log-level'].toLowerCase();
    if (!isLogLevel(level)) {
      usageError(`Invalid --log-level value: ${values['log-level']}. Must be one of ${LOG_LEVELS.join(', ')}.`);
    }
    cliArgs.logLevel = level;
  }

  if (values['log-file']) {
    cliArgs.logFile = values['log-file'];
  }

  return cliArgs;
}

function parseOptions(args: string[]) {
  return parseArgs({
    args,
    options: {
      'config-path': { type: 'string', short: 'c' },
      'pid-file': { type: 'string' },
      'log-level': { type: 'string', short: 'l' },
      'log-file': { type: 'string' },

      // Meta
      help: { type: 'boolean', short: 'h' },
      version: { type: 'boolean', short: 'v' },
    },
    allowPositionals: true,
  });
}

/**
 * Remove the lock file when the run is interrupted, then exit with
 * 128 + the signal number. Returns a function that uninstalls the handlers.
 */
export function installSignalHandlers(params: UpdateParams, target: EventEmitter = process): () => void {
  const handlers: Array<[NodeJS.Signals, number]> = [
    ['SIGINT', 130],
    ['SIGTERM', 143],
  ];
  const listeners = handlers.map(([signal, exitCode]) => {
    const listener = () => {
      if (ownsPidFile(params.pidFilePath)) deletePidFile(params.pidFilePath);
      process.exit(exitCode);
    };
    target.once(signal, listener);
    return [signal, listener] as const;
  });
  return () => {
    for (const [signal, listener] of listeners) target.removeListener(signal, listener);
  };
}

/**
 * Main entry point - parses arguments and runs the update.
 */
export async function main(argv: string[] = process.argv): Promise<void> {
  const params = buildParams(parseCliArgs(argv));
  const removeSignalHandlers = installSignalHandlers(params);

  let result: UpdateResult;
  try {
    result = await runUpdate(params);
  } finally {
    removeSignalHandlers();
  }
  if (result.status === 'already-running') {
    console.error('Another instance is already running.');
    process.exit(1);
  }

  if (result.failed > 0) {
    console.error(`${result.written} report(s) updated, ${result.failed} failed. See the log for details.`);
  }
  process.exit(0);
}

/**
 * Run {@link main}, reporting any uncaught error and exiting 1.
 */
export async function runCli(argv: string[] = process.argv): Promise<void> {
  try {
    await main(argv);
  } catch (err) {
    console.error('Fatal error:', err);
    process.exit(1);
  }
}
