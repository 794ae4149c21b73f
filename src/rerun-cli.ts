/**
 * Rerun CLI - Marks reports to be re-run for a date range.
 *
 * The next update run recomputes the marked dates and overwrites them in
 * the report files.
 *
 * @module rerun-cli
 */

import * as fs from 'node:fs';
import { parseArgs } from 'node:util';
import { getConfigPath } from './artifact-paths.js';
import { isRecord, loadYamlFile } from './config.js';
import { isValidDate, parseDate, startOfDay } from './dates.js';
import { errorMessage } from './errors.js';
import { writeRerunFile } from './storage/reruns.js';

export interface RerunRequest {
  queryFolder: string;
  /** YYYY-MM-DD, inclusive. */
  startDate: string;
  /** YYYY-MM-DD, exclusive. */
  endDate: string;
  configPath?: string;
  /** Reports to re-run; all reports of the config when empty. */
  reports?: string[];
}

/** A request that cannot be honored; the message is shown to the user as is. */
export class RerunRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RerunRequestError';
  }
}

function parseArgDate(value: string, argName: string): Date {
  try {
    return parseDate(value);
  } catch {
    throw new RerunRequestError(`Invalid ${argName}.`);
  }
}

function parseStarts(value: unknown): Date {
  if (isValidDate(value)) return startOfDay(value);
  if (typeof value === 'string') return parseDate(value);
  throw new TypeError('starts is not a date');
}

/**
 * Validate a rerun request and write its rerun file.
 *
 * @param now - Current time; bounds the end date and names the file.
 * @returns Path of the written rerun file.
 */
export function markReruns(request: RerunRequest, now: Date = new Date()): string {
  const start = parseArgDate(request.startDate, 'start_date');
  const end = parseArgDate(request.endDate, 'end_date');
  if (start.getTime() >= end.getTime()) {
    throw new RerunRequestError('start_date is greater than or equal to end_date.');
  }
  if (end.getTime() > now.getTime()) {
    throw new RerunRequestError('end_date is greater than today.');
  }

  if (!fs.existsSync(request.queryFolder) || !fs.statSync(request.queryFolder).isDirectory()) {
    throw new RerunRequestError('Invalid query_folder.');
  }

  let config: unknown;
  try {
    config = loadYamlFile(request.configPath ?? getConfigPath(request.queryFolder));
  } catch {
    throw new RerunRequestError('Cannot read the config file.');
  }

  if (!isRecord(config) || !('reports' in config)) {
    throw new RerunRequestError('Cannot find report section in config file.');
  }
  const reportsConfig = config.reports;
  if (!isRecord(reportsConfig)) {
    throw new RerunRequestError('Invalid report section in config file.');
  }

  const reports = request.reports && request.reports.length > 0 ? request.reports : Object.keys(reportsConfig);
  for (const report of reports) {
    if (!(report in reportsConfig)) {
      throw new RerunRequestError(`Report ${report} is not listed in config file.`);
    }
    const reportConfig = reportsConfig[report];
    let firstDate: Date;
    try {
      firstDate = parseStarts(isRecord(reportConfig) ? reportConfig.starts : undefined);
    } catch {
      throw new RerunRequestError(`Cannot parse starts field from ${report} config.`);
    }
    if (firstDate.getTime() >= end.getTime()) {
      throw new RerunRequestError(`Report ${report} starts after the specified date range.`);
    }
  }

  try {
    return writeRerunFile(request.queryFolder, { start, end }, reports, now);
  } catch (error) {
    throw new RerunRequestError(`Could not write rerun file (${errorMessage(error)}).`);
  }
}

function showHelp(): void {
  console.log(`
Usage:
  rerun-reports <query-folder> <start-date> <end-date> [options]

Mark reports to be re-run for a given date range.

Arguments:
  query-folder               Folder with *.sql files and scripts
  start-date                 Start of the date range to be rerun (YYYY-MM-DD, inclusive)
  end-date                   End of the date range to be rerun (YYYY-MM-DD, exclusive)

Options:
  --config-path <path>       Yaml configuration file (default: <query-folder>/config.yaml)
  -r, --report <key>         Report to be re-run; repeat for several reports.
                             If none is given, all reports of the config are marked.
  --help, -h                 Show this help message
`);
  process.exit(0);
}

function fail(message: string): never {
  console.log(`ERROR: ${message}`);
  process.exit(1);
}

/**
 * Parse command-line arguments into a rerun request.
 */
export function parseRerunArgs(argv: string[] = process.argv): RerunRequest {
  let parsed: ReturnType<typeof parseOptions>;
  try {
    parsed = parseOptions(argv.slice(2));
  } catch (error) {
    fail(errorMessage(error));
  }
  const { values, positionals } = parsed;

  if (values.help) {
    showHelp();
  }

  const [queryFolder, startDate, endDate, ...extra] = positionals;
  if (!queryFolder || !startDate || !endDate || extra.length > 0) {
    fail('Expected <query-folder> <start-date> <end-date>.');
  }

  return {
    queryFolder,
    startDate,
    endDate,
    configPath: values['config-path'],
    reports: values.report,
  };
}

function parseOptions(args: string[]) {
  return parseArgs({
    args,
    options: {
      'config-path': { type: 'string' },
      report: { type: 'string', short: 'r', multiple: true },
      help: { type: 'boolean', short: 'h' },
    },
    allowPositionals: true,
  });
}

export function main(argv: string[] = process.argv): void {
  const request = parseRerunArgs(argv);
  try {
    markReruns(request);
  } catch (error) {
    fail(errorMessage(error));
  }
  console.log('Reports successfully marked to be re-run.');
}
