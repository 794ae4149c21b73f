/**
 * Run Configuration - Parameters of one update run and the query folder's
 * YAML config.
 *
 * Run parameters are resolved from three layers with the following
 * precedence (highest wins):
 *
 *   1. CLI arguments (`cliArgs`)
 *   2. Environment variables (`REPORT_UPDATER_LOG_LEVEL`, `REPORT_UPDATER_LOG_FILE`)
 *   3. Built-in defaults derived from the query folder
 *
 * The YAML config itself (`config.yaml`) describes the reports, their
 * defaults, the databases and Graphite. Its structured sections are
 * validated with Zod where they are consumed.
 *
 * @module config
 */

import * as fs from 'node:fs';
import * as yaml from 'yaml';
import { z } from 'zod';
import { getConfigPath, getPidFilePath } from './artifact-paths.js';
import { errorMessage } from './errors.js';
import { DEFAULT_LOG_LEVEL, isLogLevel, type LogLevel } from './logger.js';

// ---------------------------------------------------------------------------
// Run parameters
// ---------------------------------------------------------------------------

export interface UpdateParams {
  /** Folder with `config.yaml`, `*.sql` templates and scripts. */
  queryFolder: string;
  /** Folder the TSV reports are written to. */
  outputFolder: string;
  /** YAML config; defaults to `{queryFolder}/config.yaml`. */
  configPath: string;
  /** Lock file; defaults to `{queryFolder}/.reportupdater.pid`. */
  pidFilePath: string;
  logLevel: LogLevel;
  /** Append log lines to this file instead of stderr. */
  logFile?: string;
}

export type CliParams = Pick<UpdateParams, 'queryFolder' | 'outputFolder'> &
  Partial<Omit<UpdateParams, 'queryFolder' | 'outputFolder'>>;

/**
 * Merge parameters from all sources and return fully-resolved parameters.
 *
 * @param cliArgs - Values supplied directly from the command line.
 * @param env     - Environment variable map (defaults to `process.env`).
 */
export function buildParams(
  cliArgs: CliParams,
  env: Record<string, string | undefined> = process.env,
): UpdateParams {
  const fromEnv: Partial<UpdateParams> = {};

  const envLevel = env.REPORT_UPDATER_LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) fromEnv.logLevel = envLevel;
  if (env.REPORT_UPDATER_LOG_FILE) fromEnv.logFile = env.REPORT_UPDATER_LOG_FILE;

  const fromCli: Partial<UpdateParams> = {};
  if (cliArgs.configPath !== undefined) fromCli.configPath = cliArgs.configPath;
  if (cliArgs.pidFilePath !== undefined) fromCli.pidFilePath = cliArgs.pidFilePath;
  if (cliArgs.logLevel !== undefined) fromCli.logLevel = cliArgs.logLevel;
  if (cliArgs.logFile !== undefined) fromCli.logFile = cliArgs.logFile;

  return {
    configPath: getConfigPath(cliArgs.queryFolder),
    pidFilePath: getPidFilePath(cliArgs.queryFolder),
    logLevel: DEFAULT_LOG_LEVEL,
    ...fromEnv,
    ...fromCli,
    queryFolder: cliArgs.queryFolder,
    outputFolder: cliArgs.outputFolder,
  };
}

// ---------------------------------------------------------------------------
// YAML config
// ---------------------------------------------------------------------------

/** Parsed `config.yaml`. Sections are validated by the stage that uses them. */
export type UpdaterConfig = Record<string, unknown>;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

/**
 * Read and parse a YAML file.
 *
 * @throws Error when the file cannot be read or parsed.
 */
export function loadYamlFile(filePath: string): unknown {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new Error(`Can not read the config file because of: (${errorMessage(error)}).`);
  }
  try {
    return yaml.parse(content);
  } catch (error) {
    throw new Error(`Can not parse the config file ${filePath} because of: (${errorMessage(error)}).`);
  }
}

/**
 * Load the query folder's config.
 *
 * @throws Error when the file is unreadable or its root is not a mapping.
 */
export function loadConfig(configPath: string): UpdaterConfig {
  const parsed = loadYamlFile(configPath);
  if (!isRecord(parsed)) {
    throw new Error(`Config ${configPath} is not a mapping.`);
  }
  return parsed;
}

// ---------------------------------------------------------------------------
// Section schemas
// ---------------------------------------------------------------------------

export const DatabaseConfigSchema = z.object({
  host: z.string({ required_error: 'Host is not in DB config.', invalid_type_error: 'Host is not a string.' }),
  port: z
    .number({ required_error: 'Port is not in DB config.', invalid_type_error: 'Port is not an integer.' })
    .int('Port is not an integer.'),
  creds_file: z.string({
    required_error: 'Creds file is not in DB config.',
    invalid_type_error: 'Creds file is not a string.',
  }),
  db: z.string({ required_error: 'DB name is not in DB config.', invalid_type_error: 'DB name is not a string.' }),
  auto_find_db_shard: z.boolean().optional().default(false),
  use_x1: z.boolean().optional().default(false),
  mw_config_path: z.string().optional().default('/srv/mediawiki-config'),
});
export type DatabaseConfig = z.infer<typeof DatabaseConfigSchema>;

export const GraphiteConfigSchema = z.object({
  host: z.string({ required_error: 'Graphite host must be a string', invalid_type_error: 'Graphite host must be a string' }),
  port: z
    .number({ required_error: 'Graphite port must be an int', invalid_type_error: 'Graphite port must be an int' })
    .int('Graphite port must be an int'),
  /** Placeholder → YAML file (relative to the query folder) of value translations. */
  lookups: z.record(z.string()).optional().default({}),
});

export const ReportGraphiteSchema = z.object({
  path: z.string(),
  metrics: z.record(z.string()),
});

/**
 * Validate `value` against `schema`, joining issues into one message.
 */
export function parseSection<T extends z.ZodTypeAny>(schema: T, value: unknown, label: string): z.infer<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const msg = result.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new Error(`${label} validation failed: ${msg}`);
  }
  return result.data;
}
