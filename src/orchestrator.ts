/**
 * Orchestrator - Runs the update pipeline once.
 *
 * 1. Take the pid lock of the query folder (or give up if another run holds it)
 * 2. Load the config and pending rerun requests
 * 3. Stream reports through Reader → Selector → Executor → Writer
 * 4. Delete processed rerun requests and release the lock
 *
 * @module orchestrator
 */

import * as path from 'node:path';
import {
  GraphiteConfigSchema,
  isRecord,
  loadConfig,
  loadYamlFile,
  parseSection,
  type UpdateParams,
  type UpdaterConfig,
} from './config.js';
import type { ConnectionFactory } from './db/mysql-client.js';
import { ShardResolver, type SrvResolver } from './db/shard-resolver.js';
import { Graphite } from './graphite.js';
import { configureLogger, log } from './logger.js';
import type { PipelineContext } from './pipeline/context.js';
import { Executor } from './pipeline/executor.js';
import { Reader } from './pipeline/reader.js';
import { Selector } from './pipeline/selector.js';
import { Writer, type WriteSummary } from './pipeline/writer.js';
import type { ScriptRunner } from './script-runner.js';
import { deletePidFile, onlyInstanceRunning, writePidFile } from './storage/pid-lock.js';
import { deleteReruns, readReruns } from './storage/reruns.js';

// ---------------------------------------------------------------------------
// Interfaces
// ---------------------------------------------------------------------------

/** Replaceable collaborators of a run. */
export interface UpdateDeps {
  connect?: ConnectionFactory;
  runScript?: ScriptRunner;
  resolveSrv?: SrvResolver;
  /** Clock for the run's execution time. */
  now?: () => Date;
  /** Fallback Graphite timestamp (epoch seconds). */
  graphiteTimestamp?: number;
}

export type UpdateStatus = 'completed' | 'already-running';

export interface UpdateResult {
  status: UpdateStatus;
  written: number;
  failed: number;
}

// ---------------------------------------------------------------------------
// Main entry
// ---------------------------------------------------------------------------

export async function runUpdate(params: UpdateParams, deps: UpdateDeps = {}): Promise<UpdateResult> {
  configureLogger({ level: params.logLevel, logFile: params.logFile });

  if (!onlyInstanceRunning(params.pidFilePath)) {
    log.warning('Another instance is already running. Exiting.');
    return { status: 'already-running', written: 0, failed: 0 };
  }

  log.info('Starting execution.');
  writePidFile(params.pidFilePath);

  let summary: WriteSummary;
  try {
    const currentExecTime = (deps.now ?? (() => new Date()))();
    const config = loadConfig(params.configPath);
    const pending = readReruns(params.queryFolder);

    const context: PipelineContext = {
      config,
      currentExecTime,
      queryFolder: params.queryFolder,
      outputFolder: params.outputFolder,
      reruns: pending.reruns,
    };

    const reader = new Reader(context);
    const selector = new Selector(reader, context);
    const executor = new Executor(selector, context, {
      connect: deps.connect,
      runScript: deps.runScript,
      shardResolver: new ShardResolver(deps.resolveSrv),
    });
    const writer = new Writer(executor, context, configureGraphite(config, params.queryFolder, deps.graphiteTimestamp));

    try {
      summary = await writer.run();
    } finally {
      await executor.close();
    }

    deleteReruns(pending.files);
  } finally {
    deletePidFile(params.pidFilePath);
  }

  log.info('Execution complete.');
  return { status: 'completed', ...summary };
}

/**
 * Build the Graphite sender when the config has a `graphite` section.
 *
 * Lookup files named in the section are loaded from the query folder.
 */
export function configureGraphite(
  config: UpdaterConfig,
  queryFolder: string,
  timestamp?: number,
): Graphite | null {
  if (config.graphite === undefined) return null;

  const settings = parseSection(GraphiteConfigSchema, config.graphite, 'Graphite');
  const lookups: Record<string, Record<string, string>> = {};
  for (const [placeholder, fileName] of Object.entries(settings.lookups)) {
    const loaded = loadYamlFile(path.join(queryFolder, fileName));
    if (!isRecord(loaded)) {
      throw new Error(`Graphite lookup ${fileName} is not a mapping.`);
    }
    lookups[placeholder] = Object.fromEntries(
      Object.entries(loaded).map(([key, value]) => [key, String(value)]),
    );
  }

  return new Graphite({ host: settings.host, port: settings.port, lookups }, timestamp);
}
