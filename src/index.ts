/**
 * Public API of the report updater.
 *
 * @module index
 */

export { runUpdate, configureGraphite, type UpdateDeps, type UpdateResult, type UpdateStatus } from './orchestrator.js';
export { buildParams, loadConfig, type CliParams, type UpdateParams, type UpdaterConfig } from './config.js';
export { markReruns, RerunRequestError, type RerunRequest } from './rerun-cli.js';
export { Reader } from './pipeline/reader.js';
export { Selector } from './pipeline/selector.js';
export { Executor, type ExecutorDeps } from './pipeline/executor.js';
export { Writer, type WriteSummary } from './pipeline/writer.js';
export type { PipelineContext } from './pipeline/context.js';
export { Report, type Cell, type ReportResults, type ResultData, type ResultRow } from './report.js';
export { Graphite, type GraphiteSettings } from './graphite.js';
export { createMysqlConnection, type ConnectionFactory, type DatabaseConnection, type QueryResult } from './db/mysql-client.js';
export { ShardResolver, type SrvResolver } from './db/shard-resolver.js';
export { createScriptRunner, type ScriptRunner } from './script-runner.js';
export { configureLogger, log, type LogLevel } from './logger.js';
export { InvalidValueError, MissingKeyError } from './errors.js';
