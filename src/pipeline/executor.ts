/**
 * Executor - Third pipeline stage.
 *
 * Runs each selected interval, either by instantiating the report's SQL
 * template and querying its database or by calling its script, and stores
 * the normalized results in the report.
 *
 * @module pipeline/executor
 */

import * as path from 'node:path';
import { DatabaseConfigSchema, isRecord, parseSection, type DatabaseConfig } from '../config.js';
import { formatDate, formatTimestamp, isValidDate, parseDate, startOfDay } from '../dates.js';
import {
  createMysqlConnection,
  type ConnectionFactory,
  type ConnectionSettings,
  type DatabaseConnection,
} from '../db/mysql-client.js';
import { ShardResolver } from '../db/shard-resolver.js';
import { errorMessage, MissingKeyError, raiseCritical } from '../errors.js';
import { log } from '../logger.js';
import type { Cell, Report, ReportResults, ResultData, ResultRow } from '../report.js';
import { createScriptRunner, type ScriptRunner } from '../script-runner.js';
import { fillTemplate, UnknownPlaceholderError } from '../template.js';
import { parseTsv } from '../tsv.js';
import { reportFailure, type PipelineContext } from './context.js';
import type { Selector } from './selector.js';

export interface ExecutorDeps {
  connect?: ConnectionFactory;
  runScript?: ScriptRunner;
  shardResolver?: ShardResolver;
}

export class Executor {
  private readonly connect: ConnectionFactory;
  private readonly runScript: ScriptRunner;
  private readonly shardResolver: ShardResolver;
  /** Open connections by target, reused for the whole run. */
  private readonly connections = new Map<string, Promise<DatabaseConnection>>();

  constructor(
    private readonly selector: Selector,
    private readonly context: PipelineContext,
    deps: ExecutorDeps = {},
  ) {
    this.connect = deps.connect ?? createMysqlConnection;
    this.runScript = deps.runScript ?? createScriptRunner();
    this.shardResolver = deps.shardResolver ?? new ShardResolver();
  }

  /**
   * Yield every report whose interval executed successfully.
   */
  async *execute(): AsyncGenerator<Report> {
    for (const report of this.selector.select()) {
      log.info(`Executing "${report.toString()}"...`);
      const succeeded =
        report.type === 'sql' ? await this.executeSqlReport(report) : await this.executeScriptReport(report);
      if (succeeded) yield report;
    }
  }

  async executeSqlReport(report: Report): Promise<boolean> {
    const databases = this.context.config.databases;
    if (databases === undefined) {
      raiseCritical('Databases is not in config.', MissingKeyError);
    }
    if (!isRecord(databases)) {
      raiseCritical('Databases is not a dict.');
    }

    try {
      const sql = this.instantiateSql(report);
      log.debug(sql);
      const connection = await this.getConnection(report, databases);
      const { header, rows } = await connection.query(sql);
      report.results = this.normalizeResults(report, header, rows);
      return true;
    } catch (error) {
      log.error(reportFailure(report.key, 'executed', errorMessage(error)));
      return false;
    }
  }

  instantiateSql(report: Report): string {
    const { start, end } = requireInterval(report);
    const values: Record<string, string> = {
      from_timestamp: formatTimestamp(start),
      to_timestamp: formatTimestamp(end),
      ...report.explodedValues(),
    };
    try {
      return fillTemplate(report.sqlTemplate ?? '', values);
    } catch (error) {
      if (error instanceof UnknownPlaceholderError) {
        throw new Error('SQL template contains unknown placeholders.');
      }
      throw error;
    }
  }

  /**
   * Connection for the report's database, opened on first use.
   */
  private async getConnection(report: Report, databases: Record<string, unknown>): Promise<DatabaseConnection> {
    const dbKey = report.dbKey ?? '';
    if (!Object.hasOwn(databases, dbKey)) {
      throw new MissingKeyError('DB key is not in config databases.');
    }
    if (!isRecord(databases[dbKey])) {
      throw new TypeError('DB config is not a dict.');
    }
    const dbConfig = parseSection(DatabaseConfigSchema, databases[dbKey], `Database ${dbKey}`);
    const settings = await this.resolveSettings(report, dbConfig);

    const target = `${dbKey}|${settings.host}|${settings.port}|${settings.database}`;
    let connection = this.connections.get(target);
    if (!connection) {
      connection = this.connect(settings);
      this.connections.set(target, connection);
      // a failed attempt is retried by the next report that needs it
      connection.catch(() => this.connections.delete(target));
    }
    return connection;
  }

  private async resolveSettings(report: Report, dbConfig: DatabaseConfig): Promise<ConnectionSettings> {
    if (!dbConfig.auto_find_db_shard) {
      return { host: dbConfig.host, port: dbConfig.port, credsFile: dbConfig.creds_file, database: dbConfig.db };
    }
    const database = report.explodedValues().wiki_db ?? dbConfig.db;
    const { host, port } = await this.shardResolver.resolve(database, {
      mwConfigPath: dbConfig.mw_config_path,
      useX1: dbConfig.use_x1,
    });
    return { host, port, credsFile: dbConfig.creds_file, database };
  }

  async executeScriptReport(report: Report): Promise<boolean> {
    try {
      const { start, end } = requireInterval(report);
      const script = report.script ?? '';
      const explodeValues = report.explodedValues();
      const args = [
        formatDate(start),
        formatDate(end),
        ...Object.keys(explodeValues)
          .sort()
          .map((placeholder) => explodeValues[placeholder]),
        // scripts may use their own folder to find companion files
        path.dirname(script),
      ];
      const stdout = await this.runScript(script, args);
      report.results = this.normalizeResults(report, null, parseTsv(stdout));
      return true;
    } catch (error) {
      log.error(reportFailure(report.key, 'executed', errorMessage(error)));
      return false;
    }
  }

  /**
   * Key results by the date in their first column.
   *
   * When `header` is null the first row is the header. An empty result
   * still produces one row (the interval start with empty values) so the
   * interval is not computed again.
   */
  normalizeResults(report: Report, header: string[] | null, rows: unknown[][]): ReportResults {
    let normalizedHeader = header ? [...header] : null;
    const data: ResultData = new Map();

    for (const row of rows) {
      if (normalizedHeader === null) {
        normalizedHeader = row.map((cell) => String(cell));
        continue;
      }

      const date = normalizeDate(row[0]);
      const normalized: ResultRow = { date, cells: row.slice(1).map(toCell) };
      const existing = data.get(date.getTime());
      if (report.isFunnel && existing) {
        existing.push(normalized);
      } else {
        data.set(date.getTime(), [normalized]);
      }
    }

    if (normalizedHeader === null) {
      throw new Error('Results have no header.');
    }
    if (data.size === 0) {
      const { start } = requireInterval(report);
      const empty: ResultRow = { date: start, cells: new Array<Cell>(Math.max(normalizedHeader.length - 1, 0)).fill(null) };
      data.set(start.getTime(), [empty]);
    }

    return { header: normalizedHeader, data };
  }

  /**
   * Close every connection opened during the run.
   */
  async close(): Promise<void> {
    const pending = [...this.connections.values()];
    this.connections.clear();
    const results = await Promise.allSettled(
      pending.map(async (connection) => (await connection).close()),
    );
    for (const result of results) {
      if (result.status === 'rejected') {
        log.warning(`Unable to close a database connection (${errorMessage(result.reason)}).`);
      }
    }
  }
}

function requireInterval(report: Report): { start: Date; end: Date } {
  if (!report.start || !report.end) {
    throw new Error('Report has no interval to execute.');
  }
  return { start: report.start, end: report.end };
}

function normalizeDate(raw: unknown): Date {
  if (raw instanceof Date) {
    if (!isValidDate(raw)) throw new Error('Could not parse date from results.');
    return startOfDay(raw);
  }
  if (typeof raw === 'string') {
    try {
      return parseDate(raw);
    } catch {
      throw new Error('Could not parse date from results.');
    }
  }
  throw new Error('Results do not have dates in first column.');
}

function toCell(value: unknown): Cell {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'number') return value;
  if (typeof value === 'bigint' || typeof value === 'boolean') return String(value);
  if (value instanceof Date) {
    return isValidDate(value) ? value.toISOString().replace('T', ' ').replace(/\.\d{3}Z$/, '') : null;
  }
  if (Buffer.isBuffer(value)) return value.toString('utf-8');
  return JSON.stringify(value);
}
