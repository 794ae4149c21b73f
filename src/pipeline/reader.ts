/**
 * Reader - First pipeline stage.
 *
 * Builds a {@link Report} for each entry of the config's `reports` section.
 * Values are taken from the report's own config, then from the `defaults`
 * section, then from built-in defaults. Type and format problems are caught
 * here so a broken entry only costs that one report.
 *
 * @module pipeline/reader
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { getScriptPath, getSqlTemplatePath } from '../artifact-paths.js';
import { isRecord } from '../config.js';
import { parseDate, startOfDay, type Period } from '../dates.js';
import { errorMessage, InvalidValueError, MissingKeyError, raiseCritical } from '../errors.js';
import { log } from '../logger.js';
import { Report, type ReportGraphiteConfig, type ReportType } from '../report.js';
import { reportFailure, type PipelineContext } from './context.js';

const REPORT_TYPES: readonly ReportType[] = ['sql', 'script'];
const GRANULARITIES: readonly Period[] = ['days', 'weeks', 'months'];

/** Marks a value that has no built-in default. */
const REQUIRED = Symbol('required');

export class Reader {
  constructor(private readonly context: PipelineContext) {}

  /**
   * Yield every report that could be read from the config.
   */
  *read(): Generator<Report> {
    const { config } = this.context;
    if (!('reports' in config)) {
      raiseCritical('Reports is not in config.', MissingKeyError);
    }
    const reports = config.reports;
    if (!isRecord(reports)) {
      raiseCritical('Reports is not a dict.');
    }

    for (const [reportKey, reportConfig] of Object.entries(reports)) {
      log.debug(`Reading "${reportKey}"...`);
      let report: Report;
      try {
        report = this.createReport(reportKey, reportConfig);
      } catch (error) {
        log.error(reportFailure(reportKey, 'read from config', errorMessage(error)));
        continue;
      }
      yield report;
    }
  }

  createReport(reportKey: string, reportConfig: unknown): Report {
    if (!isRecord(reportConfig)) {
      throw new TypeError('Report config is not a dict.');
    }
    const { queryFolder } = this.context;

    const report = new Report();
    report.key = reportKey;
    report.type = this.getType(reportConfig);
    report.granularity = this.getGranularity(reportConfig);
    report.lag = this.getLag(reportConfig);
    report.firstDate = this.getFirstDate(reportConfig);
    report.explodeBy = this.getExplodeBy(reportConfig);
    report.maxDataPoints = this.getMaxDataPoints(reportConfig);
    report.group = this.getGroup(reportConfig);
    report.isFunnel = this.getFunnel(reportConfig);

    const executable = this.getExecutable(reportConfig) ?? reportKey;
    if (report.type === 'sql') {
      report.dbKey = this.getDbKey(reportConfig);
      report.sqlTemplate = this.getSqlTemplate(executable, queryFolder);
    } else {
      report.script = getScriptPath(queryFolder, executable);
    }
    report.graphite = this.getGraphite(reportConfig);
    return report;
  }

  /**
   * Look a key up in the report config, then in `defaults`, then fall back.
   *
   * @throws MissingKeyError when the key is required and found nowhere.
   */
  getValue(key: string, reportConfig: Record<string, unknown>, fallback: unknown): unknown {
    const defaults = isRecord(this.context.config.defaults) ? this.context.config.defaults : {};
    if (key in reportConfig) return reportConfig[key];
    if (key in defaults) return defaults[key];
    if (fallback !== REQUIRED) return fallback;
    throw new MissingKeyError(`Key ${key} must be specified in defaults or report config.`);
  }

  private getType(reportConfig: Record<string, unknown>): ReportType {
    const value = this.getValue('type', reportConfig, 'sql');
    const type = REPORT_TYPES.find((t) => t === value);
    if (!type) throw new InvalidValueError('Report type is not valid.');
    return type;
  }

  private getGranularity(reportConfig: Record<string, unknown>): Period {
    const value = this.getValue('granularity', reportConfig, REQUIRED);
    const granularity = GRANULARITIES.find((g) => g === value);
    if (!granularity) throw new InvalidValueError('Report granularity is not valid.');
    return granularity;
  }

  private getLag(reportConfig: Record<string, unknown>): number {
    const lag = this.getValue('lag', reportConfig, 0);
    if (typeof lag !== 'number' || !Number.isInteger(lag) || lag < 0) {
      throw new InvalidValueError('Report lag is not valid.');
    }
    return lag;
  }

  private getFirstDate(reportConfig: Record<string, unknown>): Date {
    const starts = this.getValue('starts', reportConfig, REQUIRED);
    if (starts instanceof Date) {
      return startOfDay(starts);
    }
    if (typeof starts !== 'string') {
      throw new TypeError('Report starts is not a string.');
    }
    try {
      return parseDate(starts);
    } catch {
      throw new InvalidValueError('Report starts does not match date format.');
    }
  }

  private getDbKey(reportConfig: Record<string, unknown>): string {
    const dbKey = this.getValue('db', reportConfig, REQUIRED);
    if (typeof dbKey !== 'string') {
      throw new InvalidValueError('DB key is not a string.');
    }
    return dbKey;
  }

  private getSqlTemplate(executable: string, queryFolder: string): string {
    try {
      return fs.readFileSync(getSqlTemplatePath(queryFolder, executable), 'utf-8');
    } catch (error) {
      throw new Error(`Could not read the SQL template (${errorMessage(error)}).`);
    }
  }

  /**
   * Values per placeholder. A single value naming a readable file in the
   * query folder is replaced by that file's lines.
   */
  private getExplodeBy(reportConfig: Record<string, unknown>): Record<string, string[]> {
    const explodeConfig = this.getValue('explode_by', reportConfig, {});
    if (!isRecord(explodeConfig)) {
      throw new TypeError('Explode by is not a dict.');
    }

    const explodeBy: Record<string, string[]> = {};
    for (const [placeholder, rawValues] of Object.entries(explodeConfig)) {
      let values: string[];
      if (typeof rawValues === 'string') {
        values = rawValues.split(',').map((value) => value.trim());
      } else if (Array.isArray(rawValues)) {
        values = rawValues.map((value) => String(value).trim());
      } else {
        throw new TypeError(`Explode values of ${placeholder} are not a string.`);
      }

      if (values.length === 1) {
        const fromFile = this.readExplodeFile(values[0]);
        if (fromFile === null) {
          explodeBy[placeholder] = values;
        } else if (fromFile.length > 0) {
          explodeBy[placeholder] = fromFile;
        }
      } else if (values.length > 1) {
        explodeBy[placeholder] = values;
      }
    }
    return explodeBy;
  }

  /** Lines of a values file, or `null` when there is no such file. */
  private readExplodeFile(fileName: string): string[] | null {
    const explodePath = path.join(this.context.queryFolder, fileName);
    let content: string;
    try {
      if (!fs.statSync(explodePath).isFile()) return null;
      content = fs.readFileSync(explodePath, 'utf-8');
    } catch {
      return null;
    }
    return content
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line !== '');
  }

  private getMaxDataPoints(reportConfig: Record<string, unknown>): number | null {
    const maxDataPoints = this.getValue('max_data_points', reportConfig, null);
    if (maxDataPoints === null) return null;
    if (typeof maxDataPoints !== 'number' || !Number.isInteger(maxDataPoints) || maxDataPoints < 1) {
      throw new InvalidValueError('Max data points is not valid.');
    }
    return maxDataPoints;
  }

  private getExecutable(reportConfig: Record<string, unknown>): string | null {
    const execute = this.getValue('execute', reportConfig, null);
    if (execute === null) return null;
    if (typeof execute !== 'string') {
      throw new TypeError('Execute is not a string.');
    }
    return execute;
  }

  private getGraphite(reportConfig: Record<string, unknown>): ReportGraphiteConfig {
    const graphite = this.getValue('graphite', reportConfig, {});
    if (!isRecord(graphite)) {
      throw new TypeError('Graphite is not a dict.');
    }
    return graphite;
  }

  private getGroup(reportConfig: Record<string, unknown>): string | null {
    const group = this.getValue('group', reportConfig, null);
    if (group === null) return null;
    if (typeof group !== 'string') {
      throw new InvalidValueError('Group is not a string.');
    }
    return group;
  }

  private getFunnel(reportConfig: Record<string, unknown>): boolean {
    const funnel = this.getValue('funnel', reportConfig, false);
    if (typeof funnel !== 'boolean') {
      throw new InvalidValueError('Funnel is not a boolean.');
    }
    return funnel;
  }
}
