/**
 * Report - The unit passed between pipeline stages.
 *
 * Holds everything known about one report: its schedule, what to execute,
 * the interval being computed and, after execution, its results. Carries
 * no pipeline logic of its own.
 *
 * @module report
 */

import { formatDate, isValidDate, type Period } from './dates.js';

// ---------------------------------------------------------------------------
// Result types
// ---------------------------------------------------------------------------

/** A non-date cell value. `null` is written as an empty TSV field. */
export type Cell = string | number | null;

/** One result line: the date of the first column, then the other columns. */
export interface ResultRow {
  date: Date;
  cells: Cell[];
}

/**
 * Results keyed by date (epoch milliseconds).
 *
 * Regular reports hold one row per date; funnel reports may hold several.
 */
export type ResultData = Map<number, ResultRow[]>;

export interface ReportResults {
  header: string[];
  data: ResultData;
}

export type ReportType = 'sql' | 'script';

/** Report-level Graphite block, validated when metrics are sent. */
export type ReportGraphiteConfig = Record<string, unknown>;

export function emptyResults(): ReportResults {
  return { header: [], data: new Map() };
}

export function cloneRow(row: ResultRow): ResultRow {
  return { date: new Date(row.date.getTime()), cells: [...row.cells] };
}

export function cloneResults(results: ReportResults): ReportResults {
  const data: ResultData = new Map();
  for (const [key, rows] of results.data) {
    data.set(key, rows.map(cloneRow));
  }
  return { header: [...results.header], data };
}

// ---------------------------------------------------------------------------
// Report
// ---------------------------------------------------------------------------

export class Report {
  key = '';
  type: ReportType = 'sql';
  granularity: Period = 'days';
  /** Seconds to wait after an interval closes before computing it. */
  lag = 0;
  firstDate: Date | null = null;
  start: Date | null = null;
  end: Date | null = null;
  dbKey: string | null = null;
  sqlTemplate: string | null = null;
  script: string | null = null;
  /**
   * Placeholder values. Before explosion each placeholder maps to its list
   * of values; after explosion, to a single value.
   */
  explodeBy: Record<string, string | string[]> = {};
  maxDataPoints: number | null = null;
  graphite: ReportGraphiteConfig = {};
  results: ReportResults = emptyResults();
  group: string | null = null;
  isFunnel = false;

  clone(): Report {
    const copy = new Report();
    copy.key = this.key;
    copy.type = this.type;
    copy.granularity = this.granularity;
    copy.lag = this.lag;
    copy.firstDate = this.firstDate && new Date(this.firstDate.getTime());
    copy.start = this.start && new Date(this.start.getTime());
    copy.end = this.end && new Date(this.end.getTime());
    copy.dbKey = this.dbKey;
    copy.sqlTemplate = this.sqlTemplate;
    copy.script = this.script;
    copy.explodeBy = Object.fromEntries(
      Object.entries(this.explodeBy).map(([k, v]) => [k, Array.isArray(v) ? [...v] : v]),
    );
    copy.maxDataPoints = this.maxDataPoints;
    copy.graphite = structuredClone(this.graphite);
    copy.results = cloneResults(this.results);
    copy.group = this.group;
    copy.isFunnel = this.isFunnel;
    return copy;
  }

  /**
   * Single explode values of an exploded report.
   *
   * @throws Error if a placeholder still holds a list of values.
   */
  explodedValues(): Record<string, string> {
    const values: Record<string, string> = {};
    for (const [placeholder, value] of Object.entries(this.explodeBy)) {
      if (Array.isArray(value)) {
        throw new Error(`Placeholder "${placeholder}" has not been exploded.`);
      }
      values[placeholder] = value;
    }
    return values;
  }

  toString(): string {
    return (
      '<Report' +
      ` key=${this.key}` +
      ` type=${this.type}` +
      ` granularity=${this.granularity}` +
      ` lag=${this.lag}` +
      ` first_date=${formatReportDate(this.firstDate)}` +
      ` start=${formatReportDate(this.start)}` +
      ` end=${formatReportDate(this.end)}` +
      ` db_key=${this.dbKey ?? 'None'}` +
      ` sql_template=${formatTemplate(this.sqlTemplate)}` +
      ` script=${this.script ?? 'None'}` +
      ` explode_by=${JSON.stringify(this.explodeBy)}` +
      ` max_data_points=${this.maxDataPoints ?? 'None'}` +
      ` graphite=${JSON.stringify(this.graphite)}` +
      ` results=${formatResults(this.results)}` +
      ` group=${this.group ?? 'None'}` +
      '>'
    );
  }
}

function formatReportDate(date: Date | null): string {
  if (date === null) return 'None';
  return isValidDate(date) ? formatDate(date) : 'invalid date';
}

function formatTemplate(template: string | null): string {
  if (template === null) return 'None';
  const collapsed = template.replace(/\s+/g, ' ').trim();
  return collapsed.length > 100 ? collapsed.slice(0, 100) + '...' : collapsed;
}

function formatResults(results: ReportResults): string {
  return `{header: ${JSON.stringify(results.header)}, data: ${results.data.size} rows}`;
}
