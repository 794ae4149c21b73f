/**
 * Writer - Last pipeline stage.
 *
 * Merges each executed interval into the report's TSV and, when Graphite
 * is configured, sends the rows of newly computed dates.
 *
 * @module pipeline/writer
 */

import { addPeriod } from '../dates.js';
import { errorMessage } from '../errors.js';
import type { Graphite } from '../graphite.js';
import { log } from '../logger.js';
import { cloneResults, type Cell, type Report, type ResultData, type ResultRow } from '../report.js';
import { getPreviousResults, writeReportFile } from '../storage/report-store.js';
import { reportFailure, type PipelineContext } from './context.js';
import type { Executor } from './executor.js';

export interface UpdatedResults {
  /** Current header, extended with columns only the previous file had. */
  header: string[];
  /** Previous rows (re-mapped to the header) overlaid with the new ones. */
  data: ResultData;
  /** Dates computed for the first time; rerun dates are not included. */
  newDates: number[];
}

export interface WriteSummary {
  written: number;
  failed: number;
}

export class Writer {
  constructor(
    private readonly executor: Executor,
    private readonly context: PipelineContext,
    private readonly graphite: Graphite | null = null,
  ) {}

  async run(): Promise<WriteSummary> {
    const summary: WriteSummary = { written: 0, failed: 0 };

    for await (const report of this.executor.execute()) {
      log.debug(`Writing "${report.toString()}"...`);
      try {
        const { header, data, newDates } = this.updateResults(report);
        writeReportFile(report, this.context.outputFolder, header, data);
        await this.recordToGraphite(report, newDates);
        summary.written++;
        log.info(`Report ${report.key} has been updated.`);
      } catch (error) {
        summary.failed++;
        log.error(reportFailure(report.key, 'written', errorMessage(error)));
      }
    }

    return summary;
  }

  updateResults(report: Report): UpdatedResults {
    const current = cloneResults(report.results);
    const currentHeader = current.header;
    const currentData = current.data;
    for (const rows of currentData.values()) {
      for (const row of rows) {
        if (row.cells.length + 1 !== currentHeader.length) {
          throw new Error('Results and header do not match.');
        }
      }
    }

    // reruns are not applied: their dates are overwritten below
    const previous = getPreviousResults(report, this.context.outputFolder, new Map());
    let previousHeader = previous.header;
    const previousData = previous.data;
    if (previousHeader.length === 0) {
      if (previousData.size > 0) throw new Error('Previous results have no header.');
      previousHeader = currentHeader;
    }

    const newDates = [...currentData.keys()].filter((date) => !previousData.has(date));

    if (!sameHeader(currentHeader, previousHeader)) {
      // keep columns that disappeared from the query, with empty values
      const removed = previousHeader
        .slice(1)
        .filter((column) => !currentHeader.includes(column))
        .sort();
      if (removed.length > 0) {
        currentHeader.push(...removed);
        for (const rows of currentData.values()) {
          for (const row of rows) row.cells.push(...removed.map((): Cell => null));
        }
      }

      // cell index in current layout → cell index in previous layout
      const columnMap: Array<[number, number]> = [];
      currentHeader.slice(1).forEach((column, newIndex) => {
        const oldIndex = previousHeader.indexOf(column);
        if (oldIndex > 0) columnMap.push([newIndex, oldIndex - 1]);
      });

      for (const [date, rows] of previousData) {
        previousData.set(
          date,
          rows.map((row): ResultRow => {
            const cells = new Array<Cell>(currentHeader.length - 1).fill(null);
            for (const [newIndex, oldIndex] of columnMap) {
              cells[newIndex] = row.cells[oldIndex] ?? null;
            }
            return { date: row.date, cells };
          }),
        );
      }
    }

    const data: ResultData = new Map();
    const threshold = this.getDateThreshold(report, previousData);
    for (const [date, rows] of previousData) {
      if (threshold === null || date > threshold) data.set(date, rows);
    }
    for (const [date, rows] of currentData) {
      data.set(date, rows);
    }

    return { header: currentHeader, data, newDates };
  }

  /**
   * Oldest date (exclusive, epoch ms) kept when the report caps its data
   * points, or null when it does not.
   */
  getDateThreshold(report: Report, previousData: ResultData): number | null {
    if (!report.maxDataPoints) return null;
    const candidates = [...previousData.keys()];
    if (report.start) candidates.push(report.start.getTime());
    if (candidates.length === 0) return null;
    const lastDataPoint = new Date(Math.max(...candidates));
    return addPeriod(lastDataPoint, report.granularity, -report.maxDataPoints).getTime();
  }

  private async recordToGraphite(report: Report, dates: number[]): Promise<void> {
    if (!this.graphite) return;

    const data = report.results.data;
    for (const date of [...dates].sort((a, b) => a - b)) {
      for (const row of data.get(date) ?? []) {
        await this.graphite.recordRow(row, report);
      }
    }
  }
}

function sameHeader(a: string[], b: string[]): boolean {
  return a.length === b.length && a.every((column, index) => column === b[index]);
}
