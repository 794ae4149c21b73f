/**
 * Selector - Second pipeline stage.
 *
 * Decides which intervals of each report are due:
 *   1. explodes a report into one report per combination of its
 *      `explode_by` values;
 *   2. splits each into one-granularity intervals between its first date
 *      and the last complete interval, skipping intervals whose date is
 *      already in the report's TSV (unless a rerun asks for them).
 *
 * @module pipeline/selector
 */

import { addPeriod, formatDate, isValidDate, truncateDate } from '../dates.js';
import { errorMessage, InvalidValueError, raiseCritical } from '../errors.js';
import { log } from '../logger.js';
import type { Report } from '../report.js';
import { getPreviousResults } from '../storage/report-store.js';
import { reportFailure, type PipelineContext } from './context.js';
import type { Reader } from './reader.js';

export class Selector {
  constructor(
    private readonly reader: Reader,
    private readonly context: PipelineContext,
  ) {}

  /**
   * Yield one report per interval that needs computing.
   */
  *select(): Generator<Report> {
    const now = this.context.currentExecTime;
    if (!isValidDate(now)) {
      raiseCritical('Current exec time is not a date.');
    }

    for (const report of this.reader.read()) {
      log.debug(`Triaging "${report.toString()}"...`);
      let intervalReports: Report[];
      try {
        intervalReports = this.explode(report).flatMap((exploded) => this.getIntervalReports(exploded, now));
      } catch (error) {
        log.error(reportFailure(report.key, 'triaged for execution', errorMessage(error)));
        continue;
      }
      yield* intervalReports;
    }
  }

  getIntervalReports(report: Report, now: Date): Report[] {
    if (!report.firstDate) {
      throw new InvalidValueError('Report has no first date.');
    }
    const { granularity } = report;

    let firstDate = truncateDate(report.firstDate, granularity);
    const relativeNow = addPeriod(new Date(now.getTime() - report.lag * 1000), granularity, -1);
    const lastDate = truncateDate(relativeNow, granularity);
    if (report.maxDataPoints) {
      const earliest = addPeriod(lastDate, granularity, -(report.maxDataPoints - 1));
      if (earliest > firstDate) firstDate = earliest;
    }

    const previous = getPreviousResults(report, this.context.outputFolder, this.context.reruns);
    const doneDates = new Set(previous.data.keys());
    log.debug(
      `Already done dates: ${JSON.stringify(
        [...doneDates].sort((a, b) => a - b).map((time) => formatDate(new Date(time))),
      )}`,
    );

    const intervalReports: Report[] = [];
    for (const start of this.getAllStartDates(firstDate, lastDate, report)) {
      if (doneDates.has(start.getTime())) continue;
      const copy = report.clone();
      copy.start = start;
      copy.end = addPeriod(start, granularity);
      intervalReports.push(copy);
    }
    return intervalReports;
  }

  /**
   * Interval starts from `firstDate` up to and including `lastDate`.
   */
  getAllStartDates(firstDate: Date, lastDate: Date, report: Pick<Report, 'granularity'>): Date[] {
    if (firstDate > lastDate) {
      throw new InvalidValueError('First date is greater than current date.');
    }
    const starts: Date[] = [];
    for (let start = firstDate; start <= lastDate; start = addPeriod(start, report.granularity)) {
      starts.push(start);
    }
    return starts;
  }

  /**
   * One report per combination of explode values, placeholders taken in
   * name order. A report without placeholders is returned as is.
   */
  explode(report: Report): Report[] {
    const placeholders = Object.keys(report.explodeBy).sort();
    let exploded: Report[] = [report];

    for (const placeholder of placeholders) {
      const next: Report[] = [];
      for (const partial of exploded) {
        const value = partial.explodeBy[placeholder];
        const values = Array.isArray(value) ? value : [value];
        for (const single of values) {
          const copy = partial.clone();
          copy.explodeBy[placeholder] = single;
          next.push(copy);
        }
      }
      exploded = next;
    }

    return exploded;
  }
}
