/**
 * Report Store - Reads and writes the TSV file of a report.
 *
 * @module storage/report-store
 */

import * as fs from 'node:fs';
import { ensureParentDir, getReportOutputPath } from '../artifact-paths.js';
import { formatDate, parseDate } from '../dates.js';
import { errorMessage } from '../errors.js';
import { type Report, type ReportResults, type ResultData, type ResultRow } from '../report.js';
import { parseTsv, stringifyTsv, type TsvField } from '../tsv.js';
import { needsRerun, type RerunMap } from './reruns.js';

/**
 * TSV path of an (exploded) report.
 */
export function getReportPath(report: Report, outputFolder: string): string {
  return getReportOutputPath(outputFolder, report.key, report.explodedValues());
}

/**
 * Read the results already written for a report.
 *
 * Dates covered by a rerun request for this report are left out, so the
 * selector schedules them again. A missing file yields empty results.
 */
export function getPreviousResults(
  report: Report,
  outputFolder: string,
  reruns: RerunMap,
): ReportResults {
  const outputPath = getReportPath(report, outputFolder);
  const data: ResultData = new Map();
  if (!fs.existsSync(outputPath)) {
    return { header: [], data };
  }

  let content: string;
  try {
    content = fs.readFileSync(outputPath, 'utf-8');
  } catch (error) {
    throw new Error(`Could not read the output file (${errorMessage(error)}).`);
  }

  const [header = [], ...rows] = parseTsv(content);
  const intervals = reruns.get(report.key);
  for (const [rawDate, ...cells] of rows) {
    let date: Date;
    try {
      date = parseDate(rawDate ?? '');
    } catch {
      throw new Error('Output file date does not match date format.');
    }
    if (needsRerun(date, intervals)) continue;

    const row: ResultRow = { date, cells };
    const existing = data.get(date.getTime());
    if (report.isFunnel && existing) {
      existing.push(row);
    } else {
      data.set(date.getTime(), [row]);
    }
  }

  return { header, data };
}

/**
 * Atomically replace a report's TSV with `header` and `data`.
 *
 * Rows are written in date order through a `.tmp` file that is then renamed
 * over the destination.
 */
export function writeReportFile(
  report: Report,
  outputFolder: string,
  header: string[],
  data: ResultData,
): string {
  const outputPath = getReportPath(report, outputFolder);
  const tempPath = `${outputPath}.tmp`;
  ensureParentDir(outputPath);

  const lines: TsvField[][] = [header];
  const dates = [...data.keys()].sort((a, b) => a - b);
  for (const date of dates) {
    for (const row of data.get(date) ?? []) {
      lines.push([formatDate(row.date), ...row.cells]);
    }
  }

  try {
    fs.writeFileSync(tempPath, stringifyTsv(lines), 'utf-8');
  } catch (error) {
    throw new Error(`Could not write the temporary output file (${errorMessage(error)}).`);
  }
  try {
    fs.renameSync(tempPath, outputPath);
  } catch (error) {
    throw new Error(`Could not rename the output file (${errorMessage(error)}).`);
  }
  return outputPath;
}
