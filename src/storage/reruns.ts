/**
 * Rerun Requests - Date ranges that must be recomputed on the next run.
 *
 * A rerun file lives in `{queryFolder}/.reruns/` and holds:
 *
 *   2015-01-02        start date (inclusive)
 *   2015-01-05        end date (exclusive)
 *   report_one        one report key per remaining line
 *   report_two
 *
 * @module storage/reruns
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { getRerunsDir } from '../artifact-paths.js';
import { formatDate, parseDate } from '../dates.js';
import { errorMessage } from '../errors.js';
import { log } from '../logger.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RerunInterval {
  start: Date;
  /** Exclusive. */
  end: Date;
}

/** Report key → intervals to recompute. */
export type RerunMap = Map<string, RerunInterval[]>;

export interface PendingReruns {
  reruns: RerunMap;
  /** Files that were parsed and should be deleted once the run completes. */
  files: string[];
}

// ---------------------------------------------------------------------------
// Reading
// ---------------------------------------------------------------------------

/**
 * Parse the lines of one rerun file into `rerunMap`.
 *
 * @throws RangeError when either date line is malformed.
 */
export function parseReruns(lines: string[], rerunMap: RerunMap): void {
  const values = lines.map((line) => line.trim());
  const start = parseDate(values[0] ?? '');
  const end = parseDate(values[1] ?? '');
  for (const reportKey of values.slice(2)) {
    if (!reportKey) continue;
    const intervals = rerunMap.get(reportKey) ?? [];
    intervals.push({ start, end });
    rerunMap.set(reportKey, intervals);
  }
}

/**
 * Read every pending rerun file of a query folder.
 *
 * Files that cannot be parsed are logged and left in place.
 */
export function readReruns(queryFolder: string): PendingReruns {
  const rerunsDir = getRerunsDir(queryFolder);
  if (!fs.existsSync(rerunsDir) || !fs.statSync(rerunsDir).isDirectory()) {
    return { reruns: new Map(), files: [] };
  }

  let candidates: string[];
  try {
    candidates = fs.readdirSync(rerunsDir).sort();
  } catch (error) {
    throw new Error(`Can not read rerun folder because of: (${errorMessage(error)}).`);
  }

  const reruns: RerunMap = new Map();
  const files: string[] = [];
  for (const candidate of candidates) {
    const rerunPath = path.join(rerunsDir, candidate);
    try {
      // r+ fails while another process still holds the file for writing
      const fd = fs.openSync(rerunPath, 'r+');
      let content: string;
      try {
        content = fs.readFileSync(fd, 'utf-8');
      } finally {
        fs.closeSync(fd);
      }
      const parsed: RerunMap = new Map();
      parseReruns(content.split(/\r?\n/).filter((line) => line.trim() !== ''), parsed);
      for (const [reportKey, intervals] of parsed) {
        reruns.set(reportKey, [...(reruns.get(reportKey) ?? []), ...intervals]);
      }
      files.push(rerunPath);
    } catch (error) {
      log.warning(
        `Rerun file ${rerunPath} could not be parsed and will be ignored.  Error: ${errorMessage(error)}`,
      );
    }
  }

  return { reruns, files };
}

/**
 * Whether `date` falls inside any of the intervals.
 */
export function needsRerun(date: Date, intervals: RerunInterval[] | undefined): boolean {
  if (!intervals) return false;
  const time = date.getTime();
  return intervals.some(({ start, end }) => time >= start.getTime() && time < end.getTime());
}

/**
 * Delete rerun files that have been processed.
 */
export function deleteReruns(files: string[]): void {
  for (const file of files) {
    try {
      fs.rmSync(file);
    } catch {
      log.warning(`Rerun file ${file} could not be deleted.`);
    }
  }
}

// ---------------------------------------------------------------------------
// Writing
// ---------------------------------------------------------------------------

/**
 * Write a rerun request and return its path.
 *
 * @param now - Used for the file name; defaults to the current time.
 */
export function writeRerunFile(
  queryFolder: string,
  interval: RerunInterval,
  reportKeys: string[],
  now: Date = new Date(),
): string {
  const rerunsDir = getRerunsDir(queryFolder);
  fs.mkdirSync(rerunsDir, { recursive: true });

  const rerunPath = path.join(rerunsDir, String(now.getTime()));
  const lines = [formatDate(interval.start), formatDate(interval.end), ...reportKeys];
  fs.writeFileSync(rerunPath, lines.map((line) => line + '\n').join(''), 'utf-8');
  return rerunPath;
}
