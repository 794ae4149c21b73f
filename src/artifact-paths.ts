/**
 * Path Conventions - Where the updater finds its inputs and writes outputs.
 *
 * Query folder layout:
 *   {queryFolder}/
 *     config.yaml
 *     .reportupdater.pid
 *     .reruns/
 *       {epoch-ms}
 *     {report}.sql
 *     {script}
 *
 * Output folder layout:
 *   {outputFolder}/
 *     {report}.tsv
 *     {report}/{value-1}/.../{value-n}.tsv   (exploded reports)
 *
 * @module artifact-paths
 */

import path from 'node:path';
import fs from 'node:fs';

// ---------------------------------------------------------------------------
// Query folder
// ---------------------------------------------------------------------------

/** Default YAML config of a query folder. */
export function getConfigPath(queryFolder: string): string {
  return path.join(queryFolder, 'config.yaml');
}

/** Lock file that keeps two runs from overlapping. */
export function getPidFilePath(queryFolder: string): string {
  return path.join(queryFolder, '.reportupdater.pid');
}

/** Folder holding pending rerun requests. */
export function getRerunsDir(queryFolder: string): string {
  return path.join(queryFolder, '.reruns');
}

/** SQL template of a report. */
export function getSqlTemplatePath(queryFolder: string, executable: string): string {
  return path.join(queryFolder, `${executable}.sql`);
}

/** Executable script of a report. */
export function getScriptPath(queryFolder: string, executable: string): string {
  return path.join(queryFolder, executable);
}

// ---------------------------------------------------------------------------
// Output folder
// ---------------------------------------------------------------------------

/**
 * TSV file of a report, without touching the filesystem.
 *
 * Exploded reports nest one directory per placeholder (sorted by
 * placeholder name) and use the last placeholder's value as file name.
 */
export function getReportOutputPath(
  outputFolder: string,
  reportKey: string,
  explodeBy: Record<string, string> = {},
): string {
  const placeholders = Object.keys(explodeBy).sort();
  if (placeholders.length === 0) {
    return path.join(outputFolder, `${reportKey}.tsv`);
  }
  const values = placeholders.map((placeholder) => explodeBy[placeholder]);
  const fileName = `${values[values.length - 1]}.tsv`;
  return path.join(outputFolder, reportKey, ...values.slice(0, -1), fileName);
}

/**
 * Create the directory that will hold `filePath`.
 *
 * Safe to call repeatedly.
 */
export function ensureParentDir(filePath: string): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
}
