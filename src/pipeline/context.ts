/**
 * State shared by the pipeline stages of one run.
 *
 * @module pipeline/context
 */

import type { UpdaterConfig } from '../config.js';
import type { RerunMap } from '../storage/reruns.js';

export interface PipelineContext {
  /** Parsed `config.yaml`. */
  config: UpdaterConfig;
  /** Start of this run (UTC); every report is scheduled against it. */
  currentExecTime: Date;
  queryFolder: string;
  outputFolder: string;
  /** Pending rerun intervals by report key. */
  reruns: RerunMap;
}

/** Stage failure message, logged before moving on to the next report. */
export function reportFailure(reportKey: string, action: string, error: string): string {
  return `Report "${reportKey}" could not be ${action} because of error: ${error}`;
}
