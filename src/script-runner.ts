/**
 * Script Runner - Executes report scripts as subprocesses.
 *
 * A script is called with the interval and explode values as arguments
 * and prints its results as TSV on stdout.
 *
 * @module script-runner
 */

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';

const execFileAsync = promisify(execFile);

/** Largest stdout accepted from a script, in bytes. */
const MAX_OUTPUT_BYTES = 64 * 1024 * 1024;

/** Runs `command` with `args` and resolves with its stdout. */
export type ScriptRunner = (command: string, args: string[]) => Promise<string>;

/**
 * Create a {@link ScriptRunner} backed by `child_process.execFile`.
 *
 * Rejects when the script cannot be started, exits non-zero or is killed.
 */
export function createScriptRunner(): ScriptRunner {
  return async (command, args) => {
    try {
      const { stdout } = await execFileAsync(command, args, {
        maxBuffer: MAX_OUTPUT_BYTES,
        encoding: 'utf-8',
        env: { ...process.env },
      });
      return stdout;
    } catch (error: unknown) {
      const err = error as Error & { code?: string | number; killed?: boolean; signal?: string; stderr?: string };

      if (err.signal) {
        throw new Error(`Script ${command} was killed by ${err.signal}.`);
      }
      if (err.code === 'ENOENT' || err.code === 'EACCES') {
        throw new Error(`Script ${command} could not be started (${err.code}).`);
      }

      const stderr = err.stderr?.trim();
      throw new Error(
        `Script ${command} failed with exit code ${String(err.code ?? 'unknown')}` + (stderr ? `: ${stderr}` : '.'),
      );
    }
  };
}
