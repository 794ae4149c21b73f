/**
 * Pid Lock - Keeps two update runs on the same query folder from overlapping.
 *
 * The running instance writes its pid to the lock file and removes it when
 * done. A lock file whose pid is no longer alive was left by a run that
 * died and is ignored.
 *
 * @module storage/pid-lock
 */

import * as fs from 'node:fs';
import { errorMessage } from '../errors.js';
import { log } from '../logger.js';

/**
 * Whether a process with this pid exists.
 */
export function pidExists(pid: number): boolean {
  try {
    // signal 0 only checks for existence
    process.kill(pid, 0);
    return true;
  } catch (error: unknown) {
    const code = (error as NodeJS.ErrnoException).code;
    if (code === 'ESRCH') return false;
    // alive, but owned by another user
    if (code === 'EPERM') return true;
    throw error;
  }
}

/**
 * Whether no other instance holds the lock.
 */
export function onlyInstanceRunning(pidFilePath: string): boolean {
  if (!fs.existsSync(pidFilePath)) return true;

  let content: string;
  try {
    content = fs.readFileSync(pidFilePath, 'utf-8');
  } catch {
    // most likely a lock written by another user that is still executing
    log.warning('An instance run by another user was found.');
    return false;
  }

  const pid = Number(content.trim());
  if (!Number.isInteger(pid) || pid <= 0) {
    log.error('Could not open or parse the pid file');
    return false;
  }

  return !pidExists(pid);
}

export function writePidFile(pidFilePath: string, pid: number = process.pid): void {
  log.info('Writing the pid file.');
  fs.writeFileSync(pidFilePath, String(pid), 'utf-8');
}

/**
 * Whether the lock file holds `pid`.
 */
export function ownsPidFile(pidFilePath: string, pid: number = process.pid): boolean {
  try {
    return Number(fs.readFileSync(pidFilePath, 'utf-8').trim()) === pid;
  } catch {
    return false;
  }
}

export function deletePidFile(pidFilePath: string): void {
  log.info('Deleting the pid file.');
  try {
    fs.rmSync(pidFilePath);
  } catch (error) {
    log.error(`Unable to delete the pid file (${errorMessage(error)}).`);
  }
}
