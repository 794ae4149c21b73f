/**
 * Tests for src/storage/reruns.ts and src/storage/pid-lock.ts
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import { join } from 'node:path';
import { utcDate } from '../../src/dates.js';
import { configureLogger, resetLogger } from '../../src/logger.js';
import {
  deletePidFile,
  onlyInstanceRunning,
  ownsPidFile,
  pidExists,
  writePidFile,
} from '../../src/storage/pid-lock.js';
import {
  deleteReruns,
  needsRerun,
  parseReruns,
  readReruns,
  writeRerunFile,
  type RerunMap,
} from '../../src/storage/reruns.js';
import { createTempWorkspace, type TempWorkspace } from '../helpers/test-harness.js';

describe('storage', () => {
  let ws: TempWorkspace;

  beforeEach(() => {
    ws = createTempWorkspace();
    configureLogger({ level: 'debug', logFile: join(ws.path, 'test.log') });
  });

  afterEach(() => {
    resetLogger();
    ws.cleanup();
  });

  const logText = () => fs.readFileSync(join(ws.path, 'test.log'), 'utf-8');

  describe('reruns', () => {
    it('should parse one interval per listed report', () => {
      const map: RerunMap = new Map();
      parseReruns(['2015-01-02', '2015-01-05', 'report_one', 'report_two'], map);
      expect(Object.fromEntries(map)).toEqual({
        report_one: [{ start: utcDate(2015, 1, 2), end: utcDate(2015, 1, 5) }],
        report_two: [{ start: utcDate(2015, 1, 2), end: utcDate(2015, 1, 5) }],
      });
    });

    it('should key reports named like object properties', () => {
      const map: RerunMap = new Map();
      parseReruns(['2015-01-02', '2015-01-05', 'constructor'], map);
      expect(map.get('constructor')).toEqual([{ start: utcDate(2015, 1, 2), end: utcDate(2015, 1, 5) }]);
      expect(map.get('toString')).toBeUndefined();
      expect(needsRerun(utcDate(2015, 1, 3), map.get('hasOwnProperty'))).toBe(false);
    });

    it('should treat intervals as start-inclusive and end-exclusive', () => {
      const intervals = [{ start: utcDate(2015, 1, 2), end: utcDate(2015, 1, 5) }];
      expect(needsRerun(utcDate(2015, 1, 1), intervals)).toBe(false);
      expect(needsRerun(utcDate(2015, 1, 2), intervals)).toBe(true);
      expect(needsRerun(utcDate(2015, 1, 4), intervals)).toBe(true);
      expect(needsRerun(utcDate(2015, 1, 5), intervals)).toBe(false);
      expect(needsRerun(utcDate(2015, 1, 3), undefined)).toBe(false);
    });

    it('should return nothing without a reruns folder', () => {
      expect(readReruns(ws.queryFolder)).toEqual({ reruns: new Map(), files: [] });
    });

    it('should merge every rerun file and list them for deletion', () => {
      const first = writeRerunFile(
        ws.queryFolder,
        { start: utcDate(2015, 1, 1), end: utcDate(2015, 1, 2) },
        ['report_one'],
        new Date(1000),
      );
      const second = writeRerunFile(
        ws.queryFolder,
        { start: utcDate(2015, 2, 1), end: utcDate(2015, 3, 1) },
        ['report_one', 'report_two'],
        new Date(2000),
      );
      expect(fs.readFileSync(first, 'utf-8')).toBe('2015-01-01\n2015-01-02\nreport_one\n');

      const pending = readReruns(ws.queryFolder);
      expect(pending.files).toEqual([first, second]);
      expect(pending.reruns.get('report_one')).toHaveLength(2);
      expect(pending.reruns.get('report_two')).toEqual([{ start: utcDate(2015, 2, 1), end: utcDate(2015, 3, 1) }]);

      deleteReruns(pending.files);
      expect(fs.readdirSync(join(ws.queryFolder, '.reruns'))).toEqual([]);
    });

    it('should ignore and keep a file that cannot be parsed', () => {
      ws.writeQueryFile('.reruns/1', 'not a date\n2015-01-02\nreport_one\n');
      const pending = readReruns(ws.queryFolder);
      expect(pending).toEqual({ reruns: new Map(), files: [] });
      expect(logText()).toContain('could not be parsed and will be ignored.');
      expect(fs.existsSync(join(ws.queryFolder, '.reruns', '1'))).toBe(true);
    });
  });

  describe('pid lock', () => {
    it('should detect live and dead processes', () => {
      expect(pidExists(process.pid)).toBe(true);
      // pids are far below this on every supported platform
      expect(pidExists(2 ** 22 + 12345)).toBe(false);
    });

    it('should be free without a pid file', () => {
      expect(onlyInstanceRunning(join(ws.queryFolder, '.reportupdater.pid'))).toBe(true);
    });

    it('should be taken while the writing process is alive', () => {
      const pidFile = join(ws.queryFolder, '.reportupdater.pid');
      writePidFile(pidFile);
      expect(fs.readFileSync(pidFile, 'utf-8')).toBe(String(process.pid));
      expect(onlyInstanceRunning(pidFile)).toBe(false);
      expect(ownsPidFile(pidFile)).toBe(true);

      deletePidFile(pidFile);
      expect(fs.existsSync(pidFile)).toBe(false);
      expect(onlyInstanceRunning(pidFile)).toBe(true);
    });

    it('should ignore a pid file left by a dead process', () => {
      const pidFile = join(ws.queryFolder, '.reportupdater.pid');
      writePidFile(pidFile, 2 ** 22 + 12345);
      expect(onlyInstanceRunning(pidFile)).toBe(true);
      expect(ownsPidFile(pidFile)).toBe(false);
    });

    it('should refuse to run when the pid file is garbage', () => {
      const pidFile = ws.writeQueryFile('.reportupdater.pid', 'abc');
      expect(onlyInstanceRunning(pidFile)).toBe(false);
      expect(logText()).toContain('ERROR - Could not open or parse the pid file');
    });

    it('should log when the pid file cannot be deleted', () => {
      deletePidFile(join(ws.queryFolder, 'missing.pid'));
      expect(logText()).toContain('ERROR - Unable to delete the pid file');
    });
  });
});
