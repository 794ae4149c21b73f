/**
 * Tests for src/pipeline/writer.ts and src/storage/report-store.ts
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import { join } from 'node:path';
import { Executor } from '../../src/pipeline/executor.js';
import { Reader } from '../../src/pipeline/reader.js';
import { Selector } from '../../src/pipeline/selector.js';
import { Writer } from '../../src/pipeline/writer.js';
import { getPreviousResults, writeReportFile } from '../../src/storage/report-store.js';
import { utcDate } from '../../src/dates.js';
import { configureLogger, resetLogger } from '../../src/logger.js';
import type { Report, ResultData, ResultRow } from '../../src/report.js';
import { createTempWorkspace, makeContext, sampleReport, type TempWorkspace } from '../helpers/test-harness.js';

function resultsOf(header: string[], rows: ResultRow[]): Report['results'] {
  const data: ResultData = new Map();
  for (const row of rows) {
    const existing = data.get(row.date.getTime());
    if (existing) existing.push(row);
    else data.set(row.date.getTime(), [row]);
  }
  return { header, data };
}

describe('report store', () => {
  let ws: TempWorkspace;

  beforeEach(() => {
    ws = createTempWorkspace();
  });

  afterEach(() => {
    ws.cleanup();
  });

  it('should return empty results when the report has no file yet', () => {
    const previous = getPreviousResults(sampleReport(), ws.outputFolder, new Map());
    expect(previous.header).toEqual([]);
    expect(previous.data.size).toBe(0);
  });

  it('should read previous rows by date', () => {
    ws.writeOutputFile('reportupdater_test.tsv', 'date\tvalue\n2015-01-01\t1\n2015-01-02\t\n');
    const previous = getPreviousResults(sampleReport(), ws.outputFolder, new Map());
    expect(previous.header).toEqual(['date', 'value']);
    expect(previous.data.get(Date.UTC(2015, 0, 2))).toEqual([{ date: utcDate(2015, 1, 2), cells: [''] }]);
  });

  it('should read previous rows of a report named like an object property', () => {
    ws.writeOutputFile('constructor.tsv', 'date\tvalue\n2015-01-01\t1\n');
    const previous = getPreviousResults(sampleReport({ key: 'constructor' }), ws.outputFolder, new Map());
    expect(previous.data.get(Date.UTC(2015, 0, 1))).toEqual([{ date: utcDate(2015, 1, 1), cells: ['1'] }]);
  });

  it('should reject rows whose first column is not a date', () => {
    ws.writeOutputFile('reportupdater_test.tsv', 'date\tvalue\nJan 1\t1\n');
    expect(() => getPreviousResults(sampleReport(), ws.outputFolder, new Map())).toThrow(
      'Output file date does not match date format.',
    );
  });

  it('should write exploded reports into nested folders', () => {
    const report = sampleReport({ explodeBy: { wiki: 'enwiki', editor: 'anon' } });
    const data = resultsOf(['date', 'v'], [{ date: utcDate(2015, 1, 1), cells: [1] }]).data;
    const written = writeReportFile(report, ws.outputFolder, ['date', 'v'], data);

    expect(written).toBe(join(ws.outputFolder, 'reportupdater_test', 'anon', 'enwiki.tsv'));
    expect(fs.readFileSync(written, 'utf-8')).toBe('date\tv\n2015-01-01\t1\n');
    expect(fs.existsSync(`${written}.tmp`)).toBe(false);
  });
});

describe('Writer', () => {
  let ws: TempWorkspace;

  beforeEach(() => {
    ws = createTempWorkspace();
    configureLogger({ level: 'critical', logFile: join(ws.path, 'test.log') });
  });

  afterEach(() => {
    resetLogger();
    ws.cleanup();
  });

  function writerFor(): Writer {
    const context = makeContext(ws, {});
    const executor = new Executor(new Selector(new Reader(context), context), context);
    return new Writer(executor, context);
  }

  function executedReport(header: string[], rows: ResultRow[], overrides: Partial<Report> = {}): Report {
    const report = sampleReport(overrides);
    report.start = rows[0]?.date ?? utcDate(2015, 1, 1);
    report.end = utcDate(2015, 1, 10);
    report.results = resultsOf(header, rows);
    return report;
  }

  describe('updateResults', () => {
    it('should append new dates to previous results', () => {
      ws.writeOutputFile('reportupdater_test.tsv', 'date\tvalue\n2015-01-01\t1\n');
      const report = executedReport(['date', 'value'], [{ date: utcDate(2015, 1, 2), cells: [2] }]);

      const { header, data, newDates } = writerFor().updateResults(report);
      expect(header).toEqual(['date', 'value']);
      expect([...data.keys()]).toEqual([Date.UTC(2015, 0, 1), Date.UTC(2015, 0, 2)]);
      expect(newDates).toEqual([Date.UTC(2015, 0, 2)]);
    });

    it('should overwrite rerun dates without counting them as new', () => {
      ws.writeOutputFile('reportupdater_test.tsv', 'date\tvalue\n2015-01-01\t1\n');
      const report = executedReport(['date', 'value'], [{ date: utcDate(2015, 1, 1), cells: [10] }]);

      const { data, newDates } = writerFor().updateResults(report);
      expect(data.get(Date.UTC(2015, 0, 1))).toEqual([{ date: utcDate(2015, 1, 1), cells: [10] }]);
      expect(newDates).toEqual([]);
    });

    it('should re-map previous rows when columns change', () => {
      ws.writeOutputFile('reportupdater_test.tsv', 'date\told\tshared\n2015-01-01\to1\ts1\n');
      const report = executedReport(['date', 'shared', 'added'], [{ date: utcDate(2015, 1, 2), cells: ['s2', 'a2'] }]);

      const { header, data } = writerFor().updateResults(report);
      expect(header).toEqual(['date', 'shared', 'added', 'old']);
      expect(data.get(Date.UTC(2015, 0, 1))).toEqual([{ date: utcDate(2015, 1, 1), cells: ['s1', null, 'o1'] }]);
      expect(data.get(Date.UTC(2015, 0, 2))).toEqual([{ date: utcDate(2015, 1, 2), cells: ['s2', 'a2', null] }]);
    });

    it('should drop dates older than max_data_points', () => {
      ws.writeOutputFile('reportupdater_test.tsv', 'date\tv\n2015-01-01\t1\n2015-01-02\t2\n2015-01-03\t3\n');
      const report = executedReport(['date', 'v'], [{ date: utcDate(2015, 1, 4), cells: [4] }], { maxDataPoints: 2 });

      const { data } = writerFor().updateResults(report);
      expect([...data.keys()].sort((a, b) => a - b)).toEqual([Date.UTC(2015, 0, 3), Date.UTC(2015, 0, 4)]);
    });

    it('should reject rows that do not match the header', () => {
      const report = executedReport(['date', 'a', 'b'], [{ date: utcDate(2015, 1, 1), cells: [1] }]);
      expect(() => writerFor().updateResults(report)).toThrow('Results and header do not match.');
    });

    it('should keep every row of a funnel date', () => {
      const rows = [
        { date: utcDate(2015, 1, 1), cells: ['step1', 10] },
        { date: utcDate(2015, 1, 1), cells: ['step2', 4] },
      ];
      const report = executedReport(['date', 'step', 'n'], rows, { isFunnel: true });
      const { data } = writerFor().updateResults(report);
      expect(data.get(Date.UTC(2015, 0, 1))).toHaveLength(2);
    });
  });

  describe('getDateThreshold', () => {
    it('should be null without max_data_points', () => {
      const report = executedReport(['date', 'v'], [{ date: utcDate(2015, 1, 4), cells: [4] }]);
      expect(writerFor().getDateThreshold(report, new Map())).toBeNull();
    });

    it('should count back from the newest date', () => {
      const report = executedReport(['date', 'v'], [{ date: utcDate(2015, 3, 1), cells: [4] }], {
        granularity: 'months',
        maxDataPoints: 2,
      });
      expect(writerFor().getDateThreshold(report, new Map())).toBe(Date.UTC(2015, 0, 1));
    });
  });
});
