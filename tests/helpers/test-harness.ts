/**
 * Test Harness
 *
 * Temporary query/output folders, in-process stand-ins for MySQL and
 * Graphite, a recording script runner, and sample factories for reports
 * and pipeline contexts.
 */

import { mkdirSync, writeFileSync, rmSync, existsSync, readFileSync } from 'node:fs';
import { join, dirname } from 'node:path';
import { tmpdir } from 'node:os';
import { randomBytes } from 'node:crypto';
import * as net from 'node:net';
import type { ConnectionFactory, ConnectionSettings, QueryResult } from '../../src/db/mysql-client.js';
import type { PipelineContext } from '../../src/pipeline/context.js';
import { Report } from '../../src/report.js';
import type { ScriptRunner } from '../../src/script-runner.js';
import { utcDate } from '../../src/dates.js';

// ---------------------------------------------------------------------------
// Temporary Workspace
// ---------------------------------------------------------------------------

/** The value returned by `createTempWorkspace`. */
export interface TempWorkspace {
  /** Root of the temporary directory. */
  path: string;
  /** `<path>/queries`, holding config.yaml, templates and scripts. */
  queryFolder: string;
  /** `<path>/output`, where reports are written. */
  outputFolder: string;
  /** Write a file relative to the query folder. */
  writeQueryFile: (name: string, content: string, mode?: number) => string;
  /** Write a file relative to the output folder. */
  writeOutputFile: (name: string, content: string) => string;
  /** Read a file relative to the output folder. */
  readOutputFile: (name: string) => string;
  /** Remove the entire temporary tree. Safe to call more than once. */
  cleanup: () => void;
}

/**
 * Create a temporary directory with an empty query folder and output folder.
 */
export function createTempWorkspace(): TempWorkspace {
  const id = randomBytes(8).toString('hex');
  const basePath = join(tmpdir(), `report-updater-test-${id}`);
  const queryFolder = join(basePath, 'queries');
  const outputFolder = join(basePath, 'output');

  mkdirSync(queryFolder, { recursive: true });
  mkdirSync(outputFolder, { recursive: true });

  let cleaned = false;

  function cleanup(): void {
    if (cleaned) return;
    cleaned = true;
    if (existsSync(basePath)) {
      rmSync(basePath, { recursive: true, force: true });
    }
  }

  function writeInto(folder: string, name: string, content: string, mode?: number): string {
    const filePath = join(folder, name);
    mkdirSync(dirname(filePath), { recursive: true });
    writeFileSync(filePath, content, { encoding: 'utf-8', mode });
    return filePath;
  }

  return {
    path: basePath,
    queryFolder,
    outputFolder,
    writeQueryFile: (name, content, mode) => writeInto(queryFolder, name, content, mode),
    writeOutputFile: (name, content) => writeInto(outputFolder, name, content),
    readOutputFile: (name) => readFileSync(join(outputFolder, name), 'utf-8'),
    cleanup,
  };
}

// ---------------------------------------------------------------------------
// Database Mock
// ---------------------------------------------------------------------------

/** Answers one SQL statement. */
export type QueryHandler = (sql: string, settings: ConnectionSettings) => QueryResult | Promise<QueryResult>;

/** The object returned by `mockConnectionFactory`. */
export interface MockDatabase {
  connect: ConnectionFactory;
  /** Settings of every opened connection, in order. */
  connections: ConnectionSettings[];
  /** Every executed statement, in order. */
  queries: string[];
  /** Number of connections closed. */
  closed: number;
}

/**
 * In-memory stand-in for the MySQL connection factory.
 *
 * @example
 * ```ts
 * const db = mockConnectionFactory(() => ({ header: ['date', 'value'], rows: [['2015-01-01', 1]] }));
 * const executor = new Executor(selector, context, { connect: db.connect });
 * ```
 */
export function mockConnectionFactory(handler: QueryHandler): MockDatabase {
  const db: MockDatabase = {
    connections: [],
    queries: [],
    closed: 0,
    connect: async (settings) => {
      db.connections.push(settings);
      return {
        query: async (sql) => {
          db.queries.push(sql);
          return handler(sql, settings);
        },
        close: async () => {
          db.closed++;
        },
      };
    },
  };
  return db;
}

// ---------------------------------------------------------------------------
// Script Runner Mock
// ---------------------------------------------------------------------------

export interface MockScriptRunner {
  run: ScriptRunner;
  calls: Array<{ command: string; args: string[] }>;
}

/**
 * Script runner that records its calls and answers with `respond`.
 */
export function mockScriptRunner(respond: (command: string, args: string[]) => string): MockScriptRunner {
  const calls: MockScriptRunner['calls'] = [];
  return {
    calls,
    run: async (command, args) => {
      calls.push({ command, args });
      return respond(command, args);
    },
  };
}

// ---------------------------------------------------------------------------
// Graphite Line Server
// ---------------------------------------------------------------------------

/** The value returned by `startLineServer`. */
export interface LineServer {
  port: number;
  /** Every line received, in arrival order. */
  lines: string[];
  close: () => Promise<void>;
}

/**
 * In-process TCP server collecting Graphite plaintext lines on 127.0.0.1.
 */
export async function startLineServer(): Promise<LineServer> {
  const lines: string[] = [];
  const server = net.createServer((socket) => {
    let buffer = '';
    socket.setEncoding('utf-8');
    socket.on('data', (chunk: string) => {
      buffer += chunk;
    });
    socket.on('end', () => {
      lines.push(...buffer.split('\n').filter((line) => line !== ''));
    });
  });
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Line server has no TCP address');
  }
  return {
    port: address.port,
    lines,
    close: () => new Promise<void>((resolve) => server.close(() => resolve())),
  };
}

/**
 * Wait up to a second for `count` lines to arrive.
 */
export async function waitForLines(server: LineServer, count: number): Promise<void> {
  for (let i = 0; i < 100 && server.lines.length < count; i++) {
    await new Promise((resolve) => setTimeout(resolve, 10));
  }
}

// ---------------------------------------------------------------------------
// Sample Data Factories
// ---------------------------------------------------------------------------

/**
 * A daily SQL report starting 2015-01-01 with no interval assigned.
 */
export function sampleReport(overrides: Partial<Report> = {}): Report {
  const report = new Report();
  report.key = 'reportupdater_test';
  report.type = 'sql';
  report.granularity = 'days';
  report.firstDate = utcDate(2015, 1, 1);
  report.dbKey = 'reportupdater_db';
  report.sqlTemplate = 'SELECT date, value FROM table WHERE date >= {from_timestamp} AND date < {to_timestamp};';
  Object.assign(report, overrides);
  return report;
}

/**
 * Pipeline context over a workspace. `now` defaults to 2015-01-03 (UTC).
 */
export function makeContext(
  workspace: Pick<TempWorkspace, 'queryFolder' | 'outputFolder'>,
  config: Record<string, unknown>,
  overrides: Partial<PipelineContext> = {},
): PipelineContext {
  return {
    config,
    currentExecTime: utcDate(2015, 1, 3),
    queryFolder: workspace.queryFolder,
    outputFolder: workspace.outputFolder,
    reruns: new Map(),
    ...overrides,
  };
}
