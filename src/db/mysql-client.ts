/**
 * MySQL access for SQL reports.
 *
 * The executor only depends on {@link DatabaseConnection}; this module
 * provides the mysql2-backed implementation used outside of tests.
 *
 * @module db/mysql-client
 */

import mysql from 'mysql2/promise';
import type { Connection, ConnectionOptions, FieldPacket } from 'mysql2/promise';
import { errorMessage } from '../errors.js';
import { readClientCredentials, type ClientCredentials } from './credentials.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ConnectionSettings {
  host: string;
  port: number;
  /** Option file holding the `[client]` user and password. */
  credsFile: string;
  database: string;
}

export interface QueryResult {
  header: string[];
  rows: unknown[][];
}

export interface DatabaseConnection {
  query(sql: string): Promise<QueryResult>;
  close(): Promise<void>;
}

export type ConnectionFactory = (settings: ConnectionSettings) => Promise<DatabaseConnection>;

// ---------------------------------------------------------------------------
// mysql2 implementation
// ---------------------------------------------------------------------------

/**
 * mysql2 options for a database target. Dates are read as UTC; BIGINT and
 * DECIMAL values arrive as strings so large counts keep every digit.
 */
export function buildConnectionOptions(settings: ConnectionSettings, credentials: ClientCredentials): ConnectionOptions {
  return {
    host: settings.host,
    port: settings.port,
    user: credentials.user,
    password: credentials.password,
    database: settings.database,
    charset: 'utf8mb4',
    timezone: 'Z',
    supportBigNumbers: true,
    bigNumberStrings: true,
  };
}

/**
 * Open a MySQL connection that returns rows as arrays.
 */
export const createMysqlConnection: ConnectionFactory = async (settings) => {
  const credentials = readClientCredentials(settings.credsFile);

  let connection: Connection;
  try {
    connection = await mysql.createConnection(buildConnectionOptions(settings, credentials));
  } catch (error) {
    throw new Error(`MySQL can not connect to database (${errorMessage(error)}).`);
  }

  return {
    async query(sql: string): Promise<QueryResult> {
      let result: [unknown, FieldPacket[]];
      try {
        result = await connection.query({ sql, rowsAsArray: true });
      } catch (error) {
        throw new Error(`MySQL can not execute query (${errorMessage(error)}).`);
      }
      const [rows, fields] = result;
      if (!Array.isArray(rows)) {
        throw new Error('MySQL query did not return rows.');
      }
      return {
        header: fields.map((field) => field.name),
        rows: rows.filter((row): row is unknown[] => Array.isArray(row)),
      };
    },

    async close(): Promise<void> {
      await connection.end();
    },
  };
};
