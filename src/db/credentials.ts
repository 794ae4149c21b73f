/**
 * MySQL option-file credentials (`my.cnf` style).
 *
 *   [client]
 *   user = research
 *   password = "test-secret"
 *
 * @module db/credentials
 */

import * as fs from 'node:fs';
import { errorMessage } from '../errors.js';

export interface ClientCredentials {
  user?: string;
  password?: string;
}

/**
 * Parse the sections of an option file into key/value maps.
 */
export function parseOptionFile(content: string): Record<string, Record<string, string>> {
  const sections: Record<string, Record<string, string>> = {};
  let current: Record<string, string> | null = null;

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#') || line.startsWith(';')) continue;

    const section = /^\[([^\]]+)\]$/.exec(line);
    if (section) {
      current = sections[section[1].trim()] ??= {};
      continue;
    }
    if (!current) continue;

    const eq = line.indexOf('=');
    const key = (eq === -1 ? line : line.slice(0, eq)).trim();
    let value = eq === -1 ? '' : line.slice(eq + 1).trim();
    if (value.length >= 2 && (value[0] === '"' || value[0] === "'") && value[value.length - 1] === value[0]) {
      value = value.slice(1, -1);
    }
    current[key] = value;
  }

  return sections;
}

/**
 * Read the `[client]` section of an option file.
 *
 * @throws Error when the file cannot be read.
 */
export function readClientCredentials(filePath: string): ClientCredentials {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new Error(`Could not read the credentials file (${errorMessage(error)}).`);
  }

  const client = parseOptionFile(content).client ?? {};
  const credentials: ClientCredentials = {};
  if (client.user !== undefined) credentials.user = client.user;
  if (client.password !== undefined) credentials.password = client.password;
  return credentials;
}
