/**
 * Shard Resolver - Finds the analytics replica that hosts a wiki database.
 *
 * Wiki databases are spread over sections (`s1`, `s2`, ...). The section of
 * each database is read from the `dblists/s<N>.dblist` files of a
 * mediawiki-config checkout; the host and port of a section come from the
 * DNS SRV record `_<section>-analytics._tcp.eqiad.wmnet`.
 *
 * @module db/shard-resolver
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { promises as dns } from 'node:dns';

export interface SrvRecord {
  name: string;
  port: number;
}

export type SrvResolver = (hostname: string) => Promise<SrvRecord[]>;

export interface ShardLookupOptions {
  /** Checkout of mediawiki-config holding `dblists/`. */
  mwConfigPath: string;
  /** Route every database to the `x1` section. */
  useX1: boolean;
}

const SECTION_DBLIST = /^s\d+\.dblist$/;

/**
 * Map every database listed in the section dblists to its section name.
 */
export function readSectionMapping(mwConfigPath: string, useX1: boolean): Map<string, string> {
  const dblistDir = path.join(mwConfigPath, 'dblists');
  let files: string[];
  if (useX1) {
    files = ['all.dblist'];
  } else {
    files = fs.existsSync(dblistDir) ? fs.readdirSync(dblistDir).filter((f) => SECTION_DBLIST.test(f)).sort() : [];
  }

  const mapping = new Map<string, string>();
  for (const file of files) {
    const filePath = path.join(dblistDir, file);
    if (!fs.existsSync(filePath)) continue;
    const section = path.basename(file, '.dblist');
    for (const line of fs.readFileSync(filePath, 'utf-8').split(/\r?\n/)) {
      const db = line.trim();
      if (db) mapping.set(db, section);
    }
  }
  return mapping;
}

export class ShardResolver {
  private mapping: Map<string, string> | null = null;

  constructor(private readonly resolveSrv: SrvResolver = (hostname) => dns.resolveSrv(hostname)) {}

  /**
   * Section that hosts `dbName`.
   *
   * @throws Error when no dblists were found or the database is not listed.
   */
  getSection(dbName: string, options: ShardLookupOptions): string {
    if (dbName === 'staging') return 'staging';
    // centralauth is not listed in the section dblists
    if (dbName === 'centralauth') return 's7';

    if (!this.mapping || this.mapping.size === 0) {
      this.mapping = readSectionMapping(options.mwConfigPath, options.useX1);
    }
    if (this.mapping.size === 0) {
      throw new Error(
        `No database mapping found at ${options.mwConfigPath}. Have you configured correctly the mediawiki-config path?`,
      );
    }
    if (options.useX1) return 'x1';

    const section = this.mapping.get(dbName);
    if (!section) {
      throw new Error(`The database ${dbName} is not listed among the dblist files of the supported sections.`);
    }
    return section;
  }

  /**
   * Host and port of the analytics replica serving `dbName`.
   */
  async resolve(dbName: string, options: ShardLookupOptions): Promise<{ host: string; port: number }> {
    const section = this.getSection(dbName, options);
    const records = await this.resolveSrv(`_${section}-analytics._tcp.eqiad.wmnet`);
    const record = records[0];
    if (!record) {
      throw new Error(`No SRV record found for section ${section}.`);
    }
    return { host: record.name.replace(/\.$/, ''), port: record.port };
  }
}
