/**
 * Graphite - Sends report values as Graphite datapoints.
 *
 * Top-level config:
 *
 *   graphite:
 *     host: graphite.example.org
 *     port: 2003
 *     lookups:
 *       wiki: sitematrix.yaml    # replaced by the loaded mapping at start-up
 *
 * Report-level config:
 *
 *   graphite:
 *     path: '{_metric}.{wiki}'
 *     metrics:
 *       edits: edit_count        # metric name → column of the report
 *
 * The path is filled from the report's explode values (translated through
 * the lookups), the row's values keyed by header label, and `_metric`.
 *
 * @module graphite
 */

import * as net from 'node:net';
import { ReportGraphiteSchema, parseSection } from './config.js';
import { formatDate } from './dates.js';
import { raiseCritical } from './errors.js';
import type { Cell, Report, ResultRow } from './report.js';
import { fillTemplate } from './template.js';

export interface GraphiteSettings {
  host: string;
  port: number;
  /** Placeholder → (value → friendlier value). */
  lookups: Record<string, Record<string, string>>;
}

export interface Datapoint {
  metric: string;
  value: Cell;
  /** Epoch seconds. */
  timestamp: number;
}

export class Graphite {
  readonly host: string;
  readonly port: number;
  readonly lookups: Record<string, Record<string, string>>;
  /** Fallback timestamp for datapoints sent without one. */
  readonly timestamp: number;

  constructor(settings: GraphiteSettings, timestamp?: number) {
    this.host = settings.host;
    this.port = settings.port;
    this.lookups = settings.lookups;
    this.timestamp = timestamp ?? Math.floor(Date.now() / 1000);
  }

  /**
   * Send every metric the report configures for one result row.
   */
  async recordRow(row: ResultRow, report: Report): Promise<void> {
    if (Object.keys(report.graphite).length === 0) return;

    const config = parseSection(ReportGraphiteSchema, report.graphite, `Graphite config of ${report.key}`);
    for (const metric of Object.keys(config.metrics)) {
      const datapoint = this.getGraphiteData(report, row, metric);
      await this.record(datapoint.metric, datapoint.value, datapoint.timestamp);
    }
  }

  getGraphiteData(report: Report, row: ResultRow, metric: string): Datapoint {
    const config = parseSection(ReportGraphiteSchema, report.graphite, `Graphite config of ${report.key}`);
    const header = report.results.header;

    const values: Record<string, string | number | null> = {};
    for (const [placeholder, value] of Object.entries(report.explodedValues())) {
      const lookup = Object.hasOwn(this.lookups, placeholder) ? this.lookups[placeholder] : undefined;
      values[placeholder] = lookup && Object.hasOwn(lookup, value) ? lookup[value] : value;
    }
    const fullRow: Cell[] = [formatDate(row.date), ...row.cells];
    header.forEach((label, index) => {
      values[label] = fullRow[index] ?? null;
    });
    values._metric = metric;

    let graphiteMetric: string;
    try {
      graphiteMetric = fillTemplate(config.path, values);
    } catch {
      raiseCritical(`Invalid format "${config.path}" with ${JSON.stringify(values)}`);
    }

    const columnIndex = header.indexOf(config.metrics[metric] ?? '');
    if (columnIndex === -1) {
      raiseCritical(`Could not find ${metric} in ${JSON.stringify(fullRow)} with header ${JSON.stringify(header)}`);
    }

    return {
      metric: graphiteMetric,
      value: fullRow[columnIndex] ?? null,
      timestamp: Math.floor(row.date.getTime() / 1000),
    };
  }

  /**
   * Send one datapoint over a fresh TCP connection.
   */
  async record(metric: string, value: Cell, timestamp?: number): Promise<void> {
    if (metric.includes(' ') || metric.includes('"')) {
      raiseCritical(`Invalid metric name "${metric}"`);
    }
    const line = `${metric} ${value ?? ''} ${Math.floor(timestamp ?? this.timestamp)}\n`;

    await new Promise<void>((resolve, reject) => {
      const socket = net.createConnection({ host: this.host, port: this.port }, () => {
        socket.end(line, () => resolve());
      });
      socket.on('error', reject);
    });
  }
}
