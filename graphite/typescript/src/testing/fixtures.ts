/**
 * Test fixtures: a fixed metric source and a logger that records entries.
 */

import type { Logger, LogLevel } from '../observability';
import type { MetricSource, MetricVisitor } from '../types';

/**
 * Metric source over a fixed list of (name, snapshot) entries.
 * Snapshots are typed `unknown` so tests can feed unsupported kinds.
 */
export class StaticMetricSource implements MetricSource {
  private readonly entries: Array<[string, unknown]>;
  enumerations = 0;

  constructor(entries: Iterable<[string, unknown]> = []) {
    this.entries = [...entries];
  }

  add(name: string, snapshot: unknown): this {
    this.entries.push([name, snapshot]);
    return this;
  }

  each(visit: MetricVisitor): void {
    this.enumerations++;
    for (const [name, snapshot] of this.entries) {
      visit(name, snapshot);
    }
  }
}

export interface LogEntry {
  level: Exclude<LogLevel, 'off'>;
  message: string;
  context?: Record<string, unknown>;
}

/**
 * Logger recording every entry for assertions.
 */
export class RecordingLogger implements Logger {
  readonly entries: LogEntry[] = [];

  trace(message: string, context?: Record<string, unknown>): void {
    this.entries.push({ level: 'trace', message, context });
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.entries.push({ level: 'debug', message, context });
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.entries.push({ level: 'info', message, context });
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.entries.push({ level: 'warn', message, context });
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.entries.push({ level: 'error', message, context });
  }

  at(level: LogEntry['level']): LogEntry[] {
    return this.entries.filter((entry) => entry.level === level);
  }
}
