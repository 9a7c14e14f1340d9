/**
 * Graphite exporter: flushes every metric of a source to a Graphite
 * plaintext receiver, once or on a fixed interval.
 *
 * Each flush cycle opens its own connection, writes one chunk per metric
 * and waits for it before the next, then closes the connection. Cycles
 * never overlap: a tick that fires while a cycle is still in flight is
 * dropped.
 */

import type { GraphiteConfig } from '../config';
import { ConnectionError, formatError, toError } from '../errors';
import type { Logger } from '../observability';
import { PlaintextSerializer } from '../serialization';
import { tcpConnectionFactory, type Connection, type ConnectionFactory } from '../transport';

/**
 * Result of one flush cycle
 */
export type FlushOutcome =
  | {
      ok: true;
      /** Unix seconds stamped on every line of the cycle */
      timestamp: number;
      /** Metrics visited */
      metrics: number;
      /** Lines produced */
      lines: number;
      /** Metrics whose chunk could not be written */
      writeErrors: number;
    }
  | {
      ok: false;
      timestamp: number;
      error: ConnectionError;
    };

export interface ExporterOptions {
  /** Opens the per-cycle connection (default: TCP) */
  connectionFactory?: ConnectionFactory;
  /** Wall clock in milliseconds (default: Date.now) */
  clock?: () => number;
  /** Let the process exit while the loop is idle (default: false) */
  unref?: boolean;
}

export class GraphiteExporter {
  private readonly config: GraphiteConfig;
  private readonly logger: Logger;
  private readonly serializer: PlaintextSerializer;
  private readonly connectionFactory: ConnectionFactory;
  private readonly clock: () => number;
  private readonly unref: boolean;
  private timer: ReturnType<typeof setInterval> | null = null;
  private inFlight: Promise<void> | null = null;

  constructor(config: GraphiteConfig, options: ExporterOptions = {}) {
    this.config = config;
    this.logger = config.logger;
    this.connectionFactory = options.connectionFactory ?? tcpConnectionFactory;
    this.clock = options.clock ?? (() => Date.now());
    this.unref = options.unref ?? false;
    this.serializer = new PlaintextSerializer({
      prefix: config.prefix,
      percentiles: config.percentiles,
      durationUnit: config.durationUnit,
      flushSeconds: config.flushSeconds,
      logger: config.logger,
    });
  }

  /**
   * Perform exactly one flush cycle.
   *
   * Resolves with `ok: false` when the connection cannot be opened; in that
   * case the source is not enumerated. Metrics that cannot be serialized or
   * written are logged and skipped; they do not fail the cycle.
   */
  async flush(): Promise<FlushOutcome> {
    const timestamp = Math.floor(this.clock() / 1000);
    const { host, port } = this.config.address;

    const connection = await this.open();
    if (connection instanceof ConnectionError) {
      return { ok: false, timestamp, error: connection };
    }

    let lines = 0;
    let writeErrors = 0;
    const entries: Array<[string, unknown]> = [];

    try {
      // Snapshots are immutable, so they can be written after enumeration
      this.config.source.each((name, snapshot) => {
        entries.push([name, snapshot]);
      });

      for (const [name, snapshot] of entries) {
        const formatted = this.serialize(name, snapshot, timestamp);
        if (formatted.length === 0) continue;

        lines += formatted.length;
        if (!(await this.writeMetric(connection, name, formatted.join('')))) {
          writeErrors++;
        }
      }
    } finally {
      await this.closeConnection(connection);
    }

    const metrics = entries.length;

    this.logger.debug('Flushed metrics to Graphite', {
      host,
      port,
      metrics,
      lines,
      writeErrors,
    });

    return { ok: true, timestamp, metrics, lines, writeErrors };
  }

  /**
   * Start the flush loop. The first cycle runs after one full interval.
   */
  start(): void {
    if (this.timer) return;

    this.timer = setInterval(() => this.tick(), this.config.flushInterval);
    if (this.unref) {
      this.timer.unref();
    }
  }

  /**
   * Stop the flush loop and wait for any in-flight cycle to finish.
   */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }

    if (this.inFlight) {
      await this.inFlight;
    }
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  /**
   * Run the flush loop until the signal aborts.
   * Without a signal the returned promise never settles.
   */
  run(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      return Promise.resolve();
    }

    this.start();

    return new Promise((resolve) => {
      signal?.addEventListener('abort', () => resolve(this.stop()), { once: true });
    });
  }

  private tick(): void {
    if (this.inFlight) {
      this.logger.debug('Previous flush still in progress, skipping tick');
      return;
    }

    this.inFlight = this.flush()
      .then((outcome) => {
        if (!outcome.ok) {
          this.logger.error('Graphite flush failed', {
            error: formatError(outcome.error),
            host: outcome.error.host,
            port: outcome.error.port,
          });
        }
      })
      .catch((err: unknown) => {
        this.logger.error('Graphite flush failed', { error: formatError(err) });
      })
      .finally(() => {
        this.inFlight = null;
      });
  }

  private async open(): Promise<Connection | ConnectionError> {
    const { host, port } = this.config.address;
    try {
      return await this.connectionFactory(this.config.address, {
        connectTimeout: this.config.connectTimeout,
      });
    } catch (err) {
      if (err instanceof ConnectionError) {
        return err;
      }
      return new ConnectionError(`Unable to connect to ${host}:${port}`, {
        host,
        port,
        cause: toError(err),
      });
    }
  }

  private serialize(name: string, snapshot: unknown, timestamp: number): string[] {
    try {
      return this.serializer.serialize(name, snapshot, timestamp);
    } catch (err) {
      this.logger.warn('unable to record metric', { name, error: formatError(err) });
      return [];
    }
  }

  private async writeMetric(connection: Connection, name: string, chunk: string): Promise<boolean> {
    try {
      await connection.write(chunk);
      return true;
    } catch (err) {
      this.logger.warn('Failed to write metric', { name, error: formatError(err) });
      return false;
    }
  }

  private async closeConnection(connection: Connection): Promise<void> {
    try {
      await connection.close();
    } catch (err) {
      this.logger.warn('Failed to close Graphite connection', { error: formatError(err) });
    }
  }
}
