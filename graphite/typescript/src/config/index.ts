/**
 * Configuration for the Graphite exporter.
 *
 * Settings are validated once at construction; the flush loop and the
 * serializer rely on a positive flush interval and duration unit.
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors';
import type { Logger } from '../observability';
import { ConsoleLogger } from '../observability';
import {
  DEFAULT_PERCENTILES,
  DEFAULT_PORT,
  DurationUnit,
  type GraphiteAddress,
  type MetricSource,
} from '../types';

/** Default flush interval in milliseconds (1 minute). */
export const DEFAULT_FLUSH_INTERVAL = 60_000;

/** Default connect timeout in milliseconds. */
export const DEFAULT_CONNECT_TIMEOUT = 5_000;

/** Longest delay Node timers honour; larger values fire after 1 ms. */
export const MAX_TIMER_DELAY = 2_147_483_647;

/**
 * Configuration options for the exporter
 */
export interface GraphiteConfigOptions {
  /** Receiver host name or IP address */
  host: string;
  /** Receiver port (default: 2003) */
  port?: number;
  /** Metrics to export */
  source: MetricSource;
  /** Flush interval in milliseconds (default: 60000) */
  flushInterval?: number;
  /** Unit timer durations are converted to, in nanoseconds (default: nanoseconds) */
  durationUnit?: number;
  /** Prefix prepended to every metric name (default: '') */
  prefix?: string;
  /** Percentile fractions reported for histograms and timers */
  percentiles?: readonly number[];
  /** Connect timeout in milliseconds (default: 5000) */
  connectTimeout?: number;
  /** Diagnostic sink (default: ConsoleLogger) */
  logger?: Logger;
}

const settingsSchema = z.object({
  host: z.string().trim().min(1, 'Host is required'),
  port: z.number().int().min(1).max(65535),
  flushInterval: z
    .number()
    .finite()
    .positive()
    .max(MAX_TIMER_DELAY, `Flush interval must not exceed ${MAX_TIMER_DELAY} ms`),
  durationUnit: z.number().int().positive(),
  prefix: z.string(),
  percentiles: z.array(z.number().min(0).max(1)),
  connectTimeout: z
    .number()
    .int()
    .positive()
    .max(MAX_TIMER_DELAY, `Connect timeout must not exceed ${MAX_TIMER_DELAY} ms`),
});

const sourceSchema = z.custom<MetricSource>(
  (value) =>
    typeof value === 'object' &&
    value !== null &&
    'each' in value &&
    typeof value.each === 'function',
  { message: 'Metric source must expose an each() method' }
);

/**
 * Duration unit names accepted from the environment
 */
const DURATION_UNITS: Record<string, number> = {
  ns: DurationUnit.Nanosecond,
  us: DurationUnit.Microsecond,
  ms: DurationUnit.Millisecond,
  s: DurationUnit.Second,
  m: DurationUnit.Minute,
  h: DurationUnit.Hour,
};

/**
 * Validated exporter configuration
 */
export class GraphiteConfig {
  readonly host: string;
  readonly port: number;
  readonly source: MetricSource;
  readonly flushInterval: number;
  readonly durationUnit: number;
  readonly prefix: string;
  readonly percentiles: readonly number[];
  readonly connectTimeout: number;
  readonly logger: Logger;

  private constructor(
    settings: z.infer<typeof settingsSchema>,
    source: MetricSource,
    logger: Logger
  ) {
    this.host = settings.host;
    this.port = settings.port;
    this.source = source;
    this.flushInterval = settings.flushInterval;
    this.durationUnit = settings.durationUnit;
    this.prefix = settings.prefix;
    this.percentiles = Object.freeze([...settings.percentiles]);
    this.connectTimeout = settings.connectTimeout;
    this.logger = logger;
  }

  /**
   * Create configuration from options
   * @throws ConfigurationError listing every invalid setting
   */
  static create(options: GraphiteConfigOptions): GraphiteConfig {
    const issues: string[] = [];

    const settings = settingsSchema.safeParse({
      host: options.host,
      port: options.port ?? DEFAULT_PORT,
      flushInterval: options.flushInterval ?? DEFAULT_FLUSH_INTERVAL,
      durationUnit: options.durationUnit ?? DurationUnit.Nanosecond,
      prefix: options.prefix ?? '',
      percentiles: [...(options.percentiles ?? DEFAULT_PERCENTILES)],
      connectTimeout: options.connectTimeout ?? DEFAULT_CONNECT_TIMEOUT,
    });
    if (!settings.success) {
      issues.push(
        ...settings.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      );
    }

    const source = sourceSchema.safeParse(options.source);
    if (!source.success) {
      issues.push(...source.error.issues.map((issue) => `source: ${issue.message}`));
    }

    if (!settings.success || !source.success) {
      throw new ConfigurationError(`Invalid Graphite configuration: ${issues.join('; ')}`, {
        issues,
      });
    }

    return new GraphiteConfig(settings.data, source.data, options.logger ?? new ConsoleLogger());
  }

  /**
   * Create configuration from environment variables
   *
   * Environment variables:
   * - GRAPHITE_ADDRESS: Receiver address as host:port
   * - GRAPHITE_HOST: Receiver host (overrides the host part of GRAPHITE_ADDRESS)
   * - GRAPHITE_PORT: Receiver port (overrides the port part of GRAPHITE_ADDRESS)
   * - GRAPHITE_PREFIX: Metric name prefix
   * - GRAPHITE_FLUSH_INTERVAL_MS: Flush interval in milliseconds
   * - GRAPHITE_DURATION_UNIT: ns, us, ms, s, m or h
   * - GRAPHITE_PERCENTILES: Comma-separated fractions, e.g. 0.5,0.99
   * - GRAPHITE_CONNECT_TIMEOUT_MS: Connect timeout in milliseconds
   */
  static fromEnv(
    source: MetricSource,
    env: Record<string, string | undefined> = process.env,
    overrides: Partial<GraphiteConfigOptions> = {}
  ): GraphiteConfig {
    const options: GraphiteConfigOptions = { host: '', source };

    const address = env['GRAPHITE_ADDRESS'];
    if (address) {
      const parsed = parseAddress(address);
      options.host = parsed.host;
      options.port = parsed.port;
    }

    const host = env['GRAPHITE_HOST'];
    if (host) {
      options.host = host;
    }

    const port = env['GRAPHITE_PORT'];
    if (port) {
      options.port = parseInteger('GRAPHITE_PORT', port);
    }

    const prefix = env['GRAPHITE_PREFIX'];
    if (prefix !== undefined) {
      options.prefix = prefix;
    }

    const flushInterval = env['GRAPHITE_FLUSH_INTERVAL_MS'];
    if (flushInterval) {
      options.flushInterval = parseInteger('GRAPHITE_FLUSH_INTERVAL_MS', flushInterval);
    }

    const durationUnit = env['GRAPHITE_DURATION_UNIT'];
    if (durationUnit) {
      const unit = DURATION_UNITS[durationUnit.trim()];
      if (unit === undefined) {
        throw new ConfigurationError(
          `GRAPHITE_DURATION_UNIT must be one of ${Object.keys(DURATION_UNITS).join(', ')}`
        );
      }
      options.durationUnit = unit;
    }

    const percentiles = env['GRAPHITE_PERCENTILES'];
    if (percentiles) {
      options.percentiles = parsePercentiles(percentiles);
    }

    const connectTimeout = env['GRAPHITE_CONNECT_TIMEOUT_MS'];
    if (connectTimeout) {
      options.connectTimeout = parseInteger('GRAPHITE_CONNECT_TIMEOUT_MS', connectTimeout);
    }

    return GraphiteConfig.create({ ...options, ...overrides });
  }

  get address(): GraphiteAddress {
    return { host: this.host, port: this.port };
  }

  /**
   * Flush interval in seconds, the denominator of per-second counts
   */
  get flushSeconds(): number {
    return this.flushInterval / 1000;
  }
}

/**
 * Parse `host:port`, `[ipv6]:port`, or a bare host using the default port.
 * @throws ConfigurationError if the port is not an integer
 */
export function parseAddress(value: string, defaultPort: number = DEFAULT_PORT): GraphiteAddress {
  const trimmed = value.trim();

  const bracketed = /^\[([^\]]+)\](?::(.*))?$/.exec(trimmed);
  if (bracketed) {
    const host = bracketed[1] ?? '';
    const port = bracketed[2];
    return { host, port: port === undefined ? defaultPort : parseInteger('port', port) };
  }

  const separator = trimmed.lastIndexOf(':');
  // A bare IPv6 address has several colons and no port
  if (separator === -1 || trimmed.indexOf(':') !== separator) {
    return { host: trimmed, port: defaultPort };
  }

  return {
    host: trimmed.slice(0, separator),
    port: parseInteger('port', trimmed.slice(separator + 1)),
  };
}

function parseInteger(name: string, value: string): number {
  const trimmed = value.trim();
  const parsed = Number(trimmed);
  if (trimmed === '' || !Number.isInteger(parsed)) {
    throw new ConfigurationError(`${name} must be a valid integer`);
  }
  return parsed;
}

function parsePercentiles(value: string): number[] {
  return value.split(',').map((part) => {
    const trimmed = part.trim();
    const parsed = Number(trimmed);
    if (trimmed === '' || Number.isNaN(parsed)) {
      throw new ConfigurationError(`GRAPHITE_PERCENTILES contains an invalid fraction: ${part}`);
    }
    return parsed;
  });
}
