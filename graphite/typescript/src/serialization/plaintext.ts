import { z } from 'zod';
import {
  MetricKind,
  type DistributionStats,
  type MetricSnapshot,
  type RateStats,
} from '../types';
import type { Logger } from '../observability';
import { NoopLogger } from '../observability';
import { percentileKey, splitNameAndTags } from './names';
import { formatFloat, formatInteger, formatQuotient, formatRate } from './values';

/**
 * Serializes metric snapshots to the Graphite plaintext protocol.
 * See: https://graphite.readthedocs.io/en/latest/feeding-carbon.html
 *
 * Each line is `<prefix>.<name>.<field><tags> <value> <unixSeconds>\n`.
 */

export interface FormatContext {
  prefix: string;
  /** Metric name with the tag suffix already removed */
  name: string;
  /** Tag suffix including its leading semicolon, or empty */
  tags: string;
  /** Flush timestamp in Unix seconds, shared by every line of a cycle */
  now: number;
  flushSeconds: number;
  /** Duration unit in nanoseconds */
  durationUnit: number;
  percentiles: readonly number[];
  logger: Logger;
}

// NaN is a legitimate reading and renders as a sentinel
const reading = z.union([z.number(), z.nan()]);

const distributionShape = {
  count: reading,
  min: reading,
  max: reading,
  mean: reading,
  stdDev: reading,
  percentiles: z.custom<DistributionStats['percentiles']>(
    (value) => typeof value === 'function',
    { message: 'percentiles must be a function' }
  ),
};

const rateShape = {
  count: reading,
  rate1: reading,
  rate5: reading,
  rate15: reading,
  rateMean: reading,
};

const snapshotSchema: z.ZodType<MetricSnapshot, z.ZodTypeDef, unknown> = z.discriminatedUnion(
  'kind',
  [
    z.object({ kind: z.literal(MetricKind.Counter), count: reading }),
    z.object({ kind: z.literal(MetricKind.Gauge), value: reading }),
    z.object({ kind: z.literal(MetricKind.GaugeFloat), value: reading }),
    z.object({ kind: z.literal(MetricKind.Histogram), ...distributionShape }),
    z.object({ kind: z.literal(MetricKind.Meter), ...rateShape }),
    z.object({ kind: z.literal(MetricKind.Timer), ...distributionShape, ...rateShape }),
  ]
);

/**
 * Validate a value from the metric source against the snapshot variants.
 * Returns undefined for unknown kinds and for known kinds missing a field.
 */
export function parseMetricSnapshot(value: unknown): MetricSnapshot | undefined {
  const result = snapshotSchema.safeParse(value);
  return result.success ? result.data : undefined;
}

/**
 * Check whether a value is one of the snapshot variants this serializer formats
 */
export function isMetricSnapshot(value: unknown): value is MetricSnapshot {
  return snapshotSchema.safeParse(value).success;
}

function describeKind(value: unknown): string {
  if (typeof value === 'object' && value !== null && 'kind' in value) {
    return String(value.kind);
  }
  return value === null ? 'null' : typeof value;
}

/**
 * Format one metric snapshot into ordered plaintext lines.
 * Unrecognized snapshots are reported to the logger and produce no lines.
 */
export function formatMetric(value: unknown, context: FormatContext): string[] {
  const snapshot = parseMetricSnapshot(value);
  if (snapshot === undefined) {
    context.logger.warn('unable to record metric', {
      name: context.name,
      kind: describeKind(value),
    });
    return [];
  }

  const { prefix, name, tags, now } = context;
  const lines: string[] = [];
  const emit = (field: string, value: string): void => {
    lines.push(`${prefix}.${name}.${field}${tags} ${value} ${now}\n`);
  };

  switch (snapshot.kind) {
    case MetricKind.Counter:
      emit('count', formatInteger(snapshot.count));
      emit('count_ps', formatRate(snapshot.count / context.flushSeconds));
      break;

    case MetricKind.Gauge:
      emit('value', formatInteger(snapshot.value));
      break;

    case MetricKind.GaugeFloat:
      emit('value', formatFloat(snapshot.value));
      break;

    case MetricKind.Histogram:
      emit('count', formatInteger(snapshot.count));
      emit('min', formatInteger(snapshot.min));
      emit('max', formatInteger(snapshot.max));
      emit('mean', formatRate(snapshot.mean));
      emit('std-dev', formatRate(snapshot.stdDev));
      emitPercentiles(snapshot, context.percentiles, 1, emit);
      break;

    case MetricKind.Meter:
      emit('count', formatInteger(snapshot.count));
      emitRates(snapshot, 'mean', emit);
      break;

    case MetricKind.Timer: {
      const unit = context.durationUnit;
      emit('count', formatInteger(snapshot.count));
      emit('count_ps', formatRate(snapshot.count / context.flushSeconds));
      emit('min', formatQuotient(snapshot.min, unit));
      emit('max', formatQuotient(snapshot.max, unit));
      emit('mean', formatRate(snapshot.mean / unit));
      emit('std-dev', formatRate(snapshot.stdDev / unit));
      emitPercentiles(snapshot, context.percentiles, unit, emit);
      emitRates(snapshot, 'mean-rate', emit);
      break;
    }

    default: {
      const unhandled: never = snapshot;
      context.logger.warn('unable to record metric', {
        name: context.name,
        kind: describeKind(unhandled),
      });
    }
  }

  return lines;
}

function emitPercentiles(
  stats: DistributionStats,
  fractions: readonly number[],
  divisor: number,
  emit: (field: string, value: string) => void
): void {
  if (fractions.length === 0) return;

  const values = stats.percentiles(fractions);
  fractions.forEach((fraction, index) => {
    const value = values[index] ?? Number.NaN;
    emit(`${percentileKey(fraction)}-percentile`, formatRate(value / divisor));
  });
}

function emitRates(
  stats: RateStats,
  meanField: 'mean' | 'mean-rate',
  emit: (field: string, value: string) => void
): void {
  emit('one-minute', formatRate(stats.rate1));
  emit('five-minute', formatRate(stats.rate5));
  emit('fifteen-minute', formatRate(stats.rate15));
  emit(meanField, formatRate(stats.rateMean));
}

export interface SerializerOptions {
  prefix: string;
  percentiles: readonly number[];
  /** Duration unit in nanoseconds */
  durationUnit: number;
  flushSeconds: number;
  logger?: Logger;
}

/**
 * Serializer bound to one export configuration
 */
export class PlaintextSerializer {
  private readonly options: SerializerOptions;
  private readonly logger: Logger;

  constructor(options: SerializerOptions) {
    this.options = options;
    this.logger = options.logger ?? new NoopLogger();
  }

  /**
   * Serialize a raw (possibly tagged) metric name and its snapshot.
   */
  serialize(rawName: string, snapshot: unknown, now: number): string[] {
    const { name, tags } = splitNameAndTags(rawName);
    return formatMetric(snapshot, {
      prefix: this.options.prefix,
      name,
      tags,
      now,
      flushSeconds: this.options.flushSeconds,
      durationUnit: this.options.durationUnit,
      percentiles: this.options.percentiles,
      logger: this.logger,
    });
  }
}
