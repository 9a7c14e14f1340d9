/**
 * Core type definitions for the Graphite exporter.
 *
 * Defines the metric snapshot variants consumed by the serializer, the
 * metric source seam, and the shared constants used by configuration.
 */

/**
 * Metric kinds understood by the plaintext serializer
 */
export enum MetricKind {
  Counter = 'counter',
  Gauge = 'gauge',
  GaugeFloat = 'gauge-float',
  Histogram = 'histogram',
  Meter = 'meter',
  Timer = 'timer',
}

/**
 * Monotonic event count
 */
export interface CounterSnapshot {
  readonly kind: MetricKind.Counter;
  readonly count: number;
}

/**
 * Instantaneous integer value
 */
export interface GaugeSnapshot {
  readonly kind: MetricKind.Gauge;
  readonly value: number;
}

/**
 * Instantaneous floating-point value
 */
export interface GaugeFloatSnapshot {
  readonly kind: MetricKind.GaugeFloat;
  readonly value: number;
}

/**
 * Distribution statistics shared by histograms and timers
 */
export interface DistributionStats {
  readonly count: number;
  readonly min: number;
  readonly max: number;
  readonly mean: number;
  readonly stdDev: number;
  /** Values at each requested fraction, in the order requested */
  percentiles(fractions: readonly number[]): number[];
}

/**
 * Event rates shared by meters and timers (events per second)
 */
export interface RateStats {
  readonly count: number;
  readonly rate1: number;
  readonly rate5: number;
  readonly rate15: number;
  readonly rateMean: number;
}

export interface HistogramSnapshot extends DistributionStats {
  readonly kind: MetricKind.Histogram;
}

export interface MeterSnapshot extends RateStats {
  readonly kind: MetricKind.Meter;
}

/**
 * Duration distribution fused with an event rate.
 * Distribution values are raw durations in nanoseconds.
 */
export interface TimerSnapshot extends DistributionStats, RateStats {
  readonly kind: MetricKind.Timer;
}

/**
 * Closed set of snapshot variants
 */
export type MetricSnapshot =
  | CounterSnapshot
  | GaugeSnapshot
  | GaugeFloatSnapshot
  | HistogramSnapshot
  | MeterSnapshot
  | TimerSnapshot;

/**
 * Visitor invoked once per registered metric.
 *
 * The snapshot is `unknown` at this seam: sources are supplied by the
 * embedder and may carry kinds this package does not format.
 */
export type MetricVisitor = (name: string, snapshot: unknown) => void;

/**
 * External collaborator enumerating the currently registered metrics
 */
export interface MetricSource {
  each(visit: MetricVisitor): void;
}

/**
 * Network address of a Graphite plaintext receiver
 */
export interface GraphiteAddress {
  host: string;
  port: number;
}

/**
 * Duration units, expressed in nanoseconds
 */
export const DurationUnit = {
  Nanosecond: 1,
  Microsecond: 1_000,
  Millisecond: 1_000_000,
  Second: 1_000_000_000,
  Minute: 60_000_000_000,
  Hour: 3_600_000_000_000,
} as const;

/**
 * Percentile fractions reported when none are configured
 */
export const DEFAULT_PERCENTILES: readonly number[] = [0.5, 0.75, 0.95, 0.99, 0.999];

/** Default Graphite plaintext port */
export const DEFAULT_PORT = 2003;
