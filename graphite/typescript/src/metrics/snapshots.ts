/**
 * Snapshot constructors.
 *
 * Build immutable point-in-time views from raw values so that any metrics
 * library (or a test) can feed the exporter. Distribution statistics are
 * computed once, over a sorted copy of the samples; percentiles are
 * evaluated on demand.
 */

import {
  MetricKind,
  type CounterSnapshot,
  type DistributionStats,
  type GaugeFloatSnapshot,
  type GaugeSnapshot,
  type HistogramSnapshot,
  type MeterSnapshot,
  type RateStats,
  type TimerSnapshot,
} from '../types';

/**
 * Event rates, as reported by a meter
 */
export type Rates = Omit<RateStats, 'count'>;

export const ZERO_RATES: Rates = Object.freeze({
  rate1: 0,
  rate5: 0,
  rate15: 0,
  rateMean: 0,
});

export function counterSnapshot(count: number): CounterSnapshot {
  const snapshot: CounterSnapshot = { kind: MetricKind.Counter, count };
  return Object.freeze(snapshot);
}

export function gaugeSnapshot(value: number): GaugeSnapshot {
  const snapshot: GaugeSnapshot = { kind: MetricKind.Gauge, value };
  return Object.freeze(snapshot);
}

export function gaugeFloatSnapshot(value: number): GaugeFloatSnapshot {
  const snapshot: GaugeFloatSnapshot = { kind: MetricKind.GaugeFloat, value };
  return Object.freeze(snapshot);
}

export function meterSnapshot(stats: RateStats): MeterSnapshot {
  const snapshot: MeterSnapshot = {
    kind: MetricKind.Meter,
    count: stats.count,
    rate1: stats.rate1,
    rate5: stats.rate5,
    rate15: stats.rate15,
    rateMean: stats.rateMean,
  };
  return Object.freeze(snapshot);
}

/**
 * Histogram snapshot over a set of samples
 */
export function histogramSnapshot(samples: readonly number[]): HistogramSnapshot {
  const snapshot: HistogramSnapshot = { kind: MetricKind.Histogram, ...distribution(samples) };
  return Object.freeze(snapshot);
}

/**
 * Timer snapshot over duration samples in nanoseconds, fused with event rates.
 * The timer count is the number of samples.
 */
export function timerSnapshot(
  samples: readonly number[],
  rates: Rates = ZERO_RATES
): TimerSnapshot {
  const snapshot: TimerSnapshot = {
    kind: MetricKind.Timer,
    ...distribution(samples),
    rate1: rates.rate1,
    rate5: rates.rate5,
    rate15: rates.rate15,
    rateMean: rates.rateMean,
  };
  return Object.freeze(snapshot);
}

function distribution(samples: readonly number[]): DistributionStats {
  const sorted = [...samples].sort((a, b) => a - b);
  const count = sorted.length;

  if (count === 0) {
    return {
      count: 0,
      min: 0,
      max: 0,
      mean: 0,
      stdDev: 0,
      percentiles: (fractions) => fractions.map(() => 0),
    };
  }

  let sum = 0;
  for (const value of sorted) {
    sum += value;
  }
  const mean = sum / count;

  let squares = 0;
  for (const value of sorted) {
    squares += (value - mean) ** 2;
  }

  return {
    count,
    min: sorted[0] ?? 0,
    max: sorted[count - 1] ?? 0,
    mean,
    stdDev: Math.sqrt(squares / count),
    percentiles: (fractions) => samplePercentiles(sorted, fractions),
  };
}

/**
 * Percentiles over sorted samples.
 *
 * Position `p * (n + 1)` is clamped to the first and last samples and
 * linearly interpolated in between.
 */
export function samplePercentiles(
  sorted: readonly number[],
  fractions: readonly number[]
): number[] {
  const count = sorted.length;
  if (count === 0) {
    return fractions.map(() => 0);
  }

  const first = sorted[0] ?? 0;
  const last = sorted[count - 1] ?? 0;

  return fractions.map((fraction) => {
    const pos = fraction * (count + 1);
    if (pos < 1) {
      return first;
    }
    if (pos >= count) {
      return last;
    }
    const lower = sorted[Math.floor(pos) - 1] ?? first;
    const upper = sorted[Math.floor(pos)] ?? last;
    return lower + (pos - Math.floor(pos)) * (upper - lower);
  });
}
