/**
 * Tests for the plaintext serializer.
 * Each metric kind is checked line by line against the wire format.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  formatMetric,
  isMetricSnapshot,
  PlaintextSerializer,
  type FormatContext,
} from '../plaintext';
import {
  MetricKind,
  DurationUnit,
  type HistogramSnapshot,
  type TimerSnapshot,
} from '../../types';
import {
  counterSnapshot,
  gaugeSnapshot,
  gaugeFloatSnapshot,
  histogramSnapshot,
  meterSnapshot,
} from '../../metrics';
import { RecordingLogger } from '../../testing';

const NOW = 1_700_000_000;

function fixedPercentiles(values: Record<number, number>): (fractions: readonly number[]) => number[] {
  return (fractions) => fractions.map((fraction) => values[fraction] ?? 0);
}

describe('formatMetric', () => {
  let logger: RecordingLogger;
  let context: FormatContext;

  beforeEach(() => {
    logger = new RecordingLogger();
    context = {
      prefix: 'app',
      name: 'requests',
      tags: '',
      now: NOW,
      flushSeconds: 10,
      durationUnit: DurationUnit.Nanosecond,
      percentiles: [0.5, 0.999],
      logger,
    };
  });

  describe('counter', () => {
    it('should emit count and per-second count', () => {
      expect(formatMetric(counterSnapshot(42), context)).toEqual([
        'app.requests.count 42 1700000000\n',
        'app.requests.count_ps 4.20 1700000000\n',
      ]);
    });

    it('should render the per-second count as +Inf for a zero flush interval', () => {
      const lines = formatMetric(counterSnapshot(5), { ...context, flushSeconds: 0 });
      expect(lines[1]).toBe('app.requests.count_ps +Inf 1700000000\n');
    });

    it('should render the per-second count as NaN for a zero count and zero interval', () => {
      const lines = formatMetric(counterSnapshot(0), { ...context, flushSeconds: 0 });
      expect(lines[1]).toBe('app.requests.count_ps NaN 1700000000\n');
    });
  });

  describe('gauges', () => {
    it('should emit an integer gauge value', () => {
      expect(formatMetric(gaugeSnapshot(512), { ...context, name: 'heap' })).toEqual([
        'app.heap.value 512 1700000000\n',
      ]);
    });

    it('should emit a float gauge with six decimals', () => {
      expect(formatMetric(gaugeFloatSnapshot(0.25), { ...context, name: 'load' })).toEqual([
        'app.load.value 0.250000 1700000000\n',
      ]);
    });
  });

  describe('histogram', () => {
    it('should emit distribution fields and configured percentiles', () => {
      const histogram: HistogramSnapshot = {
        kind: MetricKind.Histogram,
        count: 10,
        min: 1,
        max: 250,
        mean: 37.5,
        stdDev: 12.25,
        percentiles: fixedPercentiles({ 0.5: 20, 0.999: 249.5 }),
      };

      expect(formatMetric(histogram, { ...context, name: 'payload' })).toEqual([
        'app.payload.count 10 1700000000\n',
        'app.payload.min 1 1700000000\n',
        'app.payload.max 250 1700000000\n',
        'app.payload.mean 37.50 1700000000\n',
        'app.payload.std-dev 12.25 1700000000\n',
        'app.payload.50-percentile 20.00 1700000000\n',
        'app.payload.999-percentile 249.50 1700000000\n',
      ]);
    });

    it('should order percentile lines as configured, not by value', () => {
      const histogram: HistogramSnapshot = {
        kind: MetricKind.Histogram,
        count: 3,
        min: 1,
        max: 3,
        mean: 2,
        stdDev: 1,
        percentiles: fixedPercentiles({ 0.99: 3, 0.5: 2 }),
      };

      const lines = formatMetric(histogram, { ...context, percentiles: [0.99, 0.5] });
      expect(lines.slice(5)).toEqual([
        'app.requests.99-percentile 3.00 1700000000\n',
        'app.requests.50-percentile 2.00 1700000000\n',
      ]);
    });
  });

  describe('meter', () => {
    it('should emit count and rates', () => {
      const meter = meterSnapshot({ count: 7, rate1: 1.5, rate5: 0.75, rate15: 0.25, rateMean: 2 });

      expect(formatMetric(meter, { ...context, name: 'logins' })).toEqual([
        'app.logins.count 7 1700000000\n',
        'app.logins.one-minute 1.50 1700000000\n',
        'app.logins.five-minute 0.75 1700000000\n',
        'app.logins.fifteen-minute 0.25 1700000000\n',
        'app.logins.mean 2.00 1700000000\n',
      ]);
    });
  });

  describe('timer', () => {
    const timer: TimerSnapshot = {
      kind: MetricKind.Timer,
      count: 4,
      min: 1_500_000,
      max: 9_999_999,
      mean: 4_250_000,
      stdDev: 3_500_000,
      percentiles: fixedPercentiles({ 0.5: 4_000_000, 0.999: 9_990_000 }),
      rate1: 0.5,
      rate5: 0.25,
      rate15: 0.2,
      rateMean: 1,
    };

    it('should convert durations to the configured unit', () => {
      const lines = formatMetric(timer, {
        ...context,
        name: 'db.query',
        flushSeconds: 2,
        durationUnit: DurationUnit.Millisecond,
      });

      expect(lines).toEqual([
        'app.db.query.count 4 1700000000\n',
        'app.db.query.count_ps 2.00 1700000000\n',
        'app.db.query.min 1 1700000000\n',
        'app.db.query.max 9 1700000000\n',
        'app.db.query.mean 4.25 1700000000\n',
        'app.db.query.std-dev 3.50 1700000000\n',
        'app.db.query.50-percentile 4.00 1700000000\n',
        'app.db.query.999-percentile 9.99 1700000000\n',
        'app.db.query.one-minute 0.50 1700000000\n',
        'app.db.query.five-minute 0.25 1700000000\n',
        'app.db.query.fifteen-minute 0.20 1700000000\n',
        'app.db.query.mean-rate 1.00 1700000000\n',
      ]);
    });
  });

  describe('unrecognized kinds', () => {
    it('should emit nothing and report the kind', () => {
      expect(formatMetric({ kind: 'summary', value: 1 }, context)).toEqual([]);
      expect(logger.at('warn')).toEqual([
        {
          level: 'warn',
          message: 'unable to record metric',
          context: { name: 'requests', kind: 'summary' },
        },
      ]);
    });

    it('should describe values without a kind by their type', () => {
      expect(formatMetric(undefined, context)).toEqual([]);
      expect(formatMetric(null, context)).toEqual([]);
      expect(logger.at('warn').map((entry) => entry.context?.['kind'])).toEqual([
        'undefined',
        'null',
      ]);
    });
  });

  describe('malformed snapshots', () => {
    it('should emit nothing for a known kind missing its fields', () => {
      expect(formatMetric({ kind: 'counter' }, context)).toEqual([]);
      expect(formatMetric({ kind: 'histogram', count: 1 }, context)).toEqual([]);
      expect(logger.at('warn').map((entry) => entry.context)).toEqual([
        { name: 'requests', kind: 'counter' },
        { name: 'requests', kind: 'histogram' },
      ]);
    });

    it('should reject a distribution without a percentile query', () => {
      const histogram = { ...histogramSnapshot([1, 2]), percentiles: [1, 2] };

      expect(isMetricSnapshot(histogram)).toBe(false);
      expect(isMetricSnapshot(histogramSnapshot([1, 2]))).toBe(true);
      expect(formatMetric(histogram, context)).toEqual([]);
    });

    it('should still accept NaN readings', () => {
      expect(formatMetric(gaugeFloatSnapshot(Number.NaN), { ...context, name: 'load' })).toEqual([
        'app.load.value NaN 1700000000\n',
      ]);
    });
  });

  it('should keep the empty prefix component', () => {
    expect(formatMetric(gaugeSnapshot(1), { ...context, prefix: '' })).toEqual([
      '.requests.value 1 1700000000\n',
    ]);
  });
});

describe('PlaintextSerializer', () => {
  const serializer = new PlaintextSerializer({
    prefix: 'servers',
    percentiles: [0.5],
    durationUnit: DurationUnit.Nanosecond,
    flushSeconds: 10,
  });

  it('should append the tag suffix to every field', () => {
    const lines = serializer.serialize(
      'disk.used;datacenter=dc1;rack=a1;server=web01',
      counterSnapshot(42),
      NOW
    );

    expect(lines).toEqual([
      'servers.disk.used.count;datacenter=dc1;rack=a1;server=web01 42 1700000000\n',
      'servers.disk.used.count_ps;datacenter=dc1;rack=a1;server=web01 4.20 1700000000\n',
    ]);
  });

  it('should leave untagged names unchanged', () => {
    expect(serializer.serialize('cpu.user', gaugeSnapshot(3), NOW)).toEqual([
      'servers.cpu.user.value 3 1700000000\n',
    ]);
  });
});
