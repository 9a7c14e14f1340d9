/**
 * Exporter entry points.
 */

import { GraphiteConfig } from '../config';
import { DEFAULT_PERCENTILES, DurationUnit, type GraphiteAddress, type MetricSource } from '../types';
import { GraphiteExporter, type ExporterOptions, type FlushOutcome } from './exporter';

export { GraphiteExporter, type ExporterOptions, type FlushOutcome } from './exporter';

/**
 * Flush `source` to `address` every `flushInterval` milliseconds until the
 * signal aborts, with default percentiles and nanosecond durations.
 */
export async function exportToGraphite(
  source: MetricSource,
  flushInterval: number,
  prefix: string,
  address: GraphiteAddress,
  signal?: AbortSignal
): Promise<void> {
  const config = GraphiteConfig.create({
    host: address.host,
    port: address.port,
    source,
    flushInterval,
    durationUnit: DurationUnit.Nanosecond,
    prefix,
    percentiles: DEFAULT_PERCENTILES,
  });
  await exportWithConfig(config, signal);
}

/**
 * Run the flush loop for a configuration until the signal aborts.
 */
export async function exportWithConfig(
  config: GraphiteConfig,
  signal?: AbortSignal,
  options?: ExporterOptions
): Promise<void> {
  await new GraphiteExporter(config, options).run(signal);
}

/**
 * Perform a single flush cycle, leaving retry policy to the caller.
 */
export function exportOnce(
  config: GraphiteConfig,
  options?: ExporterOptions
): Promise<FlushOutcome> {
  return new GraphiteExporter(config, options).flush();
}
