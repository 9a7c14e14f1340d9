/**
 * Observability module for the Graphite exporter.
 */

export {
  ConsoleLogger,
  NoopLogger,
  createLogger,
  type Logger,
  type LogLevel,
  type LogConfig,
} from './logging';
