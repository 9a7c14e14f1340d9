/**
 * Graphite Plaintext Exporter
 *
 * Main entry point. Serializes metric snapshots into the Graphite plaintext
 * line protocol and flushes them to a receiver over a connection opened
 * per flush cycle.
 */

// Re-export types
export * from './types';

// Re-export snapshot constructors
export {
  counterSnapshot,
  gaugeSnapshot,
  gaugeFloatSnapshot,
  histogramSnapshot,
  meterSnapshot,
  timerSnapshot,
  samplePercentiles,
  ZERO_RATES,
  type Rates,
} from './metrics';

// Re-export registry components
export { SnapshotRegistry, type SnapshotProvider } from './registry';

// Re-export serialization components
export {
  PlaintextSerializer,
  formatMetric,
  isMetricSnapshot,
  parseMetricSnapshot,
  splitNameAndTags,
  percentileKey,
  formatShortestDecimal,
  formatInteger,
  formatFixed,
  formatQuotient,
  type FormatContext,
  type SerializerOptions,
  type NameAndTags,
} from './serialization';

// Re-export transport components
export {
  TcpConnection,
  tcpConnectionFactory,
  type Connection,
  type ConnectionFactory,
  type ConnectOptions,
} from './transport';

// Re-export exporter
export {
  GraphiteExporter,
  exportToGraphite,
  exportWithConfig,
  exportOnce,
  type ExporterOptions,
  type FlushOutcome,
} from './exporter';

// Re-export configuration
export {
  GraphiteConfig,
  parseAddress,
  DEFAULT_FLUSH_INTERVAL,
  DEFAULT_CONNECT_TIMEOUT,
  MAX_TIMER_DELAY,
  type GraphiteConfigOptions,
} from './config';

// Re-export error types
export {
  GraphiteError,
  ConfigurationError,
  RegistrationError,
  ConnectionError,
  WriteError,
  isGraphiteError,
  isRetryableError,
  formatError,
  type ErrorCategory,
} from './errors';

// Re-export logging
export {
  ConsoleLogger,
  NoopLogger,
  createLogger,
  type Logger,
  type LogLevel,
  type LogConfig,
} from './observability';

// Re-export testing utilities
export {
  MockConnection,
  MockConnectionFactory,
  StaticMetricSource,
  RecordingLogger,
  type LogEntry,
} from './testing';
