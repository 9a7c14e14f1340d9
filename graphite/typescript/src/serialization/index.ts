/**
 * Serialization module for the Graphite plaintext protocol.
 */

export {
  PlaintextSerializer,
  formatMetric,
  isMetricSnapshot,
  parseMetricSnapshot,
  type FormatContext,
  type SerializerOptions,
} from './plaintext';
export { splitNameAndTags, percentileKey, formatShortestDecimal, type NameAndTags } from './names';
export { formatInteger, formatFixed, formatQuotient, formatRate, formatFloat } from './values';
