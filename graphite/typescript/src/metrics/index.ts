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
} from './snapshots';
