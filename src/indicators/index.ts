export { RollingWindow } from './RollingWindow.js';
export { TrendQualityIndicator, NOISE_EPSILON } from './TrendQuality.js';
export {
  createChannel,
  createBollingerChannel,
  createRegressionChannel,
  linearRegression,
  sampleStdDev,
  isAboveUpperBand,
  isBelowLowerBand,
} from './channel.js';
export type {
  TrendQualityConfig,
  TrendQualityState,
  ChannelConfig,
  ChannelIndicator,
} from './types.js';
