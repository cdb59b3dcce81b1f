/**
 * Types for Indicators
 */

import type { ChannelBands, ChannelVariant, NoiseType } from '../types.js';

/**
 * Configuration for the Trend-Quality indicator
 */
export interface TrendQualityConfig {
  fastLength: number;
  slowLength: number;
  /** Smoothing length for the cumulative price change (SMF = 2 / (1 + n)) */
  trendLength: number;
  /** Number of |cpc - trend| samples averaged into the noise term */
  noiseLength: number;
  correctionFactor: number;
  noiseType: NoiseType;
}

/**
 * Internal Trend-Quality state, exposed for monitoring and tests
 */
export interface TrendQualityState {
  fastEma: number | null;
  slowEma: number | null;
  cpc: number;
  trend: number;
  noise: number | null;
  lastEmaSign: 1 | -1 | null;
  value: number | null;
}

/**
 * Configuration for a channel indicator
 */
export interface ChannelConfig {
  channelVariant: ChannelVariant;
  period: number;
  upperDeviation: number;
  lowerDeviation: number;
}

/**
 * Common contract for both channel variants. The state machine
 * only ever sees this interface.
 */
export interface ChannelIndicator {
  readonly variant: ChannelVariant;
  readonly period: number;
  readonly isReady: boolean;
  readonly current: ChannelBands | null;
  update(close: number): ChannelBands | null;
  reset(): void;
}
