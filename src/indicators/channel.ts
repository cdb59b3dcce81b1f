/**
 * Channel Indicators
 *
 * Two interchangeable price channels over the last `period` closes:
 * - Bollinger: mean +/- deviation * sample stddev of closes
 * - Linear regression: least-squares line evaluated at the newest bar
 *   +/- deviation * sample stddev of the residuals
 *
 * Both sit behind ChannelIndicator; the variant is picked by configuration.
 */

import { RollingWindow } from './RollingWindow.js';
import type { ChannelConfig, ChannelIndicator } from './types.js';
import type {
  BollingerBands,
  ChannelBands,
  ChannelVariant,
  RegressionBands,
} from '../types.js';

type BandCalculator = (closes: readonly number[]) => ChannelBands;

/**
 * Sample standard deviation (N - 1 denominator)
 */
export function sampleStdDev(values: readonly number[]): number {
  const n = values.length;
  if (n < 2) {
    return 0;
  }
  const mean = values.reduce((acc, v) => acc + v, 0) / n;
  const variance = values.reduce((acc, v) => acc + (v - mean) ** 2, 0) / (n - 1);
  return variance > 0 ? Math.sqrt(variance) : 0;
}

/**
 * Least-squares fit of closes[i] = slope * i + intercept, i = 0..n-1
 */
export function linearRegression(closes: readonly number[]): { slope: number; intercept: number } {
  const n = closes.length;
  const sumX = (n * (n - 1)) / 2;
  const sumX2 = ((n - 1) * n * (2 * n - 1)) / 6;
  let sumY = 0;
  let sumXY = 0;
  for (let i = 0; i < n; i++) {
    sumY += closes[i];
    sumXY += i * closes[i];
  }

  const denominator = n * sumX2 - sumX * sumX;
  if (denominator === 0) {
    // Single point: flat line through it
    return { slope: 0, intercept: n === 0 ? 0 : sumY / n };
  }

  const slope = (n * sumXY - sumX * sumY) / denominator;
  const intercept = (sumY - slope * sumX) / n;
  return { slope, intercept };
}

function bollingerCalculator(upperDeviation: number, lowerDeviation: number): BandCalculator {
  return (closes): BollingerBands => {
    const mid = closes.reduce((acc, v) => acc + v, 0) / closes.length;
    const stdDev = sampleStdDev(closes);
    const upper = mid + upperDeviation * stdDev;
    const lower = mid - lowerDeviation * stdDev;

    return {
      variant: 'BOLLINGER',
      upper,
      mid,
      lower,
      stdDev,
    };
  };
}

function regressionCalculator(upperDeviation: number, lowerDeviation: number): BandCalculator {
  return (closes): RegressionBands => {
    const { slope, intercept } = linearRegression(closes);
    const mid = slope * (closes.length - 1) + intercept;
    const residuals = closes.map((close, i) => close - (slope * i + intercept));
    const stdDev = sampleStdDev(residuals);
    const upper = mid + upperDeviation * stdDev;
    const lower = mid - lowerDeviation * stdDev;

    return {
      variant: 'LINEAR_REGRESSION',
      upper,
      mid,
      lower,
      stdDev,
      slope,
      intercept,
    };
  };
}

/**
 * Rolling window of closes feeding one band calculator
 */
class RollingChannel implements ChannelIndicator {
  readonly variant: ChannelVariant;
  readonly period: number;
  private readonly closes: RollingWindow;
  private readonly calculate: BandCalculator;
  private bands: ChannelBands | null = null;

  constructor(variant: ChannelVariant, period: number, calculate: BandCalculator) {
    this.variant = variant;
    this.period = period;
    this.closes = new RollingWindow(period);
    this.calculate = calculate;
  }

  update(close: number): ChannelBands | null {
    this.closes.push(close);
    this.bands = this.closes.isFull() ? this.calculate(this.closes.values()) : null;
    return this.bands;
  }

  get current(): ChannelBands | null {
    return this.bands;
  }

  get isReady(): boolean {
    return this.bands !== null;
  }

  reset(): void {
    this.closes.clear();
    this.bands = null;
  }
}

export function createBollingerChannel(
  period: number,
  upperDeviation: number,
  lowerDeviation: number
): ChannelIndicator {
  return new RollingChannel('BOLLINGER', period, bollingerCalculator(upperDeviation, lowerDeviation));
}

export function createRegressionChannel(
  period: number,
  upperDeviation: number,
  lowerDeviation: number
): ChannelIndicator {
  return new RollingChannel(
    'LINEAR_REGRESSION',
    period,
    regressionCalculator(upperDeviation, lowerDeviation)
  );
}

/**
 * Build the channel named by `channelVariant`
 */
export function createChannel(config: ChannelConfig): ChannelIndicator {
  switch (config.channelVariant) {
    case 'BOLLINGER':
      return createBollingerChannel(config.period, config.upperDeviation, config.lowerDeviation);
    case 'LINEAR_REGRESSION':
      return createRegressionChannel(config.period, config.upperDeviation, config.lowerDeviation);
  }
}

/**
 * Close strictly above the upper band
 */
export function isAboveUpperBand(close: number, upper: number): boolean {
  return close > upper;
}

/**
 * Close strictly below the lower band
 */
export function isBelowLowerBand(close: number, lower: number): boolean {
  return close < lower;
}
