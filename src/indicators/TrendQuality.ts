/**
 * Trend-Quality Indicator
 *
 * TQ = smoothed cumulative price change / average noise.
 * Large positive values mark a clean uptrend, large negative values a clean
 * downtrend, values near zero a ranging market.
 *
 * The cumulative price change (cpc) restarts from zero whenever the fast EMA
 * crosses the slow EMA. Fast and slow EMAs come from technicalindicators and
 * are seeded with the simple average of their first `length` closes.
 */

import { EMA } from 'technicalindicators';
import { RollingWindow } from './RollingWindow.js';
import type { TrendQualityConfig, TrendQualityState } from './types.js';

/** Noise at or below this is treated as zero */
export const NOISE_EPSILON = 1e-10;

export class TrendQualityIndicator {
  readonly warmUpPeriod: number;
  private readonly config: TrendQualityConfig;
  private readonly smoothing: number;
  private readonly diffs: RollingWindow;
  private fastEma: EMA;
  private slowEma: EMA;
  private fastValue: number | null = null;
  private slowValue: number | null = null;
  private cpc = 0;
  private trend = 0;
  private noise: number | null = null;
  private previousClose: number | null = null;
  private lastEmaSign: 1 | -1 | null = null;
  private current: number | null = null;

  constructor(config: TrendQualityConfig) {
    this.config = config;
    this.smoothing = 2 / (1 + config.trendLength);
    this.diffs = new RollingWindow(config.noiseLength);
    this.fastEma = this.createEma(config.fastLength);
    this.slowEma = this.createEma(config.slowLength);

    // First bar with both EMAs seeded, plus noiseLength - 1 more to fill the buffer
    this.warmUpPeriod = Math.max(config.fastLength, config.slowLength) + config.noiseLength - 1;
  }

  /**
   * Feed one close
   *
   * @returns TQ for this bar, or null while warming up or when noise is ~0
   */
  update(close: number): number | null {
    const fast = this.fastEma.nextValue(close);
    const slow = this.slowEma.nextValue(close);
    if (fast !== undefined) this.fastValue = fast;
    if (slow !== undefined) this.slowValue = slow;

    if (this.fastValue === null || this.slowValue === null) {
      this.previousClose = close;
      this.current = null;
      return null;
    }

    const sign: 1 | -1 = this.fastValue > this.slowValue ? 1 : -1;
    if (sign !== this.lastEmaSign || this.previousClose === null) {
      this.cpc = 0;
    } else {
      this.cpc += close - this.previousClose;
    }
    this.lastEmaSign = sign;
    this.previousClose = close;

    this.trend = this.trend * (1 - this.smoothing) + this.cpc * this.smoothing;
    this.diffs.push(Math.abs(this.cpc - this.trend));

    if (!this.diffs.isFull()) {
      this.noise = null;
      this.current = null;
      return null;
    }

    this.noise = this.calculateNoise();
    this.current = this.noise > NOISE_EPSILON ? this.trend / this.noise : null;
    return this.current;
  }

  get value(): number | null {
    return this.current;
  }

  get isReady(): boolean {
    return this.current !== null;
  }

  getState(): TrendQualityState {
    return {
      fastEma: this.fastValue,
      slowEma: this.slowValue,
      cpc: this.cpc,
      trend: this.trend,
      noise: this.noise,
      lastEmaSign: this.lastEmaSign,
      value: this.current,
    };
  }

  reset(): void {
    this.fastEma = this.createEma(this.config.fastLength);
    this.slowEma = this.createEma(this.config.slowLength);
    this.fastValue = null;
    this.slowValue = null;
    this.cpc = 0;
    this.trend = 0;
    this.noise = null;
    this.previousClose = null;
    this.lastEmaSign = null;
    this.current = null;
    this.diffs.clear();
  }

  private calculateNoise(): number {
    const samples = this.diffs.length;
    if (this.config.noiseType === 'SQUARED') {
      return this.config.correctionFactor * Math.sqrt(Math.max(0, this.diffs.sumOfSquares) / samples);
    }
    return (this.config.correctionFactor * this.diffs.sum) / samples;
  }

  private createEma(period: number): EMA {
    return new EMA({ period, values: [] });
  }
}
