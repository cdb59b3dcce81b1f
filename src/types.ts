/**
 * Common types for the channel regime engine
 */

// ===========================================
// Market Data Types
// ===========================================

/**
 * A completed price bar. Timestamps are epoch milliseconds
 * and must strictly increase within one instrument's stream.
 */
export interface Bar {
  timestamp: number;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

// ===========================================
// Indicator Types
// ===========================================

export type ChannelVariant = 'BOLLINGER' | 'LINEAR_REGRESSION';

/**
 * How the Trend-Quality noise term aggregates |cpc - trend|
 */
export type NoiseType = 'LINEAR' | 'SQUARED';

interface BandsBase {
  upper: number;
  mid: number;
  lower: number;
  /** Standard deviation the bands were built from (sample, N-1) */
  stdDev: number;
}

export interface BollingerBands extends BandsBase {
  variant: 'BOLLINGER';
}

export interface RegressionBands extends BandsBase {
  variant: 'LINEAR_REGRESSION';
  slope: number;
  intercept: number;
}

/**
 * Channel values at the current bar
 */
export type ChannelBands = BollingerBands | RegressionBands;

// ===========================================
// Trade Intent Types
// ===========================================

export type Side = 'LONG' | 'SHORT';

export type TradeMode = 'REVERSION' | 'BREAKOUT';

export type IntentAction = 'OPEN' | 'CLOSE';

/**
 * Instruction for the host. OPEN carries the signed fraction of
 * allocatable capital; CLOSE carries 1 and flattens the whole book
 * of that mode and side.
 */
export interface TradeIntent {
  action: IntentAction;
  side: Side;
  mode: TradeMode;
  sizeFraction: number;
  reason: string;
}

// ===========================================
// Event Emitter Types
// ===========================================

export interface IndicatorsUpdatedEvent {
  symbol: string;
  timestamp: number;
  close: number;
  trendQuality: number | null;
  bands: ChannelBands | null;
}

export interface IntentEvent {
  symbol: string;
  timestamp: number;
  close: number;
  intent: TradeIntent;
}

export interface BarRejectedEvent {
  symbol: string;
  bar: Bar;
  reason: string;
}

export type StrategyEvents = {
  indicatorsUpdated: [event: IndicatorsUpdatedEvent];
  intent: [event: IntentEvent];
  barRejected: [event: BarRejectedEvent];
};
