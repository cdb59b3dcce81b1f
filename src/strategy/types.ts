/**
 * Types for Strategy Engine
 */

import type { ChannelBands, TradeIntent } from '../types.js';
import type { StrategyConfig } from './validation.js';

export type { StrategyConfig, StrategyConfigInput, EnabledModes } from './validation.js';

/**
 * Pyramiding counters, one per mode and side. Each stays in [0, maxOrders]
 * and drops to 0 when its book is closed.
 */
export interface PositionState {
  readonly reversionLong: number;
  readonly reversionShort: number;
  readonly breakoutLong: number;
  readonly breakoutShort: number;
}

export const FLAT_POSITION_STATE: PositionState = Object.freeze({
  reversionLong: 0,
  reversionShort: 0,
  breakoutLong: 0,
  breakoutShort: 0,
});

/**
 * Everything the state machine looks at for one bar
 */
export interface BarContext {
  close: number;
  /** null while Trend-Quality is not ready */
  trendQuality: number | null;
  /** null while the channel is not ready */
  bands: ChannelBands | null;
}

/**
 * Result of one state-machine step
 */
export interface StepResult {
  state: PositionState;
  intents: TradeIntent[];
}

/**
 * Subset of the configuration the state machine reads
 */
export type DecisionConfig = Pick<
  StrategyConfig,
  | 'highThreshold'
  | 'lowThreshold'
  | 'betweenFactor'
  | 'maxOrders'
  | 'positionFraction'
  | 'enabledModes'
>;

/**
 * Point-in-time view of an engine, for monitoring
 */
export interface EngineSnapshot {
  symbol: string;
  barsProcessed: number;
  lastTimestamp: number | null;
  trendQuality: number | null;
  bands: ChannelBands | null;
  position: PositionState;
}
