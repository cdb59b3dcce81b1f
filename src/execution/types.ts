/**
 * Types for the paper execution layer used by replays
 */

import type { Side, TradeIntent, TradeMode } from '../types.js';

// ===========================================
// Configuration Types
// ===========================================

/**
 * Position sizing configuration
 */
export interface PositionSizerConfig {
  /** Buying-power multiplier applied to the position fraction */
  leverage: number;
}

/**
 * Paper broker configuration
 */
export interface PaperBrokerConfig extends PositionSizerConfig {
  symbol: string;
  initialCash: number;
}

// ===========================================
// Sizing & Fill Types
// ===========================================

/**
 * Position size calculation result
 */
export interface PositionSizeResult {
  /** Signed share count: positive buys, negative sells */
  quantity: number;
  notionalValue: number;
  valid: boolean;
  reason?: string;
}

/**
 * Book key, one per mode and side (e.g. REVERSION_LONG)
 */
export type BookKey = `${TradeMode}_${Side}`;

/**
 * Shares held per book; always non-negative
 */
export type Books = Record<BookKey, number>;

/**
 * An executed intent
 */
export interface Fill {
  symbol: string;
  timestamp: number;
  intent: TradeIntent;
  /** Signed share count */
  quantity: number;
  price: number;
  cashAfter: number;
}

// ===========================================
// Event Types
// ===========================================

export type PaperBrokerEvents = {
  filled: [fill: Fill];
  skipped: [intent: TradeIntent, reason: string];
};
