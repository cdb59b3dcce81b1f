/**
 * Signal / Position State Machine
 *
 * Pure step function: (position counters, bar context) -> (new counters, intents).
 *
 * Regime rules:
 * - Close above upper band, weak TQ  -> short reversion
 * - Close below lower band, weak TQ  -> long reversion
 * - Close above upper band, strong TQ -> long breakout (flattens shorts first)
 * - Close below lower band, strong TQ -> short breakout (flattens longs first)
 * - No reversion entry while any breakout book is open
 *
 * Exits are evaluated before entries so a bar never closes the book it just opened.
 */

import { isAboveUpperBand, isBelowLowerBand } from '../indicators/channel.js';
import type { Side, TradeIntent, TradeMode } from '../types.js';
import type {
  BarContext,
  DecisionConfig,
  PositionState,
  StepResult,
} from './types.js';

type CounterKey = keyof PositionState;

const COUNTERS: Record<TradeMode, Record<Side, CounterKey>> = {
  REVERSION: { LONG: 'reversionLong', SHORT: 'reversionShort' },
  BREAKOUT: { LONG: 'breakoutLong', SHORT: 'breakoutShort' },
};

export function counterKey(mode: TradeMode, side: Side): CounterKey {
  return COUNTERS[mode][side];
}

/**
 * TQ at or beyond either threshold
 */
export function isExtreme(tq: number, config: DecisionConfig): boolean {
  return tq >= config.highThreshold || tq <= config.lowThreshold;
}

/**
 * TQ strictly between the thresholds
 */
export function isInsideRange(tq: number, config: DecisionConfig): boolean {
  return tq > config.lowThreshold && tq < config.highThreshold;
}

/**
 * Mutable working copy for one step; the caller's state is never touched
 */
class Step {
  readonly counters: Record<CounterKey, number>;
  readonly intents: TradeIntent[] = [];

  constructor(state: PositionState, private readonly config: DecisionConfig) {
    this.counters = { ...state };
  }

  isOpen(mode: TradeMode, side: Side): boolean {
    return this.counters[counterKey(mode, side)] > 0;
  }

  close(mode: TradeMode, side: Side, reason: string): void {
    if (!this.isOpen(mode, side)) {
      return;
    }
    this.counters[counterKey(mode, side)] = 0;
    this.intents.push({ action: 'CLOSE', side, mode, sizeFraction: 1, reason });
  }

  open(mode: TradeMode, side: Side, reason: string): void {
    const key = counterKey(mode, side);
    if (this.counters[key] >= this.config.maxOrders) {
      return;
    }
    this.counters[key] += 1;
    const fraction = this.config.positionFraction;
    this.intents.push({
      action: 'OPEN',
      side,
      mode,
      sizeFraction: side === 'LONG' ? fraction : -fraction,
      reason,
    });
  }

  result(): StepResult {
    return { state: { ...this.counters }, intents: this.intents };
  }
}

/**
 * Evaluate one bar
 *
 * Order: reversion-short exit, reversion-long exit, breakout-long exit,
 * breakout-short exit, then reversion-short, reversion-long, breakout-long
 * and breakout-short entries.
 */
export function evaluateBar(
  state: PositionState,
  context: BarContext,
  config: DecisionConfig
): StepResult {
  const step = new Step(state, config);
  const { close, bands, trendQuality: tq } = context;

  if (bands === null) {
    return step.result();
  }

  const { upper, lower } = bands;
  const upperExit = upper - close * config.betweenFactor;
  const lowerExit = lower + close * config.betweenFactor;

  // === EXITS ===
  // NotReady TQ counts as extreme for reversion books, never for breakout books
  if (step.isOpen('REVERSION', 'SHORT')) {
    if (close < upperExit) {
      step.close('REVERSION', 'SHORT', 'Close back inside upper band');
    } else if (tq === null) {
      step.close('REVERSION', 'SHORT', 'Trend-Quality not ready');
    } else if (isExtreme(tq, config)) {
      step.close('REVERSION', 'SHORT', 'Trend-Quality extreme');
    }
  }

  if (step.isOpen('REVERSION', 'LONG')) {
    if (close > lowerExit) {
      step.close('REVERSION', 'LONG', 'Close back inside lower band');
    } else if (tq === null) {
      step.close('REVERSION', 'LONG', 'Trend-Quality not ready');
    } else if (isExtreme(tq, config)) {
      step.close('REVERSION', 'LONG', 'Trend-Quality extreme');
    }
  }

  if (tq !== null && isInsideRange(tq, config)) {
    if (step.isOpen('BREAKOUT', 'LONG') && close < upperExit) {
      step.close('BREAKOUT', 'LONG', 'Breakout faded below upper band');
    }
    if (step.isOpen('BREAKOUT', 'SHORT') && close > lowerExit) {
      step.close('BREAKOUT', 'SHORT', 'Breakout faded above lower band');
    }
  }

  // === ENTRIES ===
  if (tq === null) {
    return step.result();
  }

  const aboveUpper = isAboveUpperBand(close, upper);
  const belowLower = isBelowLowerBand(close, lower);
  const { enabledModes } = config;
  // Reversion and breakout books are never open together, on either side
  const breakoutActive = step.isOpen('BREAKOUT', 'LONG') || step.isOpen('BREAKOUT', 'SHORT');

  if (enabledModes.reversionShort && aboveUpper && tq < config.highThreshold && !breakoutActive) {
    step.open('REVERSION', 'SHORT', 'Close above upper band, weak trend');
  }

  if (enabledModes.reversionLong && belowLower && tq > config.lowThreshold && !breakoutActive) {
    step.open('REVERSION', 'LONG', 'Close below lower band, weak trend');
  }

  if (enabledModes.breakoutLong && aboveUpper && tq > config.highThreshold) {
    step.close('BREAKOUT', 'SHORT', 'Flatten short before long breakout');
    step.close('REVERSION', 'SHORT', 'Flatten short before long breakout');
    step.open('BREAKOUT', 'LONG', 'Close above upper band, strong uptrend');
  }

  if (enabledModes.breakoutShort && belowLower && tq < config.lowThreshold) {
    step.close('BREAKOUT', 'LONG', 'Flatten long before short breakout');
    step.close('REVERSION', 'LONG', 'Flatten long before short breakout');
    step.open('BREAKOUT', 'SHORT', 'Close below lower band, strong downtrend');
  }

  return step.result();
}
