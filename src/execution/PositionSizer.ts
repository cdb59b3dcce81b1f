/**
 * Position Sizer
 *
 * Turns an intent's signed capital fraction into a whole-share order.
 */

import type { PositionSizerConfig, PositionSizeResult } from './types.js';

export class PositionSizer {
  private readonly config: PositionSizerConfig;

  constructor(config: PositionSizerConfig) {
    this.config = config;
  }

  /**
   * Calculate order quantity for an entry
   *
   * Formula:
   * 1. notionalValue = equity * |sizeFraction| * leverage
   * 2. quantity = floor(notionalValue / price)
   * 3. sign follows sizeFraction (negative sells short)
   */
  calculateOrderQuantity(
    equity: number,
    price: number,
    sizeFraction: number
  ): PositionSizeResult {
    if (!(price > 0)) {
      return this.createInvalidResult(`Price ${price} must be positive`);
    }

    if (!(equity > 0)) {
      return this.createInvalidResult(`Equity ${equity.toFixed(2)} leaves no buying power`);
    }

    if (sizeFraction === 0) {
      return this.createInvalidResult('Size fraction is zero');
    }

    const notional = equity * Math.abs(sizeFraction) * this.config.leverage;
    const shares = Math.floor(notional / price);

    if (shares < 1) {
      return this.createInvalidResult(
        `Notional ${notional.toFixed(2)} buys less than one share at ${price}`
      );
    }

    return {
      quantity: sizeFraction > 0 ? shares : -shares,
      notionalValue: shares * price,
      valid: true,
    };
  }

  private createInvalidResult(reason: string): PositionSizeResult {
    return {
      quantity: 0,
      notionalValue: 0,
      valid: false,
      reason,
    };
  }
}
