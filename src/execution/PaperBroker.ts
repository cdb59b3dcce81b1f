/**
 * Paper Broker
 *
 * Fills trade intents at the bar close and tracks shares per book
 * (mode + side) so a CLOSE flattens exactly what that book opened.
 * No fees, slippage or margin calls.
 */

import { EventEmitter } from 'eventemitter3';
import { logger } from '../logger.js';
import type { Bar, TradeIntent } from '../types.js';
import { PositionSizer } from './PositionSizer.js';
import type { BookKey, Books, Fill, PaperBrokerConfig, PaperBrokerEvents } from './types.js';

export function bookKey(intent: Pick<TradeIntent, 'mode' | 'side'>): BookKey {
  return `${intent.mode}_${intent.side}`;
}

function emptyBooks(): Books {
  return {
    REVERSION_LONG: 0,
    REVERSION_SHORT: 0,
    BREAKOUT_LONG: 0,
    BREAKOUT_SHORT: 0,
  };
}

export class PaperBroker extends EventEmitter<PaperBrokerEvents> {
  private readonly config: PaperBrokerConfig;
  private readonly sizer: PositionSizer;
  private books: Books = emptyBooks();
  private cash: number;
  private fills: Fill[] = [];

  constructor(config: PaperBrokerConfig) {
    super();
    this.config = config;
    this.sizer = new PositionSizer({ leverage: config.leverage });
    this.cash = config.initialCash;

    logger.info('Paper Broker initialized', {
      symbol: config.symbol,
      initialCash: config.initialCash,
      leverage: config.leverage,
    });
  }

  /**
   * Execute one intent at the bar close
   *
   * @returns The fill, or null when nothing was traded
   */
  execute(intent: TradeIntent, bar: Pick<Bar, 'timestamp' | 'close'>): Fill | null {
    const key = bookKey(intent);
    const price = bar.close;
    let quantity: number;

    if (intent.action === 'CLOSE') {
      const shares = this.books[key];
      if (shares === 0) {
        return this.skip(intent, `No ${key} shares to close`);
      }
      quantity = intent.side === 'LONG' ? -shares : shares;
      this.books[key] = 0;
    } else {
      const sizing = this.sizer.calculateOrderQuantity(
        this.equity(price),
        price,
        intent.sizeFraction
      );
      if (!sizing.valid) {
        return this.skip(intent, sizing.reason ?? 'Invalid position size');
      }
      quantity = sizing.quantity;
      this.books[key] += Math.abs(quantity);
    }

    this.cash -= quantity * price;

    const fill: Fill = {
      symbol: this.config.symbol,
      timestamp: bar.timestamp,
      intent,
      quantity,
      price,
      cashAfter: this.cash,
    };
    this.fills.push(fill);

    logger.info('Order filled', {
      symbol: fill.symbol,
      book: key,
      action: intent.action,
      quantity,
      price,
    });
    this.emit('filled', fill);

    return fill;
  }

  /**
   * Net signed shares across all books
   */
  netShares(): number {
    return (
      this.books.REVERSION_LONG +
      this.books.BREAKOUT_LONG -
      this.books.REVERSION_SHORT -
      this.books.BREAKOUT_SHORT
    );
  }

  /**
   * Cash plus net shares marked at `price`
   */
  equity(price: number): number {
    return this.cash + this.netShares() * price;
  }

  getCash(): number {
    return this.cash;
  }

  getBooks(): Readonly<Books> {
    return { ...this.books };
  }

  getFills(): readonly Fill[] {
    return this.fills;
  }

  reset(): void {
    this.books = emptyBooks();
    this.cash = this.config.initialCash;
    this.fills = [];
  }

  private skip(intent: TradeIntent, reason: string): null {
    logger.warn('Intent not executed', {
      symbol: this.config.symbol,
      action: intent.action,
      book: bookKey(intent),
      reason,
    });
    this.emit('skipped', intent, reason);
    return null;
  }
}
