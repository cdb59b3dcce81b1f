/**
 * Strategy Engine
 *
 * Per-instrument pipeline run once per completed bar:
 * sequence check -> Trend-Quality -> channel -> state machine -> intents.
 *
 * Every engine owns its indicators and counters; run one engine per instrument.
 */

import { EventEmitter } from 'eventemitter3';
import { logger, formatNumber } from '../logger.js';
import { BarSequenceError } from '../errors.js';
import { TrendQualityIndicator } from '../indicators/TrendQuality.js';
import { createChannel } from '../indicators/channel.js';
import type { ChannelIndicator } from '../indicators/types.js';
import type { Bar, StrategyEvents, TradeIntent } from '../types.js';
import { evaluateBar } from './stateMachine.js';
import { validateStrategyConfig } from './validation.js';
import {
  FLAT_POSITION_STATE,
  type EngineSnapshot,
  type PositionState,
  type StrategyConfig,
  type StrategyConfigInput,
} from './types.js';

export class StrategyEngine extends EventEmitter<StrategyEvents> {
  readonly config: StrategyConfig;
  private readonly trendQuality: TrendQualityIndicator;
  private readonly channel: ChannelIndicator;
  private positionState: PositionState = FLAT_POSITION_STATE;
  private lastTimestamp: number | null = null;
  private barsProcessed = 0;

  /**
   * @throws InvalidConfigurationError before any bar is accepted
   */
  constructor(config: StrategyConfigInput) {
    super();
    this.config = validateStrategyConfig(config);
    this.trendQuality = new TrendQualityIndicator(this.config);
    this.channel = createChannel(this.config);

    logger.info('Strategy Engine initialized', {
      symbol: this.config.symbol,
      channel: this.config.channelVariant,
      period: this.config.period,
      tqWarmUp: this.trendQuality.warmUpPeriod,
      thresholds: [this.config.lowThreshold, this.config.highThreshold],
      maxOrders: this.config.maxOrders,
    });
  }

  /**
   * Process one completed bar
   *
   * @returns Intents in execution order (exits before entries)
   * @throws BarSequenceError for out-of-order, duplicate or non-finite bars
   *   when barSequencePolicy is 'reject'
   */
  public onBar(bar: Bar): TradeIntent[] {
    const rejection = this.checkBar(bar);
    if (rejection !== null) {
      if (this.config.barSequencePolicy === 'reject') {
        throw new BarSequenceError(rejection, bar.timestamp, this.lastTimestamp);
      }
      logger.warn('Skipping bar', {
        symbol: this.config.symbol,
        timestamp: bar.timestamp,
        reason: rejection,
      });
      this.emit('barRejected', { symbol: this.config.symbol, bar, reason: rejection });
      return [];
    }

    this.lastTimestamp = bar.timestamp;
    this.barsProcessed++;

    const trendQuality = this.trendQuality.update(bar.close);
    const bands = this.channel.update(bar.close);

    this.emit('indicatorsUpdated', {
      symbol: this.config.symbol,
      timestamp: bar.timestamp,
      close: bar.close,
      trendQuality,
      bands,
    });

    if (bands === null || trendQuality === null) {
      logger.debug('Indicators not ready', {
        symbol: this.config.symbol,
        bars: this.barsProcessed,
        channelReady: bands !== null,
        trendQualityReady: trendQuality !== null,
      });
    }

    const { state, intents } = evaluateBar(
      this.positionState,
      { close: bar.close, trendQuality, bands },
      this.config
    );
    this.positionState = state;

    logger.debug('Strategy evaluation', {
      symbol: this.config.symbol,
      close: bar.close,
      tq: formatNumber(trendQuality),
      upper: formatNumber(bands?.upper ?? null, 2),
      lower: formatNumber(bands?.lower ?? null, 2),
      intents: intents.length,
    });

    for (const intent of intents) {
      logger.info('Trade intent', {
        symbol: this.config.symbol,
        timestamp: bar.timestamp,
        action: intent.action,
        side: intent.side,
        mode: intent.mode,
        sizeFraction: intent.sizeFraction,
        reason: intent.reason,
      });
      this.emit('intent', {
        symbol: this.config.symbol,
        timestamp: bar.timestamp,
        close: bar.close,
        intent,
      });
    }

    return intents;
  }

  /**
   * Current pyramiding counters
   */
  public getPositionState(): PositionState {
    return this.positionState;
  }

  /**
   * Bars needed before both indicators can be ready
   */
  public get warmUpPeriod(): number {
    return Math.max(this.trendQuality.warmUpPeriod, this.channel.period);
  }

  public getSnapshot(): EngineSnapshot {
    return {
      symbol: this.config.symbol,
      barsProcessed: this.barsProcessed,
      lastTimestamp: this.lastTimestamp,
      trendQuality: this.trendQuality.value,
      bands: this.channel.current,
      position: this.positionState,
    };
  }

  /**
   * Reset indicators, counters and the bar sequence
   */
  public reset(): void {
    this.trendQuality.reset();
    this.channel.reset();
    this.positionState = FLAT_POSITION_STATE;
    this.lastTimestamp = null;
    this.barsProcessed = 0;
    logger.info('Strategy Engine state reset', { symbol: this.config.symbol });
  }

  private checkBar(bar: Bar): string | null {
    if (!Number.isFinite(bar.timestamp)) {
      return 'Bar timestamp is not a finite number';
    }
    if (!Number.isFinite(bar.close)) {
      return `Bar close ${bar.close} is not a finite number`;
    }
    if (this.lastTimestamp !== null) {
      if (bar.timestamp === this.lastTimestamp) {
        return `Duplicate bar at ${bar.timestamp}`;
      }
      if (bar.timestamp < this.lastTimestamp) {
        return `Out-of-order bar at ${bar.timestamp} (previous ${this.lastTimestamp})`;
      }
    }
    return null;
  }
}
