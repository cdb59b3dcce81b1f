/**
 * Replay Application
 *
 * Orchestrates one instrument's replay:
 * Bars → Strategy Engine → Paper Broker
 */

import { logger } from './logger.js';
import type { Config } from './config.js';
import { StrategyEngine } from './strategy/index.js';
import type { PositionState, StrategyConfigInput } from './strategy/index.js';
import { PaperBroker } from './execution/index.js';
import type { Books, PaperBrokerConfig } from './execution/index.js';
import type { Bar } from './types.js';

export interface ReplayOptions {
  strategy: StrategyConfigInput;
  broker: PaperBrokerConfig;
}

export interface ReplaySummary {
  symbol: string;
  bars: number;
  skippedBars: number;
  intents: number;
  fills: number;
  finalCash: number;
  finalEquity: number;
  netShares: number;
  position: PositionState;
  books: Books;
}

/**
 * Map environment configuration onto engine and broker settings
 */
export function replayOptionsFromConfig(cfg: Config): ReplayOptions {
  return {
    strategy: {
      symbol: cfg.replay.symbol,
      channelVariant: cfg.channel.variant,
      period: cfg.channel.period,
      upperDeviation: cfg.channel.upperDeviation,
      lowerDeviation: cfg.channel.lowerDeviation,
      betweenFactor: cfg.channel.betweenFactor,
      fastLength: cfg.trendQuality.fastLength,
      slowLength: cfg.trendQuality.slowLength,
      trendLength: cfg.trendQuality.trendLength,
      noiseLength: cfg.trendQuality.noiseLength,
      correctionFactor: cfg.trendQuality.correctionFactor,
      noiseType: cfg.trendQuality.noiseType,
      lowThreshold: cfg.trendQuality.lowThreshold,
      highThreshold: cfg.trendQuality.highThreshold,
      maxOrders: cfg.position.maxOrders,
      positionFraction: cfg.position.positionFraction,
      enabledModes: {
        reversionLong: cfg.position.enableReversionLong,
        reversionShort: cfg.position.enableReversionShort,
        breakoutLong: cfg.position.enableBreakoutLong,
        breakoutShort: cfg.position.enableBreakoutShort,
      },
      barSequencePolicy: cfg.position.barSequencePolicy,
    },
    broker: {
      symbol: cfg.replay.symbol,
      initialCash: cfg.replay.initialCash,
      leverage: cfg.replay.leverage,
    },
  };
}

export class ReplayApp {
  private readonly strategyEngine: StrategyEngine;
  private readonly broker: PaperBroker;
  private intentCount = 0;
  private skippedBars = 0;

  constructor(options: ReplayOptions) {
    this.strategyEngine = new StrategyEngine(options.strategy);
    this.broker = new PaperBroker(options.broker);

    this.setupEventPipeline();
  }

  /**
   * Strategy Engine → Paper Broker
   */
  private setupEventPipeline(): void {
    this.strategyEngine.on('intent', (event) => {
      this.intentCount++;
      this.broker.execute(event.intent, event);
    });

    this.strategyEngine.on('barRejected', (event) => {
      this.skippedBars++;
      logger.debug('Bar rejected during replay', {
        timestamp: event.bar.timestamp,
        reason: event.reason,
      });
    });

    this.broker.on('skipped', (intent, reason) => {
      logger.debug('Broker skipped intent', {
        action: intent.action,
        side: intent.side,
        mode: intent.mode,
        reason,
      });
    });
  }

  /**
   * Replay bars in order and summarize the result
   *
   * @throws BarSequenceError when a bar is out of order and the policy is 'reject'
   */
  public run(bars: readonly Bar[]): ReplaySummary {
    const symbol = this.strategyEngine.config.symbol;
    logger.info('Starting replay', {
      symbol,
      bars: bars.length,
      warmUp: this.strategyEngine.warmUpPeriod,
    });

    let lastClose: number | null = null;
    for (const bar of bars) {
      this.strategyEngine.onBar(bar);
      lastClose = bar.close;
    }

    const summary: ReplaySummary = {
      symbol,
      bars: bars.length,
      skippedBars: this.skippedBars,
      intents: this.intentCount,
      fills: this.broker.getFills().length,
      finalCash: this.broker.getCash(),
      finalEquity: lastClose === null ? this.broker.getCash() : this.broker.equity(lastClose),
      netShares: this.broker.netShares(),
      position: this.strategyEngine.getPositionState(),
      books: this.broker.getBooks(),
    };

    logger.info('Replay complete', {
      symbol,
      bars: summary.bars,
      intents: summary.intents,
      fills: summary.fills,
      finalEquity: summary.finalEquity.toFixed(2),
    });

    return summary;
  }

  public getEngine(): StrategyEngine {
    return this.strategyEngine;
  }

  public getBroker(): PaperBroker {
    return this.broker;
  }
}
