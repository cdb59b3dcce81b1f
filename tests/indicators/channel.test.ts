/**
 * Tests for channel indicators
 */

import { describe, it, expect } from 'vitest';
import {
  createBollingerChannel,
  createChannel,
  createRegressionChannel,
  isAboveUpperBand,
  isBelowLowerBand,
  linearRegression,
  sampleStdDev,
} from '../../src/indicators/channel.js';
import type { ChannelIndicator } from '../../src/indicators/types.js';
import { evaluateBar } from '../../src/strategy/stateMachine.js';
import { FLAT_POSITION_STATE } from '../../src/strategy/types.js';
import type { ChannelBands } from '../../src/types.js';

function feed(channel: ChannelIndicator, closes: number[]): ChannelBands | null {
  let bands: ChannelBands | null = null;
  for (const close of closes) {
    bands = channel.update(close);
  }
  return bands;
}

describe('sampleStdDev', () => {
  it('should use the N-1 denominator', () => {
    // mean 3, squared deviations sum to 10, 10 / 4
    expect(sampleStdDev([1, 2, 3, 4, 5])).toBeCloseTo(Math.sqrt(2.5), 12);
  });

  it('should return 0 for fewer than two values', () => {
    expect(sampleStdDev([])).toBe(0);
    expect(sampleStdDev([7])).toBe(0);
  });
});

describe('linearRegression', () => {
  it('should fit slope and intercept by least squares', () => {
    const { slope, intercept } = linearRegression([2, 4, 3, 5]);
    expect(slope).toBeCloseTo(0.8, 12);
    expect(intercept).toBeCloseTo(2.3, 12);
  });
});

describe('Bollinger channel', () => {
  it('should not be ready until the window holds period closes', () => {
    const channel = createBollingerChannel(5, 2, 2);
    expect(feed(channel, [1, 2, 3, 4])).toBeNull();
    expect(channel.isReady).toBe(false);

    expect(channel.update(5)).not.toBeNull();
    expect(channel.isReady).toBe(true);
  });

  it('should build bands from the mean and sample stddev', () => {
    const bands = feed(createBollingerChannel(5, 2, 1), [1, 2, 3, 4, 5]);
    const sd = Math.sqrt(2.5);

    expect(bands).not.toBeNull();
    expect(bands?.variant).toBe('BOLLINGER');
    expect(bands?.mid).toBeCloseTo(3, 12);
    expect(bands?.stdDev).toBeCloseTo(sd, 12);
    expect(bands?.upper).toBeCloseTo(3 + 2 * sd, 12);
    expect(bands?.lower).toBeCloseTo(3 - sd, 12);
    expect(Object.keys(bands ?? {}).sort()).toEqual(['lower', 'mid', 'stdDev', 'upper', 'variant']);
  });

  it('should only use the most recent period closes', () => {
    const bands = feed(createBollingerChannel(3, 2, 2), [1, 2, 3, 10]);
    // window [2, 3, 10]
    expect(bands?.mid).toBeCloseTo(5, 12);
  });
});

describe('Linear regression channel', () => {
  it('should center on the regression value at the newest bar', () => {
    const bands = feed(createRegressionChannel(4, 1, 2), [2, 4, 3, 5]);
    // predictions 2.3, 3.1, 3.9, 4.7; residuals -0.3, 0.9, -0.9, 0.3
    const sd = Math.sqrt(0.6);

    expect(bands?.variant).toBe('LINEAR_REGRESSION');
    expect(bands?.mid).toBeCloseTo(4.7, 12);
    expect(bands?.stdDev).toBeCloseTo(sd, 12);
    expect(bands?.upper).toBeCloseTo(4.7 + sd, 12);
    expect(bands?.lower).toBeCloseTo(4.7 - 2 * sd, 12);
    if (bands?.variant === 'LINEAR_REGRESSION') {
      expect(bands.slope).toBeCloseTo(0.8, 12);
      expect(bands.intercept).toBeCloseTo(2.3, 12);
    }
  });

  it('should collapse onto the last close for a straight rising line', () => {
    const closes = Array.from({ length: 22 }, (_, i) => 100 + i);
    const bands = feed(createRegressionChannel(22, 2.1, 2.1), closes);

    expect(bands).not.toBeNull();
    expect(bands?.mid).toBeCloseTo(121, 10);
    expect(bands?.stdDev).toBeCloseTo(0, 10);
    expect(bands?.upper).toBeCloseTo(121, 10);
    expect(bands?.lower).toBeCloseTo(121, 10);
    if (bands?.variant === 'LINEAR_REGRESSION') {
      expect(bands.slope).toBeGreaterThan(0);
    }
  });

  it('should trigger no entry while the close stays on the collapsed bands', () => {
    const closes = Array.from({ length: 22 }, (_, i) => 100 + i);
    const bands = feed(createRegressionChannel(22, 2.1, 2.1), closes);
    const decision = {
      highThreshold: 2.5,
      lowThreshold: -4,
      betweenFactor: 0.0005,
      maxOrders: 3,
      positionFraction: 0.5,
      enabledModes: {
        reversionLong: true,
        reversionShort: true,
        breakoutLong: true,
        breakoutShort: true,
      },
    };

    expect(bands?.mid).toBeCloseTo(121, 10);
    const close = bands?.mid ?? 121;

    for (const trendQuality of [-5, 0, 5]) {
      const result = evaluateBar(FLAT_POSITION_STATE, { close, trendQuality, bands }, decision);
      expect(result.intents).toEqual([]);
      expect(result.state).toEqual(FLAT_POSITION_STATE);
    }
  });
});

describe('channel variants', () => {
  it('should agree with each other on a flat series', () => {
    const closes = Array.from({ length: 10 }, () => 100);
    const bollinger = feed(createBollingerChannel(10, 2, 2), closes);
    const regression = feed(createRegressionChannel(10, 2, 2), closes);

    for (const bands of [bollinger, regression]) {
      expect(bands?.mid).toBe(100);
      expect(bands?.upper).toBe(100);
      expect(bands?.lower).toBe(100);
      expect(bands?.stdDev).toBe(0);
    }
    if (regression?.variant === 'LINEAR_REGRESSION') {
      expect(regression.slope).toBe(0);
    }
  });

  it('should build the variant named in the configuration', () => {
    const base = { period: 20, upperDeviation: 2, lowerDeviation: 2 };
    expect(createChannel({ ...base, channelVariant: 'BOLLINGER' }).variant).toBe('BOLLINGER');
    expect(createChannel({ ...base, channelVariant: 'LINEAR_REGRESSION' }).variant).toBe(
      'LINEAR_REGRESSION'
    );
  });

  it('should forget its window on reset', () => {
    const channel = createRegressionChannel(3, 2, 2);
    feed(channel, [1, 2, 3]);
    channel.reset();

    expect(channel.current).toBeNull();
    expect(channel.update(4)).toBeNull();
  });
});

describe('band checks', () => {
  it('should require a strict breach', () => {
    expect(isAboveUpperBand(105, 105)).toBe(false);
    expect(isAboveUpperBand(105.01, 105)).toBe(true);
    expect(isBelowLowerBand(95, 95)).toBe(false);
    expect(isBelowLowerBand(94.99, 95)).toBe(true);
  });
});
