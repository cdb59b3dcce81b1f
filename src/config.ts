import { config as dotenvConfig } from 'dotenv';

// Load environment variables
dotenvConfig();

function getEnvVar(key: string, defaultValue?: string): string {
  const value = process.env[key] ?? defaultValue;
  if (value === undefined) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}

function getEnvNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined || value.trim() === '') {
    return defaultValue;
  }
  const parsed = parseFloat(value);
  if (isNaN(parsed)) {
    throw new Error(`Environment variable ${key} must be a number`);
  }
  return parsed;
}

function getEnvBoolean(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (value === undefined) {
    return defaultValue;
  }
  return value.toLowerCase() === 'true';
}

function getEnvChoice<T extends string>(
  key: string,
  choices: readonly T[],
  defaultValue: T
): T {
  const value = getEnvVar(key, defaultValue).toUpperCase();
  const match = choices.find((choice) => choice.toUpperCase() === value);
  if (match === undefined) {
    throw new Error(
      `Environment variable ${key} must be one of: ${choices.join(', ')}`
    );
  }
  return match;
}

export const config = {
  // Replay Configuration
  replay: {
    symbol: getEnvVar('SYMBOL', 'QQQ'),

    /** CSV file with timestamp,open,high,low,close,volume rows */
    barsFile: getEnvVar('BARS_FILE', 'data/sample-bars.csv'),

    /** Starting cash for the paper broker */
    initialCash: getEnvNumber('INITIAL_CASH', 100000),

    /** Buying-power multiplier applied to position fractions */
    leverage: getEnvNumber('LEVERAGE', 2),
  },

  // Channel Configuration
  channel: {
    variant: getEnvChoice(
      'CHANNEL_VARIANT',
      ['BOLLINGER', 'LINEAR_REGRESSION'] as const,
      'LINEAR_REGRESSION'
    ),
    period: getEnvNumber('CHANNEL_PERIOD', 100),
    upperDeviation: getEnvNumber('UPPER_DEVIATION', 2),
    lowerDeviation: getEnvNumber('LOWER_DEVIATION', 2),

    /** Exit offset as a fraction of the close (0.0005 = 5 bps) */
    betweenFactor: getEnvNumber('BETWEEN_FACTOR', 0.0005),
  },

  // Trend-Quality Configuration
  trendQuality: {
    fastLength: getEnvNumber('TQ_FAST_LENGTH', 7),
    slowLength: getEnvNumber('TQ_SLOW_LENGTH', 15),
    trendLength: getEnvNumber('TQ_TREND_LENGTH', 4),
    noiseLength: getEnvNumber('TQ_NOISE_LENGTH', 250),
    correctionFactor: getEnvNumber('TQ_CORRECTION_FACTOR', 2),
    noiseType: getEnvChoice('TQ_NOISE_TYPE', ['LINEAR', 'SQUARED'] as const, 'LINEAR'),
    lowThreshold: getEnvNumber('TQ_LOW_THRESHOLD', -4),
    highThreshold: getEnvNumber('TQ_HIGH_THRESHOLD', 2.5),
  },

  // Position Configuration
  position: {
    /** Maximum pyramided entries per mode and side */
    maxOrders: getEnvNumber('MAX_ORDERS', 3),

    /** Fraction of allocatable capital per entry */
    positionFraction: getEnvNumber('POSITION_FRACTION', 0.5),

    enableReversionLong: getEnvBoolean('ENABLE_REVERSION_LONG', true),
    enableReversionShort: getEnvBoolean('ENABLE_REVERSION_SHORT', true),
    enableBreakoutLong: getEnvBoolean('ENABLE_BREAKOUT_LONG', true),
    enableBreakoutShort: getEnvBoolean('ENABLE_BREAKOUT_SHORT', true),

    /** 'reject' throws on out-of-order bars, 'skip' drops them */
    barSequencePolicy: getEnvChoice('BAR_SEQUENCE_POLICY', ['reject', 'skip'] as const, 'reject'),
  },

  // Logging Configuration
  logging: {
    level: getEnvVar('LOG_LEVEL', 'info'),
    toFile: getEnvBoolean('LOG_TO_FILE', false),
    silent: getEnvBoolean('LOG_SILENT', false),
  },
} as const;

export type Config = typeof config;
