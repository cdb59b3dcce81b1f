/**
 * Strategy configuration schema
 *
 * Every parameter is checked once, before the engine processes a bar.
 */

import { z } from 'zod';
import { InvalidConfigurationError } from '../errors.js';
import { logger } from '../logger.js';

const positiveInt = z.number().int().positive();
const finiteNumber = z.number().finite();

const EnabledModesSchema = z.object({
  reversionLong: z.boolean().default(true),
  reversionShort: z.boolean().default(true),
  breakoutLong: z.boolean().default(true),
  breakoutShort: z.boolean().default(true),
});

export const StrategyConfigSchema = z
  .object({
    symbol: z.string().trim().min(1).default('UNKNOWN'),

    // Channel
    channelVariant: z.enum(['BOLLINGER', 'LINEAR_REGRESSION']),
    period: z.number().int().gt(1),
    upperDeviation: finiteNumber.positive(),
    lowerDeviation: finiteNumber.positive(),
    betweenFactor: finiteNumber.nonnegative(),

    // Trend-Quality
    fastLength: positiveInt,
    slowLength: positiveInt,
    trendLength: positiveInt,
    noiseLength: positiveInt,
    correctionFactor: finiteNumber.positive(),
    noiseType: z.enum(['LINEAR', 'SQUARED']).default('LINEAR'),
    highThreshold: finiteNumber,
    lowThreshold: finiteNumber,

    // Positions
    maxOrders: z.number().int().min(1),
    positionFraction: finiteNumber.gt(0).lte(1),
    enabledModes: EnabledModesSchema.default({}),
    barSequencePolicy: z.enum(['reject', 'skip']).default('reject'),
  })
  .superRefine((cfg, ctx) => {
    if (cfg.lowThreshold >= cfg.highThreshold) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['lowThreshold'],
        message: `must be below highThreshold (${cfg.lowThreshold} >= ${cfg.highThreshold})`,
      });
    }
  });

/** Configuration as callers write it; optional fields take defaults */
export type StrategyConfigInput = z.input<typeof StrategyConfigSchema>;

/** Validated configuration with defaults applied */
export type StrategyConfig = z.output<typeof StrategyConfigSchema>;

export type EnabledModes = StrategyConfig['enabledModes'];

/**
 * Validate strategy parameters
 *
 * @throws InvalidConfigurationError listing every failing field
 */
export function validateStrategyConfig(input: StrategyConfigInput): StrategyConfig {
  const result = StrategyConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`
    );
    throw new InvalidConfigurationError(issues);
  }

  const parsed = result.data;
  if (parsed.fastLength >= parsed.slowLength) {
    logger.warn('Fast EMA length is not shorter than slow EMA length', {
      symbol: parsed.symbol,
      fastLength: parsed.fastLength,
      slowLength: parsed.slowLength,
    });
  }

  return parsed;
}
