/**
 * Bar File Loader
 *
 * Reads OHLCV bars from CSV with a header row:
 * timestamp,open,high,low,close,volume
 *
 * `timestamp` is epoch milliseconds or an ISO-8601 date.
 */

import { readFile } from 'node:fs/promises';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { BarFileError } from '../errors.js';
import { logger } from '../logger.js';
import type { Bar } from '../types.js';

const BLANK = 'must not be blank';

const price = z.string().trim().min(1, BLANK).pipe(z.coerce.number().finite());

const timestampSchema = z
  .string()
  .trim()
  .min(1)
  .transform((value, ctx) => {
    const parsed = /^-?\d+(\.\d+)?$/.test(value) ? Number(value) : Date.parse(value);
    if (!Number.isFinite(parsed)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unparseable timestamp "${value}"` });
      return z.NEVER;
    }
    return parsed;
  });

export const BarRowSchema = z.object({
  timestamp: timestampSchema,
  open: price,
  high: price,
  low: price,
  close: z.string().trim().min(1, BLANK).pipe(z.coerce.number().finite().positive()),
  volume: z
    .string()
    .trim()
    .min(1, BLANK)
    .pipe(z.coerce.number().finite().nonnegative())
    .default('0'),
});

const RecordsSchema = z.array(z.record(z.string()));

/**
 * Parse CSV text into bars, in file order
 *
 * @throws BarFileError naming the first bad row
 */
export function parseBars(csvContent: string): Bar[] {
  let raw: unknown;
  try {
    raw = parse(csvContent, {
      columns: (header: string[]) => header.map((column) => column.trim().toLowerCase()),
      skip_empty_lines: true,
      trim: true,
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new BarFileError(`CSV parse error: ${message}`);
  }

  const records = RecordsSchema.safeParse(raw);
  if (!records.success) {
    throw new BarFileError('CSV did not produce header-keyed records');
  }

  return records.data.map((record, index) => {
    const row = BarRowSchema.safeParse(record);
    if (!row.success) {
      const detail = row.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      throw new BarFileError(detail, index + 1);
    }
    return row.data;
  });
}

/**
 * Load bars from a CSV file
 */
export async function loadBars(filePath: string): Promise<Bar[]> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new BarFileError(`Cannot read ${filePath}: ${message}`);
  }

  const bars = parseBars(content);
  logger.info('Bars loaded', { file: filePath, count: bars.length });
  return bars;
}
