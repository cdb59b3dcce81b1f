/**
 * Tests for the CSV bar loader
 */

import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'node:url';
import { loadBars, parseBars } from '../../src/replay/barFile.js';
import { BarFileError } from '../../src/errors.js';

describe('parseBars', () => {
  it('should parse epoch-millisecond rows in file order', () => {
    const bars = parseBars(
      [
        'timestamp,open,high,low,close,volume',
        '1000,10,11,9,10.5,200',
        '2000,10.5,12,10,11.5,300',
      ].join('\n')
    );

    expect(bars).toEqual([
      { timestamp: 1000, open: 10, high: 11, low: 9, close: 10.5, volume: 200 },
      { timestamp: 2000, open: 10.5, high: 12, low: 10, close: 11.5, volume: 300 },
    ]);
  });

  it('should accept ISO-8601 timestamps', () => {
    const bars = parseBars('timestamp,open,high,low,close,volume\n2024-01-02T14:30:00Z,1,1,1,1,0\n');
    expect(bars[0].timestamp).toBe(1704205800000);
  });

  it('should normalise header case and whitespace', () => {
    const bars = parseBars(' Timestamp , OPEN ,High,Low, Close ,Volume\n1000,1,2,0.5,1.5,10\n');
    expect(bars[0].close).toBe(1.5);
    expect(bars[0].high).toBe(2);
  });

  it('should default volume to zero when the column is absent', () => {
    const bars = parseBars('timestamp,open,high,low,close\n1000,1,1,1,1\n');
    expect(bars[0].volume).toBe(0);
  });

  it('should skip blank lines', () => {
    const bars = parseBars('timestamp,open,high,low,close,volume\n\n1000,1,1,1,1,0\n\n');
    expect(bars).toHaveLength(1);
  });

  it('should name the first malformed row', () => {
    const csv = 'timestamp,open,high,low,close,volume\n1000,1,1,1,1,0\n2000,1,1,1,abc,0\n';

    expect(() => parseBars(csv)).toThrow(BarFileError);
    expect(() => parseBars(csv)).toThrow(/^Row 2: close: /);
  });

  it('should reject blank price cells instead of reading them as zero', () => {
    const csv = 'timestamp,open,high,low,close,volume\n1,,,,100,5\n';
    expect(() => parseBars(csv)).toThrow(/^Row 1: open: must not be blank; high: must not be blank/);
  });

  it('should reject a blank close', () => {
    const csv = 'timestamp,open,high,low,close,volume\n1,1,1,1,,5\n';
    expect(() => parseBars(csv)).toThrow('Row 1: close: must not be blank');
  });

  it('should reject a non-positive close', () => {
    const csv = 'timestamp,open,high,low,close,volume\n1000,1,1,1,0,0\n';
    expect(() => parseBars(csv)).toThrow(/^Row 1: close: /);
  });

  it('should reject an unparseable timestamp', () => {
    const csv = 'timestamp,open,high,low,close,volume\nyesterday,1,1,1,1,0\n';
    expect(() => parseBars(csv)).toThrow('Row 1: timestamp: unparseable timestamp "yesterday"');
  });
});

describe('loadBars', () => {
  it('should load the bundled sample file', async () => {
    const file = fileURLToPath(new URL('../../data/sample-bars.csv', import.meta.url));
    const bars = await loadBars(file);

    expect(bars).toHaveLength(600);
    expect(bars[0]).toEqual({
      timestamp: 1704205800000,
      open: 400,
      high: 400.1,
      low: 399.95,
      close: 399.99,
      volume: 28038,
    });
    for (let i = 1; i < bars.length; i++) {
      expect(bars[i].timestamp).toBeGreaterThan(bars[i - 1].timestamp);
    }
  });

  it('should reject a missing file with BarFileError', async () => {
    await expect(loadBars('/nonexistent/bars.csv')).rejects.toThrow(
      /^Cannot read \/nonexistent\/bars\.csv: /
    );
    await expect(loadBars('/nonexistent/bars.csv')).rejects.toBeInstanceOf(BarFileError);
  });
});
