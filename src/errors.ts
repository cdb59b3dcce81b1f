/**
 * Error types raised by the engine and the replay host
 */

/**
 * Strategy parameters failed validation. Raised before any bar is processed.
 */
export class InvalidConfigurationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid strategy configuration: ${issues.join('; ')}`);
    this.name = 'InvalidConfigurationError';
    this.issues = issues;
  }
}

/**
 * A bar arrived out of order, duplicated the previous timestamp,
 * or carried a non-finite price
 */
export class BarSequenceError extends Error {
  readonly timestamp: number;
  readonly previousTimestamp: number | null;

  constructor(message: string, timestamp: number, previousTimestamp: number | null) {
    super(message);
    this.name = 'BarSequenceError';
    this.timestamp = timestamp;
    this.previousTimestamp = previousTimestamp;
  }
}

/**
 * A bar file could not be read or one of its rows is malformed
 */
export class BarFileError extends Error {
  /** 1-based data row number, null when the whole file is at fault */
  readonly row: number | null;

  constructor(message: string, row: number | null = null) {
    super(row === null ? message : `Row ${row}: ${message}`);
    this.name = 'BarFileError';
    this.row = row;
  }
}
