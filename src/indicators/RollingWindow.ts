/**
 * Rolling Window
 *
 * Fixed-capacity FIFO of numbers with running sums, shared by the
 * channel (closes) and the Trend-Quality noise buffer (|cpc - trend|).
 */

export class RollingWindow {
  readonly capacity: number;
  private readonly buffer: number[];
  private start = 0;
  private count = 0;
  private runningSum = 0;
  private runningSumOfSquares = 0;
  private evictionsSinceRebase = 0;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Window capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
    this.buffer = new Array<number>(capacity).fill(0);
  }

  /**
   * Append a value, dropping the oldest once full
   *
   * @returns The evicted value, or undefined while the window is filling
   */
  push(value: number): number | undefined {
    let evicted: number | undefined;

    if (this.count === this.capacity) {
      evicted = this.buffer[this.start];
      this.buffer[this.start] = value;
      this.start = (this.start + 1) % this.capacity;
      this.runningSum -= evicted;
      this.runningSumOfSquares -= evicted * evicted;
      this.evictionsSinceRebase++;
    } else {
      this.buffer[(this.start + this.count) % this.capacity] = value;
      this.count++;
    }

    this.runningSum += value;
    this.runningSumOfSquares += value * value;

    // Subtracting evicted values accumulates rounding error; resum once per rotation
    if (this.evictionsSinceRebase >= this.capacity) {
      this.rebase();
    }

    return evicted;
  }

  /**
   * Values ordered oldest to newest
   */
  values(): number[] {
    const result = new Array<number>(this.count);
    for (let i = 0; i < this.count; i++) {
      result[i] = this.buffer[(this.start + i) % this.capacity];
    }
    return result;
  }

  last(): number | undefined {
    if (this.count === 0) {
      return undefined;
    }
    return this.buffer[(this.start + this.count - 1) % this.capacity];
  }

  get length(): number {
    return this.count;
  }

  get sum(): number {
    return this.runningSum;
  }

  get sumOfSquares(): number {
    return this.runningSumOfSquares;
  }

  isFull(): boolean {
    return this.count === this.capacity;
  }

  mean(): number | null {
    return this.count === 0 ? null : this.runningSum / this.count;
  }

  clear(): void {
    this.buffer.fill(0);
    this.start = 0;
    this.count = 0;
    this.runningSum = 0;
    this.runningSumOfSquares = 0;
    this.evictionsSinceRebase = 0;
  }

  private rebase(): void {
    let sum = 0;
    let sumOfSquares = 0;
    for (const value of this.values()) {
      sum += value;
      sumOfSquares += value * value;
    }
    this.runningSum = sum;
    this.runningSumOfSquares = sumOfSquares;
    this.evictionsSinceRebase = 0;
  }
}
