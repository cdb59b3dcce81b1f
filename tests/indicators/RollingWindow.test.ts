/**
 * Tests for RollingWindow
 */

import { describe, it, expect } from 'vitest';
import { RollingWindow } from '../../src/indicators/RollingWindow.js';

describe('RollingWindow', () => {
  it('should reject a capacity that is not a positive integer', () => {
    expect(() => new RollingWindow(0)).toThrow(RangeError);
    expect(() => new RollingWindow(2.5)).toThrow(RangeError);
  });

  it('should fill up to capacity without evicting', () => {
    const window = new RollingWindow(3);

    expect(window.push(1)).toBeUndefined();
    expect(window.push(2)).toBeUndefined();
    expect(window.isFull()).toBe(false);
    expect(window.push(3)).toBeUndefined();

    expect(window.isFull()).toBe(true);
    expect(window.values()).toEqual([1, 2, 3]);
    expect(window.sum).toBe(6);
    expect(window.length).toBe(3);
  });

  it('should drop the oldest value once full', () => {
    const window = new RollingWindow(3);
    [1, 2, 3].forEach((v) => window.push(v));

    expect(window.push(4)).toBe(1);
    expect(window.values()).toEqual([2, 3, 4]);
    expect(window.sum).toBe(9);
    expect(window.sumOfSquares).toBe(29);
    expect(window.mean()).toBe(3);
    expect(window.last()).toBe(4);
  });

  it('should report no mean or last value when empty', () => {
    const window = new RollingWindow(2);
    expect(window.mean()).toBeNull();
    expect(window.last()).toBeUndefined();
  });

  it('should keep running sums accurate across many rotations', () => {
    const window = new RollingWindow(10);
    for (let i = 0; i < 10000; i++) {
      window.push(0.1);
    }
    expect(window.sum).toBeCloseTo(1, 12);
    expect(window.sumOfSquares).toBeCloseTo(0.1, 12);
  });

  it('should clear all values and sums', () => {
    const window = new RollingWindow(2);
    window.push(5);
    window.push(6);
    window.clear();

    expect(window.length).toBe(0);
    expect(window.sum).toBe(0);
    expect(window.values()).toEqual([]);
    expect(window.push(7)).toBeUndefined();
    expect(window.values()).toEqual([7]);
  });
});
