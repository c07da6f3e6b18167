import { describe, it, expect } from 'vitest';
import { nonNegativeInt, positiveInt } from '../src/config.js';

describe('config parsing', () => {
  it('takes positive integers and falls back on junk', () => {
    expect(positiveInt('8', 16)).toBe(8);
    expect(positiveInt('0', 16)).toBe(16);
    expect(positiveInt('abc', 16)).toBe(16);
    expect(positiveInt(undefined, 16)).toBe(16);
  });

  it('allows zero where a non-negative value is asked for', () => {
    expect(nonNegativeInt('0', 100)).toBe(0);
    expect(nonNegativeInt('250', 100)).toBe(250);
    expect(nonNegativeInt('', 100)).toBe(100);
    expect(nonNegativeInt('-5', 100)).toBe(100);
  });
});
