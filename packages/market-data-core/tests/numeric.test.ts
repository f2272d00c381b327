import { describe, it, expect } from 'vitest';
import {
  formatPercent,
  formatPrice,
  formatVolume,
  parseVolume,
  percentChange,
  roundToCents,
  toCents,
} from '../src/numeric.js';
import { classifyDrop } from '../src/drops.js';

describe('cent arithmetic', () => {
  it('rounds to cents', () => {
    expect(toCents(103.25)).toBe(10325);
    expect(toCents(0.1 + 0.2)).toBe(30);
    expect(roundToCents(27.7346)).toBe(27.73);
    expect(formatPrice(96)).toBe('96.00');
  });
});

describe('percentChange', () => {
  it('formats moves without a plus sign', () => {
    expect(percentChange(104, 100)).toBe('4.00%');
    expect(percentChange(99, 104)).toBe('-4.81%');
    expect(percentChange(100, 100)).toBe('0.00%');
  });

  it('is empty without a positive predecessor', () => {
    expect(percentChange(100, null)).toBe('');
    expect(percentChange(100, undefined)).toBe('');
    expect(percentChange(100, 0)).toBe('');
  });

  it('formatPercent keeps two decimals', () => {
    expect(formatPercent(-2.5)).toBe('-2.50%');
  });
});

describe('volume strings', () => {
  it('parses suffixed and plain values', () => {
    expect(parseVolume('1.50M')).toBe(1_500_000);
    expect(parseVolume('2.00B')).toBe(2_000_000_000);
    expect(parseVolume('850.00K')).toBe(850_000);
    expect(parseVolume(' 950 ')).toBe(950);
    expect(parseVolume('1,234')).toBe(1234);
  });

  it('reads empty or garbage as zero', () => {
    expect(parseVolume('')).toBe(0);
    expect(parseVolume('n/a')).toBe(0);
  });

  it('formats by magnitude', () => {
    expect(formatVolume(7_500_000)).toBe('7.50M');
    expect(formatVolume(2_340_000_000)).toBe('2.34B');
    expect(formatVolume(1_000)).toBe('1.00K');
    expect(formatVolume(999)).toBe('999');
    expect(formatVolume(0)).toBe('0');
  });
});

describe('classifyDrop', () => {
  it('buckets by severity against the previous close', () => {
    expect(classifyDrop(98, 100)).toBe(2);
    expect(classifyDrop(99, 103)).toBe(3);
    expect(classifyDrop(96, 100)).toBe(4);
    expect(classifyDrop(80, 100)).toBe(5);
  });

  it('puts exact boundaries in the higher bucket', () => {
    expect(classifyDrop(95, 100)).toBe(5);
    expect(classifyDrop(97, 99)).toBe(2);
  });

  it('ignores rises, shallow dips and missing baselines', () => {
    expect(classifyDrop(101, 100)).toBeNull();
    expect(classifyDrop(98.01, 100)).toBeNull();
    expect(classifyDrop(50, 0)).toBeNull();
  });
});
