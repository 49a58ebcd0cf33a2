import { describe, it, expect } from 'vitest';
import { formatMoney, sumAmounts } from '../src/math/money.js';

describe('formatMoney', () => {
  it('formats BRL with prefix symbol and dot grouping', () => {
    expect(formatMoney(100000)).toBe('R$ 100.000');
  });

  it('rounds to whole units by default', () => {
    expect(formatMoney(99166.67)).toBe('R$ 99.167');
  });

  it('keeps two decimals when asked', () => {
    expect(formatMoney(1458.3333, 'BRL', 2)).toBe('R$ 1.458,33');
  });

  it('formats negative amount', () => {
    expect(formatMoney(-8500.4)).toBe('-R$ 8.500');
  });

  it('does not sign an amount that rounds to zero', () => {
    expect(formatMoney(-0.4)).toBe('R$ 0');
  });

  it('formats EUR with suffix symbol', () => {
    expect(formatMoney(5000, 'EUR')).toBe('5.000 €');
  });

  it('formats USD with comma grouping', () => {
    expect(formatMoney(1234567.891, 'USD', 2)).toBe('$ 1,234,567.89');
  });

  it('falls back to ISO code suffix for unknown currency', () => {
    expect(formatMoney(1500, 'BTC')).toBe('1 500 BTC');
  });
});

describe('sumAmounts', () => {
  it('sums without binary drift', () => {
    expect(sumAmounts([0.1, 0.2])).toBe(0.3);
  });

  it('handles empty array', () => {
    expect(sumAmounts([])).toBe(0);
  });

  it('handles negatives', () => {
    expect(sumAmounts([1000, -300, -200])).toBe(500);
  });
});
