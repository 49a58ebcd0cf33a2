import { describe, it, expect } from 'vitest';
import { splitBalance, ledgerTotals, defaultPayers } from '../src/ledger/ledger.js';
import { InvalidParameterError } from '../src/errors.js';
import type { Payer } from '../src/ledger/types.js';

describe('splitBalance', () => {
  it('splits the default ledger into equal net shares', () => {
    const ledger = splitBalance(defaultPayers(), 450000);

    expect(ledger).toHaveLength(3);
    for (const p of ledger) {
      expect(p.outstandingBalance).toBe(100000);
    }
  });

  it('nets each down payment out of its own share', () => {
    const payers: Payer[] = [
      { id: 'a', name: 'Ana', downPayment: 20000 },
      { id: 'b', name: 'Bruno', downPayment: 80000 },
    ];

    const ledger = splitBalance(payers, 300000);

    expect(ledger.map((p) => p.outstandingBalance)).toEqual([130000, 70000]);
    expect(ledger.map((p) => p.id)).toEqual(['a', 'b']);
    expect(ledger.map((p) => p.name)).toEqual(['Ana', 'Bruno']);
  });

  it('passes a negative balance through when the down payment exceeds the share', () => {
    const ledger = splitBalance(
      [
        { id: 'a', name: 'Ana', downPayment: 60000 },
        { id: 'b', name: 'Bruno', downPayment: 0 },
      ],
      100000,
    );

    expect(ledger[0].outstandingBalance).toBe(-10000);
    expect(ledger[1].outstandingBalance).toBe(50000);
  });

  it('recomputes from the inputs on every call', () => {
    const payers = defaultPayers();
    splitBalance(payers, 450000);
    const ledger = splitBalance(payers, 600000);

    expect(ledger[0].outstandingBalance).toBe(150000);
  });

  it('rejects an empty ledger', () => {
    expect(() => splitBalance([], 450000)).toThrow(InvalidParameterError);
  });

  it('rejects a non-finite total', () => {
    expect(() => splitBalance(defaultPayers(), Number.NaN)).toThrow(InvalidParameterError);
  });
});

describe('ledgerTotals', () => {
  it('adds down payments and balances back to the shared total', () => {
    const ledger = splitBalance(
      [
        { id: 'a', name: 'Ana', downPayment: 20000 },
        { id: 'b', name: 'Bruno', downPayment: 80000 },
      ],
      300000,
    );

    expect(ledgerTotals(ledger)).toEqual({ downPayments: 100000, outstanding: 200000, total: 300000 });
  });

  it('holds for any payer count', () => {
    for (let count = 1; count <= 7; count++) {
      const payers: Payer[] = Array.from({ length: count }, (_, i) => ({
        id: `p${i}`,
        name: `Payer ${i + 1}`,
        downPayment: 1234.5 * i,
      }));

      const totals = ledgerTotals(splitBalance(payers, 1000000));

      expect(totals.total).toBeCloseTo(1000000, 6);
    }
  });
});
