import Decimal from 'decimal.js';
import { createId } from '@paralleldrive/cuid2';
import { InvalidParameterError } from '../errors.js';
import type { Payer, LedgerPayer, LedgerTotals } from './types.js';

export const DEFAULT_TOTAL_BALANCE = 450000;

export function defaultPayers(): Payer[] {
  return [
    { id: createId(), name: 'Payer 1', downPayment: 50000 },
    { id: createId(), name: 'Payer 2', downPayment: 50000 },
    { id: createId(), name: 'Payer 3', downPayment: 50000 },
  ];
}

/**
 * Splits the shared total evenly across payers and nets each payer's down payment
 * out of their share. A down payment larger than the share yields a negative balance,
 * which is passed through untouched.
 */
export function splitBalance(payers: Payer[], totalBalance: number): LedgerPayer[] {
  if (payers.length === 0) {
    throw new InvalidParameterError('payers', 'At least one payer is required to split the balance');
  }
  if (!Number.isFinite(totalBalance)) {
    throw new InvalidParameterError('totalBalance', 'Total balance must be a finite number');
  }

  const share = new Decimal(totalBalance).div(payers.length);

  return payers.map((p) => ({
    id: p.id,
    name: p.name,
    downPayment: p.downPayment,
    outstandingBalance: share.minus(p.downPayment).toNumber(),
  }));
}

export function ledgerTotals(payers: LedgerPayer[]): LedgerTotals {
  let downPayments = new Decimal(0);
  let outstanding = new Decimal(0);

  for (const p of payers) {
    downPayments = downPayments.plus(p.downPayment);
    outstanding = outstanding.plus(p.outstandingBalance);
  }

  return {
    downPayments: downPayments.toNumber(),
    outstanding: outstanding.toNumber(),
    total: downPayments.plus(outstanding).toNumber(),
  };
}
