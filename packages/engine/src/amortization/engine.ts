import Decimal from 'decimal.js';
import { InvalidParameterError } from '../errors.js';
import type { LedgerPayer } from '../ledger/types.js';
import type { ExtraPayment } from '../extra/types.js';
import { paymentsFor } from '../extra/schedule.js';
import { addMonths, parseIsoDate } from '../summary/calendar.js';
import type { SimulationParams, AmortizationRow, PayerSchedule, SacSimulation } from './types.js';

function assertParams(params: SimulationParams): void {
  if (!Number.isInteger(params.termMonths) || params.termMonths <= 0) {
    throw new InvalidParameterError('termMonths', `Term must be a positive whole number of months, got ${params.termMonths}`);
  }
  if (!Number.isFinite(params.annualRatePct)) {
    throw new InvalidParameterError('annualRatePct', 'Annual rate must be a finite number');
  }
  parseIsoDate(params.startDate);
}

function assertLedger(payers: LedgerPayer[]): void {
  if (payers.length === 0) {
    throw new InvalidParameterError('payers', 'At least one payer is required');
  }
  const ids = new Set(payers.map((p) => p.id));
  if (ids.size !== payers.length) {
    throw new InvalidParameterError('payers', 'Payer ids must be unique');
  }
}

export function monthlyRateOf(annualRatePct: number): Decimal {
  return new Decimal(annualRatePct).div(100).div(12);
}

/**
 * Constant-amortization (SAC) schedule for one payer.
 *
 * The installment is taken before the month's amortization and extra payments are
 * subtracted. The balance is floored at zero once per month, after extra payments;
 * later months keep reporting the fixed amortization as installment even when the
 * balance is already zero.
 */
export function simulatePayer(
  payer: LedgerPayer,
  params: SimulationParams,
  extraPayments: ExtraPayment[],
): PayerSchedule {
  assertParams(params);

  const monthlyRate = monthlyRateOf(params.annualRatePct);
  const fixedAmortization = new Decimal(payer.outstandingBalance).div(params.termMonths);
  const amortizationAmount = fixedAmortization.toNumber();

  let balance = new Decimal(payer.outstandingBalance);
  const rows: AmortizationRow[] = [];

  for (let month = 1; month <= params.termMonths; month++) {
    const interest = balance.times(monthlyRate);
    const interestAmount = interest.toNumber();

    balance = balance.minus(fixedAmortization);
    for (const extra of paymentsFor(extraPayments, payer.name, month)) {
      balance = balance.minus(extra.amount);
    }
    if (balance.isNegative()) {
      balance = new Decimal(0);
    }

    rows.push({
      payerId: payer.id,
      payerName: payer.name,
      monthIndex: month,
      calendarLabel: addMonths(params.startDate, month),
      balanceAfter: balance.toNumber(),
      amortizationAmount,
      interestAmount,
      // Summed from the emitted parts so the row adds up exactly
      installmentAmount: amortizationAmount + interestAmount,
    });
  }

  return {
    payerId: payer.id,
    payerName: payer.name,
    startingBalance: payer.outstandingBalance,
    rows,
  };
}

export function simulateSac(
  payers: LedgerPayer[],
  params: SimulationParams,
  extraPayments: ExtraPayment[] = [],
): SacSimulation {
  assertLedger(payers);
  assertParams(params);

  const schedules: Record<string, PayerSchedule> = {};
  for (const payer of payers) {
    schedules[payer.id] = simulatePayer(payer, params, extraPayments);
  }

  return { params, schedules };
}
