import Decimal from 'decimal.js';
import type { AmortizationRow, SacSimulation } from '../amortization/types.js';
import type { ExtraPayment } from '../extra/types.js';
import { hasEffect } from '../extra/schedule.js';
import { sumAmounts } from '../math/money.js';
import { addMonths } from './calendar.js';
import type { PayerSummary, MonthlyAggregate } from './types.js';

export function lastActiveMonth(rows: AmortizationRow[]): number | null {
  let last: number | null = null;
  for (const row of rows) {
    if (row.balanceAfter > 0 && (last === null || row.monthIndex > last)) {
      last = row.monthIndex;
    }
  }
  return last;
}

export function summarizeSchedules(
  simulation: SacSimulation,
  extraPayments: ExtraPayment[] = [],
): PayerSummary[] {
  const { startDate, termMonths } = simulation.params;

  return Object.values(simulation.schedules).map((schedule) => {
    const last = lastActiveMonth(schedule.rows);

    let totalInterest = new Decimal(0);
    let totalInstallments = new Decimal(0);
    for (const row of schedule.rows) {
      totalInterest = totalInterest.plus(row.interestAmount);
      totalInstallments = totalInstallments.plus(row.installmentAmount);
    }

    const totalExtraPayments = sumAmounts(
      extraPayments
        .filter((p) => p.payerName === schedule.payerName && p.month >= 1 && p.month <= termMonths)
        .filter(hasEffect)
        .map((p) => p.amount),
    );

    return {
      payerId: schedule.payerId,
      payerName: schedule.payerName,
      lastActiveMonth: last,
      lastPaymentLabel: last === null ? null : addMonths(startDate, last),
      totalInterest: totalInterest.toNumber(),
      totalInstallments: totalInstallments.toNumber(),
      totalExtraPayments,
    };
  });
}

export function flattenSchedules(simulation: SacSimulation): AmortizationRow[] {
  return Object.values(simulation.schedules).flatMap((s) => s.rows);
}

export function aggregateByMonth(simulation: SacSimulation): MonthlyAggregate[] {
  const byMonth = new Map<number, { label: string; balance: Decimal; interest: Decimal; installment: Decimal }>();

  for (const row of flattenSchedules(simulation)) {
    const acc = byMonth.get(row.monthIndex) ?? {
      label: row.calendarLabel,
      balance: new Decimal(0),
      interest: new Decimal(0),
      installment: new Decimal(0),
    };
    acc.balance = acc.balance.plus(row.balanceAfter);
    acc.interest = acc.interest.plus(row.interestAmount);
    acc.installment = acc.installment.plus(row.installmentAmount);
    byMonth.set(row.monthIndex, acc);
  }

  return [...byMonth.entries()]
    .sort(([a], [b]) => a - b)
    .map(([monthIndex, acc]) => ({
      monthIndex,
      calendarLabel: acc.label,
      balanceAfter: acc.balance.toNumber(),
      interestAmount: acc.interest.toNumber(),
      installmentAmount: acc.installment.toNumber(),
    }));
}
