import type { ExtraPayment } from './types.js';

export function defaultExtraPayments(): ExtraPayment[] {
  return [
    { month: 6, payerName: 'Payer 1', amount: 10000 },
    { month: 12, payerName: 'Payer 2', amount: 20000 },
    { month: 24, payerName: 'Payer 3', amount: 30000 },
  ];
}

export function hasEffect(payment: ExtraPayment): payment is ExtraPayment & { amount: number } {
  return typeof payment.amount === 'number' && Number.isFinite(payment.amount);
}

export function paymentsFor(
  schedule: ExtraPayment[],
  payerName: string,
  month: number,
): Array<ExtraPayment & { amount: number }> {
  return schedule
    .filter((p) => p.month === month && p.payerName === payerName)
    .filter(hasEffect);
}
