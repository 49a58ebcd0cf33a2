import { formatMoney, formatMonthLabel, type SimulationResult, type SessionState } from '@splitloan/engine';

export function formatSimulationResult(result: SimulationResult) {
  return {
    params: result.simulation.params,
    ledger: result.ledger.map((p) => ({
      ...p,
      downPaymentFormatted: formatMoney(p.downPayment),
      outstandingBalanceFormatted: formatMoney(p.outstandingBalance),
    })),
    totals: result.totals,
    schedules: Object.values(result.simulation.schedules).map((schedule) => ({
      payerId: schedule.payerId,
      payerName: schedule.payerName,
      startingBalance: schedule.startingBalance,
      rows: schedule.rows.map((row) => ({
        ...row,
        balanceFormatted: formatMoney(row.balanceAfter),
        interestFormatted: formatMoney(row.interestAmount),
        installmentFormatted: formatMoney(row.installmentAmount, 'BRL', 2),
      })),
    })),
    summary: result.summary.map((s) => ({
      ...s,
      lastPaymentDisplay: s.lastPaymentLabel === null ? null : formatMonthLabel(s.lastPaymentLabel),
      totalInterestFormatted: formatMoney(s.totalInterest),
      totalInstallmentsFormatted: formatMoney(s.totalInstallments),
    })),
    monthly: result.monthly,
  };
}

export function formatSession(session: SessionState) {
  return {
    ...session,
    totalBalanceFormatted: formatMoney(session.totalBalance),
    payers: session.payers.map((p) => ({
      ...p,
      downPaymentFormatted: formatMoney(p.downPayment),
      outstandingBalanceFormatted: formatMoney(p.outstandingBalance),
    })),
  };
}
