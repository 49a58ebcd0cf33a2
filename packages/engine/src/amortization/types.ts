export interface SimulationParams {
  annualRatePct: number;
  termMonths: number;
  /** ISO date (YYYY-MM-DD); row labels are this date plus the month index. */
  startDate: string;
}

export interface AmortizationRow {
  payerId: string;
  payerName: string;
  monthIndex: number;
  calendarLabel: string;
  balanceAfter: number;
  amortizationAmount: number;
  interestAmount: number;
  installmentAmount: number;
}

export interface PayerSchedule {
  payerId: string;
  payerName: string;
  startingBalance: number;
  rows: AmortizationRow[];
}

export interface SacSimulation {
  params: SimulationParams;
  /** Keyed by payer id, in ledger order. */
  schedules: Record<string, PayerSchedule>;
}
