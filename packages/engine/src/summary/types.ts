export interface PayerSummary {
  payerId: string;
  payerName: string;
  /** Last month still owing a positive balance; null when the balance never was positive. */
  lastActiveMonth: number | null;
  lastPaymentLabel: string | null;
  totalInterest: number;
  totalInstallments: number;
  totalExtraPayments: number;
}

export interface MonthlyAggregate {
  monthIndex: number;
  calendarLabel: string;
  balanceAfter: number;
  interestAmount: number;
  installmentAmount: number;
}
