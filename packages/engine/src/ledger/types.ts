export interface Payer {
  id: string;
  name: string;
  downPayment: number;
}

export interface LedgerPayer extends Payer {
  /** Derived from the shared total; never edited directly. */
  outstandingBalance: number;
}

export interface LedgerTotals {
  downPayments: number;
  outstanding: number;
  total: number;
}
