import type { LedgerPayer } from '../ledger/types.js';
import type { ExtraPayment } from '../extra/types.js';

export interface SessionState {
  id: string;
  totalBalance: number;
  annualRatePct: number;
  termMonths: number;
  startDate: string;
  payers: LedgerPayer[];
  extraPayments: ExtraPayment[];
  createdAt: string;
  updatedAt: string;
}

export interface SessionParamsInput {
  totalBalance?: number;
  annualRatePct?: number;
  termMonths?: number;
  startDate?: string;
}

export interface PayerInput {
  id?: string;
  name: string;
  downPayment: number;
}
