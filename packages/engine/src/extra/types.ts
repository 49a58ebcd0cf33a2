export interface ExtraPayment {
  /** 1-based month within the term. */
  month: number;
  payerName: string;
  /** Absent or NaN means the entry has no effect. */
  amount?: number | null;
}
