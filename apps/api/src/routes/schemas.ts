import { z } from 'zod';
import { validationError } from '../errors.js';

export const payerSchema = z.object({
  id: z.string().optional(),
  name: z.string(),
  downPayment: z.number().finite().default(0),
});

/** Table rows may arrive half-filled; those are dropped before they reach the engine. */
export const extraPaymentRowSchema = z.object({
  month: z.number().int().positive().nullable().optional(),
  payerName: z.string().nullable().optional(),
  amount: z.number().finite().nullable().optional(),
});

export const paramsSchema = z.object({
  totalBalance: z.number().finite(),
  annualRatePct: z.number().finite().min(0),
  termMonths: z.number().int().positive(),
  startDate: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
});

type PayerRow = z.infer<typeof payerSchema>;
type ExtraPaymentRow = z.infer<typeof extraPaymentRowSchema>;

export function completePayers(rows: PayerRow[]) {
  return rows
    .filter((p) => p.name.trim() !== '')
    .map((p) => ({ id: p.id, name: p.name, downPayment: p.downPayment }));
}

export function completeExtraPayments(rows: ExtraPaymentRow[]) {
  const complete: Array<{ month: number; payerName: string; amount: number | null }> = [];
  for (const row of rows) {
    if (row.month == null || row.payerName == null || row.payerName === '') continue;
    complete.push({ month: row.month, payerName: row.payerName, amount: row.amount ?? null });
  }
  return complete;
}

/** An empty body reads as `{}`; a malformed one is a validation error, not a 500. */
export async function readJson(req: { text(): Promise<string> }): Promise<unknown> {
  const text = await req.text();
  if (text.trim() === '') return {};
  try {
    return JSON.parse(text);
  } catch {
    throw validationError('Request body is not valid JSON');
  }
}
