import { Hono } from 'hono';
import { z } from 'zod';
import { createId } from '@paralleldrive/cuid2';
import { runSimulation, lastDayOfNextMonth } from '@splitloan/engine';
import { validationError } from '../errors.js';
import { formatSimulationResult } from '../format.js';
import {
  payerSchema,
  extraPaymentRowSchema,
  paramsSchema,
  completePayers,
  completeExtraPayments,
  readJson,
} from './schemas.js';

const simulateRequestSchema = paramsSchema.extend({
  startDate: paramsSchema.shape.startDate.optional(),
  annualRatePct: paramsSchema.shape.annualRatePct.default(0),
  payers: z.array(payerSchema).min(1).max(50),
  extraPayments: z.array(extraPaymentRowSchema).max(1000).default([]),
});

export function simulateRoutes() {
  const router = new Hono();

  // POST / — stateless run over a ledger sent in full
  router.post('/', async (c) => {
    const parsed = simulateRequestSchema.safeParse(await readJson(c.req));
    if (!parsed.success) {
      throw validationError(parsed.error.issues.map((i) => i.message).join(', '));
    }

    const data = parsed.data;
    const payers = completePayers(data.payers).map((p) => ({ ...p, id: p.id ?? createId() }));
    if (payers.length === 0) {
      throw validationError('At least one payer with a name is required');
    }

    const result = runSimulation({
      totalBalance: data.totalBalance,
      payers,
      extraPayments: completeExtraPayments(data.extraPayments),
      params: {
        annualRatePct: data.annualRatePct,
        termMonths: data.termMonths,
        startDate: data.startDate ?? lastDayOfNextMonth(),
      },
    });

    return c.json(formatSimulationResult(result));
  });

  return router;
}
