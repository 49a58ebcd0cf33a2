import { Hono } from 'hono';
import { z } from 'zod';
import {
  type DB,
  createSession,
  getSession,
  updateSessionParams,
  replacePayers,
  replaceExtraPayments,
  deleteSession,
  simulateSession,
} from '@splitloan/engine';
import { notFound, validationError } from '../errors.js';
import { formatSession, formatSimulationResult } from '../format.js';
import {
  payerSchema,
  extraPaymentRowSchema,
  paramsSchema,
  completePayers,
  completeExtraPayments,
  readJson,
} from './schemas.js';

const createSessionSchema = paramsSchema.partial();
const updateSessionSchema = paramsSchema.partial();
const replacePayersSchema = z.object({ payers: z.array(payerSchema).max(50) });
const replaceExtraPaymentsSchema = z.object({ extraPayments: z.array(extraPaymentRowSchema).max(1000) });

export function sessionRoutes(db: DB) {
  const router = new Hono();

  // POST / — new session seeded with the default ledger
  router.post('/', async (c) => {
    const parsed = createSessionSchema.safeParse(await readJson(c.req));
    if (!parsed.success) {
      throw validationError(parsed.error.issues.map((i) => i.message).join(', '));
    }

    const session = createSession(db, parsed.data);
    return c.json(formatSession(session), 201);
  });

  // GET /:id
  router.get('/:id', (c) => {
    const id = c.req.param('id');
    const session = getSession(db, id);
    if (!session) throw notFound('Session', id);

    return c.json(formatSession(session));
  });

  // PATCH /:id — loan parameters; payer balances follow on the next read
  router.patch('/:id', async (c) => {
    const id = c.req.param('id');
    const parsed = updateSessionSchema.safeParse(await readJson(c.req));
    if (!parsed.success) {
      throw validationError(parsed.error.issues.map((i) => i.message).join(', '));
    }

    const session = updateSessionParams(db, id, parsed.data);
    if (!session) throw notFound('Session', id);

    return c.json(formatSession(session));
  });

  // PUT /:id/payers — replace the ledger; rows without a name are dropped
  router.put('/:id/payers', async (c) => {
    const id = c.req.param('id');
    const parsed = replacePayersSchema.safeParse(await readJson(c.req));
    if (!parsed.success) {
      throw validationError(parsed.error.issues.map((i) => i.message).join(', '));
    }

    const rows = completePayers(parsed.data.payers);
    if (rows.length === 0) {
      throw validationError('At least one payer with a name is required');
    }

    const session = replacePayers(db, id, rows);
    if (!session) throw notFound('Session', id);

    return c.json(formatSession(session));
  });

  // PUT /:id/extra-payments — replace the schedule; incomplete rows are dropped
  router.put('/:id/extra-payments', async (c) => {
    const id = c.req.param('id');
    const parsed = replaceExtraPaymentsSchema.safeParse(await readJson(c.req));
    if (!parsed.success) {
      throw validationError(parsed.error.issues.map((i) => i.message).join(', '));
    }

    const session = replaceExtraPayments(db, id, completeExtraPayments(parsed.data.extraPayments));
    if (!session) throw notFound('Session', id);

    return c.json(formatSession(session));
  });

  // GET /:id/schedule — full simulation for the session's current state
  router.get('/:id/schedule', (c) => {
    const id = c.req.param('id');
    const result = simulateSession(db, id);
    if (!result) throw notFound('Session', id);

    return c.json({ sessionId: id, ...formatSimulationResult(result) });
  });

  // DELETE /:id
  router.delete('/:id', (c) => {
    const id = c.req.param('id');
    if (!deleteSession(db, id)) throw notFound('Session', id);

    return c.json({ success: true });
  });

  return router;
}
