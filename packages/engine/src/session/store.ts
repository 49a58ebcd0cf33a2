import { eq, asc } from 'drizzle-orm';
import { createId } from '@paralleldrive/cuid2';
import type { DB } from '../db/index.js';
import { sessions, payers, extraPayments } from '../db/schema.js';
import { InvalidParameterError } from '../errors.js';
import { splitBalance, defaultPayers, DEFAULT_TOTAL_BALANCE } from '../ledger/ledger.js';
import { defaultExtraPayments } from '../extra/schedule.js';
import type { ExtraPayment } from '../extra/types.js';
import { lastDayOfNextMonth, parseIsoDate } from '../summary/calendar.js';
import { runSimulation, type SimulationResult } from '../simulation.js';
import type { SessionState, SessionParamsInput, PayerInput } from './types.js';

export const DEFAULT_ANNUAL_RATE_PCT = 7.5;
export const DEFAULT_TERM_MONTHS = 120;

function checkParams(input: SessionParamsInput): void {
  if (input.termMonths !== undefined && (!Number.isInteger(input.termMonths) || input.termMonths <= 0)) {
    throw new InvalidParameterError('termMonths', `Term must be a positive whole number of months, got ${input.termMonths}`);
  }
  if (input.startDate !== undefined) {
    parseIsoDate(input.startDate);
  }
}

export function getSession(db: DB, sessionId: string): SessionState | null {
  const session = db.select().from(sessions).where(eq(sessions.id, sessionId)).get();
  if (!session) return null;

  const payerRows = db
    .select()
    .from(payers)
    .where(eq(payers.sessionId, sessionId))
    .orderBy(asc(payers.sortOrder))
    .all();

  const extraRows = db
    .select()
    .from(extraPayments)
    .where(eq(extraPayments.sessionId, sessionId))
    .orderBy(asc(extraPayments.sortOrder))
    .all();

  // A session whose ledger was emptied has nothing to split
  const ledger = payerRows.length > 0
    ? splitBalance(
      payerRows.map((p) => ({ id: p.id, name: p.name, downPayment: p.downPayment })),
      session.totalBalance,
    )
    : [];

  return {
    id: session.id,
    totalBalance: session.totalBalance,
    annualRatePct: session.annualRatePct,
    termMonths: session.termMonths,
    startDate: session.startDate,
    payers: ledger,
    extraPayments: extraRows.map((e) => ({ month: e.month, payerName: e.payerName, amount: e.amount })),
    createdAt: session.createdAt,
    updatedAt: session.updatedAt,
  };
}

export function createSession(db: DB, input: SessionParamsInput = {}): SessionState {
  checkParams(input);

  const created = db.transaction((tx) => {
    const session = tx
      .insert(sessions)
      .values({
        totalBalance: input.totalBalance ?? DEFAULT_TOTAL_BALANCE,
        annualRatePct: input.annualRatePct ?? DEFAULT_ANNUAL_RATE_PCT,
        termMonths: input.termMonths ?? DEFAULT_TERM_MONTHS,
        startDate: input.startDate ?? lastDayOfNextMonth(),
      })
      .returning()
      .get();

    defaultPayers().forEach((p, i) => {
      tx.insert(payers)
        .values({ id: p.id, sessionId: session.id, name: p.name, downPayment: p.downPayment, sortOrder: i })
        .run();
    });

    defaultExtraPayments().forEach((e, i) => {
      tx.insert(extraPayments)
        .values({ sessionId: session.id, month: e.month, payerName: e.payerName, amount: e.amount ?? null, sortOrder: i })
        .run();
    });

    return session;
  });

  const state = getSession(db, created.id);
  if (!state) {
    throw new Error(`Session '${created.id}' vanished after creation`);
  }
  return state;
}

export function updateSessionParams(db: DB, sessionId: string, input: SessionParamsInput): SessionState | null {
  checkParams(input);

  const existing = db.select().from(sessions).where(eq(sessions.id, sessionId)).get();
  if (!existing) return null;

  db.update(sessions)
    .set({ ...input, updatedAt: new Date().toISOString() })
    .where(eq(sessions.id, sessionId))
    .run();

  return getSession(db, sessionId);
}

/**
 * Replaces the ledger. Ids that already belong to this session are kept so that
 * results stay keyed the same way across edits; anything else gets a fresh id.
 */
export function replacePayers(db: DB, sessionId: string, input: PayerInput[]): SessionState | null {
  if (input.length === 0) {
    throw new InvalidParameterError('payers', 'At least one payer is required');
  }

  const existing = db.select().from(sessions).where(eq(sessions.id, sessionId)).get();
  if (!existing) return null;

  const currentIds = new Set(
    db.select({ id: payers.id }).from(payers).where(eq(payers.sessionId, sessionId)).all().map((p) => p.id),
  );

  db.transaction((tx) => {
    tx.delete(payers).where(eq(payers.sessionId, sessionId)).run();

    const used = new Set<string>();
    input.forEach((p, i) => {
      const id = p.id && currentIds.has(p.id) && !used.has(p.id) ? p.id : createId();
      used.add(id);
      tx.insert(payers)
        .values({ id, sessionId, name: p.name, downPayment: p.downPayment, sortOrder: i })
        .run();
    });

    tx.update(sessions).set({ updatedAt: new Date().toISOString() }).where(eq(sessions.id, sessionId)).run();
  });

  return getSession(db, sessionId);
}

export function replaceExtraPayments(db: DB, sessionId: string, input: ExtraPayment[]): SessionState | null {
  const existing = db.select().from(sessions).where(eq(sessions.id, sessionId)).get();
  if (!existing) return null;

  db.transaction((tx) => {
    tx.delete(extraPayments).where(eq(extraPayments.sessionId, sessionId)).run();

    input.forEach((e, i) => {
      tx.insert(extraPayments)
        .values({ sessionId, month: e.month, payerName: e.payerName, amount: e.amount ?? null, sortOrder: i })
        .run();
    });

    tx.update(sessions).set({ updatedAt: new Date().toISOString() }).where(eq(sessions.id, sessionId)).run();
  });

  return getSession(db, sessionId);
}

export function deleteSession(db: DB, sessionId: string): boolean {
  const result = db.delete(sessions).where(eq(sessions.id, sessionId)).run();
  return result.changes > 0;
}

export function simulateSession(db: DB, sessionId: string): SimulationResult | null {
  const state = getSession(db, sessionId);
  if (!state) return null;

  return runSimulation({
    totalBalance: state.totalBalance,
    payers: state.payers,
    extraPayments: state.extraPayments,
    params: {
      annualRatePct: state.annualRatePct,
      termMonths: state.termMonths,
      startDate: state.startDate,
    },
  });
}
