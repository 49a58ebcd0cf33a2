import { sqliteTable, text, integer, real, index } from 'drizzle-orm/sqlite-core';
import { createId } from '@paralleldrive/cuid2';

export const sessions = sqliteTable('sessions', {
  id: text('id').primaryKey().$defaultFn(() => createId()),
  totalBalance: real('total_balance').notNull(),
  annualRatePct: real('annual_rate_pct').notNull(),
  termMonths: integer('term_months').notNull(),
  startDate: text('start_date').notNull(),
  createdAt: text('created_at').notNull().$defaultFn(() => new Date().toISOString()),
  updatedAt: text('updated_at').notNull().$defaultFn(() => new Date().toISOString()),
});

export const payers = sqliteTable('payers', {
  id: text('id').primaryKey().$defaultFn(() => createId()),
  sessionId: text('session_id').notNull().references(() => sessions.id, { onDelete: 'cascade' }),
  name: text('name').notNull(),
  downPayment: real('down_payment').notNull().default(0),
  sortOrder: integer('sort_order').notNull().default(0),
}, (table) => [
  index('idx_payers_session').on(table.sessionId),
]);

export const extraPayments = sqliteTable('extra_payments', {
  id: text('id').primaryKey().$defaultFn(() => createId()),
  sessionId: text('session_id').notNull().references(() => sessions.id, { onDelete: 'cascade' }),
  month: integer('month').notNull(),
  payerName: text('payer_name').notNull(),
  amount: real('amount'),
  sortOrder: integer('sort_order').notNull().default(0),
}, (table) => [
  index('idx_extra_payments_session').on(table.sessionId),
]);
