export { createDb, schema } from './db/index.js';
export type { DB } from './db/index.js';
export { sessions, payers, extraPayments } from './db/schema.js';

export { InvalidParameterError } from './errors.js';
export { formatMoney, sumAmounts } from './math/money.js';

export type { Payer, LedgerPayer, LedgerTotals } from './ledger/types.js';
export { splitBalance, ledgerTotals, defaultPayers, DEFAULT_TOTAL_BALANCE } from './ledger/ledger.js';

export type { ExtraPayment } from './extra/types.js';
export { hasEffect, paymentsFor, defaultExtraPayments } from './extra/schedule.js';

export type { SimulationParams, AmortizationRow, PayerSchedule, SacSimulation } from './amortization/types.js';
export { simulateSac, simulatePayer, monthlyRateOf } from './amortization/engine.js';

export type { PayerSummary, MonthlyAggregate } from './summary/types.js';
export { lastActiveMonth, summarizeSchedules, flattenSchedules, aggregateByMonth } from './summary/summarizer.js';
export { addMonths, parseIsoDate, lastDayOfNextMonth, formatMonthLabel } from './summary/calendar.js';

export type { SimulationContext, SimulationResult } from './simulation.js';
export { runSimulation } from './simulation.js';

export type { SessionState, SessionParamsInput, PayerInput } from './session/types.js';
export {
  createSession,
  getSession,
  updateSessionParams,
  replacePayers,
  replaceExtraPayments,
  deleteSession,
  simulateSession,
  DEFAULT_ANNUAL_RATE_PCT,
  DEFAULT_TERM_MONTHS,
} from './session/store.js';
