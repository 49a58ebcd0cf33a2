import { splitBalance, ledgerTotals } from './ledger/ledger.js';
import type { Payer, LedgerPayer, LedgerTotals } from './ledger/types.js';
import type { ExtraPayment } from './extra/types.js';
import { simulateSac } from './amortization/engine.js';
import type { SimulationParams, SacSimulation } from './amortization/types.js';
import { summarizeSchedules, aggregateByMonth } from './summary/summarizer.js';
import type { PayerSummary, MonthlyAggregate } from './summary/types.js';

/** Everything a caller owns between runs; the engine keeps nothing of it. */
export interface SimulationContext {
  totalBalance: number;
  payers: Payer[];
  extraPayments: ExtraPayment[];
  params: SimulationParams;
}

export interface SimulationResult {
  ledger: LedgerPayer[];
  totals: LedgerTotals;
  simulation: SacSimulation;
  summary: PayerSummary[];
  monthly: MonthlyAggregate[];
}

export function runSimulation(context: SimulationContext): SimulationResult {
  const ledger = splitBalance(context.payers, context.totalBalance);
  const simulation = simulateSac(ledger, context.params, context.extraPayments);

  return {
    ledger,
    totals: ledgerTotals(ledger),
    simulation,
    summary: summarizeSchedules(simulation, context.extraPayments),
    monthly: aggregateByMonth(simulation),
  };
}
