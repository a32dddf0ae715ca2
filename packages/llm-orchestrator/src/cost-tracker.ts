/**
 * Cost ledgers per budget scope.
 *
 * preCheck is advisory and read-only. commit is authoritative: it always
 * records the spend (the provider call already happened) and flags the
 * ledger over budget once spend passes the limit, after which preCheck
 * refuses the scope until the period rolls over.
 *
 * Periods roll over lazily: the first access at or past
 * periodStart + periodMs advances periodStart by whole periods and zeroes
 * the ledger. Nothing is scheduled.
 */
import { systemClock } from "./clock.js";
import type { Clock } from "./clock.js";
import { BudgetExceededError } from "./errors.js";

export interface BudgetConfig {
  /** Unlimited when omitted */
  budgetLimit?: number;
  /** Never resets when omitted */
  periodMs?: number;
}

export interface LedgerSnapshot {
  scopeId: string;
  spent: number;
  budgetLimit: number | null;
  periodStart: number;
  periodMs: number | null;
  overBudget: boolean;
  /** Number of commits in the current period */
  commits: number;
}

export interface CostTrackerOptions {
  scopes?: Record<string, BudgetConfig>;
  /** Config for scopes not listed in `scopes` */
  defaults?: BudgetConfig;
  clock?: Clock;
}

interface Ledger {
  scopeId: string;
  config: BudgetConfig;
  spent: number;
  periodStart: number;
  overBudget: boolean;
  commits: number;
}

export class CostTracker {
  private readonly ledgers = new Map<string, Ledger>();
  private readonly configs = new Map<string, BudgetConfig>();
  private readonly defaults: BudgetConfig;
  private readonly clock: Clock;

  constructor(options: CostTrackerOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.defaults = checkConfig(options.defaults ?? {});
    for (const [scopeId, config] of Object.entries(options.scopes ?? {})) {
      this.configs.set(scopeId, checkConfig(config));
    }
  }

  /** Set or replace a scope's budget; applies from the next access */
  configure(scopeId: string, config: BudgetConfig): void {
    const checked = checkConfig(config);
    this.configs.set(scopeId, checked);
    const ledger = this.ledgers.get(scopeId);
    if (ledger) {
      ledger.config = checked;
      ledger.overBudget = checked.budgetLimit !== undefined && ledger.spent > checked.budgetLimit;
    }
  }

  /** Throws BudgetExceededError when the estimate would not fit */
  preCheck(scopeId: string, estimatedCost: number): LedgerSnapshot {
    checkAmount(estimatedCost, "estimatedCost");
    const ledger = this.ledger(scopeId);
    const limit = ledger.config.budgetLimit;
    if (limit !== undefined && (ledger.overBudget || ledger.spent + estimatedCost > limit)) {
      throw new BudgetExceededError(scopeId, ledger.spent, limit, estimatedCost);
    }
    return snapshot(ledger);
  }

  commit(scopeId: string, actualCost: number): LedgerSnapshot {
    checkAmount(actualCost, "actualCost");
    const ledger = this.ledger(scopeId);
    ledger.spent += actualCost;
    ledger.commits++;
    const limit = ledger.config.budgetLimit;
    if (limit !== undefined && ledger.spent > limit) ledger.overBudget = true;
    return snapshot(ledger);
  }

  getLedger(scopeId: string): LedgerSnapshot {
    return snapshot(this.ledger(scopeId));
  }

  /** Zero a scope's ledger and start a new period now */
  reset(scopeId: string): void {
    this.ledgers.delete(scopeId);
  }

  private ledger(scopeId: string): Ledger {
    const now = this.clock.now();
    let ledger = this.ledgers.get(scopeId);
    if (!ledger) {
      ledger = {
        scopeId,
        config: this.configs.get(scopeId) ?? this.defaults,
        spent: 0,
        periodStart: now,
        overBudget: false,
        commits: 0,
      };
      this.ledgers.set(scopeId, ledger);
      return ledger;
    }

    const periodMs = ledger.config.periodMs;
    if (periodMs !== undefined && now >= ledger.periodStart + periodMs) {
      const elapsedPeriods = Math.floor((now - ledger.periodStart) / periodMs);
      ledger.periodStart += elapsedPeriods * periodMs;
      ledger.spent = 0;
      ledger.overBudget = false;
      ledger.commits = 0;
    }
    return ledger;
  }
}

function snapshot(ledger: Ledger): LedgerSnapshot {
  return {
    scopeId: ledger.scopeId,
    spent: ledger.spent,
    budgetLimit: ledger.config.budgetLimit ?? null,
    periodStart: ledger.periodStart,
    periodMs: ledger.config.periodMs ?? null,
    overBudget: ledger.overBudget,
    commits: ledger.commits,
  };
}

function checkConfig(config: BudgetConfig): BudgetConfig {
  if (config.budgetLimit !== undefined) checkAmount(config.budgetLimit, "budgetLimit");
  if (config.periodMs !== undefined && !(config.periodMs > 0)) {
    throw new RangeError(`periodMs must be positive, got ${config.periodMs}`);
  }
  return { ...config };
}

function checkAmount(amount: number, label: string): void {
  if (!Number.isFinite(amount) || amount < 0) {
    throw new RangeError(`${label} must be a non-negative finite number, got ${amount}`);
  }
}
