/**
 * T+1 Settlement Checker
 *
 * A participant may never sell more than its settled inventory; shares
 * bought today only become sellable on the next trading day.
 *
 * Two alternative strategies, selected by which upstream data is present:
 * - ledger: per-ticker virtual-position ledger seeded from the PM
 *   virtual-position table at PREV_CLOSE and walked forward through the
 *   merged targets. Buys never add to the settled quantity.
 * - available-sellable: the position feed already carries a T+1-aware
 *   available sellable volume per trader; a group sell must fit within the
 *   sum of it across the group's traders.
 */

import {
  compareTime,
  isPrevClose,
  timeTickerKey,
  DEFAULT_TOLERANCE,
  type AlphaEvent,
  type CheckResult,
  type SettlementStrategy,
  type SignalTables
} from "@signal-audit/common";
import { result, groupBy, appendCapped, fmt, type Checker } from "../checker.js";

export type ResolvedSettlementStrategy = Exclude<SettlementStrategy, "auto">;

export interface VirtualPosition {
  ticker: string;
  settledQuantity: number;
  unsettledQuantity: number;
}

export interface SettlementViolation {
  time: number;
  ticker: string;
  target: number;
  currentBefore: number;
  tradeVolume: number;
  requiredSell: number;
  availableSettled: number;
  excess: number;
}

export interface SettlementEvaluation {
  strategy: ResolvedSettlementStrategy;
  checked: number;
  violations: SettlementViolation[];
  /** Closing state of the ledger; only the ledger strategy fills it. */
  ledger?: VirtualPosition[];
}

interface GroupTarget {
  time: number;
  ticker: string;
  target: number;
}

/** Intraday merged targets summed per (time, ticker), in time order. */
function groupTargets(merged: AlphaEvent[]): GroupTarget[] {
  const totals = new Map<string, GroupTarget>();
  for (const e of merged) {
    if (isPrevClose(e.time)) continue;
    const key = timeTickerKey(e.time, e.ticker);
    const group = totals.get(key);
    if (group) group.target += e.targetVolume;
    else totals.set(key, { time: e.time, ticker: e.ticker, target: e.targetVolume });
  }
  return [...totals.values()].sort((a, b) => compareTime(a.time, b.time) || a.ticker.localeCompare(b.ticker));
}

// ============================================================================
// Ledger
// ============================================================================

interface LedgerEntry {
  settled: number;
  current: number;
}

/**
 * Per-ticker settled/unsettled inventory for one trading day.
 * Constructed fresh per run and only ever moved forward in time.
 */
export class SettlementLedger {
  private entries = new Map<string, LedgerEntry>();

  constructor(private readonly tolerance: number = DEFAULT_TOLERANCE) {}

  seed(ticker: string, closingPosition: number): void {
    this.entries.set(ticker, { settled: closingPosition, current: closingPosition });
  }

  /**
   * Move the ticker to `target` at `time`. Returns the violation when the
   * implied sell exceeds the settled quantity.
   */
  apply(time: number, ticker: string, target: number): SettlementViolation | null {
    const entry = this.entries.get(ticker) ?? { settled: 0, current: 0 };
    this.entries.set(ticker, entry);

    const currentBefore = entry.current;
    const tradeVolume = target - currentBefore;
    let violation: SettlementViolation | null = null;

    if (tradeVolume < -this.tolerance) {
      const requiredSell = -tradeVolume;
      const availableSettled = Math.max(0, entry.settled);
      if (requiredSell > availableSettled + this.tolerance) {
        violation = {
          time,
          ticker,
          target,
          currentBefore,
          tradeVolume,
          requiredSell,
          availableSettled,
          excess: requiredSell - availableSettled
        };
      } else {
        entry.settled -= requiredSell;
      }
    }
    // buys stay unsettled until the next trading day

    entry.current = target;
    return violation;
  }

  position(ticker: string): VirtualPosition {
    const entry = this.entries.get(ticker) ?? { settled: 0, current: 0 };
    return {
      ticker,
      settledQuantity: entry.settled,
      unsettledQuantity: entry.current - entry.settled
    };
  }

  positions(): VirtualPosition[] {
    return [...this.entries.keys()].sort().map(t => this.position(t));
  }
}

// ============================================================================
// Checker
// ============================================================================

export class SettlementDataError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SettlementDataError";
  }
}

export interface SettlementCheckerOptions {
  tolerance?: number;
  strategy?: SettlementStrategy;
}

export class SettlementChecker implements Checker {
  readonly name = "T+1 Sellable Constraint";
  private readonly tolerance: number;
  private readonly strategy: SettlementStrategy;

  constructor(options: SettlementCheckerOptions = {}) {
    this.tolerance = options.tolerance ?? DEFAULT_TOLERANCE;
    this.strategy = options.strategy ?? "auto";
  }

  /**
   * Pick the strategy the supplied tables support.
   * Throws SettlementDataError when the data for it is missing.
   */
  resolveStrategy(tables: SignalTables): ResolvedSettlementStrategy {
    const hasLedgerSeed = tables.virtualPositions !== undefined;
    const hasSellable = tables.positions.length > 0 &&
      tables.positions.every(p => p.availableSellableVolume !== undefined);

    switch (this.strategy) {
      case "ledger":
        if (!hasLedgerSeed) throw new SettlementDataError("PM virtual position data not provided");
        return "ledger";
      case "available-sellable":
        if (!hasSellable) throw new SettlementDataError("Available sellable volume not provided in position snapshots");
        return "available-sellable";
      case "auto":
        if (hasLedgerSeed) return "ledger";
        if (hasSellable) return "available-sellable";
        throw new SettlementDataError(
          "Neither PM virtual position data nor available sellable volume provided"
        );
    }
  }

  evaluate(tables: SignalTables): SettlementEvaluation {
    const strategy = this.resolveStrategy(tables);
    return strategy === "ledger"
      ? this.evaluateLedger(tables)
      : this.evaluateAvailableSellable(tables);
  }

  private evaluateLedger(tables: SignalTables): SettlementEvaluation {
    const ledger = new SettlementLedger(this.tolerance);
    const virtualPositions = tables.virtualPositions ?? [];

    const closing = new Map<string, number>();
    for (const v of virtualPositions) {
      if (!isPrevClose(v.time)) continue;
      closing.set(v.ticker, (closing.get(v.ticker) ?? 0) + v.virtualPosition);
    }

    const tickers = new Set([
      ...tables.merged.map(e => e.ticker),
      ...virtualPositions.map(v => v.ticker)
    ]);
    for (const ticker of tickers) {
      ledger.seed(ticker, closing.get(ticker) ?? 0);
    }

    const targets = groupTargets(tables.merged);
    const violations: SettlementViolation[] = [];
    for (const t of targets) {
      const violation = ledger.apply(t.time, t.ticker, t.target);
      if (violation) violations.push(violation);
    }

    return { strategy: "ledger", checked: targets.length, violations, ledger: ledger.positions() };
  }

  private evaluateAvailableSellable(tables: SignalTables): SettlementEvaluation {
    const current = new Map<string, number>();
    const available = new Map<string, number>();
    for (const p of tables.positions) {
      const key = timeTickerKey(p.time, p.ticker);
      current.set(key, (current.get(key) ?? 0) + p.currentPosition);
      available.set(key, (available.get(key) ?? 0) + (p.availableSellableVolume ?? 0));
    }

    const targets = groupTargets(tables.merged);
    const violations: SettlementViolation[] = [];
    for (const t of targets) {
      const key = timeTickerKey(t.time, t.ticker);
      const currentBefore = current.get(key) ?? 0;
      const tradeVolume = t.target - currentBefore;
      if (tradeVolume >= -this.tolerance) continue;

      const requiredSell = -tradeVolume;
      const availableSettled = Math.max(0, available.get(key) ?? 0);
      if (requiredSell > availableSettled + this.tolerance) {
        violations.push({
          time: t.time,
          ticker: t.ticker,
          target: t.target,
          currentBefore,
          tradeVolume,
          requiredSell,
          availableSettled,
          excess: requiredSell - availableSettled
        });
      }
    }

    return { strategy: "available-sellable", checked: targets.length, violations };
  }

  check(tables: SignalTables): CheckResult {
    let evaluation: SettlementEvaluation;
    try {
      evaluation = this.evaluate(tables);
    } catch (err) {
      if (err instanceof SettlementDataError) {
        return result(this.name, "ERROR", err.message);
      }
      throw err;
    }

    const { strategy, checked, violations } = evaluation;

    if (violations.length === 0) {
      return result(
        this.name,
        "PASS",
        `All ${checked} alpha targets respect T+1 sellable constraints (strategy: ${strategy})`
      );
    }

    const totalExcess = violations.reduce((s, v) => s + v.excess, 0);
    const lines = [`Found ${violations.length} T+1 constraint violations (strategy: ${strategy}):`];
    const byTime = groupBy(violations, v => v.time);
    for (const time of [...byTime.keys()].sort(compareTime)) {
      const rows = byTime.get(time) ?? [];
      lines.push(`  time=${time}: ${rows.length} violations`);
      appendCapped(lines, rows, v =>
        `${v.ticker}: target=${fmt(v.target)}, before=${fmt(v.currentBefore)}, trade=${fmt(v.tradeVolume)}, ` +
        `need_sell=${fmt(v.requiredSell)}, available=${fmt(v.availableSettled)}, excess=${fmt(v.excess)}`
      );
    }

    return result(
      this.name,
      "FAIL",
      `Found ${violations.length} T+1 constraint violations (total excess: ${fmt(totalExcess)})`,
      lines
    );
  }
}
