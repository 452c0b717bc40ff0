/**
 * Trade Direction Consistency Checker
 *
 * If the intended trade at t is a buy, the position at the next time must
 * not fall below the position at t; a sell must not raise it. Pairs with no
 * intended trade carry no directional obligation.
 */

import {
  DEFAULT_TOLERANCE,
  isNegligible,
  type CheckResult,
  type SignalTables
} from "@signal-audit/common";
import { result, groupBy, appendCapped, fmt, type Checker } from "../checker.js";
import { pairTrades, type TradePair } from "../trade-pairs.js";

export type DirectionViolationType = "BUY_DECREASED" | "SELL_INCREASED";

export interface DirectionViolation extends TradePair {
  violationType: DirectionViolationType;
}

/** Time periods listed per violation type, and rows per period. */
const PERIODS_SHOWN = 3;
const ROWS_PER_PERIOD = 2;

export class DirectionConsistencyChecker implements Checker {
  readonly name = "Trade Direction Consistency";
  private readonly tolerance: number;

  constructor(options: { tolerance?: number } = {}) {
    this.tolerance = options.tolerance ?? DEFAULT_TOLERANCE;
  }

  classify(pair: TradePair): DirectionViolationType | null {
    if (isNegligible(pair.intendedTrade, this.tolerance)) return null;
    if (pair.intendedTrade > 0) {
      return pair.nextPosition < pair.currentPosition - this.tolerance ? "BUY_DECREASED" : null;
    }
    return pair.nextPosition > pair.currentPosition + this.tolerance ? "SELL_INCREASED" : null;
  }

  findViolations(tables: SignalTables): { total: number; violations: DirectionViolation[] } {
    const pairs = pairTrades(tables.split, tables.positions);
    const violations: DirectionViolation[] = [];
    for (const pair of pairs) {
      const violationType = this.classify(pair);
      if (violationType) violations.push({ ...pair, violationType });
    }
    return { total: pairs.length, violations };
  }

  check(tables: SignalTables): CheckResult {
    const { total, violations } = this.findViolations(tables);

    if (violations.length === 0) {
      return result(
        this.name,
        "PASS",
        `All ${total} trades follow correct direction consistency (buy increases positions, sell decreases positions)`
      );
    }

    const lines: string[] = [];
    const sections: Array<[DirectionViolationType, string, string]> = [
      ["BUY_DECREASED", "BUY", "buy"],
      ["SELL_INCREASED", "SELL", "sell"]
    ];

    for (const [type, label, verb] of sections) {
      const ofType = violations.filter(v => v.violationType === type);
      if (ofType.length === 0) continue;

      lines.push(`${label} Direction Violations (${ofType.length}):`);
      const byPeriod = groupBy(ofType, v => `${v.timeFrom}→${v.timeTo}`);
      for (const [period, rows] of [...byPeriod].slice(0, PERIODS_SHOWN)) {
        lines.push(`  ${period}: ${rows.length} violations`);
        const movement = type === "BUY_DECREASED" ? "decreased" : "increased";
        appendCapped(
          lines,
          rows,
          v => `${v.participantId}/${v.ticker}: ${fmt(v.currentPosition)}→${fmt(v.nextPosition)} ` +
            `(intended ${verb} ${fmt(v.intendedTrade)}, but position ${movement})`,
          "    ",
          ROWS_PER_PERIOD
        );
      }
      if (byPeriod.size > PERIODS_SHOWN) {
        lines.push(`  ... and ${byPeriod.size - PERIODS_SHOWN} more periods`);
      }
    }

    return result(
      this.name,
      "FAIL",
      `Found ${violations.length} direction consistency violations out of ${total} total trades`,
      lines
    );
  }
}
