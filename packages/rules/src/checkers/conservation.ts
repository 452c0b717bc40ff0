/**
 * Merge Conservation Checker
 *
 * Validates the two-phase distribution of alpha volume:
 * 1. PM alphas → Merged groups
 * 2. Merged groups → Split to traders
 * plus the group allocation rule (distinct traders per group).
 *
 * Volume must be conserved per (time, ticker) across both phases. At
 * PREV_CLOSE a PM absent from the data contributes 0 to the group total.
 */

import {
  compareTime,
  isPrevClose,
  timeTickerKey,
  approxEqual,
  DEFAULT_TOLERANCE,
  type AlphaEvent,
  type CheckResult,
  type SignalTables
} from "@signal-audit/common";
import { result, groupBy, type Checker } from "../checker.js";

export type ConservationViolationKind =
  | "PM_MERGED_MISMATCH"
  | "ORPHANED_MERGED"
  | "MERGED_SPLIT_MISMATCH"
  | "ORPHANED_SPLIT";

export interface ConservationViolation {
  kind: ConservationViolationKind;
  time: number;
  ticker: string;
  upstreamTotal: number;
  downstreamTotal: number;
  diff: number;
  detail: string;
}

export interface AllocationWarning {
  time: number;
  ticker: string;
  expected: number;
  actual: number;
  detail: string;
}

export interface ConservationCheckerOptions {
  tolerance?: number;
  /** Expected distinct traders per Merged group; 0 disables the rule. */
  tradersPerGroup?: number;
}

interface GroupTotal {
  time: number;
  ticker: string;
  total: number;
  events: AlphaEvent[];
}

function groupTotals(events: AlphaEvent[]): Map<string, GroupTotal> {
  const totals = new Map<string, GroupTotal>();
  for (const e of events) {
    const key = timeTickerKey(e.time, e.ticker);
    const group = totals.get(key);
    if (group) {
      group.total += e.targetVolume;
      group.events.push(e);
    } else {
      totals.set(key, { time: e.time, ticker: e.ticker, total: e.targetVolume, events: [e] });
    }
  }
  return totals;
}

function sortedGroups(...maps: Map<string, GroupTotal>[]): Array<{ key: string; time: number; ticker: string }> {
  const seen = new Map<string, { key: string; time: number; ticker: string }>();
  for (const map of maps) {
    for (const [key, g] of map) {
      if (!seen.has(key)) seen.set(key, { key, time: g.time, ticker: g.ticker });
    }
  }
  return [...seen.values()].sort((a, b) => compareTime(a.time, b.time) || a.ticker.localeCompare(b.ticker));
}

/** Render a volume with at most six decimals and no trailing zeros. */
export function formatVolume(value: number): string {
  return String(Number(value.toFixed(6)));
}

export class ConservationChecker implements Checker {
  readonly name = "Merge Conservation";
  private readonly tolerance: number;
  private readonly tradersPerGroup: number;

  constructor(options: ConservationCheckerOptions = {}) {
    this.tolerance = options.tolerance ?? DEFAULT_TOLERANCE;
    this.tradersPerGroup = options.tradersPerGroup ?? 2;
  }

  check(tables: SignalTables): CheckResult {
    const violations = [
      ...this.validatePmToMerged(tables.pm, tables.merged),
      ...this.validateMergedToSplit(tables.merged, tables.split)
    ];
    const warnings = this.validateAllocation(tables.merged, tables.split);

    const groupCount = groupTotals(tables.merged).size;

    if (violations.length === 0 && warnings.length === 0) {
      return result(
        this.name,
        "PASS",
        `All ${groupCount} (time, ticker) groups conserve volume across PM → Merged → Split`,
        [`Validated ${tables.merged.length} group merges and ${tables.split.length} trader allocations`]
      );
    }

    const lines = [
      ...violations.map(v => v.detail),
      ...warnings.map(w => `WARNING ${w.detail}`)
    ];

    if (violations.length === 0) {
      return result(
        this.name,
        "WARN",
        `Merge conservation passed with ${warnings.length} warnings`,
        lines
      );
    }

    const orphans = violations.filter(v => v.kind === "ORPHANED_MERGED" || v.kind === "ORPHANED_SPLIT").length;
    return result(
      this.name,
      "FAIL",
      `Found ${violations.length} merge conservation violations (${orphans} orphaned) and ${warnings.length} warnings`,
      lines
    );
  }

  /**
   * Phase 1: PM alphas merge into groups.
   * At PREV_CLOSE a missing PM means 0; intraday a group with no PM input is orphaned.
   */
  validatePmToMerged(pm: AlphaEvent[], merged: AlphaEvent[]): ConservationViolation[] {
    const violations: ConservationViolation[] = [];
    const allPms = new Set(pm.map(e => e.participantId));
    const pmTotals = groupTotals(pm);
    const mergedTotals = groupTotals(merged);

    for (const { key, time, ticker } of sortedGroups(pmTotals, mergedTotals)) {
      const pmGroup = pmTotals.get(key);
      const mergedGroup = mergedTotals.get(key);
      const pmTotal = pmGroup?.total ?? 0;
      const mergedTotal = mergedGroup?.total ?? 0;
      const diff = pmTotal - mergedTotal;

      if (!pmGroup && mergedGroup && !isPrevClose(time)) {
        violations.push({
          kind: "ORPHANED_MERGED",
          time,
          ticker,
          upstreamTotal: 0,
          downstreamTotal: mergedTotal,
          diff,
          detail: `Orphaned merged alpha at time=${time}, ticker=${ticker}: ` +
            `volume=${formatVolume(mergedTotal)} (no corresponding PM input)`
        });
        continue;
      }

      if (approxEqual(pmTotal, mergedTotal, this.tolerance)) continue;

      let detail = `PM→Merged violation at time=${time}, ticker=${ticker}: ` +
        `PM total=${formatVolume(pmTotal)}, Merged total=${formatVolume(mergedTotal)}, diff=${formatVolume(diff)}`;

      if (isPrevClose(time)) {
        const contributions = [...groupBy(pmGroup?.events ?? [], e => e.participantId)]
          .map(([id, events]) => `${id}: ${formatVolume(events.reduce((s, e) => s + e.targetVolume, 0))}`);
        const present = new Set((pmGroup?.events ?? []).map(e => e.participantId));
        const missing = [...allPms].filter(id => !present.has(id)).sort();
        detail += ` (from: ${contributions.length > 0 ? contributions.join(", ") : "none"}). ` +
          `Missing PMs default to 0: ${missing.length > 0 ? missing.join(", ") : "none"}`;
      }

      violations.push({
        kind: "PM_MERGED_MISMATCH",
        time,
        ticker,
        upstreamTotal: pmTotal,
        downstreamTotal: mergedTotal,
        diff,
        detail
      });
    }

    return violations;
  }

  /**
   * Phase 2: Merged groups distribute to traders.
   */
  validateMergedToSplit(merged: AlphaEvent[], split: AlphaEvent[]): ConservationViolation[] {
    const violations: ConservationViolation[] = [];
    const mergedTotals = groupTotals(merged);
    const splitTotals = groupTotals(split);

    for (const { key, time, ticker } of sortedGroups(mergedTotals, splitTotals)) {
      const mergedGroup = mergedTotals.get(key);
      const splitTotal = splitTotals.get(key)?.total ?? 0;

      if (!mergedGroup) {
        violations.push({
          kind: "ORPHANED_SPLIT",
          time,
          ticker,
          upstreamTotal: 0,
          downstreamTotal: splitTotal,
          diff: -splitTotal,
          detail: `Orphaned split alpha at time=${time}, ticker=${ticker}: ` +
            `volume=${formatVolume(splitTotal)} (no corresponding merged input)`
        });
        continue;
      }

      const diff = mergedGroup.total - splitTotal;
      if (approxEqual(mergedGroup.total, splitTotal, this.tolerance)) continue;

      violations.push({
        kind: "MERGED_SPLIT_MISMATCH",
        time,
        ticker,
        upstreamTotal: mergedGroup.total,
        downstreamTotal: splitTotal,
        diff,
        detail: `Merged→Split violation at time=${time}, ticker=${ticker}: ` +
          `Merged total=${formatVolume(mergedGroup.total)}, Split total=${formatVolume(splitTotal)}, diff=${formatVolume(diff)}`
      });
    }

    return violations;
  }

  /**
   * Phase 3: each Merged group is split across the configured number of traders.
   */
  validateAllocation(merged: AlphaEvent[], split: AlphaEvent[]): AllocationWarning[] {
    if (this.tradersPerGroup === 0) return [];

    const traders = new Map<string, Set<string>>();
    for (const e of split) {
      const key = timeTickerKey(e.time, e.ticker);
      const set = traders.get(key) ?? new Set<string>();
      set.add(e.participantId);
      traders.set(key, set);
    }

    const warnings: AllocationWarning[] = [];
    for (const { key, time, ticker } of sortedGroups(groupTotals(merged))) {
      const actual = traders.get(key)?.size ?? 0;
      if (actual !== this.tradersPerGroup) {
        warnings.push({
          time,
          ticker,
          expected: this.tradersPerGroup,
          actual,
          detail: `Allocation rule violation at time=${time}, ticker=${ticker}: ` +
            `expected ${this.tradersPerGroup} traders, got ${actual}`
        });
      }
    }
    return warnings;
  }
}
