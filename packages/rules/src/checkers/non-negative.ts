import { compareTime, extent, type CheckResult, type SignalTables } from "@signal-audit/common";
import { result, groupBy, appendCapped, fmt, type Checker } from "../checker.js";

/**
 * Every split alpha target must be >= 0 (no short alpha targets).
 */
export class NonNegativeChecker implements Checker {
  readonly name = "Non-Negative Split Alpha";

  check(tables: SignalTables): CheckResult {
    const negatives = tables.split.filter(e => e.targetVolume < 0);

    if (negatives.length === 0) {
      const timeCount = new Set(tables.split.map(e => e.time)).size;
      return result(
        this.name,
        "PASS",
        `All ${tables.split.length} split alpha volumes are non-negative across ${timeCount} time events`
      );
    }

    const byTime = groupBy(negatives, e => e.time);
    const lines: string[] = [];
    for (const time of [...byTime.keys()].sort(compareTime)) {
      const rows = byTime.get(time) ?? [];
      const min = extent(rows.map(r => r.targetVolume))?.min ?? 0;
      lines.push(`time=${time}: ${rows.length} negative volumes (min=${fmt(min, 6)})`);
      appendCapped(lines, rows, r => `participant=${r.participantId}, ticker=${r.ticker}, volume=${fmt(r.targetVolume, 6)}`);
    }

    return result(
      this.name,
      "FAIL",
      `Found ${negatives.length} negative split volumes across ${byTime.size} time events`,
      lines
    );
  }
}
