/**
 * Volume Rounding Checker
 *
 * Trade volume = split target - realtime position, joined on
 * (time, participant, ticker). A missing position counts as 0. Every trade
 * volume must be a whole number of lots.
 */

import {
  compareTime,
  snapshotKey,
  floorMod,
  lotDeviation,
  DEFAULT_TOLERANCE,
  type CheckResult,
  type SignalTables
} from "@signal-audit/common";
import { result, groupBy, appendCapped, fmt, type Checker } from "../checker.js";

export interface VolumeRoundingOptions {
  lotSize?: number;
  tolerance?: number;
}

export interface UnroundedTrade {
  time: number;
  participantId: string;
  ticker: string;
  target: number;
  position: number;
  tradeVolume: number;
  remainder: number;
}

export class VolumeRoundingChecker implements Checker {
  readonly name: string;
  private readonly lotSize: number;
  private readonly tolerance: number;

  constructor(options: VolumeRoundingOptions = {}) {
    this.lotSize = options.lotSize ?? 100;
    this.tolerance = options.tolerance ?? DEFAULT_TOLERANCE;
    this.name = `Volume Rounding (${this.lotSize} shares)`;
  }

  findUnrounded(tables: SignalTables): UnroundedTrade[] {
    const positions = new Map<string, number>();
    for (const p of tables.positions) {
      positions.set(snapshotKey(p.time, p.participantId, p.ticker), p.currentPosition);
    }

    const unrounded: UnroundedTrade[] = [];
    for (const e of tables.split) {
      const position = positions.get(snapshotKey(e.time, e.participantId, e.ticker)) ?? 0;
      const tradeVolume = e.targetVolume - position;
      if (lotDeviation(tradeVolume, this.lotSize) > this.tolerance) {
        unrounded.push({
          time: e.time,
          participantId: e.participantId,
          ticker: e.ticker,
          target: e.targetVolume,
          position,
          tradeVolume,
          remainder: floorMod(tradeVolume, this.lotSize)
        });
      }
    }
    return unrounded;
  }

  check(tables: SignalTables): CheckResult {
    const unrounded = this.findUnrounded(tables);

    if (unrounded.length === 0) {
      const timeCount = new Set(tables.split.map(e => e.time)).size;
      return result(
        this.name,
        "PASS",
        `All ${tables.split.length} trade volumes are properly rounded to ${this.lotSize} shares across ${timeCount} time events`
      );
    }

    const byTime = groupBy(unrounded, u => u.time);
    const lines: string[] = [];
    for (const time of [...byTime.keys()].sort(compareTime)) {
      const rows = byTime.get(time) ?? [];
      lines.push(`time=${time}: ${rows.length} unrounded volumes`);
      appendCapped(lines, rows, u =>
        `participant=${u.participantId}, ticker=${u.ticker}: target=${fmt(u.target, 1)}, ` +
        `pos=${fmt(u.position, 1)}, volume=${fmt(u.tradeVolume, 1)} (remainder=${fmt(u.remainder, 1)})`
      );
    }

    return result(
      this.name,
      "FAIL",
      `Found ${unrounded.length} trade volumes not rounded to ${this.lotSize} shares across ${byTime.size} time events`,
      lines
    );
  }
}
