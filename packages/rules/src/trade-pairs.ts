/**
 * Trade pairing
 *
 * One timeline, one pairing rule, shared by the direction checker and the
 * fill-rate engine: the trading timeline is every distinct intraday time in
 * the split and position tables, and a trade is a split target at time t
 * with position snapshots at t and at the next time on that timeline.
 */

import {
  compareTime,
  isPrevClose,
  snapshotKey,
  type AlphaEvent,
  type PositionEvent
} from "@signal-audit/common";

export interface TradePair {
  participantId: string;
  ticker: string;
  timeFrom: number;
  timeTo: number;
  target: number;
  currentPosition: number;
  nextPosition: number;
  intendedTrade: number;
  actualTrade: number;
}

export function tradingTimeline(split: AlphaEvent[], positions: PositionEvent[]): number[] {
  const times = new Set<number>();
  for (const e of split) if (!isPrevClose(e.time)) times.add(e.time);
  for (const p of positions) if (!isPrevClose(p.time)) times.add(p.time);
  return [...times].sort(compareTime);
}

export function pairTrades(split: AlphaEvent[], positions: PositionEvent[]): TradePair[] {
  const timeline = tradingTimeline(split, positions);
  const nextTime = new Map<number, number>();
  for (let i = 0; i < timeline.length - 1; i++) {
    nextTime.set(timeline[i], timeline[i + 1]);
  }

  const snapshots = new Map<string, number>();
  for (const p of positions) {
    snapshots.set(snapshotKey(p.time, p.participantId, p.ticker), p.currentPosition);
  }

  const pairs: TradePair[] = [];
  for (const e of split) {
    const timeTo = nextTime.get(e.time);
    if (timeTo === undefined) continue; // PREV_CLOSE or last bucket

    const current = snapshots.get(snapshotKey(e.time, e.participantId, e.ticker));
    const next = snapshots.get(snapshotKey(timeTo, e.participantId, e.ticker));
    if (current === undefined || next === undefined) continue;

    pairs.push({
      participantId: e.participantId,
      ticker: e.ticker,
      timeFrom: e.time,
      timeTo,
      target: e.targetVolume,
      currentPosition: current,
      nextPosition: next,
      intendedTrade: e.targetVolume - current,
      actualTrade: next - current
    });
  }

  return pairs.sort((a, b) =>
    compareTime(a.timeFrom, b.timeFrom) ||
    a.ticker.localeCompare(b.ticker) ||
    a.participantId.localeCompare(b.participantId)
  );
}
