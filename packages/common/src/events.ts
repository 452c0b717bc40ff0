/**
 * Event Model
 *
 * Typed records for the three alpha phases, position snapshots, market
 * snapshots and the optional PM virtual-position table. Every record is
 * keyed by (time, ticker, participant).
 *
 * Time keys are integers of the form HMMSSmmm (93000000 = 09:30:00.000).
 * The previous trading day's closing snapshot uses the PREV_CLOSE sentinel,
 * which sorts before every intraday time.
 */

import { z } from "zod";

export const PREV_CLOSE = -1;

export type AlphaPhase = "PM" | "Merged" | "Split";

export interface AlphaEvent {
  phase: AlphaPhase;
  participantId: string;
  time: number;
  ticker: string;
  targetVolume: number;
}

export interface PositionEvent {
  participantId: string;
  time: number;
  ticker: string;
  currentPosition: number;
  longPosition: number;
  shortPosition: number;
  availableSellableVolume?: number;  // absent when the feed does not pre-compute it
}

export interface MarketEvent {
  time: number;
  ticker: string;
  lastPrice: number;
  prevClosePrice: number;
}

export interface VirtualPositionEvent {
  participantId: string;
  time: number;
  ticker: string;
  virtualPosition: number;
}

/**
 * Normalize a raw time value.
 * Numbers and numeric strings become integer keys; any other text
 * (e.g. "nil_last_alpha") is the previous-close marker.
 */
export function normalizeTime(value: number | string): number {
  if (typeof value === "number") {
    return Number.isFinite(value) ? Math.trunc(value) : PREV_CLOSE;
  }
  const trimmed = value.trim();
  if (trimmed === "") return PREV_CLOSE;
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? Math.trunc(parsed) : PREV_CLOSE;
}

export function isPrevClose(time: number): boolean {
  return time === PREV_CLOSE;
}

export function compareTime(a: number, b: number): number {
  if (a === b) return 0;
  if (isPrevClose(a)) return -1;
  if (isPrevClose(b)) return 1;
  return a - b;
}

/**
 * Render a time key for reports: "PREV", "9:30", "14:55" or the raw number.
 */
export function formatTime(time: number): string {
  if (isPrevClose(time)) return "PREV";
  const digits = String(Math.trunc(time));
  if (digits.length < 8 || digits.length > 9) return digits;
  const hour = Number(digits.slice(0, digits.length - 7));
  const minute = digits.slice(-7, -5);
  return `${hour}:${minute}`;
}

// ============================================================================
// Row schemas (wire form, already type-coerced by the loader)
// ============================================================================

const TimeSchema = z.union([z.number(), z.string()]).transform(normalizeTime);
const VolumeSchema = z.number().finite();

export const AlphaRowSchema = z.object({
  event: z.string().optional(),
  participantId: z.string().min(1),
  time: TimeSchema,
  ticker: z.string().min(1),
  volume: VolumeSchema
});

export type AlphaRow = z.input<typeof AlphaRowSchema>;

export const PositionRowSchema = z.object({
  event: z.string().optional(),
  participantId: z.string().min(1),
  time: TimeSchema,
  ticker: z.string().min(1),
  realtimePos: VolumeSchema,
  realtimeLongPos: VolumeSchema,
  realtimeShortPos: VolumeSchema,
  realtimeAvailSellVolume: VolumeSchema.optional()
});

export type PositionRow = z.input<typeof PositionRowSchema>;

export const MarketRowSchema = z.object({
  event: z.string().optional(),
  participantId: z.string().optional(),
  time: TimeSchema,
  ticker: z.string().min(1),
  lastPrice: z.number().finite(),
  prevClosePrice: z.number().finite()
});

export type MarketRow = z.input<typeof MarketRowSchema>;

export const VirtualPositionRowSchema = z.object({
  participantId: z.string().min(1),
  time: TimeSchema,
  ticker: z.string().min(1),
  virtualPosition: VolumeSchema
});

export type VirtualPositionRow = z.input<typeof VirtualPositionRowSchema>;

// ============================================================================
// Row → event mapping
// ============================================================================

export function toAlphaEvent(phase: AlphaPhase, row: z.output<typeof AlphaRowSchema>): AlphaEvent {
  return {
    phase,
    participantId: row.participantId,
    time: row.time,
    ticker: row.ticker,
    targetVolume: row.volume
  };
}

export function toPositionEvent(row: z.output<typeof PositionRowSchema>): PositionEvent {
  return {
    participantId: row.participantId,
    time: row.time,
    ticker: row.ticker,
    currentPosition: row.realtimePos,
    longPosition: row.realtimeLongPos,
    shortPosition: row.realtimeShortPos,
    availableSellableVolume: row.realtimeAvailSellVolume
  };
}

export function toMarketEvent(row: z.output<typeof MarketRowSchema>): MarketEvent {
  return {
    time: row.time,
    ticker: row.ticker,
    lastPrice: row.lastPrice,
    prevClosePrice: row.prevClosePrice
  };
}

export function toVirtualPositionEvent(row: z.output<typeof VirtualPositionRowSchema>): VirtualPositionEvent {
  return {
    participantId: row.participantId,
    time: row.time,
    ticker: row.ticker,
    virtualPosition: row.virtualPosition
  };
}

/**
 * Composite key helpers. Tickers and participant ids never contain "|"
 * since the upstream files are pipe-delimited.
 */
export function timeTickerKey(time: number, ticker: string): string {
  return `${time}|${ticker}`;
}

export function participantTickerKey(participantId: string, ticker: string): string {
  return `${participantId}|${ticker}`;
}

export function snapshotKey(time: number, participantId: string, ticker: string): string {
  return `${time}|${participantId}|${ticker}`;
}
