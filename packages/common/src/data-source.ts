/**
 * ISignalSource Interface
 *
 * Abstraction over where the pipeline tables come from. The rule engine
 * never reads files or request bodies itself; it is handed a fully
 * materialized, validated SignalTables snapshot.
 *
 * Implementations live in services/validation-api/src/datasources/.
 */

import { z } from "zod";
import {
  AlphaRowSchema,
  PositionRowSchema,
  MarketRowSchema,
  VirtualPositionRowSchema,
  toAlphaEvent,
  toPositionEvent,
  toMarketEvent,
  toVirtualPositionEvent,
  type AlphaEvent,
  type PositionEvent,
  type MarketEvent,
  type VirtualPositionEvent
} from "./events.js";

// ============================================================================
// Tables
// ============================================================================

export interface SignalTables {
  pm: AlphaEvent[];
  merged: AlphaEvent[];
  split: AlphaEvent[];
  positions: PositionEvent[];
  market?: MarketEvent[];
  virtualPositions?: VirtualPositionEvent[];
}

export type TableName = "pm" | "merged" | "split" | "positions" | "market" | "virtualPositions";

export const RawSignalTablesSchema = z.object({
  pm: z.array(AlphaRowSchema),
  merged: z.array(AlphaRowSchema).optional(),
  split: z.array(AlphaRowSchema),
  positions: z.array(PositionRowSchema),
  market: z.array(MarketRowSchema).optional(),
  virtualPositions: z.array(VirtualPositionRowSchema).optional()
});

export type RawSignalTables = z.input<typeof RawSignalTablesSchema>;

// ============================================================================
// Data contract errors
// ============================================================================

/**
 * A required table is missing or a row breaks its schema.
 * Raised before any checker runs.
 */
export class DataContractError extends Error {
  constructor(
    message: string,
    public readonly table: string,
    public readonly issues: string[] = []
  ) {
    super(message);
    this.name = "DataContractError";
  }
}

function isTableName(value: unknown): value is TableName {
  return value === "pm" || value === "merged" || value === "split" ||
    value === "positions" || value === "market" || value === "virtualPositions";
}

/**
 * Validate raw tables and map them onto the event model.
 * When no merged table is supplied the PM table stands in for it.
 */
export function parseSignalTables(raw: unknown): SignalTables {
  const parsed = RawSignalTablesSchema.safeParse(raw);
  if (!parsed.success) {
    const first = parsed.error.errors[0];
    const head = first?.path[0];
    const table = isTableName(head) ? head : "tables";
    const issues = parsed.error.errors.map(e => `${e.path.join(".")}: ${e.message}`);
    throw new DataContractError(
      `Invalid ${table} data: ${issues.length} schema issue(s)`,
      table,
      issues
    );
  }

  const data = parsed.data;
  const pm = data.pm.map(row => toAlphaEvent("PM", row));
  const merged = data.merged
    ? data.merged.map(row => toAlphaEvent("Merged", row))
    : pm.map(e => ({ ...e, phase: "Merged" as const }));

  return {
    pm,
    merged,
    split: data.split.map(row => toAlphaEvent("Split", row)),
    positions: data.positions.map(toPositionEvent),
    market: data.market?.map(toMarketEvent),
    virtualPositions: data.virtualPositions?.map(toVirtualPositionEvent)
  };
}

// ============================================================================
// Table summary
// ============================================================================

export interface TableSummary {
  records: number;
  timeBuckets: number;
  tickers: number;
}

export type SignalTablesSummary = Record<TableName, TableSummary>;

function summarize(rows: ReadonlyArray<{ time: number; ticker: string }> | undefined): TableSummary {
  if (!rows) return { records: 0, timeBuckets: 0, tickers: 0 };
  return {
    records: rows.length,
    timeBuckets: new Set(rows.map(r => r.time)).size,
    tickers: new Set(rows.map(r => r.ticker)).size
  };
}

export function summarizeTables(tables: SignalTables): SignalTablesSummary {
  return {
    pm: summarize(tables.pm),
    merged: summarize(tables.merged),
    split: summarize(tables.split),
    positions: summarize(tables.positions),
    market: summarize(tables.market),
    virtualPositions: summarize(tables.virtualPositions)
  };
}

// ============================================================================
// ISignalSource Interface
// ============================================================================

/**
 * Read-only source of one validation run's tables.
 *
 * Implementations:
 * - DirectorySignalSource: pipe-delimited files in a data directory
 * - JsonSignalSource: tables supplied inline (HTTP request body)
 */
export interface ISignalSource {
  readonly description: string;
  load(): Promise<SignalTables>;
}
