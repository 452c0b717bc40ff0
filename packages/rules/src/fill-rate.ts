/**
 * Fill-Rate Engine
 *
 * Measures how faithfully intended trades were executed:
 *   intendedTrade = target(t) - position(t)
 *   actualTrade   = position(t+1) - position(t)
 *   fillRate      = actualTrade / intendedTrade
 *
 * Zero-intended policy: when |intendedTrade| <= tolerance the trade has no
 * fill rate (null). Such trades count towards totals and are excluded from
 * every mean, best/worst, histogram and net fill rate.
 *
 * The per-trade table is computed once per run; each view filters it.
 * Time filters name the arrival bucket (timeTo).
 */

import {
  DEFAULT_TOLERANCE,
  isNegligible,
  mean,
  sum,
  extent,
  compareTime,
  formatTime,
  type AnalysisResult,
  type SignalTables
} from "@signal-audit/common";
import { groupBy } from "./checker.js";
import { pairTrades, type TradePair } from "./trade-pairs.js";

export interface FillRecord extends TradePair {
  fillRate: number | null;
}

export type FillRateRequest =
  | { view: "overview" }
  | { view: "by-time"; time: number }
  | { view: "by-ticker"; ticker: string }
  | { view: "deep"; time: number; ticker: string };

export type FillRateViewName = FillRateRequest["view"];

export interface HistogramBin {
  from: number;
  to: number;
  count: number;
}

export interface FillRateStats {
  totalTrades: number;
  analyzable: number;
  meanFillRate: number | null;
}

export interface TickerFillRate extends FillRateStats {
  ticker: string;
}

export interface PeriodFillRate extends FillRateStats {
  time: number;
}

export type FillRateView =
  | (FillRateStats & {
      view: "overview";
      best: FillRecord | null;
      worst: FillRecord | null;
      histogram: HistogramBin[];
    })
  | (FillRateStats & { view: "by-time"; time: number; tickers: TickerFillRate[] })
  | (FillRateStats & { view: "by-ticker"; ticker: string; periods: PeriodFillRate[] })
  | (FillRateStats & {
      view: "deep";
      time: number;
      ticker: string;
      trades: FillRecord[];
      totalIntended: number;
      totalActual: number;
      netFillRate: number | null;
    });

export type FillRateAnalysis = AnalysisResult<FillRateView>;

export const HISTOGRAM_BINS = 20;

function rate(value: number | null): string {
  return value === null ? "n/a" : value.toFixed(3);
}

function analyzableRates(records: FillRecord[]): number[] {
  const rates: number[] = [];
  for (const r of records) if (r.fillRate !== null) rates.push(r.fillRate);
  return rates;
}

function stats(records: FillRecord[]): FillRateStats {
  const rates = analyzableRates(records);
  return { totalTrades: records.length, analyzable: rates.length, meanFillRate: mean(rates) };
}

export function histogram(rates: number[], bins: number = HISTOGRAM_BINS): HistogramBin[] {
  const bounds = extent(rates);
  if (bounds === null) return [];
  const { min, max } = bounds;
  if (min === max) return [{ from: min, to: max, count: rates.length }];

  const width = (max - min) / bins;
  const out: HistogramBin[] = Array.from({ length: bins }, (_, i) => ({
    from: min + i * width,
    to: i === bins - 1 ? max : min + (i + 1) * width,
    count: 0
  }));
  for (const r of rates) {
    const index = Math.min(bins - 1, Math.floor((r - min) / width));
    out[index].count += 1;
  }
  return out;
}

export class FillRateEngine {
  readonly name = "Fill Rate Analysis";
  private readonly tolerance: number;

  constructor(options: { tolerance?: number } = {}) {
    this.tolerance = options.tolerance ?? DEFAULT_TOLERANCE;
  }

  fillRate(intendedTrade: number, actualTrade: number): number | null {
    return isNegligible(intendedTrade, this.tolerance) ? null : actualTrade / intendedTrade;
  }

  /**
   * The shared per-trade table. Takes the full, unfiltered tables so every
   * trade finds its chronological neighbour.
   */
  computeFillTable(tables: SignalTables): FillRecord[] {
    return pairTrades(tables.split, tables.positions).map(pair => ({
      ...pair,
      fillRate: this.fillRate(pair.intendedTrade, pair.actualTrade)
    }));
  }

  analyze(tables: SignalTables, request: FillRateRequest): FillRateAnalysis {
    return this.analyzeTable(this.computeFillTable(tables), request);
  }

  /**
   * Several views over one computation.
   */
  analyzeMany(tables: SignalTables, requests: FillRateRequest[]): FillRateAnalysis[] {
    const table = this.computeFillTable(tables);
    return requests.map(request => this.analyzeTable(table, request));
  }

  analyzeTable(table: FillRecord[], request: FillRateRequest): FillRateAnalysis {
    switch (request.view) {
      case "overview":
        return this.overview(table);
      case "by-time":
        return this.byTime(table, request.time);
      case "by-ticker":
        return this.byTicker(table, request.ticker);
      case "deep":
        return this.deep(table, request.time, request.ticker);
    }
  }

  private overview(table: FillRecord[]): FillRateAnalysis {
    const s = stats(table);
    let best: FillRecord | null = null;
    let worst: FillRecord | null = null;
    for (const r of table) {
      if (r.fillRate === null) continue;
      if (best === null || best.fillRate === null || r.fillRate > best.fillRate) best = r;
      if (worst === null || worst.fillRate === null || r.fillRate < worst.fillRate) worst = r;
    }
    const data: FillRateView = {
      view: "overview",
      ...s,
      best,
      worst,
      histogram: histogram(analyzableRates(table))
    };

    if (best === null || worst === null) {
      return {
        analyzerName: this.name,
        summary: "No analyzable trades found",
        details: table.length > 0 ? "All trades had zero intended trade" : undefined,
        data
      };
    }

    return {
      analyzerName: this.name,
      summary: `Total trades: ${s.totalTrades} | Analyzable: ${s.analyzable} | Mean fill rate: ${rate(s.meanFillRate)}`,
      details: [
        `Best performer: ${best.ticker} (${rate(best.fillRate)})`,
        `Worst performer: ${worst.ticker} (${rate(worst.fillRate)})`
      ].join("\n"),
      data
    };
  }

  private byTime(table: FillRecord[], time: number): FillRateAnalysis {
    const rows = table.filter(r => r.timeTo === time);
    const tickers = [...groupBy(rows, r => r.ticker)]
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([ticker, records]): TickerFillRate => ({ ticker, ...stats(records) }));
    const s = stats(rows);
    const data: FillRateView = { view: "by-time", time, ...s, tickers };

    if (s.analyzable === 0) {
      return { analyzerName: this.name, summary: `No analyzable trades found for time=${time}`, data };
    }

    const analyzed = tickers.filter(t => t.analyzable > 0);
    return {
      analyzerName: this.name,
      summary: `time=${time} (${formatTime(time)}): ${analyzed.length} tickers analyzed | Overall mean: ${rate(s.meanFillRate)}`,
      details: [
        "Per-ticker performance:",
        ...analyzed.map(t => `  ${t.ticker}: ${rate(t.meanFillRate)} (${t.analyzable} trades)`)
      ].join("\n"),
      data
    };
  }

  private byTicker(table: FillRecord[], ticker: string): FillRateAnalysis {
    const rows = table.filter(r => r.ticker === ticker);
    const periods = [...groupBy(rows, r => r.timeTo)]
      .sort(([a], [b]) => compareTime(a, b))
      .map(([time, records]): PeriodFillRate => ({ time, ...stats(records) }));
    const s = stats(rows);
    const data: FillRateView = { view: "by-ticker", ticker, ...s, periods };

    if (s.analyzable === 0) {
      return { analyzerName: this.name, summary: `No analyzable trades found for ticker=${ticker}`, data };
    }

    const analyzed = periods.filter(p => p.analyzable > 0);
    return {
      analyzerName: this.name,
      summary: `ticker=${ticker}: ${analyzed.length} time periods | Overall mean: ${rate(s.meanFillRate)}`,
      details: [
        "Timeline performance:",
        ...analyzed.map(p => `  time=${p.time}: ${rate(p.meanFillRate)} (${p.analyzable} trades)`)
      ].join("\n"),
      data
    };
  }

  private deep(table: FillRecord[], time: number, ticker: string): FillRateAnalysis {
    const rows = table.filter(r => r.timeTo === time && r.ticker === ticker);
    const analyzable = rows.filter(r => r.fillRate !== null);
    const totalIntended = sum(analyzable.map(r => r.intendedTrade));
    const totalActual = sum(analyzable.map(r => r.actualTrade));
    const netFillRate = isNegligible(totalIntended, this.tolerance) ? null : totalActual / totalIntended;
    const s = stats(rows);
    const data: FillRateView = {
      view: "deep",
      time,
      ticker,
      ...s,
      trades: rows,
      totalIntended,
      totalActual,
      netFillRate
    };

    if (analyzable.length === 0) {
      return {
        analyzerName: this.name,
        summary: `No analyzable trades for time=${time}, ticker=${ticker}`,
        data
      };
    }

    return {
      analyzerName: this.name,
      summary: `time=${time}, ticker=${ticker}: ${analyzable.length} trades | Net fill rate: ${rate(netFillRate)}`,
      details: [
        "Trade-by-trade breakdown:",
        ...rows.map(r =>
          `  ${r.participantId}: intended=${r.intendedTrade.toFixed(0)}, ` +
          `actual=${r.actualTrade.toFixed(0)}, fill_rate=${rate(r.fillRate)}`
        )
      ].join("\n"),
      data
    };
  }
}
