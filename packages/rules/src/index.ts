// Checker contract
export {
  result,
  appendCapped,
  groupBy,
  DETAIL_ROWS_PER_GROUP,
  type Checker
} from "./checker.js";

// Checkers and registry
export * from "./checkers/index.js";

// Trade pairing
export { tradingTimeline, pairTrades, type TradePair } from "./trade-pairs.js";

// Fill-Rate Engine
export {
  FillRateEngine,
  histogram,
  HISTOGRAM_BINS,
  type FillRecord,
  type FillRateRequest,
  type FillRateViewName,
  type FillRateView,
  type FillRateStats,
  type FillRateAnalysis,
  type HistogramBin,
  type TickerFillRate,
  type PeriodFillRate
} from "./fill-rate.js";

// Orchestration
export {
  runChecks,
  runChecker,
  exitCodeFor,
  type CheckRun,
  type RunOptions
} from "./orchestrator.js";

// Reporting
export { formatRun, formatAnalysis } from "./reporter.js";
