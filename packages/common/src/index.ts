import { v4 as uuidv4 } from "uuid";

// Re-export Event Model
export {
  PREV_CLOSE,
  normalizeTime,
  isPrevClose,
  compareTime,
  formatTime,
  timeTickerKey,
  participantTickerKey,
  snapshotKey,
  AlphaRowSchema,
  PositionRowSchema,
  MarketRowSchema,
  VirtualPositionRowSchema,
  toAlphaEvent,
  toPositionEvent,
  toMarketEvent,
  toVirtualPositionEvent,
  type AlphaPhase,
  type AlphaEvent,
  type PositionEvent,
  type MarketEvent,
  type VirtualPositionEvent,
  type AlphaRow,
  type PositionRow,
  type MarketRow,
  type VirtualPositionRow
} from "./events.js";

// Re-export tolerance math
export {
  DEFAULT_TOLERANCE,
  approxEqual,
  isNegligible,
  floorMod,
  lotDeviation,
  sum,
  mean,
  extent
} from "./tolerance.js";

// Re-export result contracts
export {
  isCritical,
  type CheckStatus,
  type CheckResult,
  type AnalysisResult
} from "./results.js";

// Re-export configuration
export {
  AuditConfigSchema,
  SettlementStrategySchema,
  ConfigError,
  resolveAuditConfig,
  loadConfig,
  type AuditConfig,
  type AuditConfigOverrides,
  type SettlementStrategy,
  type ServiceConfig
} from "./config.js";

// Re-export data source contracts
export {
  RawSignalTablesSchema,
  DataContractError,
  parseSignalTables,
  summarizeTables,
  type SignalTables,
  type RawSignalTables,
  type TableName,
  type TableSummary,
  type SignalTablesSummary,
  type ISignalSource
} from "./data-source.js";

export function newRunId(): string {
  return uuidv4();
}
