/**
 * Checker registry
 *
 * The full set of validators, assembled at start-up from one configuration.
 * Adding a checker means adding it here.
 */

import { resolveAuditConfig, type AuditConfig } from "@signal-audit/common";
import type { Checker } from "../checker.js";
import { ConservationChecker } from "./conservation.js";
import { NonNegativeChecker } from "./non-negative.js";
import { VolumeRoundingChecker } from "./volume-rounding.js";
import { DirectionConsistencyChecker } from "./direction-consistency.js";
import { SettlementChecker } from "./settlement.js";

export {
  ConservationChecker,
  formatVolume,
  type ConservationViolation,
  type ConservationViolationKind,
  type AllocationWarning,
  type ConservationCheckerOptions
} from "./conservation.js";
export { NonNegativeChecker } from "./non-negative.js";
export { VolumeRoundingChecker, type VolumeRoundingOptions, type UnroundedTrade } from "./volume-rounding.js";
export {
  DirectionConsistencyChecker,
  type DirectionViolation,
  type DirectionViolationType
} from "./direction-consistency.js";
export {
  SettlementChecker,
  SettlementLedger,
  SettlementDataError,
  type SettlementCheckerOptions,
  type SettlementEvaluation,
  type SettlementViolation,
  type ResolvedSettlementStrategy,
  type VirtualPosition
} from "./settlement.js";

export function createCheckers(config: AuditConfig = resolveAuditConfig()): Checker[] {
  const { tolerance } = config;
  return [
    new ConservationChecker({ tolerance, tradersPerGroup: config.tradersPerGroup }),
    new NonNegativeChecker(),
    new VolumeRoundingChecker({ tolerance, lotSize: config.lotSize }),
    new DirectionConsistencyChecker({ tolerance }),
    new SettlementChecker({ tolerance, strategy: config.settlementStrategy })
  ];
}
