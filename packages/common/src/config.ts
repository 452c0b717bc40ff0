/**
 * Run configuration
 *
 * Read from the environment once at start-up. Every value has a default so
 * an empty environment yields a usable configuration.
 */

import { z } from "zod";
import { DEFAULT_TOLERANCE } from "./tolerance.js";

export const SettlementStrategySchema = z.enum(["auto", "ledger", "available-sellable"]);

export type SettlementStrategy = z.infer<typeof SettlementStrategySchema>;

export const AuditConfigSchema = z.object({
  tolerance: z.number().nonnegative().default(DEFAULT_TOLERANCE),
  lotSize: z.number().positive().default(100),
  tradersPerGroup: z.number().int().nonnegative().default(2), // 0 disables the allocation rule
  settlementStrategy: SettlementStrategySchema.default("auto")
});

export type AuditConfig = z.infer<typeof AuditConfigSchema>;
export type AuditConfigOverrides = z.input<typeof AuditConfigSchema>;

const EnvSchema = z.object({
  AUDIT_TOLERANCE: z.coerce.number().optional(),
  AUDIT_LOT_SIZE: z.coerce.number().optional(),
  AUDIT_TRADERS_PER_GROUP: z.coerce.number().optional(),
  AUDIT_SETTLEMENT_STRATEGY: SettlementStrategySchema.optional(),
  AUDIT_DATA_DIR: z.string().min(1).optional(),
  PORT: z.coerce.number().int().positive().default(7010)
});

export interface ServiceConfig {
  audit: AuditConfig;
  dataDir?: string;
  port: number;
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

function formatIssues(error: z.ZodError): string[] {
  return error.errors.map(e => `${e.path.join(".") || "(root)"}: ${e.message}`);
}

export function resolveAuditConfig(overrides: AuditConfigOverrides = {}): AuditConfig {
  const parsed = AuditConfigSchema.safeParse(overrides);
  if (!parsed.success) {
    throw new ConfigError(formatIssues(parsed.error));
  }
  return parsed.data;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(formatIssues(parsed.error));
  }
  const e = parsed.data;
  return {
    audit: resolveAuditConfig({
      tolerance: e.AUDIT_TOLERANCE,
      lotSize: e.AUDIT_LOT_SIZE,
      tradersPerGroup: e.AUDIT_TRADERS_PER_GROUP,
      settlementStrategy: e.AUDIT_SETTLEMENT_STRATEGY
    }),
    dataDir: e.AUDIT_DATA_DIR,
    port: e.PORT
  };
}
