import { isAbsolute, relative, resolve, sep } from "node:path";
import express, { type Response } from "express";
import { z } from "zod";
import {
  ConfigError,
  DataContractError,
  SettlementStrategySchema,
  normalizeTime,
  summarizeTables,
  type AuditConfig,
  type ISignalSource,
  type ServiceConfig
} from "@signal-audit/common";
import {
  createCheckers,
  runChecks,
  FillRateEngine,
  type FillRateRequest
} from "@signal-audit/rules";
import { DirectorySignalSource, JsonSignalSource } from "./datasources/index.js";

const ConfigOverridesSchema = z.object({
  tolerance: z.number().nonnegative().optional(),
  lotSize: z.number().positive().optional(),
  tradersPerGroup: z.number().int().nonnegative().optional(),
  settlementStrategy: SettlementStrategySchema.optional()
}).strict();

type ConfigOverrides = z.infer<typeof ConfigOverridesSchema>;

const SourceFields = {
  tables: z.unknown().optional(),
  dataDir: z.string().min(1).optional(),
  config: ConfigOverridesSchema.optional()
};

export const ValidateRequestSchema = z.object(SourceFields);

const TimeParam = z.union([z.number(), z.string()]).transform(normalizeTime);

export const FillRateRequestSchema = z.discriminatedUnion("view", [
  z.object({ view: z.literal("overview") }),
  z.object({ view: z.literal("by-time"), time: TimeParam }),
  z.object({ view: z.literal("by-ticker"), ticker: z.string().min(1) }),
  z.object({ view: z.literal("deep"), time: TimeParam, ticker: z.string().min(1) })
]);

export const AnalyzeRequestSchema = z.object({
  ...SourceFields,
  view: z.unknown()
});

class RequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RequestError";
  }
}

export function withOverrides(base: AuditConfig, o: ConfigOverrides = {}): AuditConfig {
  return {
    tolerance: o.tolerance ?? base.tolerance,
    lotSize: o.lotSize ?? base.lotSize,
    tradersPerGroup: o.tradersPerGroup ?? base.tradersPerGroup,
    settlementStrategy: o.settlementStrategy ?? base.settlementStrategy
  };
}

/**
 * A requested dataDir is resolved against the configured data directory and
 * may not leave it. Without a configured directory only inline tables work.
 */
export function resolveDataDir(requested: string | undefined, root: string | undefined): string {
  if (!root) {
    throw new RequestError(
      requested === undefined ? "Provide tables or dataDir" : "dataDir is not enabled on this server"
    );
  }
  if (requested === undefined) return root;

  const dir = resolve(root, requested);
  const rel = relative(resolve(root), dir);
  if (rel === ".." || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
    throw new RequestError("dataDir must be inside the configured data directory");
  }
  return dir;
}

function resolveSource(
  body: { tables?: unknown; dataDir?: string },
  root: string | undefined
): ISignalSource {
  if (body.tables !== undefined) return new JsonSignalSource(body.tables);
  return new DirectorySignalSource(resolveDataDir(body.dataDir, root));
}

function sendError(res: Response, err: unknown, context: string): void {
  if (err instanceof RequestError || err instanceof ConfigError) {
    res.status(400).json({ error: err.message });
    return;
  }
  if (err instanceof DataContractError) {
    res.status(422).json({ error: err.message, table: err.table, issues: err.issues });
    return;
  }
  console.error(`${context} failed:`, err);
  res.status(500).json({ error: `${context} failed` });
}

export function createApp(config: ServiceConfig) {
  const app = express();
  app.use(express.json({ limit: "50mb" }));

  app.get("/health", (_, res) => {
    res.json({ ok: true, service: "validation-api", config: config.audit });
  });

  app.post("/validate", async (req, res) => {
    const parsed = ValidateRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: "Invalid request", details: parsed.error.format() });
    }

    try {
      const source = resolveSource(parsed.data, config.dataDir);
      const tables = await source.load();
      const audit = withOverrides(config.audit, parsed.data.config);
      const run = runChecks(tables, createCheckers(audit));
      console.log(`run ${run.runId} (${source.description}): ${run.summary}`);
      res.json({ source: source.description, tables: summarizeTables(tables), run });
    } catch (err) {
      sendError(res, err, "Validation run");
    }
  });

  app.post("/analyze/fill-rate", async (req, res) => {
    const parsed = AnalyzeRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: "Invalid request", details: parsed.error.format() });
    }
    const view = FillRateRequestSchema.safeParse(parsed.data.view ?? { view: "overview" });
    if (!view.success) {
      return res.status(400).json({ error: "Invalid view", details: view.error.format() });
    }

    try {
      const source = resolveSource(parsed.data, config.dataDir);
      const tables = await source.load();
      const audit = withOverrides(config.audit, parsed.data.config);
      const engine = new FillRateEngine({ tolerance: audit.tolerance });
      const request: FillRateRequest = view.data;
      res.json(engine.analyze(tables, request));
    } catch (err) {
      sendError(res, err, "Fill-rate analysis");
    }
  });

  return app;
}
