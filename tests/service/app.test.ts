/**
 * HTTP surface of the validation API, served in-process on an ephemeral port.
 */

import { describe, it, before, after } from "node:test";
import assert from "node:assert";
import { join } from "node:path";
import type { Server } from "node:http";
import { z } from "zod";
import { loadConfig } from "@signal-audit/common";
import { createApp, resolveDataDir } from "@signal-audit/validation-api/app";

const A = "000001.SZE";

const alphaRow = (participantId: string, time: number | string, volume: number) =>
  ({ participantId, time, ticker: A, volume });

const positionRow = (participantId: string, time: number, realtimePos: number) => ({
  participantId,
  time,
  ticker: A,
  realtimePos,
  realtimeLongPos: realtimePos,
  realtimeShortPos: 0,
  realtimeAvailSellVolume: 0
});

const balancedDay = {
  pm: [alphaRow("pm-a", 93000000, 1000), alphaRow("pm-b", 93000000, 1000)],
  split: [alphaRow("trader-1", 93000000, 1000), alphaRow("trader-2", 93000000, 1000)],
  positions: [positionRow("trader-1", 93000000, 0), positionRow("trader-2", 93000000, 0)]
};

const fillDay = {
  pm: [alphaRow("pm-a", 93000000, 1000)],
  split: [alphaRow("trader-1", 93000000, 1000)],
  positions: [positionRow("trader-1", 93000000, 0), positionRow("trader-1", 93100000, 900)]
};

const ErrorBody = z.object({ error: z.string(), table: z.string().optional() });

const RunBody = z.object({
  source: z.string(),
  tables: z.object({ pm: z.object({ records: z.number() }) }),
  run: z.object({
    summary: z.string(),
    passed: z.number(),
    results: z.array(z.object({ checkerName: z.string(), status: z.string() }))
  })
});

const AnalysisBody = z.object({
  analyzerName: z.string(),
  summary: z.string(),
  data: z.object({ view: z.string() })
});

let server: Server;
let baseUrl = "";

before(async () => {
  const app = createApp(loadConfig({}));
  server = await new Promise<Server>(resolve => {
    const s = app.listen(0, () => resolve(s));
  });
  const address = server.address();
  if (address === null || typeof address === "string") throw new Error("expected a TCP address");
  baseUrl = `http://127.0.0.1:${address.port}`;
});

after(async () => {
  await new Promise<void>((resolve, reject) => server.close(err => (err ? reject(err) : resolve())));
});

async function post(path: string, body: unknown): Promise<{ status: number; json: unknown }> {
  const resp = await fetch(`${baseUrl}${path}`, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body)
  });
  return { status: resp.status, json: await resp.json() };
}

describe("GET /health", () => {
  it("reports the active audit configuration", async () => {
    const resp = await fetch(`${baseUrl}/health`);
    const body = z.object({
      ok: z.boolean(),
      service: z.string(),
      config: z.object({ lotSize: z.number(), settlementStrategy: z.string() })
    }).parse(await resp.json());
    assert.strictEqual(resp.status, 200);
    assert.deepStrictEqual(body, {
      ok: true,
      service: "validation-api",
      config: { lotSize: 100, settlementStrategy: "auto" }
    });
  });
});

describe("POST /validate", () => {
  it("runs every checker over inline tables", async () => {
    const { status, json } = await post("/validate", { tables: balancedDay });
    assert.strictEqual(status, 200);
    const body = RunBody.parse(json);
    assert.strictEqual(body.source, "inline tables");
    assert.strictEqual(body.tables.pm.records, 2);
    assert.strictEqual(body.run.summary, "5 of 5 checkers passed");
    assert.deepStrictEqual(body.run.results.map(r => r.status), ["PASS", "PASS", "PASS", "PASS", "PASS"]);
  });

  it("applies per-request configuration overrides", async () => {
    const { json } = await post("/validate", { tables: balancedDay, config: { lotSize: 300 } });
    const body = RunBody.parse(json);
    const rounding = body.run.results.find(r => r.checkerName === "Volume Rounding (300 shares)");
    assert.strictEqual(rounding?.status, "FAIL");
  });

  it("rejects an invalid override", async () => {
    const { status, json } = await post("/validate", { tables: balancedDay, config: { lotSize: 0 } });
    assert.strictEqual(status, 400);
    assert.strictEqual(ErrorBody.parse(json).error, "Invalid request");
  });

  it("requires a data source", async () => {
    const { status, json } = await post("/validate", {});
    assert.strictEqual(status, 400);
    assert.strictEqual(ErrorBody.parse(json).error, "Provide tables or dataDir");
  });

  it("refuses a dataDir when no data directory is configured", async () => {
    const { status, json } = await post("/validate", { dataDir: "/etc" });
    assert.strictEqual(status, 400);
    assert.strictEqual(ErrorBody.parse(json).error, "dataDir is not enabled on this server");
  });

  it("answers 422 with the offending table for a contract violation", async () => {
    const { status, json } = await post("/validate", { tables: { pm: [], split: [] } });
    assert.strictEqual(status, 422);
    assert.strictEqual(ErrorBody.parse(json).table, "positions");
  });
});

describe("POST /analyze/fill-rate", () => {
  it("defaults to the overview", async () => {
    const { status, json } = await post("/analyze/fill-rate", { tables: fillDay });
    assert.strictEqual(status, 200);
    const body = AnalysisBody.parse(json);
    assert.strictEqual(body.data.view, "overview");
    assert.strictEqual(body.summary, "Total trades: 1 | Analyzable: 1 | Mean fill rate: 0.900");
  });

  it("accepts a time given as a string", async () => {
    const { json } = await post("/analyze/fill-rate", {
      tables: fillDay,
      view: { view: "deep", time: "93100000", ticker: A }
    });
    const body = AnalysisBody.parse(json);
    assert.strictEqual(body.summary, `time=93100000, ticker=${A}: 1 trades | Net fill rate: 0.900`);
  });

  it("rejects an unknown view", async () => {
    const { status, json } = await post("/analyze/fill-rate", { tables: fillDay, view: { view: "sideways" } });
    assert.strictEqual(status, 400);
    assert.strictEqual(ErrorBody.parse(json).error, "Invalid view");
  });
});

describe("resolveDataDir", () => {
  const root = join("/srv", "signals");

  it("uses the configured directory when none is requested", () => {
    assert.strictEqual(resolveDataDir(undefined, root), root);
  });

  it("resolves a requested directory inside the configured one", () => {
    assert.strictEqual(resolveDataDir("2024-06-03", root), join(root, "2024-06-03"));
  });

  it("refuses a directory outside the configured one", () => {
    const escape = /dataDir must be inside the configured data directory/;
    assert.throws(() => resolveDataDir("../secrets", root), escape);
    assert.throws(() => resolveDataDir("/etc", root), escape);
  });
});
