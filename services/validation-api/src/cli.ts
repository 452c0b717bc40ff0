/**
 * signal-audit CLI
 *
 *   signal-audit <dir>                               run every checker
 *   signal-audit <dir> --fill-rate overview
 *   signal-audit <dir> --fill-rate by-time --time 93100000
 *   signal-audit <dir> --fill-rate by-ticker --ticker 000001.SZE
 *   signal-audit <dir> --fill-rate deep --time 93100000 --ticker 000001.SZE
 */

import { Command, InvalidArgumentError } from "commander";
import {
  loadConfig,
  normalizeTime,
  summarizeTables,
  DataContractError,
  type AuditConfig
} from "@signal-audit/common";
import {
  createCheckers,
  runChecks,
  exitCodeFor,
  formatRun,
  formatAnalysis,
  FillRateEngine,
  type FillRateRequest
} from "@signal-audit/rules";
import { DirectorySignalSource } from "./datasources/index.js";
import { withOverrides } from "./app.js";

const VIEWS = ["overview", "by-time", "by-ticker", "deep"] as const;
type ViewName = (typeof VIEWS)[number];

interface CliOptions {
  fillRate?: ViewName;
  time?: number;
  ticker?: string;
  tolerance?: number;
  lotSize?: number;
}

function parseView(value: string): ViewName {
  const view = VIEWS.find(v => v === value);
  if (!view) throw new InvalidArgumentError(`expected one of ${VIEWS.join(", ")}`);
  return view;
}

function parseNumber(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n)) throw new InvalidArgumentError("expected a number");
  return n;
}

function toFillRateRequest(options: CliOptions): FillRateRequest {
  const view = options.fillRate ?? "overview";
  const needTime = (): number => {
    if (options.time === undefined) throw new InvalidArgumentError(`--time is required for the ${view} view`);
    return options.time;
  };
  const needTicker = (): string => {
    if (!options.ticker) throw new InvalidArgumentError(`--ticker is required for the ${view} view`);
    return options.ticker;
  };

  switch (view) {
    case "overview":
      return { view };
    case "by-time":
      return { view, time: needTime() };
    case "by-ticker":
      return { view, ticker: needTicker() };
    case "deep":
      return { view, time: needTime(), ticker: needTicker() };
  }
}

async function main(dir: string, options: CliOptions): Promise<number> {
  const base = loadConfig();
  const audit: AuditConfig = withOverrides(base.audit, {
    tolerance: options.tolerance,
    lotSize: options.lotSize
  });

  console.log(`Loading data from: ${dir}`);
  const tables = await new DirectorySignalSource(dir).load();

  const summary = summarizeTables(tables);
  console.log("Data Summary:");
  for (const [table, s] of Object.entries(summary)) {
    console.log(`  ${table}: ${s.records} records, ${s.timeBuckets} time events, ${s.tickers} tickers`);
  }

  if (options.fillRate) {
    const engine = new FillRateEngine({ tolerance: audit.tolerance });
    console.log(formatAnalysis(engine.analyze(tables, toFillRateRequest(options))));
    return 0;
  }

  const run = runChecks(tables, createCheckers(audit));
  console.log(formatRun(run));
  return exitCodeFor(run);
}

const program = new Command()
  .name("signal-audit")
  .description("Validate a trading-signal distribution pipeline and measure fill rates")
  .argument("<dir>", "directory containing the pipe-delimited event files")
  .option("--fill-rate <view>", "run a fill-rate view instead of the checkers", parseView)
  .option("--time <time>", "time bucket (arrival time) for by-time and deep views", normalizeTime)
  .option("--ticker <ticker>", "ticker for by-ticker and deep views")
  .option("--tolerance <n>", "absolute tolerance for numeric comparisons", parseNumber)
  .option("--lot-size <n>", "lot size for the rounding check", parseNumber)
  .action(async (dir: string, options: CliOptions) => {
    try {
      process.exitCode = await main(dir, options);
    } catch (err) {
      if (err instanceof DataContractError || err instanceof InvalidArgumentError) {
        console.error(`Error: ${err.message}`);
      } else {
        console.error("Error:", err);
      }
      process.exitCode = 1;
    }
  });

await program.parseAsync(process.argv);
