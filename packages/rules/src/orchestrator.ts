/**
 * Check run orchestration
 *
 * Runs every registered checker against the same read-only tables. A
 * checker that throws is reported as ERROR and its siblings still run;
 * the run always returns partial results.
 */

import {
  newRunId,
  type CheckResult,
  type SignalTables
} from "@signal-audit/common";
import type { Checker } from "./checker.js";

export interface CheckRun {
  runId: string;
  startedAt: string;
  results: CheckResult[];
  total: number;
  passed: number;
  failed: number;
  warned: number;
  errored: number;
  summary: string;
}

export interface RunOptions {
  runId?: string;
  /** Called after each checker, in registry order. */
  onResult?: (result: CheckResult) => void;
}

export function runChecker(checker: Checker, tables: SignalTables): CheckResult {
  try {
    return checker.check(tables);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`${checker.name} failed:`, err);
    return {
      checkerName: checker.name,
      status: "ERROR",
      message: `Checker failed: ${message}`
    };
  }
}

export function runChecks(
  tables: SignalTables,
  checkers: Checker[],
  options: RunOptions = {}
): CheckRun {
  const startedAt = new Date().toISOString();
  const results: CheckResult[] = [];

  for (const checker of checkers) {
    const result = runChecker(checker, tables);
    if (result.status === "WARN") console.warn(`${checker.name}: ${result.message}`);
    results.push(result);
    options.onResult?.(result);
  }

  const count = (status: CheckResult["status"]) => results.filter(r => r.status === status).length;
  const passed = count("PASS");

  return {
    runId: options.runId ?? newRunId(),
    startedAt,
    results,
    total: results.length,
    passed,
    failed: count("FAIL"),
    warned: count("WARN"),
    errored: count("ERROR"),
    summary: `${passed} of ${results.length} checkers passed`
  };
}

export function exitCodeFor(run: CheckRun): number {
  return run.failed + run.errored === 0 ? 0 : 1;
}
