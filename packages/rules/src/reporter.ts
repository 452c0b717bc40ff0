/**
 * Plain-text rendering of check runs and analyses.
 */

import type { AnalysisResult } from "@signal-audit/common";
import type { CheckRun } from "./orchestrator.js";

const RULE = "=".repeat(60);

export function formatRun(run: CheckRun): string {
  const lines: string[] = [
    RULE,
    "SIGNAL PIPELINE AUDIT RESULTS",
    RULE,
    `Run: ${run.runId}`,
    `Total Checks: ${run.total}`,
    `Passed: ${run.passed}`,
    `Failed: ${run.failed}`,
    `Warnings: ${run.warned}`,
    `Errors: ${run.errored}`,
    ""
  ];

  for (const result of run.results) {
    lines.push(`[${result.status}] ${result.checkerName}`);
    lines.push(`    ${result.message}`);
    if (result.details) {
      lines.push("    Details:");
      for (const line of result.details.split("\n")) {
        if (line.trim()) lines.push(`      ${line}`);
      }
    }
    lines.push("");
  }

  const critical = run.failed + run.errored;
  if (critical > 0) {
    lines.push(`ANALYSIS FAILED - ${critical} critical issues`);
  } else if (run.warned > 0) {
    lines.push(`ANALYSIS COMPLETED WITH WARNINGS - ${run.warned} warnings`);
  } else {
    lines.push("ALL CHECKS PASSED");
  }
  lines.push(run.summary);

  return lines.join("\n");
}

export function formatAnalysis(result: AnalysisResult): string {
  const lines = [`[${result.analyzerName}]`, `    ${result.summary}`];
  if (result.details) {
    for (const line of result.details.split("\n")) {
      if (line.trim()) lines.push(`    ${line}`);
    }
  }
  if (result.plotPath) lines.push(`    Plot: ${result.plotPath}`);
  return lines.join("\n");
}
