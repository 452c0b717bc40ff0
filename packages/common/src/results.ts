/**
 * Result contracts shared by the rule engine and its consumers.
 */

export type CheckStatus = "PASS" | "FAIL" | "WARN" | "ERROR";

export interface CheckResult {
  checkerName: string;
  status: CheckStatus;
  message: string;
  details?: string;
}

export interface AnalysisResult<TData = unknown> {
  analyzerName: string;
  summary: string;
  plotPath?: string;
  details?: string;
  data: TData;
}

export function isCritical(result: CheckResult): boolean {
  return result.status === "FAIL" || result.status === "ERROR";
}
