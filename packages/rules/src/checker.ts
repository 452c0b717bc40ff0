/**
 * Checker contract and shared helpers.
 */

import type { CheckResult, CheckStatus, SignalTables } from "@signal-audit/common";

export interface Checker {
  readonly name: string;
  check(tables: SignalTables): CheckResult;
}

/** Detail rows shown per group before collapsing into "... and N more". */
export const DETAIL_ROWS_PER_GROUP = 5;

export function result(
  checkerName: string,
  status: CheckStatus,
  message: string,
  details?: string[]
): CheckResult {
  return details && details.length > 0
    ? { checkerName, status, message, details: details.join("\n") }
    : { checkerName, status, message };
}

/**
 * Append up to `limit` rendered rows, then an overflow line.
 */
export function appendCapped<T>(
  lines: string[],
  rows: T[],
  render: (row: T) => string,
  indent: string = "    ",
  limit: number = DETAIL_ROWS_PER_GROUP
): void {
  for (const row of rows.slice(0, limit)) {
    lines.push(`${indent}${render(row)}`);
  }
  if (rows.length > limit) {
    lines.push(`${indent}... and ${rows.length - limit} more`);
  }
}

export function groupBy<T, K>(rows: Iterable<T>, keyOf: (row: T) => K): Map<K, T[]> {
  const groups = new Map<K, T[]>();
  for (const row of rows) {
    const key = keyOf(row);
    const bucket = groups.get(key);
    if (bucket) bucket.push(row);
    else groups.set(key, [row]);
  }
  return groups;
}

export function fmt(value: number, digits: number = 0): string {
  return value.toFixed(digits);
}
