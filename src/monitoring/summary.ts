import type { Status, StatusRecord } from "../types.js";

export type StatusCounts = Record<Status, number>;

export function countByStatus(records: readonly StatusRecord[]): StatusCounts {
  const counts: StatusCounts = { OK: 0, WARNING: 0, CRITICAL: 0, PENDING: 0 };
  for (const r of records) counts[r.status]++;
  return counts;
}

/** "2 OK | 1 Warning | 0 Critical | 0 Pending" */
export function formatCounts(counts: StatusCounts): string {
  return `${counts.OK} OK | ${counts.WARNING} Warning | ${counts.CRITICAL} Critical | ${counts.PENDING} Pending`;
}

const RULE = "=".repeat(80);

/** Fixed-width table of a batch, written to the log after each check. */
export function formatHealthTable(records: readonly StatusRecord[]): string {
  const lines = [
    RULE,
    "PIPELINE HEALTH SUMMARY",
    RULE,
    `${"Pipeline".padEnd(24)} ${"Status".padEnd(10)} Detail`,
    "-".repeat(80),
    ...records.map((r) => `${r.pipeline.padEnd(24)} ${r.status.padEnd(10)} ${r.detail}`),
    RULE,
  ];
  return lines.join("\n");
}
