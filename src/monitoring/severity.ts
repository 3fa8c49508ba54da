import type { Status, StatusRecord } from "../types.js";

/**
 * Total order used to pick the worst status of a batch. PENDING is neutral:
 * it only wins when nothing else was evaluated.
 */
export const STATUS_RANK: Record<Status, number> = {
  PENDING: 0,
  OK: 1,
  WARNING: 2,
  CRITICAL: 3,
};

export const STATUS_COLORS: Record<Status, string> = {
  OK: "#34A853",
  WARNING: "#FBBC04",
  CRITICAL: "#EA4335",
  PENDING: "#9AA0A6",
};

export const STATUS_EMOJI: Record<Status, string> = {
  OK: "✅",
  WARNING: "⚠️",
  CRITICAL: "🔴",
  PENDING: "⏳",
};

export function compareStatus(a: Status, b: Status): number {
  return STATUS_RANK[a] - STATUS_RANK[b];
}

/** Worst status among the records; PENDING for an empty batch. */
export function worstStatus(records: readonly Pick<StatusRecord, "status">[]): Status {
  let worst: Status = "PENDING";
  for (const r of records) {
    if (compareStatus(r.status, worst) > 0) worst = r.status;
  }
  return worst;
}
