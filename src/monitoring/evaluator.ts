import type { PipelineCheck, ProbeResult, Status, StatusRecord } from "../types.js";
import { formatTimeOfDay, isBeforeTimeOfDay } from "./clock.js";

export const PROBE_FAILURE_DETAIL = "probe failure";
export const NO_DATA_DETAIL = "no data found in last 7 days";

/**
 * Combine a probe's measurement with the check's threshold rule.
 *
 * Pure: the status depends only on `check` and `result` (time of day is read
 * from `result.measuredAt`). Never throws: a failed probe is a CRITICAL record.
 */
export function evaluate(check: PipelineCheck, result: ProbeResult): StatusRecord {
  const at = result.measuredAt;
  const record = (status: Status, detail: string): StatusRecord => ({
    pipeline: check.name,
    status,
    detail,
    evaluatedAt: at,
  });

  if (check.expectedAfter && isBeforeTimeOfDay(at, check.expectedAfter)) {
    return record("PENDING", `not expected before ${formatTimeOfDay(check.expectedAfter)}`);
  }

  if (result.kind === "failure") {
    return record("CRITICAL", PROBE_FAILURE_DETAIL);
  }

  const rule = check.rule;
  switch (rule.type) {
    case "freshness": {
      if (result.kind !== "age") return record("CRITICAL", mismatch(result.kind, rule.type));
      if (result.ageHours === null) return record("CRITICAL", NO_DATA_DETAIL);

      const detail = describeAge(result.ageHours, result.recordsToday);
      if (result.ageHours > rule.criticalHours) return record("CRITICAL", detail);
      if (result.ageHours > rule.warningHours) return record("WARNING", detail);
      return record("OK", detail);
    }

    case "count": {
      if (result.kind !== "count") return record("CRITICAL", mismatch(result.kind, rule.type));
      // No warning band for counts: below the minimum is critical, anything else is fine.
      if (result.count < rule.minimum) {
        return record("CRITICAL", `count ${result.count} below minimum ${rule.minimum}`);
      }
      return record("OK", `count ${result.count} (minimum ${rule.minimum})`);
    }

    case "file": {
      if (result.kind !== "presence") return record("CRITICAL", mismatch(result.kind, rule.type));
      if (result.exists) return record("OK", "file present");

      const due = formatTimeOfDay(rule.deadline);
      return isBeforeTimeOfDay(at, rule.deadline)
        ? record("PENDING", `awaiting file (due ${due})`)
        : record("CRITICAL", `file missing (due ${due})`);
    }
  }
}

/** Evaluate a batch; one record per check, in order. */
export function evaluateAll(
  pairs: readonly { check: PipelineCheck; result: ProbeResult }[],
): StatusRecord[] {
  return pairs.map(({ check, result }) => evaluate(check, result));
}

function describeAge(ageHours: number, recordsToday: number | undefined): string {
  const age = `${Math.floor(ageHours)}h since update`;
  return recordsToday === undefined ? age : `${age}, ${recordsToday} records today`;
}

function mismatch(kind: ProbeResult["kind"], rule: string): string {
  return `unexpected ${kind} result for ${rule} check`;
}
