import { ProbeFailure, errorMessage } from "../errors.js";
import { logger } from "../logger.js";
import type { PipelineCheck, ProbeResult } from "../types.js";
import { fileExists, resolvePathTemplate } from "./files.js";
import { sheetLastModified } from "./sheet.js";
import type { Warehouse } from "./warehouse.js";

const MS_PER_HOUR = 3_600_000;

export interface ProbeSources {
  /** Null when no database is configured; table probes then fail. */
  warehouse: Pick<Warehouse, "tableActivity" | "countRows"> | null;
  sheetTimeoutMs?: number;
}

/** Measures one check. Never rejects: errors come back as `failure` results. */
export type Probe = (check: PipelineCheck, now: Date) => Promise<ProbeResult>;

export function createProbe(sources: ProbeSources): Probe {
  return async (check, now) => {
    try {
      return await measure(check, sources, now);
    } catch (err: unknown) {
      const log = logger.child({ module: "probes", pipeline: check.name });
      const message = errorMessage(err);
      log.warn({ err: message }, "probe failed");
      return { kind: "failure", error: message, measuredAt: now };
    }
  };
}

async function measure(check: PipelineCheck, sources: ProbeSources, now: Date): Promise<ProbeResult> {
  const spec = check.probe;
  switch (spec.source) {
    case "table": {
      const activity = await requireWarehouse(check, sources).tableActivity(spec);
      return {
        kind: "age",
        ageHours: hoursBetween(activity.lastRecord, now),
        lastUpdatedAt: activity.lastRecord,
        recordsToday: activity.recordsToday,
        measuredAt: now,
      };
    }

    case "sheet": {
      const modified = await sheetLastModified(spec.url, sources.sheetTimeoutMs);
      return {
        kind: "age",
        ageHours: hoursBetween(modified, now),
        lastUpdatedAt: modified,
        measuredAt: now,
      };
    }

    case "rows": {
      const count = await requireWarehouse(check, sources).countRows(spec);
      return { kind: "count", count, measuredAt: now };
    }

    case "file": {
      const filePath = resolvePathTemplate(spec.pathTemplate, now);
      return { kind: "presence", exists: await fileExists(filePath), path: filePath, measuredAt: now };
    }
  }
}

function requireWarehouse(check: PipelineCheck, sources: ProbeSources): NonNullable<ProbeSources["warehouse"]> {
  if (!sources.warehouse) {
    throw new ProbeFailure(check.name, "no database configured");
  }
  return sources.warehouse;
}

function hoursBetween(from: Date | null, to: Date): number | null {
  if (from === null) return null;
  return Math.max(0, (to.getTime() - from.getTime()) / MS_PER_HOUR);
}
