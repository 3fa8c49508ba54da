import * as fs from "node:fs";
import * as path from "node:path";
import { z } from "zod";
import { logger } from "./logger.js";
import type { EscalationState } from "./types.js";

export const STATE_VERSION = "1";

const IsoDate = z.string().refine((s) => !isNaN(new Date(s).getTime()), {
  message: "must be a valid ISO date string",
});

const PipelineEscalationSchema = z.object({
  lastStatus: z.enum(["OK", "WARNING", "CRITICAL", "PENDING"]),
  changedAt: IsoDate,
  criticalSince: IsoDate.nullable(),
  followUpSent: z.boolean(),
  undelivered: z.array(z.enum(["chat", "email"])).default([]),
  updatedAt: IsoDate,
});

const StateFileSchema = z.object({
  version: z.union([z.string(), z.number()]),
  pipelines: z.record(PipelineEscalationSchema),
});

/**
 * Read the escalation state. A missing file is an empty state; so is a file
 * that cannot be parsed or validated (logged). A file written by an
 * incompatible version is an error.
 */
export function loadEscalationState(filePath: string): EscalationState {
  const log = logger.child({ module: "state-manager" });
  if (!fs.existsSync(filePath)) return {};

  const raw = fs.readFileSync(filePath, "utf-8");
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err: unknown) {
    log.warn({ filePath, error: String(err) }, "Failed to parse state file JSON, starting fresh");
    return {};
  }

  const result = StateFileSchema.safeParse(json);
  if (!result.success) {
    log.warn({ filePath, issues: result.error.issues }, "State file failed validation, starting fresh");
    return {};
  }

  if (String(result.data.version) !== STATE_VERSION) {
    throw new Error(
      `Incompatible escalation state version: got '${result.data.version}', expected '${STATE_VERSION}'. Delete the state file and restart.`,
    );
  }
  return result.data.pipelines;
}

/**
 * Write the state atomically (temp file, fsync, rename).
 *
 * Runs can overlap (a quick check during a check-in), so the file is re-read
 * first and, per pipeline, the entry with the later `updatedAt` wins.
 */
export function saveEscalationState(state: EscalationState, filePath: string): EscalationState {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });

  const merged = mergeStates(loadEscalationState(filePath), state);
  const tmpPath = `${filePath}.${process.pid}.tmp`;
  const data = JSON.stringify({ version: STATE_VERSION, pipelines: merged }, null, 2);
  fs.writeFileSync(tmpPath, data, "utf-8");
  const fd = fs.openSync(tmpPath, "r");
  fs.fsyncSync(fd);
  fs.closeSync(fd);
  fs.renameSync(tmpPath, filePath);
  return merged;
}

export function mergeStates(onDisk: EscalationState, ours: EscalationState): EscalationState {
  const merged: EscalationState = { ...onDisk };
  for (const [pipeline, entry] of Object.entries(ours)) {
    const other = merged[pipeline];
    if (!other || Date.parse(entry.updatedAt) >= Date.parse(other.updatedAt)) {
      merged[pipeline] = entry;
    }
  }
  return merged;
}

/** Load/save pair the runner is handed, so tests can keep state in memory. */
export interface EscalationStore {
  load(): EscalationState;
  save(state: EscalationState): void;
}

export function fileEscalationStore(filePath: string): EscalationStore {
  return {
    load: () => loadEscalationState(filePath),
    save: (state) => {
      saveEscalationState(state, filePath);
    },
  };
}
