import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import {
  fileEscalationStore,
  loadEscalationState,
  mergeStates,
  saveEscalationState,
  STATE_VERSION,
} from "../src/state-manager.js";
import type { EscalationState, PipelineEscalation } from "../src/types.js";

vi.mock("../src/logger.js", () => ({
  logger: {
    child: () => ({ warn: vi.fn(), info: vi.fn(), error: vi.fn(), debug: vi.fn() }),
  },
}));

function entry(updatedAt: string, overrides: Partial<PipelineEscalation> = {}): PipelineEscalation {
  return {
    lastStatus: "CRITICAL",
    changedAt: updatedAt,
    criticalSince: updatedAt,
    followUpSent: false,
    undelivered: [],
    updatedAt,
    ...overrides,
  };
}

describe("state-manager", () => {
  let tmpDir: string;
  let statePath: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "state-test-"));
    statePath = path.join(tmpDir, "var", "escalation-state.json");
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("loads an empty state when the file does not exist", () => {
    expect(loadEscalationState(statePath)).toEqual({});
  });

  it("round-trips a saved state", () => {
    const state: EscalationState = { FactCalls: entry("2026-03-10T08:00:00.000Z") };
    saveEscalationState(state, statePath);
    expect(loadEscalationState(statePath)).toEqual(state);
  });

  it("writes the version and leaves no temp file behind", () => {
    saveEscalationState({ FactCalls: entry("2026-03-10T08:00:00.000Z") }, statePath);
    const raw = JSON.parse(fs.readFileSync(statePath, "utf-8")) as { version: string };
    expect(raw.version).toBe(STATE_VERSION);
    expect(fs.readdirSync(path.dirname(statePath))).toEqual(["escalation-state.json"]);
  });

  it("starts fresh on corrupt JSON", () => {
    fs.mkdirSync(path.dirname(statePath), { recursive: true });
    fs.writeFileSync(statePath, "{not json", "utf-8");
    expect(loadEscalationState(statePath)).toEqual({});
  });

  it("starts fresh when validation fails", () => {
    fs.mkdirSync(path.dirname(statePath), { recursive: true });
    fs.writeFileSync(statePath, JSON.stringify({ version: "1", pipelines: { A: { lastStatus: "BROKEN" } } }), "utf-8");
    expect(loadEscalationState(statePath)).toEqual({});
  });

  it("throws on an incompatible version", () => {
    fs.mkdirSync(path.dirname(statePath), { recursive: true });
    fs.writeFileSync(statePath, JSON.stringify({ version: "99", pipelines: {} }), "utf-8");
    expect(() => loadEscalationState(statePath)).toThrow("Incompatible escalation state version");
  });

  it("keeps entries written by another run for other pipelines", () => {
    saveEscalationState({ A: entry("2026-03-10T08:00:00.000Z") }, statePath);
    saveEscalationState({ B: entry("2026-03-10T08:05:00.000Z") }, statePath);
    expect(Object.keys(loadEscalationState(statePath)).sort()).toEqual(["A", "B"]);
  });

  it("does not overwrite a newer entry with an older one", () => {
    const newer = entry("2026-03-10T08:10:00.000Z", { lastStatus: "OK", criticalSince: null });
    saveEscalationState({ A: newer }, statePath);
    saveEscalationState({ A: entry("2026-03-10T08:05:00.000Z") }, statePath);
    expect(loadEscalationState(statePath)["A"]).toEqual(newer);
  });
});

describe("mergeStates", () => {
  it("prefers the later updatedAt per pipeline", () => {
    const older = entry("2026-03-10T08:00:00.000Z");
    const later = entry("2026-03-10T09:00:00.000Z");
    expect(mergeStates({ A: later, B: older }, { A: older, B: later })).toEqual({ A: later, B: later });
  });
});

describe("fileEscalationStore", () => {
  it("loads what it saved", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "store-test-"));
    const store = fileEscalationStore(path.join(dir, "state.json"));
    const state: EscalationState = { A: entry("2026-03-10T08:00:00.000Z") };
    store.save(state);
    expect(store.load()).toEqual(state);
    fs.rmSync(dir, { recursive: true, force: true });
  });
});
