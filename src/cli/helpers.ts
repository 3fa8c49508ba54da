/**
 * Shared CLI helpers: runtime wiring from config, argument parsers, exit codes.
 */

import { InvalidArgumentError } from "commander";
import {
  buildPipelineChecks,
  getCheckin,
  loadConfig,
  selectChecks,
  type ConfigFile,
} from "../config.js";
import { ConfigurationError } from "../errors.js";
import { sendChatCard } from "../notifications/google-chat.js";
import { createEmailNotifier } from "../notifications/email.js";
import { createProbe } from "../probes/index.js";
import { Warehouse } from "../probes/warehouse.js";
import type { CheckinRun, RunnerDeps } from "../runner.js";
import { fileEscalationStore } from "../state-manager.js";
import { CHECKIN_NAMES, type CheckinName, type PipelineCheck } from "../types.js";

/** Exit code for configuration errors. */
export const EXIT_CONFIG_ERROR = 2;
/** Exit code for anything unexpected. */
export const EXIT_UNEXPECTED = 3;

export interface Runtime {
  config: ConfigFile;
  checks: PipelineCheck[];
  deps: RunnerDeps;
  close(): Promise<void>;
}

/** Load config from the global --config option. */
export function loadConfigFromOpts(configPath?: string): ConfigFile {
  return loadConfig(configPath);
}

/** Wire probes, notifiers and the state store from a validated config. */
export function createRuntime(config: ConfigFile): Runtime {
  const checks = buildPipelineChecks(config);
  const warehouse = config.database ? Warehouse.fromConfig(config.database) : null;
  const chat = config.alerts.google_chat;

  return {
    config,
    checks,
    deps: {
      probe: createProbe({ warehouse, sheetTimeoutMs: chat.timeout_ms }),
      sendChat: (card) =>
        sendChatCard({ enabled: chat.enabled, webhookUrl: chat.webhook_url, timeoutMs: chat.timeout_ms }, card),
      email: createEmailNotifier(config.alerts.email),
      store: fileEscalationStore(config.monitoring.state_file),
      followUpAfterMs: config.monitoring.follow_up_after_minutes * 60_000,
      dashboardUrl: config.dashboard.public_url,
      concurrency: config.database?.pool_size,
    },
    close: async () => {
      await warehouse?.close();
    },
  };
}

export function buildCheckinRun(config: ConfigFile, checks: readonly PipelineCheck[], mode: CheckinName): CheckinRun {
  const checkin = getCheckin(config, mode);
  return {
    mode,
    title: checkin.title,
    description: checkin.description,
    checks: selectChecks(checks, checkin.pipelines),
  };
}

export function parseCheckinName(value: string): CheckinName {
  const name = CHECKIN_NAMES.find((n) => n === value);
  if (!name) {
    throw new InvalidArgumentError(`Check-in must be one of: ${CHECKIN_NAMES.join(", ")}.`);
  }
  return name;
}

/** Parse and validate a TCP port (0 picks a free one). */
export function parsePort(value: string): number {
  const num = parseInt(value, 10);
  if (isNaN(num) || num < 0 || num > 65535 || String(num) !== value.trim()) {
    throw new InvalidArgumentError("Port must be an integer between 0 and 65535.");
  }
  return num;
}

export function parsePositiveInt(value: string): number {
  const num = parseInt(value, 10);
  if (isNaN(num) || num < 1 || String(num) !== value.trim()) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return num;
}

export function exitCodeForError(err: unknown): number {
  return err instanceof ConfigurationError ? EXIT_CONFIG_ERROR : EXIT_UNEXPECTED;
}
