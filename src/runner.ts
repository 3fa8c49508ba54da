import pLimit from "p-limit";
import { errorMessage } from "./errors.js";
import { logger as defaultLogger, type CheckContext } from "./logger.js";
import { trackBatch, hasChannel, recordDeliveryFailure } from "./monitoring/escalation.js";
import { evaluateAll } from "./monitoring/evaluator.js";
import { worstStatus } from "./monitoring/severity.js";
import { formatHealthTable } from "./monitoring/summary.js";
import { buildStatusCard, notesFromPlans, type ChatCard } from "./notifications/chat-card.js";
import { buildEmailMessage, type EmailMessage } from "./notifications/email.js";
import type { Probe } from "./probes/index.js";
import type { EscalationStore } from "./state-manager.js";
import type {
  CheckinName,
  EscalationState,
  NotificationChannel,
  NotificationPlan,
  PipelineCheck,
  ProbeResult,
  StatusRecord,
} from "./types.js";

export type RunMode = CheckinName | "quick_check" | "daily_summary";

/** 0: nothing critical, 1: at least one pipeline CRITICAL. */
export type ExitCode = 0 | 1;

export interface RunOutcome {
  mode: RunMode;
  records: StatusRecord[];
  plans: NotificationPlan[];
  exitCode: ExitCode;
}

/** Posts a card; resolves false when chat delivery is switched off. */
export type ChatSender = (card: ChatCard) => Promise<boolean>;

export interface EmailSender {
  send(message: EmailMessage): Promise<void>;
}

export interface RunnerDeps {
  probe: Probe;
  sendChat: ChatSender;
  /** Null when email is not configured. */
  email: EmailSender | null;
  store: EscalationStore;
  now?: () => Date;
  followUpAfterMs?: number;
  dashboardUrl?: string;
  /** Checks probed at once; keep at or below the warehouse pool size. */
  concurrency?: number;
}

export interface CheckinRun {
  mode: CheckinName;
  title: string;
  description: string;
  checks: readonly PipelineCheck[];
}

export interface DailySummaryRun {
  title: string;
  checks: readonly PipelineCheck[];
}

export const ALERT_TITLE = "🚨 Pipeline Alert";

export const DEFAULT_CONCURRENCY = 4;

/**
 * Probe and evaluate every check against the same `now`.
 * At most `concurrency` probes are in flight; one failing probe only affects its own record.
 */
export async function evaluatePipelines(
  checks: readonly PipelineCheck[],
  probe: Probe,
  now: Date,
  concurrency = DEFAULT_CONCURRENCY,
): Promise<StatusRecord[]> {
  const limit = pLimit(concurrency);
  const pairs = await Promise.all(
    checks.map((check) =>
      limit(async (): Promise<{ check: PipelineCheck; result: ProbeResult }> => {
        try {
          return { check, result: await probe(check, now) };
        } catch (err: unknown) {
          return { check, result: { kind: "failure", error: errorMessage(err), measuredAt: now } };
        }
      }),
    ),
  );
  return evaluateAll(pairs);
}

/** Scheduled check-in: the summary card is always posted, email follows the tracker. */
export async function runCheckin(run: CheckinRun, deps: RunnerDeps): Promise<RunOutcome> {
  return runTracked(run.mode, run.checks, deps, { title: run.title, description: run.description });
}

/** Continuous probe: chat and email only where the tracker asks for them. */
export async function runQuickCheck(checks: readonly PipelineCheck[], deps: RunnerDeps): Promise<RunOutcome> {
  return runTracked("quick_check", checks, deps, null);
}

/** End-of-day report of every pipeline. Does not read or advance the escalation state. */
export async function runDailySummary(run: DailySummaryRun, deps: RunnerDeps): Promise<RunOutcome> {
  const log = modeLogger({ mode: "daily_summary" });
  const now = deps.now?.() ?? new Date();
  const records = await evaluatePipelines(run.checks, deps.probe, now, deps.concurrency);
  log.info(`\n${formatHealthTable(records)}`);

  const card = buildStatusCard({
    title: run.title,
    description: "End of day report",
    records,
    dashboardUrl: deps.dashboardUrl,
    generatedAt: now,
  });
  await deliverChat(deps, card).catch((err: unknown) => {
    log.error({ error: errorMessage(err) }, "daily summary card not delivered");
  });

  if (deps.email) {
    const message = buildEmailMessage({ title: run.title, records, dashboardUrl: deps.dashboardUrl, generatedAt: now });
    await deps.email.send(message).catch((err: unknown) => {
      log.error({ error: errorMessage(err) }, "daily summary email not delivered");
    });
  }

  return { mode: "daily_summary", records, plans: [], exitCode: exitCodeFor(records) };
}

// --- Internals ---

interface Report {
  title: string;
  description: string;
}

async function runTracked(
  mode: RunMode,
  checks: readonly PipelineCheck[],
  deps: RunnerDeps,
  report: Report | null,
): Promise<RunOutcome> {
  const log = modeLogger({ mode });
  const now = deps.now?.() ?? new Date();

  const records = await evaluatePipelines(checks, deps.probe, now, deps.concurrency);
  log.info(`\n${formatHealthTable(records)}`);

  const tracked = trackBatch(deps.store.load(), records, { followUpAfterMs: deps.followUpAfterMs });
  let state: EscalationState = tracked.state;
  const { plans } = tracked;
  const notes = notesFromPlans(plans);

  const planned = (channel: NotificationChannel): Set<string> =>
    new Set(plans.filter((p) => hasChannel(p, channel)).map((p) => p.pipeline));
  const chatPipelines = planned("chat");
  const emailPipelines = planned("email");

  for (const plan of plans) {
    if (plan.reason !== "none") {
      log.info({ pipeline: plan.pipeline, reason: plan.reason, channels: plan.channels }, "notification planned");
    }
  }

  const cardRecords = report ? records : records.filter((r) => chatPipelines.has(r.pipeline));
  if (cardRecords.length > 0) {
    const card = buildStatusCard({
      title: report?.title ?? ALERT_TITLE,
      description: report?.description,
      records: cardRecords,
      notes,
      dashboardUrl: deps.dashboardUrl,
      generatedAt: now,
    });
    try {
      await deliverChat(deps, card);
    } catch (err: unknown) {
      log.error({ error: errorMessage(err) }, "chat card not delivered, will retry on next run");
      state = markUndelivered(state, chatPipelines, "chat");
    }
  }

  const emailRecords = records.filter((r) => emailPipelines.has(r.pipeline));
  if (emailRecords.length > 0 && deps.email) {
    const message = buildEmailMessage({
      title: report?.title ?? ALERT_TITLE,
      records: emailRecords,
      notes,
      dashboardUrl: deps.dashboardUrl,
      generatedAt: now,
    });
    try {
      await deps.email.send(message);
    } catch (err: unknown) {
      log.error({ error: errorMessage(err) }, "email not delivered, will retry on next run");
      state = markUndelivered(state, emailPipelines, "email");
    }
  }

  deps.store.save(state);
  const exitCode = exitCodeFor(records);
  log.info({ overall: worstStatus(records), exitCode }, "run complete");
  return { mode, records, plans, exitCode };
}

async function deliverChat(deps: RunnerDeps, card: ChatCard): Promise<void> {
  const sent = await deps.sendChat(card);
  if (!sent) defaultLogger.debug("chat delivery disabled, card skipped");
}

function markUndelivered(
  state: EscalationState,
  pipelines: ReadonlySet<string>,
  channel: NotificationChannel,
): EscalationState {
  let next = state;
  for (const pipeline of pipelines) {
    next = recordDeliveryFailure(next, pipeline, [channel]);
  }
  return next;
}

function exitCodeFor(records: readonly StatusRecord[]): ExitCode {
  return records.some((r) => r.status === "CRITICAL") ? 1 : 0;
}

function modeLogger(context: CheckContext) {
  return defaultLogger.child(context);
}
