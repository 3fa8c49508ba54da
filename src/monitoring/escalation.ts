import type {
  EscalationState,
  NotificationChannel,
  NotificationPlan,
  PipelineEscalation,
  PlanReason,
  StatusRecord,
} from "../types.js";

export const DEFAULT_FOLLOW_UP_AFTER_MS = 60 * 60 * 1000;

export interface EscalationOptions {
  /** How long a pipeline must stay CRITICAL before the single follow-up alert. */
  followUpAfterMs?: number;
}

export interface TrackResult {
  plan: NotificationPlan;
  state: EscalationState;
}

/**
 * Decide which notifiers fire for one status record.
 *
 * The state is passed in and a new state returned; the input is not mutated.
 * Escalation never changes the record's status.
 */
export function trackStatus(
  state: EscalationState,
  record: StatusRecord,
  options: EscalationOptions = {},
): TrackResult {
  const followUpAfterMs = options.followUpAfterMs ?? DEFAULT_FOLLOW_UP_AFTER_MS;
  const prev = state[record.pipeline];
  const at = record.evaluatedAt.toISOString();

  let criticalSince = prev?.criticalSince ?? null;
  let followUpSent = prev?.followUpSent ?? false;
  let channels: NotificationChannel[] = [];
  let reason: PlanReason = "none";
  let note: string | undefined;

  switch (record.status) {
    case "CRITICAL": {
      if (criticalSince === null) {
        channels = ["chat", "email"];
        reason = "critical";
        criticalSince = at;
        followUpSent = false;
        break;
      }
      const elapsedMs = record.evaluatedAt.getTime() - new Date(criticalSince).getTime();
      if (!followUpSent && elapsedMs >= followUpAfterMs) {
        channels = ["chat"];
        reason = "follow_up";
        note = `still critical after ${Math.floor(elapsedMs / 60_000)} minutes`;
        followUpSent = true;
      }
      break;
    }

    case "OK":
    case "WARNING": {
      if (criticalSince !== null) {
        channels = ["chat"];
        reason = "recovered";
        note = `recovered from critical (${record.status})`;
        criticalSince = null;
        followUpSent = false;
      } else if (record.status === "WARNING" && prev?.lastStatus !== "WARNING") {
        channels = ["chat"];
        reason = "warning";
      }
      break;
    }

    case "PENDING":
      // Neutral: nothing fires and an open episode stays open.
      break;
  }

  const retry = (prev?.undelivered ?? []).filter((c) => !channels.includes(c));
  if (retry.length > 0) {
    channels = [...channels, ...retry];
    if (reason === "none") reason = "retry";
  }

  const next: PipelineEscalation = {
    lastStatus: record.status,
    changedAt: prev && prev.lastStatus === record.status ? prev.changedAt : at,
    criticalSince,
    followUpSent,
    undelivered: [],
    updatedAt: at,
  };

  const plan: NotificationPlan = { pipeline: record.pipeline, channels, reason };
  if (note !== undefined) plan.note = note;

  return { plan, state: { ...state, [record.pipeline]: next } };
}

/** Apply {@link trackStatus} to every record of a batch, threading the state through. */
export function trackBatch(
  state: EscalationState,
  records: readonly StatusRecord[],
  options: EscalationOptions = {},
): { plans: NotificationPlan[]; state: EscalationState } {
  const plans: NotificationPlan[] = [];
  let current = state;
  for (const record of records) {
    const result = trackStatus(current, record, options);
    plans.push(result.plan);
    current = result.state;
  }
  return { plans, state: current };
}

/**
 * Remember channels that could not be delivered so the next scheduled run
 * retries them. The status/episode fields are left as already advanced.
 */
export function recordDeliveryFailure(
  state: EscalationState,
  pipeline: string,
  channels: readonly NotificationChannel[],
): EscalationState {
  const entry = state[pipeline];
  if (!entry || channels.length === 0) return state;
  const undelivered = [...entry.undelivered];
  for (const c of channels) {
    if (!undelivered.includes(c)) undelivered.push(c);
  }
  return { ...state, [pipeline]: { ...entry, undelivered } };
}

export function hasChannel(plan: NotificationPlan, channel: NotificationChannel): boolean {
  return plan.channels.includes(channel);
}
