// Shared type definitions for the pipeline monitor

// --- Status ---

export type Status = "OK" | "WARNING" | "CRITICAL" | "PENDING";

/** Scheduled check-in points evaluated as one batch each. */
export type CheckinName = "morning" | "first_shift" | "second_shift";

export const CHECKIN_NAMES: readonly CheckinName[] = ["morning", "first_shift", "second_shift"];

/** Local wall-clock time, minute precision. */
export interface TimeOfDay {
  hour: number;
  minute: number;
}

// --- Pipeline checks ---

export type ThresholdRule =
  | { type: "freshness"; warningHours: number; criticalHours: number }
  | { type: "count"; minimum: number }
  | { type: "file"; deadline: TimeOfDay };

export type ProbeSpec =
  | { source: "table"; table: string; dateColumn: string; where?: string }
  | { source: "sheet"; url: string }
  | { source: "rows"; table: string; dateColumn?: string; distinctColumn?: string; where?: string }
  | { source: "file"; pathTemplate: string };

/** A monitored unit, built once from configuration. */
export interface PipelineCheck {
  readonly name: string;
  readonly description: string;
  /** Before this time of day the check reports PENDING. */
  readonly expectedAfter: TimeOfDay | null;
  readonly rule: ThresholdRule;
  readonly probe: ProbeSpec;
}

// --- Probe results ---

export type ProbeResult =
  | {
      kind: "age";
      /** Hours since the newest record, or null when nothing was found. */
      ageHours: number | null;
      lastUpdatedAt: Date | null;
      recordsToday?: number;
      measuredAt: Date;
    }
  | { kind: "count"; count: number; measuredAt: Date }
  | { kind: "presence"; exists: boolean; path: string; measuredAt: Date }
  | { kind: "failure"; error: string; measuredAt: Date };

export interface StatusRecord {
  pipeline: string;
  status: Status;
  detail: string;
  evaluatedAt: Date;
}

// --- Escalation ---

export type NotificationChannel = "chat" | "email";

export type PlanReason = "none" | "critical" | "follow_up" | "recovered" | "warning" | "retry";

export interface NotificationPlan {
  pipeline: string;
  channels: NotificationChannel[];
  reason: PlanReason;
  /** Extra line shown next to the pipeline in the chat card. */
  note?: string;
}

export interface PipelineEscalation {
  lastStatus: Status;
  /** ISO timestamp of the last status change. */
  changedAt: string;
  /** ISO timestamp of the first CRITICAL of the open episode. */
  criticalSince: string | null;
  followUpSent: boolean;
  /** Channels that failed on a previous run and are retried on the next one. */
  undelivered: NotificationChannel[];
  /** ISO timestamp of the evaluation that last wrote this entry. */
  updatedAt: string;
}

export type EscalationState = Record<string, PipelineEscalation>;
