// Config loader: parse pipeline-monitor.config.yaml with Zod validation

import * as fs from "node:fs";
import * as path from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { ConfigurationError, errorMessage } from "./errors.js";
import { parseTimeOfDay } from "./monitoring/clock.js";
import type { CheckinName, PipelineCheck, ProbeSpec, ThresholdRule, TimeOfDay } from "./types.js";

export const DEFAULT_CONFIG_PATH = "pipeline-monitor.config.yaml";

// --- Zod Schemas ---

const TimeOfDaySchema = z
  .string()
  .refine((s) => parseTimeOfDay(s) !== null, { message: "must be a 24h time like 07:30" });

const DatabaseSchema = z.object({
  host: z.string().min(1),
  port: z.coerce.number().int().min(1).max(65535).default(3306),
  database: z.string().min(1),
  user: z.string().min(1),
  password: z.string().default(""),
  ssl: z.boolean().default(false),
  connect_timeout_ms: z.number().int().min(100).default(5000),
  query_timeout_ms: z.number().int().min(100).default(15000),
  /** Connections held at once; also the number of checks probed concurrently. */
  pool_size: z.number().int().min(1).max(20).default(4),
});

const GoogleChatSchema = z
  .object({
    enabled: z.boolean().default(false),
    webhook_url: z.string().default(""),
    timeout_ms: z.number().int().min(100).default(10000),
  })
  .refine((c) => !c.enabled || z.string().url().safeParse(c.webhook_url).success, {
    message: "webhook_url must be a URL when google_chat is enabled",
    path: ["webhook_url"],
  });

const EmailSchema = z
  .object({
    enabled: z.boolean().default(false),
    smtp_host: z.string().default(""),
    smtp_port: z.coerce.number().int().min(1).max(65535).default(587),
    /** true = implicit TLS (465); false = STARTTLS upgrade, required when require_tls is set. */
    secure: z.boolean().default(false),
    require_tls: z.boolean().default(true),
    user: z.string().default(""),
    password: z.string().default(""),
    from: z.string().default(""),
    recipients: z.array(z.string().email()).default([]),
    timeout_ms: z.number().int().min(100).default(15000),
  })
  .superRefine((c, ctx) => {
    if (!c.enabled) return;
    if (!c.smtp_host) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["smtp_host"], message: "required when email is enabled" });
    }
    if (!c.from) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["from"], message: "required when email is enabled" });
    }
    if (c.recipients.length === 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["recipients"], message: "at least one recipient is required" });
    }
  });

const AlertsSchema = z.object({
  google_chat: GoogleChatSchema.default({}),
  email: EmailSchema.default({}),
});

const DashboardSchema = z.object({
  host: z.string().min(1).default("0.0.0.0"),
  port: z.coerce.number().int().min(0).max(65535).default(5000),
  public_url: z.string().url().default("http://localhost:5000"),
  refresh_seconds: z.number().int().min(5).default(60),
  title: z.string().default("Pipeline Monitor"),
});

const MonitoringSchema = z.object({
  state_file: z.string().min(1).default("var/escalation-state.json"),
  /** `{date}` expands to YYYYMMDD. */
  log_file: z.string().optional(),
  follow_up_after_minutes: z.number().int().min(1).default(60),
});

const ThresholdsSchema = z.object({
  stale_hours: z.number().positive().default(24),
  warning_hours: z.number().positive().default(12),
  min_daily_calls: z.number().int().min(0).default(1000),
  expected_operator_count: z.number().int().min(0).default(237),
});

const NamedThresholdSchema = z.enum(["min_daily_calls", "expected_operator_count"]);

const PipelineBase = {
  name: z.string().min(1),
  description: z.string().default(""),
  expected_after: TimeOfDaySchema.optional(),
};

const FreshnessPipelineSchema = z.object({
  ...PipelineBase,
  type: z.literal("freshness"),
  table: z.string().min(1),
  date_column: z.string().min(1),
  where: z.string().optional(),
  warning_hours: z.number().positive().optional(),
  critical_hours: z.number().positive().optional(),
});

const SheetPipelineSchema = z.object({
  ...PipelineBase,
  type: z.literal("sheet"),
  url: z.string().url(),
  warning_hours: z.number().positive().optional(),
  critical_hours: z.number().positive().optional(),
});

const CountPipelineSchema = z.object({
  ...PipelineBase,
  type: z.literal("count"),
  table: z.string().min(1),
  /** When set, only rows dated today are counted. */
  date_column: z.string().min(1).optional(),
  distinct_column: z.string().min(1).optional(),
  where: z.string().optional(),
  minimum: z.union([z.number().int().min(0), NamedThresholdSchema]).default("min_daily_calls"),
});

const FilePipelineSchema = z.object({
  ...PipelineBase,
  type: z.literal("file"),
  /** `{yyyy}`, `{mm}`, `{dd}` expand to the check date. */
  path: z.string().min(1),
  deadline: TimeOfDaySchema,
});

const PipelineSchema = z.discriminatedUnion("type", [
  FreshnessPipelineSchema,
  SheetPipelineSchema,
  CountPipelineSchema,
  FilePipelineSchema,
]);

const CheckinSchema = z.object({
  title: z.string().min(1),
  time: TimeOfDaySchema,
  description: z.string().default(""),
  pipelines: z.array(z.string().min(1)).min(1),
});

const QuickCheckSchema = z.object({
  interval_minutes: z.number().int().min(1).max(59).default(5),
  /** Defaults to every configured pipeline. */
  pipelines: z.array(z.string().min(1)).optional(),
});

const DailySummarySchema = z.object({
  time: TimeOfDaySchema.default("17:00"),
  title: z.string().default("📊 Daily Pipeline Summary"),
  pipelines: z.array(z.string().min(1)).optional(),
});

export const ConfigFileSchema = z
  .object({
    database: DatabaseSchema.optional(),
    alerts: AlertsSchema.default({}),
    dashboard: DashboardSchema.default({}),
    monitoring: MonitoringSchema.default({}),
    thresholds: ThresholdsSchema.default({}),
    pipelines: z.array(PipelineSchema).min(1),
    checkins: z
      .object({
        morning: CheckinSchema.optional(),
        first_shift: CheckinSchema.optional(),
        second_shift: CheckinSchema.optional(),
      })
      .default({}),
    quick_check: QuickCheckSchema.default({}),
    daily_summary: DailySummarySchema.default({}),
  })
  .superRefine((cfg, ctx) => {
    const names = new Set<string>();
    cfg.pipelines.forEach((p, i) => {
      if (names.has(p.name)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["pipelines", i, "name"], message: `duplicate pipeline name "${p.name}"` });
      }
      names.add(p.name);
      if (p.type !== "count" && p.type !== "file" && p.warning_hours !== undefined && p.critical_hours !== undefined && p.warning_hours > p.critical_hours) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["pipelines", i, "warning_hours"], message: "warning_hours must not exceed critical_hours" });
      }
    });

    const checkRefs = (refs: string[] | undefined, at: (string | number)[]): void => {
      refs?.forEach((ref, i) => {
        if (!names.has(ref)) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, path: [...at, i], message: `unknown pipeline "${ref}"` });
        }
      });
    };
    for (const [name, checkin] of Object.entries(cfg.checkins)) {
      checkRefs(checkin?.pipelines, ["checkins", name, "pipelines"]);
    }
    checkRefs(cfg.quick_check.pipelines, ["quick_check", "pipelines"]);
    checkRefs(cfg.daily_summary.pipelines, ["daily_summary", "pipelines"]);
  });

export type ConfigFile = z.infer<typeof ConfigFileSchema>;
export type PipelineConfig = z.infer<typeof PipelineSchema>;
export type CheckinConfig = z.infer<typeof CheckinSchema>;
export type DatabaseConfig = z.infer<typeof DatabaseSchema>;
export type GoogleChatConfig = z.infer<typeof GoogleChatSchema>;
export type EmailConfig = z.infer<typeof EmailSchema>;
export type ThresholdsConfig = z.infer<typeof ThresholdsSchema>;

// --- Environment variable substitution ---

/** Replace `${VAR}` placeholders with values from process.env */
export function substituteEnvVars(text: string): string {
  return text.replace(/\$\{([^}]+)\}/g, (_match, varName: string) => {
    const value = process.env[varName];
    if (value === undefined) {
      return "";
    }
    return value;
  });
}

/**
 * Substitute `${VAR}` in every string scalar of a parsed document.
 * Runs after YAML parsing so a value is never re-read as YAML.
 */
export function substituteEnvVarsDeep(value: unknown): unknown {
  if (typeof value === "string") return substituteEnvVars(value);
  if (Array.isArray(value)) return value.map((item) => substituteEnvVarsDeep(item));
  if (value !== null && typeof value === "object") {
    return Object.fromEntries(Object.entries(value).map(([key, item]) => [key, substituteEnvVarsDeep(item)]));
  }
  return value;
}

// --- Loader ---

/**
 * Load and validate pipeline-monitor.config.yaml.
 * @param configPath – absolute or relative path to YAML config file.
 *   Defaults to `pipeline-monitor.config.yaml` in the current working directory.
 * @throws {ConfigurationError} when the file is missing, unparsable or invalid.
 */
export function loadConfig(configPath?: string): ConfigFile {
  const resolvedPath = path.resolve(configPath ?? DEFAULT_CONFIG_PATH);

  if (!fs.existsSync(resolvedPath)) {
    throw new ConfigurationError(`Config file not found: ${resolvedPath}`);
  }

  const raw = fs.readFileSync(resolvedPath, "utf-8");

  let parsed: unknown;
  try {
    parsed = parseYaml(raw, { customTags: [] });
  } catch (err: unknown) {
    throw new ConfigurationError(`Invalid YAML in ${resolvedPath}: ${errorMessage(err)}`, { cause: err });
  }

  const result = ConfigFileSchema.safeParse(substituteEnvVarsDeep(parsed));
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid config ${resolvedPath}: ${issues}`, { cause: result.error });
  }
  return result.data;
}

// --- Pipeline checks ---

function requireTime(value: string): TimeOfDay {
  const t = parseTimeOfDay(value);
  if (!t) throw new ConfigurationError(`Invalid time of day "${value}"`);
  return t;
}

function freshnessRule(
  p: { warning_hours?: number; critical_hours?: number },
  thresholds: ThresholdsConfig,
): ThresholdRule {
  if (p.critical_hours !== undefined) {
    return {
      type: "freshness",
      criticalHours: p.critical_hours,
      warningHours: p.warning_hours ?? p.critical_hours / 2,
    };
  }
  return {
    type: "freshness",
    criticalHours: thresholds.stale_hours,
    warningHours: p.warning_hours ?? thresholds.warning_hours,
  };
}

/** Turn one pipeline entry into an immutable check. */
export function buildPipelineCheck(p: PipelineConfig, thresholds: ThresholdsConfig): PipelineCheck {
  const make = (rule: ThresholdRule, probe: ProbeSpec): PipelineCheck =>
    Object.freeze({
      name: p.name,
      description: p.description,
      expectedAfter: p.expected_after ? requireTime(p.expected_after) : null,
      rule,
      probe,
    });

  switch (p.type) {
    case "freshness":
      return make(freshnessRule(p, thresholds), {
        source: "table",
        table: p.table,
        dateColumn: p.date_column,
        where: p.where,
      });
    case "sheet":
      return make(freshnessRule(p, thresholds), { source: "sheet", url: p.url });
    case "count":
      return make(
        { type: "count", minimum: typeof p.minimum === "number" ? p.minimum : thresholds[p.minimum] },
        {
          source: "rows",
          table: p.table,
          dateColumn: p.date_column,
          distinctColumn: p.distinct_column,
          where: p.where,
        },
      );
    case "file":
      return make(
        { type: "file", deadline: requireTime(p.deadline) },
        { source: "file", pathTemplate: p.path },
      );
  }
}

export function buildPipelineChecks(config: ConfigFile): PipelineCheck[] {
  return config.pipelines.map((p) => buildPipelineCheck(p, config.thresholds));
}

/** Select checks by name, keeping the order of `names`. All checks when `names` is undefined. */
export function selectChecks(checks: readonly PipelineCheck[], names?: readonly string[]): PipelineCheck[] {
  if (!names) return [...checks];
  return names.map((name) => {
    const check = checks.find((c) => c.name === name);
    if (!check) throw new ConfigurationError(`Unknown pipeline "${name}"`);
    return check;
  });
}

export function getCheckin(config: ConfigFile, name: CheckinName): CheckinConfig {
  const checkin = config.checkins[name];
  if (!checkin) {
    throw new ConfigurationError(`Check-in "${name}" is not configured`);
  }
  return checkin;
}
