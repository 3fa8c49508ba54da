import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import {
  buildPipelineChecks,
  getCheckin,
  loadConfig,
  selectChecks,
  substituteEnvVars,
  substituteEnvVarsDeep,
} from "../src/config.js";
import { ConfigurationError } from "../src/errors.js";

function writeTmpConfig(content: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "config-test-"));
  const file = path.join(dir, "pipeline-monitor.config.yaml");
  fs.writeFileSync(file, content, "utf-8");
  return file;
}

const VALID_YAML = `
database:
  host: "db.internal"
  database: "warehouse"
  user: "monitor"
  password: "test-secret"

alerts:
  google_chat:
    enabled: true
    webhook_url: "https://chat.example.com/v1/spaces/test/messages"

pipelines:
  - name: FactCalls
    type: freshness
    table: FactCalls
    date_column: calldate
    critical_hours: 24
    warning_hours: 12
  - name: DimAgentActivity
    type: freshness
    table: DimAgentActivity
    date_column: date
    critical_hours: 48
  - name: messaging_result
    type: freshness
    table: dl_messaging_result
    date_column: createdAt
    where: "dl_is_current = true"
  - name: First Calls
    type: count
    table: FactCalls
    date_column: calldate
    expected_after: "11:00"
  - name: Active Operators
    type: count
    table: DimAgentActivity
    distinct_column: agent_id
    minimum: expected_operator_count
  - name: Morning CSV
    type: file
    path: "/data/morning_{yyyy}{mm}{dd}.csv"
    deadline: "11:31"

checkins:
  first_shift:
    title: "First Shift Check"
    time: "11:45"
    description: "Morning CSV verification"
    pipelines: [FactCalls, First Calls, Morning CSV]
`;

describe("loadConfig", () => {
  it("loads and validates a complete config file", () => {
    const config = loadConfig(writeTmpConfig(VALID_YAML));

    expect(config.database?.host).toBe("db.internal");
    expect(config.database?.port).toBe(5432);
    expect(config.alerts.google_chat.enabled).toBe(true);
    expect(config.alerts.email.enabled).toBe(false);
    expect(config.pipelines).toHaveLength(6);
    expect(config.checkins.first_shift?.pipelines).toEqual(["FactCalls", "First Calls", "Morning CSV"]);
  });

  it("applies defaults for optional sections", () => {
    const config = loadConfig(writeTmpConfig(VALID_YAML));

    expect(config.dashboard.port).toBe(5000);
    expect(config.dashboard.refresh_seconds).toBe(60);
    expect(config.monitoring.follow_up_after_minutes).toBe(60);
    expect(config.monitoring.state_file).toBe("var/escalation-state.json");
    expect(config.thresholds).toEqual({
      stale_hours: 24,
      warning_hours: 12,
      min_daily_calls: 1000,
      expected_operator_count: 237,
    });
    expect(config.quick_check.interval_minutes).toBe(5);
    expect(config.daily_summary.time).toBe("17:00");
  });

  it("throws ConfigurationError on missing config file", () => {
    expect(() => loadConfig("/nonexistent/path.yaml")).toThrow(ConfigurationError);
    expect(() => loadConfig("/nonexistent/path.yaml")).toThrow("Config file not found");
  });

  it("throws on invalid YAML", () => {
    expect(() => loadConfig(writeTmpConfig("pipelines: [unclosed"))).toThrow("Invalid YAML");
  });

  it("requires at least one pipeline", () => {
    expect(() => loadConfig(writeTmpConfig("pipelines: []"))).toThrow(/pipelines: /);
  });

  it("rejects duplicate pipeline names", () => {
    const yaml = `
pipelines:
  - { name: FactCalls, type: freshness, table: a, date_column: d }
  - { name: FactCalls, type: freshness, table: b, date_column: d }
`;
    expect(() => loadConfig(writeTmpConfig(yaml))).toThrow('pipelines.1.name: duplicate pipeline name "FactCalls"');
  });

  it("rejects check-ins that reference unknown pipelines", () => {
    const yaml = `
pipelines:
  - { name: FactCalls, type: freshness, table: a, date_column: d }
checkins:
  morning:
    title: Morning
    time: "07:30"
    pipelines: [FactCalls, Nope]
`;
    expect(() => loadConfig(writeTmpConfig(yaml))).toThrow('checkins.morning.pipelines.1: unknown pipeline "Nope"');
  });

  it("rejects a warning threshold above the critical one", () => {
    const yaml = `
pipelines:
  - { name: FactCalls, type: freshness, table: a, date_column: d, warning_hours: 30, critical_hours: 24 }
`;
    expect(() => loadConfig(writeTmpConfig(yaml))).toThrow("warning_hours must not exceed critical_hours");
  });

  it("rejects an invalid time of day", () => {
    const yaml = `
pipelines:
  - { name: CSV, type: file, path: /data/x.csv, deadline: "25:00" }
`;
    expect(() => loadConfig(writeTmpConfig(yaml))).toThrow("pipelines.0.deadline: must be a 24h time like 07:30");
  });

  it("requires SMTP settings when email is enabled", () => {
    const yaml = `
alerts:
  email:
    enabled: true
    from: "monitor@example.com"
    recipients: ["team@example.com"]
pipelines:
  - { name: FactCalls, type: freshness, table: a, date_column: d }
`;
    expect(() => loadConfig(writeTmpConfig(yaml))).toThrow("alerts.email.smtp_host: required when email is enabled");
  });

  it("requires a webhook URL when chat is enabled", () => {
    const yaml = `
alerts:
  google_chat:
    enabled: true
pipelines:
  - { name: FactCalls, type: freshness, table: a, date_column: d }
`;
    expect(() => loadConfig(writeTmpConfig(yaml))).toThrow("webhook_url must be a URL when google_chat is enabled");
  });
});

describe("buildPipelineChecks", () => {
  const config = loadConfig(writeTmpConfig(VALID_YAML));
  const checks = buildPipelineChecks(config);
  const byName = (name: string) => checks.find((c) => c.name === name);

  it("uses explicit freshness thresholds", () => {
    expect(byName("FactCalls")?.rule).toEqual({ type: "freshness", criticalHours: 24, warningHours: 12 });
    expect(byName("FactCalls")?.probe).toEqual({
      source: "table",
      table: "FactCalls",
      dateColumn: "calldate",
      where: undefined,
    });
  });

  it("defaults the warning threshold to half the critical one", () => {
    expect(byName("DimAgentActivity")?.rule).toEqual({ type: "freshness", criticalHours: 48, warningHours: 24 });
  });

  it("falls back to the global thresholds", () => {
    expect(byName("messaging_result")?.rule).toEqual({ type: "freshness", criticalHours: 24, warningHours: 12 });
    expect(byName("messaging_result")?.probe).toMatchObject({ where: "dl_is_current = true" });
  });

  it("resolves named count minimums", () => {
    expect(byName("First Calls")?.rule).toEqual({ type: "count", minimum: 1000 });
    expect(byName("Active Operators")?.rule).toEqual({ type: "count", minimum: 237 });
    expect(byName("Active Operators")?.probe).toMatchObject({ source: "rows", distinctColumn: "agent_id" });
  });

  it("parses times of day", () => {
    expect(byName("First Calls")?.expectedAfter).toEqual({ hour: 11, minute: 0 });
    expect(byName("Morning CSV")?.rule).toEqual({ type: "file", deadline: { hour: 11, minute: 31 } });
    expect(byName("FactCalls")?.expectedAfter).toBeNull();
  });

  it("freezes checks", () => {
    expect(Object.isFrozen(byName("FactCalls"))).toBe(true);
  });
});

describe("selectChecks", () => {
  const checks = buildPipelineChecks(loadConfig(writeTmpConfig(VALID_YAML)));

  it("returns every check without names", () => {
    expect(selectChecks(checks)).toHaveLength(6);
  });

  it("keeps the order of the requested names", () => {
    expect(selectChecks(checks, ["Morning CSV", "FactCalls"]).map((c) => c.name)).toEqual(["Morning CSV", "FactCalls"]);
  });

  it("throws on an unknown name", () => {
    expect(() => selectChecks(checks, ["Nope"])).toThrow('Unknown pipeline "Nope"');
  });
});

describe("getCheckin", () => {
  const config = loadConfig(writeTmpConfig(VALID_YAML));

  it("returns a configured check-in", () => {
    expect(getCheckin(config, "first_shift").title).toBe("First Shift Check");
  });

  it("throws for a check-in that is not configured", () => {
    expect(() => getCheckin(config, "morning")).toThrow('Check-in "morning" is not configured');
  });
});

describe("substituteEnvVars", () => {
  const ORIGINAL_ENV = process.env;

  beforeEach(() => {
    process.env = { ...ORIGINAL_ENV };
  });

  afterEach(() => {
    process.env = ORIGINAL_ENV;
  });

  it("replaces env var placeholders with values", () => {
    process.env["PM_TEST_HOST"] = "db.internal";
    expect(substituteEnvVars('host: "${PM_TEST_HOST}"')).toBe('host: "db.internal"');
  });

  it("replaces undefined env vars with empty string", () => {
    delete process.env["UNDEFINED_VAR"];
    expect(substituteEnvVars("val: ${UNDEFINED_VAR}")).toBe("val: ");
  });

  it("substitutes env vars in YAML before parsing", () => {
    process.env["PM_TEST_DB_PASSWORD"] = "test-secret";
    const yaml = VALID_YAML.replace('password: "test-secret"', 'password: "${PM_TEST_DB_PASSWORD}"');
    expect(loadConfig(writeTmpConfig(yaml)).database?.password).toBe("test-secret");
  });

  it.each([
    ["a comment marker", "test #secret"],
    ["only digits", "123456"],
    ["a leading at sign", "@test-secret"],
    ["a mapping indicator", "test: secret"],
  ])("keeps a value with %s intact in an unquoted placeholder", (_label, value) => {
    process.env["PM_TEST_DB_PASSWORD"] = value;
    const yaml = VALID_YAML.replace('password: "test-secret"', "password: ${PM_TEST_DB_PASSWORD}");
    expect(loadConfig(writeTmpConfig(yaml)).database?.password).toBe(value);
  });

  it("substitutes in nested mappings and sequences", () => {
    process.env["PM_TEST_USER"] = "monitor";
    expect(
      substituteEnvVarsDeep({ db: { user: "${PM_TEST_USER}", port: 3306 }, to: ["${PM_TEST_USER}@example.com"], ssl: null }),
    ).toEqual({ db: { user: "monitor", port: 3306 }, to: ["monitor@example.com"], ssl: null });
  });
});

describe("sample configuration", () => {
  const ORIGINAL_ENV = process.env;

  beforeEach(() => {
    process.env = {
      ...ORIGINAL_ENV,
      WAREHOUSE_HOST: "db.internal",
      WAREHOUSE_USER: "monitor",
      WAREHOUSE_PASSWORD: "test #secret",
      GOOGLE_CHAT_WEBHOOK_URL: "https://chat.example.com/v1/spaces/test/messages",
      SMTP_HOST: "smtp.example.com",
      SMTP_USER: "monitor",
      SMTP_PASSWORD: "test-secret",
      INBOUND_SHEET_URL: "https://sheets.example.com/inbound",
    };
  });

  afterEach(() => {
    process.env = ORIGINAL_ENV;
  });

  it("loads with credentials from the environment", () => {
    const config = loadConfig(path.resolve("pipeline-monitor.config.yaml"));
    expect(config.database).toMatchObject({ host: "db.internal", port: 3306, password: "test #secret", pool_size: 4 });
  });

  it("checks active operators at the morning check-in", () => {
    const config = loadConfig(path.resolve("pipeline-monitor.config.yaml"));
    expect(getCheckin(config, "morning").pipelines).toEqual([
      "FactCalls",
      "FactFirstCalls",
      "DimAgentActivity",
      "Active Operators",
    ]);
  });
});
