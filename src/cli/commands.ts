/**
 * CLI command definitions registered on the Commander program.
 */

import * as path from "node:path";
import type { Command } from "commander";
import { selectChecks } from "../config.js";
import { DashboardServer } from "../dashboard/server.js";
import { toStatusJson } from "../dashboard/render.js";
import { errorMessage } from "../errors.js";
import { dailyLogPath, logger, redirectLogToFile } from "../logger.js";
import { StatusHistory } from "../monitoring/history.js";
import { formatHealthTable } from "../monitoring/summary.js";
import { evaluatePipelines, runCheckin, runDailySummary, runQuickCheck } from "../runner.js";
import type { CheckinName } from "../types.js";
import { buildCrontab } from "./crontab.js";
import {
  buildCheckinRun,
  createRuntime,
  exitCodeForError,
  loadConfigFromOpts,
  parseCheckinName,
  parsePort,
  parsePositiveInt,
  type Runtime,
} from "./helpers.js";

type GlobalOptions = {
  config?: string;
  logFile?: string;
};

/** Register all CLI commands on the given Commander program. */
export function registerCommands(program: Command): void {
  registerCheckin(program);
  registerQuickCheck(program);
  registerDailySummary(program);
  registerStatus(program);
  registerDashboard(program);
  registerCrontab(program);
}

/**
 * Load config, wire the runtime and run `fn`; its result becomes the exit code.
 * Config errors exit with 2, anything else unexpected with 3.
 */
async function withRuntime(program: Command, label: string, fn: (runtime: Runtime) => Promise<number>): Promise<void> {
  let runtime: Runtime | null = null;
  try {
    const globals = program.opts<GlobalOptions>();
    const config = loadConfigFromOpts(globals.config);
    const logFile = globals.logFile ?? config.monitoring.log_file;
    if (logFile) redirectLogToFile(dailyLogPath(logFile));

    runtime = createRuntime(config);
    process.exitCode = await fn(runtime);
  } catch (err: unknown) {
    logger.error({ err }, `${label} failed`);
    console.error(`❌ ${label} failed:`, errorMessage(err));
    process.exitCode = exitCodeForError(err);
  } finally {
    await runtime?.close();
  }
}

// --- checkin ---
function registerCheckin(program: Command): void {
  program
    .command("checkin")
    .description("Run a scheduled check-in and post its summary card")
    .requiredOption("--time <name>", "Check-in: morning, first_shift or second_shift", parseCheckinName)
    .action(async (opts: { time: CheckinName }) => {
      await withRuntime(program, "Check-in", async ({ config, checks, deps }) => {
        const outcome = await runCheckin(buildCheckinRun(config, checks, opts.time), deps);
        return outcome.exitCode;
      });
    });
}

// --- quick-check ---
function registerQuickCheck(program: Command): void {
  program
    .command("quick-check")
    .description("Probe pipelines and alert only on escalation changes")
    .action(async () => {
      await withRuntime(program, "Quick check", async ({ config, checks, deps }) => {
        const outcome = await runQuickCheck(selectChecks(checks, config.quick_check.pipelines), deps);
        return outcome.exitCode;
      });
    });
}

// --- daily-summary ---
function registerDailySummary(program: Command): void {
  program
    .command("daily-summary")
    .description("Post the end-of-day summary of every pipeline")
    .action(async () => {
      await withRuntime(program, "Daily summary", async ({ config, checks, deps }) => {
        const outcome = await runDailySummary(
          { title: config.daily_summary.title, checks: selectChecks(checks, config.daily_summary.pipelines) },
          deps,
        );
        return outcome.exitCode;
      });
    });
}

// --- status ---
function registerStatus(program: Command): void {
  program
    .command("status")
    .description("Evaluate every pipeline and print the result without notifying")
    .option("--json", "Print JSON instead of a table", false)
    .action(async (opts: { json: boolean }) => {
      await withRuntime(program, "Status", async ({ checks, deps }) => {
        const records = await evaluatePipelines(checks, deps.probe, new Date());
        console.log(opts.json ? JSON.stringify(toStatusJson(records), null, 2) : formatHealthTable(records));
        return records.some((r) => r.status === "CRITICAL") ? 1 : 0;
      });
    });
}

// --- dashboard ---
function registerDashboard(program: Command): void {
  program
    .command("dashboard")
    .description("Serve the status dashboard")
    .option("--port <number>", "Port to listen on", parsePort)
    .option("--host <address>", "Address to bind")
    .action(async (opts: { port?: number; host?: string }) => {
      await withRuntime(program, "Dashboard", async ({ config, checks, deps }) => {
        const server = new DashboardServer({
          port: opts.port ?? config.dashboard.port,
          host: opts.host ?? config.dashboard.host,
          title: config.dashboard.title,
          refreshSeconds: config.dashboard.refresh_seconds,
          history: new StatusHistory(),
          evaluate: () => evaluatePipelines(checks, deps.probe, new Date()),
        });
        await server.start();
        console.log(`📊 Dashboard: http://${opts.host ?? config.dashboard.host}:${server.port}`);

        await new Promise<void>((resolve) => {
          const shutdown = (): void => {
            process.off("SIGINT", shutdown);
            process.off("SIGTERM", shutdown);
            resolve();
          };
          process.on("SIGINT", shutdown);
          process.on("SIGTERM", shutdown);
        });
        await server.stop();
        return 0;
      });
    });
}

// --- crontab ---
function registerCrontab(program: Command): void {
  program
    .command("crontab")
    .description("Print cron entries for every scheduled mode")
    .option("--command <cmd>", "Command cron should run", "pipeline-monitor")
    .option("--log-dir <dir>", "Directory for cron output", "/var/log/pipeline-monitor")
    .option("--retain-log-days <days>", "Age in days at which the weekly cleanup deletes logs", parsePositiveInt, 30)
    .action(async (opts: { command: string; logDir: string; retainLogDays: number }) => {
      const configPath = program.opts<GlobalOptions>().config;
      try {
        const config = loadConfigFromOpts(configPath);
        const command = configPath ? `${opts.command} --config ${path.resolve(configPath)}` : opts.command;
        console.log(buildCrontab(config, { command, logDir: opts.logDir, retainLogDays: opts.retainLogDays }).join("\n"));
      } catch (err: unknown) {
        console.error("❌ Crontab failed:", errorMessage(err));
        process.exitCode = exitCodeForError(err);
      }
    });
}
