#!/usr/bin/env node
// Copyright (c) 2025 trsdn. MIT License — see LICENSE for details.

/**
 * Pipeline Monitor CLI: scheduled health checks for warehouse tables and expected files.
 *
 * Usage:
 *   pipeline-monitor checkin --time <morning|first_shift|second_shift>
 *   pipeline-monitor quick-check
 *   pipeline-monitor daily-summary
 *   pipeline-monitor status [--json]
 *   pipeline-monitor dashboard [--port <N>] [--host <addr>]
 *   pipeline-monitor crontab [--command <cmd>] [--log-dir <dir>] [--retain-log-days <N>]
 *
 * Exit codes: 0 no critical pipeline, 1 at least one critical,
 * 2 configuration error, 3 unexpected error.
 */

import { Command } from "commander";
import { registerCommands } from "./cli/commands.js";

const program = new Command();

program
  .name("pipeline-monitor")
  .description("Data pipeline health checks with chat, email and dashboard reporting")
  .version("0.1.0")
  .option("--config <path>", "Path to pipeline-monitor.config.yaml")
  .option("--log-file <path>", "Write logs to this file ({date} expands to YYYYMMDD)");

registerCommands(program);

await program.parseAsync();
