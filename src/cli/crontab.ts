import type { ConfigFile } from "../config.js";
import { ConfigurationError } from "../errors.js";
import { parseTimeOfDay } from "../monitoring/clock.js";
import { CHECKIN_NAMES } from "../types.js";

export interface CrontabOptions {
  /** Command that starts the CLI, e.g. `/usr/bin/pipeline-monitor --config /etc/pm.yaml`. */
  command: string;
  logDir: string;
  /** Days after which *.log files in `logDir` are deleted by the weekly cleanup. */
  retainLogDays?: number;
}

/** Cron lines for every scheduled mode in the config. */
export function buildCrontab(config: ConfigFile, options: CrontabOptions): string[] {
  const { command, logDir } = options;
  const lines: string[] = ["# Pipeline monitor: scheduled check-ins"];

  for (const name of CHECKIN_NAMES) {
    const checkin = config.checkins[name];
    if (!checkin) continue;
    lines.push(`# ${checkin.title}`);
    lines.push(`${cronAt(checkin.time)} ${command} checkin --time ${name} >> ${logDir}/checkin.log 2>&1`);
  }

  lines.push("", "# Continuous monitoring");
  lines.push(
    `*/${config.quick_check.interval_minutes} * * * * ${command} quick-check >> ${logDir}/continuous.log 2>&1`,
  );

  lines.push("", "# Daily summary report");
  lines.push(`${cronAt(config.daily_summary.time)} ${command} daily-summary >> ${logDir}/daily.log 2>&1`);

  lines.push("", "# Weekly cleanup of old logs");
  lines.push(`0 2 * * 0 find ${logDir} -name "*.log" -mtime +${options.retainLogDays ?? 30} -delete`);
  return lines;
}

/** "07:30" → "30 7 * * *" */
function cronAt(time: string): string {
  const t = parseTimeOfDay(time);
  if (!t) throw new ConfigurationError(`Invalid time of day "${time}"`);
  return `${t.minute} ${t.hour} * * *`;
}
