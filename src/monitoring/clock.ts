import type { TimeOfDay } from "../types.js";

const TIME_PATTERN = /^([01]?\d|2[0-3]):([0-5]\d)$/;

/** Parse "HH:MM" (24h). Returns null for anything else. */
export function parseTimeOfDay(value: string): TimeOfDay | null {
  const match = TIME_PATTERN.exec(value.trim());
  if (!match) return null;
  return { hour: Number(match[1]), minute: Number(match[2]) };
}

export function formatTimeOfDay(t: TimeOfDay): string {
  return `${String(t.hour).padStart(2, "0")}:${String(t.minute).padStart(2, "0")}`;
}

/** True when `at` (local time) is strictly earlier in the day than `t`. */
export function isBeforeTimeOfDay(at: Date, t: TimeOfDay): boolean {
  return at.getHours() * 60 + at.getMinutes() < t.hour * 60 + t.minute;
}

/** "YYYY-MM-DD HH:MM" in local time. */
export function formatTimestamp(at: Date): string {
  const date = [
    at.getFullYear(),
    String(at.getMonth() + 1).padStart(2, "0"),
    String(at.getDate()).padStart(2, "0"),
  ].join("-");
  return `${date} ${formatTimeOfDay({ hour: at.getHours(), minute: at.getMinutes() })}`;
}
