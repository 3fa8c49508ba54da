import type { Status, StatusRecord } from "../types.js";

/** Max records kept per pipeline. */
const HISTORY_MAX = 200;

/**
 * Bounded in-memory history of status records, per pipeline.
 * Lives only as long as the process (the dashboard server).
 */
export class StatusHistory {
  private readonly entries = new Map<string, StatusRecord[]>();

  constructor(private readonly maxPerPipeline: number = HISTORY_MAX) {}

  add(records: readonly StatusRecord[]): void {
    for (const record of records) {
      const list = this.entries.get(record.pipeline) ?? [];
      list.push(record);
      if (list.length > this.maxPerPipeline) {
        list.splice(0, list.length - this.maxPerPipeline);
      }
      this.entries.set(record.pipeline, list);
    }
  }

  get(pipeline: string): readonly StatusRecord[] {
    return this.entries.get(pipeline) ?? [];
  }

  /**
   * Start of the current run of identical statuses, as far back as the history reaches.
   * Null when the pipeline has no history.
   */
  since(pipeline: string): Date | null {
    const list = this.entries.get(pipeline);
    if (!list || list.length === 0) return null;

    let i = list.length - 1;
    const current: Status | undefined = list[i]?.status;
    while (i > 0 && list[i - 1]?.status === current) i--;
    return list[i]?.evaluatedAt ?? null;
  }
}
