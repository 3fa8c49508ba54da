import { formatTimestamp } from "../monitoring/clock.js";
import { STATUS_COLORS, STATUS_EMOJI, worstStatus } from "../monitoring/severity.js";
import { countByStatus, formatCounts } from "../monitoring/summary.js";
import { OVERALL_LABELS } from "../notifications/chat-card.js";
import { escapeHtml } from "../notifications/html.js";
import type { StatusRecord } from "../types.js";

export interface DashboardView {
  title: string;
  records: readonly StatusRecord[];
  refreshSeconds: number;
  generatedAt: Date;
  /** Start of each pipeline's current status, when known. */
  since?: (pipeline: string) => Date | null;
}

/** JSON shape served at /api/status. */
export interface StatusJson {
  pipeline: string;
  status: StatusRecord["status"];
  detail: string;
  evaluated_at: string;
}

export function toStatusJson(records: readonly StatusRecord[]): StatusJson[] {
  return records.map((r) => ({
    pipeline: r.pipeline,
    status: r.status,
    detail: r.detail,
    evaluated_at: r.evaluatedAt.toISOString(),
  }));
}

export function renderDashboardHtml(view: DashboardView): string {
  const worst = worstStatus(view.records);
  const rows = view.records
    .map((r) => {
      const since = view.since?.(r.pipeline);
      return [
        `<tr class="status-${r.status.toLowerCase()}">`,
        `<td>${escapeHtml(r.pipeline)}</td>`,
        `<td style="color:${STATUS_COLORS[r.status]}">${STATUS_EMOJI[r.status]} ${r.status}</td>`,
        `<td>${escapeHtml(r.detail)}</td>`,
        `<td>${since ? formatTimestamp(since) : ""}</td>`,
        "</tr>",
      ].join("");
    })
    .join("\n");

  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="utf-8">
<meta http-equiv="refresh" content="${view.refreshSeconds}">
<title>${escapeHtml(view.title)}</title>
<style>
body { font-family: sans-serif; margin: 2rem; }
table { border-collapse: collapse; width: 100%; }
th, td { text-align: left; padding: 0.5rem; border-bottom: 1px solid #ddd; }
.status-ok { background: #e6f4ea; }
.status-warning { background: #fef7e0; }
.status-critical { background: #fce8e6; }
.status-pending { background: #f1f3f4; }
</style>
</head>
<body>
<h1>${escapeHtml(view.title)}</h1>
<p style="color:${STATUS_COLORS[worst]}"><b>${OVERALL_LABELS[worst]}</b></p>
<p>Checked at ${formatTimestamp(view.generatedAt)} | ${formatCounts(countByStatus(view.records))}</p>
<table>
<tr><th>Pipeline</th><th>Status</th><th>Detail</th><th>Since</th></tr>
${rows}
</table>
</body>
</html>
`;
}
