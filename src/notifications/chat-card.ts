import { formatTimestamp } from "../monitoring/clock.js";
import { STATUS_COLORS, STATUS_EMOJI, worstStatus } from "../monitoring/severity.js";
import { countByStatus, formatCounts } from "../monitoring/summary.js";
import type { NotificationPlan, Status, StatusRecord } from "../types.js";
import { escapeHtml } from "./html.js";

// --- Google Chat card (v1) payload ---

export type CardWidget =
  | { textParagraph: { text: string } }
  | { keyValue: { topLabel: string; content: string; bottomLabel?: string } }
  | { buttons: { textButton: { text: string; onClick: { openLink: { url: string } } } }[] };

export interface CardSection {
  header?: string;
  widgets: CardWidget[];
}

export interface ChatCard {
  cards: {
    header: { title: string; subtitle: string; imageUrl: string };
    sections: CardSection[];
  }[];
}

const ICON_BASE = "https://www.gstatic.com/images/icons/material/system/2x";

export const STATUS_ICONS: Record<Status, string> = {
  OK: `${ICON_BASE}/check_circle_green_48dp.png`,
  WARNING: `${ICON_BASE}/warning_amber_48dp.png`,
  CRITICAL: `${ICON_BASE}/error_red_48dp.png`,
  PENDING: `${ICON_BASE}/schedule_grey600_48dp.png`,
};

export const OVERALL_LABELS: Record<Status, string> = {
  OK: "✅ ALL SYSTEMS OPERATIONAL",
  WARNING: "⚠️ WARNINGS PRESENT",
  CRITICAL: "🔴 CRITICAL ISSUES DETECTED",
  PENDING: "⏳ AWAITING DATA",
};

export interface StatusCardInput {
  title: string;
  description?: string;
  records: readonly StatusRecord[];
  /** Extra line per pipeline, e.g. an escalation note. */
  notes?: Readonly<Record<string, string>>;
  dashboardUrl?: string;
  generatedAt: Date;
}

/** Build the card for a batch; the header reflects the worst status in it. */
export function buildStatusCard(input: StatusCardInput): ChatCard {
  const worst = worstStatus(input.records);
  const label = OVERALL_LABELS[worst];

  const sections: CardSection[] = [
    {
      header: "Summary",
      widgets: [
        { textParagraph: { text: `<font color="${STATUS_COLORS[worst]}"><b>${label}</b></font>` } },
        { keyValue: { topLabel: "Check Time", content: formatTimestamp(input.generatedAt) } },
        { keyValue: { topLabel: "Pipelines", content: formatCounts(countByStatus(input.records)) } },
      ],
    },
    {
      header: "Pipeline Details",
      widgets: input.records.map((r) => {
        const note = input.notes?.[r.pipeline];
        return {
          keyValue: {
            topLabel: escapeHtml(r.pipeline),
            content: `${STATUS_EMOJI[r.status]} ${r.status}`,
            bottomLabel: escapeHtml(note ? `${r.detail} | ${note}` : r.detail),
          },
        };
      }),
    },
  ];

  if (input.dashboardUrl) {
    sections.push({
      widgets: [
        {
          buttons: [
            { textButton: { text: "VIEW DASHBOARD", onClick: { openLink: { url: input.dashboardUrl } } } },
          ],
        },
      ],
    });
  }

  return {
    cards: [
      {
        header: {
          title: input.title,
          subtitle: input.description ? `${input.description} | ${label}` : label,
          imageUrl: STATUS_ICONS[worst],
        },
        sections,
      },
    ],
  };
}

/** Pipeline → note for plans that carry one. */
export function notesFromPlans(plans: readonly NotificationPlan[]): Record<string, string> {
  const notes: Record<string, string> = {};
  for (const plan of plans) {
    if (plan.note) notes[plan.pipeline] = plan.note;
  }
  return notes;
}
