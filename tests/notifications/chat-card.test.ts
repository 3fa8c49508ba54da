import { describe, it, expect } from "vitest";
import { buildStatusCard, notesFromPlans, STATUS_ICONS } from "../../src/notifications/chat-card.js";
import type { Status, StatusRecord } from "../../src/types.js";

const GENERATED_AT = new Date(2026, 2, 10, 11, 45);

const rec = (pipeline: string, status: Status, detail: string): StatusRecord => ({
  pipeline,
  status,
  detail,
  evaluatedAt: GENERATED_AT,
});

describe("buildStatusCard", () => {
  const records = [rec("FactCalls", "OK", "2h since update"), rec("First Calls", "CRITICAL", "count 0 below minimum 1000")];

  it("builds a header from the worst status", () => {
    const card = buildStatusCard({
      title: "📊 First Shift Check",
      description: "Morning CSV and productivity verification",
      records,
      generatedAt: GENERATED_AT,
    });
    expect(card.cards[0]?.header).toEqual({
      title: "📊 First Shift Check",
      subtitle: "Morning CSV and productivity verification | 🔴 CRITICAL ISSUES DETECTED",
      imageUrl: STATUS_ICONS.CRITICAL,
    });
  });

  it("summarises the batch in the first section", () => {
    const card = buildStatusCard({ title: "Check", records, generatedAt: GENERATED_AT });
    expect(card.cards[0]?.sections[0]).toEqual({
      header: "Summary",
      widgets: [
        { textParagraph: { text: '<font color="#EA4335"><b>🔴 CRITICAL ISSUES DETECTED</b></font>' } },
        { keyValue: { topLabel: "Check Time", content: "2026-03-10 11:45" } },
        { keyValue: { topLabel: "Pipelines", content: "1 OK | 0 Warning | 1 Critical | 0 Pending" } },
      ],
    });
  });

  it("lists each pipeline with its note", () => {
    const card = buildStatusCard({
      title: "Check",
      records,
      notes: { "First Calls": "still critical after 61 minutes" },
      generatedAt: GENERATED_AT,
    });
    expect(card.cards[0]?.sections[1]?.widgets).toEqual([
      { keyValue: { topLabel: "FactCalls", content: "✅ OK", bottomLabel: "2h since update" } },
      {
        keyValue: {
          topLabel: "First Calls",
          content: "🔴 CRITICAL",
          bottomLabel: "count 0 below minimum 1000 | still critical after 61 minutes",
        },
      },
    ]);
  });

  it("adds a dashboard button when a URL is given", () => {
    const card = buildStatusCard({
      title: "Check",
      records,
      dashboardUrl: "http://monitor.internal:5000",
      generatedAt: GENERATED_AT,
    });
    expect(card.cards[0]?.sections[2]).toEqual({
      widgets: [
        {
          buttons: [
            { textButton: { text: "VIEW DASHBOARD", onClick: { openLink: { url: "http://monitor.internal:5000" } } } },
          ],
        },
      ],
    });
  });

  it("omits the button without a URL", () => {
    expect(buildStatusCard({ title: "Check", records, generatedAt: GENERATED_AT }).cards[0]?.sections).toHaveLength(2);
  });

  it("reports all systems operational when everything is OK", () => {
    const card = buildStatusCard({ title: "Check", records: [rec("FactCalls", "OK", "")], generatedAt: GENERATED_AT });
    expect(card.cards[0]?.header.subtitle).toBe("✅ ALL SYSTEMS OPERATIONAL");
    expect(card.cards[0]?.header.imageUrl).toBe(STATUS_ICONS.OK);
  });

  it("escapes markup in pipeline details", () => {
    const card = buildStatusCard({ title: "Check", records: [rec("a<b>", "WARNING", "x & y")], generatedAt: GENERATED_AT });
    expect(card.cards[0]?.sections[1]?.widgets[0]).toEqual({
      keyValue: { topLabel: "a&lt;b&gt;", content: "⚠️ WARNING", bottomLabel: "x &amp; y" },
    });
  });
});

describe("notesFromPlans", () => {
  it("maps pipelines to notes and skips plans without one", () => {
    expect(
      notesFromPlans([
        { pipeline: "A", channels: ["chat"], reason: "recovered", note: "recovered from critical (OK)" },
        { pipeline: "B", channels: [], reason: "none" },
      ]),
    ).toEqual({ A: "recovered from critical (OK)" });
  });
});
