import {
  buildBatchCard,
  buildHighlightsCard,
  buildJobSummaryCard,
  displayStoreName,
  formatCardTimestamp,
  markMetric
} from "../../src/infrastructure/chat/chatCards";
import { makeResult, makeSummary } from "../helpers/fixtures";

describe("chat card helpers", () => {
  it("marks metrics against thresholds after rounding", () => {
    expect(markMetric(80, 0, 80, true)).toBe("✅80");
    expect(markMetric(79.6, 0, 80, true)).toBe("✅80");
    expect(markMetric(79.4, 0, 80, true)).toBe("❌79");
    expect(markMetric(3.04, 1, 3, false)).toBe("✅3.0");
    expect(markMetric(3.06, 1, 3, false)).toBe("❌3.1");
  });

  it("strips a configured prefix from store names", () => {
    expect(displayStoreName("ACME Leeds ", "ACME")).toBe("Leeds");
    expect(displayStoreName("Leeds ACME", "ACME")).toBe("Leeds ACME");
    expect(displayStoreName(" Leeds")).toBe("Leeds");
  });

  it("formats the card timestamp in the run's zone", () => {
    expect(formatCardTimestamp(new Date("2026-10-19T13:05:00.000Z"), "Europe/London")).toBe("Monday 19 October, 14:05");
  });
});

describe("buildBatchCard", () => {
  const results = [
    makeResult("Leeds"),
    makeResult("Bath", { orders: 0 }),
    makeResult("Hull", { unitsPerHour: 70, latePickRate: 4, itemNotFoundRate: 2.5 })
  ];

  it("lists stores with orders alphabetically with marked metrics", () => {
    const card = buildBatchCard({ results, batchNumber: 2, subtitle: "Monday 19 October, 14:05" });
    const [entry] = card?.cardsV2 ?? [];

    expect(entry.cardId).toBe("batch-summary-2");
    expect(entry.card.header).toEqual({
      title: "Store Metrics Report",
      subtitle: "Monday 19 October, 14:05  Batch 2 (3 stores)"
    });
    expect(entry.card.sections[0].widgets[0]).toEqual({
      grid: {
        title: "Performance Summary",
        columnCount: 5,
        borderStyle: { type: "NO_BORDER" },
        items: [
          { title: "Store", textAlignment: "START" },
          { title: "Ord", textAlignment: "CENTER" },
          { title: "UPH", textAlignment: "CENTER" },
          { title: "Lat%", textAlignment: "CENTER" },
          { title: "INF%", textAlignment: "CENTER" },
          { title: "Hull", textAlignment: "START" },
          { title: "10", textAlignment: "CENTER" },
          { title: "❌70", textAlignment: "CENTER" },
          { title: "❌4.0", textAlignment: "CENTER" },
          { title: "❌2.5", textAlignment: "CENTER" },
          { title: "Leeds", textAlignment: "START" },
          { title: "10", textAlignment: "CENTER" },
          { title: "✅90", textAlignment: "CENTER" },
          { title: "✅0.5", textAlignment: "CENTER" },
          { title: "✅1.5", textAlignment: "CENTER" }
        ]
      }
    });
  });

  it("returns nothing when no store had orders", () => {
    expect(buildBatchCard({ results: [makeResult("Bath", { orders: 0 })], batchNumber: 1, subtitle: "s" })).toBeUndefined();
  });
});

describe("buildJobSummaryCard", () => {
  it("headlines throughput, success rate and duration", () => {
    const card = buildJobSummaryCard(makeSummary({ failures: [] }), "sub", "job-summary-1");
    const { header, sections } = card.cardsV2[0].card;

    expect(header).toEqual({ title: "Job Completed Successfully", subtitle: "sub" });
    expect(sections[0].widgets).toEqual([
      { decoratedText: { topLabel: "Throughput", text: "1.5 stores/min", startIcon: { knownIcon: "FLIGHT_DEPARTURE" } } },
      { decoratedText: { topLabel: "Success Rate", text: "3/4 (75.0%)", startIcon: { knownIcon: "STAR" } } },
      { decoratedText: { topLabel: "Total Duration", text: "120.00s", startIcon: { knownIcon: "CLOCK" } } }
    ]);
    expect(sections[1]).toMatchObject({ header: "Detailed Metrics", collapsible: true, uncollapsibleWidgetsCount: 0 });
  });

  it("lists the first five failures and counts the rest", () => {
    const failures = ["A (Fail)", "B (Fail)", "C (Missing MKID)", "D (HTTP Submit Fail 400)", "E (Worker Crash)", "F (Fail)", "G (Not Processed)"];
    const card = buildJobSummaryCard(makeSummary({ failures }), "sub", "job-summary-1");
    const { header, sections } = card.cardsV2[0].card;
    const widgets = sections[1].widgets;

    expect(header.title).toBe("Job Completed with 7 Failures");
    expect(widgets[widgets.length - 1]).toEqual({
      textParagraph: {
        text: '<font color="#FF0000">• A (Fail)\n• B (Fail)\n• C (Missing MKID)\n• D (HTTP Submit Fail 400)\n• E (Worker Crash)\n...and 2 more</font>'
      }
    });
  });
});

describe("buildHighlightsCard", () => {
  it("shows the highest late-pick rates and the lowest UPH", () => {
    const card = buildHighlightsCard(
      [
        makeResult("ACME Leeds", { latePickRate: 1.25, unitsPerHour: 88 }),
        makeResult("ACME Hull", { latePickRate: 6, unitsPerHour: 101 }),
        makeResult("ACME Bath", { orders: 0, latePickRate: 50, unitsPerHour: 1 })
      ],
      "Stores requiring attention",
      "perf-high-1",
      "ACME"
    );
    const sections = card?.cardsV2[0].card.sections ?? [];

    expect(sections.map((s) => s.header)).toEqual(["Highest Lates %", "Lowest UPH"]);
    const cell = (horizontalAlignment: string, text: string) => ({
      horizontalSizeStyle: "FILL_AVAILABLE_SPACE",
      horizontalAlignment,
      widgets: [{ textParagraph: { text } }]
    });
    expect(sections[0].widgets[0]).toEqual({
      columns: { columnItems: [cell("START", "Hull"), cell("END", '<font color="#C62828"><b>6.0 %</b></font>')] }
    });
    expect(sections[1].widgets).toHaveLength(2);
    expect(JSON.stringify(sections[1].widgets[0])).toContain('"text":"Leeds"');
  });

  it("omits the lates section when nobody was late", () => {
    const card = buildHighlightsCard([makeResult("Leeds", { latePickRate: 0 })], "s", "perf-high-1");
    expect(card?.cardsV2[0].card.sections.map((s) => s.header)).toEqual(["Lowest UPH"]);
  });

  it("returns nothing without active stores", () => {
    expect(buildHighlightsCard([makeResult("Leeds", { orders: 0 })], "s", "perf-high-1")).toBeUndefined();
  });
});
