import type { RunSummary } from "../../core/run/runSummary";
import type { CollectionResult } from "../../core/stores/store.types";
import { toSubmissionRecord } from "../../core/stores/transformStoreMetrics";

export type ChatWidget = Record<string, unknown>;

export type ChatSection = {
  header?: string;
  collapsible?: boolean;
  uncollapsibleWidgetsCount?: number;
  widgets: ChatWidget[];
};

export type ChatMessage = {
  cardsV2: Array<{
    cardId: string;
    card: {
      header: { title: string; subtitle: string };
      sections: ChatSection[];
    };
  }>;
};

export type MetricThresholds = {
  /** Minimum acceptable units per hour. */
  uph: number;
  /** Maximum acceptable late-pick percentage. */
  lates: number;
  /** Maximum acceptable item-not-found percentage. */
  inf: number;
};

export const defaultThresholds: MetricThresholds = { uph: 80, lates: 3.0, inf: 2.0 };

const PASS = "✅";
const FAIL = "❌";
const HIGHLIGHT_COLOR = "#C62828";
const HIGHLIGHT_LIMIT = 5;
const FAILURE_LIMIT = 5;

export const displayStoreName = (name: string, prefix = ""): string =>
  (prefix !== "" && name.startsWith(prefix) ? name.slice(prefix.length) : name).trim();

/** `Monday 19 October, 14:05` in the given zone. */
export const formatCardTimestamp = (at: Date, timeZone: string): string => {
  const parts = new Intl.DateTimeFormat("en-GB", {
    timeZone,
    weekday: "long",
    day: "2-digit",
    month: "long",
    hour: "2-digit",
    minute: "2-digit",
    hourCycle: "h23"
  }).formatToParts(at);
  const get = (type: Intl.DateTimeFormatPartTypes) => parts.find((p) => p.type === type)?.value ?? "";
  return `${get("weekday")} ${get("day")} ${get("month")}, ${get("hour")}:${get("minute")}`;
};

/** Compact metric cell: pass/fail mark followed by the bare number. */
export const markMetric = (value: number, fractionDigits: number, threshold: number, higherIsBetter: boolean): string => {
  const shown = value.toFixed(fractionDigits);
  const rounded = Number(shown);
  const good = higherIsBetter ? rounded >= threshold : rounded <= threshold;
  return `${good ? PASS : FAIL}${shown}`;
};

const gridCell = (title: string, textAlignment: "START" | "CENTER"): ChatWidget => ({ title, textAlignment });

export const buildBatchCard = (args: {
  results: CollectionResult[];
  batchNumber: number;
  subtitle: string;
  thresholds?: MetricThresholds;
  storePrefix?: string;
}): ChatMessage | undefined => {
  const thresholds = args.thresholds ?? defaultThresholds;
  const rows = args.results
    .filter((r) => r.orders > 0)
    .map((r) => ({ name: displayStoreName(r.storeName, args.storePrefix), result: r }))
    .sort((a, b) => a.name.localeCompare(b.name));
  if (rows.length === 0) return undefined;

  const items: ChatWidget[] = [
    gridCell("Store", "START"),
    gridCell("Ord", "CENTER"),
    gridCell("UPH", "CENTER"),
    gridCell("Lat%", "CENTER"),
    gridCell("INF%", "CENTER")
  ];
  for (const { name, result } of rows) {
    items.push(
      gridCell(name, "START"),
      gridCell(String(result.orders), "CENTER"),
      gridCell(markMetric(result.unitsPerHour, 0, thresholds.uph, true), "CENTER"),
      gridCell(markMetric(result.latePickRate, 1, thresholds.lates, false), "CENTER"),
      gridCell(markMetric(result.itemNotFoundRate, 1, thresholds.inf, false), "CENTER")
    );
  }

  return {
    cardsV2: [
      {
        cardId: `batch-summary-${args.batchNumber}`,
        card: {
          header: {
            title: "Store Metrics Report",
            subtitle: `${args.subtitle}  Batch ${args.batchNumber} (${args.results.length} stores)`
          },
          sections: [
            {
              header: "Key Performance Indicators",
              widgets: [
                {
                  grid: {
                    title: "Performance Summary",
                    columnCount: 5,
                    borderStyle: { type: "NO_BORDER" },
                    items
                  }
                }
              ]
            }
          ]
        }
      }
    ]
  };
};

const decorated = (topLabel: string, text: string, knownIcon: string): ChatWidget => ({
  decoratedText: { topLabel, text, startIcon: { knownIcon } }
});

const paragraph = (text: string): ChatWidget => ({ textParagraph: { text } });

const seconds = (ms: number): string => `${(ms / 1000).toFixed(2)}s`;

export const buildJobSummaryCard = (summary: RunSummary, subtitle: string, cardId: string): ChatMessage => {
  const title =
    summary.failures.length > 0
      ? `Job Completed with ${summary.failures.length} Failures`
      : "Job Completed Successfully";

  const highLevel: ChatWidget[] = [
    decorated("Throughput", `${summary.storesPerMinute.toFixed(1)} stores/min`, "FLIGHT_DEPARTURE"),
    decorated(
      "Success Rate",
      `${summary.succeeded}/${summary.total} (${summary.successRate.toFixed(1)}%)`,
      "STAR"
    ),
    decorated("Total Duration", seconds(summary.elapsedMs), "CLOCK")
  ];

  const detailed: ChatWidget[] = [
    paragraph("<b>Business Volume</b>"),
    decorated("Total Orders", summary.totalOrders.toLocaleString("en-GB"), "SHOPPING_CART"),
    decorated("Total Units", summary.totalUnits.toLocaleString("en-GB"), "TICKET"),
    { divider: {} },
    paragraph("<b>Resilience & Health</b>"),
    decorated("Total Retries", String(summary.retries), "MEMBERSHIP"),
    decorated("Stores Retried", String(summary.retriedStores), "STORE"),
    { divider: {} },
    paragraph("<b>Timing</b>"),
    decorated("Avg / P95 Collection", `${seconds(summary.averageCollectionMs)} / ${seconds(summary.p95CollectionMs)}`, "CLOCK"),
    decorated("Avg Submission", seconds(summary.averageSubmissionMs), "CLOCK"),
    decorated("Bottleneck", summary.bottleneck, "DESCRIPTION"),
    decorated(
      "Fastest Store",
      summary.fastest ? `${summary.fastest.store} (${seconds(summary.fastest.durationMs)})` : "N/A",
      "BOLT"
    ),
    decorated(
      "Slowest Store",
      summary.slowest ? `${summary.slowest.store} (${seconds(summary.slowest.durationMs)})` : "N/A",
      "SNAIL"
    )
  ];

  if (summary.failures.length > 0) {
    let list = summary.failures
      .slice(0, FAILURE_LIMIT)
      .map((f) => `• ${f}`)
      .join("\n");
    if (summary.failures.length > FAILURE_LIMIT) {
      list += `\n...and ${summary.failures.length - FAILURE_LIMIT} more`;
    }
    detailed.push({ divider: {} }, paragraph("<b>Failure Analysis</b>"), paragraph(`<font color="#FF0000">${list}</font>`));
  }

  return {
    cardsV2: [
      {
        cardId,
        card: {
          header: { title, subtitle },
          sections: [
            { widgets: highLevel },
            { header: "Detailed Metrics", collapsible: true, uncollapsibleWidgetsCount: 0, widgets: detailed }
          ]
        }
      }
    ]
  };
};

const highlightSection = (title: string, rows: Array<{ name: string; value: string }>): ChatSection => ({
  header: title,
  widgets: rows.map((row) => ({
    columns: {
      columnItems: [
        {
          horizontalSizeStyle: "FILL_AVAILABLE_SPACE",
          horizontalAlignment: "START",
          widgets: [paragraph(row.name)]
        },
        {
          horizontalSizeStyle: "FILL_AVAILABLE_SPACE",
          horizontalAlignment: "END",
          widgets: [paragraph(`<font color="${HIGHLIGHT_COLOR}"><b>${row.value}</b></font>`)]
        }
      ]
    }
  }))
});

/** Highest late-pick rates and lowest UPH among stores with orders; undefined when there is nothing to show. */
export const buildHighlightsCard = (
  results: CollectionResult[],
  subtitle: string,
  cardId: string,
  storePrefix?: string
): ChatMessage | undefined => {
  const active = results.filter((r) => r.orders > 0);
  if (active.length === 0) return undefined;

  const sections: ChatSection[] = [];
  const byLates = [...active].sort((a, b) => b.latePickRate - a.latePickRate).slice(0, HIGHLIGHT_LIMIT);
  if (byLates[0].latePickRate > 0) {
    sections.push(
      highlightSection(
        "Highest Lates %",
        byLates.map((r) => ({ name: displayStoreName(r.storeName, storePrefix), value: toSubmissionRecord(r).lates }))
      )
    );
  }

  const byUph = [...active].sort((a, b) => a.unitsPerHour - b.unitsPerHour).slice(0, HIGHLIGHT_LIMIT);
  sections.push(
    highlightSection(
      "Lowest UPH",
      byUph.map((r) => ({ name: displayStoreName(r.storeName, storePrefix), value: toSubmissionRecord(r).uph }))
    )
  );

  return {
    cardsV2: [
      {
        cardId,
        card: {
          header: { title: "Performance Highlights", subtitle },
          sections
        }
      }
    ]
  };
};
