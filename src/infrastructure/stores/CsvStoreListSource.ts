import { readFile } from "node:fs/promises";
import Papa from "papaparse";
import type { WorkItem } from "../../core/stores/store.types";
import type { JobSource } from "../../ports/JobSource";
import { logEvent } from "../../shared/logging/logEvent";

const MIN_COLUMNS = 4;

const cell = (row: string[], index: number): string => (row[index] ?? "").trim();

const parsePriorInfRate = (raw: string): number | undefined => {
  if (raw === "") return undefined;
  const value = Number(raw.replace(/%$/, ""));
  return Number.isFinite(value) ? value : undefined;
};

/**
 * Columns: store_number, merchant_id, new_id, store_name, marketplace_id[, prior_inf_rate].
 * `new_id` is the short account id the metrics API takes; `merchant_id` is used when it is blank.
 */
export const parseStoreRows = (content: string): WorkItem[] => {
  const result = Papa.parse<string[]>(content.replace(/^\uFEFF/, ""), {
    header: false,
    skipEmptyLines: true,
    dynamicTyping: false
  });

  const items: WorkItem[] = [];
  result.data.slice(1).forEach((row, index) => {
    const line = index + 2;
    if (row.length < MIN_COLUMNS) {
      logEvent("warn", "stores.row_skipped", { line, columns: row.length });
      return;
    }

    const storeNumber = cell(row, 0);
    const merchantId = cell(row, 1);
    const newId = cell(row, 2);
    const storeName = cell(row, 3);
    const priorInfRate = parsePriorInfRate(cell(row, 5));

    items.push({
      storeId: storeNumber || newId || merchantId,
      storeName,
      accountId: newId || merchantId,
      marketplaceId: cell(row, 4),
      ...(priorInfRate !== undefined ? { priorInfRate } : {})
    });
  });
  return items;
};

export class CsvStoreListSource implements JobSource {
  constructor(private readonly filePath: string) {}

  async loadJobs(): Promise<WorkItem[]> {
    const content = await readFile(this.filePath, "utf8");
    const items = parseStoreRows(content);
    logEvent("info", "stores.loaded", { file: this.filePath, stores: items.length });
    return items;
  }
}
