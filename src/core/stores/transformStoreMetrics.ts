import type { CollectionResult, RawMetricsBlob, SubmissionRecord, WorkItem } from "./store.types";

export type RawStoreMetrics = Record<string, unknown>;

export class InvalidStoreMetricsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidStoreMetricsError";
  }
}

const isRawStoreMetrics = (value: unknown): value is RawStoreMetrics =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const readNumber = (raw: RawStoreMetrics, key: string): number => {
  const value = raw[key];
  if (typeof value === "number") return Number.isFinite(value) ? value : 0;
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : 0;
  }
  return 0;
};

const readCount = (raw: RawStoreMetrics, key: string): number => Math.trunc(readNumber(raw, key));

export const formatAvailableTime = (milliseconds: number): string => {
  const totalSeconds = Math.trunc(milliseconds / 1000);
  const totalMinutes = Math.floor(Math.abs(totalSeconds) / 60);
  const hours = Math.floor(totalMinutes / 60);
  const minutes = totalMinutes % 60;
  return `${hours}:${String(minutes).padStart(2, "0")}`;
};

/**
 * Maps a summation-metrics payload onto a result. Missing or malformed
 * fields become zero; only a non-object payload is rejected.
 */
export const transformStoreMetrics = (
  raw: unknown,
  item: WorkItem,
  latePickRate = 0
): CollectionResult => {
  if (!isRawStoreMetrics(raw)) {
    throw new InvalidStoreMetricsError(`Invalid metrics payload for ${item.storeName}: expected an object`);
  }
  const record = raw;
  const timeAvailableMs = readNumber(record, "TimeAvailable_V2");

  const blob: RawMetricsBlob = {
    timeAvailableMs,
    timeAvailableHours: timeAvailableMs / 3_600_000,
    acceptanceRate: readNumber(record, "AcceptanceRate_V2"),
    rejectionRate: readNumber(record, "RejectionRate_V2"),
    replacementRate: readNumber(record, "ReplacementRate_V2"),
    availabilityPercent: readNumber(record, "AvailabilityPercent_V2"),
    utilizedPercent: readNumber(record, "UtilizedPercent_V2"),
    abandonmentRate: readNumber(record, "AbandonmentRate_V2"),
    averageOrderTimeSec: readNumber(record, "AverageOrderTime_V2"),
    pickTimeSec: readNumber(record, "PickTimeInSec_V2")
  };

  return {
    storeId: item.storeId,
    storeName: item.storeName,
    orders: readCount(record, "OrdersShopped_V2"),
    units: readCount(record, "RequestedQuantity_V2"),
    fulfilledUnits: readCount(record, "PickedUnits_V2"),
    unitsPerHour: readNumber(record, "AverageUPH_V2"),
    itemNotFoundRate: readNumber(record, "ItemNotFoundRate_V2"),
    foundRate: readNumber(record, "ItemFoundRate_V2"),
    cancelledUnits: readCount(record, "ShortedUnits_V2"),
    latePickRate: Number.isFinite(latePickRate) ? latePickRate : 0,
    availableTime: formatAvailableTime(timeAvailableMs),
    raw: blob
  };
};

const percent = (value: number): string => `${value.toFixed(1)} %`;

export const toSubmissionRecord = (result: CollectionResult): SubmissionRecord => ({
  store: result.storeName,
  orders: String(result.orders),
  units: String(result.units),
  fulfilled: String(result.fulfilledUnits),
  uph: result.unitsPerHour.toFixed(0),
  inf: percent(result.itemNotFoundRate),
  found: percent(result.foundRate),
  cancelled: String(result.cancelledUnits),
  lates: percent(result.latePickRate),
  time_available: result.availableTime
});
