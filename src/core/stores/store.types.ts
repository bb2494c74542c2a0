export type WorkItem = Readonly<{
  storeId: string;
  storeName: string;
  /** Portal account (merchant) identifier. */
  accountId: string;
  /** Portal marketplace identifier. */
  marketplaceId: string;
  /** Item-not-found rate from an earlier run, used only to order jobs. */
  priorInfRate?: number;
}>;

export type RawMetricsBlob = {
  timeAvailableMs: number;
  timeAvailableHours: number;
  acceptanceRate: number;
  rejectionRate: number;
  replacementRate: number;
  availabilityPercent: number;
  utilizedPercent: number;
  abandonmentRate: number;
  averageOrderTimeSec: number;
  pickTimeSec: number;
};

export type CollectionResult = {
  storeId: string;
  storeName: string;
  orders: number;
  units: number;
  fulfilledUnits: number;
  unitsPerHour: number;
  itemNotFoundRate: number;
  foundRate: number;
  cancelledUnits: number;
  latePickRate: number;
  /** Hours and minutes, `H:MM`. */
  availableTime: string;
  raw?: RawMetricsBlob;
};

export const submissionFields = [
  "store",
  "orders",
  "units",
  "fulfilled",
  "uph",
  "inf",
  "found",
  "cancelled",
  "lates",
  "time_available"
] as const;

export type SubmissionField = (typeof submissionFields)[number];

export type SubmissionRecord = Record<SubmissionField, string>;
