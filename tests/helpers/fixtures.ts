import type { RunSummary } from "../../src/core/run/runSummary";
import type { CollectionResult, WorkItem } from "../../src/core/stores/store.types";

export const makeItem = (name: string, overrides: Partial<WorkItem> = {}): WorkItem => ({
  storeId: `id-${name}`,
  storeName: name,
  accountId: `acct-${name}`,
  marketplaceId: "mk-1",
  ...overrides
});

export const makeResult = (name: string, overrides: Partial<CollectionResult> = {}): CollectionResult => ({
  storeId: `id-${name}`,
  storeName: name,
  orders: 10,
  units: 100,
  fulfilledUnits: 95,
  unitsPerHour: 90,
  itemNotFoundRate: 1.5,
  foundRate: 98.5,
  cancelledUnits: 2,
  latePickRate: 0.5,
  availableTime: "6:30",
  ...overrides
});

export const silenceConsole = (): jest.SpyInstance[] => [
  jest.spyOn(console, "log").mockImplementation(() => undefined),
  jest.spyOn(console, "warn").mockImplementation(() => undefined),
  jest.spyOn(console, "error").mockImplementation(() => undefined)
];

export const makeSummary = (overrides: Partial<RunSummary> = {}): RunSummary => ({
  total: 4,
  succeeded: 3,
  failed: 1,
  successRate: 75,
  elapsedMs: 120_000,
  storesPerMinute: 1.5,
  averageCollectionMs: 850,
  p95CollectionMs: 1400,
  averageSubmissionMs: 300,
  bottleneck: "balanced",
  retries: 2,
  retriedStores: 1,
  totalOrders: 30,
  totalUnits: 300,
  failures: ["York (Fail)"],
  ...overrides
});
