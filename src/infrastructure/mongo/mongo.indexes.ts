import type { CreateIndexesOptions, IndexSpecification } from "mongodb";

export type IndexPlan = { keys: IndexSpecification; options: CreateIndexesOptions };

/**
 * Index plan for the metrics archive:
 * - unique: { storeId: 1, runDate: 1 } (one document per store per reporting day)
 * - { runDate: 1 } for day-level reads
 */
export const mongoIndexes: { storeMetricsCollection: IndexPlan[] } = {
  storeMetricsCollection: [
    { keys: { storeId: 1, runDate: 1 }, options: { unique: true } },
    { keys: { runDate: 1 }, options: {} }
  ]
};
