const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const numberOr = (value: unknown, fallback: number): number =>
  typeof value === "number" && Number.isFinite(value) ? value : fallback;

/**
 * Store-level late-pick rate from the per-shopper metrics listing: the
 * `MASTER` record for the store when present, else the orders-weighted
 * average of the store's shoppers, else 0.
 */
export const extractLatePickRate = (payload: unknown, storeName: string): number => {
  if (!Array.isArray(payload)) return 0;
  const rows = payload.filter(isRecord).filter((row) => {
    const merchantName = row.merchantName;
    return typeof merchantName === "string" && merchantName.includes(storeName);
  });

  const master = rows.find((row) => row.type === "MASTER");
  if (master) {
    return isRecord(master.metrics) ? numberOr(master.metrics.LatePicksRate, 0) : 0;
  }

  let totalOrders = 0;
  let weighted = 0;
  for (const row of rows) {
    if (!isRecord(row.metrics)) continue;
    const orders = numberOr(row.metrics.OrdersShopped_V2, 0) || numberOr(row.metrics.OrdersShopped, 0);
    if (orders <= 0) continue;
    totalOrders += orders;
    weighted += numberOr(row.metrics.LatePicksRate, 0) * orders;
  }
  return totalOrders > 0 ? weighted / totalOrders : 0;
};
