import {
  formatAvailableTime,
  InvalidStoreMetricsError,
  toSubmissionRecord,
  transformStoreMetrics
} from "../../src/core/stores/transformStoreMetrics";
import { makeItem } from "../helpers/fixtures";

describe("transformStoreMetrics", () => {
  it("maps the summation payload onto a result", () => {
    const result = transformStoreMetrics(
      {
        OrdersShopped_V2: 42,
        RequestedQuantity_V2: 510.9,
        PickedUnits_V2: "498",
        AverageUPH_V2: 87.6,
        ItemNotFoundRate_V2: 1.25,
        ItemFoundRate_V2: 98.75,
        ShortedUnits_V2: 3,
        TimeAvailable_V2: 23_400_000,
        AcceptanceRate_V2: 99
      },
      makeItem("Leeds"),
      2.44
    );

    expect(result).toMatchObject({
      storeId: "id-Leeds",
      storeName: "Leeds",
      orders: 42,
      units: 510,
      fulfilledUnits: 498,
      unitsPerHour: 87.6,
      itemNotFoundRate: 1.25,
      foundRate: 98.75,
      cancelledUnits: 3,
      latePickRate: 2.44,
      availableTime: "6:30"
    });
    expect(result.raw?.acceptanceRate).toBe(99);
    expect(result.raw?.timeAvailableHours).toBe(6.5);
  });

  it("defaults missing and malformed fields to zero", () => {
    const result = transformStoreMetrics({ OrdersShopped_V2: "n/a", AverageUPH_V2: null }, makeItem("York"));
    expect(result.orders).toBe(0);
    expect(result.unitsPerHour).toBe(0);
    expect(result.latePickRate).toBe(0);
    expect(result.availableTime).toBe("0:00");
  });

  it.each([null, [], "text"])("rejects a non-object payload: %p", (payload) => {
    expect(() => transformStoreMetrics(payload, makeItem("Hull"))).toThrow(InvalidStoreMetricsError);
  });

  it("formats available time as hours and zero-padded minutes", () => {
    expect(formatAvailableTime(0)).toBe("0:00");
    expect(formatAvailableTime(59_999)).toBe("0:00");
    expect(formatAvailableTime(3_660_000)).toBe("1:01");
    expect(formatAvailableTime(45 * 3_600_000 + 5 * 60_000)).toBe("45:05");
  });

  it("renders the submission record", () => {
    const result = transformStoreMetrics(
      { OrdersShopped_V2: 5, RequestedQuantity_V2: 50, PickedUnits_V2: 49, AverageUPH_V2: 79.5, ItemNotFoundRate_V2: 2, ItemFoundRate_V2: 98, ShortedUnits_V2: 1, TimeAvailable_V2: 5_400_000 },
      makeItem("Bury"),
      3.04
    );
    expect(toSubmissionRecord(result)).toEqual({
      store: "Bury",
      orders: "5",
      units: "50",
      fulfilled: "49",
      uph: "80",
      inf: "2.0 %",
      found: "98.0 %",
      cancelled: "1",
      lates: "3.0 %",
      time_available: "1:30"
    });
  });
});
