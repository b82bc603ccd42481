import { describe, expect, it } from "vitest";
import { DEFAULT_ANALYTICS_CONFIG } from "../config/index.js";
import { payout, tables, tracking } from "../test/fixtures.js";
import { calculateRoiRoas, roasOf, roiPercent } from "./metrics-calculator.js";

describe("roiPercent / roasOf", () => {
  it("return 0 when there is no cost", () => {
    expect(roiPercent(500, 0)).toBe(0);
    expect(roasOf(500, 0)).toBe(0);
  });

  it("floor the denominator at 1", () => {
    expect(roiPercent(10, 0.5)).toBe(950);
    expect(roasOf(10, 0.5)).toBe(10);
  });
});

describe("calculateRoiRoas", () => {
  it("reports the negative benchmarks for empty tracking", () => {
    expect(calculateRoiRoas(tables(), DEFAULT_ANALYTICS_CONFIG)).toEqual({
      avgRoi: 0,
      avgRoas: 0,
      roiChange: -200,
      roasChange: -4,
      totalRevenue: 0,
      totalCost: 0,
      costStrategy: null,
    });
  });

  it("costs revenue at the fixed ratio without payouts", () => {
    const snapshot = tables({
      tracking: [
        tracking({ influencerId: "A", revenue: 5000, orders: 50 }),
        tracking({ influencerId: "B", revenue: 3000, orders: 20 }),
      ],
    });
    expect(calculateRoiRoas(snapshot, DEFAULT_ANALYTICS_CONFIG)).toEqual({
      avgRoi: 300,
      avgRoas: 4,
      roiChange: 100,
      roasChange: 0,
      totalRevenue: 8000,
      totalCost: 2000,
      costStrategy: "fixed-ratio",
    });
  });

  it("costs revenue from payouts when tracked influencers have them", () => {
    const snapshot = tables({
      tracking: [tracking({ influencerId: "A", revenue: 6000 })],
      payouts: [payout({ influencerId: "A", totalPayout: 1500 })],
    });
    const metrics = calculateRoiRoas(snapshot, DEFAULT_ANALYTICS_CONFIG);
    expect(metrics.costStrategy).toBe("payout-based");
    expect(metrics.totalCost).toBe(1500);
    expect(metrics.avgRoi).toBe(300);
    expect(metrics.avgRoas).toBe(4);
  });

  it("reports zero ROI when every tracked row has zero revenue", () => {
    const metrics = calculateRoiRoas(tables({ tracking: [tracking({ revenue: 0 })] }), DEFAULT_ANALYTICS_CONFIG);
    expect(metrics.avgRoi).toBe(0);
    expect(metrics.avgRoas).toBe(0);
    expect(metrics.roiChange).toBe(-200);
  });
});
