import { describe, expect, it } from "vitest";
import { payout, tables, tracking } from "../test/fixtures.js";
import { FixedRatioCost, PayoutBasedCost, resolveCampaignCost } from "./cost-model.js";

describe("FixedRatioCost", () => {
  it("takes the ratio of revenue", () => {
    expect(new FixedRatioCost(0.25).costOf(8000)).toBe(2000);
  });
});

describe("PayoutBasedCost", () => {
  const cost = new PayoutBasedCost([
    payout({ influencerId: "1", totalPayout: 300 }),
    payout({ influencerId: "1", totalPayout: 200 }),
    payout({ influencerId: "2", totalPayout: 1000 }),
  ]);

  it("sums payouts of the given influencers", () => {
    expect(cost.costOf(new Set(["1"]))).toBe(500);
    expect(cost.costOf(new Set(["1", "2"]))).toBe(1500);
  });

  it("returns null when no payout row matches", () => {
    expect(cost.costOf(new Set(["9"]))).toBeNull();
  });
});

describe("resolveCampaignCost", () => {
  it("uses payouts of tracked influencers when present", () => {
    const snapshot = tables({
      tracking: [tracking({ influencerId: "1", revenue: 4000 })],
      payouts: [payout({ influencerId: "1", totalPayout: 800 }), payout({ influencerId: "2", totalPayout: 5000 })],
    });
    expect(resolveCampaignCost(snapshot, 0.25)).toEqual({ strategy: "payout-based", totalCost: 800 });
  });

  it("falls back to the fixed ratio when payouts belong to untracked influencers", () => {
    const snapshot = tables({
      tracking: [tracking({ influencerId: "1", revenue: 4000 })],
      payouts: [payout({ influencerId: "2", totalPayout: 5000 })],
    });
    expect(resolveCampaignCost(snapshot, 0.25)).toEqual({ strategy: "fixed-ratio", totalCost: 1000 });
  });
});
