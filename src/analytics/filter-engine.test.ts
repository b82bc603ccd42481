import { describe, expect, it } from "vitest";
import { influencer, payout, post, tables, tracking } from "../test/fixtures.js";
import { applyFilters, dateRangePredicate } from "./filter-engine.js";
import { NO_FILTER } from "./types.js";

const snapshot = tables({
  influencers: [
    influencer({ id: "1", platform: "Instagram", category: "Fitness" }),
    influencer({ id: "2", platform: "YouTube", category: "Fitness" }),
    influencer({ id: "3", platform: "Instagram", category: "Beauty" }),
  ],
  posts: [
    post({ influencerId: "1", date: "2024-01-05" }),
    post({ influencerId: "2", date: "2024-01-10" }),
    post({ influencerId: "3", date: "2024-02-01" }),
  ],
  tracking: [
    tracking({ influencerId: "1", campaign: "Protein Push", date: "2024-01-05" }),
    tracking({ influencerId: "1", campaign: "Winter Bulk", date: "2024-01-31" }),
    tracking({ influencerId: "2", campaign: "Protein Push", date: "2024-01-10" }),
    tracking({ influencerId: "3", campaign: "Glow", date: "2024-02-01" }),
  ],
  payouts: [payout({ influencerId: "1" }), payout({ influencerId: "3" })],
});

describe("applyFilters", () => {
  it("returns equal tables in fresh arrays when nothing is filtered", () => {
    const result = applyFilters(snapshot, NO_FILTER);
    expect(result).toEqual(snapshot);
    expect(result.influencers).not.toBe(snapshot.influencers);
    expect(result.tracking).not.toBe(snapshot.tracking);
  });

  it("treats an omitted filter like NO_FILTER", () => {
    expect(applyFilters(snapshot)).toEqual(snapshot);
  });

  it("restricts all four tables to the platform's influencers", () => {
    const result = applyFilters(snapshot, { platform: "Instagram" });
    expect(result.influencers.map((i) => i.id)).toEqual(["1", "3"]);
    expect(result.posts.map((p) => p.influencerId)).toEqual(["1", "3"]);
    expect(result.tracking.map((t) => t.influencerId)).toEqual(["1", "1", "3"]);
    expect(result.payouts.map((p) => p.influencerId)).toEqual(["1", "3"]);
  });

  it("combines platform and category conjunctively", () => {
    const result = applyFilters(snapshot, { platform: "Instagram", category: "Fitness" });
    expect(result.influencers.map((i) => i.id)).toEqual(["1"]);
    expect(result.tracking).toHaveLength(2);
    expect(result.payouts.map((p) => p.influencerId)).toEqual(["1"]);
  });

  it("yields empty tables when platform and category do not intersect", () => {
    const result = applyFilters(snapshot, { platform: "YouTube", category: "Beauty" });
    expect(result).toEqual(tables());
  });

  it("narrows only tracking by brand", () => {
    const result = applyFilters(snapshot, { brand: "Protein Push" });
    expect(result.tracking.map((t) => t.influencerId)).toEqual(["1", "2"]);
    expect(result.influencers).toHaveLength(3);
    expect(result.posts).toHaveLength(3);
    expect(result.payouts).toHaveLength(2);
  });

  it("keeps rows on both ends of the date range", () => {
    const result = applyFilters(snapshot, { dateRange: ["2024-01-05", "2024-01-31"] });
    expect(result.tracking.map((t) => t.date)).toEqual(["2024-01-05", "2024-01-31", "2024-01-10"]);
    expect(result.posts.map((p) => p.date)).toEqual(["2024-01-05", "2024-01-10"]);
    expect(result.influencers).toHaveLength(3);
    expect(result.payouts).toHaveLength(2);
  });

  it("matches nothing for a reversed date range", () => {
    const result = applyFilters(snapshot, { dateRange: ["2024-02-01", "2024-01-01"] });
    expect(result.posts).toEqual([]);
    expect(result.tracking).toEqual([]);
  });

  it("drops every dated row when the date range does not parse", () => {
    const result = applyFilters(snapshot, { dateRange: ["", "garbage"] });
    expect(result.posts).toEqual([]);
    expect(result.tracking).toEqual([]);
    expect(result.influencers).toHaveLength(3);
  });

  it("is idempotent", () => {
    const filter = { platform: "Instagram", brand: "Protein Push", dateRange: ["2024-01-01", "2024-01-31"] } as const;
    const once = applyFilters(snapshot, filter);
    expect(applyFilters(once, filter)).toEqual(once);
  });

  it("handles empty input", () => {
    expect(applyFilters(tables(), { platform: "TikTok", category: "Food" })).toEqual(tables());
  });
});

describe("dateRangePredicate", () => {
  it("rejects dates that do not parse", () => {
    const inRange = dateRangePredicate(["2024-01-01", "2024-12-31"]);
    expect(inRange("not-a-date")).toBe(false);
    expect(inRange("2024-06-15")).toBe(true);
  });

  it("matches nothing when a bound does not parse", () => {
    expect(dateRangePredicate(["", "garbage"])("2024-03-01")).toBe(false);
    expect(dateRangePredicate(["2024-01-01", "31/12/2024"])("2024-03-01")).toBe(false);
  });
});
