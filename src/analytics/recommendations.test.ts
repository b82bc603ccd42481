import { describe, expect, it } from "vitest";
import { DEFAULT_ANALYTICS_CONFIG } from "../config/index.js";
import { influencer, payout, post, tables, tracking } from "../test/fixtures.js";
import { buildRecommendations, DEFAULT_RECOMMENDATIONS, NO_DATA_RECOMMENDATION } from "./recommendations.js";

const config = DEFAULT_ANALYTICS_CONFIG;

describe("buildRecommendations", () => {
  it("asks for data when there is no tracking", () => {
    expect(buildRecommendations(tables(), config)).toEqual([NO_DATA_RECOMMENDATION]);
  });

  it("falls back to the defaults when no rule fires", () => {
    const snapshot = tables({
      tracking: [
        tracking({ campaign: "A", revenue: 3000, orders: 2 }),
        tracking({ campaign: "B", revenue: 3000, orders: 2 }),
        tracking({ campaign: "C", revenue: 3000, orders: 2 }),
      ],
    });
    expect(buildRecommendations(snapshot, config)).toEqual(DEFAULT_RECOMMENDATIONS);
  });

  it("names the platform with the highest revenue", () => {
    const snapshot = tables({
      influencers: [influencer({ id: "1", platform: "Instagram" }), influencer({ id: "2", platform: "YouTube" })],
      tracking: [
        tracking({ influencerId: "1", campaign: "A", revenue: 3000, orders: 2 }),
        tracking({ influencerId: "1", campaign: "B", revenue: 3000, orders: 2 }),
        tracking({ influencerId: "2", campaign: "C", revenue: 3000, orders: 2 }),
      ],
    });
    expect(buildRecommendations(snapshot, config)).toEqual([
      "Focus investment on Instagram as it generates the highest revenue (₹6,000)",
    ]);
  });

  it("fires every rule in priority order", () => {
    const january = Array.from({ length: 20 }, () =>
      tracking({ campaign: "Solo", date: "2024-01-10", revenue: 100, orders: 1 }),
    );
    const february = Array.from({ length: 11 }, () =>
      tracking({ campaign: "Solo", date: "2024-02-10", revenue: 200, orders: 1 }),
    );
    const snapshot = tables({
      influencers: [influencer({ id: "1", platform: "Instagram" })],
      posts: [post({ reach: 1000, likes: 5, comments: 5 })],
      tracking: [...january, ...february],
      payouts: [payout({ influencerId: "1", totalPayout: 4000 })],
    });

    expect(buildRecommendations(snapshot, config)).toEqual([
      "Focus investment on Instagram as it generates the highest revenue (₹4,200)",
      "Consider optimizing campaign costs as ROI is below industry standards (target: >200%)",
      "Work on content strategy to improve engagement rates (currently below 2%)",
      "Focus on promoting higher-value products to increase average order value",
      "Month 2 shows peak performance - plan major campaigns during similar periods",
      "Consider diversifying campaigns across more brands/products to reduce risk",
    ]);
  });

  it("praises high ROI, engagement and order value", () => {
    const snapshot = tables({
      posts: [post({ reach: 100, likes: 8, comments: 2 })],
      tracking: [
        tracking({ campaign: "A", revenue: 5000, orders: 1 }),
        tracking({ campaign: "B", revenue: 5000, orders: 1 }),
        tracking({ campaign: "C", revenue: 5000, orders: 1 }),
      ],
    });
    expect(buildRecommendations(snapshot, { ...config, costRatio: 0.2 })).toEqual([
      "Excellent ROI performance! Consider scaling successful campaigns",
      "High engagement rates detected! Leverage successful content formats",
      "Strong average order value! Consider expanding premium product campaigns",
    ]);
  });
});
