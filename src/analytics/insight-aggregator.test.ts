import { describe, expect, it } from "vitest";
import { DEFAULT_ANALYTICS_CONFIG } from "../config/index.js";
import { influencer, post, tables, tracking } from "../test/fixtures.js";
import { analyzeCategories, analyzePlatforms, analyzeTopInfluencers, generateInsights } from "./insight-aggregator.js";

const config = DEFAULT_ANALYTICS_CONFIG;

const snapshot = tables({
  influencers: [
    influencer({ id: "1", platform: "Instagram", category: "Fitness", followerCount: 1000 }),
    influencer({ id: "2", platform: "YouTube", category: "Fitness", followerCount: 3000 }),
    influencer({ id: "3", platform: "Instagram", category: "Beauty", followerCount: 500 }),
  ],
  posts: [
    post({ influencerId: "1", platform: "Instagram", reach: 1000, likes: 200, comments: 50 }),
    post({ influencerId: "3", platform: "Instagram", reach: 1000, likes: 150, comments: 100 }),
    post({ influencerId: "2", platform: "YouTube", reach: 2000, likes: 400, comments: 100 }),
  ],
  tracking: [
    tracking({ influencerId: "1", revenue: 4000, orders: 10 }),
    tracking({ influencerId: "1", revenue: 2000, orders: 5 }),
    tracking({ influencerId: "2", revenue: 3000, orders: 6 }),
    tracking({ influencerId: "3", revenue: 1000, orders: 2 }),
    tracking({ influencerId: "99", revenue: 700, orders: 1 }),
  ],
});

describe("analyzePlatforms", () => {
  it("rolls tracking up by the influencer's platform, dropping unknown ids", () => {
    expect(analyzePlatforms(snapshot, config)).toEqual([
      {
        platform: "Instagram",
        totalRevenue: 7000,
        totalOrders: 17,
        influencerCount: 2,
        avgRevenuePerInfluencer: 3500,
        avgEngagementRate: 25,
        estimatedCost: 1750,
        avgRoi: 300,
      },
      {
        platform: "YouTube",
        totalRevenue: 3000,
        totalOrders: 6,
        influencerCount: 1,
        avgRevenuePerInfluencer: 3000,
        avgEngagementRate: 25,
        estimatedCost: 750,
        avgRoi: 300,
      },
    ]);
  });

  it("reports 0 engagement for a platform without posts", () => {
    const [instagram] = analyzePlatforms({ ...snapshot, posts: [] }, config);
    expect(instagram?.avgEngagementRate).toBe(0);
  });

  it("is empty without influencers", () => {
    expect(analyzePlatforms({ ...snapshot, influencers: [] }, config)).toEqual([]);
  });
});

describe("analyzeCategories", () => {
  it("combines roster, post counts and sales per category", () => {
    expect(analyzeCategories(snapshot, config)).toEqual([
      {
        category: "Beauty",
        influencerCount: 1,
        avgFollowerCount: 500,
        totalFollowers: 500,
        totalPosts: 1,
        performance: { revenue: 1000, orders: 2, avgRevenuePerPost: 1000, estimatedCost: 250, avgRoi: 300 },
      },
      {
        category: "Fitness",
        influencerCount: 2,
        avgFollowerCount: 2000,
        totalFollowers: 4000,
        totalPosts: 2,
        performance: { revenue: 9000, orders: 21, avgRevenuePerPost: 4500, estimatedCost: 2250, avgRoi: 300 },
      },
    ]);
  });

  it("counts one post slot per roster member, whatever the post table holds", () => {
    const extraPosts = [...snapshot.posts, post({ influencerId: "1" }), post({ influencerId: "1" })];
    for (const posts of [[], extraPosts]) {
      const categories = analyzeCategories({ ...snapshot, posts }, config);
      expect(categories.map((c) => [c.category, c.totalPosts, c.performance?.avgRevenuePerPost])).toEqual([
        ["Beauty", 1, 1000],
        ["Fitness", 2, 4500],
      ]);
    }
  });

  it("leaves performance null without tracking rows", () => {
    const categories = analyzeCategories({ ...snapshot, tracking: [] }, config);
    expect(categories.map((c) => c.performance)).toEqual([null, null]);
    expect(categories.map((c) => c.totalPosts)).toEqual([1, 2]);
  });

  it("gives a category with no sales zero performance", () => {
    const categories = analyzeCategories({ ...snapshot, tracking: [tracking({ influencerId: "2", revenue: 800 })] }, config);
    expect(categories[0]?.performance).toEqual({
      revenue: 0,
      orders: 0,
      avgRevenuePerPost: 0,
      estimatedCost: 0,
      avgRoi: 0,
    });
  });
});

describe("analyzeTopInfluencers", () => {
  it("ranks by revenue and by ROI, keeping unknown ids with null attributes", () => {
    const { byRevenue, byRoi } = analyzeTopInfluencers(snapshot, config);
    expect(byRevenue.map((r) => [r.influencerId, r.revenue])).toEqual([
      ["1", 6000],
      ["2", 3000],
      ["3", 1000],
      ["99", 700],
    ]);
    expect(byRevenue[3]?.name).toBeNull();
    expect(byRoi.map((r) => r.influencerId)).toEqual(["1", "2", "3", "99"]);
  });

  it("caps both lists at topPerformerLimit", () => {
    const { byRevenue, byRoi } = analyzeTopInfluencers(snapshot, { ...config, topPerformerLimit: 2 });
    expect(byRevenue).toHaveLength(2);
    expect(byRoi).toHaveLength(2);
  });
});

describe("generateInsights", () => {
  it("returns every part empty for empty tables", () => {
    expect(generateInsights(tables(), config)).toEqual({
      topInfluencers: { byRevenue: [], byRoi: [] },
      platformAnalysis: [],
      categoryAnalysis: [],
      poorPerformers: [],
      trends: { daily: [], weekly: [] },
    });
  });

  it("includes trends and poor performers over the same snapshot", () => {
    const report = generateInsights(snapshot, { ...config, costRatio: 0.5 });
    expect(report.trends.daily).toEqual([{ date: "2024-03-01", revenue: 10_700, orders: 24 }]);
    expect(report.poorPerformers.map((p) => p.influencerId)).toEqual(["1", "2", "3", "99"]);
  });
});
