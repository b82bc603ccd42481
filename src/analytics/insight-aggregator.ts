import type { AnalyticsConfig } from "../config/index.js";
import type { CampaignTables, Influencer, Platform } from "../domain/entities/campaign.js";
import { FixedRatioCost } from "./cost-model.js";
import { compareInfluencerIds, compareText, groupInto, round2 } from "./grouping.js";
import { roiPercent } from "./metrics-calculator.js";
import {
  engagementRate,
  type InfluencerRoi,
  identifyPoorPerformers,
  type PoorPerformer,
  summarizeInfluencerRoi,
} from "./performance-ranker.js";
import { analyzeTrends, type Trends } from "./trend-analyzer.js";

export interface TopInfluencers {
  byRevenue: InfluencerRoi[];
  byRoi: InfluencerRoi[];
}

export interface PlatformInsight {
  platform: Platform;
  totalRevenue: number;
  totalOrders: number;
  /** Distinct influencers with tracking rows */
  influencerCount: number;
  avgRevenuePerInfluencer: number;
  /** Pooled over all posts published on the platform */
  avgEngagementRate: number;
  estimatedCost: number;
  avgRoi: number;
}

export interface CategoryPerformance {
  revenue: number;
  orders: number;
  avgRevenuePerPost: number;
  estimatedCost: number;
  avgRoi: number;
}

export interface CategoryInsight {
  category: string;
  influencerCount: number;
  avgFollowerCount: number;
  totalFollowers: number;
  /**
   * Roster rows in the category, one post slot per influencer. Post rows are
   * not consulted; `performance.avgRevenuePerPost` divides by this count.
   */
  totalPosts: number;
  /** null when the snapshot has no tracking rows */
  performance: CategoryPerformance | null;
}

export interface InsightReport {
  topInfluencers: TopInfluencers;
  platformAnalysis: PlatformInsight[];
  categoryAnalysis: CategoryInsight[];
  poorPerformers: PoorPerformer[];
  trends: Trends;
}

export function analyzeTopInfluencers(snapshot: CampaignTables, config: AnalyticsConfig): TopInfluencers {
  const rows = summarizeInfluencerRoi(snapshot, new FixedRatioCost(config.costRatio));
  const limit = config.topPerformerLimit;

  const byRevenue = [...rows]
    .sort((a, b) => b.revenue - a.revenue || compareInfluencerIds(a.influencerId, b.influencerId))
    .slice(0, limit);
  const byRoi = [...rows]
    .sort((a, b) => b.roi - a.roi || compareInfluencerIds(a.influencerId, b.influencerId))
    .slice(0, limit);

  return { byRevenue, byRoi };
}

/** Tracking rows joined to their influencer; rows with an unknown id drop out. */
function joinTracking(snapshot: CampaignTables) {
  const influencers = new Map(snapshot.influencers.map((i) => [i.id, i]));
  return snapshot.tracking.flatMap((t) => {
    const influencer = influencers.get(t.influencerId);
    return influencer ? [{ ...t, influencer }] : [];
  });
}

export function analyzePlatforms(snapshot: CampaignTables, config: AnalyticsConfig): PlatformInsight[] {
  if (snapshot.tracking.length === 0 || snapshot.influencers.length === 0) return [];

  const cost = new FixedRatioCost(config.costRatio);
  const platforms = groupInto(
    joinTracking(snapshot),
    (row) => row.influencer.platform,
    (row) => ({ platform: row.influencer.platform, revenue: 0, orders: 0, influencerIds: new Set<string>() }),
    (acc, row) => {
      acc.revenue += row.revenue;
      acc.orders += row.orders;
      acc.influencerIds.add(row.influencerId);
    },
  );

  const engagement = groupInto(
    snapshot.posts,
    (p) => p.platform,
    () => ({ reach: 0, likes: 0, comments: 0 }),
    (acc, p) => {
      acc.reach += p.reach;
      acc.likes += p.likes;
      acc.comments += p.comments;
    },
  );

  return [...platforms.values()]
    .map((p): PlatformInsight => {
      const estimatedCost = cost.costOf(p.revenue);
      const posts = engagement.get(p.platform);
      return {
        platform: p.platform,
        totalRevenue: p.revenue,
        totalOrders: p.orders,
        influencerCount: p.influencerIds.size,
        avgRevenuePerInfluencer: round2(p.revenue / p.influencerIds.size),
        avgEngagementRate: posts ? engagementRate(posts) : 0,
        estimatedCost,
        avgRoi: roiPercent(p.revenue, estimatedCost),
      };
    })
    .sort((a, b) => compareText(a.platform, b.platform));
}

export function analyzeCategories(snapshot: CampaignTables, config: AnalyticsConfig): CategoryInsight[] {
  if (snapshot.influencers.length === 0) return [];

  const cost = new FixedRatioCost(config.costRatio);

  const roster = groupInto(
    snapshot.influencers,
    (i) => i.category,
    (): Influencer[] => [],
    (acc, i) => {
      acc.push(i);
    },
  );

  const sales = groupInto(
    joinTracking(snapshot),
    (row) => row.influencer.category,
    () => ({ revenue: 0, orders: 0 }),
    (acc, row) => {
      acc.revenue += row.revenue;
      acc.orders += row.orders;
    },
  );
  const hasTracking = snapshot.tracking.length > 0;

  return [...roster.entries()]
    .map(([category, members]): CategoryInsight => {
      const totalFollowers = members.reduce((sum, i) => sum + i.followerCount, 0);
      const totalPosts = members.length;

      let performance: CategoryPerformance | null = null;
      if (hasTracking) {
        const { revenue, orders } = sales.get(category) ?? { revenue: 0, orders: 0 };
        const estimatedCost = cost.costOf(revenue);
        performance = {
          revenue,
          orders,
          avgRevenuePerPost: totalPosts > 0 ? revenue / totalPosts : 0,
          estimatedCost,
          avgRoi: roiPercent(revenue, estimatedCost),
        };
      }

      return {
        category,
        influencerCount: members.length,
        avgFollowerCount: round2(totalFollowers / members.length),
        totalFollowers,
        totalPosts,
        performance,
      };
    })
    .sort((a, b) => compareText(a.category, b.category));
}

/**
 * One report over a snapshot. The five parts read the same immutable tables
 * and none depends on another's output; each is empty when its input is.
 */
export function generateInsights(snapshot: CampaignTables, config: AnalyticsConfig): InsightReport {
  return {
    topInfluencers: analyzeTopInfluencers(snapshot, config),
    platformAnalysis: analyzePlatforms(snapshot, config),
    categoryAnalysis: analyzeCategories(snapshot, config),
    poorPerformers: identifyPoorPerformers(snapshot, config),
    trends: analyzeTrends(snapshot.tracking),
  };
}
