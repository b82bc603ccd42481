import type { AnalyticsConfig } from "../config/index.js";
import type { CampaignTables, Influencer, Platform, Post, TrackingRecord } from "../domain/entities/campaign.js";
import { FixedRatioCost } from "./cost-model.js";
import { compareInfluencerIds, groupInto } from "./grouping.js";
import { roiPercent } from "./metrics-calculator.js";

interface InfluencerTotals {
  influencerId: string;
  revenue: number;
  orders: number;
}

interface EngagementTotals {
  reach: number;
  likes: number;
  comments: number;
}

/**
 * One ranked influencer. Attributes from the influencer table are null when
 * the tracking rows reference an unknown id; engagement fields are null when
 * the influencer has no posts in the snapshot.
 */
export interface TopPerformer {
  influencerId: string;
  name: string | null;
  platform: Platform | null;
  category: string | null;
  followerCount: number | null;
  revenue: number;
  orders: number;
  reach: number | null;
  likes: number | null;
  comments: number | null;
  engagementRate: number | null;
  /** null when followerCount is unknown or 0 */
  revenuePerFollower: number | null;
  /** orders / reach; null when reach is unknown or 0 */
  ordersPerPost: number | null;
}

export interface InfluencerRoi {
  influencerId: string;
  name: string | null;
  platform: Platform | null;
  revenue: number;
  orders: number;
  cost: number;
  roi: number;
}

export type PoorPerformanceReason =
  | "Low revenue generation"
  | "Low order conversion"
  | "Very low ROI"
  | "Below benchmark ROI";

export interface PoorPerformer extends InfluencerRoi {
  reason: PoorPerformanceReason;
}

export function totalsByInfluencer(tracking: readonly TrackingRecord[]): InfluencerTotals[] {
  const groups = groupInto(
    tracking,
    (t) => t.influencerId,
    (t): InfluencerTotals => ({ influencerId: t.influencerId, revenue: 0, orders: 0 }),
    (acc, t) => {
      acc.revenue += t.revenue;
      acc.orders += t.orders;
    },
  );
  return [...groups.values()];
}

export function engagementByInfluencer(posts: readonly Post[]): Map<string, EngagementTotals> {
  return groupInto(
    posts,
    (p) => p.influencerId,
    (): EngagementTotals => ({ reach: 0, likes: 0, comments: 0 }),
    (acc, p) => {
      acc.reach += p.reach;
      acc.likes += p.likes;
      acc.comments += p.comments;
    },
  );
}

/** (likes + comments) / reach × 100, or 0 with no reach. */
export function engagementRate({ reach, likes, comments }: EngagementTotals): number {
  return reach > 0 ? ((likes + comments) / reach) * 100 : 0;
}

function ratioOrNull(numerator: number, denominator: number | null): number | null {
  return denominator === null || denominator === 0 ? null : numerator / denominator;
}

function indexInfluencers(influencers: readonly Influencer[]): Map<string, Influencer> {
  return new Map(influencers.map((i) => [i.id, i]));
}

/** Revenue descending; equal revenue falls back to ascending influencer id. */
function byRevenueDesc(a: { revenue: number; influencerId: string }, b: { revenue: number; influencerId: string }) {
  return b.revenue - a.revenue || compareInfluencerIds(a.influencerId, b.influencerId);
}

export function getTopPerformers(
  snapshot: CampaignTables,
  config: AnalyticsConfig,
  limit: number = config.topPerformerLimit,
): TopPerformer[] {
  if (snapshot.tracking.length === 0 || snapshot.influencers.length === 0) return [];

  const influencers = indexInfluencers(snapshot.influencers);
  const engagement = snapshot.posts.length > 0 ? engagementByInfluencer(snapshot.posts) : null;

  const performers = totalsByInfluencer(snapshot.tracking).map((totals): TopPerformer => {
    const influencer = influencers.get(totals.influencerId);
    const posts = engagement?.get(totals.influencerId);
    const followerCount = influencer?.followerCount ?? null;
    const reach = posts?.reach ?? null;

    return {
      influencerId: totals.influencerId,
      name: influencer?.name ?? null,
      platform: influencer?.platform ?? null,
      category: influencer?.category ?? null,
      followerCount,
      revenue: totals.revenue,
      orders: totals.orders,
      reach,
      likes: posts?.likes ?? null,
      comments: posts?.comments ?? null,
      engagementRate: posts ? engagementRate(posts) : null,
      revenuePerFollower: ratioOrNull(totals.revenue, followerCount),
      ordersPerPost: ratioOrNull(totals.orders, reach),
    };
  });

  return performers.sort(byRevenueDesc).slice(0, Math.max(0, Math.floor(limit)));
}

/**
 * Revenue, orders, cost and ROI per influencer, in first-seen order. Empty
 * unless both tracking and influencer rows are present.
 */
export function summarizeInfluencerRoi(snapshot: CampaignTables, cost: FixedRatioCost): InfluencerRoi[] {
  if (snapshot.tracking.length === 0 || snapshot.influencers.length === 0) return [];

  const influencers = indexInfluencers(snapshot.influencers);
  return totalsByInfluencer(snapshot.tracking).map((totals) => {
    const influencer = influencers.get(totals.influencerId);
    const influencerCost = cost.costOf(totals.revenue);
    return {
      influencerId: totals.influencerId,
      name: influencer?.name ?? null,
      platform: influencer?.platform ?? null,
      revenue: totals.revenue,
      orders: totals.orders,
      cost: influencerCost,
      roi: roiPercent(totals.revenue, influencerCost),
    };
  });
}

/** First matching rule wins; the order of the checks is the priority. */
export function classifyPoorPerformance(
  performance: { revenue: number; orders: number; roi: number },
  thresholds: AnalyticsConfig["poorPerformance"],
): PoorPerformanceReason {
  if (performance.revenue < thresholds.lowRevenue) return "Low revenue generation";
  if (performance.orders < thresholds.lowOrders) return "Low order conversion";
  if (performance.roi < thresholds.veryLowRoi) return "Very low ROI";
  return "Below benchmark ROI";
}

/**
 * Influencers whose ROI is under the benchmark, worst first. Cost is always
 * the fixed-ratio model here, whatever payout data the snapshot carries.
 */
export function identifyPoorPerformers(snapshot: CampaignTables, config: AnalyticsConfig): PoorPerformer[] {
  return summarizeInfluencerRoi(snapshot, new FixedRatioCost(config.costRatio))
    .filter((row) => row.roi < config.benchmarkRoi)
    .map((row) => ({ ...row, reason: classifyPoorPerformance(row, config.poorPerformance) }))
    .sort((a, b) => a.roi - b.roi || compareInfluencerIds(a.influencerId, b.influencerId));
}
