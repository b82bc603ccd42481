import { compareText, groupInto, round2, sumBy } from "../analytics/grouping.js";
import { type DailyTrend, dailyTrends } from "../analytics/trend-analyzer.js";
import { logger } from "../config/logger.js";
import {
  type CampaignTables,
  emptyTables,
  type Influencer,
  type PayoutBasis,
  type PayoutRecord,
  type Platform,
  type Post,
  type TableName,
  type TrackingRecord,
} from "../domain/entities/campaign.js";
import type { CampaignDataRepository } from "../domain/repositories/campaign-data-repository.js";
import { TableValidationError } from "./errors.js";
import { parseInfluencers, parsePayouts, parsePosts, parseTracking, type RawRow, validateTable } from "./table-schemas.js";

/**
 * Result of writing a table. A failed or absent repository does not lose the
 * upload: the rows still replace the in-memory table, and the outcome says so.
 */
export type SaveOutcome = { status: "persisted" } | { status: "in-memory-fallback"; reason: string };

export type UploadOutcome = SaveOutcome | { status: "rejected"; errors: string[] };

export type RefreshOutcome = { status: "loaded" } | { status: "kept-current"; reason: string };

export interface DataSummary {
  influencers: { count: number; platforms: Platform[]; categories: string[] };
  posts: { count: number; dateRange: { from: string; to: string } | null; totalReach: number };
  tracking: { count: number; totalRevenue: number; totalOrders: number };
  payouts: { count: number; totalAmount: number };
}

export interface InfluencerPerformance {
  totalRevenue: number;
  totalOrders: number;
  /** revenue / max(orders, 1) */
  avgOrderValue: number;
  activeDays: number;
  campaigns: string[];
  products: string[];
  posts: { totalPosts: number; totalReach: number; totalEngagement: number; avgEngagementRate: number } | null;
  /** First payout row on record for the influencer */
  payout: { basis: PayoutBasis; rate: number; totalPayout: number } | null;
}

export interface InfluencerSegmentSummary {
  platform: Platform;
  category: string;
  influencerCount: number;
  avgFollowers: number;
  totalFollowers: number;
}

export interface CampaignSummary {
  campaign: string;
  revenue: number;
  orders: number;
  influencerCount: number;
}

export interface SummaryExport {
  influencerSummary: InfluencerSegmentSummary[];
  campaignSummary: CampaignSummary[];
  dailyPerformance: DailyTrend[];
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function distinct<T>(values: readonly T[]): T[] {
  return [...new Set(values)];
}

/**
 * Holds the current campaign tables for a session and keeps them in step
 * with the repository, when there is one.
 */
export class CampaignDataStore {
  private tables: CampaignTables = emptyTables();

  constructor(private readonly repository: CampaignDataRepository | null = null) {}

  /** Current tables. The arrays are replaced wholesale on save, never mutated. */
  snapshot(): CampaignTables {
    return this.tables;
  }

  async refresh(): Promise<RefreshOutcome> {
    if (!this.repository) {
      logger.warn("No campaign repository configured, keeping current data");
      return { status: "kept-current", reason: "no repository configured" };
    }
    try {
      this.tables = await this.repository.loadTables();
      logger.info("Campaign data loaded", {
        influencers: this.tables.influencers.length,
        posts: this.tables.posts.length,
        tracking: this.tables.tracking.length,
        payouts: this.tables.payouts.length,
      });
      return { status: "loaded" };
    } catch (err) {
      logger.error("Failed to load campaign data, keeping current data", { error: errorMessage(err) });
      return { status: "kept-current", reason: errorMessage(err) };
    }
  }

  private async persist(
    table: TableName,
    rowCount: number,
    write: (repository: CampaignDataRepository) => Promise<void>,
  ): Promise<SaveOutcome> {
    if (!this.repository) {
      return { status: "in-memory-fallback", reason: "no repository configured" };
    }
    try {
      await write(this.repository);
      logger.info(`Saved ${rowCount} ${table} rows`);
      return { status: "persisted" };
    } catch (err) {
      logger.error("Campaign table save failed, keeping rows in memory", { table, error: errorMessage(err) });
      return { status: "in-memory-fallback", reason: errorMessage(err) };
    }
  }

  async saveInfluencers(rows: readonly Influencer[]): Promise<SaveOutcome> {
    const outcome = await this.persist("influencers", rows.length, (repo) => repo.replaceInfluencers(rows));
    this.tables = { ...this.tables, influencers: [...rows] };
    return outcome;
  }

  async savePosts(rows: readonly Post[]): Promise<SaveOutcome> {
    const outcome = await this.persist("posts", rows.length, (repo) => repo.replacePosts(rows));
    this.tables = { ...this.tables, posts: [...rows] };
    return outcome;
  }

  async saveTracking(rows: readonly TrackingRecord[]): Promise<SaveOutcome> {
    const outcome = await this.persist("tracking", rows.length, (repo) => repo.replaceTracking(rows));
    this.tables = { ...this.tables, tracking: [...rows] };
    return outcome;
  }

  async savePayouts(rows: readonly PayoutRecord[]): Promise<SaveOutcome> {
    const outcome = await this.persist("payouts", rows.length, (repo) => repo.replacePayouts(rows));
    this.tables = { ...this.tables, payouts: [...rows] };
    return outcome;
  }

  /**
   * Validate raw uploaded rows and, when clean, save them as the new table.
   * Nothing is written when validation reports a problem.
   */
  async uploadTable(table: TableName, rows: readonly RawRow[]): Promise<UploadOutcome> {
    const errors = validateTable(table, rows);
    if (errors.length > 0) {
      return { status: "rejected", errors };
    }
    try {
      switch (table) {
        case "influencers":
          return await this.saveInfluencers(parseInfluencers(rows));
        case "posts":
          return await this.savePosts(parsePosts(rows));
        case "tracking":
          return await this.saveTracking(parseTracking(rows));
        case "payouts":
          return await this.savePayouts(parsePayouts(rows));
      }
    } catch (err) {
      if (err instanceof TableValidationError) {
        return { status: "rejected", errors: [...err.issues] };
      }
      throw err;
    }
  }

  /** Empty every table, in the repository first. Repository errors propagate. */
  async clearAll(): Promise<void> {
    if (this.repository) {
      await this.repository.clearAll();
    }
    this.tables = emptyTables();
    logger.info("All campaign data cleared");
  }

  getDataSummary(): DataSummary {
    const { influencers, posts, tracking, payouts } = this.tables;
    const postDates = posts.map((p) => p.date).sort(compareText);
    const firstPost = postDates[0];
    const lastPost = postDates[postDates.length - 1];

    return {
      influencers: {
        count: influencers.length,
        platforms: distinct(influencers.map((i) => i.platform)),
        categories: distinct(influencers.map((i) => i.category)),
      },
      posts: {
        count: posts.length,
        dateRange: firstPost !== undefined && lastPost !== undefined ? { from: firstPost, to: lastPost } : null,
        totalReach: sumBy(posts, (p) => p.reach),
      },
      tracking: {
        count: tracking.length,
        totalRevenue: sumBy(tracking, (t) => t.revenue),
        totalOrders: sumBy(tracking, (t) => t.orders),
      },
      payouts: {
        count: payouts.length,
        totalAmount: sumBy(payouts, (p) => p.totalPayout),
      },
    };
  }

  /** Detail for one influencer; null when they have no tracking rows. */
  getInfluencerPerformance(influencerId: string): InfluencerPerformance | null {
    const rows = this.tables.tracking.filter((t) => t.influencerId === influencerId);
    if (rows.length === 0) return null;

    const totalRevenue = sumBy(rows, (t) => t.revenue);
    const totalOrders = sumBy(rows, (t) => t.orders);

    const posts = this.tables.posts.filter((p) => p.influencerId === influencerId);
    const totalReach = sumBy(posts, (p) => p.reach);
    const totalEngagement = sumBy(posts, (p) => p.likes + p.comments);

    const payout = this.tables.payouts.find((p) => p.influencerId === influencerId);

    return {
      totalRevenue,
      totalOrders,
      avgOrderValue: totalRevenue / Math.max(totalOrders, 1),
      activeDays: distinct(rows.map((t) => t.date)).length,
      campaigns: distinct(rows.map((t) => t.campaign)),
      products: distinct(rows.map((t) => t.product)),
      posts:
        posts.length > 0
          ? {
              totalPosts: posts.length,
              totalReach,
              totalEngagement,
              avgEngagementRate: (totalEngagement / Math.max(totalReach, 1)) * 100,
            }
          : null,
      payout: payout ? { basis: payout.basis, rate: payout.rate, totalPayout: payout.totalPayout } : null,
    };
  }

  exportSummary(): SummaryExport {
    const { influencers, tracking } = this.tables;

    const segments = groupInto(
      influencers,
      (i) => `${i.platform}\u0000${i.category}`,
      (i): { platform: Platform; category: string; followers: number[] } => ({
        platform: i.platform,
        category: i.category,
        followers: [],
      }),
      (acc, i) => {
        acc.followers.push(i.followerCount);
      },
    );

    const campaigns = groupInto(
      tracking,
      (t) => t.campaign,
      (t) => ({ campaign: t.campaign, revenue: 0, orders: 0, influencerIds: new Set<string>() }),
      (acc, t) => {
        acc.revenue += t.revenue;
        acc.orders += t.orders;
        acc.influencerIds.add(t.influencerId);
      },
    );

    return {
      influencerSummary: [...segments.values()]
        .map((s): InfluencerSegmentSummary => {
          const totalFollowers = s.followers.reduce((sum, n) => sum + n, 0);
          return {
            platform: s.platform,
            category: s.category,
            influencerCount: s.followers.length,
            avgFollowers: round2(totalFollowers / s.followers.length),
            totalFollowers,
          };
        })
        .sort((a, b) => compareText(a.platform, b.platform) || compareText(a.category, b.category)),
      campaignSummary: [...campaigns.values()]
        .map(
          (c): CampaignSummary => ({
            campaign: c.campaign,
            revenue: round2(c.revenue),
            orders: c.orders,
            influencerCount: c.influencerIds.size,
          }),
        )
        .sort((a, b) => compareText(a.campaign, b.campaign)),
      dailyPerformance: dailyTrends(tracking).map((d) => ({ ...d, revenue: round2(d.revenue) })),
    };
  }
}
