import { sql } from "drizzle-orm";
import type { DrizzleDb } from "../../db/index.js";
import { influencers, payouts, posts, trackingRecords } from "../../db/schema/campaigns.js";
import type { CampaignTables, Influencer, PayoutRecord, Post, TrackingRecord } from "../../domain/entities/campaign.js";
import type { CampaignDataRepository, TableCounts } from "../../domain/repositories/campaign-data-repository.js";

/**
 * Rows per INSERT statement. Every row binds one variable per column, and a
 * single statement must stay under SQLite's bound-variable limit.
 */
export const INSERT_CHUNK_SIZE = 500;

function chunked<T>(rows: readonly T[], size: number = INSERT_CHUNK_SIZE): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < rows.length; i += size) {
    chunks.push(rows.slice(i, i + size));
  }
  return chunks;
}

export class DrizzleCampaignDataRepository implements CampaignDataRepository {
  constructor(private readonly db: DrizzleDb) {}

  async loadTables(): Promise<CampaignTables> {
    const influencerRows = this.db.select().from(influencers).orderBy(influencers.id).all();
    const postRows = this.db.select().from(posts).orderBy(posts.id).all();
    const trackingRows = this.db.select().from(trackingRecords).orderBy(trackingRecords.id).all();
    const payoutRows = this.db.select().from(payouts).orderBy(payouts.id).all();

    return {
      influencers: influencerRows.map(toInfluencer),
      posts: postRows.map(toPost),
      tracking: trackingRows.map(toTrackingRecord),
      payouts: payoutRows.map(toPayoutRecord),
    };
  }

  async replaceInfluencers(rows: readonly Influencer[]): Promise<void> {
    this.db.transaction((tx) => {
      tx.delete(influencers).run();
      for (const chunk of chunked(rows)) {
        tx.insert(influencers)
          .values(
            chunk.map((r) => ({
              id: r.id,
              name: r.name,
              category: r.category,
              gender: r.gender,
              followerCount: r.followerCount,
              platform: r.platform,
            })),
          )
          .run();
      }
    });
  }

  async replacePosts(rows: readonly Post[]): Promise<void> {
    this.db.transaction((tx) => {
      tx.delete(posts).run();
      for (const chunk of chunked(rows)) {
        tx.insert(posts)
          .values(chunk.map((r) => ({ ...r })))
          .run();
      }
    });
  }

  async replaceTracking(rows: readonly TrackingRecord[]): Promise<void> {
    this.db.transaction((tx) => {
      tx.delete(trackingRecords).run();
      for (const chunk of chunked(rows)) {
        tx.insert(trackingRecords)
          .values(chunk.map((r) => ({ ...r })))
          .run();
      }
    });
  }

  async replacePayouts(rows: readonly PayoutRecord[]): Promise<void> {
    this.db.transaction((tx) => {
      tx.delete(payouts).run();
      for (const chunk of chunked(rows)) {
        tx.insert(payouts)
          .values(chunk.map((r) => ({ ...r })))
          .run();
      }
    });
  }

  async counts(): Promise<TableCounts> {
    const count = sql<number>`count(*)`;
    const influencerCount = this.db.select({ n: count }).from(influencers).get();
    const postCount = this.db.select({ n: count }).from(posts).get();
    const payoutCount = this.db.select({ n: count }).from(payouts).get();
    const tracking = this.db
      .select({ n: count, revenue: sql<number>`coalesce(sum(${trackingRecords.revenue}), 0)` })
      .from(trackingRecords)
      .get();

    return {
      influencers: influencerCount?.n ?? 0,
      posts: postCount?.n ?? 0,
      tracking: tracking?.n ?? 0,
      payouts: payoutCount?.n ?? 0,
      totalRevenue: tracking?.revenue ?? 0,
    };
  }

  async clearAll(): Promise<void> {
    this.db.transaction((tx) => {
      tx.delete(payouts).run();
      tx.delete(trackingRecords).run();
      tx.delete(posts).run();
      tx.delete(influencers).run();
    });
  }
}

function toInfluencer(row: typeof influencers.$inferSelect): Influencer {
  return {
    id: row.id,
    name: row.name,
    category: row.category,
    gender: row.gender,
    followerCount: row.followerCount,
    platform: row.platform,
  };
}

function toPost(row: typeof posts.$inferSelect): Post {
  return {
    influencerId: row.influencerId,
    platform: row.platform,
    date: row.date,
    url: row.url,
    caption: row.caption,
    reach: row.reach,
    likes: row.likes,
    comments: row.comments,
  };
}

function toTrackingRecord(row: typeof trackingRecords.$inferSelect): TrackingRecord {
  return {
    source: row.source,
    campaign: row.campaign,
    influencerId: row.influencerId,
    userId: row.userId,
    product: row.product,
    date: row.date,
    orders: row.orders,
    revenue: row.revenue,
  };
}

function toPayoutRecord(row: typeof payouts.$inferSelect): PayoutRecord {
  return {
    influencerId: row.influencerId,
    basis: row.basis,
    rate: row.rate,
    orders: row.orders,
    totalPayout: row.totalPayout,
  };
}
