/**
 * Repository Interface: CampaignDataRepository (ASYNC)
 *
 * Source and sink for the four campaign tables. Every replace* call swaps
 * the whole table atomically; there is no row-level update.
 */
import type { CampaignTables, Influencer, PayoutRecord, Post, TrackingRecord } from "../entities/campaign.js";

export interface TableCounts {
  influencers: number;
  posts: number;
  tracking: number;
  payouts: number;
  totalRevenue: number;
}

export interface CampaignDataRepository {
  /**
   * Load all four tables.
   */
  loadTables(): Promise<CampaignTables>;

  replaceInfluencers(rows: readonly Influencer[]): Promise<void>;

  replacePosts(rows: readonly Post[]): Promise<void>;

  replaceTracking(rows: readonly TrackingRecord[]): Promise<void>;

  replacePayouts(rows: readonly PayoutRecord[]): Promise<void>;

  /**
   * Row counts per table plus total tracked revenue.
   */
  counts(): Promise<TableCounts>;

  /**
   * Delete every row of every table.
   */
  clearAll(): Promise<void>;
}
