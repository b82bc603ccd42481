/**
 * Entities: the four campaign tables.
 *
 * Records are plain readonly objects. A table is a readonly array of them;
 * nothing in the analytics layer mutates a table it was handed.
 */

export const PLATFORMS = ["Instagram", "YouTube", "Twitter", "Facebook", "TikTok", "LinkedIn"] as const;
export type Platform = (typeof PLATFORMS)[number];

export const PAYOUT_BASES = ["post", "order"] as const;
export type PayoutBasis = (typeof PAYOUT_BASES)[number];

export interface Influencer {
  readonly id: string;
  readonly name: string;
  readonly category: string;
  readonly gender: string;
  readonly followerCount: number;
  readonly platform: Platform;
}

export interface Post {
  readonly influencerId: string;
  readonly platform: Platform;
  /** ISO calendar date, YYYY-MM-DD */
  readonly date: string;
  readonly url: string;
  readonly caption: string;
  readonly reach: number;
  readonly likes: number;
  readonly comments: number;
}

/** One attributed conversion row. */
export interface TrackingRecord {
  readonly source: string;
  readonly campaign: string;
  readonly influencerId: string;
  readonly userId: string;
  readonly product: string;
  /** ISO calendar date, YYYY-MM-DD */
  readonly date: string;
  readonly orders: number;
  readonly revenue: number;
}

export interface PayoutRecord {
  readonly influencerId: string;
  readonly basis: PayoutBasis;
  readonly rate: number;
  readonly orders: number;
  readonly totalPayout: number;
}

export interface CampaignTables {
  readonly influencers: readonly Influencer[];
  readonly posts: readonly Post[];
  readonly tracking: readonly TrackingRecord[];
  readonly payouts: readonly PayoutRecord[];
}

export type TableName = keyof CampaignTables;

export const TABLE_NAMES: readonly TableName[] = ["influencers", "posts", "tracking", "payouts"];

export function emptyTables(): CampaignTables {
  return { influencers: [], posts: [], tracking: [], payouts: [] };
}
