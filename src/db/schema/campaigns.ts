import { sql } from "drizzle-orm";
import { index, integer, real, sqliteTable, text } from "drizzle-orm/sqlite-core";
import { PAYOUT_BASES, PLATFORMS } from "../../domain/entities/campaign.js";

/**
 * Influencer roster. `id` is the external ID column and the join key for
 * every other campaign table.
 */
export const influencers = sqliteTable(
  "influencers",
  {
    id: text("id").primaryKey(),
    name: text("name").notNull(),
    category: text("category").notNull(),
    gender: text("gender").notNull(),
    followerCount: integer("follower_count").notNull().default(0),
    platform: text("platform", { enum: PLATFORMS }).notNull(),
    createdAt: text("created_at").notNull().default(sql`(datetime('now'))`),
  },
  (table) => [index("idx_influencers_platform").on(table.platform), index("idx_influencers_category").on(table.category)],
);

export const posts = sqliteTable(
  "posts",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    influencerId: text("influencer_id").notNull(),
    platform: text("platform", { enum: PLATFORMS }).notNull(),
    /** ISO calendar date */
    date: text("date").notNull(),
    url: text("url").notNull(),
    caption: text("caption").notNull().default(""),
    reach: integer("reach").notNull().default(0),
    likes: integer("likes").notNull().default(0),
    comments: integer("comments").notNull().default(0),
    createdAt: text("created_at").notNull().default(sql`(datetime('now'))`),
  },
  (table) => [index("idx_posts_influencer").on(table.influencerId), index("idx_posts_date").on(table.date)],
);

/** Attribution rows: one per tracked conversion batch. */
export const trackingRecords = sqliteTable(
  "tracking_records",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    source: text("source").notNull(),
    campaign: text("campaign").notNull(),
    influencerId: text("influencer_id").notNull(),
    userId: text("user_id").notNull(),
    product: text("product").notNull(),
    /** ISO calendar date */
    date: text("date").notNull(),
    orders: integer("orders").notNull().default(0),
    revenue: real("revenue").notNull().default(0),
    createdAt: text("created_at").notNull().default(sql`(datetime('now'))`),
  },
  (table) => [
    index("idx_tracking_influencer").on(table.influencerId),
    index("idx_tracking_date").on(table.date),
    index("idx_tracking_campaign").on(table.campaign),
  ],
);

export const payouts = sqliteTable(
  "payouts",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    influencerId: text("influencer_id").notNull(),
    basis: text("basis", { enum: PAYOUT_BASES }).notNull(),
    rate: real("rate").notNull(),
    orders: integer("orders").notNull().default(0),
    totalPayout: real("total_payout").notNull().default(0),
    createdAt: text("created_at").notNull().default(sql`(datetime('now'))`),
  },
  (table) => [index("idx_payouts_influencer").on(table.influencerId)],
);
