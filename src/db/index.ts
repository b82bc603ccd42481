import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import { type BetterSQLite3Database, drizzle } from "drizzle-orm/better-sqlite3";
import * as schema from "./schema/index.js";

/** The schema type shared across all db instances. */
export type Schema = typeof schema;

/** Repositories accept this type; tests pass one wrapping `:memory:`. */
export type DrizzleDb = BetterSQLite3Database<Schema>;

/** Create a Drizzle database instance wrapping the given SQLite handle. */
export function createDb(sqlite: Database.Database): DrizzleDb {
  return drizzle(sqlite, { schema });
}

/**
 * Create the campaign tables and indexes if they do not exist.
 * Mirrors src/db/schema/campaigns.ts.
 */
export function initCampaignSchema(sqlite: Database.Database): void {
  sqlite.exec(`
    CREATE TABLE IF NOT EXISTS influencers (
      id TEXT PRIMARY KEY,
      name TEXT NOT NULL,
      category TEXT NOT NULL,
      gender TEXT NOT NULL,
      follower_count INTEGER NOT NULL DEFAULT 0,
      platform TEXT NOT NULL,
      created_at TEXT NOT NULL DEFAULT (datetime('now'))
    );
    CREATE INDEX IF NOT EXISTS idx_influencers_platform ON influencers (platform);
    CREATE INDEX IF NOT EXISTS idx_influencers_category ON influencers (category);

    CREATE TABLE IF NOT EXISTS posts (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      influencer_id TEXT NOT NULL,
      platform TEXT NOT NULL,
      date TEXT NOT NULL,
      url TEXT NOT NULL,
      caption TEXT NOT NULL DEFAULT '',
      reach INTEGER NOT NULL DEFAULT 0,
      likes INTEGER NOT NULL DEFAULT 0,
      comments INTEGER NOT NULL DEFAULT 0,
      created_at TEXT NOT NULL DEFAULT (datetime('now'))
    );
    CREATE INDEX IF NOT EXISTS idx_posts_influencer ON posts (influencer_id);
    CREATE INDEX IF NOT EXISTS idx_posts_date ON posts (date);

    CREATE TABLE IF NOT EXISTS tracking_records (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      source TEXT NOT NULL,
      campaign TEXT NOT NULL,
      influencer_id TEXT NOT NULL,
      user_id TEXT NOT NULL,
      product TEXT NOT NULL,
      date TEXT NOT NULL,
      orders INTEGER NOT NULL DEFAULT 0,
      revenue REAL NOT NULL DEFAULT 0,
      created_at TEXT NOT NULL DEFAULT (datetime('now'))
    );
    CREATE INDEX IF NOT EXISTS idx_tracking_influencer ON tracking_records (influencer_id);
    CREATE INDEX IF NOT EXISTS idx_tracking_date ON tracking_records (date);
    CREATE INDEX IF NOT EXISTS idx_tracking_campaign ON tracking_records (campaign);

    CREATE TABLE IF NOT EXISTS payouts (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      influencer_id TEXT NOT NULL,
      basis TEXT NOT NULL,
      rate REAL NOT NULL,
      orders INTEGER NOT NULL DEFAULT 0,
      total_payout REAL NOT NULL DEFAULT 0,
      created_at TEXT NOT NULL DEFAULT (datetime('now'))
    );
    CREATE INDEX IF NOT EXISTS idx_payouts_influencer ON payouts (influencer_id);
  `);
}

export interface CampaignDb {
  db: DrizzleDb;
  /** Underlying handle; the caller closes it. */
  sqlite: Database.Database;
}

/**
 * Open (or create) the campaign database at `path`, ready for the repository.
 *
 * File databases get their parent directory created and run in WAL mode;
 * `:memory:` skips both. Writers wait up to 5 s for the lock.
 */
export function openCampaignDb(path: string): CampaignDb {
  const inMemory = path === ":memory:";
  if (!inMemory) {
    mkdirSync(dirname(path), { recursive: true });
  }
  const sqlite = new Database(path);
  if (!inMemory) {
    sqlite.pragma("journal_mode = WAL");
  }
  sqlite.pragma("busy_timeout = 5000");
  initCampaignSchema(sqlite);
  return { db: createDb(sqlite), sqlite };
}

export { schema };
