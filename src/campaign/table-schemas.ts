import { format, isValid, parseISO } from "date-fns";
import { z } from "zod";
import {
  type CampaignTables,
  type Influencer,
  PAYOUT_BASES,
  PLATFORMS,
  type PayoutRecord,
  type Post,
  type TableName,
  type TrackingRecord,
} from "../domain/entities/campaign.js";
import { SchemaError, TableValidationError } from "./errors.js";

/** A row as it arrives from an upload or an export: external column names, loose values. */
export type RawRow = Readonly<Record<string, unknown>>;

export type RawCampaignTables = Readonly<Record<TableName, readonly RawRow[]>>;

/** External column names, exact and required. */
export const REQUIRED_COLUMNS = {
  influencers: ["ID", "name", "category", "gender", "follower_count", "platform"],
  posts: ["influencer_id", "platform", "date", "URL", "caption", "reach", "likes", "comments"],
  tracking: ["source", "campaign", "influencer_id", "user_id", "product", "date", "orders", "revenue"],
  payouts: ["influencer_id", "basis", "rate", "orders", "total_payout"],
} as const satisfies Record<TableName, readonly string[]>;

const NUMERIC_COLUMNS: Record<TableName, readonly string[]> = {
  influencers: ["follower_count"],
  posts: ["reach", "likes", "comments"],
  tracking: ["orders", "revenue"],
  payouts: ["rate", "orders", "total_payout"],
};

const DATE_COLUMNS: Record<TableName, readonly string[]> = {
  influencers: [],
  posts: ["date"],
  tracking: ["date"],
  payouts: [],
};

const idValue = z.union([z.string().trim().min(1), z.number().int()]).transform((v) => String(v));
const textValue = z.union([z.string(), z.number()]).transform((v) => String(v));
const optionalText = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((v) => (v === null || v === undefined ? "" : String(v)));
const numericValue = z.union([z.number().finite(), z.string().trim().min(1).pipe(z.coerce.number().finite())]);
const count = numericValue.pipe(z.number().int().nonnegative());
const amount = numericValue.pipe(z.number().nonnegative());

/** Accepts an ISO date or datetime string, or a Date; yields YYYY-MM-DD. */
export const calendarDate = z.union([z.string().min(1), z.date()]).transform((value, ctx) => {
  const parsed = typeof value === "string" ? parseISO(value) : value;
  if (!isValid(parsed)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid date: ${String(value)}` });
    return z.NEVER;
  }
  return format(parsed, "yyyy-MM-dd");
});

export const influencerRowSchema = z
  .object({
    ID: idValue,
    name: textValue,
    category: textValue,
    gender: textValue,
    follower_count: count,
    platform: z.enum(PLATFORMS),
  })
  .transform(
    (r): Influencer => ({
      id: r.ID,
      name: r.name,
      category: r.category,
      gender: r.gender,
      followerCount: r.follower_count,
      platform: r.platform,
    }),
  );

export const postRowSchema = z
  .object({
    influencer_id: idValue,
    platform: z.enum(PLATFORMS),
    date: calendarDate,
    URL: textValue,
    caption: optionalText,
    reach: count,
    likes: count,
    comments: count,
  })
  .transform(
    (r): Post => ({
      influencerId: r.influencer_id,
      platform: r.platform,
      date: r.date,
      url: r.URL,
      caption: r.caption,
      reach: r.reach,
      likes: r.likes,
      comments: r.comments,
    }),
  );

export const trackingRowSchema = z
  .object({
    source: textValue,
    campaign: textValue,
    influencer_id: idValue,
    user_id: textValue,
    product: textValue,
    date: calendarDate,
    orders: count,
    revenue: amount,
  })
  .transform(
    (r): TrackingRecord => ({
      source: r.source,
      campaign: r.campaign,
      influencerId: r.influencer_id,
      userId: r.user_id,
      product: r.product,
      date: r.date,
      orders: r.orders,
      revenue: r.revenue,
    }),
  );

export const payoutRowSchema = z
  .object({
    influencer_id: idValue,
    basis: z.enum(PAYOUT_BASES),
    rate: amount,
    orders: count,
    total_payout: amount,
  })
  .transform(
    (r): PayoutRecord => ({
      influencerId: r.influencer_id,
      basis: r.basis,
      rate: r.rate,
      orders: r.orders,
      totalPayout: r.total_payout,
    }),
  );

/** Required columns that at least one row lacks. */
export function findMissingColumns(table: TableName, rows: readonly RawRow[]): string[] {
  const required: readonly string[] = REQUIRED_COLUMNS[table];
  return required.filter((column) => rows.some((row) => !Object.hasOwn(row, column)));
}

/** Throws SchemaError when any required column is absent. */
export function assertColumns(table: TableName, rows: readonly RawRow[]): void {
  const missing = findMissingColumns(table, rows);
  if (missing.length > 0) {
    throw new SchemaError(table, missing);
  }
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const [rowIndex, ...field] = issue.path;
    const where = field.length > 0 ? `row ${String(rowIndex)} ${field.join(".")}` : `row ${String(rowIndex)}`;
    return `${where}: ${issue.message}`;
  });
}

function parseRows<T>(table: TableName, rows: readonly RawRow[], schema: z.ZodType<T, z.ZodTypeDef, unknown>): T[] {
  assertColumns(table, rows);
  const result = z.array(schema).safeParse(rows);
  if (!result.success) {
    throw new TableValidationError(table, formatIssues(result.error));
  }
  return result.data;
}

export function parseInfluencers(rows: readonly RawRow[]): Influencer[] {
  return parseRows("influencers", rows, influencerRowSchema);
}

export function parsePosts(rows: readonly RawRow[]): Post[] {
  return parseRows("posts", rows, postRowSchema);
}

export function parseTracking(rows: readonly RawRow[]): TrackingRecord[] {
  return parseRows("tracking", rows, trackingRowSchema);
}

export function parsePayouts(rows: readonly RawRow[]): PayoutRecord[] {
  return parseRows("payouts", rows, payoutRowSchema);
}

/**
 * Turn raw rows into typed tables. Every table's columns are checked before
 * any values are parsed, so a missing column is reported as a SchemaError
 * even when another table also has bad values.
 */
export function parseCampaignTables(raw: RawCampaignTables): CampaignTables {
  assertColumns("influencers", raw.influencers);
  assertColumns("posts", raw.posts);
  assertColumns("tracking", raw.tracking);
  assertColumns("payouts", raw.payouts);

  return {
    influencers: parseInfluencers(raw.influencers),
    posts: parsePosts(raw.posts),
    tracking: parseTracking(raw.tracking),
    payouts: parsePayouts(raw.payouts),
  };
}

function distinctValues(rows: readonly RawRow[], column: string): unknown[] {
  return [...new Set(rows.map((row) => row[column]))];
}

/**
 * Check an upload without throwing. Returns human-readable problems; an
 * empty list means the rows can be parsed.
 */
export function validateTable(table: TableName, rows: readonly RawRow[]): string[] {
  const errors: string[] = [];

  const missing = findMissingColumns(table, rows);
  if (missing.length > 0) {
    errors.push(`Missing columns: ${missing.join(", ")}`);
  }

  const present = (column: string) => !missing.includes(column) && rows.length > 0;

  for (const column of NUMERIC_COLUMNS[table]) {
    if (present(column) && rows.some((row) => !numericValue.safeParse(row[column]).success)) {
      errors.push(`${column} must be numeric`);
    }
  }

  for (const column of DATE_COLUMNS[table]) {
    if (present(column) && rows.some((row) => !calendarDate.safeParse(row[column]).success)) {
      errors.push(`${column} column contains invalid dates`);
    }
  }

  if (table === "influencers" && present("platform")) {
    const platforms = z.enum(PLATFORMS);
    const invalid = distinctValues(rows, "platform").filter((v) => !platforms.safeParse(v).success);
    if (invalid.length > 0) {
      errors.push(`Invalid platforms: ${invalid.map(String).join(", ")}. Valid platforms: ${PLATFORMS.join(", ")}`);
    }
  }

  if (table === "payouts" && present("basis")) {
    const bases = z.enum(PAYOUT_BASES);
    const invalid = distinctValues(rows, "basis").filter((v) => !bases.safeParse(v).success);
    if (invalid.length > 0) {
      errors.push(`Invalid basis values: ${invalid.map(String).join(", ")}. Valid values: ${PAYOUT_BASES.join(", ")}`);
    }
  }

  return errors;
}
