import { isAfter, isBefore, isValid, parseISO } from "date-fns";
import type { CampaignTables } from "../domain/entities/campaign.js";
import { ALL, type CampaignFilter, type DateRange, NO_FILTER } from "./types.js";

function restrictToInfluencers(tables: CampaignTables, ids: ReadonlySet<string>): CampaignTables {
  return {
    influencers: tables.influencers.filter((i) => ids.has(i.id)),
    posts: tables.posts.filter((p) => ids.has(p.influencerId)),
    tracking: tables.tracking.filter((t) => ids.has(t.influencerId)),
    payouts: tables.payouts.filter((p) => ids.has(p.influencerId)),
  };
}

/**
 * Predicate for "date falls in [start, end]", both ends inclusive. A reversed
 * range matches nothing; so does a row whose date does not parse, and so does
 * every row when either bound does not parse.
 */
export function dateRangePredicate([start, end]: DateRange): (date: string) => boolean {
  const from = parseISO(start);
  const to = parseISO(end);
  if (!isValid(from) || !isValid(to)) return () => false;
  return (date) => {
    const d = parseISO(date);
    return isValid(d) && !isBefore(d, from) && !isAfter(d, to);
  };
}

/**
 * Narrow the four tables to one selection. Stages run in a fixed order and
 * each narrows the previous one:
 *
 * 1. platform: influencer ids on that platform restrict all four tables
 * 2. category: ids recomputed from the platform-filtered influencers, so
 *    platform and category combine conjunctively
 * 3. brand: tracking rows whose campaign matches exactly; other tables untouched
 * 4. date range: posts and tracking only; influencers and payouts carry no date
 *
 * Always returns fresh arrays, never the caller's.
 */
export function applyFilters(tables: CampaignTables, filter: Partial<CampaignFilter> = {}): CampaignTables {
  const platform = filter.platform ?? NO_FILTER.platform;
  const category = filter.category ?? NO_FILTER.category;
  const brand = filter.brand ?? NO_FILTER.brand;
  const dateRange = filter.dateRange ?? NO_FILTER.dateRange;

  let filtered: CampaignTables = {
    influencers: [...tables.influencers],
    posts: [...tables.posts],
    tracking: [...tables.tracking],
    payouts: [...tables.payouts],
  };

  if (platform !== ALL) {
    const ids = new Set(filtered.influencers.filter((i) => i.platform === platform).map((i) => i.id));
    filtered = restrictToInfluencers(filtered, ids);
  }

  if (category !== ALL) {
    const ids = new Set(filtered.influencers.filter((i) => i.category === category).map((i) => i.id));
    filtered = restrictToInfluencers(filtered, ids);
  }

  if (brand !== ALL) {
    filtered = { ...filtered, tracking: filtered.tracking.filter((t) => t.campaign === brand) };
  }

  if (dateRange.length === 2) {
    const inRange = dateRangePredicate(dateRange);
    filtered = {
      ...filtered,
      posts: filtered.posts.filter((p) => inRange(p.date)),
      tracking: filtered.tracking.filter((t) => inRange(t.date)),
    };
  }

  return filtered;
}
