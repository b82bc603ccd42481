import type { Platform } from "../domain/entities/campaign.js";

/** Sentinel meaning "do not filter on this dimension". */
export const ALL = "all";
export type All = typeof ALL;

/** Inclusive [start, end], ISO calendar dates. */
export type DateRange = readonly [start: string, end: string];

export interface CampaignFilter {
  platform: Platform | All;
  /** Campaign name, matched exactly. Narrows tracking rows only. */
  brand: string;
  category: string;
  dateRange: DateRange | readonly [];
}

export const NO_FILTER: CampaignFilter = {
  platform: ALL,
  brand: ALL,
  category: ALL,
  dateRange: [],
};
