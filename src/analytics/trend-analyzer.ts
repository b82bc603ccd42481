import { getISOWeek, getISOWeekYear, isBefore, max, parseISO, subDays } from "date-fns";
import type { AnalyticsConfig } from "../config/index.js";
import type { CampaignTables, TrackingRecord } from "../domain/entities/campaign.js";
import { FixedRatioCost } from "./cost-model.js";
import { compareText, groupInto, meanBy } from "./grouping.js";

export interface DailyTrend {
  date: string;
  revenue: number;
  orders: number;
}

/**
 * Week buckets carry the ISO week-numbering year alongside the week number,
 * so week 1 of 2024 and week 1 of 2025 stay apart.
 */
export interface WeeklyTrend {
  isoYear: number;
  isoWeek: number;
  revenue: number;
  orders: number;
}

export interface Trends {
  daily: DailyTrend[];
  weekly: WeeklyTrend[];
}

export function dailyTrends(tracking: readonly TrackingRecord[]): DailyTrend[] {
  const days = groupInto(
    tracking,
    (t) => t.date,
    (t): DailyTrend => ({ date: t.date, revenue: 0, orders: 0 }),
    (acc, t) => {
      acc.revenue += t.revenue;
      acc.orders += t.orders;
    },
  );
  return [...days.values()].sort((a, b) => compareText(a.date, b.date));
}

export function weeklyTrends(tracking: readonly TrackingRecord[]): WeeklyTrend[] {
  const weeks = groupInto(
    tracking.map((t) => {
      const day = parseISO(t.date);
      return { isoYear: getISOWeekYear(day), isoWeek: getISOWeek(day), row: t };
    }),
    (w) => `${w.isoYear}-W${w.isoWeek}`,
    (w): WeeklyTrend => ({ isoYear: w.isoYear, isoWeek: w.isoWeek, revenue: 0, orders: 0 }),
    (acc, w) => {
      acc.revenue += w.row.revenue;
      acc.orders += w.row.orders;
    },
  );
  return [...weeks.values()].sort((a, b) => a.isoYear - b.isoYear || a.isoWeek - b.isoWeek);
}

export function analyzeTrends(tracking: readonly TrackingRecord[]): Trends {
  if (tracking.length === 0) return { daily: [], weekly: [] };
  return { daily: dailyTrends(tracking), weekly: weeklyTrends(tracking) };
}

/**
 * Lift of the most recent `baselineDays` over everything before them.
 *
 * Rows dated on or after `latest − baselineDays` form the recent window, the
 * rest the baseline. The lift in mean revenue per row is divided by the
 * recent window's estimated cost. Negative lift reports as 0; so does a
 * missing window.
 */
export function calculateIncrementalRoas(
  snapshot: CampaignTables,
  config: AnalyticsConfig,
  baselineDays: number = config.baselineDays,
): number {
  const tracking = snapshot.tracking;
  if (tracking.length === 0) return 0;

  const dated = tracking.map((t) => ({ day: parseISO(t.date), revenue: t.revenue }));
  const cutoff = subDays(max(dated.map((d) => d.day)), baselineDays);

  const baseline = dated.filter((d) => isBefore(d.day, cutoff));
  const recent = dated.filter((d) => !isBefore(d.day, cutoff));
  if (baseline.length === 0 || recent.length === 0) return 0;

  const recentMean = meanBy(recent, (d) => d.revenue);
  const incrementalRevenue = recentMean - meanBy(baseline, (d) => d.revenue);
  const estimatedCost = new FixedRatioCost(config.costRatio).costOf(recentMean);

  const incrementalRoas = estimatedCost > 0 ? incrementalRevenue / Math.max(estimatedCost, 1) : 0;
  return Math.max(incrementalRoas, 0);
}
