import { getMonth, parseISO } from "date-fns";
import type { AnalyticsConfig } from "../config/index.js";
import type { CampaignTables } from "../domain/entities/campaign.js";
import { formatAmount } from "./format.js";
import { groupInto, meanBy, sumBy } from "./grouping.js";
import { analyzePlatforms } from "./insight-aggregator.js";
import { calculateRoiRoas } from "./metrics-calculator.js";

const MAX_RECOMMENDATIONS = 6;
const ROI_LOW = 150;
const ROI_HIGH = 300;
const ENGAGEMENT_LOW = 2;
const ENGAGEMENT_HIGH = 5;
const ORDER_VALUE_LOW = 500;
const ORDER_VALUE_HIGH = 2000;
/** Seasonality is only read from more rows than this. */
const SEASONAL_MIN_ROWS = 30;
const MIN_CAMPAIGNS = 3;

export const NO_DATA_RECOMMENDATION = "Upload campaign data to generate personalized recommendations.";

export const DEFAULT_RECOMMENDATIONS: readonly string[] = [
  "Continue monitoring campaign performance regularly",
  "Experiment with different content formats and posting schedules",
  "Consider A/B testing different influencer categories",
  "Set up automated alerts for significant performance changes",
];

function platformAdvice(snapshot: CampaignTables, config: AnalyticsConfig): string | null {
  let top: { platform: string; totalRevenue: number } | null = null;
  for (const row of analyzePlatforms(snapshot, config)) {
    if (top === null || row.totalRevenue > top.totalRevenue) top = row;
  }
  if (top === null) return null;
  return `Focus investment on ${top.platform} as it generates the highest revenue (${formatAmount(top.totalRevenue)})`;
}

function roiAdvice(snapshot: CampaignTables, config: AnalyticsConfig): string | null {
  const { avgRoi } = calculateRoiRoas(snapshot, config);
  if (avgRoi < ROI_LOW) {
    return `Consider optimizing campaign costs as ROI is below industry standards (target: >${config.benchmarkRoi}%)`;
  }
  if (avgRoi > ROI_HIGH) return "Excellent ROI performance! Consider scaling successful campaigns";
  return null;
}

function engagementAdvice(snapshot: CampaignTables): string | null {
  const reached = snapshot.posts.filter((p) => p.reach > 0);
  if (reached.length === 0) return null;
  const avgEngagement = meanBy(reached, (p) => ((p.likes + p.comments) / p.reach) * 100);
  if (avgEngagement < ENGAGEMENT_LOW) {
    return `Work on content strategy to improve engagement rates (currently below ${ENGAGEMENT_LOW}%)`;
  }
  if (avgEngagement > ENGAGEMENT_HIGH) return "High engagement rates detected! Leverage successful content formats";
  return null;
}

function orderValueAdvice(snapshot: CampaignTables): string | null {
  const orders = sumBy(snapshot.tracking, (t) => t.orders);
  if (orders === 0) return null;
  const avgOrderValue = sumBy(snapshot.tracking, (t) => t.revenue) / orders;
  if (avgOrderValue < ORDER_VALUE_LOW) {
    return "Focus on promoting higher-value products to increase average order value";
  }
  if (avgOrderValue > ORDER_VALUE_HIGH) {
    return "Strong average order value! Consider expanding premium product campaigns";
  }
  return null;
}

function seasonalAdvice(snapshot: CampaignTables): string | null {
  if (snapshot.tracking.length <= SEASONAL_MIN_ROWS) return null;
  const months = groupInto(
    snapshot.tracking,
    (t) => getMonth(parseISO(t.date)) + 1,
    () => ({ revenue: 0 }),
    (acc, t) => {
      acc.revenue += t.revenue;
    },
  );
  if (months.size < 2) return null;

  let best: { month: number; revenue: number } | null = null;
  for (const [month, { revenue }] of [...months.entries()].sort(([a], [b]) => a - b)) {
    if (best === null || revenue > best.revenue) best = { month, revenue };
  }
  if (best === null) return null;
  return `Month ${best.month} shows peak performance - plan major campaigns during similar periods`;
}

function diversificationAdvice(snapshot: CampaignTables): string | null {
  const campaigns = new Set(snapshot.tracking.map((t) => t.campaign));
  return campaigns.size < MIN_CAMPAIGNS
    ? "Consider diversifying campaigns across more brands/products to reduce risk"
    : null;
}

/** Up to six actionable recommendations, most important first. */
export function buildRecommendations(snapshot: CampaignTables, config: AnalyticsConfig): string[] {
  if (snapshot.tracking.length === 0) return [NO_DATA_RECOMMENDATION];

  const recommendations = [
    platformAdvice(snapshot, config),
    roiAdvice(snapshot, config),
    engagementAdvice(snapshot),
    orderValueAdvice(snapshot),
    seasonalAdvice(snapshot),
    diversificationAdvice(snapshot),
  ].filter((r): r is string => r !== null);

  if (recommendations.length === 0) return [...DEFAULT_RECOMMENDATIONS];
  return recommendations.slice(0, MAX_RECOMMENDATIONS);
}
