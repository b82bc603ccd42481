export { AnalyticsEngine } from "./analytics-engine.js";
export {
  type CostStrategyName,
  FixedRatioCost,
  PayoutBasedCost,
  type ResolvedCost,
  resolveCampaignCost,
} from "./cost-model.js";
export { applyFilters, dateRangePredicate } from "./filter-engine.js";
export {
  CURRENCY_SYMBOL,
  calculateGrowthRate,
  type DateRangeCheck,
  formatAmount,
  formatCurrency,
  formatNumber,
  MAX_RANGE_DAYS,
  validateDateRange,
} from "./format.js";
export {
  analyzeCategories,
  analyzePlatforms,
  analyzeTopInfluencers,
  type CategoryInsight,
  type CategoryPerformance,
  generateInsights,
  type InsightReport,
  type PlatformInsight,
  type TopInfluencers,
} from "./insight-aggregator.js";
export { calculateRoiRoas, type RoiRoasMetrics, roasOf, roiPercent } from "./metrics-calculator.js";
export {
  classifyPoorPerformance,
  getTopPerformers,
  identifyPoorPerformers,
  type InfluencerRoi,
  type PoorPerformanceReason,
  type PoorPerformer,
  summarizeInfluencerRoi,
  type TopPerformer,
} from "./performance-ranker.js";
export { buildRecommendations, DEFAULT_RECOMMENDATIONS, NO_DATA_RECOMMENDATION } from "./recommendations.js";
export {
  analyzeTrends,
  calculateIncrementalRoas,
  type DailyTrend,
  dailyTrends,
  type Trends,
  type WeeklyTrend,
  weeklyTrends,
} from "./trend-analyzer.js";
export { ALL, type All, type CampaignFilter, type DateRange, NO_FILTER } from "./types.js";
