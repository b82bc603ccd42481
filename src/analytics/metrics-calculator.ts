import type { AnalyticsConfig } from "../config/index.js";
import type { CampaignTables } from "../domain/entities/campaign.js";
import { type CostStrategyName, resolveCampaignCost } from "./cost-model.js";
import { sumBy } from "./grouping.js";

export interface RoiRoasMetrics {
  /** ROI in percent */
  avgRoi: number;
  avgRoas: number;
  /** avgRoi minus the ROI benchmark */
  roiChange: number;
  /** avgRoas minus the ROAS benchmark */
  roasChange: number;
  totalRevenue: number;
  totalCost: number;
  /** null when there were no tracking rows to cost */
  costStrategy: CostStrategyName | null;
}

/**
 * ROI in percent. The denominator is floored at 1, and no cost at all means
 * no signal (0), not infinite return.
 */
export function roiPercent(revenue: number, cost: number): number {
  return cost > 0 ? ((revenue - cost) / Math.max(cost, 1)) * 100 : 0;
}

/** Revenue per unit of cost, with the same flooring as roiPercent. */
export function roasOf(revenue: number, cost: number): number {
  return cost > 0 ? revenue / Math.max(cost, 1) : 0;
}

export function calculateRoiRoas(snapshot: CampaignTables, config: AnalyticsConfig): RoiRoasMetrics {
  if (snapshot.tracking.length === 0) {
    return {
      avgRoi: 0,
      avgRoas: 0,
      roiChange: -config.benchmarkRoi,
      roasChange: -config.benchmarkRoas,
      totalRevenue: 0,
      totalCost: 0,
      costStrategy: null,
    };
  }

  const totalRevenue = sumBy(snapshot.tracking, (t) => t.revenue);
  const { strategy, totalCost } = resolveCampaignCost(snapshot, config.costRatio);

  const avgRoi = roiPercent(totalRevenue, totalCost);
  const avgRoas = roasOf(totalRevenue, totalCost);

  return {
    avgRoi,
    avgRoas,
    roiChange: avgRoi - config.benchmarkRoi,
    roasChange: avgRoas - config.benchmarkRoas,
    totalRevenue,
    totalCost,
    costStrategy: strategy,
  };
}
