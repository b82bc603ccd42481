import type { CampaignTables, PayoutRecord } from "../domain/entities/campaign.js";
import { sumBy } from "./grouping.js";

export type CostStrategyName = "payout-based" | "fixed-ratio";

/** Cost taken as a fixed share of revenue. */
export class FixedRatioCost {
  readonly name = "fixed-ratio" satisfies CostStrategyName;

  constructor(readonly ratio: number) {}

  costOf(revenue: number): number {
    return revenue * this.ratio;
  }
}

/** Cost taken from recorded payouts. */
export class PayoutBasedCost {
  readonly name = "payout-based" satisfies CostStrategyName;

  constructor(private readonly payouts: readonly PayoutRecord[]) {}

  /**
   * Sum of `totalPayout` over the given influencers' payout rows, or null
   * when none of them has a payout row (the strategy does not apply).
   */
  costOf(influencerIds: ReadonlySet<string>): number | null {
    const matching = this.payouts.filter((p) => influencerIds.has(p.influencerId));
    return matching.length > 0 ? sumBy(matching, (p) => p.totalPayout) : null;
  }
}

export interface ResolvedCost {
  strategy: CostStrategyName;
  totalCost: number;
}

/**
 * Campaign-level cost: payouts of the influencers who have tracking rows when
 * any exist, otherwise `revenue × costRatio`.
 *
 * Per-influencer and per-segment views (poor performers, platform and
 * category analysis) use FixedRatioCost directly and never consult payouts.
 */
export function resolveCampaignCost(snapshot: CampaignTables, costRatio: number): ResolvedCost {
  const trackedIds = new Set(snapshot.tracking.map((t) => t.influencerId));
  const payoutCost = new PayoutBasedCost(snapshot.payouts).costOf(trackedIds);
  if (payoutCost !== null) {
    return { strategy: "payout-based", totalCost: payoutCost };
  }
  const revenue = sumBy(snapshot.tracking, (t) => t.revenue);
  return { strategy: "fixed-ratio", totalCost: new FixedRatioCost(costRatio).costOf(revenue) };
}
