import { SchemaError } from "../campaign/errors.js";
import { parseCampaignTables, type RawCampaignTables } from "../campaign/table-schemas.js";
import { type AnalyticsConfig, DEFAULT_ANALYTICS_CONFIG } from "../config/index.js";
import { logger } from "../config/logger.js";
import type { CampaignTables } from "../domain/entities/campaign.js";
import { applyFilters } from "./filter-engine.js";
import { generateInsights, type InsightReport } from "./insight-aggregator.js";
import { calculateRoiRoas, type RoiRoasMetrics } from "./metrics-calculator.js";
import {
  getTopPerformers,
  identifyPoorPerformers,
  type PoorPerformer,
  type TopPerformer,
} from "./performance-ranker.js";
import { buildRecommendations } from "./recommendations.js";
import { analyzeTrends, calculateIncrementalRoas, type Trends } from "./trend-analyzer.js";
import type { CampaignFilter } from "./types.js";

/**
 * Entry point for campaign analytics. Construct once with a config; every
 * method is a pure function of its arguments and that config.
 */
export class AnalyticsEngine {
  readonly config: AnalyticsConfig;

  constructor(config: AnalyticsConfig = DEFAULT_ANALYTICS_CONFIG) {
    this.config = config;
  }

  /**
   * Parse raw uploaded rows into typed tables.
   * @throws SchemaError when a required column is missing
   * @throws TableValidationError when a value does not fit its column
   */
  loadSnapshot(raw: RawCampaignTables): CampaignTables {
    try {
      return parseCampaignTables(raw);
    } catch (err) {
      if (err instanceof SchemaError) {
        logger.warn("Rejected campaign tables with missing columns", {
          table: err.table,
          missingColumns: err.missingColumns,
        });
      }
      throw err;
    }
  }

  applyFilters(tables: CampaignTables, filter: Partial<CampaignFilter> = {}): CampaignTables {
    return applyFilters(tables, filter);
  }

  calculateRoiRoas(snapshot: CampaignTables): RoiRoasMetrics {
    return calculateRoiRoas(snapshot, this.config);
  }

  getTopPerformers(snapshot: CampaignTables, limit?: number): TopPerformer[] {
    return getTopPerformers(snapshot, this.config, limit);
  }

  identifyPoorPerformers(snapshot: CampaignTables): PoorPerformer[] {
    return identifyPoorPerformers(snapshot, this.config);
  }

  analyzeTrends(snapshot: CampaignTables): Trends {
    return analyzeTrends(snapshot.tracking);
  }

  calculateIncrementalRoas(snapshot: CampaignTables, baselineDays?: number): number {
    return calculateIncrementalRoas(snapshot, this.config, baselineDays);
  }

  generateInsights(snapshot: CampaignTables): InsightReport {
    const report = generateInsights(snapshot, this.config);
    logger.debug("Generated insight report", {
      trackingRows: snapshot.tracking.length,
      platforms: report.platformAnalysis.length,
      categories: report.categoryAnalysis.length,
      poorPerformers: report.poorPerformers.length,
    });
    return report;
  }

  buildRecommendations(snapshot: CampaignTables): string[] {
    return buildRecommendations(snapshot, this.config);
  }
}
