/**
 * Print a campaign report for the data in the SQLite database.
 *
 * Usage:
 *   DATABASE_PATH=./data/campaigns.db \
 *   REPORT_PLATFORM=Instagram REPORT_START=2024-01-01 REPORT_END=2024-03-31 \
 *   npx tsx scripts/generate-report.ts
 *
 * Every REPORT_* variable is optional; unset means "all".
 */

import { z } from "zod";
import { AnalyticsEngine } from "../src/analytics/analytics-engine.js";
import { validateDateRange } from "../src/analytics/format.js";
import type { InsightReport } from "../src/analytics/insight-aggregator.js";
import type { RoiRoasMetrics } from "../src/analytics/metrics-calculator.js";
import { ALL, type CampaignFilter } from "../src/analytics/types.js";
import { config } from "../src/config/index.js";
import { logger } from "../src/config/logger.js";
import { openCampaignDb } from "../src/db/index.js";
import { PLATFORMS } from "../src/domain/entities/campaign.js";
import type { CampaignDataRepository } from "../src/domain/repositories/campaign-data-repository.js";
import { DrizzleCampaignDataRepository } from "../src/infrastructure/persistence/drizzle-campaign-data-repository.js";

export interface CampaignReport {
  metrics: RoiRoasMetrics;
  incrementalRoas: number;
  insights: InsightReport;
  recommendations: string[];
}

const reportEnvSchema = z
  .object({
    REPORT_PLATFORM: z.enum([ALL, ...PLATFORMS]).default(ALL),
    REPORT_BRAND: z.string().min(1).default(ALL),
    REPORT_CATEGORY: z.string().min(1).default(ALL),
    REPORT_START: z.string().min(1).optional(),
    REPORT_END: z.string().min(1).optional(),
  })
  .refine((env) => (env.REPORT_START === undefined) === (env.REPORT_END === undefined), {
    message: "REPORT_START and REPORT_END must be set together",
    path: ["REPORT_END"],
  });

/**
 * Build a filter from REPORT_* variables.
 * @throws when a variable is invalid or the date window fails validateDateRange
 */
export function reportFilterFromEnv(env: NodeJS.ProcessEnv, today: Date = new Date()): CampaignFilter {
  const parsed = reportEnvSchema.parse(env);
  const filter: CampaignFilter = {
    platform: parsed.REPORT_PLATFORM,
    brand: parsed.REPORT_BRAND,
    category: parsed.REPORT_CATEGORY,
    dateRange: [],
  };
  if (parsed.REPORT_START === undefined || parsed.REPORT_END === undefined) return filter;

  const check = validateDateRange(parsed.REPORT_START, parsed.REPORT_END, today);
  if (!check.valid) {
    throw new Error(`Invalid report window: ${check.reason}`);
  }
  return { ...filter, dateRange: [parsed.REPORT_START, parsed.REPORT_END] };
}

/**
 * Load every table, narrow it to `filter`, and run the full analysis.
 *
 * Exported for testing. When run as a script, `main()` calls this against
 * the configured database.
 */
export async function generateReport(
  repository: CampaignDataRepository,
  filter: Partial<CampaignFilter>,
  engine: AnalyticsEngine,
): Promise<CampaignReport> {
  const snapshot = engine.applyFilters(await repository.loadTables(), filter);
  return {
    metrics: engine.calculateRoiRoas(snapshot),
    incrementalRoas: engine.calculateIncrementalRoas(snapshot),
    insights: engine.generateInsights(snapshot),
    recommendations: engine.buildRecommendations(snapshot),
  };
}

/**
 * CLI entry point, only runs when executed directly (not when imported in tests).
 */
async function main() {
  const filter = reportFilterFromEnv(process.env);
  logger.info("Generating campaign report", { databasePath: config.databasePath, filter });

  const { db, sqlite } = openCampaignDb(config.databasePath);
  try {
    const repository = new DrizzleCampaignDataRepository(db);
    const report = await generateReport(repository, filter, new AnalyticsEngine(config.analytics));
    console.log(JSON.stringify(report, null, 2));
  } finally {
    sqlite.close();
  }
}

// Run main() only when executed directly via `npx tsx`
const isDirectRun = process.argv[1]?.endsWith("generate-report.ts");
if (isDirectRun) {
  main().catch((err) => {
    logger.error("Report failed", { error: err instanceof Error ? err.message : String(err) });
    process.exit(1);
  });
}
