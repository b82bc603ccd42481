import { z } from "zod";

/**
 * Analytics tuning knobs. Benchmarks are fixed targets, not recomputed
 * baselines; every engine call reads them from the instance it was given.
 */
export const analyticsConfigSchema = z.object({
  /** Target ROI in percent. */
  benchmarkRoi: z.coerce.number().default(200),
  /** Target ROAS as a revenue multiple. */
  benchmarkRoas: z.coerce.number().default(4.0),
  /** Share of revenue assumed as cost when no payout data applies. */
  costRatio: z.coerce.number().min(0).default(0.25),
  topPerformerLimit: z.coerce.number().int().min(1).default(10),
  /** Length of the recent window for incremental ROAS, in days. */
  baselineDays: z.coerce.number().int().min(0).default(30),

  /** Thresholds for the poor-performance reason classifier. */
  poorPerformance: z
    .object({
      lowRevenue: z.coerce.number().default(1000),
      lowOrders: z.coerce.number().default(10),
      veryLowRoi: z.coerce.number().default(50),
    })
    .default({
      lowRevenue: 1000,
      lowOrders: 10,
      veryLowRoi: 50,
    }),
});

export type AnalyticsConfig = z.infer<typeof analyticsConfigSchema>;

export const DEFAULT_ANALYTICS_CONFIG: AnalyticsConfig = analyticsConfigSchema.parse({});

const configSchema = z.object({
  nodeEnv: z.enum(["development", "production", "test"]).default("development"),
  logLevel: z.enum(["error", "warn", "info", "debug"]).default("info"),
  databasePath: z.string().min(1).default("./data/campaigns.db"),
  analytics: analyticsConfigSchema.default(DEFAULT_ANALYTICS_CONFIG),
});

export type Config = z.infer<typeof configSchema>;

/** Parse a raw environment map into a validated config. */
export function loadConfig(env: NodeJS.ProcessEnv): Config {
  return configSchema.parse({
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    databasePath: env.DATABASE_PATH,
    analytics: {
      benchmarkRoi: env.ANALYTICS_BENCHMARK_ROI,
      benchmarkRoas: env.ANALYTICS_BENCHMARK_ROAS,
      costRatio: env.ANALYTICS_COST_RATIO,
      topPerformerLimit: env.ANALYTICS_TOP_LIMIT,
      baselineDays: env.ANALYTICS_BASELINE_DAYS,
      poorPerformance: {
        lowRevenue: env.ANALYTICS_LOW_REVENUE,
        lowOrders: env.ANALYTICS_LOW_ORDERS,
        veryLowRoi: env.ANALYTICS_VERY_LOW_ROI,
      },
    },
  });
}

export const config = loadConfig(process.env);
