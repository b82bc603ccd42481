export * from "./analytics/index.js";
export * from "./campaign/index.js";
export {
  type AnalyticsConfig,
  analyticsConfigSchema,
  type Config,
  DEFAULT_ANALYTICS_CONFIG,
  loadConfig,
} from "./config/index.js";
export { type CampaignDb, createDb, type DrizzleDb, initCampaignSchema, openCampaignDb } from "./db/index.js";
export * from "./domain/entities/index.js";
export * from "./domain/repositories/index.js";
export * from "./infrastructure/persistence/index.js";
