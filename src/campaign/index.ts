export {
  CampaignDataStore,
  type CampaignSummary,
  type DataSummary,
  type InfluencerPerformance,
  type InfluencerSegmentSummary,
  type RefreshOutcome,
  type SaveOutcome,
  type SummaryExport,
  type UploadOutcome,
} from "./campaign-data-store.js";
export { SchemaError, TableValidationError } from "./errors.js";
export {
  assertColumns,
  findMissingColumns,
  parseCampaignTables,
  parseInfluencers,
  parsePayouts,
  parsePosts,
  parseTracking,
  type RawCampaignTables,
  type RawRow,
  REQUIRED_COLUMNS,
  validateTable,
} from "./table-schemas.js";
