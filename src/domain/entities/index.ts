// Export all entities

export {
  type CampaignTables,
  emptyTables,
  type Influencer,
  PAYOUT_BASES,
  type PayoutBasis,
  type PayoutRecord,
  PLATFORMS,
  type Platform,
  type Post,
  TABLE_NAMES,
  type TableName,
  type TrackingRecord,
} from "./campaign.js";
