// Export all repository interfaces

export type { CampaignDataRepository, TableCounts } from "./campaign-data-repository.js";
