// Export persistence implementations
export { DrizzleCampaignDataRepository } from "./drizzle-campaign-data-repository.js";
export { InMemoryCampaignDataRepository } from "./in-memory-campaign-data-repository.js";
