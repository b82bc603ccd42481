import type {
  CampaignTables,
  Influencer,
  PayoutRecord,
  Post,
  TrackingRecord,
} from "../domain/entities/campaign.js";

export function influencer(overrides: Partial<Influencer> = {}): Influencer {
  return {
    id: "1",
    name: "Asha",
    category: "Fitness",
    gender: "F",
    followerCount: 10_000,
    platform: "Instagram",
    ...overrides,
  };
}

export function post(overrides: Partial<Post> = {}): Post {
  return {
    influencerId: "1",
    platform: "Instagram",
    date: "2024-03-01",
    url: "https://example.com/p/1",
    caption: "",
    reach: 1000,
    likes: 30,
    comments: 10,
    ...overrides,
  };
}

export function tracking(overrides: Partial<TrackingRecord> = {}): TrackingRecord {
  return {
    source: "instagram",
    campaign: "Protein Push",
    influencerId: "1",
    userId: "u-1",
    product: "Whey",
    date: "2024-03-01",
    orders: 1,
    revenue: 1000,
    ...overrides,
  };
}

export function payout(overrides: Partial<PayoutRecord> = {}): PayoutRecord {
  return {
    influencerId: "1",
    basis: "post",
    rate: 500,
    orders: 0,
    totalPayout: 500,
    ...overrides,
  };
}

export function tables(overrides: Partial<CampaignTables> = {}): CampaignTables {
  return { influencers: [], posts: [], tracking: [], payouts: [], ...overrides };
}
