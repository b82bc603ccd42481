import type { CampaignTables, Influencer, PayoutRecord, Post, TrackingRecord } from "../../domain/entities/campaign.js";
import type { CampaignDataRepository, TableCounts } from "../../domain/repositories/campaign-data-repository.js";

export class InMemoryCampaignDataRepository implements CampaignDataRepository {
  private influencers: Influencer[] = [];
  private posts: Post[] = [];
  private tracking: TrackingRecord[] = [];
  private payouts: PayoutRecord[] = [];

  async loadTables(): Promise<CampaignTables> {
    return {
      influencers: [...this.influencers],
      posts: [...this.posts],
      tracking: [...this.tracking],
      payouts: [...this.payouts],
    };
  }

  async replaceInfluencers(rows: readonly Influencer[]): Promise<void> {
    this.influencers = [...rows];
  }

  async replacePosts(rows: readonly Post[]): Promise<void> {
    this.posts = [...rows];
  }

  async replaceTracking(rows: readonly TrackingRecord[]): Promise<void> {
    this.tracking = [...rows];
  }

  async replacePayouts(rows: readonly PayoutRecord[]): Promise<void> {
    this.payouts = [...rows];
  }

  async counts(): Promise<TableCounts> {
    return {
      influencers: this.influencers.length,
      posts: this.posts.length,
      tracking: this.tracking.length,
      payouts: this.payouts.length,
      totalRevenue: this.tracking.reduce((sum, r) => sum + r.revenue, 0),
    };
  }

  async clearAll(): Promise<void> {
    this.reset();
  }

  reset(): void {
    this.influencers = [];
    this.posts = [];
    this.tracking = [];
    this.payouts = [];
  }
}
