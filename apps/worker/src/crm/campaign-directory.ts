import type { Pool } from "pg";
import type { Campaign, CampaignDirectory } from "../pipeline/types.js";

type SendListRow = {
  campaign_id: string;
  name: string;
  active: boolean;
  lead_id: string;
  email: string;
  subject: string;
};

/**
 * Read side of the campaign tables in migrations/001_reply_core.sql.
 */
export class PostgresCampaignDirectory implements CampaignDirectory {
  private readonly pool: Pool;

  constructor(pool: Pool) {
    this.pool = pool;
  }

  async findByTrackingId(trackingId: string): Promise<{ campaignId: string; leadId: string } | null> {
    const result = await this.pool.query<{ campaign_id: string; lead_id: string }>(
      "SELECT campaign_id, lead_id FROM campaign_send_list WHERE tracking_id = $1 LIMIT 1",
      [trackingId]
    );
    const row = result.rows[0];
    return row ? { campaignId: row.campaign_id, leadId: row.lead_id } : null;
  }

  async findLeadByEmail(email: string): Promise<{ leadId: string; campaignId?: string } | null> {
    const result = await this.pool.query<{ campaign_id: string; lead_id: string }>(
      `
        SELECT campaign_id, lead_id
        FROM campaign_send_list
        WHERE lower(email) = lower($1)
        ORDER BY sent_at DESC
        LIMIT 1
      `,
      [email]
    );
    const row = result.rows[0];
    return row ? { leadId: row.lead_id, campaignId: row.campaign_id } : null;
  }

  async listActiveCampaigns(): Promise<Campaign[]> {
    const result = await this.pool.query<SendListRow>(
      `
        SELECT c.campaign_id, c.name, c.active, s.lead_id, s.email, s.subject
        FROM campaigns c
        JOIN campaign_send_list s ON s.campaign_id = c.campaign_id
        WHERE c.active = true
        ORDER BY c.campaign_id ASC, s.lead_id ASC
      `
    );

    const campaigns = new Map<string, Campaign>();
    for (const row of result.rows) {
      const campaign = campaigns.get(row.campaign_id) ?? {
        campaignId: row.campaign_id,
        name: row.name,
        active: row.active,
        sendList: []
      };
      campaign.sendList.push({ leadId: row.lead_id, email: row.email, subject: row.subject });
      campaigns.set(row.campaign_id, campaign);
    }
    return [...campaigns.values()];
  }
}

export type StaticSendListEntry = {
  leadId: string;
  email: string;
  subject: string;
  trackingId?: string;
};

export type StaticCampaign = {
  campaignId: string;
  name: string;
  active?: boolean;
  sendList: StaticSendListEntry[];
};

/**
 * Directory over a fixed campaign list, for local runs and tests.
 */
export class MemoryCampaignDirectory implements CampaignDirectory {
  private readonly campaigns: StaticCampaign[];

  constructor(campaigns: StaticCampaign[] = []) {
    this.campaigns = campaigns;
  }

  async findByTrackingId(trackingId: string): Promise<{ campaignId: string; leadId: string } | null> {
    for (const campaign of this.campaigns) {
      const entry = campaign.sendList.find((candidate) => candidate.trackingId === trackingId);
      if (entry) {
        return { campaignId: campaign.campaignId, leadId: entry.leadId };
      }
    }
    return null;
  }

  async findLeadByEmail(email: string): Promise<{ leadId: string; campaignId?: string } | null> {
    const normalized = email.trim().toLowerCase();
    for (const campaign of this.campaigns) {
      const entry = campaign.sendList.find((candidate) => candidate.email.toLowerCase() === normalized);
      if (entry) {
        return { leadId: entry.leadId, campaignId: campaign.campaignId };
      }
    }
    return null;
  }

  async listActiveCampaigns(): Promise<Campaign[]> {
    return this.campaigns
      .filter((campaign) => campaign.active !== false)
      .map((campaign) => ({
        campaignId: campaign.campaignId,
        name: campaign.name,
        active: true,
        sendList: campaign.sendList.map(({ leadId, email, subject }) => ({ leadId, email, subject }))
      }));
  }
}
