import type { Pool, PoolClient } from "pg";
import {
  asThreadKey,
  compareChronologically,
  type AttributionRecord,
  type ClassificationResult,
  type LeadScore,
  type ReplyOutcomePayload,
  type ReplyThread,
  type ThreadEntry,
  type ThreadKey
} from "@reply-triage/shared";
import { StateCorruptionError } from "../pipeline/errors.js";
import type {
  CalibrationParams,
  CalibrationSample,
  MessageCommit,
  ProcessedMessageRecord,
  ProcessedStatus,
  ReplyStore
} from "../pipeline/types.js";

type ThreadRow = {
  thread_key: string;
  normalized_subject: string;
  participants: string[];
  is_spam: boolean;
};

type EntryRow = {
  entry: ThreadEntry;
};

type ProcessedRow = {
  message_id: string;
  thread_key: string;
  status: ProcessedStatus;
  outcome: ReplyOutcomePayload | null;
  emitted: boolean;
};

type LeadScoreRow = {
  lead_id: string;
  score: number;
  last_engaged_at_ms: string;
  update_count: number;
  archived: boolean;
};

function toLeadScore(row: LeadScoreRow): LeadScore {
  return {
    leadId: row.lead_id,
    score: Number(row.score),
    lastEngagedAtMs: Number(row.last_engaged_at_ms),
    updateCount: row.update_count,
    archived: row.archived
  };
}

/**
 * ReplyStore over PostgreSQL (see migrations/001_reply_core.sql). Each
 * message commit is one transaction.
 */
export class PostgresReplyStore implements ReplyStore {
  private readonly pool: Pool;

  constructor(pool: Pool) {
    this.pool = pool;
  }

  private async withTransaction<T>(callback: (client: PoolClient) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      await client.query("BEGIN");
      const result = await callback(client);
      await client.query("COMMIT");
      return result;
    } catch (error) {
      await client.query("ROLLBACK");
      throw error;
    } finally {
      client.release();
    }
  }

  async getThread(threadKey: ThreadKey): Promise<ReplyThread | null> {
    const threadResult = await this.pool.query<ThreadRow>(
      `
        SELECT thread_key, normalized_subject, participants, is_spam
        FROM reply_threads
        WHERE thread_key = $1
      `,
      [threadKey]
    );
    const row = threadResult.rows[0];
    if (!row) {
      return null;
    }

    const entryResult = await this.pool.query<EntryRow>(
      "SELECT entry FROM reply_thread_entries WHERE thread_key = $1",
      [threadKey]
    );
    const entries = entryResult.rows
      .map((entryRow) => entryRow.entry)
      .sort((left, right) => compareChronologically(left.message, right.message));

    return {
      threadKey: asThreadKey(row.thread_key),
      normalizedSubject: row.normalized_subject,
      participants: row.participants,
      entries,
      isSpam: row.is_spam
    };
  }

  async findThreadKeyByMessageId(messageId: string): Promise<ThreadKey | null> {
    const result = await this.pool.query<{ thread_key: string }>(
      "SELECT thread_key FROM reply_thread_entries WHERE message_id = $1",
      [messageId]
    );
    const row = result.rows[0];
    return row ? asThreadKey(row.thread_key) : null;
  }

  async getProcessed(messageId: string): Promise<ProcessedMessageRecord | null> {
    const result = await this.pool.query<ProcessedRow>(
      `
        SELECT message_id, thread_key, status, outcome, emitted
        FROM reply_processed
        WHERE message_id = $1
      `,
      [messageId]
    );
    const row = result.rows[0];
    if (!row) {
      return null;
    }
    return {
      messageId: row.message_id,
      threadKey: asThreadKey(row.thread_key),
      status: row.status,
      outcome: row.outcome ?? undefined,
      emitted: row.emitted
    };
  }

  async getClassification(messageId: string): Promise<ClassificationResult | null> {
    const result = await this.pool.query<EntryRow>("SELECT entry FROM reply_thread_entries WHERE message_id = $1", [
      messageId
    ]);
    return result.rows[0]?.entry.classification ?? null;
  }

  async getAttribution(threadKey: ThreadKey): Promise<AttributionRecord | null> {
    const result = await this.pool.query<{ record: AttributionRecord }>(
      "SELECT record FROM reply_attributions WHERE thread_key = $1",
      [threadKey]
    );
    return result.rows[0]?.record ?? null;
  }

  async getLeadScore(leadId: string): Promise<LeadScore | null> {
    const result = await this.pool.query<LeadScoreRow>(
      `
        SELECT lead_id, score, last_engaged_at_ms, update_count, archived
        FROM lead_scores
        WHERE lead_id = $1
      `,
      [leadId]
    );
    const row = result.rows[0];
    return row ? toLeadScore(row) : null;
  }

  async commitMessage(commit: MessageCommit): Promise<void> {
    const messageId = commit.entry.message.messageId;
    await this.withTransaction(async (client) => {
      await client.query(
        `
          INSERT INTO reply_threads (thread_key, normalized_subject, participants, is_spam)
          VALUES ($1, $2, $3::jsonb, $4)
          ON CONFLICT (thread_key)
          DO UPDATE SET
            participants = EXCLUDED.participants,
            is_spam = reply_threads.is_spam AND EXCLUDED.is_spam,
            updated_at = now()
        `,
        [commit.threadKey, commit.normalizedSubject, JSON.stringify(commit.participants), commit.entry.isSpam]
      );

      const processed = await client.query(
        `
          INSERT INTO reply_processed (message_id, thread_key, status, outcome, emitted)
          VALUES ($1, $2, $3, $4::jsonb, $5)
          ON CONFLICT (message_id) DO NOTHING
        `,
        [
          messageId,
          commit.threadKey,
          commit.status,
          commit.outcome ? JSON.stringify(commit.outcome) : null,
          commit.outcome === undefined
        ]
      );
      if (processed.rowCount !== 1) {
        throw new StateCorruptionError({ scope: "store", detail: `message ${messageId} committed twice` });
      }

      await client.query(
        `
          INSERT INTO reply_thread_entries (message_id, thread_key, received_at_ms, content_hash, entry)
          VALUES ($1, $2, $3, $4, $5::jsonb)
        `,
        [
          messageId,
          commit.threadKey,
          commit.entry.message.receivedAtMs,
          commit.entry.contentHash,
          JSON.stringify(commit.entry)
        ]
      );

      if (commit.attribution) {
        await client.query(
          `
            INSERT INTO reply_attributions (thread_key, campaign_id, lead_id, precedence, revision, record)
            VALUES ($1, $2, $3, $4, $5, $6::jsonb)
            ON CONFLICT (thread_key)
            DO UPDATE SET
              campaign_id = EXCLUDED.campaign_id,
              lead_id = EXCLUDED.lead_id,
              precedence = EXCLUDED.precedence,
              revision = EXCLUDED.revision,
              record = EXCLUDED.record,
              updated_at = now()
          `,
          [
            commit.threadKey,
            commit.attribution.campaignId,
            commit.attribution.leadId,
            commit.attribution.precedence,
            commit.attribution.revision,
            JSON.stringify(commit.attribution)
          ]
        );
      }

      if (commit.score) {
        await client.query(
          `
            INSERT INTO lead_scores (lead_id, score, last_engaged_at_ms, update_count, archived)
            VALUES ($1, $2, $3, $4, $5)
            ON CONFLICT (lead_id)
            DO UPDATE SET
              score = EXCLUDED.score,
              last_engaged_at_ms = EXCLUDED.last_engaged_at_ms,
              update_count = EXCLUDED.update_count,
              archived = EXCLUDED.archived,
              updated_at = now()
          `,
          [
            commit.score.leadId,
            commit.score.score,
            commit.score.lastEngagedAtMs,
            commit.score.updateCount,
            commit.score.archived
          ]
        );
      }
    });
  }

  async markEmitted(messageId: string): Promise<void> {
    await this.pool.query(
      "UPDATE reply_processed SET emitted = true, emitted_at = now() WHERE message_id = $1",
      [messageId]
    );
  }

  async archiveLead(leadId: string): Promise<LeadScore> {
    const result = await this.pool.query<LeadScoreRow>(
      `
        INSERT INTO lead_scores (lead_id, score, last_engaged_at_ms, update_count, archived)
        VALUES ($1, 0, 0, 0, true)
        ON CONFLICT (lead_id)
        DO UPDATE SET archived = true, updated_at = now()
        RETURNING lead_id, score, last_engaged_at_ms, update_count, archived
      `,
      [leadId]
    );
    const row = result.rows[0];
    if (!row) {
      throw new Error(`lead archive failed for ${leadId}`);
    }
    return toLeadScore(row);
  }

  async appendCalibrationSample(sample: CalibrationSample): Promise<boolean> {
    const result = await this.pool.query(
      `
        INSERT INTO calibration_samples (message_id, sample, recorded_at_ms)
        VALUES ($1, $2::jsonb, $3)
        ON CONFLICT (message_id) DO NOTHING
      `,
      [sample.messageId, JSON.stringify(sample), sample.recordedAtMs]
    );
    return result.rowCount === 1;
  }

  async listCalibrationSamples(): Promise<CalibrationSample[]> {
    const result = await this.pool.query<{ sample: CalibrationSample }>(
      "SELECT sample FROM calibration_samples ORDER BY recorded_at_ms ASC, message_id ASC"
    );
    return result.rows.map((row) => row.sample);
  }

  async getCalibrationParams(): Promise<CalibrationParams | null> {
    const result = await this.pool.query<{ params: CalibrationParams }>(
      "SELECT params FROM calibration_params WHERE id = 1"
    );
    return result.rows[0]?.params ?? null;
  }

  async saveCalibrationParams(params: CalibrationParams): Promise<void> {
    await this.pool.query(
      `
        INSERT INTO calibration_params (id, version, params)
        VALUES (1, $1, $2::jsonb)
        ON CONFLICT (id)
        DO UPDATE SET version = EXCLUDED.version, params = EXCLUDED.params, updated_at = now()
        WHERE calibration_params.version < EXCLUDED.version
      `,
      [params.version, JSON.stringify(params)]
    );
  }
}
