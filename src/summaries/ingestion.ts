import { v5 as uuidv5 } from "uuid";
import { log } from "../logger.js";
import { IdempotencyViolation, errorMessage } from "../errors.js";
import type { GraphAdapter } from "../graph/adapter.js";
import type { CooperativeLock } from "../locks.js";
import type { TurnStore } from "../turns/store.js";
import type { IngestionBatch, IngestionStats, TurnRange } from "../types.js";

// Fixed UUID namespace for batch ids; changing it would re-key every batch.
const BATCH_ID_NAMESPACE = "4f0c8e52-1d7a-5b3e-9c61-2a8f6e0d9b47";

interface BatchRow {
  batch_id: string;
  status: string;
  attempts: number;
}

export interface IngestionOptions {
  owner: string;
  batchSize: number;
  backlogThreshold: number;
}

export function batchIdFor(owner: string, range: TurnRange): string {
  return uuidv5(`${owner}:${range.start}-${range.end}`, BATCH_ID_NAMESPACE);
}

/**
 * Moves raw turns into the knowledge graph in batches. A batch is marked
 * only when every turn in it was accepted; otherwise the whole batch is
 * retried on the next run.
 */
export class IngestionBacklog {
  constructor(
    private readonly turns: TurnStore,
    private readonly adapter: GraphAdapter,
    private readonly lock: CooperativeLock,
    private readonly options: IngestionOptions,
  ) {}

  stats(): IngestionStats {
    const uningested = this.turns.counts().uningested;
    return { uningestedCount: uningested, recommended: uningested >= this.options.backlogThreshold };
  }

  async ingestBatch(batchSize: number = this.options.batchSize): Promise<IngestionBatch> {
    return this.lock.runExclusive(() => this.runBatch(Math.max(1, Math.floor(batchSize))));
  }

  private async runBatch(batchSize: number): Promise<IngestionBatch> {
    const turns = this.turns.uningestedRange(batchSize);
    if (turns.length === 0) {
      log.debug("graph ingestion: nothing to ingest");
      return { batchId: null, turnIdRange: null, channels: [], ingestedCount: 0, failedCount: 0, status: "noop" };
    }

    const range = { start: turns[0].id, end: turns[turns.length - 1].id };
    const batchId = batchIdFor(this.options.owner, range);
    const channels = [...new Set(turns.map((t) => t.channel))].sort();

    const existing = this.turns.db
      .prepare<[string], BatchRow>("SELECT batch_id, status, attempts FROM ingestion_batches WHERE batch_id = ?")
      .get(batchId);
    if (existing?.status === "complete") {
      const violation = new IdempotencyViolation(`batch ${batchId} (${range.start}-${range.end}) already complete`);
      log.warn(violation.message);
      this.turns.markGraphIngested(range, batchId);
      return { batchId, turnIdRange: range, channels, ingestedCount: 0, failedCount: 0, status: "noop" };
    }

    let ingested = 0;
    let failedAt: number | null = null;
    for (const turn of turns) {
      try {
        await this.adapter.addEpisode({
          text: `${turn.author}: ${turn.content}`,
          referenceTime: turn.createdAt,
          channel: turn.channel,
          name: `turn-${turn.id}`,
          source: `${turn.channel} turn ${turn.id}`,
        });
        ingested++;
      } catch (err) {
        failedAt = turn.id;
        log.warn(`graph ingestion: turn ${turn.id} failed (${errorMessage(err)}); batch ${batchId} will be retried`);
        break;
      }
    }

    const failed = turns.length - ingested;
    const status = failedAt === null ? "complete" : "partial";
    const now = new Date().toISOString();
    const record = this.turns.db.transaction(() => {
      this.turns.db
        .prepare(
          `INSERT INTO ingestion_batches(batch_id, start_turn_id, end_turn_id, channels, ingested_count, failed_count, status, attempts, created_at, updated_at)
           VALUES (?, ?, ?, ?, ?, ?, ?, 1, ?, ?)
           ON CONFLICT(batch_id) DO UPDATE SET
             ingested_count = excluded.ingested_count,
             failed_count = excluded.failed_count,
             status = excluded.status,
             attempts = ingestion_batches.attempts + 1,
             updated_at = excluded.updated_at`,
        )
        .run(batchId, range.start, range.end, JSON.stringify(channels), ingested, failed, status, now, now);
      if (status === "complete") this.turns.markGraphIngested(range, batchId);
    });
    record();

    log.info(`graph ingestion: batch ${batchId} turns ${range.start}-${range.end} ${status} (${ingested}/${turns.length})`);
    return { batchId, turnIdRange: range, channels, ingestedCount: ingested, failedCount: failed, status };
  }
}
