import { z } from "zod";
import { log } from "../logger.js";
import { ExtractionFailureError, InvalidRequestError } from "../errors.js";
import type { LlmClient } from "../llm.js";
import { SummaryOutputSchema } from "../schemas.js";
import type { TurnStore } from "../turns/store.js";
import type { ComponentHealth, RankedResult, StoredSummary, SummaryDraft, SummaryKind, SummaryStats, Turn } from "../types.js";

interface SummaryRow {
  id: number;
  text: string;
  start_turn_id: number;
  end_turn_id: number;
  turn_count: number;
  channels: string;
  kind: string;
  time_span_start: string;
  time_span_end: string;
  created_at: string;
}

const SUMMARY_KINDS: readonly SummaryKind[] = ["work", "social", "technical"];
const ChannelsJson = z.array(z.string());
const MAX_TURN_CHARS = 2000;

const SUMMARY_INSTRUCTIONS = `You compress a stretch of conversation into a dense summary that will stand in for the raw turns.

Keep:
- decisions and the reasons given for them
- breakthroughs, realizations and changes of plan
- blockers and unresolved problems
- action items and promises, with who owns them
- emotionally significant moments

Drop:
- greetings, filler and acknowledgements
- debugging back-and-forth and repeated attempts (keep only the outcome)
- tool output, logs and code listings

Write in past tense, third person, naming speakers. Aim for roughly one tenth of the input length.`;

export function isSummaryKind(value: string): value is SummaryKind {
  return SUMMARY_KINDS.some((k) => k === value);
}

function parseChannels(raw: string): string[] {
  try {
    const parsed = ChannelsJson.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : [];
  } catch (err) {
    log.warn(`unreadable channels column ${JSON.stringify(raw)}`, err);
    return [];
  }
}

function toSummary(row: SummaryRow): StoredSummary {
  return {
    id: row.id,
    text: row.text,
    startId: row.start_turn_id,
    endId: row.end_turn_id,
    channels: parseChannels(row.channels),
    kind: isSummaryKind(row.kind) ? row.kind : "work",
    turnCount: row.turn_count,
    timeSpanStart: row.time_span_start,
    timeSpanEnd: row.time_span_end,
    createdAt: row.created_at,
  };
}

export function formatTurnsForPrompt(turns: Turn[]): string {
  return turns
    .map((t) => {
      const content = t.content.length > MAX_TURN_CHARS ? `${t.content.slice(0, MAX_TURN_CHARS)}...` : t.content;
      return `[${t.createdAt}] [${t.channel}] ${t.author}: ${content}`;
    })
    .join("\n");
}

function countOccurrences(haystack: string, needle: string): number {
  if (!needle) return 0;
  let count = 0;
  let idx = haystack.indexOf(needle);
  while (idx !== -1) {
    count++;
    idx = haystack.indexOf(needle, idx + needle.length);
  }
  return count;
}

export interface SummarizerOptions {
  minTurns: number;
  batchLimit: number;
  backlogThreshold: number;
}

/** Mid-tier compression of the turn ledger. Summaries share the ledger's database. */
export class Summarizer {
  constructor(
    private readonly turns: TurnStore,
    private readonly llm: LlmClient | null,
    private readonly options: SummarizerOptions,
  ) {}

  /** Compress the oldest unsummarized range. Nothing is persisted. */
  async summarize(limit: number = this.options.batchLimit, kind?: SummaryKind): Promise<SummaryDraft> {
    const turns = this.turns.unsummarizedRange(Math.max(1, limit));
    if (turns.length === 0) throw new InvalidRequestError("No unsummarized turns found");
    if (turns.length < this.options.minTurns) {
      throw new InvalidRequestError(
        `Only ${turns.length} unsummarized turns; need at least ${this.options.minTurns}`,
      );
    }
    if (!this.llm) throw new ExtractionFailureError("no LLM configured for summarization");

    const output = await this.llm.parse(SummaryOutputSchema, {
      name: "turn_summary",
      instructions: SUMMARY_INSTRUCTIONS,
      input: formatTurnsForPrompt(turns),
    });
    const text = output.summary.trim();
    if (!text) throw new ExtractionFailureError("summarization returned an empty summary");

    return {
      text,
      startId: turns[0].id,
      endId: turns[turns.length - 1].id,
      channels: [...new Set(turns.map((t) => t.channel))].sort(),
      kind: kind ?? output.kind,
    };
  }

  /**
   * Persist a summary and mark its range covered. Re-storing an identical
   * range is a no-op; a partial overlap is rejected. With no channels given,
   * the channels of the covered turns are recorded.
   */
  store(draft: SummaryDraft): { summary: StoredSummary; created: boolean } {
    const text = draft.text.trim();
    if (!text) throw new InvalidRequestError("summary text is required");
    if (!Number.isInteger(draft.startId) || !Number.isInteger(draft.endId) || draft.startId > draft.endId) {
      throw new InvalidRequestError(`invalid turn range ${draft.startId}..${draft.endId}`);
    }
    const db = this.turns.db;

    const tx = db.transaction((): { summary: StoredSummary; created: boolean } => {
      const first = this.turns.get(draft.startId);
      const last = this.turns.get(draft.endId);
      if (!first || !last) {
        throw new InvalidRequestError(`turn range ${draft.startId}..${draft.endId} does not exist`);
      }

      const same = db
        .prepare<[number, number], SummaryRow>("SELECT * FROM summaries WHERE start_turn_id = ? AND end_turn_id = ?")
        .get(draft.startId, draft.endId);
      if (same) {
        log.info(`summary for turns ${draft.startId}..${draft.endId} already stored (#${same.id}); no-op`);
        return { summary: toSummary(same), created: false };
      }

      const overlap = db
        .prepare<[number, number], { id: number }>(
          "SELECT id FROM summaries WHERE start_turn_id <= ? AND end_turn_id >= ? LIMIT 1",
        )
        .get(draft.endId, draft.startId);
      if (overlap) {
        throw new InvalidRequestError(
          `turns ${draft.startId}..${draft.endId} overlap summary #${overlap.id}`,
        );
      }

      const span = db
        .prepare<[number, number], { n: number; first: string; last: string }>(
          "SELECT COUNT(*) AS n, MIN(created_at) AS first, MAX(created_at) AS last FROM turns WHERE id BETWEEN ? AND ?",
        )
        .get(draft.startId, draft.endId);
      const count = span?.n ?? 0;
      if (count === 0) throw new InvalidRequestError("summary covers no turns");

      const createdAt = new Date().toISOString();
      const channels =
        draft.channels.length > 0
          ? [...new Set(draft.channels)].sort()
          : db
              .prepare<[number, number], { channel: string }>(
                "SELECT DISTINCT channel FROM turns WHERE id BETWEEN ? AND ? ORDER BY channel",
              )
              .all(draft.startId, draft.endId)
              .map((r) => r.channel);
      const info = db
        .prepare(
          `INSERT INTO summaries(text, start_turn_id, end_turn_id, turn_count, channels, kind, time_span_start, time_span_end, created_at)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        )
        .run(
          text,
          draft.startId,
          draft.endId,
          count,
          JSON.stringify(channels),
          draft.kind,
          span?.first ?? first.createdAt,
          span?.last ?? last.createdAt,
          createdAt,
        );
      const id = Number(info.lastInsertRowid);
      const marked = this.turns.markSummarized({ start: draft.startId, end: draft.endId }, id);
      log.debug(`stored summary #${id} over ${draft.startId}..${draft.endId} (${marked} turns marked)`);

      return {
        summary: {
          id,
          text,
          startId: draft.startId,
          endId: draft.endId,
          channels,
          kind: draft.kind,
          turnCount: count,
          timeSpanStart: span?.first ?? first.createdAt,
          timeSpanEnd: span?.last ?? last.createdAt,
          createdAt,
        },
        created: true,
      };
    });
    return tx();
  }

  get(id: number): StoredSummary | null {
    const row = this.turns.db.prepare<[number], SummaryRow>("SELECT * FROM summaries WHERE id = ?").get(id);
    return row ? toSummary(row) : null;
  }

  /** Newest first. */
  recent(limit: number): StoredSummary[] {
    return this.turns.db
      .prepare<[number], SummaryRow>("SELECT * FROM summaries ORDER BY end_turn_id DESC LIMIT ?")
      .all(limit)
      .map(toSummary);
  }

  /** Summaries that end after `turnId`, oldest first. */
  since(turnId: number): StoredSummary[] {
    return this.turns.db
      .prepare<[number], SummaryRow>("SELECT * FROM summaries WHERE end_turn_id > ? ORDER BY start_turn_id ASC")
      .all(turnId)
      .map(toSummary);
  }

  search(query: string, limit: number): RankedResult[] {
    const q = query.trim();
    if (!q) return [];
    const rows = this.turns.db
      .prepare<[string, number], SummaryRow>(
        "SELECT * FROM summaries WHERE text LIKE ? ORDER BY end_turn_id DESC LIMIT ?",
      )
      .all(`%${q}%`, limit);
    return rows.map((row): RankedResult => {
      const hits = countOccurrences(row.text.toLowerCase(), q.toLowerCase());
      return {
        layer: "summaries",
        content: row.text,
        source: `summary #${row.id} (turns ${row.start_turn_id}-${row.end_turn_id})`,
        score: Math.min(1, hits * 0.2 + 0.3),
        metadata: { kind: row.kind, timeSpanStart: row.time_span_start, timeSpanEnd: row.time_span_end },
      };
    });
  }

  backlogCount(): number {
    return this.turns.counts().unsummarized;
  }

  stats(): SummaryStats {
    const total = this.turns.db.prepare<[], { n: number }>("SELECT COUNT(*) AS n FROM summaries").get();
    const unsummarized = this.backlogCount();
    return {
      totalSummaries: total?.n ?? 0,
      unsummarizedCount: unsummarized,
      recommended: unsummarized >= this.options.backlogThreshold,
    };
  }

  health(): ComponentHealth {
    const stats = this.stats();
    const counts = { summaries: stats.totalSummaries, unsummarized: stats.unsummarizedCount };
    if (!this.llm) {
      return { status: "degraded", message: "no LLM configured; summarization disabled", counts };
    }
    if (stats.unsummarizedCount > this.options.backlogThreshold * 4) {
      return { status: "degraded", message: `${stats.unsummarizedCount} turns awaiting summarization`, counts };
    }
    return { status: "healthy", message: `${stats.totalSummaries} summaries`, counts };
  }
}
