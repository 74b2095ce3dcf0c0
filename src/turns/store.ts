import path from "node:path";
import { copyFile, mkdir, rm } from "node:fs/promises";
import Database from "better-sqlite3";
import { log } from "../logger.js";
import { InvalidRequestError, StorageUnavailableError } from "../errors.js";
import type { NewTurn, Turn, TurnCounts, TurnFilter, TurnRange } from "../types.js";
import { LEDGER_SCHEMA_VERSION, LEDGER_TABLES_SQL } from "./schema.js";
import { checkLedgerIntegrity, snapshotLedger, verifySnapshot } from "./backup.js";

interface TurnRow {
  id: number;
  channel: string;
  author: string;
  content: string;
  created_at: string;
  summary_id: number | null;
  ingested_to_graph: number;
  ingestion_batch_id: string | null;
}

type SqlParam = string | number;

export interface TurnSearchHit {
  turn: Turn;
  relevance: number;
}

function toTurn(row: TurnRow): Turn {
  return {
    id: row.id,
    channel: row.channel,
    author: row.author,
    content: row.content,
    createdAt: row.created_at,
    summaryId: row.summary_id,
    ingestedToGraph: row.ingested_to_graph === 1,
    ingestionBatchId: row.ingestion_batch_id,
  };
}

function normalizeTimestamp(value: string, field: string): string {
  const ms = Date.parse(value);
  if (!Number.isFinite(ms)) throw new InvalidRequestError(`${field} is not a valid timestamp: ${value}`);
  return new Date(ms).toISOString();
}

export function ftsRelevance(rank: number): number {
  return Math.max(0.1, Math.min(1.0, 1 / (Math.abs(rank) + 1)));
}

/**
 * Append-only ledger of conversational turns.
 *
 * Writers in several processes may share the file: ids come from
 * AUTOINCREMENT so they are never reused, WAL keeps readers off the writer,
 * and busy_timeout absorbs short write contention.
 */
export class TurnStore {
  private handle: Database.Database | null = null;

  constructor(readonly dbPath: string) {}

  async initialize(): Promise<void> {
    await mkdir(path.dirname(this.dbPath), { recursive: true });
    this.open();
  }

  private open(): void {
    const db = new Database(this.dbPath);
    db.exec("PRAGMA journal_mode=WAL;");
    db.exec("PRAGMA busy_timeout=5000;");
    db.exec(LEDGER_TABLES_SQL);
    db.prepare("INSERT OR IGNORE INTO meta(key, value) VALUES (?, ?)").run(
      "schemaVersion",
      String(LEDGER_SCHEMA_VERSION),
    );
    this.handle = db;
  }

  get db(): Database.Database {
    if (!this.handle) throw new StorageUnavailableError("turn store is not open");
    return this.handle;
  }

  get isOpen(): boolean {
    return this.handle !== null;
  }

  close(): void {
    this.handle?.close();
    this.handle = null;
  }

  append(turn: NewTurn): number {
    const channel = turn.channel.trim();
    const author = turn.author.trim();
    if (!channel) throw new InvalidRequestError("turn channel is required");
    if (!author) throw new InvalidRequestError("turn author is required");
    const createdAt = turn.createdAt ? normalizeTimestamp(turn.createdAt, "createdAt") : new Date().toISOString();

    const info = this.db
      .prepare("INSERT INTO turns(channel, author, content, created_at) VALUES (?, ?, ?, ?)")
      .run(channel, author, turn.content, createdAt);
    return Number(info.lastInsertRowid);
  }

  get(id: number): Turn | null {
    const row = this.db.prepare<[number], TurnRow>("SELECT * FROM turns WHERE id = ?").get(id);
    return row ? toTurn(row) : null;
  }

  query(filter: TurnFilter = {}): Turn[] {
    const where: string[] = [];
    const params: SqlParam[] = [];
    if (filter.channel) {
      where.push("channel = ?");
      params.push(filter.channel);
    }
    if (filter.author) {
      where.push("author = ?");
      params.push(filter.author);
    }
    if (filter.since) {
      where.push("created_at >= ?");
      params.push(normalizeTimestamp(filter.since, "since"));
    }
    if (filter.until) {
      where.push("created_at <= ?");
      params.push(normalizeTimestamp(filter.until, "until"));
    }

    const limit = filter.limit && filter.limit > 0 ? Math.floor(filter.limit) : -1;
    const run = (textClause: string | null, textParam: string | null): Turn[] => {
      const clauses = textClause ? [...where, textClause] : where;
      const args = textParam === null ? [...params] : [...params, textParam];
      const sql =
        "SELECT * FROM turns" +
        (clauses.length > 0 ? ` WHERE ${clauses.join(" AND ")}` : "") +
        " ORDER BY id ASC LIMIT ?";
      return this.db
        .prepare<SqlParam[], TurnRow>(sql)
        .all(...args, limit)
        .map(toTurn);
    };

    const text = filter.fullText?.trim();
    if (!text) return run(null, null);
    try {
      return run("id IN (SELECT rowid FROM turns_fts WHERE turns_fts MATCH ?)", text);
    } catch (err) {
      log.debug(`turn query: FTS rejected "${text}", using LIKE (${String(err)})`);
      return run("content LIKE ?", `%${text}%`);
    }
  }

  /** Full-text search ranked by bm25; malformed queries fall back to a substring scan. */
  search(query: string, limit: number, channel?: string): TurnSearchHit[] {
    const text = query.trim();
    if (!text) return [];
    const channelClause = channel ? " AND t.channel = ?" : "";
    const channelArgs: SqlParam[] = channel ? [channel] : [];

    try {
      const rows = this.db
        .prepare<SqlParam[], TurnRow & { rank: number }>(
          `SELECT t.*, bm25(turns_fts) AS rank
             FROM turns_fts JOIN turns t ON t.id = turns_fts.rowid
            WHERE turns_fts MATCH ?${channelClause}
            ORDER BY rank LIMIT ?`,
        )
        .all(text, ...channelArgs, limit);
      return rows.map((row) => ({ turn: toTurn(row), relevance: ftsRelevance(row.rank) }));
    } catch (err) {
      log.debug(`turn search: FTS rejected "${text}", using LIKE (${String(err)})`);
      const rows = this.db
        .prepare<SqlParam[], TurnRow>(
          `SELECT t.* FROM turns t WHERE t.content LIKE ?${channelClause} ORDER BY t.id DESC LIMIT ?`,
        )
        .all(`%${text}%`, ...channelArgs, limit);
      return rows.map((row) => ({ turn: toTurn(row), relevance: 0.5 }));
    }
  }

  /** Most recent turns, returned oldest first. */
  latest(limit: number): Turn[] {
    return this.db
      .prepare<[number], TurnRow>("SELECT * FROM turns ORDER BY id DESC LIMIT ?")
      .all(limit)
      .reverse()
      .map(toTurn);
  }

  after(id: number, limit: number): Turn[] {
    return this.db
      .prepare<[number, number], TurnRow>("SELECT * FROM turns WHERE id > ? ORDER BY id ASC LIMIT ?")
      .all(id, limit)
      .map(toTurn);
  }

  count(): number {
    return this.scalar("SELECT COUNT(*) AS n FROM turns");
  }

  countAfter(id: number): number {
    return this.scalar("SELECT COUNT(*) AS n FROM turns WHERE id > ?", id);
  }

  maxId(): number {
    return this.scalar("SELECT COALESCE(MAX(id), 0) AS n FROM turns");
  }

  counts(): TurnCounts {
    return {
      total: this.count(),
      unsummarized: this.scalar("SELECT COUNT(*) AS n FROM turns WHERE summary_id IS NULL"),
      uningested: this.scalar("SELECT COUNT(*) AS n FROM turns WHERE ingested_to_graph = 0"),
    };
  }

  unsummarized(limit: number): Turn[] {
    return this.db
      .prepare<[number], TurnRow>("SELECT * FROM turns WHERE summary_id IS NULL ORDER BY id ASC LIMIT ?")
      .all(limit)
      .map(toTurn);
  }

  uningested(limit: number): Turn[] {
    return this.db
      .prepare<[number], TurnRow>("SELECT * FROM turns WHERE ingested_to_graph = 0 ORDER BY id ASC LIMIT ?")
      .all(limit)
      .map(toTurn);
  }

  /** Oldest unsummarized turns over a contiguous id range. */
  unsummarizedRange(limit: number): Turn[] {
    return this.contiguous("summary_id IS NULL", "summary_id IS NOT NULL", limit);
  }

  /** Oldest uningested turns over a contiguous id range. */
  uningestedRange(limit: number): Turn[] {
    return this.contiguous("ingested_to_graph = 0", "ingested_to_graph = 1", limit);
  }

  // Cut the pending rows at the first already-processed id so the result
  // always covers one unbroken range.
  private contiguous(pending: string, processed: string, limit: number): Turn[] {
    const rows = this.db
      .prepare<[number], TurnRow>(`SELECT * FROM turns WHERE ${pending} ORDER BY id ASC LIMIT ?`)
      .all(limit);
    if (rows.length === 0) return [];
    const first = rows[0].id;
    const last = rows[rows.length - 1].id;
    const gap = this.db
      .prepare<[number, number], { id: number | null }>(
        `SELECT MIN(id) AS id FROM turns WHERE ${processed} AND id > ? AND id < ?`,
      )
      .get(first, last);
    const cut = gap?.id ?? null;
    return rows.filter((r) => cut === null || r.id < cut).map(toTurn);
  }

  /** Tag the unsummarized turns in `range` with `summaryId`. Returns how many changed. */
  markSummarized(range: TurnRange, summaryId: number): number {
    const info = this.db
      .prepare("UPDATE turns SET summary_id = ? WHERE id BETWEEN ? AND ? AND summary_id IS NULL")
      .run(summaryId, range.start, range.end);
    return info.changes;
  }

  /** Tag the uningested turns in `range` with `batchId`. Already-ingested turns keep their batch. */
  markGraphIngested(range: TurnRange, batchId: string): number {
    const info = this.db
      .prepare(
        "UPDATE turns SET ingested_to_graph = 1, ingestion_batch_id = ? WHERE id BETWEEN ? AND ? AND ingested_to_graph = 0",
      )
      .run(batchId, range.start, range.end);
    return info.changes;
  }

  integrityCheck(): { ok: boolean; problems: string[] } {
    const problems = checkLedgerIntegrity(this.db);
    if (problems.length > 0) log.error(`turn store integrity check failed: ${problems.join("; ")}`);
    return { ok: problems.length === 0, problems };
  }

  async backup(outDir: string, retentionDays: number): Promise<string> {
    const snapshot = await snapshotLedger(this.db, outDir, retentionDays);
    log.info(`turn store snapshot written to ${snapshot}`);
    return snapshot;
  }

  /** Replace the ledger with a verified snapshot. The store is reopened afterwards. */
  async restore(snapshotPath: string): Promise<void> {
    const problems = verifySnapshot(snapshotPath);
    if (problems.length > 0) {
      throw new InvalidRequestError(`refusing to restore damaged snapshot: ${problems.join("; ")}`);
    }

    this.close();
    try {
      await rm(`${this.dbPath}-wal`, { force: true });
      await rm(`${this.dbPath}-shm`, { force: true });
      await copyFile(snapshotPath, this.dbPath);
    } finally {
      this.open();
    }
    log.info(`turn store restored from ${snapshotPath}`);
  }

  private scalar(sql: string, ...params: SqlParam[]): number {
    const row = this.db.prepare<SqlParam[], { n: number }>(sql).get(...params);
    return row?.n ?? 0;
  }
}
