export const LEDGER_SCHEMA_VERSION = 1 as const;

export const LEDGER_TABLES_SQL = `
CREATE TABLE IF NOT EXISTS meta (
  key TEXT PRIMARY KEY,
  value TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS turns (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  channel TEXT NOT NULL,
  author TEXT NOT NULL,
  content TEXT NOT NULL,
  created_at TEXT NOT NULL,
  summary_id INTEGER,
  ingested_to_graph INTEGER NOT NULL DEFAULT 0,
  ingestion_batch_id TEXT
);

CREATE INDEX IF NOT EXISTS idx_turns_channel ON turns(channel);
CREATE INDEX IF NOT EXISTS idx_turns_created ON turns(created_at);
CREATE INDEX IF NOT EXISTS idx_turns_summary ON turns(summary_id);
CREATE INDEX IF NOT EXISTS idx_turns_ingested ON turns(ingested_to_graph);

CREATE VIRTUAL TABLE IF NOT EXISTS turns_fts USING fts5(
  content,
  author,
  channel,
  content='turns',
  content_rowid='id'
);

CREATE TRIGGER IF NOT EXISTS turns_fts_insert AFTER INSERT ON turns BEGIN
  INSERT INTO turns_fts(rowid, content, author, channel)
  VALUES (new.id, new.content, new.author, new.channel);
END;

CREATE TRIGGER IF NOT EXISTS turns_fts_delete AFTER DELETE ON turns BEGIN
  INSERT INTO turns_fts(turns_fts, rowid, content, author, channel)
  VALUES ('delete', old.id, old.content, old.author, old.channel);
END;

CREATE TRIGGER IF NOT EXISTS turns_immutable BEFORE UPDATE OF channel, author, content, created_at ON turns BEGIN
  SELECT RAISE(ABORT, 'turns are immutable');
END;

CREATE TABLE IF NOT EXISTS summaries (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  text TEXT NOT NULL,
  start_turn_id INTEGER NOT NULL,
  end_turn_id INTEGER NOT NULL,
  turn_count INTEGER NOT NULL,
  channels TEXT NOT NULL,
  kind TEXT NOT NULL DEFAULT 'work',
  time_span_start TEXT NOT NULL,
  time_span_end TEXT NOT NULL,
  created_at TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_summaries_range ON summaries(start_turn_id, end_turn_id);

CREATE TABLE IF NOT EXISTS ingestion_batches (
  batch_id TEXT PRIMARY KEY,
  start_turn_id INTEGER NOT NULL,
  end_turn_id INTEGER NOT NULL,
  channels TEXT NOT NULL,
  ingested_count INTEGER NOT NULL DEFAULT 0,
  failed_count INTEGER NOT NULL DEFAULT 0,
  status TEXT NOT NULL,
  attempts INTEGER NOT NULL DEFAULT 1,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
);
`;
