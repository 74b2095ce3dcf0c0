import path from "node:path";
import { mkdir, readdir, rm } from "node:fs/promises";
import Database from "better-sqlite3";

export const SNAPSHOT_FILENAME = "turns.sqlite";

export function timestampDirName(now: Date): string {
  return now.toISOString().replace(/[:.]/g, "-");
}

/** Copy a live ledger into `<outDir>/<timestamp>/turns.sqlite` using SQLite's online backup. */
export async function snapshotLedger(
  db: Database.Database,
  outDir: string,
  retentionDays: number,
  now: Date = new Date(),
): Promise<string> {
  const outDirAbs = path.resolve(outDir);
  const snapshotDir = path.join(outDirAbs, timestampDirName(now));
  await mkdir(snapshotDir, { recursive: true });

  const snapshotPath = path.join(snapshotDir, SNAPSHOT_FILENAME);
  await db.backup(snapshotPath);

  if (retentionDays > 0) {
    await enforceRetention(outDirAbs, retentionDays, now);
  }
  return snapshotPath;
}

export function checkLedgerIntegrity(db: Database.Database): string[] {
  const rows = db.prepare<[], { integrity_check: string }>("PRAGMA integrity_check").all();
  return rows.map((r) => r.integrity_check).filter((msg) => msg !== "ok");
}

/** Open a snapshot read-only and report any integrity problems (empty when sound). */
export function verifySnapshot(snapshotPath: string): string[] {
  const db = new Database(snapshotPath, { readonly: true, fileMustExist: true });
  try {
    const problems = checkLedgerIntegrity(db);
    const hasTurns = db
      .prepare<[], { n: number }>("SELECT COUNT(*) AS n FROM sqlite_master WHERE type = 'table' AND name = 'turns'")
      .get();
    if (!hasTurns || hasTurns.n === 0) problems.push("snapshot has no turns table");
    return problems;
  } finally {
    db.close();
  }
}

async function enforceRetention(outDirAbs: string, retentionDays: number, now: Date): Promise<void> {
  const entries = await readdir(outDirAbs, { withFileTypes: true });
  const cutoffMs = now.getTime() - retentionDays * 24 * 60 * 60 * 1000;

  for (const ent of entries) {
    if (!ent.isDirectory()) continue;
    const name = ent.name;
    // Directory names are ISO8601 with [: .] replaced by "-".
    // Example: 2026-02-11T05-06-07-123Z => 2026-02-11T05:06:07.123Z
    const m = name.match(/^(\d{4}-\d{2}-\d{2})T(\d{2})-(\d{2})-(\d{2})-(\d{3})Z$/);
    const iso = m ? `${m[1]}T${m[2]}:${m[3]}:${m[4]}.${m[5]}Z` : null;
    const tsMs = iso ? Date.parse(iso) : NaN;
    if (!Number.isFinite(tsMs)) continue;
    if (tsMs < cutoffMs) {
      await rm(path.join(outDirAbs, name), { recursive: true, force: true });
    }
  }
}
