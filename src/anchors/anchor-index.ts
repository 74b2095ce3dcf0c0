import path from "node:path";
import { createHash } from "node:crypto";
import { mkdir, readdir, readFile, rm, stat, writeFile } from "node:fs/promises";
import { log } from "../logger.js";
import {
  InvalidRequestError,
  StorageUnavailableError,
  SyncDriftError,
  classifyBackendError,
  errorMessage,
} from "../errors.js";
import type { CooperativeLock } from "../locks.js";
import { bulletList, parseBullets, parseFrontmatter, serializeFrontmatter, splitSections } from "../markdown.js";
import type {
  Anchor,
  AnchorInput,
  AnchorListEntry,
  AnchorSyncSummary,
  ComponentHealth,
  RankedResult,
} from "../types.js";
import type { EmbeddingProvider } from "./embeddings.js";
import type { VectorIndex } from "./vector-index.js";

const EMBED_BATCH = 16;

const REVEALED_HEADING = "What It Revealed";
const SEEDS_HEADING = "Continuity Seeds";

export function safeTitle(title: string): string {
  const cleaned = title
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9_-]/g, "_")
    .replace(/_+/g, "_")
    .replace(/^_+|_+$/g, "");
  return cleaned.slice(0, 80) || "untitled";
}

export function anchorStem(filename: string): string {
  const base = filename.trim().replace(/\.md$/i, "");
  if (!base || base !== path.basename(base) || base.startsWith(".")) {
    throw new InvalidRequestError(`invalid anchor filename: ${filename}`);
  }
  return base;
}

export function renderAnchor(input: AnchorInput, created: string): string {
  const fm = serializeFrontmatter([
    ["title", input.title.trim()],
    ["created", created],
    ["location", input.location],
  ]);
  const parts = [fm, "", `# ${input.title.trim()}`, "", input.content.trim()];
  if (input.revealed && input.revealed.trim()) {
    parts.push("", `## ${REVEALED_HEADING}`, "", input.revealed.trim());
  }
  if (input.continuitySeeds && input.continuitySeeds.length > 0) {
    parts.push("", `## ${SEEDS_HEADING}`, "", bulletList(input.continuitySeeds));
  }
  return parts.join("\n") + "\n";
}

export function parseAnchor(filename: string, raw: string, fallbackCreated: string): Anchor {
  const parsed = parseFrontmatter(raw);
  const fm = parsed?.frontmatter ?? {};
  const body = parsed ? parsed.body : raw.trim();

  const sections = splitSections(body, [REVEALED_HEADING, SEEDS_HEADING]);
  let lead = sections.get("") ?? "";
  const heading = lead.trimStart().match(/^#\s+(.+)$/m);
  if (heading && heading.index === 0) {
    lead = lead.trimStart().slice(heading[0].length).trim();
  }

  const seeds = parseBullets(sections.get("continuity seeds"));
  const revealed = sections.get("what it revealed");
  return {
    filename,
    title: fm.title || heading?.[1]?.trim() || anchorStem(filename),
    content: lead,
    createdAt: fm.created || fallbackCreated,
    ...(fm.location ? { location: fm.location } : {}),
    ...(revealed ? { revealed } : {}),
    ...(seeds.length > 0 ? { continuitySeeds: seeds } : {}),
  };
}

export interface AnchorSearch {
  results: RankedResult[];
  /** The embedding backend could not be reached; `results` is empty. */
  unavailable: StorageUnavailableError | null;
  /** Index entries whose files are gone. They are skipped. */
  drift: SyncDriftError | null;
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

function contentHash(raw: string): string {
  return createHash("sha256").update(raw).digest("hex");
}

/**
 * Curated markdown notes on disk, mirrored into a vector index.
 *
 * Disk is the source of truth. Index writes that fail leave the file in
 * place and show up as drift in `list()` until `resync()` rebuilds the index.
 */
export class AnchorIndex {
  private lastBackendError: string | null = null;

  constructor(
    private readonly dir: string,
    private readonly embedder: EmbeddingProvider | null,
    private readonly index: VectorIndex,
    private readonly lock: CooperativeLock,
  ) {}

  async initialize(): Promise<void> {
    await mkdir(this.dir, { recursive: true });
  }

  async save(input: AnchorInput, now: Date = new Date()): Promise<{ filename: string; indexed: boolean }> {
    if (!input.title.trim()) throw new InvalidRequestError("anchor title is required");
    if (!input.content.trim()) throw new InvalidRequestError("anchor content is required");

    return this.lock.runExclusive(async () => {
      await this.initialize();
      const stem = await this.freeStem(`${now.toISOString().slice(0, 10)}_${safeTitle(input.title)}`);
      const filename = `${stem}.md`;
      const raw = renderAnchor(input, now.toISOString());
      await writeFile(path.join(this.dir, filename), raw, "utf-8");
      log.debug(`wrote anchor ${filename}`);

      const indexed = await this.tryIndex(stem, raw);
      return { filename, indexed };
    });
  }

  async search(query: string, limit: number): Promise<RankedResult[]> {
    return (await this.searchDetailed(query, limit)).results;
  }

  /** Search, also reporting an unreachable backend and index drift instead of hiding them. */
  async searchDetailed(query: string, limit: number): Promise<AnchorSearch> {
    if (!this.embedder || !query.trim()) return { results: [], unavailable: null, drift: null };

    let vector: number[];
    try {
      const [embedded] = await this.embedder.embed([query]);
      if (!embedded) return { results: [], unavailable: null, drift: null };
      vector = embedded;
      this.lastBackendError = null;
    } catch (err) {
      this.lastBackendError = errorMessage(err);
      log.warn("anchor search degraded: embedding backend unavailable", err);
      const unavailable =
        err instanceof StorageUnavailableError
          ? err
          : new StorageUnavailableError(`embedding backend unavailable: ${errorMessage(err)}`, classifyBackendError(err), {
              cause: err,
            });
      return { results: [], unavailable, drift: null };
    }

    const matches = await this.index.query(vector, limit);
    const results: RankedResult[] = [];
    const orphans: string[] = [];
    for (const match of matches) {
      const anchor = await this.read(`${match.id}.md`);
      if (!anchor) {
        orphans.push(`${match.id}.md`);
        continue;
      }
      results.push({
        layer: "anchors",
        content: anchor.content,
        source: anchor.filename,
        score: match.score,
        metadata: { title: anchor.title, created: anchor.createdAt, location: anchor.location ?? null },
      });
    }

    let drift: SyncDriftError | null = null;
    if (orphans.length > 0) {
      drift = new SyncDriftError(`index entries without files: ${orphans.join(", ")}; run anchor_resync`);
      log.warn(`anchor search: ${drift.message}`);
    }
    return { results, unavailable: null, drift };
  }

  async read(filename: string): Promise<Anchor | null> {
    const stem = anchorStem(filename);
    const fp = path.join(this.dir, `${stem}.md`);
    try {
      const [raw, info] = await Promise.all([readFile(fp, "utf-8"), stat(fp)]);
      return parseAnchor(`${stem}.md`, raw, info.mtime.toISOString());
    } catch (err) {
      if (isNotFound(err)) return null;
      throw err;
    }
  }

  /** Newest anchors first, by file modification time. */
  async recent(limit: number): Promise<Anchor[]> {
    const stems = await this.diskStems();
    const withTimes = await Promise.all(
      stems.map(async (stem) => ({ stem, mtime: (await stat(path.join(this.dir, `${stem}.md`))).mtimeMs })),
    );
    withTimes.sort((a, b) => b.mtime - a.mtime || b.stem.localeCompare(a.stem));
    const out: Anchor[] = [];
    for (const { stem } of withTimes.slice(0, limit)) {
      const anchor = await this.read(`${stem}.md`);
      if (anchor) out.push(anchor);
    }
    return out;
  }

  async delete(filename: string): Promise<{ deleted: boolean; diskDeleted: boolean; indexDeleted: boolean }> {
    const stem = anchorStem(filename);
    return this.lock.runExclusive(async () => {
      const fp = path.join(this.dir, `${stem}.md`);
      let diskDeleted = false;
      try {
        await stat(fp);
        await rm(fp);
        diskDeleted = true;
      } catch (err) {
        log.debug(`anchor delete: ${stem}.md not on disk (${errorMessage(err)})`);
      }
      const indexDeleted = await this.index.remove(stem);
      if (diskDeleted !== indexDeleted) {
        log.warn(`anchor ${stem} was only present on ${diskDeleted ? "disk" : "the index"}`);
      }
      return { deleted: diskDeleted || indexDeleted, diskDeleted, indexDeleted };
    });
  }

  async list(): Promise<{ entries: AnchorListEntry[]; summary: AnchorSyncSummary }> {
    const disk = new Set(await this.diskStems());
    const indexed = new Set(await this.index.ids());
    const all = [...new Set([...disk, ...indexed])].sort();

    const entries = all.map((stem) => ({
      filename: `${stem}.md`,
      inIndex: indexed.has(stem),
      onDisk: disk.has(stem),
    }));
    const orphans = entries.filter((e) => e.inIndex && !e.onDisk).map((e) => e.filename);
    const missing = entries.filter((e) => e.onDisk && !e.inIndex).map((e) => e.filename);
    const synced = entries.length - orphans.length - missing.length;
    return {
      entries,
      summary: {
        disk: disk.size,
        indexed: indexed.size,
        synced,
        orphans,
        missing,
        inSync: orphans.length === 0 && missing.length === 0,
      },
    };
  }

  /** Wipe the index and rebuild it from the files on disk. */
  async resync(): Promise<{ indexed: number; removed: number }> {
    const embedder = this.embedder;
    if (!embedder) throw new StorageUnavailableError("no embedding provider configured");

    return this.lock.runExclusive(async () => {
      const removed = (await this.index.ids()).length;
      await this.index.clear();

      const stems = await this.diskStems();
      let indexed = 0;
      for (let i = 0; i < stems.length; i += EMBED_BATCH) {
        const chunk = stems.slice(i, i + EMBED_BATCH);
        const raws = await Promise.all(chunk.map((s) => readFile(path.join(this.dir, `${s}.md`), "utf-8")));
        let vectors: number[][];
        try {
          vectors = await embedder.embed(raws);
          this.lastBackendError = null;
        } catch (err) {
          this.lastBackendError = errorMessage(err);
          throw err;
        }
        for (let j = 0; j < chunk.length; j++) {
          const vector = vectors[j];
          if (!vector) continue;
          await this.index.upsert({ id: chunk[j], vector, contentHash: contentHash(raws[j]) });
          indexed++;
        }
      }
      log.info(`anchor resync: ${indexed} indexed (${removed} entries cleared)`);
      return { indexed, removed };
    });
  }

  async health(): Promise<ComponentHealth> {
    try {
      const { summary } = await this.list();
      const counts = {
        disk: summary.disk,
        indexed: summary.indexed,
        orphans: summary.orphans.length,
        missing: summary.missing.length,
      };
      if (!this.embedder) {
        return { status: "degraded", message: "no embedding provider; search disabled", counts };
      }
      if (this.lastBackendError) {
        return { status: "degraded", message: `embedding backend unavailable: ${this.lastBackendError}`, counts };
      }
      if (!summary.inSync) {
        return { status: "degraded", message: "disk and index out of sync; run anchor_resync", counts };
      }
      return { status: "healthy", message: `${summary.disk} anchors in sync`, counts };
    } catch (err) {
      return { status: "critical", message: `anchor directory unreadable: ${errorMessage(err)}`, counts: {} };
    }
  }

  private async tryIndex(stem: string, raw: string): Promise<boolean> {
    if (!this.embedder) return false;
    try {
      const [vector] = await this.embedder.embed([raw]);
      if (!vector) return false;
      await this.index.upsert({ id: stem, vector, contentHash: contentHash(raw) });
      this.lastBackendError = null;
      return true;
    } catch (err) {
      this.lastBackendError = errorMessage(err);
      log.warn(`anchor ${stem} saved to disk but not indexed`, err);
      return false;
    }
  }

  private async freeStem(base: string): Promise<string> {
    const existing = new Set(await this.diskStems());
    if (!existing.has(base)) return base;
    for (let n = 2; ; n++) {
      const candidate = `${base}-${n}`;
      if (!existing.has(candidate)) return candidate;
    }
  }

  private async diskStems(): Promise<string[]> {
    let names: string[];
    try {
      names = await readdir(this.dir);
    } catch (err) {
      if (isNotFound(err)) return [];
      throw err;
    }
    return names
      .filter((n) => n.endsWith(".md") && !n.startsWith("."))
      .map((n) => n.slice(0, -3))
      .sort();
  }
}
