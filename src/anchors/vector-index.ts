import path from "node:path";
import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { z } from "zod";
import { log } from "../logger.js";
import { cosineSimilarity } from "./embeddings.js";

export interface VectorEntry {
  id: string;
  vector: number[];
  contentHash: string;
}

export interface VectorMatch {
  id: string;
  score: number;
}

/** Derived, rebuildable projection of the anchor files. */
export interface VectorIndex {
  upsert(entry: VectorEntry): Promise<void>;
  remove(id: string): Promise<boolean>;
  query(vector: number[], limit: number): Promise<VectorMatch[]>;
  get(id: string): Promise<VectorEntry | null>;
  ids(): Promise<string[]>;
  count(): Promise<number>;
  clear(): Promise<void>;
}

const IndexFileSchema = z.object({
  version: z.literal(1),
  model: z.string(),
  entries: z.record(
    z.object({
      vector: z.array(z.number()),
      contentHash: z.string(),
    }),
  ),
});

type IndexFile = z.infer<typeof IndexFileSchema>;

/**
 * Vector index kept as one JSON file, rewritten atomically on each change.
 * Every call reads the file again: other processes write it too, and writers
 * hold the anchors lock across their read and rewrite.
 */
export class JsonVectorIndex implements VectorIndex {
  constructor(
    private readonly indexPath: string,
    private readonly model: string,
  ) {}

  async upsert(entry: VectorEntry): Promise<void> {
    const index = await this.load();
    index.entries[entry.id] = { vector: entry.vector, contentHash: entry.contentHash };
    await this.save(index);
  }

  async remove(id: string): Promise<boolean> {
    const index = await this.load();
    if (!(id in index.entries)) return false;
    delete index.entries[id];
    await this.save(index);
    return true;
  }

  async query(vector: number[], limit: number): Promise<VectorMatch[]> {
    const index = await this.load();
    return Object.entries(index.entries)
      .map(([id, entry]) => ({ id, score: cosineSimilarity(vector, entry.vector) }))
      .filter((m) => Number.isFinite(m.score))
      .sort((a, b) => b.score - a.score)
      .slice(0, Math.max(1, limit));
  }

  async get(id: string): Promise<VectorEntry | null> {
    const index = await this.load();
    const entry = index.entries[id];
    return entry ? { id, ...entry } : null;
  }

  async ids(): Promise<string[]> {
    return Object.keys((await this.load()).entries).sort();
  }

  async count(): Promise<number> {
    return Object.keys((await this.load()).entries).length;
  }

  async clear(): Promise<void> {
    await this.save({ version: 1, model: this.model, entries: {} });
  }

  private async load(): Promise<IndexFile> {
    const raw = await readFile(this.indexPath, "utf-8").catch((err: unknown) => {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") return null;
      throw err;
    });

    if (raw !== null) {
      const parsed = IndexFileSchema.safeParse(safeJson(raw));
      if (parsed.success && parsed.data.model === this.model) return parsed.data;
      // A different model's vectors are not comparable; start over and let resync refill.
      log.warn(`anchor index at ${this.indexPath} is unreadable or built with another model; starting empty`);
    }

    return { version: 1, model: this.model, entries: {} };
  }

  private async save(index: IndexFile): Promise<void> {
    await mkdir(path.dirname(this.indexPath), { recursive: true });
    const tmp = `${this.indexPath}.tmp`;
    await writeFile(tmp, JSON.stringify(index), "utf-8");
    await rename(tmp, this.indexPath);
  }
}

function safeJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return null;
  }
}
