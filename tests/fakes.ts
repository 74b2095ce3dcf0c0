import { mkdtemp, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { z } from "zod";
import type { LlmClient, LlmRequest } from "../src/llm.js";
import type { EmbeddingProvider } from "../src/anchors/embeddings.js";
import type {
  EpisodeExtraction,
  EpisodeRequest,
  GraphBackend,
  GraphEntity,
  GraphEpisode,
  GraphFact,
  TripletRequest,
} from "../src/graph/backend.js";
import { StorageUnavailableError, ExtractionFailureError } from "../src/errors.js";
import { parseConfig } from "../src/config.js";
import type { NewTurn, SubstrateConfig } from "../src/types.js";
import type { TurnStore } from "../src/turns/store.js";
import { CooperativeLock } from "../src/locks.js";
import { Substrate, type SubstrateDeps } from "../src/substrate.js";

export async function withTempDir<T>(prefix: string, fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await mkdtemp(path.join(os.tmpdir(), `strata-${prefix}-`));
  try {
    return await fn(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

export function testConfig(rootDir: string, overrides: Record<string, unknown> = {}): SubstrateConfig {
  return parseConfig({
    rootDir,
    owner: "tester",
    lockRetries: 0,
    crystalTurnThreshold: 50,
    crystalHoursThreshold: 24,
    ...overrides,
  });
}

export interface TestSubstrate {
  substrate: Substrate;
  llm: FakeLlm;
  embedder: FakeEmbedder;
  backend: InMemoryGraphBackend;
}

/** A substrate on fakes under `rootDir`; pass `graphBackend: null` to run without a graph. */
export async function openSubstrate(
  rootDir: string,
  overrides: Record<string, unknown> = {},
  deps: SubstrateDeps = {},
): Promise<TestSubstrate> {
  const llm = new FakeLlm();
  const embedder = new FakeEmbedder();
  const backend = new InMemoryGraphBackend();
  const substrate = new Substrate(testConfig(rootDir, overrides), {
    llm,
    embedder,
    graphBackend: backend,
    ...deps,
  });
  await substrate.initialize();
  return { substrate, llm, embedder, backend };
}

export function testLock(rootDir: string, name: string): CooperativeLock {
  return new CooperativeLock({ locksDir: path.join(rootDir, "locks"), owner: "tester", name, staleMs: 60_000, retries: 0 });
}

/** Append `count` turns with timestamps one minute apart starting at `start`. */
export function seedTurns(
  store: TurnStore,
  count: number,
  start = new Date("2026-03-01T10:00:00.000Z"),
  make: (i: number) => Partial<NewTurn> = () => ({}),
): number[] {
  const ids: number[] = [];
  for (let i = 0; i < count; i++) {
    ids.push(
      store.append({
        channel: "terminal",
        author: i % 2 === 0 ? "alex" : "agent",
        content: `message number ${i + 1}`,
        createdAt: new Date(start.getTime() + i * 60_000).toISOString(),
        ...make(i),
      }),
    );
  }
  return ids;
}

/** Returns queued responses in order, validated by the caller's schema. */
export class FakeLlm implements LlmClient {
  readonly requests: LlmRequest[] = [];
  private readonly responses: unknown[] = [];
  failure: Error | null = null;

  respondWith(...responses: unknown[]): this {
    this.responses.push(...responses);
    return this;
  }

  async parse<T>(schema: z.ZodType<T>, request: LlmRequest): Promise<T> {
    this.requests.push(request);
    if (this.failure) throw this.failure;
    if (this.responses.length === 0) {
      throw new ExtractionFailureError(`no fake response queued for ${request.name}`);
    }
    return schema.parse(this.responses.shift());
  }
}

const DIMENSIONS = 256;

function hashWord(word: string): number {
  let h = 0;
  for (const ch of word) h = (h * 31 + ch.charCodeAt(0)) >>> 0;
  return h % DIMENSIONS;
}

/** Bag-of-words vectors: texts sharing words point the same way. */
export class FakeEmbedder implements EmbeddingProvider {
  readonly model = "fake-embedding";
  failing = false;
  calls = 0;

  async embed(texts: string[]): Promise<number[][]> {
    this.calls++;
    if (this.failing) throw new StorageUnavailableError("embedding backend unreachable");
    return texts.map((text) => {
      const v = new Array<number>(DIMENSIONS).fill(0);
      for (const word of text.toLowerCase().match(/[a-z0-9]+/g) ?? []) v[hashWord(word)] += 1;
      return v;
    });
  }
}

export function fact(partial: Partial<GraphFact> & Pick<GraphFact, "uuid">): GraphFact {
  return {
    sourceEntity: "Alex",
    predicate: "WORKS_ON",
    targetEntity: "Strata",
    factText: "Alex works on Strata",
    namespace: "tester",
    validAt: null,
    invalidAt: null,
    createdAt: "2026-03-01T10:00:00.000Z",
    ...partial,
  };
}

/** Graph service held in memory; honors the namespace filter unless told to leak. */
export class InMemoryGraphBackend implements GraphBackend {
  facts: GraphFact[] = [];
  episodeLog: GraphEpisode[] = [];
  readonly episodeRequests: EpisodeRequest[] = [];
  readonly tripletRequests: TripletRequest[] = [];
  readonly deleted: string[] = [];
  /** Returned from every read regardless of namespace. */
  leaked: GraphFact[] = [];
  /** Every call throws this while set. */
  failure: Error | null = null;
  /** Episodes whose text matches throw. */
  failEpisode: (req: EpisodeRequest) => boolean = () => false;
  /** Deletions of these uuids throw. */
  failDelete = new Set<string>();
  private seq = 0;

  async addEpisode(req: EpisodeRequest): Promise<EpisodeExtraction> {
    this.check();
    if (this.failEpisode(req)) throw new Error(`graph rejected episode ${req.name}`);
    this.episodeRequests.push(req);
    const uuid = `ep-${++this.seq}`;
    this.episodeLog.push({
      uuid,
      name: req.name,
      content: req.text,
      namespace: req.namespace,
      referenceTime: req.referenceTime,
      createdAt: req.referenceTime,
      source: req.source,
    });
    return { episodeUuid: uuid, entities: [], facts: [] };
  }

  async addTriplet(req: TripletRequest): Promise<GraphFact> {
    this.check();
    this.tripletRequests.push(req);
    const created = fact({
      uuid: `edge-${++this.seq}`,
      sourceEntity: req.source,
      predicate: req.predicate,
      targetEntity: req.target,
      factText: req.fact,
      namespace: req.namespace,
    });
    this.facts.push(created);
    return created;
  }

  async searchFacts(req: { query: string; namespaces: string[]; limit: number }): Promise<GraphFact[]> {
    this.check();
    const words = req.query.toLowerCase().split(/\s+/).filter(Boolean);
    const matches = this.facts.filter(
      (f) =>
        f.namespace !== null &&
        req.namespaces.includes(f.namespace) &&
        words.some((w) => `${f.sourceEntity} ${f.targetEntity} ${f.factText}`.toLowerCase().includes(w)),
    );
    return [...matches.slice(0, req.limit), ...this.leaked];
  }

  async explore(req: {
    entityName: string;
    depth: number;
    namespaces: string[];
  }): Promise<{ entities: GraphEntity[]; facts: GraphFact[] }> {
    this.check();
    const facts = this.facts.filter(
      (f) =>
        f.namespace !== null &&
        req.namespaces.includes(f.namespace) &&
        (f.sourceEntity === req.entityName || f.targetEntity === req.entityName),
    );
    const names = new Set(facts.flatMap((f) => [f.sourceEntity, f.targetEntity]));
    const entities = [...names].map((name) => ({ uuid: `node-${name}`, name, type: "Concept", namespace: req.namespaces[0] }));
    return { entities, facts: [...facts, ...this.leaked] };
  }

  async episodes(req: { namespaces: string[]; since?: string; until?: string; limit: number }): Promise<GraphEpisode[]> {
    this.check();
    return this.episodeLog
      .filter((e) => e.namespace !== null && req.namespaces.includes(e.namespace))
      .filter((e) => (!req.since || e.createdAt >= req.since) && (!req.until || e.createdAt <= req.until))
      .slice(-req.limit)
      .reverse();
  }

  async deleteFact(uuid: string): Promise<boolean> {
    this.check();
    if (this.failDelete.has(uuid)) throw new Error(`delete of ${uuid} timed out`);
    const before = this.facts.length;
    this.facts = this.facts.filter((f) => f.uuid !== uuid);
    if (this.facts.length === before) return false;
    this.deleted.push(uuid);
    return true;
  }

  async ping(): Promise<void> {
    this.check();
  }

  private check(): void {
    if (this.failure) throw this.failure;
  }
}
