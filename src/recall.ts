import { log } from "./logger.js";
import { errorMessage } from "./errors.js";
import type { AnchorIndex } from "./anchors/anchor-index.js";
import type { CrystalEngine } from "./crystals/engine.js";
import { crystalText } from "./crystals/format.js";
import type { GraphAdapter } from "./graph/adapter.js";
import { formatFact } from "./graph/adapter.js";
import type { IngestionBacklog } from "./summaries/ingestion.js";
import type { Summarizer } from "./summaries/summarizer.js";
import type { TurnStore } from "./turns/store.js";
import type { ComponentHealth, HealthStatus, LayerName, RankedResult, RecallLayer } from "./types.js";

export const STARTUP_CONTEXT = "startup";

const STARTUP_CRYSTALS = 3;
const STARTUP_ANCHORS = 2;
const STARTUP_SUMMARIES = 2;
const STARTUP_SUMMARY_CHARS = 500;
const STARTUP_TURN_CHARS = 1000;
const STARTUP_TURN_CAP = 500;

const LAYER_LABELS: Record<LayerName, string> = {
  crystals: "Crystals",
  anchors: "Word-photos",
  texture: "Rich texture",
  summaries: "Summaries",
  turns: "Recent turns",
};

export interface RecallSources {
  turns: TurnStore;
  anchors: AnchorIndex;
  crystals: CrystalEngine;
  summaries: Summarizer;
  graph: GraphAdapter;
  ingestion: IngestionBacklog;
}

export interface RecallOptions {
  limitPerLayer: number;
  summaryBacklogThreshold: number;
  ingestionBacklogThreshold: number;
}

export interface ManifestEntry {
  layer: LayerName;
  chars: number;
  items: number;
}

export interface RecallResponse {
  text: string;
  results: RankedResult[];
  manifest: ManifestEntry[];
  degraded: LayerName[];
}

export interface HealthReport {
  status: HealthStatus;
  timestamp: string;
  components: Record<string, ComponentHealth>;
}

function clip(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

// ---------------------------------------------------------------------------
// Layers
// ---------------------------------------------------------------------------

class CrystalLayer implements RecallLayer {
  readonly name = "crystals" as const;
  constructor(private readonly engine: CrystalEngine) {}
  search(query: string, limit: number): Promise<RankedResult[]> {
    return this.engine.search(query, limit);
  }
  health(): Promise<ComponentHealth> {
    return this.engine.health();
  }
}

class AnchorLayer implements RecallLayer {
  readonly name = "anchors" as const;
  constructor(private readonly anchors: AnchorIndex) {}
  async search(query: string, limit: number): Promise<RankedResult[]> {
    const { results, unavailable } = await this.anchors.searchDetailed(query, limit);
    if (unavailable) throw unavailable;
    return results;
  }
  health(): Promise<ComponentHealth> {
    return this.anchors.health();
  }
}

class TextureLayer implements RecallLayer {
  readonly name = "texture" as const;
  constructor(private readonly graph: GraphAdapter) {}
  async search(query: string, limit: number): Promise<RankedResult[]> {
    const facts = await this.graph.search(query, undefined, limit);
    return facts.map(({ fact, score }): RankedResult => ({
      layer: "texture",
      content: formatFact(fact),
      source: fact.uuid,
      score,
      metadata: { validAt: fact.validAt, namespace: fact.namespace },
    }));
  }
  health(): Promise<ComponentHealth> {
    return this.graph.health();
  }
}

class SummaryLayer implements RecallLayer {
  readonly name = "summaries" as const;
  constructor(private readonly summaries: Summarizer) {}
  async search(query: string, limit: number): Promise<RankedResult[]> {
    return this.summaries.search(query, limit);
  }
  async health(): Promise<ComponentHealth> {
    return this.summaries.health();
  }
}

class TurnLayer implements RecallLayer {
  readonly name = "turns" as const;
  constructor(private readonly turns: TurnStore) {}
  async search(query: string, limit: number): Promise<RankedResult[]> {
    return this.turns.search(query, limit).map(({ turn, relevance }): RankedResult => ({
      layer: "turns",
      content: `${turn.author}: ${turn.content}`,
      source: `turn ${turn.id}`,
      score: relevance,
      metadata: { channel: turn.channel, created: turn.createdAt },
    }));
  }
  async health(): Promise<ComponentHealth> {
    try {
      const counts = this.turns.counts();
      return {
        status: "healthy",
        message: `${counts.total} turns captured`,
        counts: { total: counts.total, unsummarized: counts.unsummarized, uningested: counts.uningested },
      };
    } catch (err) {
      return { status: "critical", message: `turn store unavailable: ${errorMessage(err)}`, counts: {} };
    }
  }
}

export function createRecallLayers(sources: RecallSources): RecallLayer[] {
  return [
    new CrystalLayer(sources.crystals),
    new AnchorLayer(sources.anchors),
    new TextureLayer(sources.graph),
    new SummaryLayer(sources.summaries),
    new TurnLayer(sources.turns),
  ];
}

// ---------------------------------------------------------------------------
// Aggregator
// ---------------------------------------------------------------------------

export function formatResults(results: RankedResult[]): string {
  return results
    .map((r) => {
      const location = typeof r.metadata?.location === "string" ? ` | location: ${r.metadata.location}` : "";
      return `[${r.layer}] (score: ${r.score.toFixed(2)}${location})\nSource: ${r.source}\n${r.content}`;
    })
    .join("\n---\n");
}

export function formatManifest(manifest: ManifestEntry[]): string {
  const lines = ["=== AMBIENT RECALL MANIFEST ==="];
  for (const m of manifest) {
    lines.push(`${LAYER_LABELS[m.layer]}: ${m.chars} chars (${m.items} items)`);
  }
  lines.push(`TOTAL: ${manifest.reduce((sum, m) => sum + m.chars, 0)} chars`);
  lines.push("===");
  return lines.join("\n");
}

function buildManifest(results: RankedResult[]): ManifestEntry[] {
  const order: LayerName[] = ["crystals", "anchors", "texture", "summaries", "turns"];
  return order.map((layer) => {
    const mine = results.filter((r) => r.layer === layer);
    return { layer, items: mine.length, chars: mine.reduce((sum, r) => sum + r.content.length, 0) };
  });
}

/**
 * One query surface over every memory layer. Each layer is searched
 * independently; a failing layer is reported as degraded and contributes
 * nothing.
 */
export class AmbientRecall {
  private readonly layers: RecallLayer[];

  constructor(
    private readonly sources: RecallSources,
    private readonly options: RecallOptions,
    layers?: RecallLayer[],
  ) {
    this.layers = layers ?? createRecallLayers(sources);
  }

  async recall(context: string, limitPerLayer?: number, now: Date = new Date()): Promise<RecallResponse> {
    const limit = limitPerLayer && limitPerLayer > 0 ? Math.floor(limitPerLayer) : this.options.limitPerLayer;
    const { results, degraded } =
      context.trim().toLowerCase() === STARTUP_CONTEXT ? await this.startupPackage() : await this.fanOut(context, limit);

    const manifest = buildManifest(results);
    const text = [
      `[clock] ${now.toISOString()}`,
      `[memory health] ${this.memoryHealthLine()}`,
      ...(degraded.length > 0 ? [`[degraded layers] ${degraded.join(", ")}`] : []),
      "",
      formatManifest(manifest),
      "",
      results.length > 0 ? formatResults(results) : "(no memories matched)",
    ].join("\n");

    return { text, results, manifest, degraded };
  }

  memoryHealthLine(): string {
    const { unsummarized, uningested } = this.sources.turns.counts();
    const s = this.options.summaryBacklogThreshold;
    const g = this.options.ingestionBacklogThreshold;

    let summaries: string;
    if (unsummarized > s * 4) summaries = `HIGH: ${unsummarized} unsummarized turns, summarize now`;
    else if (unsummarized > s * 2) summaries = `${unsummarized} unsummarized turns, summarization recommended`;
    else if (unsummarized >= s) summaries = `${unsummarized} unsummarized turns, summarization available`;
    else summaries = `${unsummarized} unsummarized turns`;

    let graph: string;
    if (uningested > g * 5) graph = `HIGH: ${uningested} turns awaiting graph ingestion`;
    else if (uningested >= g) graph = `${uningested} turns awaiting graph ingestion, ingestion recommended`;
    else graph = `${uningested} turns awaiting graph ingestion`;

    return `${summaries}; ${graph}`;
  }

  async health(): Promise<HealthReport> {
    const components: Record<string, ComponentHealth> = {};
    const settled = await Promise.allSettled(this.layers.map((l) => l.health()));
    settled.forEach((res, i) => {
      const name = this.layers[i].name;
      components[name] =
        res.status === "fulfilled"
          ? res.value
          : { status: "degraded", message: `health check failed: ${errorMessage(res.reason)}`, counts: {} };
    });

    try {
      const stats = this.sources.ingestion.stats();
      components.ingestion = {
        status: stats.uningestedCount > this.options.ingestionBacklogThreshold * 5 ? "degraded" : "healthy",
        message: `${stats.uningestedCount} turns awaiting graph ingestion`,
        counts: { uningested: stats.uningestedCount },
      };
    } catch (err) {
      components.ingestion = { status: "degraded", message: errorMessage(err), counts: {} };
    }

    const statuses = Object.values(components).map((c) => c.status);
    let status: HealthStatus = "healthy";
    if (components.turns?.status === "critical") status = "critical";
    else if (statuses.some((s) => s !== "healthy")) status = "degraded";

    return { status, timestamp: new Date().toISOString(), components };
  }

  private async fanOut(query: string, limit: number): Promise<{ results: RankedResult[]; degraded: LayerName[] }> {
    const settled = await Promise.allSettled(this.layers.map((l) => l.search(query, limit)));
    const results: RankedResult[] = [];
    const degraded: LayerName[] = [];
    settled.forEach((res, i) => {
      const layer = this.layers[i].name;
      if (res.status === "fulfilled") {
        results.push(...res.value.map((r) => ({ ...r, layer })));
      } else {
        degraded.push(layer);
        log.warn(`ambient recall: ${layer} layer failed`, res.reason);
      }
    });
    results.sort((a, b) => b.score - a.score);
    return { results, degraded };
  }

  // Recency package for the start of a session: no query, just what the
  // agent needs to orient itself.
  private async startupPackage(): Promise<{ results: RankedResult[]; degraded: LayerName[] }> {
    const results: RankedResult[] = [];
    const degraded: LayerName[] = [];
    const attempt = async (layer: LayerName, fn: () => Promise<RankedResult[]>): Promise<void> => {
      try {
        results.push(...(await fn()));
      } catch (err) {
        degraded.push(layer);
        log.warn(`ambient recall: startup ${layer} failed`, err);
      }
    };

    await attempt("crystals", async () =>
      (await this.sources.crystals.getRecent(STARTUP_CRYSTALS)).map((c): RankedResult => ({
        layer: "crystals",
        content: crystalText(c),
        source: c.filename,
        score: 1,
      })),
    );
    await attempt("anchors", async () =>
      (await this.sources.anchors.recent(STARTUP_ANCHORS)).map((a): RankedResult => ({
        layer: "anchors",
        content: a.content,
        source: a.filename,
        score: 1,
        ...(a.location ? { metadata: { location: a.location } } : {}),
      })),
    );
    await attempt("summaries", async () =>
      this.sources.summaries
        .recent(STARTUP_SUMMARIES)
        .reverse()
        .map((s): RankedResult => ({
          layer: "summaries",
          content: clip(s.text, STARTUP_SUMMARY_CHARS),
          source: `summary #${s.id} (turns ${s.startId}-${s.endId})`,
          score: 1,
        })),
    );
    await attempt("turns", async () =>
      this.sources.turns.unsummarized(STARTUP_TURN_CAP).map((t): RankedResult => ({
        layer: "turns",
        content: clip(`${t.author}: ${t.content}`, STARTUP_TURN_CHARS),
        source: `turn ${t.id} [${t.channel}]`,
        score: 1,
      })),
    );
    return { results, degraded };
  }
}
