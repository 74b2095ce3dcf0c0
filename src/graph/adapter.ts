import { log } from "../logger.js";
import { InvalidRequestError, StorageUnavailableError, classifyBackendError, errorMessage } from "../errors.js";
import type { ComponentHealth } from "../types.js";
import type { GraphBackend, GraphEntity, GraphEpisode, GraphFact } from "./backend.js";
import type { ExtractionContextProvider } from "./extraction-context.js";
import {
  EDGE_TYPES,
  EDGE_TYPE_MAP,
  ENTITY_TYPES,
  type EntityTypeName,
  isEntityTypeName,
  normalizePredicate,
} from "./ontology.js";

const NAMESPACE_RE = /^[A-Za-z0-9_-]+$/;
const DUPLICATE_PREDICATE = "IS_DUPLICATE_OF";

export interface ScoredFact {
  fact: GraphFact;
  score: number;
}

export interface EpisodeInput {
  text: string;
  referenceTime?: string;
  namespace?: string;
  channel?: string;
  name?: string;
  source?: string;
  entityTypes?: EntityTypeName[];
  extractionInstructions?: string;
  hints?: string;
}

export interface EpisodeSummary {
  episodeUuid: string;
  namespace: string;
  entities: GraphEntity[];
  facts: GraphFact[];
  summary: string;
}

export interface TripletInput {
  source: string;
  predicate: string;
  target: string;
  fact?: string;
  sourceType?: string;
  targetType?: string;
  namespace?: string;
}

export interface Subgraph {
  root: string;
  namespace: string;
  entities: GraphEntity[];
  facts: GraphFact[];
}

export function formatFact(fact: GraphFact): string {
  return `${fact.sourceEntity} → ${fact.predicate} → ${fact.targetEntity}: ${fact.factText}`;
}

export function formatEpisode(episode: GraphEpisode): string {
  const content = episode.content.length > 200 ? `${episode.content.slice(0, 200)}...` : episode.content;
  return `[${episode.createdAt}] ${content}`;
}

/**
 * Namespace-scoped access to the knowledge graph.
 *
 * Every call resolves to exactly one namespace, which is passed to the
 * backend as its only group filter. Records that still come back with a
 * different or missing namespace are dropped and counted.
 */
export class GraphAdapter {
  private isolationViolations = 0;
  private lastError: string | null = null;

  constructor(
    private readonly backend: GraphBackend | null,
    readonly defaultNamespace: string,
    private readonly context: ExtractionContextProvider,
  ) {
    this.resolveNamespace(defaultNamespace);
  }

  get configured(): boolean {
    return this.backend !== null;
  }

  resolveNamespace(namespace?: string): string {
    const ns = (namespace ?? this.defaultNamespace).trim();
    if (!NAMESPACE_RE.test(ns)) {
      throw new InvalidRequestError(`invalid graph namespace "${ns}"`);
    }
    return ns;
  }

  async addEpisode(input: EpisodeInput): Promise<EpisodeSummary> {
    if (!input.text.trim()) throw new InvalidRequestError("episode text is required");
    const namespace = this.resolveNamespace(input.namespace);
    const channel = input.channel ?? "unknown";
    const instructions = input.extractionInstructions ?? (await this.context.compose(channel, input.hints));

    const wanted = input.entityTypes && input.entityTypes.length > 0 ? input.entityTypes : null;
    const entityTypes = Object.fromEntries(
      Object.entries(ENTITY_TYPES).filter(([name]) => wanted === null || wanted.some((w) => w === name)),
    );

    const referenceTime = input.referenceTime ?? new Date().toISOString();
    const result = await this.call("add_episode", (backend) =>
      backend.addEpisode({
        name: input.name ?? `episode-${referenceTime}`,
        text: input.text,
        referenceTime,
        namespace,
        source: input.source ?? channel,
        entityTypes,
        edgeTypes: EDGE_TYPES,
        edgeTypeMap: EDGE_TYPE_MAP,
        extractionInstructions: instructions,
      }),
    );

    const entities = this.scoped(result.entities, namespace, "add_episode");
    const facts = this.scoped(result.facts, namespace, "add_episode");
    return {
      episodeUuid: result.episodeUuid,
      namespace,
      entities,
      facts,
      summary: `extracted ${entities.length} entities and ${facts.length} facts`,
    };
  }

  async addTriplet(input: TripletInput): Promise<GraphFact> {
    const source = input.source.trim();
    const target = input.target.trim();
    const predicate = normalizePredicate(input.predicate);
    if (!source || !target || !predicate) {
      throw new InvalidRequestError("triplet needs a source, predicate and target");
    }
    for (const t of [input.sourceType, input.targetType]) {
      if (t !== undefined && !isEntityTypeName(t)) {
        throw new InvalidRequestError(`unknown entity type "${t}"`);
      }
    }
    const namespace = this.resolveNamespace(input.namespace);
    const fact = input.fact?.trim() || `${source} ${predicate.toLowerCase().replace(/_/g, " ")} ${target}`;

    const created = await this.call("add_triplet", (backend) =>
      backend.addTriplet({
        source,
        predicate,
        target,
        fact,
        sourceType: input.sourceType ?? null,
        targetType: input.targetType ?? null,
        namespace,
      }),
    );
    const [kept] = this.scoped([created], namespace, "add_triplet");
    if (!kept) throw new StorageUnavailableError("graph backend stored the triplet outside the requested namespace");
    return kept;
  }

  async search(query: string, namespace?: string, limit = 10): Promise<ScoredFact[]> {
    const ns = this.resolveNamespace(namespace);
    if (!query.trim()) return [];
    const facts = await this.call("search", (backend) =>
      backend.searchFacts({ query, namespaces: [ns], limit }),
    );
    const kept = this.scoped(facts, ns, "search").filter((f) => f.predicate !== DUPLICATE_PREDICATE);
    return kept.map((fact, i) => ({ fact, score: 1 - (i / kept.length) * 0.5 }));
  }

  async explore(entityName: string, depth = 2, namespace?: string): Promise<Subgraph> {
    const ns = this.resolveNamespace(namespace);
    const root = entityName.trim();
    if (!root) throw new InvalidRequestError("entity name is required");
    const clamped = Math.min(3, Math.max(1, Math.floor(depth)));
    const result = await this.call("explore", (backend) =>
      backend.explore({ entityName: root, depth: clamped, namespaces: [ns] }),
    );
    return {
      root,
      namespace: ns,
      entities: this.scoped(result.entities, ns, "explore"),
      facts: this.scoped(result.facts, ns, "explore").filter((f) => f.predicate !== DUPLICATE_PREDICATE),
    };
  }

  /** Episodes in the window, oldest first. */
  async timeline(since?: string, until?: string, namespace?: string, limit = 50): Promise<GraphEpisode[]> {
    const ns = this.resolveNamespace(namespace);
    const episodes = await this.call("timeline", (backend) =>
      backend.episodes({ namespaces: [ns], since, until, limit }),
    );
    const sinceMs = since ? Date.parse(since) : -Infinity;
    const untilMs = until ? Date.parse(until) : Infinity;
    return this.scoped(episodes, ns, "timeline")
      .filter((e) => {
        const t = Date.parse(e.referenceTime);
        return !Number.isFinite(t) || (t >= sinceMs && t <= untilMs);
      })
      .sort((a, b) => a.referenceTime.localeCompare(b.referenceTime))
      .slice(-limit);
  }

  async delete(uuid: string): Promise<boolean> {
    if (!uuid.trim()) throw new InvalidRequestError("fact uuid is required");
    return this.call("delete", (backend) => backend.deleteFact(uuid.trim()));
  }

  async health(): Promise<ComponentHealth> {
    const counts = { isolationViolations: this.isolationViolations };
    if (!this.backend) {
      return { status: "degraded", message: "graph backend not configured", counts };
    }
    try {
      await this.backend.ping();
    } catch (err) {
      return { status: "degraded", message: `graph backend unreachable: ${errorMessage(err)}`, counts };
    }
    if (this.isolationViolations > 0) {
      return {
        status: "degraded",
        message: `backend returned ${this.isolationViolations} records from other namespaces`,
        counts,
      };
    }
    if (this.lastError) {
      return { status: "degraded", message: `last call failed: ${this.lastError}`, counts };
    }
    return { status: "healthy", message: `namespace ${this.defaultNamespace}`, counts };
  }

  private scoped<T extends { namespace: string | null }>(items: T[], namespace: string, op: string): T[] {
    const kept = items.filter((item) => item.namespace === namespace);
    const dropped = items.length - kept.length;
    if (dropped > 0) {
      this.isolationViolations += dropped;
      log.error(`graph ${op}: dropped ${dropped} records outside namespace ${namespace}`);
    }
    return kept;
  }

  private async call<T>(op: string, fn: (backend: GraphBackend) => Promise<T>): Promise<T> {
    const backend = this.backend;
    if (!backend) throw new StorageUnavailableError("graph backend not configured");
    try {
      const result = await fn(backend);
      this.lastError = null;
      return result;
    } catch (err) {
      if (err instanceof InvalidRequestError) throw err;
      this.lastError = errorMessage(err);
      const info = classifyBackendError(err);
      log.warn(`graph ${op} failed (${info.category}): ${info.advice}`, err);
      throw new StorageUnavailableError(`graph ${op} failed: ${errorMessage(err)}`, info, { cause: err });
    }
  }
}
