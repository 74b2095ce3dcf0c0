import { z } from "zod";
import { log } from "../logger.js";
import type {
  EpisodeExtraction,
  EpisodeRequest,
  GraphBackend,
  GraphEntity,
  GraphEpisode,
  GraphFact,
  TripletRequest,
} from "./backend.js";

const FactWire = z.object({
  uuid: z.string(),
  name: z.string(),
  fact: z.string(),
  source_node_name: z.string().nullish(),
  target_node_name: z.string().nullish(),
  group_id: z.string().nullish(),
  valid_at: z.string().nullish(),
  invalid_at: z.string().nullish(),
  created_at: z.string().nullish(),
});

const NodeWire = z.object({
  uuid: z.string(),
  name: z.string(),
  labels: z.array(z.string()).nullish(),
  group_id: z.string().nullish(),
});

const EpisodeWire = z.object({
  uuid: z.string(),
  name: z.string().nullish(),
  content: z.string(),
  group_id: z.string().nullish(),
  valid_at: z.string().nullish(),
  created_at: z.string(),
  source_description: z.string().nullish(),
});

const AddEpisodeResponse = z.object({
  episode: z.object({ uuid: z.string() }),
  nodes: z.array(NodeWire).default([]),
  edges: z.array(FactWire).default([]),
});

const FactsResponse = z.object({ facts: z.array(FactWire) });
const SubgraphResponse = z.object({ nodes: z.array(NodeWire), edges: z.array(FactWire) });
const EpisodesResponse = z.union([z.array(EpisodeWire), z.object({ episodes: z.array(EpisodeWire) })]);
const TripletResponse = z.object({ edge: FactWire });

function toFact(w: z.infer<typeof FactWire>): GraphFact {
  return {
    uuid: w.uuid,
    sourceEntity: w.source_node_name ?? "",
    predicate: w.name,
    targetEntity: w.target_node_name ?? "",
    factText: w.fact,
    namespace: w.group_id ?? null,
    validAt: w.valid_at ?? null,
    invalidAt: w.invalid_at ?? null,
    createdAt: w.created_at ?? null,
  };
}

function toEntity(w: z.infer<typeof NodeWire>): GraphEntity {
  const labels = (w.labels ?? []).filter((l) => l !== "Entity");
  return { uuid: w.uuid, name: w.name, type: labels[0] ?? "Entity", namespace: w.group_id ?? null };
}

function toEpisode(w: z.infer<typeof EpisodeWire>): GraphEpisode {
  return {
    uuid: w.uuid,
    name: w.name ?? w.uuid,
    content: w.content,
    namespace: w.group_id ?? null,
    referenceTime: w.valid_at ?? w.created_at,
    createdAt: w.created_at,
    source: w.source_description ?? null,
  };
}

export class GraphHttpError extends Error {
  constructor(
    readonly status: number,
    message: string,
  ) {
    super(message);
    this.name = "GraphHttpError";
  }
}

/** JSON-over-HTTP client for a graph extraction service. */
export class HttpGraphBackend implements GraphBackend {
  private readonly baseUrl: string;

  constructor(
    baseUrl: string,
    private readonly timeoutMs: number = 30_000,
  ) {
    this.baseUrl = baseUrl.replace(/\/+$/, "");
  }

  async addEpisode(req: EpisodeRequest): Promise<EpisodeExtraction> {
    const body = await this.request("POST", "/episodes", {
      group_id: req.namespace,
      name: req.name,
      episode_body: req.text,
      reference_time: req.referenceTime,
      source_description: req.source,
      entity_types: req.entityTypes,
      edge_types: req.edgeTypes,
      edge_type_map: req.edgeTypeMap,
      extraction_instructions: req.extractionInstructions,
    });
    const parsed = AddEpisodeResponse.parse(body);
    return {
      episodeUuid: parsed.episode.uuid,
      entities: parsed.nodes.map(toEntity),
      facts: parsed.edges.map(toFact),
    };
  }

  async addTriplet(req: TripletRequest): Promise<GraphFact> {
    const body = await this.request("POST", "/triplets", {
      group_id: req.namespace,
      source_node: { name: req.source, label: req.sourceType },
      target_node: { name: req.target, label: req.targetType },
      edge: { name: req.predicate, fact: req.fact },
    });
    return toFact(TripletResponse.parse(body).edge);
  }

  async searchFacts(req: { query: string; namespaces: string[]; limit: number }): Promise<GraphFact[]> {
    const body = await this.request("POST", "/search", {
      group_ids: req.namespaces,
      query: req.query,
      max_facts: req.limit,
    });
    return FactsResponse.parse(body).facts.map(toFact);
  }

  async explore(req: {
    entityName: string;
    depth: number;
    namespaces: string[];
  }): Promise<{ entities: GraphEntity[]; facts: GraphFact[] }> {
    const body = await this.request("POST", "/explore", {
      group_ids: req.namespaces,
      entity_name: req.entityName,
      depth: req.depth,
    });
    const parsed = SubgraphResponse.parse(body);
    return { entities: parsed.nodes.map(toEntity), facts: parsed.edges.map(toFact) };
  }

  async episodes(req: { namespaces: string[]; since?: string; until?: string; limit: number }): Promise<GraphEpisode[]> {
    const out: GraphEpisode[] = [];
    for (const ns of req.namespaces) {
      const params = new URLSearchParams({ last_n: String(req.limit) });
      if (req.since) params.set("since", req.since);
      if (req.until) params.set("until", req.until);
      const body = await this.request("GET", `/episodes/${encodeURIComponent(ns)}?${params.toString()}`);
      const parsed = EpisodesResponse.parse(body);
      const list = Array.isArray(parsed) ? parsed : parsed.episodes;
      out.push(...list.map(toEpisode));
    }
    return out;
  }

  async deleteFact(uuid: string): Promise<boolean> {
    try {
      await this.request("DELETE", `/entity-edge/${encodeURIComponent(uuid)}`);
      return true;
    } catch (err) {
      if (err instanceof GraphHttpError && err.status === 404) {
        log.debug(`graph delete: edge ${uuid} not found`);
        return false;
      }
      throw err;
    }
  }

  async ping(): Promise<void> {
    await this.request("GET", "/healthcheck");
  }

  private async request(method: "GET" | "POST" | "DELETE", route: string, payload?: unknown): Promise<unknown> {
    const res = await fetch(`${this.baseUrl}${route}`, {
      method,
      headers: payload === undefined ? undefined : { "Content-Type": "application/json" },
      body: payload === undefined ? undefined : JSON.stringify(payload),
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    if (!res.ok) {
      const text = await res.text().catch(() => "");
      throw new GraphHttpError(res.status, `graph backend ${method} ${route} failed: ${res.status} ${text.slice(0, 200)}`);
    }
    const text = await res.text();
    return text ? JSON.parse(text) : null;
  }
}
