export interface GraphFact {
  uuid: string;
  sourceEntity: string;
  predicate: string;
  targetEntity: string;
  factText: string;
  namespace: string | null;
  validAt: string | null;
  invalidAt: string | null;
  createdAt: string | null;
}

export interface GraphEntity {
  uuid: string;
  name: string;
  type: string;
  namespace: string | null;
}

export interface GraphEpisode {
  uuid: string;
  name: string;
  content: string;
  namespace: string | null;
  referenceTime: string;
  createdAt: string;
  source: string | null;
}

export interface EpisodeRequest {
  name: string;
  text: string;
  referenceTime: string;
  namespace: string;
  source: string;
  entityTypes: Record<string, string>;
  edgeTypes: Record<string, string>;
  edgeTypeMap: Array<{ source: string; target: string; edges: string[] }>;
  extractionInstructions: string;
}

export interface EpisodeExtraction {
  episodeUuid: string;
  entities: GraphEntity[];
  facts: GraphFact[];
}

export interface TripletRequest {
  source: string;
  predicate: string;
  target: string;
  fact: string;
  sourceType: string | null;
  targetType: string | null;
  namespace: string;
}

/**
 * Knowledge-graph service. Every read takes the namespaces to search and
 * must filter by them on the server.
 */
export interface GraphBackend {
  addEpisode(req: EpisodeRequest): Promise<EpisodeExtraction>;
  addTriplet(req: TripletRequest): Promise<GraphFact>;
  searchFacts(req: { query: string; namespaces: string[]; limit: number }): Promise<GraphFact[]>;
  explore(req: {
    entityName: string;
    depth: number;
    namespaces: string[];
  }): Promise<{ entities: GraphEntity[]; facts: GraphFact[] }>;
  episodes(req: { namespaces: string[]; since?: string; until?: string; limit: number }): Promise<GraphEpisode[]>;
  deleteFact(uuid: string): Promise<boolean>;
  ping(): Promise<void>;
}
