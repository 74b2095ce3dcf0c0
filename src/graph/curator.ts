import path from "node:path";
import { mkdir, writeFile } from "node:fs/promises";
import { log } from "../logger.js";
import { errorMessage } from "../errors.js";
import type { GraphAdapter } from "./adapter.js";
import { formatFact } from "./adapter.js";
import type { GraphFact } from "./backend.js";

const STOPLIST = new Set([
  "a", "an", "the",
  "i", "me", "my", "mine", "myself",
  "you", "your", "yours",
  "he", "him", "his", "she", "her", "hers",
  "it", "its", "we", "us", "our", "they", "them", "their",
  "this", "that", "these", "those",
  "someone", "somebody", "something", "nothing", "anything", "everything",
  "n/a", "na", "unknown", "null", "none", "undefined",
]);

const DEEP_EXTRA_QUERIES = ["memory", "conversation", "feeling", "work", "home", "friend", "build", "learn"];

export function normalizeEntityName(name: string): string {
  return name
    .toLowerCase()
    .replace(/\s+/g, " ")
    .trim()
    .replace(/^[^\p{L}\p{N}]+|[^\p{L}\p{N}]+$/gu, "");
}

export function isVagueEntity(name: string): boolean {
  const n = normalizeEntityName(name);
  return n.length <= 1 || STOPLIST.has(n);
}

export function factSignature(fact: GraphFact): string {
  return [normalizeEntityName(fact.sourceEntity), fact.predicate, normalizeEntityName(fact.targetEntity)].join("|");
}

export interface CuratorCandidate {
  uuid: string;
  reason: "duplicate" | "vague";
  signature: string;
  fact: string;
}

export interface AmbiguousGroup {
  endpoints: string;
  predicates: string[];
  uuids: string[];
}

export interface CuratorReport {
  timestamp: string;
  namespace: string;
  mode: "standard" | "deep";
  autoDelete: boolean;
  queriesRun: number;
  queryErrors: number;
  sampled: number;
  duplicates: CuratorCandidate[];
  vague: CuratorCandidate[];
  ambiguous: AmbiguousGroup[];
  deleted: string[];
  skipped: string[];
  failed: string[];
  interrupted: boolean;
}

export interface CuratorOptions {
  queries: string[];
  resultsPerQuery: number;
  autoDelete: boolean;
  reportPath: string;
}

export interface CurateRequest {
  namespace?: string;
  deep?: boolean;
  autoDelete?: boolean;
  signal?: AbortSignal;
}

/**
 * Candidates in one sample. `deletable` is what auto-delete may remove: vague
 * facts whose signature occurs more than once, then later duplicates. A fact
 * whose signature occurs once is never deletable, even when it is vague; it is
 * only reported.
 */
export function findCandidates(sample: GraphFact[]): {
  duplicates: CuratorCandidate[];
  vague: CuratorCandidate[];
  ambiguous: AmbiguousGroup[];
  deletable: CuratorCandidate[];
} {
  const vague: CuratorCandidate[] = [];
  const groups = new Map<string, GraphFact[]>();
  const byEndpoints = new Map<string, GraphFact[]>();

  for (const fact of sample) {
    const signature = factSignature(fact);
    if (isVagueEntity(fact.sourceEntity) || isVagueEntity(fact.targetEntity)) {
      vague.push({ uuid: fact.uuid, reason: "vague", signature, fact: formatFact(fact) });
    }
    groups.set(signature, [...(groups.get(signature) ?? []), fact]);
    const endpoints = `${normalizeEntityName(fact.sourceEntity)}|${normalizeEntityName(fact.targetEntity)}`;
    byEndpoints.set(endpoints, [...(byEndpoints.get(endpoints) ?? []), fact]);
  }

  const vagueIds = new Set(vague.map((v) => v.uuid));
  const duplicates: CuratorCandidate[] = [];
  for (const [signature, facts] of groups) {
    for (const fact of facts.slice(1)) {
      if (vagueIds.has(fact.uuid)) continue;
      duplicates.push({ uuid: fact.uuid, reason: "duplicate", signature, fact: formatFact(fact) });
    }
  }

  // Same endpoints under different predicates might be a duplicate or might
  // be two real relationships; report only.
  const ambiguous: AmbiguousGroup[] = [];
  for (const [endpoints, facts] of byEndpoints) {
    const predicates = [...new Set(facts.map((f) => f.predicate))];
    if (predicates.length > 1) {
      ambiguous.push({ endpoints, predicates: predicates.sort(), uuids: facts.map((f) => f.uuid) });
    }
  }

  const repeated = (c: CuratorCandidate): boolean => (groups.get(c.signature)?.length ?? 0) > 1;
  const deletable = [...vague.filter(repeated), ...duplicates];

  return { duplicates, vague, ambiguous, deletable };
}

/**
 * Samples the graph through a fixed set of searches and removes exact
 * duplicates and facts hanging off vague entities. Runs report-only unless
 * auto-delete is on.
 */
export class GraphCurator {
  constructor(
    private readonly adapter: GraphAdapter,
    private readonly options: CuratorOptions,
  ) {}

  async curate(request: CurateRequest = {}): Promise<CuratorReport> {
    const deep = request.deep === true;
    const autoDelete = request.autoDelete ?? this.options.autoDelete;
    const namespace = this.adapter.resolveNamespace(request.namespace);
    const queries = deep ? [...this.options.queries, ...DEEP_EXTRA_QUERIES] : this.options.queries;
    const perQuery = deep ? Math.max(20, this.options.resultsPerQuery) : this.options.resultsPerQuery;

    const report: CuratorReport = {
      timestamp: new Date().toISOString(),
      namespace,
      mode: deep ? "deep" : "standard",
      autoDelete,
      queriesRun: 0,
      queryErrors: 0,
      sampled: 0,
      duplicates: [],
      vague: [],
      ambiguous: [],
      deleted: [],
      skipped: [],
      failed: [],
      interrupted: false,
    };

    const sample = new Map<string, GraphFact>();
    for (const query of queries) {
      if (request.signal?.aborted) {
        report.interrupted = true;
        break;
      }
      try {
        const hits = await this.adapter.search(query, namespace, perQuery);
        for (const { fact } of hits) {
          if (!sample.has(fact.uuid)) sample.set(fact.uuid, fact);
        }
      } catch (err) {
        report.queryErrors++;
        log.warn(`curator: query "${query}" failed`, err);
      }
      report.queriesRun++;
    }
    report.sampled = sample.size;

    const found = findCandidates([...sample.values()]);
    report.duplicates = found.duplicates;
    report.vague = found.vague;
    report.ambiguous = found.ambiguous;

    if (autoDelete && !report.interrupted) {
      for (const candidate of found.deletable) {
        if (request.signal?.aborted) {
          report.interrupted = true;
          break;
        }
        try {
          if (await this.adapter.delete(candidate.uuid)) {
            report.deleted.push(candidate.uuid);
          } else {
            report.skipped.push(candidate.uuid);
            log.debug(`curator: ${candidate.uuid} already gone`);
          }
        } catch (err) {
          report.failed.push(candidate.uuid);
          log.warn(`curator: could not delete ${candidate.uuid} (${errorMessage(err)}); skipping`);
        }
      }
    }

    log.info(
      `curator (${report.mode}, ${namespace}): sampled ${report.sampled}, ` +
        `${report.duplicates.length} duplicates, ${report.vague.length} vague, ` +
        `${report.ambiguous.length} ambiguous, ${report.deleted.length} deleted`,
    );
    await this.writeReport(report);
    return report;
  }

  private async writeReport(report: CuratorReport): Promise<void> {
    try {
      await mkdir(path.dirname(this.options.reportPath), { recursive: true });
      await writeFile(this.options.reportPath, JSON.stringify(report, null, 2) + "\n", "utf-8");
    } catch (err) {
      log.warn("curator: could not write report", err);
    }
  }
}
