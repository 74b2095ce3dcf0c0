import path from "node:path";
import { log } from "./logger.js";
import type { NewTurn, SubstrateConfig } from "./types.js";
import { CooperativeLock } from "./locks.js";
import { TurnStore } from "./turns/store.js";
import { AnchorIndex } from "./anchors/anchor-index.js";
import { OpenAiEmbeddingProvider, type EmbeddingProvider } from "./anchors/embeddings.js";
import { JsonVectorIndex, type VectorIndex } from "./anchors/vector-index.js";
import type { GraphBackend } from "./graph/backend.js";
import { HttpGraphBackend } from "./graph/http-backend.js";
import { ExtractionContextProvider } from "./graph/extraction-context.js";
import { GraphAdapter } from "./graph/adapter.js";
import { GraphCurator } from "./graph/curator.js";
import { crystalText } from "./crystals/format.js";
import { CrystalEngine } from "./crystals/engine.js";
import { OpenAiLlmClient, type LlmClient } from "./llm.js";
import { Summarizer } from "./summaries/summarizer.js";
import { IngestionBacklog } from "./summaries/ingestion.js";
import { AmbientRecall, type HealthReport } from "./recall.js";
import { MaintenanceScheduler } from "./scheduler.js";

export interface SubstrateDeps {
  llm?: LlmClient | null;
  embedder?: EmbeddingProvider | null;
  vectorIndex?: VectorIndex;
  graphBackend?: GraphBackend | null;
}

/** Owns every component for one logical owner and wires them together. */
export class Substrate {
  readonly turns: TurnStore;
  readonly anchors: AnchorIndex;
  readonly graph: GraphAdapter;
  readonly curator: GraphCurator | null;
  readonly summarizer: Summarizer;
  readonly ingestion: IngestionBacklog;
  readonly crystals: CrystalEngine;
  readonly recall: AmbientRecall;
  readonly scheduler: MaintenanceScheduler;
  private timer: NodeJS.Timeout | null = null;

  constructor(
    readonly config: SubstrateConfig,
    deps: SubstrateDeps = {},
  ) {
    const llm = deps.llm !== undefined ? deps.llm : config.openaiApiKey ? new OpenAiLlmClient(config) : null;
    const embedder =
      deps.embedder !== undefined ? deps.embedder : config.openaiApiKey ? new OpenAiEmbeddingProvider(config) : null;
    const backend =
      deps.graphBackend !== undefined
        ? deps.graphBackend
        : config.graphUrl
          ? new HttpGraphBackend(config.graphUrl, config.graphTimeoutMs)
          : null;

    const locksDir = path.join(config.rootDir, "locks");
    const lock = (name: string): CooperativeLock =>
      new CooperativeLock({
        locksDir,
        owner: config.owner,
        name,
        staleMs: config.lockStaleMs,
        retries: config.lockRetries,
      });

    this.turns = new TurnStore(path.join(config.rootDir, "turns.sqlite"));
    this.anchors = new AnchorIndex(
      path.join(config.rootDir, "anchors"),
      embedder,
      deps.vectorIndex ??
        new JsonVectorIndex(path.join(config.rootDir, "state", "anchor-index.json"), embedder?.model ?? "none"),
      lock("anchors"),
    );
    this.summarizer = new Summarizer(this.turns, llm, {
      minTurns: config.summaryMinTurns,
      batchLimit: config.summaryBatchLimit,
      backlogThreshold: config.summaryBacklogThreshold,
    });
    this.crystals = new CrystalEngine(path.join(config.rootDir, "crystals"), this.turns, this.summarizer, llm, lock("crystallize"), {
      windowSize: config.crystalWindowSize,
      turnThreshold: config.crystalTurnThreshold,
      hoursThreshold: config.crystalHoursThreshold,
      maxTurns: config.crystalMaxTurns,
    });

    const context = new ExtractionContextProvider({
      entityName: config.entityName,
      baseContextPath: config.extractionBaseContextPath,
      scenePath: path.join(config.rootDir, "current_scene.md"),
      latestCrystal: async () => {
        const latest = await this.crystals.latest();
        return latest ? crystalText(latest) : null;
      },
    });
    this.graph = new GraphAdapter(backend, config.owner, context);
    this.curator = backend
      ? new GraphCurator(this.graph, {
          queries: config.curatorQueries,
          resultsPerQuery: config.curatorResultsPerQuery,
          autoDelete: config.curatorAutoDelete,
          reportPath: path.join(config.rootDir, "state", "curator-last-run.json"),
        })
      : null;
    this.ingestion = new IngestionBacklog(this.turns, this.graph, lock("ingest"), {
      owner: config.owner,
      batchSize: config.ingestionBatchSize,
      backlogThreshold: config.ingestionBacklogThreshold,
    });

    this.recall = new AmbientRecall(
      {
        turns: this.turns,
        anchors: this.anchors,
        crystals: this.crystals,
        summaries: this.summarizer,
        graph: this.graph,
        ingestion: this.ingestion,
      },
      {
        limitPerLayer: config.recallLimitPerLayer,
        summaryBacklogThreshold: config.summaryBacklogThreshold,
        ingestionBacklogThreshold: config.ingestionBacklogThreshold,
      },
    );
    this.scheduler = new MaintenanceScheduler(
      {
        crystals: this.crystals,
        summarizer: this.summarizer,
        ingestion: this.ingestion,
        curator: backend ? this.curator : null,
      },
      {
        summaryBacklogThreshold: config.summaryBacklogThreshold,
        curatorIntervalHours: config.curatorIntervalHours,
      },
    );
  }

  async initialize(): Promise<void> {
    await this.turns.initialize();
    await this.anchors.initialize();
    await this.crystals.initialize();
    log.info(
      `substrate ready (owner=${this.config.owner}, root=${this.config.rootDir}, graph=${this.graph.configured})`,
    );
  }

  /** Append a turn and queue the crystallization check. Returns as soon as the turn is stored. */
  captureTurn(turn: NewTurn): number {
    const id = this.turns.append(turn);
    this.scheduler.dispatch({ type: "turn_appended", turnId: id });
    return id;
  }

  health(): Promise<HealthReport> {
    return this.recall.health();
  }

  startBackground(): void {
    if (this.timer) return;
    const everyMs = this.config.tickIntervalMinutes * 60 * 1000;
    this.timer = setInterval(() => this.scheduler.dispatch({ type: "tick" }), everyMs);
    this.timer.unref();
    log.debug(`background maintenance every ${this.config.tickIntervalMinutes}m`);
  }

  async close(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    await this.scheduler.idle();
    this.turns.close();
  }
}
