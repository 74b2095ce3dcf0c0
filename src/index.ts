import { parseConfig } from "./config.js";
import { initLogger, log } from "./logger.js";
import { Substrate } from "./substrate.js";
import { registerTools } from "./tools.js";
import type { HostApi } from "./types.js";

export { parseConfig, DEFAULT_CURATOR_QUERIES } from "./config.js";
export { initLogger, log, type LoggerSink } from "./logger.js";
export * from "./errors.js";
export type * from "./types.js";
export { Substrate, type SubstrateDeps } from "./substrate.js";
export { registerTools } from "./tools.js";
export { TurnStore, type TurnSearchHit } from "./turns/store.js";
export { AnchorIndex } from "./anchors/anchor-index.js";
export { OpenAiEmbeddingProvider, type EmbeddingProvider } from "./anchors/embeddings.js";
export { JsonVectorIndex, type VectorIndex, type VectorEntry, type VectorMatch } from "./anchors/vector-index.js";
export { CrystalEngine } from "./crystals/engine.js";
export { GraphAdapter } from "./graph/adapter.js";
export type { GraphBackend, GraphFact, GraphEntity, GraphEpisode } from "./graph/backend.js";
export { HttpGraphBackend } from "./graph/http-backend.js";
export { GraphCurator, type CuratorReport } from "./graph/curator.js";
export { buildExtractionInstructions, speakerFromContent } from "./graph/extraction-context.js";
export { Summarizer } from "./summaries/summarizer.js";
export { IngestionBacklog } from "./summaries/ingestion.js";
export { AmbientRecall, STARTUP_CONTEXT, type RecallResponse, type HealthReport } from "./recall.js";
export { MaintenanceScheduler, type SchedulerEvent, type ActionOutcome } from "./scheduler.js";
export { OpenAiLlmClient, type LlmClient, type LlmRequest } from "./llm.js";
export { CooperativeLock } from "./locks.js";

export default {
  id: "strata-memory",
  name: "Strata (Layered Memory)",
  description:
    "Layered memory for a conversational agent: turn ledger, word-photos, knowledge graph, summaries and crystals.",
  kind: "memory" as const,

  register(api: HostApi) {
    // Debug stays off until the config says otherwise.
    initLogger(api.logger, false);
    const cfg = parseConfig(api.pluginConfig ?? {});
    initLogger(api.logger, cfg.debug);
    log.info(
      `initialized (owner=${cfg.owner}, root=${cfg.rootDir}, graph=${cfg.graphUrl ? "on" : "off"}, llm=${cfg.openaiApiKey ? "on" : "off"})`,
    );

    const substrate = new Substrate(cfg);
    registerTools(api, substrate);

    api.registerService?.({
      id: "strata-memory",
      start: async () => {
        await substrate.initialize();
        substrate.startBackground();
      },
      stop: async () => {
        await substrate.close();
        log.info("stopped");
      },
    });
  },
};
