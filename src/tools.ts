import { Type, type Static, type TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { isSubstrateError } from "./errors.js";
import { formatEpisode, formatFact } from "./graph/adapter.js";
import { crystalText } from "./crystals/format.js";
import type { Substrate } from "./substrate.js";
import type { CrystalSections, ToolApi, ToolResult } from "./types.js";

function toolResult(text: string): ToolResult {
  return { content: [{ type: "text" as const, text }], details: undefined };
}

function json(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

interface ToolDefinition<T extends TSchema> {
  name: string;
  label: string;
  description: string;
  parameters: T;
  run: (params: Static<T>, signal?: AbortSignal) => Promise<string>;
}

function defineTool<T extends TSchema>(api: ToolApi, def: ToolDefinition<T>): void {
  api.registerTool(
    {
      name: def.name,
      label: def.label,
      description: def.description,
      parameters: def.parameters,
      async execute(_toolCallId, params, signal) {
        if (!Value.Check(def.parameters, params)) {
          const first = Value.Errors(def.parameters, params).First();
          const where = first ? `${first.path || "/"} ${first.message}` : "invalid parameters";
          return toolResult(`Error (invalid_request): ${where}`);
        }
        try {
          return toolResult(await def.run(params, signal));
        } catch (err) {
          if (isSubstrateError(err)) return toolResult(`Error (${err.kind}): ${err.message}`);
          throw err;
        }
      },
    },
    { name: def.name },
  );
}

const Limit = (description: string, maximum = 50) =>
  Type.Optional(Type.Integer({ description, minimum: 1, maximum }));

const Namespace = Type.Optional(
  Type.String({ description: "Graph namespace (defaults to the configured owner)", pattern: "^[A-Za-z0-9_-]+$" }),
);

const SummaryKind = Type.Union([Type.Literal("work"), Type.Literal("social"), Type.Literal("technical")]);

const EntityType = Type.Union([
  Type.Literal("Person"),
  Type.Literal("Place"),
  Type.Literal("Symbol"),
  Type.Literal("Concept"),
  Type.Literal("TechnicalArtifact"),
]);

export function registerTools(api: ToolApi, substrate: Substrate): void {
  // ---------------------------------------------------------------- recall
  defineTool(api, {
    name: "ambient_recall",
    label: "Ambient Recall",
    description: `Search every memory layer at once and return ranked results with a memory health line.

Pass context "startup" at the beginning of a session to get the recency package instead:
latest crystals, newest word-photos, recent summaries and all unsummarized turns.`,
    parameters: Type.Object({
      context: Type.String({ description: 'Query text, or "startup"' }),
      limit_per_layer: Limit("Results per layer (default from config)", 20),
    }),
    async run({ context, limit_per_layer }) {
      return (await substrate.recall.recall(context, limit_per_layer)).text;
    },
  });

  defineTool(api, {
    name: "pps_health",
    label: "Memory Health",
    description: "Per-component status (healthy / degraded / critical) with counts.",
    parameters: Type.Object({}),
    async run() {
      return json(await substrate.health());
    },
  });

  // ---------------------------------------------------------------- turns
  defineTool(api, {
    name: "capture_turn",
    label: "Capture Turn",
    description: "Append one conversational turn to the ledger.",
    parameters: Type.Object({
      channel: Type.String({ minLength: 1 }),
      author: Type.String({ minLength: 1 }),
      content: Type.String(),
    }),
    async run(params) {
      const id = substrate.captureTurn(params);
      return `Captured turn ${id}`;
    },
  });

  defineTool(api, {
    name: "search_turns",
    label: "Search Turns",
    description: "Full-text search over captured turns.",
    parameters: Type.Object({
      query: Type.String({ minLength: 1 }),
      channel: Type.Optional(Type.String()),
      limit: Limit("Maximum results (default: 10)"),
    }),
    async run({ query, channel, limit }) {
      const hits = substrate.turns.search(query, limit ?? 10, channel);
      if (hits.length === 0) return `No turns found matching: "${query}"`;
      return hits
        .map(({ turn, relevance }) => `[turn ${turn.id}] (${relevance.toFixed(2)}) ${turn.createdAt} [${turn.channel}] ${turn.author}: ${turn.content}`)
        .join("\n");
    },
  });

  defineTool(api, {
    name: "store_integrity_check",
    label: "Turn Store Integrity Check",
    description: "Run SQLite's integrity check over the turn ledger.",
    parameters: Type.Object({}),
    async run() {
      const result = substrate.turns.integrityCheck();
      return result.ok ? "Integrity check passed" : `Integrity check FAILED:\n${result.problems.join("\n")}`;
    },
  });

  defineTool(api, {
    name: "store_backup",
    label: "Back Up Turn Store",
    description: "Write a timestamped snapshot of the turn ledger to the backup directory.",
    parameters: Type.Object({}),
    async run() {
      const snapshot = await substrate.turns.backup(substrate.config.backupDir, substrate.config.backupRetentionDays);
      return `Snapshot written to ${snapshot}`;
    },
  });

  // ---------------------------------------------------------------- anchors
  defineTool(api, {
    name: "anchor_save",
    label: "Save Word-Photo",
    description: "Save a curated memory (word-photo) to disk and index it for semantic search.",
    parameters: Type.Object({
      title: Type.String({ minLength: 1 }),
      content: Type.String({ minLength: 1, description: "Narrative body (markdown)" }),
      location: Type.Optional(Type.String()),
      revealed: Type.Optional(Type.String({ description: "What the moment revealed" })),
      continuity_seeds: Type.Optional(Type.Array(Type.String())),
    }),
    async run({ title, content, location, revealed, continuity_seeds }) {
      const { filename, indexed } = await substrate.anchors.save({
        title,
        content,
        location,
        revealed,
        continuitySeeds: continuity_seeds,
      });
      return indexed
        ? `Saved ${filename}`
        : `Saved ${filename} to disk; indexing failed (run anchor_resync once the embedding backend is back)`;
    },
  });

  defineTool(api, {
    name: "anchor_search",
    label: "Search Word-Photos",
    description: "Semantic search over word-photos.",
    parameters: Type.Object({
      query: Type.String({ minLength: 1 }),
      limit: Limit("Maximum results (default: 5)", 20),
    }),
    async run({ query, limit }) {
      const { results, unavailable, drift } = await substrate.anchors.searchDetailed(query, limit ?? 5);
      if (unavailable) return `Word-photo search degraded (${unavailable.message}); no results`;
      const body =
        results.length === 0
          ? `No word-photos found matching: "${query}"`
          : results.map((r) => `### ${r.source} (score: ${r.score.toFixed(3)})\n\n${r.content}`).join("\n\n");
      return drift ? `${body}\n\n(${drift.message})` : body;
    },
  });

  defineTool(api, {
    name: "anchor_delete",
    label: "Delete Word-Photo",
    description: "Delete a word-photo from disk and from the index.",
    parameters: Type.Object({ filename: Type.String({ minLength: 1 }) }),
    async run({ filename }) {
      const result = await substrate.anchors.delete(filename);
      if (!result.deleted) return `No word-photo named ${filename}`;
      return `Deleted ${filename} (disk: ${result.diskDeleted}, index: ${result.indexDeleted})`;
    },
  });

  defineTool(api, {
    name: "anchor_list",
    label: "List Word-Photos",
    description: "List word-photos with their disk/index sync state.",
    parameters: Type.Object({}),
    async run() {
      return json(await substrate.anchors.list());
    },
  });

  defineTool(api, {
    name: "anchor_resync",
    label: "Resync Word-Photo Index",
    description: "Wipe the semantic index and rebuild it from the files on disk.",
    parameters: Type.Object({}),
    async run() {
      const result = await substrate.anchors.resync();
      return `Resync complete: ${result.indexed} indexed (${result.removed} stale entries cleared)`;
    },
  });

  // ---------------------------------------------------------------- graph
  defineTool(api, {
    name: "texture_add",
    label: "Add Episode",
    description: "Send free text to the knowledge graph for entity and relationship extraction.",
    parameters: Type.Object({
      content: Type.String({ minLength: 1 }),
      channel: Type.Optional(Type.String()),
      reference_time: Type.Optional(Type.String({ description: "ISO timestamp" })),
      hints: Type.Optional(Type.String({ description: "Extra extraction guidance" })),
      namespace: Namespace,
    }),
    async run({ content, channel, reference_time, hints, namespace }) {
      const result = await substrate.graph.addEpisode({
        text: content,
        channel,
        referenceTime: reference_time,
        hints,
        namespace,
      });
      const facts = result.facts.map((f) => `- ${formatFact(f)}`).join("\n");
      return `Episode ${result.episodeUuid} (${result.namespace}): ${result.summary}${facts ? `\n${facts}` : ""}`;
    },
  });

  defineTool(api, {
    name: "texture_add_triplet",
    label: "Add Triplet",
    description: "Assert a relationship directly, bypassing extraction.",
    parameters: Type.Object({
      source: Type.String({ minLength: 1 }),
      relationship: Type.String({ minLength: 1, description: "Predicate, e.g. WORKS_ON" }),
      target: Type.String({ minLength: 1 }),
      fact: Type.Optional(Type.String()),
      source_type: Type.Optional(EntityType),
      target_type: Type.Optional(EntityType),
      namespace: Namespace,
    }),
    async run(params) {
      const fact = await substrate.graph.addTriplet({
        source: params.source,
        predicate: params.relationship,
        target: params.target,
        fact: params.fact,
        sourceType: params.source_type,
        targetType: params.target_type,
        namespace: params.namespace,
      });
      return `Added ${fact.uuid}: ${formatFact(fact)}`;
    },
  });

  defineTool(api, {
    name: "texture_search",
    label: "Search Knowledge Graph",
    description: "Search facts in one namespace of the knowledge graph.",
    parameters: Type.Object({
      query: Type.String({ minLength: 1 }),
      limit: Limit("Maximum facts (default: 10)"),
      namespace: Namespace,
    }),
    async run({ query, limit, namespace }) {
      const facts = await substrate.graph.search(query, namespace, limit ?? 10);
      if (facts.length === 0) return `No facts found matching: "${query}"`;
      return facts.map(({ fact, score }) => `(${score.toFixed(2)}) [${fact.uuid}] ${formatFact(fact)}`).join("\n");
    },
  });

  defineTool(api, {
    name: "texture_explore",
    label: "Explore Entity",
    description: "Relationships around one entity.",
    parameters: Type.Object({
      entity_name: Type.String({ minLength: 1 }),
      depth: Type.Optional(Type.Integer({ minimum: 1, maximum: 3 })),
      namespace: Namespace,
    }),
    async run({ entity_name, depth, namespace }) {
      const sub = await substrate.graph.explore(entity_name, depth ?? 2, namespace);
      if (sub.facts.length === 0) return `Nothing known about ${entity_name}`;
      return [`## ${sub.root} (${sub.entities.length} entities)`, ...sub.facts.map((f) => `- ${formatFact(f)}`)].join("\n");
    },
  });

  defineTool(api, {
    name: "texture_timeline",
    label: "Episode Timeline",
    description: "Episodes in a time window, oldest first.",
    parameters: Type.Object({
      since: Type.Optional(Type.String()),
      until: Type.Optional(Type.String()),
      limit: Limit("Maximum episodes (default: 20)", 100),
      namespace: Namespace,
    }),
    async run({ since, until, limit, namespace }) {
      const episodes = await substrate.graph.timeline(since, until, namespace, limit ?? 20);
      if (episodes.length === 0) return "No episodes in that window";
      return episodes.map(formatEpisode).join("\n");
    },
  });

  defineTool(api, {
    name: "texture_delete",
    label: "Delete Fact",
    description: "Delete one fact (edge) by uuid.",
    parameters: Type.Object({ uuid: Type.String({ minLength: 1 }) }),
    async run({ uuid }) {
      return (await substrate.graph.delete(uuid)) ? `Deleted ${uuid}` : `Fact ${uuid} not found`;
    },
  });

  defineTool(api, {
    name: "texture_curate",
    label: "Curate Knowledge Graph",
    description: "Find duplicate and vague facts; deletes them only when auto_delete is true.",
    parameters: Type.Object({
      deep: Type.Optional(Type.Boolean()),
      auto_delete: Type.Optional(Type.Boolean()),
      namespace: Namespace,
    }),
    async run({ deep, auto_delete, namespace }, signal) {
      const curator = substrate.curator;
      if (!curator) return "Graph backend not configured";
      return json(await curator.curate({ deep, autoDelete: auto_delete, namespace, signal }));
    },
  });

  // ---------------------------------------------------------------- crystals
  defineTool(api, {
    name: "crystallize",
    label: "Crystallize",
    description: `Create a crystal now. With no section arguments the uncrystallized turns are compressed by the model;
with sections the crystal is written as given. The current window rotates either way.`,
    parameters: Type.Object({
      field_state: Type.Optional(Type.String()),
      key_events: Type.Optional(Type.Array(Type.String())),
      decisions: Type.Optional(Type.Array(Type.String())),
      internal_arc: Type.Optional(Type.String()),
      continuity_seeds: Type.Optional(Type.Array(Type.String())),
    }),
    async run(params) {
      const given =
        params.field_state !== undefined ||
        params.key_events !== undefined ||
        params.decisions !== undefined ||
        params.internal_arc !== undefined ||
        params.continuity_seeds !== undefined;
      const sections: CrystalSections | undefined = given
        ? {
            fieldState: params.field_state ?? "",
            keyEvents: params.key_events ?? [],
            decisions: params.decisions ?? [],
            internalArc: params.internal_arc ?? "",
            continuitySeeds: params.continuity_seeds ?? [],
          }
        : undefined;
      const crystal = await substrate.crystals.crystallize(sections);
      return `Created ${crystal.filename} (~${crystal.meta.tokenEstimate} tokens)\n\n${crystalText(crystal)}`;
    },
  });

  defineTool(api, {
    name: "crystal_list",
    label: "List Crystals",
    description: "Current window and archived crystals.",
    parameters: Type.Object({}),
    async run() {
      return json(await substrate.crystals.list());
    },
  });

  defineTool(api, {
    name: "get_crystals",
    label: "Get Crystals",
    description: "The most recent crystals, oldest first.",
    parameters: Type.Object({ count: Limit("How many (default: 4)", 20) }),
    async run({ count }) {
      const crystals = await substrate.crystals.getRecent(count ?? substrate.config.crystalWindowSize);
      if (crystals.length === 0) return "No crystals yet";
      return crystals.map((c) => `=== ${c.filename} ===\n${crystalText(c)}`).join("\n\n");
    },
  });

  defineTool(api, {
    name: "crystal_delete",
    label: "Delete Crystal",
    description: "Delete the most recent crystal. Any other crystal is refused.",
    parameters: Type.Object({ filename: Type.Optional(Type.String({ minLength: 1 })) }),
    async run({ filename }) {
      const { deleted } = filename ? await substrate.crystals.delete(filename) : await substrate.crystals.deleteLatest();
      return `Deleted ${deleted}`;
    },
  });

  // ---------------------------------------------------------------- summaries
  defineTool(api, {
    name: "summarize_messages",
    label: "Summarize Turns",
    description: "Compress the oldest unsummarized turns. Returns a draft; call store_summary to keep it.",
    parameters: Type.Object({
      limit: Limit("Turns to cover (default from config)", 500),
      summary_type: Type.Optional(SummaryKind),
    }),
    async run({ limit, summary_type }) {
      return json(await substrate.summarizer.summarize(limit, summary_type));
    },
  });

  defineTool(api, {
    name: "store_summary",
    label: "Store Summary",
    description: "Persist a summary and mark its turn range as summarized.",
    parameters: Type.Object({
      summary_text: Type.String({ minLength: 1 }),
      start_id: Type.Integer({ minimum: 1 }),
      end_id: Type.Integer({ minimum: 1 }),
      channels: Type.Optional(Type.Array(Type.String())),
      summary_type: Type.Optional(SummaryKind),
    }),
    async run(params) {
      const { summary, created } = substrate.summarizer.store({
        text: params.summary_text,
        startId: params.start_id,
        endId: params.end_id,
        channels: params.channels ?? [],
        kind: params.summary_type ?? "work",
      });
      return created
        ? `Stored summary #${summary.id} covering ${summary.turnCount} turns`
        : `Summary #${summary.id} already covers turns ${summary.startId}-${summary.endId}`;
    },
  });

  defineTool(api, {
    name: "get_recent_summaries",
    label: "Recent Summaries",
    description: "Newest summaries first.",
    parameters: Type.Object({ limit: Limit("How many (default: 5)") }),
    async run({ limit }) {
      const summaries = substrate.summarizer.recent(limit ?? 5);
      if (summaries.length === 0) return "No summaries yet";
      return summaries
        .map((s) => `[#${s.id} ${s.kind} turns ${s.startId}-${s.endId} ${s.timeSpanStart}..${s.timeSpanEnd}]\n${s.text}`)
        .join("\n\n");
    },
  });

  defineTool(api, {
    name: "search_summaries",
    label: "Search Summaries",
    description: "Text search over summaries.",
    parameters: Type.Object({ query: Type.String({ minLength: 1 }), limit: Limit("Maximum results (default: 5)") }),
    async run({ query, limit }) {
      const results = substrate.summarizer.search(query, limit ?? 5);
      if (results.length === 0) return `No summaries found matching: "${query}"`;
      return results.map((r) => `${r.source} (score: ${r.score.toFixed(2)})\n${r.content}`).join("\n\n");
    },
  });

  defineTool(api, {
    name: "summary_stats",
    label: "Summary Stats",
    description: "Summary count and summarization backlog.",
    parameters: Type.Object({}),
    async run() {
      return json(substrate.summarizer.stats());
    },
  });

  // ---------------------------------------------------------------- ingestion
  defineTool(api, {
    name: "graphiti_ingestion_stats",
    label: "Graph Ingestion Stats",
    description: "Turns not yet sent to the knowledge graph.",
    parameters: Type.Object({}),
    async run() {
      return json(substrate.ingestion.stats());
    },
  });

  defineTool(api, {
    name: "ingest_batch_to_graphiti",
    label: "Ingest Batch",
    description: "Send the oldest uningested turns to the knowledge graph as one batch.",
    parameters: Type.Object({ batch_size: Limit("Turns per batch (default from config)", 200) }),
    async run({ batch_size }) {
      return json(await substrate.ingestion.ingestBatch(batch_size));
    },
  });
}
