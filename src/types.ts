import type { LoggerSink } from "./logger.js";

export interface SubstrateConfig {
  rootDir: string;
  owner: string;
  openaiApiKey: string | undefined;
  openaiBaseUrl: string | undefined;
  model: string;
  embeddingModel: string;
  graphUrl: string | undefined;
  graphTimeoutMs: number;
  crystalWindowSize: number;
  crystalTurnThreshold: number;
  crystalHoursThreshold: number;
  crystalMaxTurns: number;
  summaryMinTurns: number;
  summaryBatchLimit: number;
  summaryBacklogThreshold: number;
  ingestionBatchSize: number;
  ingestionBacklogThreshold: number;
  lockStaleMs: number;
  lockRetries: number;
  curatorQueries: string[];
  curatorResultsPerQuery: number;
  curatorAutoDelete: boolean;
  curatorIntervalHours: number;
  recallLimitPerLayer: number;
  tickIntervalMinutes: number;
  backupDir: string;
  backupRetentionDays: number;
  entityName: string;
  extractionBaseContextPath: string | undefined;
  debug: boolean;
}

// ---------------------------------------------------------------------------
// Turn Store
// ---------------------------------------------------------------------------

export interface Turn {
  id: number;
  channel: string;
  author: string;
  content: string;
  createdAt: string;
  summaryId: number | null;
  ingestedToGraph: boolean;
  ingestionBatchId: string | null;
}

export interface NewTurn {
  channel: string;
  author: string;
  content: string;
  createdAt?: string;
}

export interface TurnFilter {
  channel?: string;
  author?: string;
  since?: string;
  until?: string;
  fullText?: string;
  limit?: number;
}

export interface TurnRange {
  start: number;
  end: number;
}

export interface TurnCounts {
  total: number;
  unsummarized: number;
  uningested: number;
}

// ---------------------------------------------------------------------------
// Retrieval
// ---------------------------------------------------------------------------

export type LayerName = "crystals" | "anchors" | "texture" | "summaries" | "turns";

export interface RankedResult {
  layer: LayerName;
  content: string;
  source: string;
  score: number;
  metadata?: Record<string, string | number | boolean | null>;
}

export type HealthStatus = "healthy" | "degraded" | "critical";

export interface ComponentHealth {
  status: HealthStatus;
  message: string;
  counts: Record<string, number>;
}

export interface RecallLayer {
  readonly name: LayerName;
  search(query: string, limit: number): Promise<RankedResult[]>;
  health(): Promise<ComponentHealth>;
}

// ---------------------------------------------------------------------------
// Anchors
// ---------------------------------------------------------------------------

export interface Anchor {
  filename: string;
  title: string;
  content: string;
  createdAt: string;
  location?: string;
  revealed?: string;
  continuitySeeds?: string[];
}

export interface AnchorInput {
  title: string;
  content: string;
  location?: string;
  revealed?: string;
  continuitySeeds?: string[];
}

export interface AnchorListEntry {
  filename: string;
  inIndex: boolean;
  onDisk: boolean;
}

export interface AnchorSyncSummary {
  disk: number;
  indexed: number;
  synced: number;
  orphans: string[];
  missing: string[];
  inSync: boolean;
}

// ---------------------------------------------------------------------------
// Crystals
// ---------------------------------------------------------------------------

export type CrystalMode = "auto" | "manual";

export interface CrystalSections {
  fieldState: string;
  keyEvents: string[];
  decisions: string[];
  internalArc: string;
  continuitySeeds: string[];
}

export interface CrystalMeta {
  sequence: number;
  created: string;
  timespanStart: string | null;
  timespanEnd: string | null;
  startTurnId: number | null;
  endTurnId: number | null;
  tokenEstimate: number;
  mode: CrystalMode;
}

export interface Crystal {
  meta: CrystalMeta;
  sections: CrystalSections;
  filename: string;
  archived: boolean;
  raw: string;
}

export interface CrystalFileInfo {
  filename: string;
  number: number;
  sizeBytes: number;
  modified: string;
  preview: string;
}

export interface CrystalListing {
  current: CrystalFileInfo[];
  archived: CrystalFileInfo[];
  total: number;
  maxCurrent: number;
}

export interface CrystalTriggerState {
  turnsSince: number;
  hoursSince: number;
  lastEndTurnId: number;
  due: boolean;
}

// ---------------------------------------------------------------------------
// Summaries and ingestion
// ---------------------------------------------------------------------------

export type SummaryKind = "work" | "social" | "technical";

export interface SummaryDraft {
  text: string;
  startId: number;
  endId: number;
  channels: string[];
  kind: SummaryKind;
}

export interface StoredSummary extends SummaryDraft {
  id: number;
  turnCount: number;
  timeSpanStart: string;
  timeSpanEnd: string;
  createdAt: string;
}

export interface SummaryStats {
  totalSummaries: number;
  unsummarizedCount: number;
  recommended: boolean;
}

export interface IngestionBatch {
  batchId: string | null;
  turnIdRange: TurnRange | null;
  channels: string[];
  ingestedCount: number;
  failedCount: number;
  status: "complete" | "partial" | "noop";
}

export interface IngestionStats {
  uningestedCount: number;
  recommended: boolean;
}

// ---------------------------------------------------------------------------
// Host integration
// ---------------------------------------------------------------------------

export interface ToolResult {
  content: Array<{ type: "text"; text: string }>;
  details: undefined;
}

export interface ToolSpec {
  name: string;
  label: string;
  description: string;
  parameters: unknown;
  execute: (
    toolCallId: string,
    params: Record<string, unknown>,
    signal?: AbortSignal,
  ) => Promise<ToolResult>;
}

export interface ToolApi {
  registerTool(spec: ToolSpec, options: { name: string }): void;
}

export interface ServiceSpec {
  id: string;
  start(): Promise<void>;
  stop(): Promise<void>;
}

export interface HostApi extends ToolApi {
  logger?: LoggerSink;
  pluginConfig?: Record<string, unknown>;
  registerService?(service: ServiceSpec): void;
}
