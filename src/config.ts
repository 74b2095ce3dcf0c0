import path from "node:path";
import os from "node:os";
import type { SubstrateConfig } from "./types.js";
import { log } from "./logger.js";

const DEFAULT_ROOT_DIR = path.join(process.env.HOME ?? os.homedir(), ".strata");

export const DEFAULT_CURATOR_QUERIES = [
  "relationship",
  "decision",
  "project",
  "preference",
  "feeling",
  "place",
  "tool",
  "plan",
];

function resolveEnvVars(value: string): string {
  return value.replace(/\$\{([^}]+)\}/g, (_, envVar: string) => {
    const envValue = process.env[envVar];
    if (!envValue) {
      throw new Error(`Environment variable ${envVar} is not set`);
    }
    return envValue;
  });
}

function normalizeHttpUrl(value: string | undefined, key: string, source: "config" | "env"): string | undefined {
  if (!value) return undefined;
  const trimmed = value.trim();
  if (trimmed.length === 0) return undefined;

  let parsed: URL;
  try {
    parsed = new URL(trimmed);
  } catch {
    log.warn(`ignoring invalid ${key} from ${source}: not a valid URL`);
    return undefined;
  }

  if (parsed.protocol !== "https:" && parsed.protocol !== "http:") {
    log.warn(`ignoring ${key} from ${source}: unsupported URL scheme (${parsed.protocol.replace(":", "")})`);
    return undefined;
  }

  if (parsed.protocol === "http:" && key === "openaiBaseUrl") {
    log.warn(`${key} from ${source} is using insecure http; prefer https`);
  }

  // Avoid duplicate slash behavior in downstream path joins.
  return parsed.toString().replace(/\/+$/, "");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function positiveInt(value: unknown, fallback: number): number {
  if (typeof value === "number" && Number.isFinite(value) && value > 0) return Math.floor(value);
  if (typeof value === "string" && /^\d+$/.test(value.trim())) {
    const n = parseInt(value, 10);
    if (n > 0) return n;
  }
  return fallback;
}

function positiveNumber(value: unknown, fallback: number): number {
  if (typeof value === "number" && Number.isFinite(value) && value > 0) return value;
  if (typeof value === "string" && value.trim().length > 0) {
    const n = Number(value);
    if (Number.isFinite(n) && n > 0) return n;
  }
  return fallback;
}

function nonEmptyString(value: unknown): string | undefined {
  return typeof value === "string" && value.trim().length > 0 ? value.trim() : undefined;
}

function expandHome(p: string): string {
  return p.startsWith("~/") ? path.join(process.env.HOME ?? os.homedir(), p.slice(2)) : p;
}

export function parseConfig(raw: unknown): SubstrateConfig {
  const cfg = isRecord(raw) ? raw : {};

  let apiKey: string | undefined;
  const configuredKey = nonEmptyString(cfg.openaiApiKey);
  if (configuredKey) {
    apiKey = resolveEnvVars(configuredKey);
  } else {
    apiKey = nonEmptyString(process.env.OPENAI_API_KEY);
  }

  const configuredBaseUrl = nonEmptyString(cfg.openaiBaseUrl);
  const openaiBaseUrl = configuredBaseUrl
    ? normalizeHttpUrl(configuredBaseUrl, "openaiBaseUrl", "config")
    : normalizeHttpUrl(process.env.OPENAI_BASE_URL, "openaiBaseUrl", "env");

  const rootDir = path.resolve(expandHome(nonEmptyString(cfg.rootDir) ?? DEFAULT_ROOT_DIR));

  const owner = nonEmptyString(cfg.owner) ?? "default";
  if (!/^[A-Za-z0-9_-]+$/.test(owner)) {
    throw new Error(`owner must match [A-Za-z0-9_-]+ (got "${owner}")`);
  }

  const curatorQueries = Array.isArray(cfg.curatorQueries)
    ? cfg.curatorQueries.filter((q): q is string => typeof q === "string" && q.trim().length > 0)
    : [];

  const baseContextPath = nonEmptyString(cfg.extractionBaseContextPath);

  return {
    rootDir,
    owner,
    openaiApiKey: apiKey,
    openaiBaseUrl,
    model: nonEmptyString(cfg.model) ?? "gpt-5-mini",
    embeddingModel: nonEmptyString(cfg.embeddingModel) ?? "text-embedding-3-small",
    graphUrl: normalizeHttpUrl(nonEmptyString(cfg.graphUrl), "graphUrl", "config"),
    graphTimeoutMs: positiveInt(cfg.graphTimeoutMs, 30_000),
    crystalWindowSize: positiveInt(cfg.crystalWindowSize, 4),
    crystalTurnThreshold: positiveInt(
      cfg.crystalTurnThreshold ?? process.env.CRYSTALLIZATION_TURN_THRESHOLD,
      50,
    ),
    crystalHoursThreshold: positiveNumber(
      cfg.crystalHoursThreshold ?? process.env.CRYSTALLIZATION_TIME_THRESHOLD_HOURS,
      24,
    ),
    crystalMaxTurns: positiveInt(cfg.crystalMaxTurns, 200),
    summaryMinTurns: positiveInt(cfg.summaryMinTurns, 10),
    summaryBatchLimit: positiveInt(cfg.summaryBatchLimit, 50),
    summaryBacklogThreshold: positiveInt(cfg.summaryBacklogThreshold, 50),
    ingestionBatchSize: positiveInt(cfg.ingestionBatchSize, 20),
    ingestionBacklogThreshold: positiveInt(cfg.ingestionBacklogThreshold, 20),
    lockStaleMs: positiveInt(cfg.lockStaleMs, 4 * 60 * 60 * 1000),
    lockRetries: typeof cfg.lockRetries === "number" && cfg.lockRetries >= 0 ? Math.floor(cfg.lockRetries) : 5,
    curatorQueries: curatorQueries.length > 0 ? curatorQueries : DEFAULT_CURATOR_QUERIES,
    curatorResultsPerQuery: positiveInt(cfg.curatorResultsPerQuery, 15),
    curatorAutoDelete: cfg.curatorAutoDelete === true,
    curatorIntervalHours: positiveNumber(cfg.curatorIntervalHours, 24),
    recallLimitPerLayer: positiveInt(cfg.recallLimitPerLayer, 5),
    tickIntervalMinutes: positiveInt(cfg.tickIntervalMinutes, 15),
    backupDir: path.resolve(expandHome(nonEmptyString(cfg.backupDir) ?? path.join(rootDir, "backups"))),
    backupRetentionDays: positiveInt(cfg.backupRetentionDays, 14),
    entityName: nonEmptyString(cfg.entityName) ?? "the agent",
    extractionBaseContextPath: baseContextPath ? path.resolve(expandHome(baseContextPath)) : undefined,
    debug: cfg.debug === true,
  };
}
