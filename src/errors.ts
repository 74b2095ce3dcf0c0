export type SubstrateErrorKind =
  | "storage_unavailable"
  | "sync_drift"
  | "chain_integrity"
  | "idempotency"
  | "extraction_failure"
  | "lock_contention"
  | "invalid_request";

export type BackendErrorCategory =
  | "rate_limit"
  | "quota_exceeded"
  | "auth_failure"
  | "graph_backend_error"
  | "network_timeout"
  | "unknown";

export interface BackendErrorInfo {
  category: BackendErrorCategory;
  transient: boolean;
  advice: string;
}

export class SubstrateError extends Error {
  constructor(
    readonly kind: SubstrateErrorKind,
    message: string,
    readonly transient: boolean,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** An embedding or graph backend could not be reached. Callers degrade. */
export class StorageUnavailableError extends SubstrateError {
  constructor(
    message: string,
    readonly backend: BackendErrorInfo = classifyBackendError(message),
    options?: { cause?: unknown },
  ) {
    super("storage_unavailable", message, true, options);
  }
}

export class SyncDriftError extends SubstrateError {
  constructor(message: string) {
    super("sync_drift", message, false);
  }
}

export class ChainIntegrityError extends SubstrateError {
  constructor(message: string) {
    super("chain_integrity", message, false);
  }
}

export class IdempotencyViolation extends SubstrateError {
  constructor(message: string) {
    super("idempotency", message, false);
  }
}

export class ExtractionFailureError extends SubstrateError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("extraction_failure", message, true, options);
  }
}

export class LockContentionError extends SubstrateError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("lock_contention", message, true, options);
  }
}

export class InvalidRequestError extends SubstrateError {
  constructor(message: string) {
    super("invalid_request", message, false);
  }
}

export function isSubstrateError(err: unknown): err is SubstrateError {
  return err instanceof SubstrateError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function classifyBackendError(err: unknown): BackendErrorInfo {
  const msg = errorMessage(err).toLowerCase();

  if (msg.includes("429") || msg.includes("rate limit") || msg.includes("rate_limit")) {
    return { category: "rate_limit", transient: true, advice: "Back off and retry later." };
  }
  if (msg.includes("quota") || msg.includes("insufficient_quota") || msg.includes("billing")) {
    return { category: "quota_exceeded", transient: false, advice: "Check the provider account balance." };
  }
  if (msg.includes("401") || msg.includes("403") || msg.includes("unauthorized") || msg.includes("api key")) {
    return { category: "auth_failure", transient: false, advice: "Check the configured credentials." };
  }
  if (msg.includes("neo4j") || msg.includes("graph backend") || msg.includes("cypher")) {
    return { category: "graph_backend_error", transient: true, advice: "Check that the graph database is running." };
  }
  if (
    msg.includes("timeout") ||
    msg.includes("timed out") ||
    msg.includes("econnrefused") ||
    msg.includes("econnreset") ||
    msg.includes("enotfound") ||
    msg.includes("fetch failed")
  ) {
    return { category: "network_timeout", transient: true, advice: "Check network connectivity to the backend." };
  }
  return { category: "unknown", transient: false, advice: "Inspect the backend logs." };
}
