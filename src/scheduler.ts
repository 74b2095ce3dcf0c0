import { log } from "./logger.js";
import { errorMessage, isSubstrateError } from "./errors.js";
import { AsyncMutex } from "./locks.js";
import type { CrystalEngine } from "./crystals/engine.js";
import type { GraphCurator } from "./graph/curator.js";
import type { IngestionBacklog } from "./summaries/ingestion.js";
import type { Summarizer } from "./summaries/summarizer.js";

export type SchedulerEvent = { type: "turn_appended"; turnId: number; now?: Date } | { type: "tick"; now?: Date };

export type MaintenanceAction = "crystallize" | "summarize" | "ingest" | "curate";

export interface ActionOutcome {
  action: MaintenanceAction;
  status: "done" | "skipped" | "failed";
  detail: string;
}

export interface SchedulerDeps {
  crystals: CrystalEngine;
  summarizer: Summarizer;
  ingestion: IngestionBacklog;
  curator: GraphCurator | null;
}

export interface SchedulerOptions {
  summaryBacklogThreshold: number;
  curatorIntervalHours: number;
}

/**
 * Decides which threshold-driven maintenance to run for each event.
 * `turn_appended` only checks crystallization; `tick` also works the
 * summary and graph backlogs and runs curation on its interval.
 */
export class MaintenanceScheduler {
  private readonly mutex = new AsyncMutex();
  private queue: Promise<void> = Promise.resolve();
  private lastCuratedAt: number | null = null;

  constructor(
    private readonly deps: SchedulerDeps,
    private readonly options: SchedulerOptions,
  ) {}

  /** Handle one event; events are processed one at a time. Failures are reported, not thrown. */
  handle(event: SchedulerEvent): Promise<ActionOutcome[]> {
    return this.mutex.runExclusive(() => this.run(event));
  }

  /** Queue an event without waiting for it. */
  dispatch(event: SchedulerEvent): void {
    this.queue = this.queue
      .then(() => this.handle(event))
      .then(
        (outcomes) => {
          for (const o of outcomes) {
            if (o.status !== "skipped") log.debug(`scheduler ${event.type}: ${o.action} ${o.status} (${o.detail})`);
          }
        },
        (err: unknown) => log.error(`scheduler ${event.type} failed`, err),
      );
  }

  /** Resolves once every dispatched event has been handled. */
  idle(): Promise<void> {
    return this.queue;
  }

  private async run(event: SchedulerEvent): Promise<ActionOutcome[]> {
    const now = event.now ?? new Date();
    const outcomes: ActionOutcome[] = [];
    outcomes.push(await this.attempt("crystallize", () => this.crystallize(now)));
    if (event.type === "tick") {
      outcomes.push(await this.attempt("summarize", () => this.summarize()));
      outcomes.push(await this.attempt("ingest", () => this.ingest()));
      outcomes.push(await this.attempt("curate", () => this.curate(now)));
    }
    return outcomes;
  }

  private async attempt(
    action: MaintenanceAction,
    fn: () => Promise<Omit<ActionOutcome, "action">>,
  ): Promise<ActionOutcome> {
    try {
      return { action, ...(await fn()) };
    } catch (err) {
      const kind = isSubstrateError(err) ? err.kind : "error";
      log.warn(`scheduler: ${action} failed (${kind})`, err);
      return { action, status: "failed", detail: `${kind}: ${errorMessage(err)}` };
    }
  }

  private async crystallize(now: Date): Promise<Omit<ActionOutcome, "action">> {
    const crystal = await this.deps.crystals.maybeCrystallize(now);
    return crystal
      ? { status: "done", detail: crystal.filename }
      : { status: "skipped", detail: "threshold not reached" };
  }

  private async summarize(): Promise<Omit<ActionOutcome, "action">> {
    const backlog = this.deps.summarizer.backlogCount();
    if (backlog < this.options.summaryBacklogThreshold) {
      return { status: "skipped", detail: `${backlog} unsummarized` };
    }
    const draft = await this.deps.summarizer.summarize();
    const { summary } = this.deps.summarizer.store(draft);
    return { status: "done", detail: `summary #${summary.id} over ${summary.startId}-${summary.endId}` };
  }

  private async ingest(): Promise<Omit<ActionOutcome, "action">> {
    if (!this.deps.ingestion.stats().recommended) {
      return { status: "skipped", detail: "backlog below threshold" };
    }
    const batch = await this.deps.ingestion.ingestBatch();
    if (batch.status === "partial") {
      return { status: "failed", detail: `batch ${batch.batchId} partial (${batch.failedCount} failed)` };
    }
    return { status: batch.status === "noop" ? "skipped" : "done", detail: `${batch.ingestedCount} turns` };
  }

  private async curate(now: Date): Promise<Omit<ActionOutcome, "action">> {
    if (!this.deps.curator) return { status: "skipped", detail: "graph not configured" };
    const intervalMs = this.options.curatorIntervalHours * 60 * 60 * 1000;
    if (this.lastCuratedAt !== null && now.getTime() - this.lastCuratedAt < intervalMs) {
      return { status: "skipped", detail: "interval not elapsed" };
    }
    this.lastCuratedAt = now.getTime();
    const report = await this.deps.curator.curate();
    return {
      status: "done",
      detail: `${report.duplicates.length} duplicates, ${report.vague.length} vague, ${report.deleted.length} deleted`,
    };
  }
}
