import path from "node:path";
import { mkdir, readdir, readFile, rename, rm, stat, writeFile } from "node:fs/promises";
import { log } from "../logger.js";
import { ChainIntegrityError, ExtractionFailureError, InvalidRequestError, errorMessage } from "../errors.js";
import type { LlmClient } from "../llm.js";
import type { CooperativeLock } from "../locks.js";
import { CrystalOutputSchema } from "../schemas.js";
import type { Summarizer } from "../summaries/summarizer.js";
import { formatTurnsForPrompt } from "../summaries/summarizer.js";
import type { TurnStore } from "../turns/store.js";
import type {
  ComponentHealth,
  Crystal,
  CrystalFileInfo,
  CrystalListing,
  CrystalMeta,
  CrystalMode,
  CrystalSections,
  CrystalTriggerState,
  RankedResult,
  Turn,
} from "../types.js";
import {
  crystalFilename,
  crystalNumber,
  crystalPreview,
  crystalText,
  estimateTokens,
  parseCrystal,
  renderCrystal,
  renderCrystalBody,
} from "./format.js";

const HOUR_MS = 60 * 60 * 1000;

const CRYSTAL_INSTRUCTIONS = `You maintain a rolling chain of "crystals": dense snapshots that let an agent pick up exactly where it left off after its context is reset.

Write the next crystal from the material provided. The previous crystal is prior context; do not repeat it, carry forward only what still matters.

Preserve:
- the current emotional and relational state
- decisions, commitments and their reasons
- turning points and how understanding changed
- open threads to resume next time

Discard:
- debugging loops, retries and failed attempts (keep only outcomes)
- tool output and code
- small talk that changed nothing

Target about one sixth of the input length. Be concrete: names, places, artifacts.`;

export interface CrystalEngineOptions {
  windowSize: number;
  turnThreshold: number;
  hoursThreshold: number;
  maxTurns: number;
}

interface ChainFile {
  filename: string;
  number: number;
  archived: boolean;
}

/**
 * Rolling chain of crystals on disk: `current/` holds the newest
 * `windowSize` files, `archive/` everything older. Only the newest crystal
 * may be deleted.
 */
export class CrystalEngine {
  private readonly currentDir: string;
  private readonly archiveDir: string;

  constructor(
    dir: string,
    private readonly turns: TurnStore,
    private readonly summaries: Summarizer,
    private readonly llm: LlmClient | null,
    private readonly lock: CooperativeLock,
    private readonly options: CrystalEngineOptions,
  ) {
    this.currentDir = path.join(dir, "current");
    this.archiveDir = path.join(dir, "archive");
  }

  async initialize(): Promise<void> {
    await mkdir(this.currentDir, { recursive: true });
    await mkdir(this.archiveDir, { recursive: true });
  }

  async triggerState(now: Date = new Date()): Promise<CrystalTriggerState> {
    const latest = await this.latest();
    const lastEndTurnId = await this.lastEndTurnId(latest);
    const turnsSince = this.turns.countAfter(lastEndTurnId);
    if (turnsSince === 0) {
      return { turnsSince: 0, hoursSince: 0, lastEndTurnId, due: false };
    }

    let since: string | null = latest?.meta.created ?? null;
    if (!since) since = this.turns.after(lastEndTurnId, 1)[0]?.createdAt ?? null;
    const sinceMs = since ? Date.parse(since) : NaN;
    const hoursSince = Number.isFinite(sinceMs) ? Math.max(0, (now.getTime() - sinceMs) / HOUR_MS) : 0;

    const due = turnsSince >= this.options.turnThreshold || hoursSince >= this.options.hoursThreshold;
    return { turnsSince, hoursSince, lastEndTurnId, due };
  }

  /** Create a crystal if the turn or time threshold has been crossed. */
  async maybeCrystallize(now: Date = new Date()): Promise<Crystal | null> {
    if (!(await this.triggerState(now)).due) return null;
    return this.lock.runExclusive(async () => {
      // Another writer may have crystallized while we waited for the lock.
      const state = await this.triggerState(now);
      if (!state.due) return null;
      log.info(
        `crystallization triggered: ${state.turnsSince} turns, ${state.hoursSince.toFixed(1)}h since last crystal`,
      );
      return this.create("auto", now);
    });
  }

  /** Create a crystal now, from the given sections or by compressing the uncrystallized tail. */
  async crystallize(sections?: CrystalSections, now: Date = new Date()): Promise<Crystal> {
    return this.lock.runExclusive(() => this.create("manual", now, sections));
  }

  async list(): Promise<CrystalListing> {
    const files = await this.chainFiles();
    const info = async (f: ChainFile): Promise<CrystalFileInfo> => {
      const fp = this.pathOf(f);
      const [raw, st] = await Promise.all([readFile(fp, "utf-8"), stat(fp)]);
      const crystal = parseCrystal(f.filename, raw, f.archived, st.mtime.toISOString());
      return {
        filename: f.filename,
        number: f.number,
        sizeBytes: st.size,
        modified: st.mtime.toISOString(),
        preview: crystalPreview(crystal),
      };
    };
    const current = await Promise.all(files.filter((f) => !f.archived).map(info));
    const archived = await Promise.all(files.filter((f) => f.archived).map(info));
    return { current, archived, total: files.length, maxCurrent: this.options.windowSize };
  }

  /** The newest `count` crystals, oldest first. */
  async getRecent(count: number): Promise<Crystal[]> {
    if (count <= 0) return [];
    const files = (await this.chainFiles()).slice(-count);
    return Promise.all(files.map((f) => this.load(f)));
  }

  async latest(): Promise<Crystal | null> {
    const files = await this.chainFiles();
    const last = files[files.length - 1];
    return last ? this.load(last) : null;
  }

  async deleteLatest(): Promise<{ deleted: string }> {
    return this.lock.runExclusive(async () => {
      const files = await this.chainFiles();
      const last = files[files.length - 1];
      if (!last) throw new InvalidRequestError("No crystals exist to delete");
      // The newest crystal may already sit in the archive once deletions have
      // emptied the window. It is deleted there; nothing moves back.
      await rm(this.pathOf(last));
      log.info(`deleted crystal ${last.filename}${last.archived ? " from the archive" : ""}`);
      return { deleted: last.filename };
    });
  }

  /** Delete `filename`, which must be the newest crystal in the chain. */
  async delete(filename: string): Promise<{ deleted: string }> {
    const target = filename.endsWith(".md") ? filename : `${filename}.md`;
    const files = await this.chainFiles();
    const position = files.findIndex((f) => f.filename === target);
    if (position === -1) throw new InvalidRequestError(`crystal ${target} not found`);
    if (position !== files.length - 1) {
      throw new ChainIntegrityError(
        `${target} is not the most recent crystal; later crystals use it as prior context`,
      );
    }
    return this.deleteLatest();
  }

  async search(_query: string, limit: number): Promise<RankedResult[]> {
    const recent = await this.getRecent(limit);
    return recent.map((c, i): RankedResult => ({
      layer: "crystals",
      content: crystalText(c),
      source: c.filename,
      score: 1 - (recent.length - 1 - i) * 0.1,
      metadata: { sequence: c.meta.sequence, created: c.meta.created, archived: c.archived },
    }));
  }

  async health(): Promise<ComponentHealth> {
    try {
      const files = await this.chainFiles();
      const state = await this.triggerState();
      const counts = {
        current: files.filter((f) => !f.archived).length,
        archived: files.filter((f) => f.archived).length,
        turnsSinceLast: state.turnsSince,
      };
      if (!this.llm) {
        return { status: "degraded", message: "no LLM configured; automatic crystallization disabled", counts };
      }
      if (state.turnsSince >= this.options.turnThreshold * 2) {
        return { status: "degraded", message: `${state.turnsSince} turns since last crystal`, counts };
      }
      return { status: "healthy", message: `${files.length} crystals`, counts };
    } catch (err) {
      return { status: "critical", message: `crystal chain unreadable: ${errorMessage(err)}`, counts: {} };
    }
  }

  private async create(mode: CrystalMode, now: Date, given?: CrystalSections): Promise<Crystal> {
    const files = await this.chainFiles();
    const latestFile = files[files.length - 1];
    const latest = latestFile ? await this.load(latestFile) : null;
    const lastEnd = await this.lastEndTurnId(latest);
    const newTurns = this.turns.after(lastEnd, this.options.maxTurns);

    const sections = given ?? (await this.generate(latest, lastEnd, newTurns));

    const sequence = (latestFile?.number ?? 0) + 1;
    const first = newTurns[0];
    const last = newTurns[newTurns.length - 1];
    const meta: CrystalMeta = {
      sequence,
      created: now.toISOString(),
      timespanStart: first?.createdAt ?? null,
      timespanEnd: last?.createdAt ?? null,
      startTurnId: first?.id ?? null,
      endTurnId: last?.id ?? (lastEnd > 0 ? lastEnd : null),
      tokenEstimate: estimateTokens(renderCrystalBody(sequence, sections)),
      mode,
    };
    const raw = renderCrystal(meta, sections);
    const filename = crystalFilename(sequence);
    await this.commit(filename, raw, files.filter((f) => !f.archived));

    log.info(`created crystal ${filename} (${mode}, ~${meta.tokenEstimate} tokens)`);
    return { meta, sections, filename, archived: false, raw };
  }

  private async generate(latest: Crystal | null, lastEnd: number, newTurns: Turn[]): Promise<CrystalSections> {
    if (newTurns.length === 0) throw new InvalidRequestError("nothing new to crystallize");
    if (!this.llm) throw new ExtractionFailureError("no LLM configured for crystallization");

    const endId = newTurns[newTurns.length - 1].id;
    const summaries = this.summaries.since(lastEnd).filter((s) => s.startId <= endId);
    const covered = (id: number): boolean => summaries.some((s) => id >= s.startId && id <= s.endId);
    const raw = newTurns.filter((t) => !covered(t.id));

    const input: string[] = [];
    if (latest) input.push("## Previous Crystal", crystalText(latest), "");
    if (summaries.length > 0) {
      input.push("## Summaries", ...summaries.map((s) => `[turns ${s.startId}-${s.endId}] ${s.text}`), "");
    }
    if (raw.length > 0) input.push("## Recent Turns", formatTurnsForPrompt(raw));

    const output = await this.llm.parse(CrystalOutputSchema, {
      name: "crystal",
      instructions: CRYSTAL_INSTRUCTIONS,
      input: input.join("\n"),
    });
    return output;
  }

  // Write the new file beside the window, archive the overflow, then move
  // the new file into place. Any failure puts moved files back.
  private async commit(filename: string, raw: string, current: ChainFile[]): Promise<void> {
    await this.initialize();
    const tmp = path.join(this.currentDir, `.${filename}.tmp`);
    await writeFile(tmp, raw, "utf-8");

    const overflow = Math.max(0, current.length + 1 - this.options.windowSize);
    const moved: ChainFile[] = [];
    try {
      for (const f of current.slice(0, overflow)) {
        await rename(path.join(this.currentDir, f.filename), path.join(this.archiveDir, f.filename));
        moved.push(f);
      }
      await rename(tmp, path.join(this.currentDir, filename));
    } catch (err) {
      for (const f of moved.reverse()) {
        await rename(path.join(this.archiveDir, f.filename), path.join(this.currentDir, f.filename)).catch(
          (restoreErr: unknown) => log.error(`could not restore ${f.filename} to the current window`, restoreErr),
        );
      }
      await rm(tmp, { force: true });
      throw err;
    }
    if (moved.length > 0) log.debug(`archived ${moved.map((f) => f.filename).join(", ")}`);
  }

  private async lastEndTurnId(latest: Crystal | null): Promise<number> {
    const direct = latest?.meta.endTurnId ?? null;
    if (direct !== null) return direct;
    const files = await this.chainFiles();
    for (const f of files.slice().reverse()) {
      const c = await this.load(f);
      if (c.meta.endTurnId !== null) return c.meta.endTurnId;
    }
    return 0;
  }

  private async load(f: ChainFile): Promise<Crystal> {
    const fp = this.pathOf(f);
    const [raw, st] = await Promise.all([readFile(fp, "utf-8"), stat(fp)]);
    return parseCrystal(f.filename, raw, f.archived, st.mtime.toISOString());
  }

  private pathOf(f: ChainFile): string {
    return path.join(f.archived ? this.archiveDir : this.currentDir, f.filename);
  }

  /** Every crystal, oldest first. */
  private async chainFiles(): Promise<ChainFile[]> {
    const read = async (dir: string, archived: boolean): Promise<ChainFile[]> => {
      let names: string[];
      try {
        names = await readdir(dir);
      } catch (err) {
        if (err instanceof Error && "code" in err && err.code === "ENOENT") return [];
        throw err;
      }
      const out: ChainFile[] = [];
      for (const filename of names) {
        const number = crystalNumber(filename);
        if (number !== null) out.push({ filename, number, archived });
      }
      return out;
    };
    const all = [...(await read(this.archiveDir, true)), ...(await read(this.currentDir, false))];
    return all.sort((a, b) => a.number - b.number);
  }
}
