import test from "node:test";
import assert from "node:assert/strict";
import path from "node:path";
import { readdir, readFile } from "node:fs/promises";
import { CrystalEngine } from "../src/crystals/engine.js";
import { crystalFilename, crystalNumber } from "../src/crystals/format.js";
import { Summarizer } from "../src/summaries/summarizer.js";
import { TurnStore } from "../src/turns/store.js";
import { ChainIntegrityError, ExtractionFailureError, InvalidRequestError } from "../src/errors.js";
import type { CrystalSections } from "../src/types.js";
import { FakeLlm, seedTurns, testLock, withTempDir } from "./fakes.js";

const NOW = new Date("2026-03-05T12:00:00.000Z");

function sections(label: string): CrystalSections {
  return {
    fieldState: `${label} state`,
    keyEvents: [`${label} happened`],
    decisions: [],
    internalArc: `${label} arc`,
    continuitySeeds: [`follow up on ${label}`],
  };
}

async function setup(dir: string, llm: FakeLlm | null = new FakeLlm()) {
  const turns = new TurnStore(path.join(dir, "turns.sqlite"));
  await turns.initialize();
  const summaries = new Summarizer(turns, llm, { minTurns: 1, batchLimit: 50, backlogThreshold: 50 });
  const crystalsDir = path.join(dir, "crystals");
  const engine = new CrystalEngine(crystalsDir, turns, summaries, llm, testLock(dir, "crystallize"), {
    windowSize: 4,
    turnThreshold: 50,
    hoursThreshold: 24,
    maxTurns: 200,
  });
  await engine.initialize();
  return { turns, summaries, engine, crystalsDir };
}

test("crystal filenames are zero padded and parse back", () => {
  assert.equal(crystalFilename(7), "crystal_007.md");
  assert.equal(crystalFilename(1234), "crystal_1234.md");
  assert.equal(crystalNumber("crystal_042.md"), 42);
  assert.equal(crystalNumber(".crystal_042.md.tmp"), null);
});

test("the current window holds min(W, N) crystals and the archive grows by the overflow", async () => {
  await withTempDir("crystals", async (dir) => {
    const { turns, engine } = await setup(dir);
    try {
      for (let n = 1; n <= 6; n++) {
        await engine.crystallize(sections(`c${n}`), NOW);
        const listing = await engine.list();
        assert.equal(listing.current.length, Math.min(4, n));
        assert.equal(listing.archived.length, Math.max(0, n - 4));
        assert.equal(listing.total, n);
      }
      const listing = await engine.list();
      assert.deepEqual(
        listing.current.map((c) => c.filename),
        ["crystal_003.md", "crystal_004.md", "crystal_005.md", "crystal_006.md"],
      );
      assert.deepEqual(
        listing.archived.map((c) => c.filename),
        ["crystal_001.md", "crystal_002.md"],
      );
      assert.equal(listing.current[3].preview, "c6 state");
    } finally {
      turns.close();
    }
  });
});

test("a manual crystal round-trips its sections and frontmatter", async () => {
  await withTempDir("crystals", async (dir) => {
    const { turns, engine, crystalsDir } = await setup(dir);
    try {
      seedTurns(turns, 3);
      const created = await engine.crystallize(sections("first"), NOW);
      assert.equal(created.filename, "crystal_001.md");
      assert.equal(created.meta.mode, "manual");
      assert.equal(created.meta.startTurnId, 1);
      assert.equal(created.meta.endTurnId, 3);
      assert.equal(created.meta.timespanStart, "2026-03-01T10:00:00.000Z");
      assert.equal(created.meta.timespanEnd, "2026-03-01T10:02:00.000Z");

      const raw = await readFile(path.join(crystalsDir, "current", "crystal_001.md"), "utf-8");
      assert.ok(raw.includes("\nsequence: 1\n"));
      assert.ok(raw.includes("## Decisions\n\n- (none)\n"));

      const [loaded] = await engine.getRecent(1);
      assert.deepEqual(loaded.sections, sections("first"));
      assert.deepEqual(loaded.meta, created.meta);
    } finally {
      turns.close();
    }
  });
});

test("free-text headings and multi-line items survive a re-read", async () => {
  await withTempDir("crystals", async (dir) => {
    const { turns, engine } = await setup(dir);
    try {
      const given: CrystalSections = {
        fieldState: "Late evening.\n\n## Mood\n\nCalm after the release.",
        keyEvents: ["shipped the release\nafter two retries", "tea"],
        decisions: ["keep Fridays free"],
        internalArc: "Started tense.\n## Then\nSettled.",
        continuitySeeds: [],
      };
      await engine.crystallize(given, NOW);

      const [loaded] = await engine.getRecent(1);
      assert.deepEqual(loaded.sections, given);
    } finally {
      turns.close();
    }
  });
});

test("only the most recent crystal can be deleted", async () => {
  await withTempDir("crystals", async (dir) => {
    const { turns, engine } = await setup(dir);
    try {
      await assert.rejects(engine.deleteLatest(), { name: "InvalidRequestError", message: "No crystals exist to delete" });
      for (let n = 1; n <= 5; n++) await engine.crystallize(sections(`c${n}`), NOW);

      await assert.rejects(engine.delete("crystal_004"), ChainIntegrityError);
      await assert.rejects(engine.delete("crystal_001.md"), ChainIntegrityError);
      await assert.rejects(engine.delete("crystal_099.md"), InvalidRequestError);

      assert.deepEqual(await engine.delete("crystal_005.md"), { deleted: "crystal_005.md" });
      let listing = await engine.list();
      assert.equal(listing.current.length, 3);
      assert.equal(listing.archived.length, 1);

      assert.deepEqual(await engine.deleteLatest(), { deleted: "crystal_004.md" });
      assert.deepEqual(await engine.deleteLatest(), { deleted: "crystal_003.md" });
      assert.deepEqual(await engine.deleteLatest(), { deleted: "crystal_002.md" });
      listing = await engine.list();
      assert.deepEqual(listing.current, []);
      assert.deepEqual(
        listing.archived.map((c) => c.filename),
        ["crystal_001.md"],
      );

      // The newest crystal left is archived; it is still the one that may go.
      assert.deepEqual(await engine.deleteLatest(), { deleted: "crystal_001.md" });
      listing = await engine.list();
      assert.equal(listing.total, 0);
      await assert.rejects(engine.deleteLatest(), { name: "InvalidRequestError", message: "No crystals exist to delete" });
    } finally {
      turns.close();
    }
  });
});

test("a failed model call leaves the chain untouched", async () => {
  await withTempDir("crystals", async (dir) => {
    const llm = new FakeLlm();
    const { turns, engine, crystalsDir } = await setup(dir, llm);
    try {
      for (let n = 1; n <= 4; n++) await engine.crystallize(sections(`c${n}`), NOW);
      seedTurns(turns, 10);
      llm.failure = new ExtractionFailureError("model unavailable");

      await assert.rejects(engine.crystallize(undefined, NOW), ExtractionFailureError);

      const listing = await engine.list();
      assert.equal(listing.current.length, 4);
      assert.equal(listing.archived.length, 0);
      assert.deepEqual((await readdir(path.join(crystalsDir, "current"))).sort(), [
        "crystal_001.md",
        "crystal_002.md",
        "crystal_003.md",
        "crystal_004.md",
      ]);
      assert.equal((await engine.triggerState(NOW)).turnsSince, 10);
    } finally {
      turns.close();
    }
  });
});

test("51 new turns trigger one automatic crystal covering all of them", async () => {
  await withTempDir("crystals", async (dir) => {
    const llm = new FakeLlm().respondWith(sections("auto"));
    const { turns, engine } = await setup(dir, llm);
    try {
      seedTurns(turns, 51);
      const state = await engine.triggerState(NOW);
      assert.equal(state.turnsSince, 51);
      assert.equal(state.due, true);

      const crystal = await engine.maybeCrystallize(NOW);
      assert.equal(crystal?.meta.mode, "auto");
      assert.equal(crystal?.meta.startTurnId, 1);
      assert.equal(crystal?.meta.endTurnId, 51);
      assert.equal(llm.requests.length, 1);
      assert.equal(llm.requests[0].name, "crystal");
      assert.ok(llm.requests[0].input.startsWith("## Recent Turns\n"));

      assert.equal(await engine.maybeCrystallize(NOW), null);
      assert.equal((await engine.list()).current.length, 1);
    } finally {
      turns.close();
    }
  });
});

test("the prompt carries the previous crystal and prefers summaries over covered turns", async () => {
  await withTempDir("crystals", async (dir) => {
    const llm = new FakeLlm().respondWith(sections("second"));
    const { turns, summaries, engine } = await setup(dir, llm);
    try {
      seedTurns(turns, 2);
      await engine.crystallize(sections("first"), NOW);
      seedTurns(turns, 12, new Date("2026-03-05T13:00:00.000Z"));
      summaries.store({ text: "Early work recap", startId: 3, endId: 8, channels: ["terminal"], kind: "work" });

      const second = await engine.crystallize(undefined, NOW);
      assert.equal(second.meta.startTurnId, 3);
      assert.equal(second.meta.endTurnId, 14);

      const input = llm.requests[0].input;
      assert.ok(input.startsWith("## Previous Crystal\n# Crystal 001\n"));
      assert.ok(input.includes("## Summaries\n[turns 3-8] Early work recap\n"));
      assert.ok(input.includes("agent: message number 8\n"));
      assert.ok(!input.includes("agent: message number 2\n"));
    } finally {
      turns.close();
    }
  });
});

test("nothing new to compress is an invalid request", async () => {
  await withTempDir("crystals", async (dir) => {
    const { turns, engine } = await setup(dir);
    try {
      await assert.rejects(engine.crystallize(undefined, NOW), { name: "InvalidRequestError", message: "nothing new to crystallize" });
    } finally {
      turns.close();
    }
  });
});

test("the hour clock starts at the first uncrystallized turn, then at the last crystal", async () => {
  await withTempDir("crystals", async (dir) => {
    const { turns, engine } = await setup(dir);
    try {
      assert.deepEqual(await engine.triggerState(NOW), { turnsSince: 0, hoursSince: 0, lastEndTurnId: 0, due: false });

      seedTurns(turns, 3);
      let state = await engine.triggerState(new Date("2026-03-01T12:00:00.000Z"));
      assert.equal(state.hoursSince, 2);
      assert.equal(state.due, false);
      state = await engine.triggerState(new Date("2026-03-02T11:00:00.000Z"));
      assert.equal(state.hoursSince, 25);
      assert.equal(state.due, true);

      await engine.crystallize(sections("checkpoint"), new Date("2026-03-02T11:00:00.000Z"));
      seedTurns(turns, 1, new Date("2026-03-02T12:00:00.000Z"));
      state = await engine.triggerState(new Date("2026-03-02T17:00:00.000Z"));
      assert.deepEqual(state, { turnsSince: 1, hoursSince: 6, lastEndTurnId: 3, due: false });
    } finally {
      turns.close();
    }
  });
});

test("search scores newer crystals higher", async () => {
  await withTempDir("crystals", async (dir) => {
    const { turns, engine } = await setup(dir);
    try {
      for (let n = 1; n <= 3; n++) await engine.crystallize(sections(`c${n}`), NOW);
      const results = await engine.search("anything", 3);
      assert.deepEqual(
        results.map((r) => [r.source, r.score]),
        [
          ["crystal_001.md", 0.8],
          ["crystal_002.md", 0.9],
          ["crystal_003.md", 1],
        ],
      );
      assert.deepEqual(await engine.getRecent(0), []);
    } finally {
      turns.close();
    }
  });
});
