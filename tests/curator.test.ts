import test from "node:test";
import assert from "node:assert/strict";
import path from "node:path";
import { readFile } from "node:fs/promises";
import { GraphAdapter } from "../src/graph/adapter.js";
import { GraphCurator, findCandidates, isVagueEntity, normalizeEntityName } from "../src/graph/curator.js";
import { ExtractionContextProvider } from "../src/graph/extraction-context.js";
import { InMemoryGraphBackend, fact, withTempDir } from "./fakes.js";

function seededBackend(): InMemoryGraphBackend {
  const backend = new InMemoryGraphBackend();
  backend.facts = [
    fact({ uuid: "f1", factText: "Alex works on Strata" }),
    fact({ uuid: "f2", sourceEntity: "alex", targetEntity: "Strata ", factText: "Alex works on Strata again" }),
    fact({ uuid: "f3", predicate: "LIKES", targetEntity: "it", factText: "Alex likes it" }),
    fact({ uuid: "f4", predicate: "USES", factText: "Alex uses Strata" }),
    fact({ uuid: "f5", predicate: "LIKES", targetEntity: "Tea", factText: "Alex likes Tea" }),
    fact({ uuid: "f6", predicate: "LIKES", targetEntity: "It", factText: "Alex likes it too" }),
    fact({ uuid: "f7", sourceEntity: "someone", predicate: "VISITED", targetEntity: "Alex", factText: "Someone visited Alex" }),
  ];
  return backend;
}

function curatorFor(backend: InMemoryGraphBackend, dir: string): GraphCurator {
  const adapter = new GraphAdapter(backend, "tester", new ExtractionContextProvider({ entityName: "Wren" }));
  return new GraphCurator(adapter, {
    queries: ["Alex", "Strata"],
    resultsPerQuery: 15,
    autoDelete: false,
    reportPath: path.join(dir, "state", "curator-last-run.json"),
  });
}

test("entity names normalize and vague names are recognized", () => {
  assert.equal(normalizeEntityName("  The  Garden! "), "the garden");
  assert.equal(isVagueEntity("It"), true);
  assert.equal(isVagueEntity("x"), true);
  assert.equal(isVagueEntity("\"someone\""), true);
  assert.equal(isVagueEntity("Tea"), false);
});

test("candidates: later duplicates, vague facts and ambiguous endpoint groups", () => {
  const found = findCandidates(seededBackend().facts);
  assert.deepEqual(
    found.duplicates.map((c) => c.uuid),
    ["f2"],
  );
  assert.deepEqual(
    found.vague.map((c) => c.uuid),
    ["f3", "f6", "f7"],
  );
  // f7 is vague but its signature is unique, so it is only reported.
  assert.deepEqual(
    found.deletable.map((c) => c.uuid),
    ["f3", "f6", "f2"],
  );
  assert.deepEqual(found.ambiguous, [{ endpoints: "alex|strata", predicates: ["USES", "WORKS_ON"], uuids: ["f1", "f2", "f4"] }]);
});

test("curation is report-only by default", async () => {
  await withTempDir("curator", async (dir) => {
    const backend = seededBackend();
    const report = await curatorFor(backend, dir).curate();

    assert.equal(report.mode, "standard");
    assert.equal(report.autoDelete, false);
    assert.equal(report.queriesRun, 2);
    assert.equal(report.sampled, 7);
    assert.deepEqual(report.deleted, []);
    assert.equal(backend.facts.length, 7);

    const saved: unknown = JSON.parse(await readFile(path.join(dir, "state", "curator-last-run.json"), "utf-8"));
    assert.ok(typeof saved === "object" && saved !== null && "sampled" in saved);
    assert.equal(saved.sampled, 7);
  });
});

test("auto-delete removes repeated vague facts and duplicates but never a unique signature", async () => {
  await withTempDir("curator", async (dir) => {
    const backend = seededBackend();
    const report = await curatorFor(backend, dir).curate({ autoDelete: true });

    assert.deepEqual(report.deleted, ["f3", "f6", "f2"]);
    assert.deepEqual(
      backend.facts.map((f) => f.uuid),
      ["f1", "f4", "f5", "f7"],
    );
  });
});

test("a failed deletion is recorded and the run carries on", async () => {
  await withTempDir("curator", async (dir) => {
    const backend = seededBackend();
    backend.failDelete.add("f3");
    const report = await curatorFor(backend, dir).curate({ autoDelete: true });

    assert.deepEqual(report.failed, ["f3"]);
    assert.deepEqual(report.deleted, ["f6", "f2"]);
    assert.ok(backend.facts.some((f) => f.uuid === "f3"));
  });
});

test("an aborted run stops before touching the graph", async () => {
  await withTempDir("curator", async (dir) => {
    const backend = seededBackend();
    const controller = new AbortController();
    controller.abort();
    const report = await curatorFor(backend, dir).curate({ autoDelete: true, signal: controller.signal });

    assert.equal(report.interrupted, true);
    assert.equal(report.queriesRun, 0);
    assert.deepEqual(report.deleted, []);
    assert.equal(backend.facts.length, 7);
  });
});

test("deep mode runs the extra queries", async () => {
  await withTempDir("curator", async (dir) => {
    const report = await curatorFor(seededBackend(), dir).curate({ deep: true });
    assert.equal(report.mode, "deep");
    assert.equal(report.queriesRun, 10);
  });
});

test("failed searches are counted, not thrown", async () => {
  await withTempDir("curator", async (dir) => {
    const backend = seededBackend();
    backend.failure = new Error("socket hang up");
    const report = await curatorFor(backend, dir).curate({ autoDelete: true });
    assert.equal(report.queryErrors, 2);
    assert.equal(report.sampled, 0);
    assert.deepEqual(report.deleted, []);
  });
});
