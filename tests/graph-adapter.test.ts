import test from "node:test";
import assert from "node:assert/strict";
import { GraphAdapter, formatEpisode, formatFact } from "../src/graph/adapter.js";
import { ExtractionContextProvider } from "../src/graph/extraction-context.js";
import { InvalidRequestError, StorageUnavailableError } from "../src/errors.js";
import { InMemoryGraphBackend, fact } from "./fakes.js";

function adapterWith(backend: InMemoryGraphBackend | null): GraphAdapter {
  return new GraphAdapter(backend, "tester", new ExtractionContextProvider({ entityName: "Wren" }));
}

test("reads only see the requested namespace", async () => {
  const backend = new InMemoryGraphBackend();
  backend.facts = [
    fact({ uuid: "f1", factText: "Alex works on Strata" }),
    fact({ uuid: "f2", factText: "Alex works on Strata", namespace: "someone-else" }),
  ];
  const graph = adapterWith(backend);

  const mine = await graph.search("Alex");
  assert.deepEqual(
    mine.map((r) => r.fact.uuid),
    ["f1"],
  );
  const theirs = await graph.search("Alex", "someone-else");
  assert.deepEqual(
    theirs.map((r) => r.fact.uuid),
    ["f2"],
  );
});

test("records leaking from other namespaces are dropped and reported", async () => {
  const backend = new InMemoryGraphBackend();
  backend.facts = [fact({ uuid: "f1" })];
  backend.leaked = [fact({ uuid: "x1", namespace: "someone-else" }), fact({ uuid: "x2", namespace: null })];
  const graph = adapterWith(backend);

  const results = await graph.search("Alex");
  assert.deepEqual(
    results.map((r) => r.fact.uuid),
    ["f1"],
  );
  const health = await graph.health();
  assert.equal(health.status, "degraded");
  assert.deepEqual(health.counts, { isolationViolations: 2 });
});

test("namespaces must be simple identifiers", async () => {
  const graph = adapterWith(new InMemoryGraphBackend());
  await assert.rejects(graph.search("Alex", "bad ns!"), InvalidRequestError);
  await assert.rejects(graph.search("Alex", ""), InvalidRequestError);
  assert.throws(() => adapterWith(null).resolveNamespace("../x"), InvalidRequestError);
  assert.equal(adapterWith(null).resolveNamespace("team_a-1"), "team_a-1");
});

test("search ranks by position and skips duplicate markers", async () => {
  const backend = new InMemoryGraphBackend();
  backend.facts = [
    fact({ uuid: "a", factText: "Alex likes tea" }),
    fact({ uuid: "dup", predicate: "IS_DUPLICATE_OF", factText: "Alex duplicate" }),
    fact({ uuid: "b", factText: "Alex likes walks" }),
  ];
  const results = await adapterWith(backend).search("alex");
  assert.deepEqual(
    results.map((r) => [r.fact.uuid, r.score]),
    [
      ["a", 1],
      ["b", 0.75],
    ],
  );
  assert.deepEqual(await adapterWith(backend).search("   "), []);
});

test("triplets normalize the predicate and default the fact text", async () => {
  const backend = new InMemoryGraphBackend();
  const graph = adapterWith(backend);

  const created = await graph.addTriplet({ source: "Alex", predicate: "works on", target: "Strata", targetType: "TechnicalArtifact" });
  assert.equal(created.predicate, "WORKS_ON");
  assert.equal(created.factText, "Alex works on Strata");
  assert.deepEqual(backend.tripletRequests[0], {
    source: "Alex",
    predicate: "WORKS_ON",
    target: "Strata",
    fact: "Alex works on Strata",
    sourceType: null,
    targetType: "TechnicalArtifact",
    namespace: "tester",
  });
  assert.equal(formatFact(created), "Alex → WORKS_ON → Strata: Alex works on Strata");

  await assert.rejects(graph.addTriplet({ source: "Alex", predicate: "likes", target: "Tea", sourceType: "Entity" }), InvalidRequestError);
  await assert.rejects(graph.addTriplet({ source: "Alex", predicate: "!!", target: "Tea" }), InvalidRequestError);
});

test("episodes carry composed extraction guidance and the ontology", async () => {
  const backend = new InMemoryGraphBackend();
  const graph = adapterWith(backend);

  const result = await graph.addEpisode({
    text: "Alex: I finished the garden bed.",
    channel: "terminal",
    referenceTime: "2026-03-01T10:00:00.000Z",
    entityTypes: ["Person", "Place"],
  });
  assert.equal(result.namespace, "tester");
  assert.equal(result.summary, "extracted 0 entities and 0 facts");

  const req = backend.episodeRequests[0];
  assert.equal(req.name, "episode-2026-03-01T10:00:00.000Z");
  assert.equal(req.source, "terminal");
  assert.deepEqual(Object.keys(req.entityTypes), ["Person", "Place"]);
  assert.ok(req.extractionInstructions.startsWith('The primary entity is "Wren".'));
  assert.ok(req.extractionInstructions.includes("Channel: terminal session."));

  await assert.rejects(graph.addEpisode({ text: "  " }), InvalidRequestError);
});

test("timeline returns episodes oldest first within the window", async () => {
  const backend = new InMemoryGraphBackend();
  const graph = adapterWith(backend);
  for (const [i, time] of ["2026-03-01T09:00:00.000Z", "2026-03-01T10:00:00.000Z", "2026-03-01T11:00:00.000Z"].entries()) {
    await graph.addEpisode({ text: `entry ${i}`, referenceTime: time, extractionInstructions: "none" });
  }

  const all = await graph.timeline();
  assert.deepEqual(
    all.map((e) => e.content),
    ["entry 0", "entry 1", "entry 2"],
  );
  const windowed = await graph.timeline("2026-03-01T09:30:00.000Z", "2026-03-01T10:30:00.000Z");
  assert.deepEqual(
    windowed.map((e) => e.content),
    ["entry 1"],
  );
  assert.equal(formatEpisode(all[0]), "[2026-03-01T09:00:00.000Z] entry 0");
});

test("explore clamps depth and keeps the root's neighbourhood", async () => {
  const backend = new InMemoryGraphBackend();
  backend.facts = [
    fact({ uuid: "f1", sourceEntity: "Alex", targetEntity: "Strata" }),
    fact({ uuid: "f2", sourceEntity: "Sam", targetEntity: "Garden" }),
  ];
  const sub = await adapterWith(backend).explore(" Alex ", 9);
  assert.equal(sub.root, "Alex");
  assert.deepEqual(
    sub.facts.map((f) => f.uuid),
    ["f1"],
  );
  assert.deepEqual(sub.entities.map((e) => e.name).sort(), ["Alex", "Strata"]);
});

test("backend failures surface as storage_unavailable and mark health", async () => {
  const backend = new InMemoryGraphBackend();
  backend.failure = new Error("connect ECONNREFUSED 127.0.0.1:8000");
  const graph = adapterWith(backend);

  await assert.rejects(graph.search("Alex"), (err: unknown) => {
    assert.ok(err instanceof StorageUnavailableError);
    assert.equal(err.message, "graph search failed: connect ECONNREFUSED 127.0.0.1:8000");
    return true;
  });
  const health = await graph.health();
  assert.equal(health.status, "degraded");
  assert.equal(health.message, "graph backend unreachable: connect ECONNREFUSED 127.0.0.1:8000");

  backend.failure = null;
  assert.equal((await graph.health()).status, "degraded");
  await graph.search("Alex");
  assert.equal((await graph.health()).status, "healthy");
});

test("an unconfigured graph is degraded, not broken", async () => {
  const graph = adapterWith(null);
  assert.equal(graph.configured, false);
  await assert.rejects(graph.search("Alex"), StorageUnavailableError);
  assert.deepEqual(await graph.health(), {
    status: "degraded",
    message: "graph backend not configured",
    counts: { isolationViolations: 0 },
  });
});

test("deleting an unknown fact reports false", async () => {
  const backend = new InMemoryGraphBackend();
  backend.facts = [fact({ uuid: "f1" })];
  const graph = adapterWith(backend);
  assert.equal(await graph.delete("f1"), true);
  assert.equal(await graph.delete("f1"), false);
  await assert.rejects(graph.delete(" "), InvalidRequestError);
});
