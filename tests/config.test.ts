import test from "node:test";
import assert from "node:assert/strict";
import path from "node:path";
import { DEFAULT_CURATOR_QUERIES, parseConfig } from "../src/config.js";

const ENV_KEYS = [
  "OPENAI_API_KEY",
  "OPENAI_BASE_URL",
  "CRYSTALLIZATION_TURN_THRESHOLD",
  "CRYSTALLIZATION_TIME_THRESHOLD_HOURS",
  "STRATA_TEST_KEY",
] as const;

async function withEnv(values: Partial<Record<(typeof ENV_KEYS)[number], string>>, fn: () => void | Promise<void>) {
  const saved = new Map<string, string | undefined>();
  for (const key of ENV_KEYS) {
    saved.set(key, process.env[key]);
    delete process.env[key];
  }
  Object.assign(process.env, values);
  try {
    await fn();
  } finally {
    for (const [key, value] of saved) {
      if (value === undefined) delete process.env[key];
      else process.env[key] = value;
    }
  }
}

test("defaults apply when nothing is configured", async () => {
  await withEnv({}, () => {
    const cfg = parseConfig({ rootDir: "/tmp/strata-config" });
    assert.equal(cfg.owner, "default");
    assert.equal(cfg.openaiApiKey, undefined);
    assert.equal(cfg.graphUrl, undefined);
    assert.equal(cfg.crystalWindowSize, 4);
    assert.equal(cfg.crystalTurnThreshold, 50);
    assert.equal(cfg.crystalHoursThreshold, 24);
    assert.equal(cfg.summaryBacklogThreshold, 50);
    assert.equal(cfg.ingestionBacklogThreshold, 20);
    assert.equal(cfg.lockRetries, 5);
    assert.deepEqual(cfg.curatorQueries, DEFAULT_CURATOR_QUERIES);
    assert.equal(cfg.backupDir, path.join("/tmp/strata-config", "backups"));
  });
});

test("owner must be a safe identifier", () => {
  assert.throws(() => parseConfig({ owner: "../alex" }), /owner must match/);
  assert.equal(parseConfig({ owner: "alex_2" }).owner, "alex_2");
});

test("api keys resolve ${VAR} references and fall back to the environment", async () => {
  await withEnv({ STRATA_TEST_KEY: "test-secret" }, () => {
    assert.equal(parseConfig({ openaiApiKey: "${STRATA_TEST_KEY}" }).openaiApiKey, "test-secret");
    assert.throws(() => parseConfig({ openaiApiKey: "${STRATA_MISSING_KEY}" }), /STRATA_MISSING_KEY is not set/);
  });
  await withEnv({ OPENAI_API_KEY: "test-secret" }, () => {
    assert.equal(parseConfig({}).openaiApiKey, "test-secret");
  });
});

test("urls are normalized and bad ones ignored", async () => {
  await withEnv({ OPENAI_BASE_URL: "https://llm.example.test/v1/" }, () => {
    assert.equal(parseConfig({}).openaiBaseUrl, "https://llm.example.test/v1");
    assert.equal(parseConfig({ openaiBaseUrl: "not a url" }).openaiBaseUrl, undefined);
    assert.equal(parseConfig({ graphUrl: "ftp://graph.example.test" }).graphUrl, undefined);
    assert.equal(parseConfig({ graphUrl: "http://localhost:8000/" }).graphUrl, "http://localhost:8000");
  });
});

test("crystal thresholds come from the environment when not configured", async () => {
  await withEnv({ CRYSTALLIZATION_TURN_THRESHOLD: "30", CRYSTALLIZATION_TIME_THRESHOLD_HOURS: "1.5" }, () => {
    const cfg = parseConfig({});
    assert.equal(cfg.crystalTurnThreshold, 30);
    assert.equal(cfg.crystalHoursThreshold, 1.5);
    assert.equal(parseConfig({ crystalTurnThreshold: 80 }).crystalTurnThreshold, 80);
  });
});

test("invalid numbers fall back and lockRetries accepts zero", () => {
  const cfg = parseConfig({ crystalWindowSize: -2, summaryMinTurns: "abc", lockRetries: 0, curatorQueries: ["", 3, "garden"] });
  assert.equal(cfg.crystalWindowSize, 4);
  assert.equal(cfg.summaryMinTurns, 10);
  assert.equal(cfg.lockRetries, 0);
  assert.deepEqual(cfg.curatorQueries, ["garden"]);
});
