import test from "node:test";
import assert from "node:assert/strict";
import { registerTools } from "../src/tools.js";
import type { ToolApi, ToolSpec } from "../src/types.js";
import { openSubstrate, seedTurns, withTempDir } from "./fakes.js";

class RecordingToolApi implements ToolApi {
  readonly tools = new Map<string, ToolSpec>();

  registerTool(spec: ToolSpec, options: { name: string }): void {
    this.tools.set(options.name, spec);
  }

  async call(name: string, params: Record<string, unknown>): Promise<string> {
    const tool = this.tools.get(name);
    if (!tool) throw new Error(`no tool ${name}`);
    const result = await tool.execute("call-1", params);
    return result.content.map((c) => c.text).join("\n");
  }
}

test("every tool is registered once under its own name", async () => {
  await withTempDir("tools", async (dir) => {
    const { substrate } = await openSubstrate(dir);
    try {
      const api = new RecordingToolApi();
      registerTools(api, substrate);
      assert.equal(api.tools.size, 29);
      for (const [name, spec] of api.tools) assert.equal(spec.name, name);
      assert.ok(api.tools.has("ambient_recall"));
      assert.ok(api.tools.has("ingest_batch_to_graphiti"));
    } finally {
      await substrate.close();
    }
  });
});

test("invalid parameters are reported without running the tool", async () => {
  await withTempDir("tools", async (dir) => {
    const { substrate } = await openSubstrate(dir);
    try {
      const api = new RecordingToolApi();
      registerTools(api, substrate);

      assert.match(await api.call("capture_turn", { channel: "terminal", content: "hi" }), /^Error \(invalid_request\): \/author /);
      assert.match(
        await api.call("texture_add_triplet", { source: "Alex", relationship: "likes", target: "tea", namespace: "bad ns!" }),
        /^Error \(invalid_request\): \/namespace /,
      );
      assert.equal(substrate.turns.counts().total, 0);
    } finally {
      await substrate.close();
    }
  });
});

test("substrate errors become error text with their kind", async () => {
  await withTempDir("tools", async (dir) => {
    const { substrate } = await openSubstrate(dir);
    try {
      const api = new RecordingToolApi();
      registerTools(api, substrate);

      assert.equal(await api.call("crystal_delete", {}), "Error (invalid_request): No crystals exist to delete");
      assert.equal(await api.call("crystal_delete", { filename: "crystal_007" }), "Error (invalid_request): crystal crystal_007.md not found");
    } finally {
      await substrate.close();
    }
  });
});

test("capture and summary tools round-trip through the stores", async () => {
  await withTempDir("tools", async (dir) => {
    const { substrate } = await openSubstrate(dir);
    try {
      const api = new RecordingToolApi();
      registerTools(api, substrate);

      assert.equal(await api.call("capture_turn", { channel: "terminal", author: "alex", content: "first" }), "Captured turn 1");
      seedTurns(substrate.turns, 11);

      const summary = { summary_text: "Opening chat.", start_id: 1, end_id: 10 };
      assert.equal(await api.call("store_summary", summary), "Stored summary #1 covering 10 turns");
      assert.equal(await api.call("store_summary", summary), "Summary #1 already covers turns 1-10");
      assert.match(
        await api.call("store_summary", { summary_text: "Overlap.", start_id: 5, end_id: 12 }),
        /^Error \(invalid_request\): /,
      );
      await substrate.scheduler.idle();
    } finally {
      await substrate.close();
    }
  });
});

test("word-photo search reports an embedding outage", async () => {
  await withTempDir("tools", async (dir) => {
    const { substrate, embedder } = await openSubstrate(dir);
    try {
      const api = new RecordingToolApi();
      registerTools(api, substrate);
      embedder.failing = true;
      assert.equal(
        await api.call("anchor_search", { query: "garden" }),
        "Word-photo search degraded (embedding backend unreachable); no results",
      );
    } finally {
      await substrate.close();
    }
  });
});

test("store_summary without channels records the channels it covers", async () => {
  await withTempDir("tools", async (dir) => {
    const { substrate } = await openSubstrate(dir);
    try {
      const api = new RecordingToolApi();
      registerTools(api, substrate);
      seedTurns(substrate.turns, 4, undefined, (i) => ({ channel: i < 2 ? "discord" : "terminal" }));
      assert.equal(
        await api.call("store_summary", { summary_text: "Short chat.", start_id: 1, end_id: 4 }),
        "Stored summary #1 covering 4 turns",
      );
      assert.deepEqual(substrate.summarizer.get(1)?.channels, ["discord", "terminal"]);
    } finally {
      await substrate.close();
    }
  });
});

test("curation without a graph says so", async () => {
  await withTempDir("tools", async (dir) => {
    const { substrate } = await openSubstrate(dir, {}, { graphBackend: null });
    try {
      const api = new RecordingToolApi();
      registerTools(api, substrate);
      assert.equal(await api.call("texture_curate", {}), "Graph backend not configured");
    } finally {
      await substrate.close();
    }
  });
});
