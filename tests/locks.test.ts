import test from "node:test";
import assert from "node:assert/strict";
import { AsyncMutex } from "../src/locks.js";
import { testLock, withTempDir } from "./fakes.js";

test("a second holder of the same lock is refused", async () => {
  await withTempDir("locks", async (dir) => {
    const first = testLock(dir, "ingest");
    const second = testLock(dir, "ingest");

    await first.runExclusive(async () => {
      assert.equal(await second.isHeld(), true);
      await assert.rejects(
        second.runExclusive(async () => "never"),
        { name: "LockContentionError", message: 'ingest is already running for owner "tester"' },
      );
    });
    assert.equal(await first.isHeld(), false);
    assert.equal(await second.runExclusive(async () => "ran"), "ran");
  });
});

test("different lock names do not contend", async () => {
  await withTempDir("locks", async (dir) => {
    const ingest = testLock(dir, "ingest");
    const crystallize = testLock(dir, "crystallize");
    const result = await ingest.runExclusive(() => crystallize.runExclusive(async () => "both"));
    assert.equal(result, "both");
  });
});

test("callers of one lock queue instead of failing", async () => {
  await withTempDir("locks", async (dir) => {
    const lock = testLock(dir, "anchors");
    const order: string[] = [];
    const slow = lock.runExclusive(async () => {
      order.push("slow:start");
      await new Promise((resolve) => setTimeout(resolve, 20));
      order.push("slow:end");
    });
    const fast = lock.runExclusive(async () => {
      order.push("fast");
    });
    await Promise.all([slow, fast]);
    assert.deepEqual(order, ["slow:start", "slow:end", "fast"]);
  });
});

test("a throwing holder releases the lock", async () => {
  await withTempDir("locks", async (dir) => {
    const lock = testLock(dir, "crystallize");
    await assert.rejects(
      lock.runExclusive(async () => {
        throw new Error("boom");
      }),
      /boom/,
    );
    assert.equal(await lock.isHeld(), false);
  });
});

test("AsyncMutex keeps running after a rejected task", async () => {
  const mutex = new AsyncMutex();
  const failed = mutex.runExclusive(async () => {
    throw new Error("first");
  });
  const next = mutex.runExclusive(async () => 2);
  await assert.rejects(failed, /first/);
  assert.equal(await next, 2);
});
