import test from "node:test";
import assert from "node:assert/strict";
import { MemoryCacheBackend } from "./memoryBackend";

function makeClock(start = 1_000_000) {
  let current = start;
  return {
    now: () => current,
    advance: (ms: number) => {
      current += ms;
    },
  };
}

test("entries live until their TTL and are purged on read", async () => {
  const clock = makeClock();
  const backend = new MemoryCacheBackend({ now: clock.now });

  await backend.set("analysis:Payable:x", "v1", 60);
  clock.advance(59_999);
  assert.equal(await backend.get("analysis:Payable:x"), "v1");

  clock.advance(1);
  assert.equal(await backend.get("analysis:Payable:x"), null);
  assert.equal(backend.size, 0);
});

test("set overwrites and a non-positive TTL deletes", async () => {
  const backend = new MemoryCacheBackend();
  await backend.set("k", "a", 10);
  await backend.set("k", "b", 10);
  assert.equal(await backend.get("k"), "b");

  await backend.set("k", "c", 0);
  assert.equal(await backend.get("k"), null);
});

test("invalidate removes the exact key and every key under the prefix", async () => {
  const backend = new MemoryCacheBackend();
  await backend.set("analysis:Payable:cash_flow:1", "a", 10);
  await backend.set("analysis:Payable:forecast:2", "b", 10);
  await backend.set("analysis:Receivable:forecast:3", "c", 10);

  assert.equal(await backend.invalidate("analysis:Payable:"), 2);
  assert.equal(await backend.get("analysis:Receivable:forecast:3"), "c");
  assert.equal(await backend.invalidate("analysis:Receivable:forecast:3"), 1);
  assert.equal(backend.size, 0);
});
