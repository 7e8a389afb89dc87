import test from "node:test";
import assert from "node:assert/strict";
import { analysisFingerprint, analysisPrefix, stableStringify } from "./fingerprint";

test("stableStringify sorts keys at every depth and skips undefined", () => {
  assert.equal(
    stableStringify({ b: 1, a: { d: [3, { z: true, y: null }], c: "x" }, e: undefined }),
    '{"a":{"c":"x","d":[3,{"y":null,"z":true}]},"b":1}'
  );
});

test("stableStringify rejects non-finite numbers", () => {
  assert.throws(() => stableStringify({ n: Number.NaN }), /Non-finite number/);
});

test("fingerprints ignore parameter order and change with any input", () => {
  const a = analysisFingerprint("all", "forecast", { params: { forecastDays: 90, referenceDate: "2025-04-07" } });
  const b = analysisFingerprint("all", "forecast", { params: { referenceDate: "2025-04-07", forecastDays: 90 } });
  const c = analysisFingerprint("all", "forecast", { params: { referenceDate: "2025-04-07", forecastDays: 91 } });

  assert.equal(a, b);
  assert.notEqual(a, c);
  assert.match(a, /^analysis:all:forecast:[0-9a-f]{40}$/);
  assert.ok(a.startsWith(analysisPrefix("all")));
});
