import { createHash } from "node:crypto";
import type { AnalysisKind, SourceScope } from "@/lib/analysis/types";

const KEY_PREFIX = "analysis";

/**
 * JSON with object keys sorted at every depth, so two objects holding the
 * same entries serialize identically. Keys whose value is undefined are
 * skipped, as JSON.stringify does.
 */
export function stableStringify(value: unknown): string {
  if (value === null || value === undefined) return "null";

  if (Array.isArray(value)) {
    return `[${value.map((entry) => stableStringify(entry)).join(",")}]`;
  }

  switch (typeof value) {
    case "string":
      return JSON.stringify(value);
    case "number":
      if (!Number.isFinite(value)) throw new Error("Non-finite number in stableStringify");
      return JSON.stringify(value);
    case "boolean":
      return value ? "true" : "false";
    case "object": {
      const entries = Object.entries(value)
        .filter(([, entry]) => entry !== undefined)
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
      return `{${entries.map(([key, entry]) => `${JSON.stringify(key)}:${stableStringify(entry)}`).join(",")}}`;
    }
    default:
      return "null";
  }
}

export function analysisPrefix(scope: SourceScope) {
  return `${KEY_PREFIX}:${scope}:`;
}

export function analysisFingerprint(scope: SourceScope, kind: AnalysisKind, inputs: unknown) {
  const digest = createHash("sha1").update(stableStringify(inputs)).digest("hex");
  return `${analysisPrefix(scope)}${kind}:${digest}`;
}
