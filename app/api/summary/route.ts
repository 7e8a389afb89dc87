/**
 * Route: GET /api/summary
 *
 * Summary statistics for every source type plus per-source load details
 * (version, load time, normalization warnings by code).
 */
import { NextResponse } from "next/server";
import { failureJson } from "@/lib/api/respond";
import { SOURCE_TYPES } from "@/lib/analysis/types";
import { getRuntime } from "@/lib/runtime";
import { summarizeWarnings } from "@/lib/warnings/catalog";

export const runtime = "nodejs";

export async function GET() {
  try {
    const { engine, datasets } = getRuntime();
    const current = await datasets.getDatasets();

    const sources = await Promise.all(
      SOURCE_TYPES.map(async (sourceType) => {
        const snapshot = current[sourceType];
        const result = await engine.analyze(current, { kind: "summary_stats", sourceType });
        return {
          sourceType,
          version: snapshot?.version ?? null,
          loadedAt: snapshot?.loadedAt ?? null,
          warnings: summarizeWarnings(snapshot?.warnings ?? []),
          stats: result.payload,
        };
      })
    );

    return NextResponse.json({ ok: true, sources });
  } catch (err) {
    return failureJson("GET /api/summary", err);
  }
}
