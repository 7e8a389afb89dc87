/**
 * Route: POST /api/datasets/reload?sourceType=
 *
 * Re-reads the ingestion layer's files (one source type, or all when the
 * parameter is absent) and drops cached analyses that depend on them.
 * Guarded by x-api-token when API_TOKEN is set.
 */
import { NextResponse } from "next/server";
import { errorJson, failureJson, isAuthorized } from "@/lib/api/respond";
import { parseSourceScope } from "@/lib/analysis/request";
import { getRuntime } from "@/lib/runtime";
import { summarizeWarnings } from "@/lib/warnings/catalog";

export const runtime = "nodejs";

export async function POST(request: Request) {
  const { config, datasets } = getRuntime();
  if (!isAuthorized(request, config.apiToken)) {
    return errorJson(401, "UNAUTHORIZED", "Missing or wrong x-api-token.");
  }

  const { searchParams } = new URL(request.url);
  const raw = (searchParams.get("sourceType") || "").trim();

  try {
    const scope = raw ? parseSourceScope(raw) : "all";
    const outcome = await datasets.reload(scope === "all" ? undefined : scope);
    return NextResponse.json({
      ok: true,
      reloaded: outcome.reloaded,
      invalidated: outcome.invalidated,
      sources: outcome.snapshots.map((snapshot) => ({
        sourceType: snapshot.sourceType,
        version: snapshot.version,
        recordCount: snapshot.records.length,
        warnings: summarizeWarnings(snapshot.warnings),
      })),
    });
  } catch (err) {
    return failureJson("POST /api/datasets/reload", err);
  }
}
