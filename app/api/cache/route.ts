import { NextResponse } from "next/server";
import { failureJson } from "@/lib/api/respond";
import { getRuntime } from "@/lib/runtime";

export const runtime = "nodejs";

// Observability only; reports which store answers cache calls right now.
export async function GET() {
  try {
    const info = await getRuntime().cache.backendInfo();
    return NextResponse.json({ ok: true, cache: info });
  } catch (err) {
    return failureJson("GET /api/cache", err);
  }
}
