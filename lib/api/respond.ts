import { NextResponse } from "next/server";
import { DatasetReadError, InvalidParameterError } from "@/lib/errors";

export function errorJson(status: number, code: string, message: string) {
  return NextResponse.json(
    {
      ok: false,
      error: { code, message },
    },
    { status }
  );
}

/**
 * Map a thrown error to a response. Rejected parameters are the caller's
 * fault (400); anything else is logged under `label` and answered with 500.
 */
export function failureJson(label: string, err: unknown) {
  if (err instanceof InvalidParameterError) {
    return errorJson(400, err.code, err.message);
  }
  console.error(`${label} failed`, err);
  if (err instanceof DatasetReadError) {
    return errorJson(500, "IO_FAIL", err.message);
  }
  return errorJson(500, "INTERNAL", "Unexpected server error.");
}

export function isAuthorized(request: Request, apiToken: string | null) {
  if (!apiToken) return true;
  return request.headers.get("x-api-token") === apiToken;
}
