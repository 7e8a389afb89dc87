import { InvalidParameterError } from "@/lib/errors";
import {
  ANALYSIS_KINDS,
  type AnalysisKind,
  type AnalysisRequest,
  type SourceScope,
} from "@/lib/analysis/types";

// Lower-cased URL segment to scope. Plural and legacy spellings of the
// ingestion layer's file names are accepted too.
const SOURCE_ALIASES = new Map<string, SourceScope>([
  ["all", "all"],
  ["payable", "Payable"],
  ["payables", "Payable"],
  ["receivable", "Receivable"],
  ["receivables", "Receivable"],
  ["invoice", "Invoice"],
  ["invoices", "Invoice"],
  ["proforma", "Proforma"],
  ["performa", "Proforma"],
]);

function isAnalysisKind(value: string): value is AnalysisKind {
  return ANALYSIS_KINDS.some((kind) => kind === value);
}

export function parseSourceScope(raw: string): SourceScope {
  const scope = SOURCE_ALIASES.get(raw.trim().toLowerCase());
  if (!scope) {
    throw new InvalidParameterError("sourceType", `Unknown source type "${raw}"`);
  }
  return scope;
}

export function parseAnalysisKind(raw: string): AnalysisKind {
  const kind = raw.trim().toLowerCase().replace(/-/g, "_");
  if (!isAnalysisKind(kind)) {
    throw new InvalidParameterError(
      "kind",
      `Unknown analysis kind "${raw}". Expected one of: ${ANALYSIS_KINDS.join(", ")}`
    );
  }
  return kind;
}

function numberParam(searchParams: URLSearchParams, name: string) {
  const raw = searchParams.get(name);
  if (raw === null || raw.trim() === "") return undefined;
  const value = Number(raw.trim());
  if (!Number.isFinite(value)) {
    throw new InvalidParameterError(name, `${name} must be a number, got "${raw}"`);
  }
  return value;
}

function stringParam(searchParams: URLSearchParams, name: string) {
  const raw = searchParams.get(name);
  return raw === null || raw.trim() === "" ? undefined : raw.trim();
}

/**
 * Build a typed request from URL parts. Only syntax is checked here; ranges
 * and defaults are the engine's business.
 */
export function parseAnalysisRequest(
  sourceTypeRaw: string,
  kindRaw: string,
  searchParams: URLSearchParams
): AnalysisRequest {
  const sourceType = parseSourceScope(sourceTypeRaw);
  const kind = parseAnalysisKind(kindRaw);

  switch (kind) {
    case "daily_breakdown":
    case "cumulative":
    case "summary_stats":
    case "customer_loyalty":
      return { kind, sourceType };
    case "top_counterparties":
      return { kind, sourceType, topN: numberParam(searchParams, "topN") };
    case "cash_flow":
    case "accounts_aging":
      return { kind, referenceDate: stringParam(searchParams, "referenceDate") };
    case "forecast":
      return {
        kind,
        forecastDays: numberParam(searchParams, "forecastDays"),
        referenceDate: stringParam(searchParams, "referenceDate"),
        startingPosition: numberParam(searchParams, "startingPosition"),
      };
    case "proforma_conversion":
      return { kind, onTimeDays: numberParam(searchParams, "onTimeDays") };
    case "profitability":
    case "management_report":
    case "integrated_trend":
      return { kind };
  }
}
