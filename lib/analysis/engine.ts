import { toIsoDate } from "@/lib/calendar/jalali";
import { analysisFingerprint } from "@/lib/cache/fingerprint";
import type { CacheManager } from "@/lib/cache/manager";
import { InvalidParameterError } from "@/lib/errors";
import { buildAccountsAging } from "@/lib/analysis/kinds/aging";
import { buildCashFlow, positionAt } from "@/lib/analysis/kinds/cashFlow";
import { buildCustomerLoyalty, buildTopCounterparties } from "@/lib/analysis/kinds/counterparties";
import { buildForecast } from "@/lib/analysis/kinds/forecast";
import {
  buildIntegratedTrend,
  buildManagementReport,
  buildProformaConversion,
} from "@/lib/analysis/kinds/pipeline";
import { buildProfitability } from "@/lib/analysis/kinds/profitability";
import { buildCumulative, buildDailyBreakdown } from "@/lib/analysis/kinds/series";
import type { Records } from "@/lib/analysis/kinds/shared";
import { buildSummaryStats } from "@/lib/analysis/kinds/summary";
import {
  resolveForecastDays,
  resolveOnTimeDays,
  resolveReferenceDate,
  resolveStartingPosition,
  resolveTopN,
} from "@/lib/analysis/params";
import {
  ANALYSIS_KINDS,
  SOURCE_TYPES,
  type AnalysisRequest,
  type AnalysisResult,
  type ComputedAnalysis,
  type Datasets,
  type SourceScope,
  type SourceType,
} from "@/lib/analysis/types";

export type AnalysisEngineOptions = {
  cache: CacheManager;
  ttlSeconds?: number;
  // Clock for "today" and computedAt.
  now?: () => Date;
};

export type AnalysisEngine = {
  analyze(datasets: Datasets, request: AnalysisRequest): Promise<AnalysisResult>;
};

type ReadSource = (sourceType: SourceType) => Records;

type Plan = {
  scope: SourceScope;
  // Parameters after defaults and clamping; part of the fingerprint.
  params: Record<string, string | number | null>;
  sources: readonly SourceType[];
  compute: (pick: ReadSource) => ComputedAnalysis;
};

const CASH_SOURCES = ["Payable", "Receivable", "Invoice"] as const;
const ALL_SOURCES = SOURCE_TYPES;

function scopeSources(scope: SourceScope): readonly SourceType[] {
  if (scope === "all") return ALL_SOURCES;
  if (!SOURCE_TYPES.includes(scope)) {
    throw new InvalidParameterError("sourceType", `Unknown source type "${scope}"`);
  }
  return [scope];
}

function merged(pick: ReadSource, sources: readonly SourceType[]) {
  return sources.flatMap((sourceType) => pick(sourceType));
}

function unknownKind(request: never): never {
  const value: unknown = request;
  const kind = typeof value === "object" && value !== null && "kind" in value ? String(value.kind) : "";
  throw new InvalidParameterError(
    "kind",
    `Unknown analysis kind "${kind}". Expected one of: ${ANALYSIS_KINDS.join(", ")}`
  );
}

function planFor(request: AnalysisRequest, today: () => string): Plan {
  switch (request.kind) {
    case "daily_breakdown": {
      const sources = scopeSources(request.sourceType);
      return {
        scope: request.sourceType,
        params: {},
        sources,
        compute: (pick) => ({ kind: "daily_breakdown", payload: buildDailyBreakdown(merged(pick, sources)) }),
      };
    }
    case "cumulative": {
      const sources = scopeSources(request.sourceType);
      return {
        scope: request.sourceType,
        params: {},
        sources,
        compute: (pick) => ({ kind: "cumulative", payload: buildCumulative(merged(pick, sources)) }),
      };
    }
    case "top_counterparties": {
      const sources = scopeSources(request.sourceType);
      const topN = resolveTopN(request.topN);
      return {
        scope: request.sourceType,
        params: { topN },
        sources,
        compute: (pick) => ({
          kind: "top_counterparties",
          payload: buildTopCounterparties(merged(pick, sources), topN),
        }),
      };
    }
    case "summary_stats": {
      const sources = scopeSources(request.sourceType);
      return {
        scope: request.sourceType,
        params: {},
        sources,
        compute: (pick) => ({ kind: "summary_stats", payload: buildSummaryStats(merged(pick, sources)) }),
      };
    }
    case "customer_loyalty": {
      const sources = scopeSources(request.sourceType);
      return {
        scope: request.sourceType,
        params: {},
        sources,
        compute: (pick) => ({ kind: "customer_loyalty", payload: buildCustomerLoyalty(merged(pick, sources)) }),
      };
    }
    case "cash_flow": {
      const referenceDate = resolveReferenceDate(request.referenceDate, today);
      return {
        scope: "all",
        params: { referenceDate },
        sources: CASH_SOURCES,
        compute: (pick) => ({
          kind: "cash_flow",
          payload: buildCashFlow({
            payable: pick("Payable"),
            receivable: pick("Receivable"),
            invoice: pick("Invoice"),
            referenceDate,
          }),
        }),
      };
    }
    case "accounts_aging": {
      const referenceDate = resolveReferenceDate(request.referenceDate, today);
      return {
        scope: "all",
        params: { referenceDate },
        sources: ["Payable", "Receivable"],
        compute: (pick) => ({
          kind: "accounts_aging",
          payload: buildAccountsAging({
            payable: pick("Payable"),
            receivable: pick("Receivable"),
            referenceDate,
          }),
        }),
      };
    }
    case "profitability":
      return {
        scope: "all",
        params: {},
        sources: ["Invoice", "Payable"],
        compute: (pick) => ({
          kind: "profitability",
          payload: buildProfitability({ invoice: pick("Invoice"), payable: pick("Payable") }),
        }),
      };
    case "forecast": {
      const forecastDays = resolveForecastDays(request.forecastDays);
      const referenceDate = resolveReferenceDate(request.referenceDate, today);
      const startingPosition = resolveStartingPosition(request.startingPosition);
      return {
        scope: "all",
        params: { forecastDays, referenceDate, startingPosition: startingPosition ?? null },
        sources: CASH_SOURCES,
        compute: (pick) => ({
          kind: "forecast",
          payload: buildForecast({
            payable: pick("Payable"),
            receivable: pick("Receivable"),
            referenceDate,
            forecastDays,
            startingPosition:
              startingPosition ?? positionAt(merged(pick, CASH_SOURCES), referenceDate),
          }),
        }),
      };
    }
    case "proforma_conversion": {
      const onTimeDays = resolveOnTimeDays(request.onTimeDays);
      return {
        scope: "all",
        params: { onTimeDays },
        sources: ["Proforma", "Invoice"],
        compute: (pick) => ({
          kind: "proforma_conversion",
          payload: buildProformaConversion({
            proforma: pick("Proforma"),
            invoice: pick("Invoice"),
            onTimeDays,
          }),
        }),
      };
    }
    case "management_report":
      return {
        scope: "all",
        params: {},
        sources: ALL_SOURCES,
        compute: (pick) => ({
          kind: "management_report",
          payload: buildManagementReport({
            invoice: pick("Invoice"),
            proforma: pick("Proforma"),
            payable: pick("Payable"),
            receivable: pick("Receivable"),
          }),
        }),
      };
    case "integrated_trend":
      return {
        scope: "all",
        params: {},
        sources: ALL_SOURCES,
        compute: (pick) => ({
          kind: "integrated_trend",
          payload: buildIntegratedTrend({
            invoice: pick("Invoice"),
            proforma: pick("Proforma"),
            payable: pick("Payable"),
            receivable: pick("Receivable"),
          }),
        }),
      };
    default:
      return unknownKind(request);
  }
}

function isCachedResult(value: unknown, fingerprint: string): value is AnalysisResult {
  return (
    typeof value === "object" &&
    value !== null &&
    "fingerprint" in value &&
    value.fingerprint === fingerprint &&
    "payload" in value &&
    typeof value.payload === "object" &&
    value.payload !== null
  );
}

/**
 * Engine over an injected cache. `analyze` is a pure function of its inputs
 * apart from the cache; concurrent calls for one fingerprint share a single
 * computation.
 */
export function createAnalysisEngine(options: AnalysisEngineOptions): AnalysisEngine {
  const { cache } = options;
  const now = options.now || (() => new Date());
  const ttlSeconds = options.ttlSeconds;
  const inFlight = new Map<string, Promise<AnalysisResult>>();

  async function computeAndStore(datasets: Datasets, plan: Plan, fingerprint: string): Promise<AnalysisResult> {
    const cached = await cache.get(fingerprint);
    if (cached.hit && isCachedResult(cached.value, fingerprint)) {
      return cached.value;
    }

    const pick: ReadSource = (sourceType) => datasets[sourceType]?.records || [];
    const result: AnalysisResult = {
      ...plan.compute(pick),
      sourceType: plan.scope,
      computedAt: now().toISOString(),
      fingerprint,
      recordCount: plan.sources.reduce((count, sourceType) => count + pick(sourceType).length, 0),
    };
    await cache.set(fingerprint, result, ttlSeconds);
    // Callers sharing an in-flight computation all get this one object.
    Object.freeze(result.payload);
    return Object.freeze(result);
  }

  async function analyze(datasets: Datasets, request: AnalysisRequest) {
    // "Today" is read once so every part of one call agrees on it.
    let today: string | null = null;
    const plan = planFor(request, () => (today ??= toIsoDate(now())));
    const versions = Object.fromEntries(
      plan.sources.map((sourceType) => [sourceType, datasets[sourceType]?.version ?? null])
    );
    const fingerprint = analysisFingerprint(plan.scope, request.kind, { params: plan.params, versions });

    const pending = inFlight.get(fingerprint);
    if (pending) return pending;

    const work = computeAndStore(datasets, plan, fingerprint).finally(() => {
      inFlight.delete(fingerprint);
    });
    inFlight.set(fingerprint, work);
    return work;
  }

  return { analyze };
}
