import test from "node:test";
import assert from "node:assert/strict";
import { parseAnalysisKind, parseAnalysisRequest, parseSourceScope } from "./request";
import { resolveForecastDays, resolveReferenceDate, resolveTopN } from "./params";
import { InvalidParameterError } from "../errors";

test("source types match case-insensitively, with plural and legacy spellings", () => {
  assert.equal(parseSourceScope("payable"), "Payable");
  assert.equal(parseSourceScope("INVOICES"), "Invoice");
  assert.equal(parseSourceScope("performa"), "Proforma");
  assert.equal(parseSourceScope("All"), "all");
  assert.throws(() => parseSourceScope("constructor"), InvalidParameterError);
});

test("kinds accept snake and kebab case", () => {
  assert.equal(parseAnalysisKind("cash-flow"), "cash_flow");
  assert.equal(parseAnalysisKind("Top_Counterparties"), "top_counterparties");
  assert.throws(
    () => parseAnalysisKind("burn_rate"),
    (err: unknown) => err instanceof InvalidParameterError && err.parameter === "kind"
  );
});

test("query parameters become typed request fields", () => {
  assert.deepEqual(parseAnalysisRequest("receivable", "top-counterparties", new URLSearchParams("topN=3")), {
    kind: "top_counterparties",
    sourceType: "Receivable",
    topN: 3,
  });
  assert.deepEqual(
    parseAnalysisRequest("all", "forecast", new URLSearchParams("forecastDays=30&referenceDate=2025-04-07")),
    { kind: "forecast", forecastDays: 30, referenceDate: "2025-04-07", startingPosition: undefined }
  );
  assert.deepEqual(parseAnalysisRequest("payable", "profitability", new URLSearchParams()), {
    kind: "profitability",
  });
});

test("non-numeric query values are rejected, blank ones ignored", () => {
  assert.throws(
    () => parseAnalysisRequest("all", "forecast", new URLSearchParams("forecastDays=soon")),
    (err: unknown) => err instanceof InvalidParameterError && err.message === 'forecastDays must be a number, got "soon"'
  );
  assert.deepEqual(parseAnalysisRequest("all", "proforma-conversion", new URLSearchParams("onTimeDays=")), {
    kind: "proforma_conversion",
    onTimeDays: undefined,
  });
});

test("parameter defaults", () => {
  assert.equal(resolveTopN(undefined), 10);
  assert.equal(resolveForecastDays(undefined), 90);
  assert.equal(resolveForecastDays(-5), 1);
  assert.equal(resolveReferenceDate(undefined, () => "2025-04-07"), "2025-04-07");
  assert.throws(() => resolveTopN(2.5), InvalidParameterError);
});
