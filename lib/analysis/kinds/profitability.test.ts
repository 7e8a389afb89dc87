import test from "node:test";
import assert from "node:assert/strict";
import { buildProfitability } from "./profitability";
import { buildSummaryStats } from "./summary";
import type { CanonicalRecord } from "../types";

function makeRecord(partial: Partial<CanonicalRecord>): CanonicalRecord {
  return {
    eventDate: partial.eventDate || "2025-04-07",
    jalaliDate: partial.jalaliDate || "",
    amount: partial.amount ?? 0,
    counterparty: partial.counterparty,
    sourceType: partial.sourceType || "Invoice",
    rowIndex: partial.rowIndex ?? 0,
    reference: partial.reference,
    netAmount: partial.netAmount,
    tax: partial.tax,
  };
}

test("invoices of 1000 against payables of -400 give a 60% gross margin", () => {
  const payload = buildProfitability({
    invoice: [makeRecord({ amount: 600, counterparty: "A" }), makeRecord({ amount: 400, counterparty: "B" })],
    payable: [makeRecord({ amount: -150, sourceType: "Payable" }), makeRecord({ amount: -250, sourceType: "Payable" })],
  });

  assert.equal(payload.totalRevenue, 1000);
  assert.equal(payload.totalCosts, 400);
  assert.equal(payload.grossProfit, 600);
  assert.equal(payload.grossMargin, 60);
  assert.equal(payload.netRevenue, 1000);
  assert.equal(payload.netProfit, 600);
  assert.equal(payload.netMargin, 60);
});

test("discounted revenue drives the net figures when present", () => {
  const payload = buildProfitability({
    invoice: [
      makeRecord({ amount: 1000, netAmount: 800, tax: 90, eventDate: "2025-04-07", counterparty: "A" }),
      makeRecord({ amount: 200, eventDate: "2025-05-02", counterparty: "B" }),
      makeRecord({ amount: 300, netAmount: 300, tax: 27, eventDate: "2025-05-20", counterparty: "A" }),
    ],
    payable: [makeRecord({ amount: -500, sourceType: "Payable" })],
  });

  assert.equal(payload.totalRevenue, 1500);
  assert.equal(payload.netRevenue, 1300);
  assert.equal(payload.netProfit, 800);
  assert.equal(payload.totalTax, 117);
  assert.equal(payload.grossMargin, (1000 / 1500) * 100);
  assert.equal(payload.netMargin, (800 / 1300) * 100);
  assert.deepEqual(
    payload.topCustomers.map((row) => [row.counterparty, row.sum, row.count]),
    [
      ["A", 1300, 2],
      ["B", 200, 1],
    ]
  );
  assert.deepEqual(payload.monthlyRevenue, [
    { month: "2025-04", revenue: 1000, invoiceCount: 1 },
    { month: "2025-05", revenue: 500, invoiceCount: 2 },
  ]);
});

test("zero revenue never divides by zero", () => {
  const payload = buildProfitability({ invoice: [], payable: [makeRecord({ amount: -50, sourceType: "Payable" })] });
  assert.equal(payload.grossProfit, -50);
  assert.equal(payload.grossMargin, 0);
  assert.equal(payload.netMargin, 0);
});

test("summary statistics over records and over nothing", () => {
  const stats = buildSummaryStats([
    makeRecord({ amount: 2, eventDate: "2025-04-09", counterparty: "A" }),
    makeRecord({ amount: 4, eventDate: "2025-04-01", reference: "OC-1" }),
    makeRecord({ amount: 6, eventDate: "2025-04-05", counterparty: "B", tax: 1 }),
  ]);
  assert.deepEqual(stats, {
    rowCount: 3,
    nullCounts: { counterparty: 1, reference: 2, netAmount: 3, tax: 2 },
    amount: { sum: 12, mean: 4, std: 2, min: 2, max: 6 },
    dateRange: { first: "2025-04-01", last: "2025-04-09" },
  });

  assert.deepEqual(buildSummaryStats([]), {
    rowCount: 0,
    nullCounts: { counterparty: 0, reference: 0, netAmount: 0, tax: 0 },
    amount: { sum: 0, mean: null, std: null, min: null, max: null },
    dateRange: { first: null, last: null },
  });

  assert.equal(buildSummaryStats([makeRecord({ amount: 5 })]).amount.std, null);
});
