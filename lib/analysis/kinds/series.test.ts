import test from "node:test";
import assert from "node:assert/strict";
import { buildCumulative, buildDailyBreakdown } from "./series";
import { buildTopCounterparties, buildCustomerLoyalty } from "./counterparties";
import type { CanonicalRecord } from "../types";

function makeRecord(partial: Partial<CanonicalRecord>): CanonicalRecord {
  return {
    eventDate: partial.eventDate || "2025-04-07",
    jalaliDate: partial.jalaliDate || "1404/01/18",
    amount: partial.amount ?? 100,
    counterparty: partial.counterparty,
    sourceType: partial.sourceType || "Receivable",
    rowIndex: partial.rowIndex ?? 0,
  };
}

const records = [
  makeRecord({ eventDate: "2025-04-09", amount: 30, counterparty: "B" }),
  makeRecord({ eventDate: "2025-04-07", amount: 10, counterparty: "A" }),
  makeRecord({ eventDate: "2025-04-09", amount: 20, counterparty: "C" }),
  makeRecord({ eventDate: "2025-04-07", amount: -40, counterparty: "A" }),
];

test("daily breakdown groups by date ascending and omits empty dates", () => {
  assert.deepEqual(buildDailyBreakdown(records).days, [
    { date: "2025-04-07", jalaliDate: "1404/01/18", sum: -30, count: 2, mean: -15 },
    { date: "2025-04-09", jalaliDate: "1404/01/20", sum: 50, count: 2, mean: 25 },
  ]);
});

test("cumulative sums same-date records before accumulating", () => {
  const result = buildCumulative(records);
  assert.deepEqual(
    result.points.map((point) => [point.date, point.sum, point.cumulative]),
    [
      ["2025-04-07", -30, -30],
      ["2025-04-09", 50, 20],
    ]
  );
  assert.equal(result.totalSum, 20);
  assert.equal(result.totalMean, 5);
});

test("cumulative final value equals the plain sum of amounts", () => {
  const many = Array.from({ length: 40 }, (_, index) =>
    makeRecord({ eventDate: `2025-05-${String((index % 28) + 1).padStart(2, "0")}`, amount: index * 3 - 50 })
  );
  const total = many.reduce((sum, record) => sum + record.amount, 0);
  const points = buildCumulative(many).points;
  assert.equal(points[points.length - 1].cumulative, total);
});

test("empty input gives empty series", () => {
  assert.deepEqual(buildDailyBreakdown([]), { days: [] });
  assert.deepEqual(buildCumulative([]), { points: [], totalSum: 0, totalMean: 0 });
});

test("top-N returns the largest magnitudes in order", () => {
  const input = [
    makeRecord({ counterparty: "C", amount: 20 }),
    makeRecord({ counterparty: "A", amount: 50 }),
    makeRecord({ counterparty: "B", amount: 30 }),
  ];
  assert.deepEqual(
    buildTopCounterparties(input, 2).counterparties.map((row) => [row.counterparty, row.sum]),
    [
      ["A", 50],
      ["B", 30],
    ]
  );
});

test("top-N groups absent counterparties as unknown and breaks ties by first appearance", () => {
  const input = [
    makeRecord({ counterparty: "X", amount: -25 }),
    makeRecord({ counterparty: undefined, amount: 10 }),
    makeRecord({ counterparty: "Y", amount: 25 }),
    makeRecord({ counterparty: undefined, amount: 15 }),
  ];
  const result = buildTopCounterparties(input);
  assert.equal(result.topN, 10);
  assert.deepEqual(result.counterparties, [
    { counterparty: "X", sum: -25, count: 1, mean: -25 },
    { counterparty: "unknown", sum: 25, count: 2, mean: 12.5 },
    { counterparty: "Y", sum: 25, count: 1, mean: 25 },
  ]);
});

test("customer loyalty ranks by order count with last activity", () => {
  const input = [
    makeRecord({ counterparty: "A", amount: 100, eventDate: "2025-04-01" }),
    makeRecord({ counterparty: "B", amount: 50, eventDate: "2025-04-03" }),
    makeRecord({ counterparty: "B", amount: 70, eventDate: "2025-04-02" }),
  ];
  assert.deepEqual(buildCustomerLoyalty(input), {
    totalCustomers: 2,
    customers: [
      { counterparty: "B", totalValue: 120, orderCount: 2, averageValue: 60, lastActivity: "2025-04-03" },
      { counterparty: "A", totalValue: 100, orderCount: 1, averageValue: 100, lastActivity: "2025-04-01" },
    ],
  });
});
