import test from "node:test";
import assert from "node:assert/strict";
import { buildForecast, clampForecastDays } from "./forecast";
import type { CanonicalRecord } from "../types";

function makeRecord(partial: Partial<CanonicalRecord>): CanonicalRecord {
  return {
    eventDate: partial.eventDate || "2025-04-07",
    jalaliDate: "",
    amount: partial.amount ?? 0,
    sourceType: partial.sourceType || "Payable",
    rowIndex: 0,
  };
}

const payable = [
  makeRecord({ eventDate: "2025-04-07", amount: -999 }),
  makeRecord({ eventDate: "2025-04-09", amount: -100 }),
  makeRecord({ eventDate: "2025-04-20", amount: -999 }),
];
const receivable = [
  makeRecord({ eventDate: "2025-04-08", amount: 50, sourceType: "Receivable" }),
  makeRecord({ eventDate: "2025-04-17", amount: 200, sourceType: "Receivable" }),
];

test("forecast builds a dense series over the window after the reference date", () => {
  const payload = buildForecast({
    payable,
    receivable,
    referenceDate: "2025-04-07",
    forecastDays: 10,
    startingPosition: 100,
  });

  assert.equal(payload.horizonDate, "2025-04-17");
  assert.equal(payload.daily.length, 10);
  assert.deepEqual(
    payload.daily.map((day) => day.position),
    [150, 50, 50, 50, 50, 50, 50, 50, 50, 250]
  );
  assert.deepEqual(payload.daily[0], {
    date: "2025-04-08",
    jalaliDate: "1404/01/19",
    inflow: 50,
    outflow: 0,
    net: 50,
    position: 150,
  });
  assert.equal(payload.minPosition, 50);
  assert.equal(payload.minPositionDate, "2025-04-09");
  assert.equal(payload.maxPosition, 250);
  assert.equal(payload.maxPositionDate, "2025-04-17");
  assert.equal(payload.totalIncoming, 250);
  assert.equal(payload.totalOutgoing, 100);
  assert.equal(payload.netForecast, 150);
  assert.deepEqual(payload.weekly, [
    { week: 1, start: "2025-04-08", end: "2025-04-14", inflow: 50, outflow: 100, net: -50, endPosition: 50 },
    { week: 2, start: "2025-04-15", end: "2025-04-17", inflow: 200, outflow: 0, net: 200, endPosition: 250 },
  ]);
});

test("a negative minimum is reported, not rejected", () => {
  const payload = buildForecast({
    payable: [makeRecord({ eventDate: "2025-04-08", amount: -500 })],
    receivable: [],
    referenceDate: "2025-04-07",
    forecastDays: 1,
    startingPosition: 0,
  });
  assert.equal(payload.minPosition, -500);
  assert.equal(payload.weekly.length, 1);
});

test("forecast days are clamped to 1..180", () => {
  assert.equal(clampForecastDays(-5), 1);
  assert.equal(clampForecastDays(0), 1);
  assert.equal(clampForecastDays(500), 180);
  assert.equal(clampForecastDays(30.9), 30);
});
