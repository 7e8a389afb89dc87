import { monthKey } from "@/lib/calendar/jalali";
import type { CanonicalRecord, CounterpartyTotal } from "@/lib/analysis/types";

export const UNKNOWN_COUNTERPARTY = "unknown";
export const DEFAULT_TOP_N = 10;

export type Records = readonly CanonicalRecord[];

export function sumAmounts(records: Records) {
  return records.reduce((sum, record) => sum + record.amount, 0);
}

export function sumMagnitudes(records: Records) {
  return records.reduce((sum, record) => sum + Math.abs(record.amount), 0);
}

/** Per-counterparty totals in first-seen order. Absent names share the "unknown" group. */
export function groupByCounterparty(records: Records): CounterpartyTotal[] {
  const byName = new Map<string, { sum: number; count: number }>();
  for (const record of records) {
    const name = record.counterparty || UNKNOWN_COUNTERPARTY;
    const current = byName.get(name) || { sum: 0, count: 0 };
    current.sum += record.amount;
    current.count += 1;
    byName.set(name, current);
  }
  return [...byName.entries()].map(([counterparty, value]) => ({
    counterparty,
    sum: value.sum,
    count: value.count,
    mean: value.sum / value.count,
  }));
}

// Array#sort is stable, so equal magnitudes keep first-seen order.
export function rankByMagnitude(rows: CounterpartyTotal[], limit: number) {
  return [...rows].sort((a, b) => Math.abs(b.sum) - Math.abs(a.sum)).slice(0, limit);
}

/** Buckets keyed by `key(record)`, returned ascending by key. */
export function groupSorted(records: Records, key: (record: CanonicalRecord) => string) {
  const groups = new Map<string, CanonicalRecord[]>();
  for (const record of records) {
    const k = key(record);
    const bucket = groups.get(k) || [];
    bucket.push(record);
    groups.set(k, bucket);
  }
  return [...groups.entries()].sort(([a], [b]) => a.localeCompare(b));
}

export function byEventDate(record: CanonicalRecord) {
  return record.eventDate;
}

export function byMonth(record: CanonicalRecord) {
  return monthKey(record.eventDate);
}

export function ratio(part: number, whole: number) {
  return whole === 0 ? 0 : part / whole;
}
