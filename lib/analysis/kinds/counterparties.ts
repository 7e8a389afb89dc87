import {
  DEFAULT_TOP_N,
  UNKNOWN_COUNTERPARTY,
  groupByCounterparty,
  rankByMagnitude,
  type Records,
} from "@/lib/analysis/kinds/shared";
import type { CustomerLoyaltyPayload, TopCounterpartiesPayload } from "@/lib/analysis/types";

export function buildTopCounterparties(records: Records, topN = DEFAULT_TOP_N): TopCounterpartiesPayload {
  return {
    topN,
    counterparties: rankByMagnitude(groupByCounterparty(records), topN),
  };
}

/**
 * Purchase frequency per counterparty, most frequent first. Counterparties
 * with the same order count keep first-seen order.
 */
export function buildCustomerLoyalty(records: Records): CustomerLoyaltyPayload {
  const lastActivity = new Map<string, string>();
  for (const record of records) {
    const name = record.counterparty || UNKNOWN_COUNTERPARTY;
    const seen = lastActivity.get(name);
    if (!seen || record.eventDate > seen) lastActivity.set(name, record.eventDate);
  }

  const customers = groupByCounterparty(records)
    .map((row) => ({
      counterparty: row.counterparty,
      totalValue: row.sum,
      orderCount: row.count,
      averageValue: row.mean,
      lastActivity: lastActivity.get(row.counterparty) || "",
    }))
    .sort((a, b) => b.orderCount - a.orderCount);

  return { totalCustomers: customers.length, customers };
}
