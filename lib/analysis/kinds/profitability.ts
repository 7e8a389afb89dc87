import {
  byMonth,
  DEFAULT_TOP_N,
  groupByCounterparty,
  groupSorted,
  rankByMagnitude,
  sumAmounts,
  sumMagnitudes,
  type Records,
} from "@/lib/analysis/kinds/shared";
import type { ProfitabilityPayload } from "@/lib/analysis/types";

function marginPercent(profit: number, revenue: number) {
  return revenue === 0 ? 0 : (profit / revenue) * 100;
}

export function buildProfitability(params: { invoice: Records; payable: Records }): ProfitabilityPayload {
  const { invoice, payable } = params;
  const totalRevenue = sumAmounts(invoice);
  const totalCosts = sumMagnitudes(payable);
  const grossProfit = totalRevenue - totalCosts;

  // Discounted revenue replaces the gross figure only when the export carries it.
  const hasNetAmounts = invoice.some((record) => record.netAmount !== undefined);
  const netRevenue = hasNetAmounts
    ? invoice.reduce((sum, record) => sum + (record.netAmount ?? record.amount), 0)
    : totalRevenue;
  const netProfit = netRevenue - totalCosts;

  return {
    totalRevenue,
    netRevenue,
    totalTax: invoice.reduce((sum, record) => sum + (record.tax ?? 0), 0),
    totalCosts,
    grossProfit,
    netProfit,
    grossMargin: marginPercent(grossProfit, totalRevenue),
    netMargin: marginPercent(netProfit, netRevenue),
    topCustomers: rankByMagnitude(groupByCounterparty(invoice), DEFAULT_TOP_N),
    monthlyRevenue: groupSorted(invoice, byMonth).map(([month, bucket]) => ({
      month,
      revenue: sumAmounts(bucket),
      invoiceCount: bucket.length,
    })),
  };
}
