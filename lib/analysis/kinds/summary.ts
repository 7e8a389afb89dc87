import { sumAmounts, type Records } from "@/lib/analysis/kinds/shared";
import type { SummaryStatsPayload } from "@/lib/analysis/types";

// Sample standard deviation (n - 1); undefined below two values.
function sampleStd(values: number[], mean: number) {
  if (values.length < 2) return null;
  const squares = values.reduce((sum, value) => sum + (value - mean) ** 2, 0);
  return Math.sqrt(squares / (values.length - 1));
}

export function buildSummaryStats(records: Records): SummaryStatsPayload {
  const amounts = records.map((record) => record.amount);
  const dates = records.map((record) => record.eventDate).sort();
  const sum = sumAmounts(records);
  const mean = amounts.length > 0 ? sum / amounts.length : null;

  return {
    rowCount: records.length,
    nullCounts: {
      counterparty: records.filter((record) => record.counterparty === undefined).length,
      reference: records.filter((record) => record.reference === undefined).length,
      netAmount: records.filter((record) => record.netAmount === undefined).length,
      tax: records.filter((record) => record.tax === undefined).length,
    },
    amount: {
      sum,
      mean,
      std: mean === null ? null : sampleStd(amounts, mean),
      min: amounts.length > 0 ? amounts.reduce((a, b) => Math.min(a, b)) : null,
      max: amounts.length > 0 ? amounts.reduce((a, b) => Math.max(a, b)) : null,
    },
    dateRange: {
      first: dates.length > 0 ? dates[0] : null,
      last: dates.length > 0 ? dates[dates.length - 1] : null,
    },
  };
}
