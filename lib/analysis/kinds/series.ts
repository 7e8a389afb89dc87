import { toJalali } from "@/lib/calendar/jalali";
import { byEventDate, groupSorted, sumAmounts, type Records } from "@/lib/analysis/kinds/shared";
import type { CumulativePayload, DailyBreakdownPayload, DailyRow } from "@/lib/analysis/types";

function dailyRows(records: Records): DailyRow[] {
  return groupSorted(records, byEventDate).map(([date, bucket]) => {
    const sum = sumAmounts(bucket);
    return {
      date,
      jalaliDate: toJalali(date),
      sum,
      count: bucket.length,
      mean: sum / bucket.length,
    };
  });
}

/** Dates without records are omitted, not zero-filled. */
export function buildDailyBreakdown(records: Records): DailyBreakdownPayload {
  return { days: dailyRows(records) };
}

export function buildCumulative(records: Records): CumulativePayload {
  let running = 0;
  const points = dailyRows(records).map((row) => {
    running += row.sum;
    return { date: row.date, jalaliDate: row.jalaliDate, sum: row.sum, cumulative: running };
  });

  return {
    points,
    totalSum: running,
    totalMean: records.length > 0 ? running / records.length : 0,
  };
}
