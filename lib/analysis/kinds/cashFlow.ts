import { toJalali } from "@/lib/calendar/jalali";
import { byEventDate, groupSorted, type Records } from "@/lib/analysis/kinds/shared";
import type { CashFlowPayload, SourceType } from "@/lib/analysis/types";

export type CashFlowSources = {
  payable: Records;
  receivable: Records;
  invoice: Records;
};

const CASH_FLOW_SOURCES = ["Payable", "Receivable", "Invoice"] as const satisfies readonly SourceType[];

/** Net of every record due on or before the reference date. */
export function positionAt(records: Records, referenceDate: string) {
  return records
    .filter((record) => record.eventDate <= referenceDate)
    .reduce((sum, record) => sum + record.amount, 0);
}

export function buildCashFlow(params: CashFlowSources & { referenceDate: string }): CashFlowPayload {
  const { referenceDate } = params;
  const bySource: Record<(typeof CASH_FLOW_SOURCES)[number], Records> = {
    Payable: params.payable,
    Receivable: params.receivable,
    Invoice: params.invoice,
  };
  const timeline = [...params.payable, ...params.receivable, ...params.invoice];

  const totalIncome = timeline
    .filter((record) => record.amount > 0)
    .reduce((sum, record) => sum + record.amount, 0);
  const totalOutcome = timeline
    .filter((record) => record.amount < 0)
    .reduce((sum, record) => sum + Math.abs(record.amount), 0);

  // Running totals cover past and future dates alike.
  let cumulative = 0;
  const dailyFlow = groupSorted(timeline, byEventDate).map(([date, bucket]) => {
    let income = 0;
    let outcome = 0;
    for (const record of bucket) {
      if (record.amount > 0) income += record.amount;
      if (record.amount < 0) outcome += Math.abs(record.amount);
    }
    const net = income - outcome;
    cumulative += net;
    return { date, jalaliDate: toJalali(date), income, outcome, net, cumulative };
  });

  return {
    referenceDate,
    referenceJalaliDate: toJalali(referenceDate),
    totalIncome,
    totalOutcome,
    netCashFlow: totalIncome - totalOutcome,
    currentPosition: positionAt(timeline, referenceDate),
    dailyFlow,
    typeSummary: CASH_FLOW_SOURCES.map((sourceType) => ({
      sourceType,
      count: bySource[sourceType].length,
      sum: bySource[sourceType].reduce((sum, record) => sum + record.amount, 0),
    })),
  };
}
