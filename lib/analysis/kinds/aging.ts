import { diffDays, toJalali } from "@/lib/calendar/jalali";
import type { Records } from "@/lib/analysis/kinds/shared";
import type { AccountsAgingPayload, AgingBucket, AgingSide } from "@/lib/analysis/types";

export function agingBucketFor(daysOverdue: number): AgingBucket {
  if (daysOverdue <= 0) return "current";
  if (daysOverdue <= 30) return "1-30";
  if (daysOverdue <= 60) return "31-60";
  if (daysOverdue <= 90) return "61-90";
  return "90+";
}

/**
 * Buckets hold magnitudes, so a payable side reads the same way as a
 * receivable side. Records due after the reference date only count toward
 * `notYetDue`.
 */
export function ageRecords(records: Records, referenceDate: string): AgingSide {
  const buckets: Record<AgingBucket, number> = {
    current: 0,
    "1-30": 0,
    "31-60": 0,
    "61-90": 0,
    "90+": 0,
  };
  let notYetDue = 0;
  let count = 0;

  for (const record of records) {
    const magnitude = Math.abs(record.amount);
    if (record.eventDate > referenceDate) {
      notYetDue += magnitude;
      continue;
    }
    buckets[agingBucketFor(diffDays(record.eventDate, referenceDate))] += magnitude;
    count += 1;
  }

  const total = Object.values(buckets).reduce((sum, value) => sum + value, 0);
  return {
    total,
    totalOverdue: total - buckets.current,
    notYetDue,
    count,
    buckets,
  };
}

export function buildAccountsAging(params: {
  payable: Records;
  receivable: Records;
  referenceDate: string;
}): AccountsAgingPayload {
  const payables = ageRecords(params.payable, params.referenceDate);
  const receivables = ageRecords(params.receivable, params.referenceDate);
  return {
    referenceDate: params.referenceDate,
    referenceJalaliDate: toJalali(params.referenceDate),
    payables,
    receivables,
    netPosition: receivables.total - payables.total,
  };
}
