import { diffDays } from "@/lib/calendar/jalali";
import {
  byMonth,
  groupSorted,
  ratio,
  sumAmounts,
  sumMagnitudes,
  type Records,
} from "@/lib/analysis/kinds/shared";
import type {
  IntegratedTrendPayload,
  ManagementReportPayload,
  ProformaConversionPayload,
} from "@/lib/analysis/types";

export const DEFAULT_ON_TIME_DAYS = 7;

/**
 * Proformas joined to invoices on the order reference. A proforma counts as
 * converted when an invoice carries its reference; the earliest such invoice
 * is used. Rates are fractions of all proformas.
 */
export function buildProformaConversion(params: {
  proforma: Records;
  invoice: Records;
  onTimeDays: number;
}): ProformaConversionPayload {
  const { onTimeDays } = params;
  const firstInvoiceDate = new Map<string, string>();
  for (const record of params.invoice) {
    if (!record.reference) continue;
    const seen = firstInvoiceDate.get(record.reference);
    if (!seen || record.eventDate < seen) firstInvoiceDate.set(record.reference, record.eventDate);
  }

  const details = params.proforma.map((record) => {
    const invoiceDate = record.reference ? firstInvoiceDate.get(record.reference) ?? null : null;
    const gapDays = invoiceDate === null ? null : diffDays(record.eventDate, invoiceDate);
    return {
      reference: record.reference ?? null,
      counterparty: record.counterparty ?? null,
      proformaDate: record.eventDate,
      invoiceDate,
      gapDays,
      converted: invoiceDate !== null,
      onTime: gapDays !== null && gapDays <= onTimeDays,
    };
  });

  const converted = details.filter((row) => row.converted);
  const totalOnTime = details.filter((row) => row.onTime).length;
  const gapTotal = converted.reduce((sum, row) => sum + (row.gapDays ?? 0), 0);

  return {
    onTimeDays,
    totalProforma: details.length,
    totalConverted: converted.length,
    totalOnTime,
    conversionRate: ratio(converted.length, details.length),
    onTimeRate: ratio(totalOnTime, details.length),
    averageGapDays: converted.length > 0 ? gapTotal / converted.length : null,
    details,
  };
}

export function buildManagementReport(params: {
  invoice: Records;
  proforma: Records;
  payable: Records;
  receivable: Records;
}): ManagementReportPayload {
  const totalSales = sumAmounts(params.invoice);
  const totalPayable = sumMagnitudes(params.payable);
  return {
    totalSales,
    totalPayable,
    totalReceivable: sumAmounts(params.receivable),
    proformaCount: params.proforma.length,
    invoiceCount: params.invoice.length,
    conversionRate: ratio(params.invoice.length, params.proforma.length),
    netPosition: totalSales - totalPayable,
  };
}

/** Monthly sales, pipeline and cheque flows side by side, for every month any source touches. */
export function buildIntegratedTrend(params: {
  invoice: Records;
  proforma: Records;
  payable: Records;
  receivable: Records;
}): IntegratedTrendPayload {
  const monthly = (records: Records) =>
    new Map(groupSorted(records, byMonth).map(([month, bucket]) => [month, bucket]));
  const invoices = monthly(params.invoice);
  const proforma = monthly(params.proforma);
  const payable = monthly(params.payable);
  const receivable = monthly(params.receivable);

  const allMonths = [
    ...new Set([...invoices.keys(), ...proforma.keys(), ...payable.keys(), ...receivable.keys()]),
  ].sort();

  let cumulativeCash = 0;
  const months = allMonths.map((month) => {
    const paid = sumMagnitudes(payable.get(month) || []);
    const received = sumAmounts(receivable.get(month) || []);
    const netCashFlow = received - paid;
    cumulativeCash += netCashFlow;
    return {
      month,
      invoices: sumAmounts(invoices.get(month) || []),
      proforma: sumAmounts(proforma.get(month) || []),
      payable: paid,
      receivable: received,
      netCashFlow,
      cumulativeCash,
    };
  });

  return { months };
}
