import columnsConfig from "@/config/columns.json";
import type { SourceType } from "@/lib/analysis/types";

/**
 * Spreadsheet header names per source type. The ingestion layer keeps the
 * accounting export's own headers, so these are the local-language titles.
 */
export type ColumnMapping = {
  amount: string;
  date: string;
  counterparty: string;
  reference?: string;
  netAmount?: string;
  tax?: string;
};

export type ColumnMappings = Record<SourceType, ColumnMapping>;

export const DEFAULT_COLUMN_MAPPINGS: ColumnMappings = columnsConfig;

// Fixed sign per source: outgoing cash is negative.
const SOURCE_SIGN: Record<SourceType, 1 | -1> = {
  Payable: -1,
  Receivable: 1,
  Invoice: 1,
  Proforma: 1,
};

export function signFor(sourceType: SourceType) {
  return SOURCE_SIGN[sourceType];
}

export function getColumnMapping(sourceType: SourceType, mappings: ColumnMappings = DEFAULT_COLUMN_MAPPINGS) {
  return mappings[sourceType];
}
