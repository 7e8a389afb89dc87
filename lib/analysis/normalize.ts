import { foldDigits, toGregorian, toIsoDate, toJalali } from "@/lib/calendar/jalali";
import { DateFormatError } from "@/lib/errors";
import {
  type ColumnMappings,
  DEFAULT_COLUMN_MAPPINGS,
  getColumnMapping,
  signFor,
} from "@/lib/analysis/columns";
import type {
  CanonicalRecord,
  NormalizationWarning,
  SourceType,
} from "@/lib/analysis/types";

export type RawRow = Record<string, unknown>;

export type NormalizeOptions = {
  columns?: ColumnMappings;
  logger?: Pick<Console, "warn">;
};

export type NormalizeResult = {
  records: readonly CanonicalRecord[];
  warnings: NormalizationWarning[];
};

// Source amounts are in Rial; the display unit is Toman.
const CURRENCY_DIVISOR = 10;
const NUMERIC_RE = /^-?\d+(\.\d+)?$/;

type ParsedAmount =
  | { kind: "value"; value: number }
  | { kind: "missing" }
  | { kind: "invalid"; raw: string };

type ParsedDate =
  | { kind: "value"; eventDate: string; jalaliDate: string }
  | { kind: "missing" }
  | { kind: "invalid"; reason: string };

function parseAmountCell(cell: unknown): ParsedAmount {
  if (cell === null || cell === undefined) return { kind: "missing" };

  if (typeof cell === "number") {
    return Number.isFinite(cell) ? { kind: "value", value: cell } : { kind: "invalid", raw: String(cell) };
  }

  if (typeof cell !== "string") return { kind: "invalid", raw: String(cell) };

  const trimmed = cell.trim();
  if (!trimmed) return { kind: "missing" };

  const cleaned = foldDigits(trimmed)
    .replace(/[,٬\s]/g, "")
    .replace(/٫/g, ".");
  if (!NUMERIC_RE.test(cleaned)) return { kind: "invalid", raw: trimmed };
  return { kind: "value", value: Number(cleaned) };
}

function parseDateCell(cell: unknown): ParsedDate {
  if (cell === null || cell === undefined) return { kind: "missing" };

  try {
    if (cell instanceof Date) {
      if (Number.isNaN(cell.getTime())) return { kind: "invalid", reason: "invalid Date value" };
      return { kind: "value", eventDate: toIsoDate(cell), jalaliDate: toJalali(cell) };
    }

    if (typeof cell !== "string") {
      return { kind: "invalid", reason: `unsupported date cell type ${typeof cell}` };
    }

    const localDate = foldDigits(cell.trim());
    if (!localDate) return { kind: "missing" };
    return { kind: "value", eventDate: toIsoDate(toGregorian(localDate)), jalaliDate: localDate };
  } catch (err: unknown) {
    if (err instanceof DateFormatError) {
      return { kind: "invalid", reason: err.message };
    }
    throw err;
  }
}

function parseTextCell(cell: unknown) {
  if (typeof cell === "number" && Number.isFinite(cell)) return String(cell);
  if (typeof cell !== "string") return undefined;
  const trimmed = cell.trim();
  return trimmed || undefined;
}

function parseOptionalAmount(row: RawRow, column: string | undefined) {
  if (!column) return undefined;
  const parsed = parseAmountCell(row[column]);
  return parsed.kind === "value" ? Math.abs(parsed.value / CURRENCY_DIVISOR) : undefined;
}

/**
 * Map raw spreadsheet rows of one source type to canonical records.
 * Rows with an unusable date or amount are skipped and reported as warnings;
 * the batch itself never fails. Output keeps input order.
 */
export function normalizeRows(
  rows: readonly RawRow[],
  sourceType: SourceType,
  options: NormalizeOptions = {}
): NormalizeResult {
  const mapping = getColumnMapping(sourceType, options.columns || DEFAULT_COLUMN_MAPPINGS);
  const sign = signFor(sourceType);
  const records: CanonicalRecord[] = [];
  const warnings: NormalizationWarning[] = [];

  rows.forEach((row, rowIndex) => {
    const date = parseDateCell(row[mapping.date]);
    if (date.kind === "missing") {
      warnings.push({
        sourceType,
        rowIndex,
        code: "DATE_MISSING",
        message: `Column "${mapping.date}" is empty.`,
        dropped: true,
      });
      return;
    }
    if (date.kind === "invalid") {
      warnings.push({ sourceType, rowIndex, code: "DATE_INVALID", message: date.reason, dropped: true });
      return;
    }

    const amount = parseAmountCell(row[mapping.amount]);
    if (amount.kind === "invalid") {
      warnings.push({
        sourceType,
        rowIndex,
        code: "AMOUNT_INVALID",
        message: `Column "${mapping.amount}" is not numeric: "${amount.raw}".`,
        dropped: true,
      });
      return;
    }
    if (amount.kind === "missing") {
      warnings.push({
        sourceType,
        rowIndex,
        code: "AMOUNT_MISSING",
        message: `Column "${mapping.amount}" is empty; counted as 0.`,
        dropped: false,
      });
    }

    const rawAmount = amount.kind === "value" ? amount.value : 0;
    const record: CanonicalRecord = {
      eventDate: date.eventDate,
      jalaliDate: date.jalaliDate,
      // Math.abs(0) * -1 would give -0.
      amount: rawAmount === 0 ? 0 : sign * Math.abs(rawAmount / CURRENCY_DIVISOR),
      counterparty: parseTextCell(row[mapping.counterparty]),
      sourceType,
      rowIndex,
      reference: mapping.reference ? parseTextCell(row[mapping.reference]) : undefined,
      netAmount: parseOptionalAmount(row, mapping.netAmount),
      tax: parseOptionalAmount(row, mapping.tax),
    };
    records.push(Object.freeze(record));
  });

  if (warnings.length > 0) {
    const dropped = warnings.filter((warning) => warning.dropped).length;
    (options.logger || console).warn(
      `normalizeRows ${sourceType}: ${rows.length} row(s), ${dropped} dropped, ${warnings.length} warning(s)`
    );
  }

  return { records: Object.freeze(records), warnings };
}
