import type { NormalizationWarning, NormalizationWarningCode } from "@/lib/analysis/types";

export type WarningCatalogEntry = {
  title: string;
  explain: string;
  suggestion: string;
};

const WARNING_CATALOG: Record<NormalizationWarningCode, WarningCatalogEntry> = {
  DATE_MISSING: {
    title: "Date missing",
    explain: "The row has no value in its date column, so it cannot be placed on a timeline.",
    suggestion: "Fill the due date in the accounting export and reload the dataset.",
  },
  DATE_INVALID: {
    title: "Date not recognised",
    explain: "The date is not a real YYYY/MM/DD local calendar date (for example day 32 or month 13).",
    suggestion: "Correct the cell in the source sheet. The row is left out of every analysis until then.",
  },
  AMOUNT_MISSING: {
    title: "Amount missing",
    explain: "The amount cell is empty. The row is kept with an amount of 0.",
    suggestion: "Usually safe to ignore for cancelled documents. Otherwise fill the amount and reload.",
  },
  AMOUNT_INVALID: {
    title: "Amount not numeric",
    explain: "The amount cell holds text that is not a number, so the row was left out.",
    suggestion: "Check the export for merged cells or notes typed into the amount column.",
  },
};

function isCatalogCode(code: string): code is NormalizationWarningCode {
  return Object.prototype.hasOwnProperty.call(WARNING_CATALOG, code);
}

export function getWarningCatalogEntry(code: string): WarningCatalogEntry {
  const key = String(code || "").trim();
  return (
    (isCatalogCode(key) ? WARNING_CATALOG[key] : undefined) || {
      title: key || "Unknown warning",
      explain: "This warning code does not have a specific catalog entry yet.",
      suggestion: "Use the raw warning code and row number to inspect the source sheet.",
    }
  );
}

/** Count warnings per code, with catalog text, for API responses. */
export function summarizeWarnings(warnings: readonly NormalizationWarning[]) {
  const counts = new Map<string, number>();
  for (const warning of warnings) {
    counts.set(warning.code, (counts.get(warning.code) || 0) + 1);
  }
  return [...counts.entries()]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([code, count]) => ({ code, count, ...getWarningCatalogEntry(code) }));
}
