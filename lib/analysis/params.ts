import { isIsoDate } from "@/lib/calendar/jalali";
import { DEFAULT_TOP_N } from "@/lib/analysis/kinds/shared";
import { clampForecastDays, DEFAULT_FORECAST_DAYS } from "@/lib/analysis/kinds/forecast";
import { DEFAULT_ON_TIME_DAYS } from "@/lib/analysis/kinds/pipeline";
import { InvalidParameterError } from "@/lib/errors";

function requireFinite(name: string, value: number) {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new InvalidParameterError(name, `${name} must be a finite number`);
  }
  return value;
}

export function resolveTopN(value: number | undefined) {
  if (value === undefined) return DEFAULT_TOP_N;
  requireFinite("topN", value);
  if (!Number.isInteger(value) || value < 1) {
    throw new InvalidParameterError("topN", "topN must be a positive integer");
  }
  return value;
}

/** Out-of-range values are clamped to [1, 180]; only non-numbers are rejected. */
export function resolveForecastDays(value: number | undefined) {
  if (value === undefined) return DEFAULT_FORECAST_DAYS;
  return clampForecastDays(requireFinite("forecastDays", value));
}

export function resolveOnTimeDays(value: number | undefined) {
  if (value === undefined) return DEFAULT_ON_TIME_DAYS;
  requireFinite("onTimeDays", value);
  if (!Number.isInteger(value) || value < 0) {
    throw new InvalidParameterError("onTimeDays", "onTimeDays must be a non-negative integer");
  }
  return value;
}

export function resolveStartingPosition(value: number | undefined) {
  return value === undefined ? undefined : requireFinite("startingPosition", value);
}

export function resolveReferenceDate(value: string | undefined, today: () => string) {
  if (value === undefined) return today();
  if (!isIsoDate(value)) {
    throw new InvalidParameterError("referenceDate", `referenceDate must be YYYY-MM-DD, got "${value}"`);
  }
  return value;
}
