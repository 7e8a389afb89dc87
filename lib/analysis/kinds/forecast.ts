import { addDays, toJalali } from "@/lib/calendar/jalali";
import type { Records } from "@/lib/analysis/kinds/shared";
import type { ForecastDay, ForecastPayload } from "@/lib/analysis/types";

export const FORECAST_MIN_DAYS = 1;
export const FORECAST_MAX_DAYS = 180;
export const DEFAULT_FORECAST_DAYS = 90;

const WEEK_DAYS = 7;

export function clampForecastDays(days: number) {
  return Math.min(FORECAST_MAX_DAYS, Math.max(FORECAST_MIN_DAYS, Math.trunc(days)));
}

/**
 * Dense daily projection over (referenceDate, referenceDate + forecastDays].
 * `forecastDays` must already be clamped.
 */
export function buildForecast(params: {
  payable: Records;
  receivable: Records;
  referenceDate: string;
  forecastDays: number;
  startingPosition: number;
}): ForecastPayload {
  const { referenceDate, forecastDays, startingPosition } = params;
  const horizonDate = addDays(referenceDate, forecastDays);

  const byDate = new Map<string, { inflow: number; outflow: number }>();
  for (const record of [...params.payable, ...params.receivable]) {
    if (record.eventDate <= referenceDate || record.eventDate > horizonDate) continue;
    const current = byDate.get(record.eventDate) || { inflow: 0, outflow: 0 };
    if (record.amount > 0) current.inflow += record.amount;
    if (record.amount < 0) current.outflow += Math.abs(record.amount);
    byDate.set(record.eventDate, current);
  }

  const daily: ForecastDay[] = [];
  let position = startingPosition;
  for (let offset = 1; offset <= forecastDays; offset += 1) {
    const date = addDays(referenceDate, offset);
    const flow = byDate.get(date) || { inflow: 0, outflow: 0 };
    const net = flow.inflow - flow.outflow;
    position += net;
    daily.push({ date, jalaliDate: toJalali(date), inflow: flow.inflow, outflow: flow.outflow, net, position });
  }

  // First occurrence wins on ties.
  let minDay = daily[0];
  let maxDay = daily[0];
  for (const day of daily) {
    if (day.position < minDay.position) minDay = day;
    if (day.position > maxDay.position) maxDay = day;
  }

  const weekly: ForecastPayload["weekly"] = [];
  for (let start = 0; start < daily.length; start += WEEK_DAYS) {
    const chunk = daily.slice(start, start + WEEK_DAYS);
    const last = chunk[chunk.length - 1];
    const inflow = chunk.reduce((sum, day) => sum + day.inflow, 0);
    const outflow = chunk.reduce((sum, day) => sum + day.outflow, 0);
    weekly.push({
      week: start / WEEK_DAYS + 1,
      start: chunk[0].date,
      end: last.date,
      inflow,
      outflow,
      net: inflow - outflow,
      endPosition: last.position,
    });
  }

  const totalIncoming = daily.reduce((sum, day) => sum + day.inflow, 0);
  const totalOutgoing = daily.reduce((sum, day) => sum + day.outflow, 0);

  return {
    forecastDays,
    referenceDate,
    horizonDate,
    startingPosition,
    totalIncoming,
    totalOutgoing,
    netForecast: totalIncoming - totalOutgoing,
    minPosition: minDay.position,
    minPositionDate: minDay.date,
    maxPosition: maxDay.position,
    maxPositionDate: maxDay.date,
    daily,
    weekly,
  };
}
