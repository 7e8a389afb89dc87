import { isValidJalaaliDate, toGregorian as jalaaliToGregorian, toJalaali } from "jalaali-js";
import { DateFormatError } from "@/lib/errors";

const LOCAL_DATE_RE = /^(\d{4})\/(\d{2})\/(\d{2})$/;
const ISO_DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;
const DAY_MS = 24 * 60 * 60 * 1000;

// Gregorian years a canonical date may fall in. A typo'd local year such as
// 0140 still names a real Jalali date, so conversion alone does not catch it.
export const MIN_GREGORIAN_YEAR = 1000;
export const MAX_GREGORIAN_YEAR = 3000;

const PERSIAN_DIGITS = "۰۱۲۳۴۵۶۷۸۹";
const ARABIC_INDIC_DIGITS = "٠١٢٣٤٥٦٧٨٩";

function pad2(value: number) {
  return String(value).padStart(2, "0");
}

function isSupportedYear(year: number) {
  return year >= MIN_GREGORIAN_YEAR && year <= MAX_GREGORIAN_YEAR;
}

/**
 * Fold Persian (U+06F0..) and Arabic-Indic (U+0660..) digits to ASCII.
 * Spreadsheet exports from local accounting software mix both.
 */
export function foldDigits(value: string) {
  let out = "";
  for (const ch of value) {
    const persian = PERSIAN_DIGITS.indexOf(ch);
    if (persian >= 0) {
      out += String(persian);
      continue;
    }
    const arabic = ARABIC_INDIC_DIGITS.indexOf(ch);
    out += arabic >= 0 ? String(arabic) : ch;
  }
  return out;
}

/**
 * Convert a strict `YYYY/MM/DD` Jalali date to a UTC-midnight Gregorian Date.
 * Throws DateFormatError on a pattern mismatch, a date that does not exist,
 * or one whose Gregorian year is outside MIN_GREGORIAN_YEAR..MAX_GREGORIAN_YEAR.
 */
export function toGregorian(localDate: string): Date {
  const match = LOCAL_DATE_RE.exec(localDate);
  if (!match) {
    throw new DateFormatError(localDate, "expected YYYY/MM/DD");
  }

  const jy = Number(match[1]);
  const jm = Number(match[2]);
  const jd = Number(match[3]);
  if (!isValidJalaaliDate(jy, jm, jd)) {
    throw new DateFormatError(localDate, "date is out of range");
  }

  const { gy, gm, gd } = jalaaliToGregorian(jy, jm, jd);
  if (!isSupportedYear(gy)) {
    throw new DateFormatError(localDate, "date is out of range");
  }
  return new Date(Date.UTC(gy, gm - 1, gd));
}

export function toIsoDate(date: Date) {
  return `${String(date.getUTCFullYear()).padStart(4, "0")}-${pad2(date.getUTCMonth() + 1)}-${pad2(date.getUTCDate())}`;
}

/** A real `YYYY-MM-DD` date within the supported year range. */
export function isIsoDate(value: string) {
  const match = ISO_DATE_RE.exec(value);
  if (!match || !isSupportedYear(Number(match[1]))) return false;
  const date = new Date(Date.UTC(Number(match[1]), Number(match[2]) - 1, Number(match[3])));
  return toIsoDate(date) === value;
}

function parseIsoDate(iso: string) {
  const match = ISO_DATE_RE.exec(iso);
  if (!match) {
    throw new RangeError(`Not an ISO date: ${iso}`);
  }
  return new Date(Date.UTC(Number(match[1]), Number(match[2]) - 1, Number(match[3])));
}

/**
 * Gregorian (Date read in UTC, or ISO `YYYY-MM-DD`) to Jalali `YYYY/MM/DD`.
 * A Date outside the supported year range throws DateFormatError.
 */
export function toJalali(date: Date | string) {
  const value = typeof date === "string" ? parseIsoDate(date) : date;
  if (!isSupportedYear(value.getUTCFullYear())) {
    throw new DateFormatError(toIsoDate(value), "date is out of range");
  }
  const { jy, jm, jd } = toJalaali(
    value.getUTCFullYear(),
    value.getUTCMonth() + 1,
    value.getUTCDate()
  );
  return `${jy}/${pad2(jm)}/${pad2(jd)}`;
}

export function addDays(iso: string, days: number) {
  const date = parseIsoDate(iso);
  date.setUTCDate(date.getUTCDate() + days);
  return toIsoDate(date);
}

/** Whole days from `from` to `to` (positive when `to` is later). */
export function diffDays(from: string, to: string) {
  return Math.round((parseIsoDate(to).getTime() - parseIsoDate(from).getTime()) / DAY_MS);
}

export function monthKey(iso: string) {
  return iso.slice(0, 7);
}
