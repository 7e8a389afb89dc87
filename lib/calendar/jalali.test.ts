import test from "node:test";
import assert from "node:assert/strict";
import { addDays, diffDays, foldDigits, isIsoDate, monthKey, toGregorian, toIsoDate, toJalali } from "./jalali";
import { DateFormatError } from "../errors";

test("toGregorian converts strict local dates to UTC midnight", () => {
  assert.equal(toIsoDate(toGregorian("1404/01/01")), "2025-03-21");
  assert.equal(toIsoDate(toGregorian("1404/01/18")), "2025-04-07");
  assert.equal(toIsoDate(toGregorian("1404/02/01")), "2025-04-21");
  assert.equal(toIsoDate(toGregorian("1403/01/01")), "2024-03-20");
  assert.equal(toGregorian("1402/01/01").getTime(), Date.UTC(2023, 2, 21));
});

test("toGregorian accepts the leap day only in a leap year", () => {
  assert.equal(toIsoDate(toGregorian("1403/12/30")), "2025-03-20");
  assert.throws(() => toGregorian("1404/12/30"), DateFormatError);
});

test("toGregorian rejects malformed and out-of-range dates without clamping", () => {
  for (const input of ["1404-01-18", "1404/1/18", "14040118", "", " 1404/01/18", "1404/01/18 "]) {
    assert.throws(
      () => toGregorian(input),
      (err: unknown) => err instanceof DateFormatError && err.message === `Invalid local date "${input}": expected YYYY/MM/DD`
    );
  }
  for (const input of ["1404/13/01", "1404/00/10", "1404/01/32", "1404/07/31"]) {
    assert.throws(
      () => toGregorian(input),
      (err: unknown) => err instanceof DateFormatError && err.code === "DATE_FORMAT" && err.input === input
    );
  }
});

test("dates outside the supported Gregorian years are rejected", () => {
  // 0140 is a real Jalali year, but a typo for 1400 in practice.
  assert.throws(
    () => toGregorian("0140/01/10"),
    (err: unknown) => err instanceof DateFormatError && err.message === 'Invalid local date "0140/01/10": date is out of range'
  );
  assert.throws(() => toGregorian("3000/01/01"), DateFormatError);
  assert.throws(
    () => toJalali(new Date(Date.UTC(4000, 0, 1))),
    (err: unknown) => err instanceof DateFormatError && err.input === "4000-01-01"
  );
  assert.equal(isIsoDate("0999-12-31"), false);
  assert.equal(isIsoDate("3001-01-01"), false);
});

test("toIsoDate pads the year to four digits", () => {
  assert.equal(toIsoDate(new Date(Date.UTC(761, 2, 30))), "0761-03-30");
});

test("toJalali converts ISO strings and Date values", () => {
  assert.equal(toJalali("2025-03-21"), "1404/01/01");
  assert.equal(toJalali(new Date(Date.UTC(2024, 2, 20))), "1403/01/01");
  assert.equal(toJalali("2025-04-07"), "1404/01/18");
});

test("foldDigits maps Persian and Arabic-Indic digits to ASCII", () => {
  assert.equal(foldDigits("۱۴۰۴/۰۱/۱۸"), "1404/01/18");
  assert.equal(foldDigits("٢٥٠٠"), "2500");
  assert.equal(foldDigits("abc 12"), "abc 12");
});

test("UTC day arithmetic helpers", () => {
  assert.equal(addDays("2025-03-20", 1), "2025-03-21");
  assert.equal(addDays("2024-02-28", 1), "2024-02-29");
  assert.equal(addDays("2025-01-01", -1), "2024-12-31");
  assert.equal(diffDays("2025-04-01", "2025-04-08"), 7);
  assert.equal(diffDays("2025-04-08", "2025-04-01"), -7);
  assert.equal(monthKey("2025-04-08"), "2025-04");
  assert.equal(isIsoDate("2025-02-29"), false);
  assert.equal(isIsoDate("2024-02-29"), true);
  assert.equal(isIsoDate("2024/02/29"), false);
});
