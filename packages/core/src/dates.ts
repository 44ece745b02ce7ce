import { MRZ } from "./constants.js";
import type { MRZResult } from "./result.js";

/**
 * Expands an MRZ date (YYMMDD) to ISO 8601 (YYYY-MM-DD).
 * Century from the pivot: YY > pivot → 19YY, otherwise 20YY.
 *
 * Returns undefined when the field is not a date (fillers, letters, month 13...).
 *
 * @example
 * expandMRZDate("740812")  // → "1974-08-12"
 * expandMRZDate("120415")  // → "2012-04-15"
 */
export function expandMRZDate(yymmdd: string, pivot: number = MRZ.DATE_PIVOT): string | undefined {
  const m = /^(\d{2})(\d{2})(\d{2})$/.exec(yymmdd);
  if (!m) return undefined;

  const [, yy = "", mm = "", dd = ""] = m;
  const month = parseInt(mm, 10);
  const day   = parseInt(dd, 10);
  if (month < 1 || month > 12 || day < 1 || day > 31) return undefined;

  const year = parseInt(yy, 10) > pivot ? `19${yy}` : `20${yy}`;
  return `${year}-${mm}-${dd}`;
}

/**
 * Whether the document's expiry date lies strictly before `now` (UTC day).
 * undefined when the expiry field does not expand to a date.
 */
export function isExpired(result: MRZResult, now: Date = new Date()): boolean | undefined {
  const expiry = expandMRZDate(result.expiryDateYYMMDD);
  if (!expiry) return undefined;
  return expiry < now.toISOString().slice(0, 10);
}
