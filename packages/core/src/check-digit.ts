import { MRZ } from "./constants.js";

// ── ICAO 9303 check digit ──────────────────────────────────────────────────────

/**
 * Value table:
 *   '0'-'9' → 0-9
 *   'A'-'Z' → 10-35
 *   '<'     → 0
 */
export function charValue(ch: string): number {
  if (ch >= "0" && ch <= "9") return ch.charCodeAt(0) - 48;
  if (ch >= "A" && ch <= "Z") return ch.charCodeAt(0) - 65 + 10; // A=10, B=11...
  return 0; // '<' and any other filler
}

/**
 * Computes the ICAO 9303 check digit of a field.
 * Weighted sum with cyclic weights 7, 3, 1; result is sum mod 10.
 *
 * Reference: ICAO Doc 9303 Part 3, §4.9
 */
export function icaoCheckDigit(field: string): number {
  const weights = MRZ.CHECK_WEIGHTS;

  let sum = 0;
  for (let i = 0; i < field.length; i++) {
    sum += charValue(field.charAt(i)) * weights[i % 3];
  }

  return sum % 10;
}

/** Same as {@link icaoCheckDigit}, as the single character printed in an MRZ. */
export function computeCheckDigit(field: string): string {
  return String(icaoCheckDigit(field));
}

export interface CheckDigitVerification {
  valid:    boolean;
  computed: number;
  /** The character found in the MRZ (may be '<' or a letter on a misread). */
  expected: string;
}

/**
 * Checks a field against the check-digit character printed next to it.
 */
export function verifyCheckDigit(field: string, expected: string): CheckDigitVerification {
  const computed = icaoCheckDigit(field);
  return { valid: String(computed) === expected, computed, expected };
}
