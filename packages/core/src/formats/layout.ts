/**
 * MRZ Layout Interface
 * ====================
 * Every ICAO 9303 layout (TD1, TD2, TD3) implements this interface.
 *
 * A layout is selected purely by shape (line count × line length); by the
 * time `extract()` runs the dispatcher has already checked the shape and the
 * charset, so every slice below is in bounds.
 */

import { verifyCheckDigit } from "../check-digit.js";
import { parseNames } from "../names.js";
import { unfill } from "../normalize.js";
import type { Checks, MRZFormat, MRZResult } from "../result.js";

export interface MRZLayout {
  readonly format:     MRZFormat;
  readonly lineCount:  number;
  readonly lineLength: number;

  /**
   * Slices the fixed-width fields and records the check-digit results.
   * Never fails: checksum mismatches end up in `checks`.
   */
  extract(lines: readonly string[]): MRZResult;
}

// ── Field slicing ──────────────────────────────────────────────────────────────

/** One raw field plus the check digit printed after it. */
export interface CheckedField {
  data:       string;
  checkDigit: string;
}

/**
 * Everything a layout reads off its lines, before validation.
 * Offsets differ per layout; assembly and validation are shared.
 */
export interface RawFields {
  documentType:   string;
  issuingCountry: string;
  nameField:      string;
  documentNumber: CheckedField;
  nationality:    string;
  birthDate:      CheckedField;
  sex:            string;
  expiryDate:     CheckedField;
  /** Raw optional data, fillers kept */
  optionalData:   string;
  /** Only layouts whose optional field carries its own check digit (TD3) */
  optionalCheck?: CheckedField;
  composite:      CheckedField;
}

/** Half-open [start, end) slice of a line. */
export function field(line: string, start: number, end: number): string {
  return line.slice(start, end);
}

/** One-character field: sex code or check digit. */
export function single(line: string, index: number): string {
  return line.charAt(index);
}

export function checked(line: string, start: number, end: number): CheckedField {
  return { data: field(line, start, end), checkDigit: single(line, end) };
}

// ── Assembly ───────────────────────────────────────────────────────────────────

export function buildResult(format: MRZFormat, raw: RawFields): MRZResult {
  const { surnames, givenNames } = parseNames(raw.nameField);
  const passes = (f: CheckedField) => verifyCheckDigit(f.data, f.checkDigit).valid;

  const checks: Checks = Object.freeze({
    lineLengthsOK:    true,
    charsetOK:        true,
    documentNumberOK: passes(raw.documentNumber),
    birthDateOK:      passes(raw.birthDate),
    expiryDateOK:     passes(raw.expiryDate),
    optionalDataOK:   raw.optionalCheck ? passes(raw.optionalCheck) : true,
    compositeOK:      passes(raw.composite),
  });

  return Object.freeze({
    format,
    documentType:   raw.documentType,
    issuingCountry: raw.issuingCountry,
    surnames,
    givenNames,

    documentNumber:           unfill(raw.documentNumber.data),
    documentNumberRaw:        raw.documentNumber.data,
    documentNumberCheckDigit: raw.documentNumber.checkDigit,

    nationality:          raw.nationality,
    birthDateYYMMDD:      raw.birthDate.data,
    birthDateCheckDigit:  raw.birthDate.checkDigit,
    sex:                  raw.sex,
    expiryDateYYMMDD:     raw.expiryDate.data,
    expiryDateCheckDigit: raw.expiryDate.checkDigit,

    optionalData: unfill(raw.optionalData),
    checks,
  });
}
