// ── Result types ───────────────────────────────────────────────────────────────

export type MRZFormat = "TD1" | "TD2" | "TD3";

export interface Checks {
  readonly lineLengthsOK:    boolean;
  readonly charsetOK:        boolean;
  readonly documentNumberOK: boolean;
  readonly birthDateOK:      boolean;
  readonly expiryDateOK:     boolean;
  /** Personal-number check digit. Only TD3 carries one; always true for TD1/TD2. */
  readonly optionalDataOK:   boolean;
  readonly compositeOK:      boolean;
}

export interface MRZResult {
  readonly format:         MRZFormat;
  readonly documentType:   string;
  readonly issuingCountry: string;
  readonly surnames:       string;
  readonly givenNames:     string;

  /** Document number without fillers */
  readonly documentNumber:           string;
  /** Document number as printed: 9 characters, fillers kept */
  readonly documentNumberRaw:        string;
  readonly documentNumberCheckDigit: string;

  readonly nationality:         string;
  readonly birthDateYYMMDD:     string;
  readonly birthDateCheckDigit: string;
  readonly sex:                 string;
  readonly expiryDateYYMMDD:     string;
  readonly expiryDateCheckDigit: string;

  /** Optional data without fillers (TD1: both optional fields concatenated) */
  readonly optionalData: string;

  readonly checks: Checks;
}

/**
 * Structural rejection of an input. Checksum failures are never errors:
 * they are reported through {@link Checks}.
 */
export type MRZParseError = "NotEnoughLines" | "WrongLength" | "InvalidCharset";

export type Result<T, E> =
  | { readonly ok: true;  readonly value: T }
  | { readonly ok: false; readonly error: E };

export function ok<T>(value: T): { readonly ok: true; readonly value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { readonly ok: false; readonly error: E } {
  return { ok: false, error };
}

// ── Validity ───────────────────────────────────────────────────────────────────

/**
 * A record is valid when its shape is right and the document number, birth
 * date and expiry date check digits match.
 *
 * optionalDataOK and compositeOK are NOT part of the formula, for any format,
 * TD3 included. They stay informational.
 */
export function isValid(checks: Checks): boolean {
  return checks.lineLengthsOK && checks.charsetOK &&
    checks.documentNumberOK && checks.birthDateOK && checks.expiryDateOK;
}

/** Passport booklet, or any document whose type code starts with P. */
export function isPassportDocument(result: MRZResult): boolean {
  if (result.format === "TD3") return true;
  return result.documentType.replace(/</g, "").trim().toUpperCase().startsWith("P");
}

const PARSE_ERROR_MESSAGES: Record<MRZParseError, string> = {
  NotEnoughLines: "MRZ incomplete: at least 2 lines are required",
  WrongLength:    "Line lengths match no MRZ layout (3×30, 2×36, 2×44)",
  InvalidCharset: "MRZ contains characters outside A-Z, 0-9 and '<'",
};

export function describeParseError(error: MRZParseError): string {
  return PARSE_ERROR_MESSAGES[error];
}
