import { sha256 } from "@noble/hashes/sha256";
import { bytesToHex } from "@noble/hashes/utils";
import { parseAndValidate, type ParseOptions } from "./parser.js";
import type { MRZParseError, MRZResult, Result } from "./result.js";

// ── MRZ key (chip access) ──────────────────────────────────────────────────────

/**
 * MRZ information used as the chip access key (BAC / PACE with MRZ):
 * document number (raw, 9 chars) + CD + birth date + CD + expiry date + CD.
 *
 * Always derived from the result, never stored next to it.
 */
export function mrzKey(result: MRZResult): string {
  return (
    result.documentNumberRaw + result.documentNumberCheckDigit +
    result.birthDateYYMMDD   + result.birthDateCheckDigit +
    result.expiryDateYYMMDD  + result.expiryDateCheckDigit
  );
}

/**
 * Parses a scanned MRZ and returns the key handed to the chip reader.
 * Only structural errors fail here, as in the scan → chip flow.
 */
export function buildMRZKey(
  rawText: string,
  opts:    ParseOptions = {}
): Result<string, MRZParseError> {
  const parsed = parseAndValidate(rawText, opts);
  if (!parsed.ok) return parsed;
  return { ok: true, value: mrzKey(parsed.value) };
}

/**
 * Hex SHA-256 of the MRZ key. Stable per document, used to refer to a
 * result in logs without writing the document number or dates.
 */
export function mrzFingerprint(result: MRZResult): string {
  return bytesToHex(sha256(new TextEncoder().encode(mrzKey(result))));
}
