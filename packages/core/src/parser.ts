import { detectLayout } from "./formats/registry.js";
import { isMRZCharset, normalizeMRZ, splitLines, type NormalizeOptions } from "./normalize.js";
import { err, ok, type MRZFormat, type MRZParseError, type MRZResult, type Result } from "./result.js";

export type ParseOptions = NormalizeOptions;

/**
 * Parses and validates an assembled MRZ block (2 or 3 newline-separated lines).
 *
 * Order of rejection:
 *   1. fewer than 2 non-empty lines   → NotEnoughLines
 *   2. a character outside A-Z 0-9 <  → InvalidCharset
 *   3. no layout with this exact shape → WrongLength
 *
 * Checksum mismatches are not errors; see `result.checks`.
 *
 * @example
 * const r = parseAndValidate("P<UTOERIKSSON<<ANNA<MARIA<<<<<<<<<<<<<<<<<<<\nL898902C36UTO7408122F1204159ZE184226B<<<<<10");
 * if (r.ok && isValid(r.value.checks)) ...
 */
export function parseAndValidate(
  rawText: string,
  opts:    ParseOptions = {}
): Result<MRZResult, MRZParseError> {
  const lines = toLines(rawText, opts);
  if (!lines.ok) return lines;

  const layout = detectLayout(lines.value);
  if (!layout) return err("WrongLength");

  return ok(layout.extract(lines.value));
}

/**
 * Shape-only detection, without extracting fields.
 */
export function detectFormat(
  rawText: string,
  opts:    ParseOptions = {}
): Result<MRZFormat, MRZParseError> {
  const lines = toLines(rawText, opts);
  if (!lines.ok) return lines;

  const layout = detectLayout(lines.value);
  return layout ? ok(layout.format) : err("WrongLength");
}

function toLines(rawText: string, opts: ParseOptions): Result<string[], MRZParseError> {
  const lines = splitLines(normalizeMRZ(rawText, opts));

  if (lines.length < 2)            return err("NotEnoughLines");
  if (!lines.every(isMRZCharset))  return err("InvalidCharset");

  return ok(lines);
}
