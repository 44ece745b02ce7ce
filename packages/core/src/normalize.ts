import { MRZ } from "./constants.js";

export interface NormalizeOptions {
  /**
   * Keep characters outside `A–Z 0–9 <` so the charset check can reject them.
   * Default: true. With false they are silently dropped.
   */
  strict?: boolean;
}

/**
 * Normalizes a multi-line MRZ block for the parser.
 * Uppercases, unifies line breaks to `\n` and removes every other whitespace.
 */
export function normalizeMRZ(text: string, opts: NormalizeOptions = {}): string {
  const strict = opts.strict ?? true;

  const up = text
    .toUpperCase()
    .replace(/\r\n?/g, "\n")
    .replace(/[^\S\n]+/g, "");

  return strict ? up : up.replace(/[^A-Z0-9<\n]/g, "");
}

/**
 * Normalizes a single OCR line: uppercase, only `A–Z 0–9 <` survive.
 */
export function normalizeLine(text: string): string {
  return text.toUpperCase().replace(/[^A-Z0-9<]/g, "");
}

export function isMRZCharset(line: string): boolean {
  return MRZ.CHARSET.test(line);
}

/** Splits a normalized block into its non-empty lines. */
export function splitLines(block: string): string[] {
  return block.split("\n").filter(l => l.length > 0);
}

/** Display form of a fixed-width field: fillers removed, trimmed. */
export function unfill(field: string): string {
  return field.replace(/</g, "").trim();
}
