/**
 * MRZ Layout Registry
 * ===================
 * Dispatch table keyed by shape: (line count, line length) → layout.
 *
 * Detection is structural only. The document-type letters are never read to
 * disambiguate; per ICAO 9303 the length is authoritative.
 *
 * Usage:
 *   import { detectLayout } from "./registry.js";
 *   const layout = detectLayout(lines);
 */

import type { MRZFormat } from "../result.js";
import type { MRZLayout } from "./layout.js";

import TD1 from "./td1.js";
import TD2 from "./td2.js";
import TD3 from "./td3.js";

const LAYOUTS: MRZLayout[] = [TD1, TD2, TD3];

const shapeKey = (lineCount: number, lineLength: number) => `${lineCount}x${lineLength}`;

const BY_SHAPE = new Map<string, MRZLayout>(
  LAYOUTS.map(l => [shapeKey(l.lineCount, l.lineLength), l])
);

// ── Public API ─────────────────────────────────────────────────────────────────

/**
 * Finds the layout whose shape matches the lines exactly.
 * All lines must share one length; mixed lengths never match.
 */
export function detectLayout(lines: readonly string[]): MRZLayout | undefined {
  const first = lines[0];
  if (first === undefined) return undefined;
  if (!lines.every(l => l.length === first.length)) return undefined;
  return BY_SHAPE.get(shapeKey(lines.length, first.length));
}

/** Supported shapes, for help texts and error messages. */
export function listLayouts(): Array<{ format: MRZFormat; lines: number; length: number }> {
  return LAYOUTS.map(l => ({ format: l.format, lines: l.lineCount, length: l.lineLength }));
}
