import { MRZ, normalizeLine } from "mrzscan-core";

/**
 * A normalized OCR line and how MRZ-like it looks.
 * Lives only for the frame being examined.
 */
interface CandidateLine {
  text:  string;
  score: number;
}

/** More fillers and more length → more MRZ-like. */
function scoreLine(text: string): number {
  let fillers = 0;
  for (const ch of text) if (ch === MRZ.FILLER) fillers++;
  return fillers * MRZ.FILLER_SCORE_WEIGHT + text.length;
}

/** Highest score first; equal scores keep their input order. */
function rank(lines: readonly string[]): CandidateLine[] {
  return lines
    .map(text => ({ text, score: scoreLine(text) }))
    .sort((a, b) => b.score - a.score);
}

/**
 * Assembles the most likely MRZ block from one frame's OCR lines.
 *
 * OCR lines come unordered and may be split or merged, so the block is put
 * together by score:
 *   1. TD1: at least 3 MRZ-like lines of 25–35 chars → top 3 by score.
 *   2. TD2/TD3: at least 2 MRZ-like lines → top 2 by score, both ≥ 30 chars.
 *
 * Lines are emitted in ranked order, not in the order they were read. If OCR
 * already returned the true order, a TD1 name line with many fillers can end up
 * above the data lines; the parser then reports failed check digits.
 *
 * Nothing here corrects lengths: a line that is a character short fails format
 * detection downstream and the frame is skipped.
 *
 * @returns the block joined by "\n", or undefined when the frame has none
 */
export function extractMRZCandidate(lines: readonly string[]): string | undefined {
  const normalized = lines.map(normalizeLine).filter(l => l.length > 0);

  // MRZ lines are long and almost always carry a "<<" run
  const mrzLike = normalized.filter(l =>
    l.length >= MRZ.MIN_LINE_LENGTH && l.includes(MRZ.NAME_SEPARATOR)
  );

  // ── TD1: 3 lines of ~30 ─────────────────────────────────────────────────────
  const td1 = mrzLike.filter(l => l.length >= MRZ.TD1_MIN_LENGTH && l.length <= MRZ.TD1_MAX_LENGTH);
  if (td1.length >= 3) {
    const top = rank(td1).slice(0, 3);
    if (top.every(c => c.text.length >= MRZ.TD1_MIN_LENGTH)) {
      return top.map(c => c.text).join("\n");
    }
  }

  // ── TD2 / TD3: 2 lines of 36 or 44 ─────────────────────────────────────────
  if (mrzLike.length >= 2) {
    const top = rank(mrzLike).slice(0, 2);
    if (top.every(c => c.text.length >= MRZ.TWO_LINE_MIN_LENGTH)) {
      return top.map(c => c.text).join("\n");
    }
  }

  return undefined;
}
