/**
 * MRZ Constants — ICAO Doc 9303
 *
 * Fixed values for the three machine-readable layouts and for the OCR
 * heuristics that sit in front of the parser. Layout sizes come straight
 * from ICAO 9303 Parts 4–6 and must not change at runtime.
 *
 * Object.freeze() keeps them immutable.
 */

export const MRZ = Object.freeze({
  // ── Alphabet ───────────────────────────────────────────────────────────────
  /** The only characters an MRZ line may contain. */
  CHARSET: /^[A-Z0-9<]*$/,

  /** Padding character for fixed-width fields. */
  FILLER: "<" as const,

  /** Separator between primary and secondary identifiers in the name field. */
  NAME_SEPARATOR: "<<" as const,

  // ── Layouts ────────────────────────────────────────────────────────────────
  /** TD1 — ID-1 card: 3 lines × 30 characters. */
  TD1: Object.freeze({ LINES: 3, LENGTH: 30 }),

  /** TD2 — ID-2 document: 2 lines × 36 characters. */
  TD2: Object.freeze({ LINES: 2, LENGTH: 36 }),

  /** TD3 — passport booklet: 2 lines × 44 characters. */
  TD3: Object.freeze({ LINES: 2, LENGTH: 44 }),

  // ── Check digits ───────────────────────────────────────────────────────────
  /** Cyclic weights of the 9303 check-digit sum (Part 3, §4.9). */
  CHECK_WEIGHTS: Object.freeze([7, 3, 1] as const),

  // ── Candidate heuristic ────────────────────────────────────────────────────
  /** Shortest normalized OCR line still considered MRZ-like. */
  MIN_LINE_LENGTH: 25,

  /** TD1 candidates must fall inside this length window. */
  TD1_MIN_LENGTH: 25,
  TD1_MAX_LENGTH: 35,

  /** Both lines of a TD2/TD3 candidate must reach this length. */
  TWO_LINE_MIN_LENGTH: 30,

  /** Weight of each '<' in a line's score (score = fillers × weight + length). */
  FILLER_SCORE_WEIGHT: 10,

  // ── OCR ────────────────────────────────────────────────────────────────────
  /** Lines recognized below this confidence never reach the heuristic. */
  MIN_OCR_CONFIDENCE: 0.4,

  // ── CAN ────────────────────────────────────────────────────────────────────
  /** Card Access Number length (PACE). */
  CAN_LENGTH: 6,

  /** Label words that mark a line as carrying the CAN. */
  CAN_HINTS: Object.freeze(["CAN", "CARD", "ACCESS"] as const),

  // ── Dates ──────────────────────────────────────────────────────────────────
  /**
   * Two-digit year pivot: YY above the pivot is 19YY, otherwise 20YY.
   */
  DATE_PIVOT: 50,
} as const);

export type MRZConstants = typeof MRZ;
