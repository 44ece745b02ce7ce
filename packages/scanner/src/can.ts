import { MRZ } from "mrzscan-core";

function digitRuns(line: string): string[] {
  return line.match(/[0-9]+/g) ?? [];
}

function firstCAN(lines: readonly string[]): string | undefined {
  for (const line of lines) {
    const run = digitRuns(line).find(r => r.length === MRZ.CAN_LENGTH);
    if (run) return run;
  }
  return undefined;
}

/**
 * Finds the 6-digit Card Access Number among a frame's OCR lines.
 *
 * MRZ lines (anything with a '<') are skipped: the CAN is printed elsewhere.
 * Lines labelled CAN / CARD / ACCESS are searched first, then every remaining
 * line in input order. Only maximal digit runs of exactly 6 count, so a
 * 7-digit number never yields a CAN.
 */
export function extractCAN(lines: readonly string[]): string | undefined {
  const eligible = lines.filter(l => !l.includes(MRZ.FILLER));
  const labelled = eligible.filter(l => {
    const up = l.toUpperCase();
    return MRZ.CAN_HINTS.some(h => up.includes(h));
  });

  return firstCAN(labelled) ?? firstCAN(eligible);
}
