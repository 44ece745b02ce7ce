/**
 * MRZ blocks shared by the tests of every package.
 * All check digits below were computed with the 7-3-1 rule.
 */

// ICAO Doc 9303 Part 4 specimen (Utopia passport)
export const ICAO_TD3 = [
  "P<UTOERIKSSON<<ANNA<MARIA<<<<<<<<<<<<<<<<<<<",
  "L898902C36UTO7408122F1204159ZE184226B<<<<<10",
] as const;

export const SAMPLE_TD3 = [
  "P<UTOTESTER<<JANE<QUINN<<<<<<<<<<<<<<<<<<<<<",
  "AB12345671UTO8503013F3001156PN55321<<<<<<<28",
] as const;

export const SAMPLE_TD2 = [
  "I<UTOVANCE<<OLIVER<PAUL<<<<<<<<<<<<<",
  "C7X0042<<6UTO0102292M2912316K99<<<<2",
] as const;

export const SAMPLE_TD1 = [
  "IDUTOZ009911221ALPHA<7<<<<<<<<",
  "9207156X2706306UTOBETA<<<<<<<2",
  "NAKAMURA<SMITH<<KAI<<<<<<<<<<<",
] as const;

export function block(lines: readonly string[]): string {
  return lines.join("\n");
}

/** Replaces the character at `index` with one of a different ICAO value. */
export function flip(line: string, index: number): string {
  const ch = line.charAt(index);
  let next: string;
  if (ch >= "0" && ch <= "9")      next = String((Number(ch) + 1) % 10);
  else if (ch >= "A" && ch <= "Z") next = ch === "Z" ? "A" : String.fromCharCode(ch.charCodeAt(0) + 1);
  else                             next = "1";
  return line.slice(0, index) + next + line.slice(index + 1);
}
