import { MRZ } from "./constants.js";

export interface ParsedNames {
  surnames:   string;
  givenNames: string;
}

/**
 * Decodes the MRZ name field: `SURNAME<<GIVEN<NAMES<<<<`.
 *
 * The first `<<` separates surname from given names. Inside each part any run
 * of `<` is one space. Without `<<` the whole field is the surname.
 */
export function parseNames(field: string): ParsedNames {
  const sep = field.indexOf(MRZ.NAME_SEPARATOR);

  if (sep === -1) {
    return { surnames: spaced(field), givenNames: "" };
  }

  return {
    surnames:   spaced(field.slice(0, sep)),
    givenNames: spaced(field.slice(sep + MRZ.NAME_SEPARATOR.length)),
  };
}

function spaced(part: string): string {
  return part.replace(/<+/g, " ").trim();
}
