export { MRZ, type MRZConstants } from "./constants.js";

export {
  normalizeMRZ, normalizeLine, isMRZCharset, splitLines, unfill,
  type NormalizeOptions,
} from "./normalize.js";

export {
  charValue, icaoCheckDigit, computeCheckDigit, verifyCheckDigit,
  type CheckDigitVerification,
} from "./check-digit.js";

export { parseNames, type ParsedNames } from "./names.js";

export {
  isValid, isPassportDocument, describeParseError, ok, err,
  type MRZFormat, type MRZResult, type Checks, type MRZParseError, type Result,
} from "./result.js";

export { detectLayout, listLayouts } from "./formats/registry.js";
export type { MRZLayout } from "./formats/layout.js";

export { parseAndValidate, detectFormat, type ParseOptions } from "./parser.js";
export { mrzKey, buildMRZKey, mrzFingerprint } from "./mrz-key.js";
export { expandMRZDate, isExpired } from "./dates.js";
