/**
 * TD3 — Machine Readable Passport (booklet)
 * =========================================
 * 2 lines × 44 characters.
 *
 * Line 1: P<UTOERIKSSON<<ANNA<MARIA<<<<<<<<<<<<<<<<<<<
 *   - [0-1]   document type
 *   - [2-4]   issuing state
 *   - [5-43]  name field (39 chars)
 *
 * Line 2: L898902C36UTO7408122F1204159ZE184226B<<<<<10
 *   - [0-8]   passport number, [9] check digit
 *   - [10-12] nationality
 *   - [13-18] birth date YYMMDD, [19] check digit
 *   - [20]    sex
 *   - [21-26] expiry date YYMMDD, [27] check digit
 *   - [28-41] personal number, [42] check digit
 *   - [43]    composite check digit over [0-9] + [13-19] + [21-27] + [28-42]
 */

import { MRZ } from "../constants.js";
import { buildResult, checked, field, single, type MRZLayout } from "./layout.js";

const TD3: MRZLayout = {
  format:     "TD3",
  lineCount:  MRZ.TD3.LINES,
  lineLength: MRZ.TD3.LENGTH,

  extract([l1 = "", l2 = ""]) {
    return buildResult("TD3", {
      documentType:   field(l1, 0, 2),
      issuingCountry: field(l1, 2, 5),
      nameField:      field(l1, 5, 44),

      documentNumber: checked(l2, 0, 9),
      nationality:    field(l2, 10, 13),
      birthDate:      checked(l2, 13, 19),
      sex:            single(l2, 20),
      expiryDate:     checked(l2, 21, 27),
      optionalData:   field(l2, 28, 42),
      optionalCheck:  checked(l2, 28, 42),

      composite: {
        data:       field(l2, 0, 10) + field(l2, 13, 20) + field(l2, 21, 28) + field(l2, 28, 43),
        checkDigit: single(l2, 43),
      },
    });
  },
};

export default TD3;
