/**
 * TD2 — ID-2 size official travel document
 * =========================================
 * 2 lines × 36 characters.
 *
 * Line 1: type [0-1], issuing state [2-4], name field [5-35] (31 chars)
 * Line 2: document number [0-8] + CD [9], nationality [10-12],
 *         birth date [13-18] + CD [19], sex [20], expiry date [21-26] + CD [27],
 *         optional data [28-34], composite CD [35]
 *
 * The optional field has no check digit of its own.
 */

import { MRZ } from "../constants.js";
import { buildResult, checked, field, single, type MRZLayout } from "./layout.js";

const TD2: MRZLayout = {
  format:     "TD2",
  lineCount:  MRZ.TD2.LINES,
  lineLength: MRZ.TD2.LENGTH,

  extract([l1 = "", l2 = ""]) {
    return buildResult("TD2", {
      documentType:   field(l1, 0, 2),
      issuingCountry: field(l1, 2, 5),
      nameField:      field(l1, 5, 36),

      documentNumber: checked(l2, 0, 9),
      nationality:    field(l2, 10, 13),
      birthDate:      checked(l2, 13, 19),
      sex:            single(l2, 20),
      expiryDate:     checked(l2, 21, 27),
      optionalData:   field(l2, 28, 35),

      composite: {
        data:       field(l2, 0, 10) + field(l2, 13, 20) + field(l2, 21, 28) + field(l2, 28, 35),
        checkDigit: single(l2, 35),
      },
    });
  },
};

export default TD2;
