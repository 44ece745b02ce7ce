/**
 * TD1 — ID-1 size card (national ID cards, residence permits)
 * ===========================================================
 * 3 lines × 30 characters.
 *
 * Line 1: I<UTOD231458907<<<<<<<<<<<<<<<
 *   - [0-1]   document type
 *   - [2-4]   issuing state
 *   - [5-13]  document number, [14] check digit
 *   - [15-29] optional data 1
 *
 * Line 2: 7408122F1204159UTO<<<<<<<<<<<6
 *   - [0-5]   birth date YYMMDD, [6] check digit
 *   - [7]     sex
 *   - [8-13]  expiry date YYMMDD, [14] check digit
 *   - [15-17] nationality
 *   - [18-28] optional data 2
 *   - [29]    composite check digit over L1[5-29] + L2[0-6] + L2[8-14] + L2[18-28]
 *
 * Line 3: ERIKSSON<<ANNA<MARIA<<<<<<<<<<
 */

import { MRZ } from "../constants.js";
import { buildResult, checked, field, single, type MRZLayout } from "./layout.js";

const TD1: MRZLayout = {
  format:     "TD1",
  lineCount:  MRZ.TD1.LINES,
  lineLength: MRZ.TD1.LENGTH,

  extract([l1 = "", l2 = "", l3 = ""]) {
    const optional1 = field(l1, 15, 30);
    const optional2 = field(l2, 18, 29);

    return buildResult("TD1", {
      documentType:   field(l1, 0, 2),
      issuingCountry: field(l1, 2, 5),
      nameField:      l3,

      documentNumber: checked(l1, 5, 14),
      nationality:    field(l2, 15, 18),
      birthDate:      checked(l2, 0, 6),
      sex:            single(l2, 7),
      expiryDate:     checked(l2, 8, 14),
      optionalData:   optional1 + optional2,

      composite: {
        data:       field(l1, 5, 30) + field(l2, 0, 7) + field(l2, 8, 15) + optional2,
        checkDigit: single(l2, 29),
      },
    });
  },
};

export default TD1;
