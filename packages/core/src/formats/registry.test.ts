import { expect } from "chai";
import { checked, single } from "./layout.js";
import { detectLayout, listLayouts } from "./registry.js";
import { ICAO_TD3, SAMPLE_TD1, SAMPLE_TD2 } from "../testing/fixtures.js";

describe("layout registry", () => {
  it("lists every supported shape", () => {
    expect(listLayouts()).to.deep.equal([
      { format: "TD1", lines: 3, length: 30 },
      { format: "TD2", lines: 2, length: 36 },
      { format: "TD3", lines: 2, length: 44 },
    ]);
  });

  it("detects each listed shape", () => {
    expect(detectLayout(SAMPLE_TD1)?.format).to.equal("TD1");
    expect(detectLayout(SAMPLE_TD2)?.format).to.equal("TD2");
    expect(detectLayout(ICAO_TD3)?.format).to.equal("TD3");
    expect(detectLayout([])).to.equal(undefined);
  });
});

describe("field slicing", () => {
  it("reads one-character fields, letters included", () => {
    expect(single(ICAO_TD3[1], 20)).to.equal("F");
    expect(single(ICAO_TD3[1], 9)).to.equal("6");
    expect(single(ICAO_TD3[1], 44)).to.equal("");
  });

  it("pairs a field with the check digit that follows it", () => {
    expect(checked(ICAO_TD3[1], 13, 19)).to.deep.equal({ data: "740812", checkDigit: "2" });
  });
});
