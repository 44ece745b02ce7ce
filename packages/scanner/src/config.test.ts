import { expect } from "chai";
import { DEFAULT_CONFIG, loadConfig, toNumber } from "./config.js";

describe("loadConfig", () => {
  it("uses the defaults on an empty environment", () => {
    expect(loadConfig({})).to.deep.equal({
      lang:          "eng",
      minConfidence: 0.4,
      verbose:       false,
      minWidth:      600,
      minHeight:     300,
    });
  });

  it("reads every MRZSCAN_* variable", () => {
    const cfg = loadConfig({
      MRZSCAN_OCR_LANG:       "eng+fra",
      MRZSCAN_MIN_CONFIDENCE: "0.75",
      MRZSCAN_VERBOSE:        "true",
      MRZSCAN_MIN_WIDTH:      "1024",
      MRZSCAN_MIN_HEIGHT:     "512",
    });
    expect(cfg).to.deep.equal({
      lang:          "eng+fra",
      minConfidence: 0.75,
      verbose:       true,
      minWidth:      1024,
      minHeight:     512,
    });
    expect(Object.isFrozen(cfg)).to.equal(true);
  });

  it("ignores out-of-range or malformed values", () => {
    const cfg = loadConfig({
      MRZSCAN_MIN_CONFIDENCE: "1.5",
      MRZSCAN_VERBOSE:        "yes",
      MRZSCAN_MIN_WIDTH:      "-10",
      MRZSCAN_MIN_HEIGHT:     "tall",
    });
    expect(cfg.minConfidence).to.equal(DEFAULT_CONFIG.minConfidence);
    expect(cfg.verbose).to.equal(false);
    expect(cfg.minWidth).to.equal(600);
    expect(cfg.minHeight).to.equal(300);
  });

  it("rejects numbers with trailing junk", () => {
    const cfg = loadConfig({
      MRZSCAN_MIN_CONFIDENCE: "0.5abc",
      MRZSCAN_MIN_WIDTH:      "800px",
      MRZSCAN_MIN_HEIGHT:     "400.5",
    });
    expect(cfg.minConfidence).to.equal(0.4);
    expect(cfg.minWidth).to.equal(600);
    expect(cfg.minHeight).to.equal(300);
  });

  it("does not read an empty value as zero", () => {
    expect(loadConfig({ MRZSCAN_MIN_CONFIDENCE: "" }).minConfidence).to.equal(0.4);
    expect(loadConfig({ MRZSCAN_MIN_CONFIDENCE: "  " }).minConfidence).to.equal(0.4);
  });

  it("accepts \"1\" for verbose", () => {
    expect(loadConfig({ MRZSCAN_VERBOSE: "1" }).verbose).to.equal(true);
  });
});

describe("toNumber", () => {
  it("parses whole strings only", () => {
    expect(toNumber("0.75")).to.equal(0.75);
    expect(toNumber(" 12 ")).to.equal(12);
    expect(toNumber("0.5abc")).to.equal(undefined);
    expect(toNumber("Infinity")).to.equal(undefined);
    expect(toNumber("")).to.equal(undefined);
    expect(toNumber(undefined)).to.equal(undefined);
  });
});
