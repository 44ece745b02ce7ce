import { expect } from "chai";
import { ICAO_TD3, flip } from "mrzscan-core/testing";
import type { FrameRecognizer, ImageInput, OcrLine } from "mrzscan-scanner";
import { run, type CliIO } from "./commands.js";

interface CapturedIO extends CliIO {
  stdout: string[];
  stderr: string[];
}

function captureIO(files: Record<string, string> = {}, recognizer?: FrameRecognizer<ImageInput>): CapturedIO {
  const stdout: string[] = [];
  const stderr: string[] = [];
  return {
    stdout,
    stderr,
    out: line => { stdout.push(line); },
    err: line => { stderr.push(line); },
    readText: async source => {
      const text = files[source];
      if (text === undefined) throw new Error(`ENOENT: ${source}`);
      return text;
    },
    env: {},
    recognizer,
  };
}

const [L1, L2] = ICAO_TD3;
const PIPED = `${L1}|${L2}`;

describe("mrzscan parse", () => {
  it("prints the fields as JSON and exits 0 on a valid MRZ", async () => {
    const io   = captureIO();
    const code = await run(["parse", PIPED], io);

    expect(code).to.equal(0);
    const json = JSON.parse(io.stdout.join("\n"));
    expect(json).to.include({
      format:         "TD3",
      surnames:       "ERIKSSON",
      givenNames:     "ANNA MARIA",
      documentNumber: "L898902C3",
      nationality:    "UTO",
      sex:            "F",
      isValid:        true,
    });
  });

  it("accepts a literal \\n separator", async () => {
    expect(await run(["parse", `${L1}\\n${L2}`], captureIO())).to.equal(0);
  });

  it("reads stdin for '-'", async () => {
    const io = captureIO({ "-": `${L1}\n${L2}\n` });
    expect(await run(["parse", "-"], io)).to.equal(0);
  });

  it("exits 2 when a check digit fails", async () => {
    const io   = captureIO();
    const code = await run(["parse", `${L1}|${flip(L2, 19)}`], io);

    expect(code).to.equal(2);
    expect(JSON.parse(io.stdout.join("\n")).isValid).to.equal(false);
  });

  it("exits 1 with the reason on a structural error", async () => {
    const io = captureIO();
    expect(await run(["parse", "ONLY ONE LINE"], io)).to.equal(1);
    expect(io.stderr).to.deep.equal(["❌ MRZ incomplete: at least 2 lines are required"]);
    expect(io.stdout).to.deep.equal([]);
  });

  it("rejects stray characters unless --lenient", async () => {
    const dirty = `${L1.slice(0, 5)}#${L1.slice(5)}|${L2}`;

    const strict = captureIO();
    expect(await run(["parse", dirty], strict)).to.equal(1);
    expect(strict.stderr).to.deep.equal(["❌ MRZ contains characters outside A-Z, 0-9 and '<'"]);

    expect(await run(["parse", dirty, "--lenient"], captureIO())).to.equal(0);
  });

  it("prints usage without an argument", async () => {
    const io = captureIO();
    expect(await run(["parse"], io)).to.equal(1);
    expect(io.stderr).to.deep.equal(["❌ Usage: mrzscan parse <mrz|-> [--lenient]"]);
  });
});

describe("mrzscan key", () => {
  it("prints the MRZ key", async () => {
    const io = captureIO();
    expect(await run(["key", PIPED], io)).to.equal(0);
    expect(io.stdout).to.deep.equal(["L898902C3674081221204159"]);
  });

  it("prints the key even when a check digit fails", async () => {
    const io = captureIO();
    expect(await run(["key", `${L1}|${flip(L2, 19)}`], io)).to.equal(0);
    expect(io.stdout).to.deep.equal(["L898902C3674081231204159"]);
  });

  it("exits 1 on a structural error", async () => {
    const io = captureIO();
    expect(await run(["key", `${L1.slice(1)}|${L2}`], io)).to.equal(1);
    expect(io.stderr).to.deep.equal(["❌ Line lengths match no MRZ layout (3×30, 2×36, 2×44)"]);
  });
});

describe("mrzscan check-digit", () => {
  it("prints the ICAO check digit", async () => {
    const io = captureIO();
    expect(await run(["check-digit", "L898902C3"], io)).to.equal(0);
    expect(io.stdout).to.deep.equal(["6"]);
  });

  it("uppercases its input", async () => {
    const io = captureIO();
    await run(["check-digit", "l898902c3"], io);
    expect(io.stdout).to.deep.equal(["6"]);
  });

  it("rejects characters outside the MRZ alphabet", async () => {
    const io = captureIO();
    expect(await run(["check-digit", "AB-12"], io)).to.equal(1);
    expect(io.stdout).to.deep.equal([]);
  });
});

describe("mrzscan extract", () => {
  it("prints the candidate and the CAN", async () => {
    const io = captureIO({
      "frame.txt": ["PASSPORT", L2, "CAN 482391", L1].join("\r\n"),
    });

    expect(await run(["extract", "frame.txt"], io)).to.equal(0);
    expect(io.stdout).to.deep.equal(["MRZ:", `  ${L1}`, `  ${L2}`, "CAN: 482391"]);
  });

  it("exits 1 when there is no MRZ", async () => {
    const io = captureIO({ "frame.txt": "NOTHING HERE\n" });
    expect(await run(["extract", "frame.txt"], io)).to.equal(1);
    expect(io.stdout).to.deep.equal(["MRZ: none", "CAN: none"]);
  });
});

describe("mrzscan scan", () => {
  const line = (text: string): OcrLine => ({ text, confidence: 0.9 });
  const frames: Record<string, OcrLine[]> = {
    "front.png": [line(L1), line(L2), line("CAN 482391")],
    "again.png": [line(L2), line(L1), line("CAN 482391")],
    "blank.png": [],
  };
  const recognizer: FrameRecognizer<ImageInput> = {
    recognize: async image => typeof image === "string" ? frames[image] ?? [] : [],
  };

  it("prints each accepted result once", async () => {
    const io   = captureIO({}, recognizer);
    const code = await run(["scan", "front.png", "again.png", "--skip-image-check"], io);

    expect(code).to.equal(0);
    expect(io.stdout).to.deep.equal([
      "✅ front.png: TD3, check digits OK",
      `   ${L1}`,
      `   ${L2}`,
      "   CAN: 482391",
      "⏭  again.png: duplicate",
    ]);
  });

  it("exits 1 when no frame yields an MRZ", async () => {
    const io = captureIO({}, recognizer);
    expect(await run(["scan", "blank.png", "--skip-image-check"], io)).to.equal(1);
    expect(io.stdout).to.deep.equal(["⏭  blank.png: no-candidate"]);
  });

  it("validates --min-confidence", async () => {
    const io = captureIO({}, recognizer);
    expect(await run(["scan", "front.png", "--min-confidence", "2"], io)).to.equal(1);
    expect(io.stderr).to.deep.equal(["❌ --min-confidence must be between 0 and 1 (got 2)"]);
  });

  it("rejects --min-confidence with trailing junk", async () => {
    const io = captureIO({}, recognizer);
    expect(await run(["scan", "front.png", "--min-confidence", "0.5abc"], io)).to.equal(1);
    expect(io.stderr).to.deep.equal(["❌ --min-confidence must be between 0 and 1 (got 0.5abc)"]);
  });

  it("reports every frame when the OCR worker cannot start", async () => {
    const io = captureIO();
    io.createWorker = async () => { throw new Error("traineddata download failed"); };

    expect(await run(["scan", "front.png", "again.png", "--skip-image-check"], io)).to.equal(1);
    expect(io.stdout).to.deep.equal(["⏭  front.png: rejected", "⏭  again.png: rejected"]);
  });

  it("applies --min-confidence to the OCR lines", async () => {
    const io = captureIO({}, recognizer);
    expect(await run(["scan", "front.png", "--min-confidence", "0.95", "--skip-image-check"], io)).to.equal(1);
    expect(io.stdout).to.deep.equal(["⏭  front.png: no-candidate"]);
  });
});

describe("mrzscan help", () => {
  it("prints the commands", async () => {
    const io = captureIO();
    expect(await run(["help"], io)).to.equal(0);
    expect(io.stdout.join("\n")).to.contain("check-digit <data>");
  });

  it("lists the supported layouts", async () => {
    const io = captureIO();
    await run(["help"], io);
    const help = io.stdout.join("\n").split("\n");
    expect(help).to.include.members([
      "  TD1   3 lines × 30 characters",
      "  TD2   2 lines × 36 characters",
      "  TD3   2 lines × 44 characters",
    ]);
  });

  it("rejects an unknown command", async () => {
    const io = captureIO();
    expect(await run(["frobnicate"], io)).to.equal(1);
    expect(io.stderr).to.deep.equal(["❌ Unknown command: frobnicate"]);
  });
});
