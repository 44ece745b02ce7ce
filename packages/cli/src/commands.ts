import { readFile } from "node:fs/promises";
import {
  parseAndValidate, buildMRZKey, computeCheckDigit, describeParseError,
  isMRZCharset, isValid, listLayouts, splitLines,
} from "mrzscan-core";
import {
  FramePump, createTesseractRecognizer, extractCAN, extractMRZCandidate,
  loadConfig, quickValidateImage, createLogger, toNumber,
  type FrameRecognizer, type ImageInput, type OcrWorkerFactory, type TesseractRecognizer,
} from "mrzscan-scanner";

/** Where a command reads and writes. The binary wires it to the process. */
export interface CliIO {
  out(line: string): void;
  err(line: string): void;
  /** Reads a file, or stdin for "-". */
  readText(source: string): Promise<string>;
  env: NodeJS.ProcessEnv;
  /** OCR engine for `scan`. Default: tesseract.js, terminated afterwards. */
  recognizer?: FrameRecognizer<ImageInput>;
  /** Worker factory of the default recognizer. */
  createWorker?: OcrWorkerFactory;
}

export const processIO: CliIO = {
  out:      line => console.log(line),
  err:      line => console.error(line),
  readText: source => source === "-" ? readStdin() : readFile(source, "utf8"),
  env:      process.env,
};

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString("utf8");
}

// Flags that take a value; everything else starting with "--" is a switch
const VALUE_FLAGS = new Set(["--lang", "--min-confidence"]);

function getArg(args: readonly string[], name: string): string | undefined {
  const idx = args.indexOf(name);
  return idx !== -1 ? args[idx + 1] : undefined;
}

function positionals(args: readonly string[]): string[] {
  const out: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const a = args[i];
    if (VALUE_FLAGS.has(a)) { i++; continue; }
    if (a.startsWith("--")) continue;
    out.push(a);
  }
  return out;
}

/** MRZ text from the command line: lines separated by "|", "\n" or a literal "\\n". */
async function readMRZ(source: string, io: CliIO): Promise<string> {
  if (source === "-") return io.readText("-");
  return source.replace(/\\n|\|/g, "\n");
}

/**
 * Runs one command line (without the program name) and returns the exit code.
 */
export async function run(argv: readonly string[], io: CliIO = processIO): Promise<number> {
  const cmd: string | undefined = argv[0];
  const args = argv.slice(1);

  switch (cmd) {
    case "parse":       return cmdParse(args, io);
    case "key":         return cmdKey(args, io);
    case "check-digit": return cmdCheckDigit(args, io);
    case "scan":        return cmdScan(args, io);
    case "extract":     return cmdExtract(args, io);
    case "help":
    case undefined:     return cmdHelp(io);
    default:
      io.err(`❌ Unknown command: ${cmd}`);
      cmdHelp(io);
      return 1;
  }
}

// ── parse ─────────────────────────────────────────────────────────────────────

async function cmdParse(args: string[], io: CliIO): Promise<number> {
  const source: string | undefined = positionals(args)[0];
  if (source === undefined) {
    io.err("❌ Usage: mrzscan parse <mrz|-> [--lenient]");
    return 1;
  }

  const parsed = parseAndValidate(await readMRZ(source, io), { strict: !args.includes("--lenient") });
  if (!parsed.ok) {
    io.err(`❌ ${describeParseError(parsed.error)}`);
    return 1;
  }

  const valid = isValid(parsed.value.checks);
  io.out(JSON.stringify({ ...parsed.value, isValid: valid }, null, 2));
  return valid ? 0 : 2;
}

// ── key ───────────────────────────────────────────────────────────────────────

async function cmdKey(args: string[], io: CliIO): Promise<number> {
  const source: string | undefined = positionals(args)[0];
  if (source === undefined) {
    io.err("❌ Usage: mrzscan key <mrz|-> [--lenient]");
    return 1;
  }

  const key = buildMRZKey(await readMRZ(source, io), { strict: !args.includes("--lenient") });
  if (!key.ok) {
    io.err(`❌ ${describeParseError(key.error)}`);
    return 1;
  }

  io.out(key.value);
  return 0;
}

// ── check-digit ───────────────────────────────────────────────────────────────

function cmdCheckDigit(args: string[], io: CliIO): number {
  const field: string | undefined = positionals(args)[0]?.toUpperCase();
  if (field === undefined || !isMRZCharset(field)) {
    io.err("❌ Usage: mrzscan check-digit <data>   (A-Z, 0-9 and '<' only)");
    return 1;
  }

  io.out(computeCheckDigit(field));
  return 0;
}

// ── scan ──────────────────────────────────────────────────────────────────────

async function cmdScan(args: string[], io: CliIO): Promise<number> {
  const images = positionals(args);
  if (images.length === 0) {
    io.err("❌ Usage: mrzscan scan <image...> [--lang eng] [--min-confidence 0.4] [--verbose]");
    return 1;
  }

  const config        = loadConfig(io.env);
  const lang          = getArg(args, "--lang") ?? config.lang;
  const verbose       = args.includes("--verbose") || config.verbose;
  const minConfRaw    = getArg(args, "--min-confidence");
  const minConfidence = minConfRaw !== undefined ? toNumber(minConfRaw) : config.minConfidence;
  const skipCheck     = args.includes("--skip-image-check");

  if (minConfidence === undefined || minConfidence < 0 || minConfidence > 1) {
    io.err(`❌ --min-confidence must be between 0 and 1 (got ${minConfRaw})`);
    return 1;
  }

  let tesseract: TesseractRecognizer | undefined;
  const recognizer = io.recognizer
    ?? (tesseract = createTesseractRecognizer({ lang, verbose, createWorker: io.createWorker }));
  const pump = new FramePump(recognizer, { minConfidence, log: createLogger(verbose) });

  let accepted = 0;
  try {
    for (const image of images) {
      if (!skipCheck) {
        const check = await quickValidateImage(image, { minWidth: config.minWidth, minHeight: config.minHeight });
        if (!check.valid) {
          io.err(`❌ ${image}: ${check.error}`);
          continue;
        }
      }

      const outcome = await pump.submit(image);
      const result  = pump.results.poll();
      if (outcome !== "accepted" || !result) {
        io.out(`⏭  ${image}: ${outcome}`);
        continue;
      }

      accepted++;
      const parsed = parseAndValidate(result.mrz);
      const status = !parsed.ok
        ? describeParseError(parsed.error)
        : `${parsed.value.format}, check digits ${isValid(parsed.value.checks) ? "OK" : "FAIL"}`;

      io.out(`✅ ${image}: ${status}`);
      for (const line of result.mrz.split("\n")) io.out(`   ${line}`);
      if (result.can) io.out(`   CAN: ${result.can}`);
    }
  } finally {
    await tesseract?.terminate();
  }

  return accepted > 0 ? 0 : 1;
}

// ── extract ───────────────────────────────────────────────────────────────────

async function cmdExtract(args: string[], io: CliIO): Promise<number> {
  const source: string | undefined = positionals(args)[0];
  if (source === undefined) {
    io.err("❌ Usage: mrzscan extract <file|->");
    return 1;
  }

  const lines = splitLines((await io.readText(source)).replace(/\r\n?/g, "\n"));
  const mrz   = extractMRZCandidate(lines);
  const can   = extractCAN(lines);

  if (mrz) {
    io.out("MRZ:");
    for (const line of mrz.split("\n")) io.out(`  ${line}`);
  } else {
    io.out("MRZ: none");
  }
  io.out(`CAN: ${can ?? "none"}`);

  return mrz ? 0 : 1;
}

// ── help ──────────────────────────────────────────────────────────────────────

function cmdHelp(io: CliIO): number {
  const layouts = listLayouts()
    .map(l => `  ${l.format}   ${l.lines} lines × ${l.length} characters`)
    .join("\n");

  io.out(`
mrzscan — read and check Machine Readable Zones of travel documents

COMMANDS:

  parse <mrz|->            Parse an MRZ and print its fields as JSON
                           Lines separated by "|" or "\\n"; "-" reads stdin
    --lenient              Drop characters outside A-Z, 0-9, '<' instead of rejecting
                           Exit code: 0 valid, 1 rejected, 2 check digits fail

  key <mrz|->              Print the MRZ key used for chip access (BAC/PACE)

  check-digit <data>       Print the ICAO 9303 check digit of a field

  scan <image...>          OCR photos of a document and print MRZ + CAN
    --lang <code>          Tesseract language (default: eng)
    --min-confidence <n>   Ignore OCR lines below n, 0-1 (default: 0.4)
    --skip-image-check     Do not check the image size first
    --verbose              Show progress

  extract <file|->         Find the MRZ and CAN in a text file of OCR lines

LAYOUTS:

${layouts}

ENVIRONMENT:

  MRZSCAN_OCR_LANG, MRZSCAN_MIN_CONFIDENCE, MRZSCAN_VERBOSE,
  MRZSCAN_MIN_WIDTH, MRZSCAN_MIN_HEIGHT

EXAMPLES:

  mrzscan parse "P<UTOERIKSSON<<ANNA<MARIA<<<<<<<<<<<<<<<<<<<|L898902C36UTO7408122F1204159ZE184226B<<<<<10"
  mrzscan check-digit L898902C3
  mrzscan scan passport.jpg --verbose
`);
  return 0;
}
