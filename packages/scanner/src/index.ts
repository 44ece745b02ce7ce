import {
  parseAndValidate, isValid, mrzFingerprint, describeParseError,
  type MRZParseError, type MRZResult, type Result,
} from "mrzscan-core";
import { extractMRZCandidate } from "./candidate.js";
import { extractCAN } from "./can.js";
import { DEFAULT_CONFIG } from "./config.js";
import type { FrameRecognizer } from "./frame-pump.js";
import { createLogger, errorMessage } from "./log.js";
import {
  createTesseractRecognizer, quickValidateImage,
  type ImageInput, type OcrWorkerFactory, type TesseractRecognizer,
} from "./ocr.js";

export interface ScanImageOptions {
  /** Defaults to a one-shot tesseract.js recognizer, terminated afterwards. */
  recognizer?:    FrameRecognizer<ImageInput>;
  lang?:          string;
  /** Worker factory for the default recognizer. */
  createWorker?:  OcrWorkerFactory;
  minConfidence?: number;
  minWidth?:      number;
  minHeight?:     number;
  /** Skip the sharp dimension check (e.g. for in-memory crops). */
  skipImageCheck?: boolean;
  verbose?:       boolean;
}

type Step = "ok" | "fail" | "skip";

export interface ScanImageResult {
  success: boolean;
  mrz?:    string;
  can?:    string;
  parsed?: Result<MRZResult, MRZParseError>;
  errors:  string[];
  steps: {
    image_check: Step;
    ocr:         Step;
    candidate:   Step;
    parse:       Step;
    checksums:   Step;
  };
}

/**
 * One-shot scan of a still image: pre-check → OCR → MRZ candidate + CAN → parse.
 * `success` means a structurally valid MRZ whose primary check digits match.
 */
export async function scanImage(image: ImageInput, opts: ScanImageOptions = {}): Promise<ScanImageResult> {
  const errors: string[] = [];
  const steps: ScanImageResult["steps"] = {
    image_check: "skip",
    ocr:         "skip",
    candidate:   "skip",
    parse:       "skip",
    checksums:   "skip",
  };
  const log = createLogger(opts.verbose);

  // ── STEP 1: image size ──────────────────────────────────────────────────────
  if (!opts.skipImageCheck) {
    log("Checking image...");
    const check = await quickValidateImage(image, { minWidth: opts.minWidth, minHeight: opts.minHeight });
    if (!check.valid) {
      errors.push(`Image: ${check.error}`);
      steps.image_check = "fail";
      return { success: false, errors, steps };
    }
    steps.image_check = "ok";
  }

  // ── STEP 2: OCR ─────────────────────────────────────────────────────────────
  log("Recognizing text...");
  let owned: TesseractRecognizer | undefined;
  const recognizer = opts.recognizer
    ?? (owned = createTesseractRecognizer({
      lang:         opts.lang,
      verbose:      opts.verbose,
      createWorker: opts.createWorker,
    }));

  let texts: string[];
  try {
    const minConfidence = opts.minConfidence ?? DEFAULT_CONFIG.minConfidence;
    const lines = await recognizer.recognize(image);
    texts = lines.filter(l => l.confidence >= minConfidence).map(l => l.text);
  } catch (e) {
    errors.push(`OCR failed: ${errorMessage(e)}`);
    steps.ocr = "fail";
    return { success: false, errors, steps };
  } finally {
    await owned?.terminate();
  }
  steps.ocr = "ok";
  log(`✓ ${texts.length} lines above the confidence floor`);

  // ── STEP 3: candidate + CAN ─────────────────────────────────────────────────
  const mrz = extractMRZCandidate(texts);
  const can = extractCAN(texts);
  if (can) log("✓ CAN found");
  if (!mrz) {
    errors.push("No MRZ found in the image");
    steps.candidate = "fail";
    return { success: false, can, errors, steps };
  }
  steps.candidate = "ok";

  // ── STEP 4: parse + checksums ───────────────────────────────────────────────
  const parsed = parseAndValidate(mrz);
  if (!parsed.ok) {
    errors.push(describeParseError(parsed.error));
    steps.parse = "fail";
    return { success: false, mrz, can, parsed, errors, steps };
  }
  steps.parse = "ok";
  log(`✓ ${parsed.value.format} — ${mrzFingerprint(parsed.value).slice(0, 16)}...`);

  const valid = isValid(parsed.value.checks);
  steps.checksums = valid ? "ok" : "fail";
  if (!valid) errors.push("MRZ check digits do not match (misread or altered document)");

  return { success: valid, mrz, can, parsed, errors, steps };
}

export { extractMRZCandidate }                 from "./candidate.js";
export { extractCAN }                          from "./can.js";
export { loadConfig, toNumber, DEFAULT_CONFIG, type ScannerConfig } from "./config.js";
export { createLogger, errorMessage, type Logger } from "./log.js";
export {
  FramePump, FrameGate, ResultDeduper, LatestValue,
  type FramePumpOptions, type FrameRecognizer, type FrameOutcome, type OcrLine, type ScanResult,
} from "./frame-pump.js";
export {
  createTesseractRecognizer, quickValidateImage, pageToLines,
  type TesseractRecognizer, type TesseractOptions, type ImageInput, type ImageValidation, type OcrPage,
  type OcrWorker, type OcrWorkerFactory, type OcrLogger,
} from "./ocr.js";
