import Tesseract from "tesseract.js";
import { DEFAULT_CONFIG } from "./config.js";
import { errorMessage } from "./log.js";
import type { FrameRecognizer, OcrLine } from "./frame-pump.js";

export type ImageInput = string | Buffer;

export type OcrLogger = (m: Tesseract.LoggerMessage) => void;

/** The part of a tesseract.js worker the recognizer drives. */
export interface OcrWorker {
  recognize(
    image:   ImageInput,
    options: object,
    output:  { text: boolean; blocks: boolean }
  ): Promise<{ data: OcrPage }>;
  terminate(): Promise<unknown>;
}

export type OcrWorkerFactory = (lang: string, logger: OcrLogger) => Promise<OcrWorker>;

export interface TesseractOptions {
  lang?:    string;   // default "eng"
  verbose?: boolean;
  /** Default: `Tesseract.createWorker` with the LSTM engine. */
  createWorker?: OcrWorkerFactory;
}

export interface TesseractRecognizer extends FrameRecognizer<ImageInput> {
  /** Releases the worker. The next recognize() starts a new one. */
  terminate(): Promise<void>;
}

/** The parts of a Tesseract page the scanner reads. */
export interface OcrPage {
  text:       string;
  confidence: number;
  blocks: Array<{
    paragraphs: Array<{
      lines: Array<{ text: string; confidence: number }>;
    }>;
  }> | null;
}

/**
 * Flattens a recognized page into text lines with confidence in [0, 1].
 * Tesseract reports 0–100. A page without layout falls back to its plain
 * text, every line carrying the page confidence.
 */
export function pageToLines(page: OcrPage): OcrLine[] {
  const toLine = (text: string, confidence: number): OcrLine =>
    ({ text: text.trim(), confidence: confidence / 100 });

  if (page.blocks && page.blocks.length > 0) {
    return page.blocks
      .flatMap(b => b.paragraphs)
      .flatMap(p => p.lines)
      .map(l => toLine(l.text, l.confidence))
      .filter(l => l.text.length > 0);
  }

  return page.text
    .split("\n")
    .map(t => toLine(t, page.confidence))
    .filter(l => l.text.length > 0);
}

const lstmWorker: OcrWorkerFactory = (lang, logger) =>
  Tesseract.createWorker(lang, Tesseract.OEM.LSTM_ONLY, { logger });

/**
 * Tesseract.js recognizer for the frame pump.
 *
 * On-demand: the worker is created on the first frame and kept until
 * terminate(), so consecutive frames don't pay the start-up cost again.
 * A worker that fails to start is forgotten; the next frame tries again.
 */
export function createTesseractRecognizer(opts: TesseractOptions = {}): TesseractRecognizer {
  const lang         = opts.lang ?? DEFAULT_CONFIG.lang;
  const createWorker = opts.createWorker ?? lstmWorker;
  let worker: Promise<OcrWorker> | undefined;

  const logger: OcrLogger = opts.verbose
    ? m => process.stderr.write(`[OCR] ${m.status} ${Math.round((m.progress ?? 0) * 100)}%\r`)
    : () => {};

  const getWorker = (): Promise<OcrWorker> => {
    if (worker) return worker;

    const starting = createWorker(lang, logger);
    worker = starting;
    // Forget a failed start so the next frame tries again
    starting.catch(() => {
      if (worker === starting) worker = undefined;
    });
    return starting;
  };

  return {
    async recognize(frame: ImageInput): Promise<OcrLine[]> {
      const w = await getWorker();
      const { data } = await w.recognize(frame, {}, { text: true, blocks: true });
      if (opts.verbose) process.stderr.write("\n");
      return pageToLines(data);
    },

    async terminate(): Promise<void> {
      const pending = worker;
      worker = undefined;
      if (!pending) return;
      // A worker that never started has nothing to release
      const started = await pending.catch(() => undefined);
      await started?.terminate();
    },
  };
}

// ── Image pre-check ───────────────────────────────────────────────────────────

export interface ImageValidation {
  valid:   boolean;
  error?:  string;
  width?:  number;
  height?: number;
}

/**
 * Checks that an image is large enough for the MRZ to be legible before
 * running OCR. Reads metadata only: sharp does not decode the pixels.
 */
export async function quickValidateImage(
  image: ImageInput,
  opts:  { minWidth?: number; minHeight?: number } = {}
): Promise<ImageValidation> {
  const minWidth  = opts.minWidth  ?? DEFAULT_CONFIG.minWidth;
  const minHeight = opts.minHeight ?? DEFAULT_CONFIG.minHeight;

  try {
    // Dynamic import so sharp only loads when an image is actually checked
    const sharp = (await import("sharp")).default;
    const meta  = await sharp(image).metadata();

    if (!meta.width || !meta.height) {
      return { valid: false, error: "Could not read image dimensions" };
    }

    // Either orientation: the document may be photographed rotated
    const long  = Math.max(meta.width, meta.height);
    const short = Math.min(meta.width, meta.height);
    if (long < minWidth || short < minHeight) {
      return {
        valid:  false,
        error:  `Image too small (${meta.width}×${meta.height}). Use at least ${minWidth}×${minHeight} pixels`,
        width:  meta.width,
        height: meta.height,
      };
    }

    return { valid: true, width: meta.width, height: meta.height };
  } catch (e) {
    return { valid: false, error: `Could not read image: ${errorMessage(e)}` };
  }
}
