import { MRZ } from "mrzscan-core";

/**
 * Runtime settings of the scanner, read from the environment:
 *
 *   MRZSCAN_OCR_LANG         tesseract language (default "eng")
 *   MRZSCAN_MIN_CONFIDENCE   OCR line floor in [0,1] (default 0.4)
 *   MRZSCAN_VERBOSE          "1" / "true" turns on progress logging
 *   MRZSCAN_MIN_WIDTH        image pre-check, pixels (default 600)
 *   MRZSCAN_MIN_HEIGHT       image pre-check, pixels (default 300)
 */
export interface ScannerConfig {
  readonly lang:          string;
  readonly minConfidence: number;
  readonly verbose:       boolean;
  readonly minWidth:      number;
  readonly minHeight:     number;
}

export const DEFAULT_CONFIG: ScannerConfig = Object.freeze({
  lang:          "eng",
  minConfidence: MRZ.MIN_OCR_CONFIDENCE,
  verbose:       false,
  minWidth:      600,
  minHeight:     300,
});

/**
 * Whole-string numeric parse: "0.5abc", "" and "Infinity" give undefined.
 */
export function toNumber(raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === "") return undefined;
  const n = Number(raw);
  return Number.isFinite(n) ? n : undefined;
}

const isConfidence = (n: number | undefined): n is number => n !== undefined && n >= 0 && n <= 1;
const isPixels     = (n: number | undefined): n is number => n !== undefined && Number.isInteger(n) && n > 0;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ScannerConfig {
  const minConfidence = toNumber(env.MRZSCAN_MIN_CONFIDENCE);
  const minWidth      = toNumber(env.MRZSCAN_MIN_WIDTH);
  const minHeight     = toNumber(env.MRZSCAN_MIN_HEIGHT);

  return Object.freeze({
    lang:          env.MRZSCAN_OCR_LANG || DEFAULT_CONFIG.lang,
    minConfidence: isConfidence(minConfidence) ? minConfidence : DEFAULT_CONFIG.minConfidence,
    verbose:       env.MRZSCAN_VERBOSE === "1" || env.MRZSCAN_VERBOSE === "true",
    minWidth:      isPixels(minWidth)  ? minWidth  : DEFAULT_CONFIG.minWidth,
    minHeight:     isPixels(minHeight) ? minHeight : DEFAULT_CONFIG.minHeight,
  });
}
