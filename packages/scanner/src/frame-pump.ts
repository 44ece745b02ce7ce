import { MRZ, mrzFingerprint, parseAndValidate, describeParseError } from "mrzscan-core";
import { extractMRZCandidate } from "./candidate.js";
import { extractCAN } from "./can.js";
import { createLogger, errorMessage, type Logger } from "./log.js";

// ── Collaborator contract ─────────────────────────────────────────────────────

export interface OcrLine {
  text:       string;
  /** In [0, 1] */
  confidence: number;
}

/** The OCR engine, seen as a black box turning one frame into text lines. */
export interface FrameRecognizer<F> {
  recognize(frame: F): Promise<OcrLine[]>;
}

export interface ScanResult {
  mrz:  string;
  can?: string;
}

export type FrameOutcome =
  | "dropped"        // another frame was still in flight
  | "rejected"       // the recognizer failed on this frame
  | "no-candidate"   // no MRZ-shaped lines
  | "invalid"        // candidate failed structural parsing (requireValidMRZ only)
  | "duplicate"      // same (mrz, can) as the last accepted result
  | "accepted";

// ── In-flight gate ────────────────────────────────────────────────────────────

/**
 * At most one frame in flight. Frames arriving while the gate is held are
 * dropped, never queued.
 */
export class FrameGate {
  private inFlight = false;

  tryEnter(): boolean {
    if (this.inFlight) return false;
    this.inFlight = true;
    return true;
  }

  leave(): void {
    this.inFlight = false;
  }

  get busy(): boolean { return this.inFlight; }
}

// ── De-duplication (LRU of one) ───────────────────────────────────────────────

export class ResultDeduper {
  private last?: ScanResult;

  /** True when (mrz, can) differs from the last accepted pair; records it. */
  accept(mrz: string, can: string | undefined): boolean {
    if (this.last && this.last.mrz === mrz && this.last.can === can) return false;
    this.last = { mrz, can };
    return true;
  }

  /** New scanning session */
  reset(): void {
    this.last = undefined;
  }
}

// ── Latest-value channel ──────────────────────────────────────────────────────

/**
 * Holds at most one pending value. A new value replaces an unread one, so a
 * slow reader only ever sees the latest result.
 */
export class LatestValue<T> {
  private pending: { value: T } | undefined;
  private waiters: Array<(value: T) => void> = [];

  offer(value: T): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(value);
      return;
    }
    this.pending = { value };
  }

  poll(): T | undefined {
    const p = this.pending;
    this.pending = undefined;
    return p?.value;
  }

  /** Resolves with the next value; immediately if one is pending. */
  next(signal?: AbortSignal): Promise<T> {
    const p = this.pending;
    if (p) {
      this.pending = undefined;
      return Promise.resolve(p.value);
    }

    return new Promise<T>((resolve, reject) => {
      if (signal?.aborted) {
        reject(signal.reason);
        return;
      }
      const onAbort = () => {
        this.waiters = this.waiters.filter(w => w !== waiter);
        reject(signal?.reason);
      };
      const waiter = (value: T) => {
        signal?.removeEventListener("abort", onAbort);
        resolve(value);
      };
      this.waiters.push(waiter);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }

  clear(): void {
    this.pending = undefined;
  }

  get hasPending(): boolean { return this.pending !== undefined; }
}

// ── Frame pump ────────────────────────────────────────────────────────────────

export interface FramePumpOptions {
  /** OCR lines below this confidence are ignored. Default: 0.4 */
  minConfidence?:   number;
  /** Only accept candidates that parse structurally (right shape and charset). */
  requireValidMRZ?: boolean;
  verbose?:         boolean;
  log?:             Logger;
}

/**
 * Drives recognition frame by frame:
 *   gate → OCR → confidence floor → MRZ candidate + CAN → de-dup → channel
 *
 * All mutable scan state (in-flight flag, last accepted result) lives here;
 * the heuristics it calls are pure.
 */
export class FramePump<F> {
  readonly results = new LatestValue<ScanResult>();

  private readonly gate  = new FrameGate();
  private readonly dedup = new ResultDeduper();
  private readonly minConfidence: number;
  private readonly requireValidMRZ: boolean;
  private readonly log: Logger;

  constructor(
    private readonly recognizer: FrameRecognizer<F>,
    opts: FramePumpOptions = {}
  ) {
    this.minConfidence   = opts.minConfidence ?? MRZ.MIN_OCR_CONFIDENCE;
    this.requireValidMRZ = opts.requireValidMRZ ?? false;
    this.log             = opts.log ?? createLogger(opts.verbose);
  }

  async submit(frame: F): Promise<FrameOutcome> {
    if (!this.gate.tryEnter()) return "dropped";

    try {
      let lines: OcrLine[];
      try {
        lines = await this.recognizer.recognize(frame);
      } catch (e) {
        this.log(`OCR failed: ${errorMessage(e)}`);
        return "rejected";
      }
      return this.accept(lines);
    } finally {
      this.gate.leave();
    }
  }

  /**
   * Runs the heuristics over lines already recognized for one frame.
   * Synchronous; does not touch the gate.
   */
  accept(lines: readonly OcrLine[]): FrameOutcome {
    const texts = lines
      .filter(l => l.confidence >= this.minConfidence)
      .map(l => l.text);

    const mrz = extractMRZCandidate(texts);
    if (!mrz) return "no-candidate";

    if (this.requireValidMRZ) {
      const parsed = parseAndValidate(mrz);
      if (!parsed.ok) {
        this.log(`Candidate skipped: ${describeParseError(parsed.error)}`);
        return "invalid";
      }
      this.log(`MRZ ${parsed.value.format} ${mrzFingerprint(parsed.value).slice(0, 16)}...`);
    }

    const can = extractCAN(texts);
    if (!this.dedup.accept(mrz, can)) return "duplicate";

    this.results.offer(can === undefined ? { mrz } : { mrz, can });
    this.log(`✓ Result accepted${can ? " (with CAN)" : ""}`);
    return "accepted";
  }

  /** Starts a new scanning session: forgets the last result and any unread one. */
  reset(): void {
    this.dedup.reset();
    this.results.clear();
  }

  get busy(): boolean { return this.gate.busy; }
}
