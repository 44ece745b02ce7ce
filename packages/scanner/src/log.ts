export type Logger = (msg: string) => void;

/** Tagged progress lines on stderr, only when verbose. */
export function createLogger(verbose: boolean | undefined, tag = "mrzscan"): Logger {
  return (msg: string) => {
    if (verbose) process.stderr.write(`[${tag}] ${msg}\n`);
  };
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
