export type FetchErrorKind = "invalid-url" | "blocked" | "timeout" | "network" | "status" | "redirect";

/**
 * The page snapshot could not be captured. This is the only error that
 * crosses the engine boundary; no partial diagnosis is produced.
 */
export class FetchError extends Error {
  readonly url: string;
  readonly kind: FetchErrorKind;
  readonly statusCode?: number;

  constructor(
    url: string,
    kind: FetchErrorKind,
    message: string,
    options: { statusCode?: number; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = "FetchError";
    this.url = url;
    this.kind = kind;
    this.statusCode = options.statusCode;
  }
}

/** A single sub-check failed; the analyzer records it as an issue and moves on. */
export class SubCheckError extends Error {
  readonly check: string;

  constructor(check: string, message: string, options: { cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "SubCheckError";
    this.check = check;
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  return String(error);
}
