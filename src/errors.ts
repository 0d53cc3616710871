// src/errors.ts

/**
 * Base class for every error a redirect exchange can reject with.
 * Every error is terminal for the whole call: nothing is retried and no
 * partial redirect chain is returned.
 */
export class RedirectClientError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Any failure of the underlying transport's send. */
export class TransportError extends RedirectClientError {
  constructor(message: string, options?: { cause?: unknown; code?: string }) {
    super(message, options?.code ?? "ETRANSPORT", { cause: options?.cause });
  }
}

export class RequestTimeoutError extends TransportError {
  constructor(public readonly timeoutMs: number) {
    super(`Request timed out after ${timeoutMs}ms`, { code: "ETIMEDOUT" });
  }
}

/** The current request state could not be turned into a valid wire request. */
export class RequestBuildError extends RedirectClientError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "EBUILD", options);
  }
}

/** A redirect `Location` value failed to parse or resolve. */
export class InvalidLocationError extends RedirectClientError {
  constructor(public readonly location: string, reason?: string) {
    super(`Invalid Location header: ${JSON.stringify(location)}${reason ? ` (${reason})` : ""}`, "EBADREDIRECT");
  }
}

/** The original request body errored while it was being buffered; nothing was sent. */
export class BodyReadError extends RedirectClientError {
  constructor(options?: { cause?: unknown }) {
    const detail = options?.cause instanceof Error ? `: ${options.cause.message}` : "";
    super(`Failed to read request body${detail}`, "EBODYREAD", options);
  }
}

export class RequestAbortedError extends RedirectClientError {
  constructor(options?: { cause?: unknown }) {
    super("Request was aborted", "EABORTED", options);
  }
}
