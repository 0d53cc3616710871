// src/machine.ts
import { RequestBuildError } from "./errors.js";
import { isSameHost, resolveLocation } from "./uri.js";
import type { HeaderList } from "./utils/headerList.js";
import type {
  HostComparison,
  HttpMethod,
  HttpVersion,
  OutgoingRequest,
  RedirectHop,
  WireRequest,
  WireResponse,
} from "./types.js";

export type RedirectDecision = "continue" | "return";

/** Removed when a redirect leaves the current host/port. */
export const SENSITIVE_HEADERS = ["authorization", "cookie", "cookie2", "www-authenticate"] as const;

/** Removed on 303, since the follow-up GET carries no body. */
const BODY_HEADERS = ["content-length", "content-type", "transfer-encoding"] as const;

const METHOD_RE = /^[a-zA-Z0-9!#$%&'*+.^_`|~-]+$/;

export interface MachineSnapshot {
  method: HttpMethod;
  url: string;
  remainingRedirects: number;
  hops: number;
  hasBody: boolean;
}

/**
 * Owns the logical request across a redirect chain.
 *
 * | status              | effect                                  |
 * |---------------------|-----------------------------------------|
 * | 301, 302, 307, 308  | keep method and body, follow            |
 * | 303                 | method = GET, drop body, follow         |
 * | anything else       | return                                  |
 *
 * Following stops (and the response is returned as-is) when the redirect
 * budget is spent or the response has no Location header.
 */
export class RedirectStateMachine {
  private method: HttpMethod;
  private url: string;
  private readonly version: HttpVersion;
  private readonly headers: HeaderList;
  // null while the body is still being buffered, and after a 303
  private body: Uint8Array | null = null;
  private remaining: number;
  private readonly hostComparison: HostComparison;
  private hops: RedirectHop[] = [];

  constructor(req: OutgoingRequest, maxRedirects: number, hostComparison: HostComparison = "exact") {
    if (!Number.isInteger(maxRedirects) || maxRedirects < 0) {
      throw new Error(`maxRedirects must be an integer >= 0 (got ${maxRedirects})`);
    }
    this.method = req.method;
    this.url = req.url;
    this.version = req.version;
    // moved, not copied: the caller's list is left empty
    this.headers = req.headers.take();
    this.remaining = maxRedirects;
    this.hostComparison = hostComparison;
  }

  get remainingRedirects(): number {
    return this.remaining;
  }

  get currentUrl(): string {
    return this.url;
  }

  /** Hops followed so far, oldest first. */
  get history(): readonly RedirectHop[] {
    return this.hops;
  }

  setBody(body: Uint8Array): void {
    this.body = body;
  }

  /**
   * Build the request for the current hop. The body is shared with every
   * earlier hop; it is never mutated.
   */
  createRequest(): WireRequest {
    if (!METHOD_RE.test(this.method)) {
      throw new RequestBuildError(`Invalid method: ${JSON.stringify(this.method)}`);
    }

    let parsed: URL;
    try {
      parsed = new URL(this.url);
    } catch (err) {
      throw new RequestBuildError(`Invalid request URL: ${JSON.stringify(this.url)}`, { cause: err });
    }
    if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
      throw new RequestBuildError(`Unsupported URL scheme: ${parsed.protocol}`);
    }

    this.headers.validate();

    return {
      method: this.method,
      url: this.url,
      version: this.version,
      headers: this.headers.clone(),
      body: this.body ?? new Uint8Array(0),
    };
  }

  handleResponse(res: WireResponse): RedirectDecision {
    switch (res.status) {
      case 301:
      case 302:
      case 307:
      case 308:
        return this.followRedirect(res);
      case 303:
        this.method = "GET";
        this.body = null;
        for (const name of BODY_HEADERS) this.headers.delete(name);
        return this.followRedirect(res);
      default:
        return "return";
    }
  }

  snapshot(): MachineSnapshot {
    return {
      method: this.method,
      url: this.url,
      remainingRedirects: this.remaining,
      hops: this.hops.length,
      hasBody: this.body !== null && this.body.byteLength > 0,
    };
  }

  private followRedirect(res: WireResponse): RedirectDecision {
    if (this.remaining === 0) return "return";
    this.remaining -= 1;

    const location = res.headers.get("location");
    if (location === undefined) return "return";

    const next = resolveLocation(this.url, location);

    const stripped: string[] = [];
    if (!isSameHost(this.url, next, this.hostComparison)) {
      for (const name of SENSITIVE_HEADERS) {
        if (this.headers.delete(name) > 0) stripped.push(name);
      }
    }

    this.hops.push({
      status: res.status,
      method: this.method,
      from: this.url,
      to: next,
      strippedHeaders: stripped,
      remainingRedirects: this.remaining,
    });
    this.url = next;
    return "continue";
  }
}
