// src/client.ts
import { EventEmitter } from "node:events";
import { DEFAULT_MAX_REDIRECTS, loadLogLevel } from "./config.js";
import { RedirectExchange } from "./exchange.js";
import { createLogger, errorMeta, type Logger } from "./logger.js";
import { HeaderList, type HeadersInit } from "./utils/headerList.js";
import type { RedirectClientEvents } from "./events.js";
import type {
  BodySource,
  HostComparison,
  HttpMethod,
  HttpVersion,
  OutgoingRequest,
  RedirectClientOptions,
  RequestOptions,
  Transport,
  WireResponse,
} from "./types.js";

export interface OutgoingRequestInit {
  method?: HttpMethod;
  version?: HttpVersion;
  headers?: HeadersInit;
  body?: BodySource | null;
}

/** Build an OutgoingRequest. Defaults: GET, HTTP/1.1, no headers, no body. */
export function createRequest(url: string | URL, init: OutgoingRequestInit = {}): OutgoingRequest {
  return {
    method: init.method ?? "GET",
    url: url.toString(),
    version: init.version ?? "HTTP/1.1",
    headers: HeaderList.from(init.headers),
    body: init.body ?? null,
  };
}

function genRequestId(): string {
  return `${Date.now().toString(36)}-${Math.random().toString(36).slice(2, 10)}`;
}

function assertMaxRedirects(n: number): void {
  if (!Number.isInteger(n) || n < 0) {
    throw new Error(`maxRedirects must be an integer >= 0 (got ${n})`);
  }
}

/**
 * Wraps a Transport and follows 301/302/303/307/308 redirects.
 *
 * The request body is buffered once before the first send and replayed on
 * every hop (dropped after a 303). Authorization and cookie headers are
 * removed when a redirect leaves the current host and port. When the hop
 * limit is reached, or a redirect carries no Location, the redirect response
 * itself is returned.
 */
export class RedirectClient extends EventEmitter<RedirectClientEvents> {
  private maxHops: number;
  private readonly hostComparison: HostComparison;
  private readonly logger: Logger;

  constructor(private readonly transport: Transport, opts: RedirectClientOptions = {}) {
    super();
    const maxRedirects = opts.maxRedirects ?? DEFAULT_MAX_REDIRECTS;
    assertMaxRedirects(maxRedirects);
    this.maxHops = maxRedirects;
    this.hostComparison = opts.hostComparison ?? "exact";
    this.logger = opts.logger ?? createLogger({ level: loadLogLevel() });
  }

  get maxRedirects(): number {
    return this.maxHops;
  }

  setMaxRedirects(maxRedirects: number): void {
    assertMaxRedirects(maxRedirects);
    this.maxHops = maxRedirects;
  }

  get(url: string | URL, opts?: RequestOptions & Omit<OutgoingRequestInit, "method" | "body">): Promise<WireResponse> {
    return this.request(createRequest(url, { ...opts, method: "GET" }), opts);
  }

  /**
   * Send `req`, following redirects. The request's headers and body are moved
   * into the exchange: afterwards `req.headers` is empty and `req.body` is null.
   */
  async request(req: OutgoingRequest, opts: RequestOptions = {}): Promise<WireResponse> {
    const requestId = genRequestId();
    const start = Date.now();
    const { method, url } = req;

    const exchange = new RedirectExchange(this.transport, req, {
      maxRedirects: this.maxHops,
      hostComparison: this.hostComparison,
      signal: opts.signal,
      observer: {
        onRedirect: (hop) => {
          this.logger.debug("following redirect", { requestId, ...hop });
          if (hop.strippedHeaders.length > 0) {
            this.logger.info("redirect left host; removed credential headers", {
              requestId,
              from: hop.from,
              to: hop.to,
              headers: hop.strippedHeaders,
            });
          }
          this.emit("request:redirect", { requestId, hop });
        },
      },
    });

    this.emit("request:start", { requestId, method, url });

    try {
      const { response, redirects } = await exchange.run();
      const durationMs = Date.now() - start;

      if (isRedirectStatus(response.status)) {
        // a redirect handed back as-is: budget spent or no Location
        this.logger.debug("stopped following redirects", {
          requestId,
          status: response.status,
          url: response.url,
          reason: response.headers.has("location") ? "max redirects reached" : "missing Location header",
        });
      }

      this.emit("request:success", {
        requestId,
        status: response.status,
        url: response.url,
        redirects: redirects.length,
        durationMs,
      });
      return response;
    } catch (err) {
      const durationMs = Date.now() - start;
      this.logger.warn("request failed", { requestId, method, url, sends: exchange.sendCount, ...errorMeta(err) });
      this.emit("request:failure", { requestId, error: err, durationMs });
      throw err;
    }
  }
}

function isRedirectStatus(status: number): boolean {
  return status === 301 || status === 302 || status === 303 || status === 307 || status === 308;
}

/** Wrap `transport` in a client that follows up to DEFAULT_MAX_REDIRECTS (10) redirects. */
export function followRedirects(transport: Transport, opts: Omit<RedirectClientOptions, "maxRedirects"> = {}): RedirectClient {
  return new RedirectClient(transport, { ...opts, maxRedirects: DEFAULT_MAX_REDIRECTS });
}

export function followRedirectsMax(
  transport: Transport,
  maxRedirects: number,
  opts: Omit<RedirectClientOptions, "maxRedirects"> = {}
): RedirectClient {
  return new RedirectClient(transport, { ...opts, maxRedirects });
}
