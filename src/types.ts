import type { HeaderList } from "./utils/headerList.js";
import type { Logger } from "./logger.js";

export type HttpMethod =
  | "GET"
  | "POST"
  | "PUT"
  | "PATCH"
  | "DELETE"
  | "HEAD"
  | "OPTIONS"
  | (string & {});

export type HttpVersion = "HTTP/1.0" | "HTTP/1.1" | "HTTP/2";

export type BodyChunk = Uint8Array | string;

/**
 * A request body as the caller hands it over. Strings and byte arrays are a
 * single chunk; iterables (including Node's Readable) are drained chunk by chunk.
 */
export type BodySource = BodyChunk | Iterable<BodyChunk> | AsyncIterable<BodyChunk>;

/** The caller's request. Headers and body are moved out of it when an exchange starts. */
export interface OutgoingRequest {
  method: HttpMethod;
  url: string;
  version: HttpVersion;
  headers: HeaderList;
  body: BodySource | null;
}

/** A fully materialized request, ready for a transport to put on the wire. */
export interface WireRequest {
  method: HttpMethod;
  url: string;
  version: HttpVersion;
  headers: HeaderList;
  body: Uint8Array;
}

export interface WireResponse {
  status: number;
  statusText?: string;
  headers: HeaderList;
  body: Uint8Array; // keep raw; callers decode as needed
  /** The URL of the request that produced this response. */
  url: string;
}

/**
 * The send capability the redirect layer decorates. Implementations must
 * send exactly what they are given and must not follow redirects themselves.
 */
export interface Transport {
  send(request: WireRequest, signal?: AbortSignal): Promise<WireResponse>;
}

/**
 * How two URIs are compared when deciding whether a redirect leaves the
 * original host.
 * - "exact": literal port component (`:80` differs from no port)
 * - "normalized": absent ports take the scheme default before comparison
 */
export type HostComparison = "exact" | "normalized";

export interface RedirectHop {
  status: number;
  method: HttpMethod;
  from: string;
  to: string;
  /** Header names removed because the redirect left the host/port. */
  strippedHeaders: string[];
  remainingRedirects: number;
}

export interface RedirectClientOptions {
  /** Default: DEFAULT_MAX_REDIRECTS (10) */
  maxRedirects?: number;
  /** Default: "exact" */
  hostComparison?: HostComparison;
  /** Default: a winston console logger at the configured LOG_LEVEL */
  logger?: Logger;
}

export interface RequestOptions {
  signal?: AbortSignal;
}
