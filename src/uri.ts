// src/uri.ts
import { InvalidLocationError } from "./errors.js";
import type { HostComparison } from "./types.js";

export interface UriReference {
  scheme?: string;
  authority?: string;
  path: string;
  query?: string;
  fragment?: string;
}

// RFC 3986, Appendix B
const URI_REFERENCE_RE = /^(?:([^:/?#]+):)?(?:\/\/([^/?#]*))?([^?#]*)(?:\?([^#]*))?(?:#(.*))?$/;
const SCHEME_RE = /^[a-zA-Z][a-zA-Z0-9+.-]*$/;
// unreserved, reserved and "%". A backslash is rejected: WHATWG URL reads it as "/"
const URI_CHARS_RE = /^[A-Za-z0-9\-._~:/?#[\]@!$&'()*+,;=%]+$/;

const DEFAULT_PORTS: Record<string, string> = {
  http: "80",
  https: "443",
  ws: "80",
  wss: "443",
};

export function parseUriReference(value: string): UriReference | undefined {
  const m = URI_REFERENCE_RE.exec(value);
  if (!m) return undefined;
  const [, scheme, authority, path, query, fragment] = m;
  if (scheme !== undefined && !SCHEME_RE.test(scheme)) return undefined;
  return { scheme, authority, path: path ?? "", query, fragment };
}

/**
 * Resolve a redirect `Location` value against the (absolute) URI of the
 * request that received it.
 *
 * Only scheme and authority are inherited from `current`; path and query are
 * taken verbatim from the location and never merged with the old path. The
 * fragment is dropped.
 */
export function resolveLocation(current: string, location: string): string {
  if (!URI_CHARS_RE.test(location)) {
    throw new InvalidLocationError(location, "contains characters not allowed in a URI");
  }

  const next = parseUriReference(location);
  if (!next) throw new InvalidLocationError(location, "not a URI reference");

  const base = parseUriReference(current);
  if (!base?.scheme || base.authority === undefined) {
    throw new InvalidLocationError(location, `cannot resolve against non-absolute URI ${current}`);
  }

  const scheme = next.scheme ?? base.scheme;
  const authority = next.authority ?? base.authority;

  if (next.path !== "" && !next.path.startsWith("/")) {
    throw new InvalidLocationError(location, "relative path without authority");
  }
  const path = next.path === "" ? "/" : next.path;

  const resolved = `${scheme}://${authority}${path}${next.query !== undefined ? `?${next.query}` : ""}`;
  if (!URL.canParse(resolved)) {
    throw new InvalidLocationError(location, "does not form a valid URL");
  }
  return resolved;
}

interface HostPort {
  host: string;
  port?: string;
}

function hostPort(uri: string): HostPort | undefined {
  const ref = parseUriReference(uri);
  if (!ref?.authority) return undefined;

  // drop userinfo
  const at = ref.authority.lastIndexOf("@");
  const hp = at >= 0 ? ref.authority.slice(at + 1) : ref.authority;

  // IPv6 literal: [::1]:8080
  if (hp.startsWith("[")) {
    const close = hp.indexOf("]");
    if (close < 0) return { host: hp.toLowerCase() };
    const rest = hp.slice(close + 1);
    return {
      host: hp.slice(0, close + 1).toLowerCase(),
      port: rest.startsWith(":") && rest.length > 1 ? rest.slice(1) : undefined,
    };
  }

  const colon = hp.lastIndexOf(":");
  if (colon < 0) return { host: hp.toLowerCase() };
  const port = hp.slice(colon + 1);
  return { host: hp.slice(0, colon).toLowerCase(), port: port === "" ? undefined : port };
}

function urlHostname(uri: string): string | undefined {
  return URL.canParse(uri) ? new URL(uri).hostname : undefined;
}

function effectivePort(uri: string, port: string | undefined): string | undefined {
  if (port !== undefined) return port;
  const scheme = parseUriReference(uri)?.scheme?.toLowerCase();
  return scheme ? DEFAULT_PORTS[scheme] : undefined;
}

/**
 * True iff both URIs name the same host and port. Hosts are compared
 * case-insensitively; ports literally unless `mode` is "normalized".
 *
 * The host must also agree under WHATWG URL parsing, which is what the
 * transport connects to.
 */
export function isSameHost(a: string, b: string, mode: HostComparison = "exact"): boolean {
  const x = hostPort(a);
  const y = hostPort(b);
  if (!x || !y) return false;
  if (x.host !== y.host) return false;

  const hostA = urlHostname(a);
  if (hostA === undefined || hostA !== urlHostname(b)) return false;

  if (mode === "normalized") {
    return effectivePort(a, x.port) === effectivePort(b, y.port);
  }
  return x.port === y.port;
}
