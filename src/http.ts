// src/http.ts
import { Agent, request as undiciRequest, type Dispatcher } from "undici";
import { RequestTimeoutError, TransportError } from "./errors.js";
import { HeaderList } from "./utils/headerList.js";
import type { Transport, WireRequest, WireResponse } from "./types.js";

export interface UndiciTransportOptions {
  /** Per-send timeout, response body included. */
  requestTimeoutMs: number;
  /**
   * Negotiate HTTP/2 for requests whose version is "HTTP/2". Default: true.
   * "HTTP/1.1" goes out over undici's global dispatcher; "HTTP/1.0" is
   * rejected with TransportError, since undici only speaks 1.1 and 2.
   */
  allowH2?: boolean;
}

const UNDICI_METHODS: readonly string[] = ["GET", "HEAD", "POST", "PUT", "DELETE", "CONNECT", "OPTIONS", "TRACE", "PATCH"];

function isUndiciMethod(method: string): method is Dispatcher.HttpMethod {
  return UNDICI_METHODS.includes(method);
}

function toHeaderList(headers: Record<string, string | string[] | undefined>): HeaderList {
  const out = new HeaderList();
  for (const [k, v] of Object.entries(headers)) {
    if (Array.isArray(v)) for (const item of v) out.append(k, item);
    else if (v !== undefined) out.append(k, v);
  }
  return out;
}

/**
 * A Transport backed by undici. Sends exactly one request per call, with a
 * hard timeout. undici's request() only follows redirects when given
 * maxRedirections, which is never set here.
 */
export function createUndiciTransport(opts: UndiciTransportOptions): Transport & { close(): Promise<void> } {
  if (!Number.isFinite(opts.requestTimeoutMs) || opts.requestTimeoutMs <= 0) {
    throw new Error(`requestTimeoutMs must be > 0 (got ${opts.requestTimeoutMs})`);
  }
  const h2Agent = opts.allowH2 === false ? undefined : new Agent({ allowH2: true });

  async function send(req: WireRequest, signal?: AbortSignal): Promise<WireResponse> {
    const method = req.method;
    if (!isUndiciMethod(method)) {
      throw new TransportError(`Unsupported method for undici transport: ${method}`);
    }
    if (req.version === "HTTP/1.0") {
      throw new TransportError("HTTP/1.0 is not supported by the undici transport");
    }
    const ac = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      ac.abort();
    }, opts.requestTimeoutMs);
    const onAbort = () => ac.abort(signal?.reason);
    signal?.addEventListener("abort", onAbort, { once: true });

    const dispatcher: Dispatcher | undefined = req.version === "HTTP/2" ? h2Agent : undefined;

    try {
      const res = await undiciRequest(req.url, {
        method,
        headers: req.headers.toFlatArray(),
        body: req.body.byteLength > 0 ? req.body : null,
        signal: ac.signal,
        dispatcher,
      });

      const body = await res.body.arrayBuffer();
      return {
        status: res.statusCode,
        headers: toHeaderList(res.headers),
        body: new Uint8Array(body),
        url: req.url,
      };
    } catch (err) {
      if (timedOut) throw new RequestTimeoutError(opts.requestTimeoutMs);
      if (err instanceof TransportError) throw err;
      const message = err instanceof Error ? err.message : String(err);
      throw new TransportError(`${req.method} ${req.url} failed: ${message}`, { cause: err });
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
    }
  }

  return {
    send,
    async close() {
      await h2Agent?.close();
    },
  };
}
