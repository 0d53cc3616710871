// src/buffer.ts
import { Readable, addAbortSignal } from "node:stream";
import { BodyReadError, RequestAbortedError } from "./errors.js";
import type { BodyChunk, BodySource } from "./types.js";

const encoder = new TextEncoder();

function toBytes(chunk: BodyChunk): Uint8Array {
  return typeof chunk === "string" ? encoder.encode(chunk) : chunk;
}

const ABORTED = Symbol("aborted");

function ignore(): void {}

/** Run the source's cleanup without waiting on it: a stalled generator only returns once it resumes. */
function close(iterator: AsyncIterator<BodyChunk>): void {
  iterator.return?.().then(ignore, ignore);
}

function isAsyncIterable(value: object): value is AsyncIterable<BodyChunk> | Readable {
  return Symbol.asyncIterator in value;
}

/**
 * Drains a streaming request body into one byte buffer so the request can be
 * replayed on every redirect hop.
 *
 * Two phases: accumulate, then done. `collect()` may be called exactly once;
 * calling it again is a programming error and throws.
 */
export class BodyBuffer {
  private source: BodySource | null;
  private chunks: Uint8Array[] = [];
  private size = 0;
  private started = false;

  constructor(source: BodySource | null) {
    this.source = source;
  }

  get byteLength(): number {
    return this.size;
  }

  /**
   * Resolve to the concatenation of all chunks. A body that errors mid-stream
   * rejects with BodyReadError. An aborted signal rejects with
   * RequestAbortedError right away, even while the source is waiting for its
   * next chunk; the source's `return()` is called and a Readable is destroyed.
   */
  async collect(signal?: AbortSignal): Promise<Uint8Array> {
    if (this.started) {
      throw new Error("BodyBuffer.collect() called more than once");
    }
    this.started = true;

    const source = this.source;
    this.source = null;

    if (source === null) return new Uint8Array(0);
    if (typeof source === "string" || source instanceof Uint8Array) {
      this.push(source);
      return this.finish();
    }

    if (signal?.aborted) throw new RequestAbortedError({ cause: signal.reason });
    // a stalled Readable is destroyed on abort, which ends the pending read
    if (signal && source instanceof Readable) addAbortSignal(signal, source);

    try {
      if (isAsyncIterable(source)) {
        await this.drain(source[Symbol.asyncIterator](), signal);
      } else {
        for (const chunk of source) {
          this.push(chunk);
          if (signal?.aborted) break;
        }
      }
    } catch (err) {
      this.chunks = [];
      if (signal?.aborted) throw new RequestAbortedError({ cause: signal.reason });
      throw new BodyReadError({ cause: err });
    }

    if (signal?.aborted) {
      this.chunks = [];
      throw new RequestAbortedError({ cause: signal.reason });
    }
    return this.finish();
  }

  /**
   * Pull chunks until the source ends. With a signal, each pending `next()`
   * races the abort event, so a source that never yields again cannot hold
   * the request open.
   */
  private async drain(iterator: AsyncIterator<BodyChunk>, signal?: AbortSignal): Promise<void> {
    if (!signal) {
      for (let r = await iterator.next(); !r.done; r = await iterator.next()) this.push(r.value);
      return;
    }

    let onAbort = (): void => undefined;
    const aborted = new Promise<typeof ABORTED>((resolve) => {
      onAbort = () => resolve(ABORTED);
      signal.addEventListener("abort", onAbort, { once: true });
    });

    try {
      for (;;) {
        const pending = iterator.next();
        const result = await Promise.race([pending, aborted]);
        if (result === ABORTED) {
          // a stalled next() settles late or never; its outcome no longer matters
          pending.then(ignore, ignore);
          close(iterator);
          return;
        }
        if (result.done) return;
        this.push(result.value);
        if (signal.aborted) {
          close(iterator);
          return;
        }
      }
    } finally {
      signal.removeEventListener("abort", onAbort);
    }
  }

  private push(chunk: BodyChunk): void {
    const bytes = toBytes(chunk);
    this.chunks.push(bytes);
    this.size += bytes.byteLength;
  }

  private finish(): Uint8Array {
    const out = new Uint8Array(this.size);
    let offset = 0;
    for (const c of this.chunks) {
      out.set(c, offset);
      offset += c.byteLength;
    }
    this.chunks = [];
    return out;
  }
}
