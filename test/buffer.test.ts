import { Readable } from "node:stream";
import { describe, expect, it, vi } from "vitest";
import { BodyBuffer } from "../src/buffer.js";
import { BodyReadError, RequestAbortedError } from "../src/errors.js";

const decode = (b: Uint8Array) => new TextDecoder().decode(b);

async function* chunks(...parts: string[]): AsyncGenerator<string> {
  for (const p of parts) {
    await new Promise((r) => setTimeout(r, 1));
    yield p;
  }
}

describe("BodyBuffer", () => {
  it("resolves to an empty buffer when there is no body", async () => {
    const out = await new BodyBuffer(null).collect();
    expect(out.byteLength).toBe(0);
  });

  it("takes a string or byte array as a single chunk", async () => {
    expect(decode(await new BodyBuffer("hello").collect())).toBe("hello");
    expect(Array.from(await new BodyBuffer(new Uint8Array([1, 2, 3])).collect())).toEqual([1, 2, 3]);
  });

  it("concatenates chunks of an async iterable", async () => {
    const buf = new BodyBuffer(chunks("ab", "", "cd", "é"));
    const out = await buf.collect();
    expect(decode(out)).toBe("abcdé");
    expect(buf.byteLength).toBe(6);
  });

  it("drains a sync iterable of mixed chunks", async () => {
    const out = await new BodyBuffer([new Uint8Array([0x61]), "b"]).collect();
    expect(decode(out)).toBe("ab");
  });

  it("drains a Node Readable", async () => {
    const out = await new BodyBuffer(Readable.from([Buffer.from("x="), Buffer.from("1")])).collect();
    expect(decode(out)).toBe("x=1");
  });

  it("wraps a mid-stream error in BodyReadError", async () => {
    async function* broken(): AsyncGenerator<string> {
      yield "partial";
      throw new Error("socket hang up");
    }

    const p = new BodyBuffer(broken()).collect();
    await expect(p).rejects.toBeInstanceOf(BodyReadError);
    await expect(p).rejects.toThrow("Failed to read request body: socket hang up");
  });

  it("throws when collected twice", async () => {
    const buf = new BodyBuffer("once");
    await buf.collect();
    await expect(buf.collect()).rejects.toThrow(/called more than once/);
  });

  it("stops at the next chunk after abort and runs the source's cleanup", async () => {
    const ac = new AbortController();
    let cleanedUp = false;

    async function* source(): AsyncGenerator<string> {
      try {
        yield "a";
        ac.abort();
        yield "b";
        yield "c";
      } finally {
        cleanedUp = true;
      }
    }

    await expect(new BodyBuffer(source()).collect(ac.signal)).rejects.toBeInstanceOf(RequestAbortedError);
    await vi.waitFor(() => expect(cleanedUp).toBe(true));
  });

  it("rejects on abort while the source is waiting for its next chunk", async () => {
    const ac = new AbortController();

    async function* stalled(): AsyncGenerator<string> {
      yield "a";
      await new Promise<never>(() => {});
    }

    const collecting = new BodyBuffer(stalled()).collect(ac.signal);
    setTimeout(() => ac.abort(), 20);

    await expect(collecting).rejects.toBeInstanceOf(RequestAbortedError);
  });

  it("rejects right away when the signal is already aborted", async () => {
    const ac = new AbortController();
    ac.abort();
    await expect(new BodyBuffer(chunks("a")).collect(ac.signal)).rejects.toBeInstanceOf(RequestAbortedError);
  });
});
