import { describe, expect, it, vi } from "vitest";
import { RedirectExchange } from "../src/exchange.js";
import { createRequest } from "../src/client.js";
import {
  BodyReadError,
  InvalidLocationError,
  RequestAbortedError,
  RequestBuildError,
  TransportError,
} from "../src/errors.js";
import { EndlessRedirects, FakeTransport, failingTransport } from "./fakeTransport.js";
import type { Transport, WireRequest, WireResponse } from "../src/types.js";
import { HeaderList } from "../src/utils/headerList.js";

describe("RedirectExchange", () => {
  it("sends once and returns a non-redirect response", async () => {
    const transport = new FakeTransport({ "http://a.com/": { status: 200, body: "ok" } });
    const ex = new RedirectExchange(transport, createRequest("http://a.com/"), { maxRedirects: 5 });

    const { response, redirects } = await ex.run();
    expect(response.status).toBe(200);
    expect(new TextDecoder().decode(response.body)).toBe("ok");
    expect(redirects).toEqual([]);
    expect(ex.sendCount).toBe(1);
  });

  it("buffers a streamed body once and replays it on every hop", async () => {
    let pulls = 0;
    async function* body(): AsyncGenerator<string> {
      pulls += 1;
      yield "x=";
      yield "42";
    }

    const transport = new FakeTransport({
      "http://a.com/a": { status: 307, location: "/b" },
      "http://a.com/b": { status: 308, location: "/c" },
      "http://a.com/c": { status: 201 },
    });
    const req = createRequest("http://a.com/a", { method: "POST", body: body() });
    const { response } = await new RedirectExchange(transport, req, { maxRedirects: 5 }).run();

    expect(response.status).toBe(201);
    expect(pulls).toBe(1);
    expect(req.body).toBeNull();
    expect(transport.sent.map((s) => [s.method, s.url, s.body])).toEqual([
      ["POST", "http://a.com/a", "x=42"],
      ["POST", "http://a.com/b", "x=42"],
      ["POST", "http://a.com/c", "x=42"],
    ]);
  });

  it("performs exactly maxRedirects + 1 sends on an endless chain", async () => {
    const transport = new EndlessRedirects(301);
    const { response, redirects } = await new RedirectExchange(transport, createRequest("http://a.com/0"), {
      maxRedirects: 4,
    }).run();

    expect(transport.sends).toBe(5);
    expect(response.status).toBe(301);
    expect(response.headers.get("location")).toBe("/5");
    expect(redirects).toHaveLength(4);
    expect(redirects[3].remainingRedirects).toBe(0);
  });

  it("with a zero budget returns the first redirect untouched", async () => {
    const transport = new EndlessRedirects();
    const { response } = await new RedirectExchange(transport, createRequest("http://a.com/"), {
      maxRedirects: 0,
    }).run();
    expect(transport.sends).toBe(1);
    expect(response.status).toBe(302);
  });

  it("returns a redirect without Location as-is", async () => {
    const transport = new FakeTransport({
      "http://a.com/": { status: 302, location: "/gone" },
      "http://a.com/gone": { status: 303, headers: { "x-why": "no target" } },
    });
    const { response } = await new RedirectExchange(transport, createRequest("http://a.com/"), {
      maxRedirects: 5,
    }).run();

    expect(response.status).toBe(303);
    expect(response.headers.get("x-why")).toBe("no target");
    expect(transport.sent).toHaveLength(2);
  });

  it("reports each followed hop to the observer", async () => {
    const onRedirect = vi.fn();
    const onSend = vi.fn();
    const transport = new FakeTransport({
      "http://a.com/": { status: 301, location: "https://b.com/next" },
      "https://b.com/next": { status: 200 },
    });

    await new RedirectExchange(
      transport,
      createRequest("http://a.com/", { headers: { Authorization: "Bearer test-token" } }),
      { maxRedirects: 5, observer: { onRedirect, onSend } }
    ).run();

    expect(onSend).toHaveBeenCalledTimes(2);
    expect(onSend.mock.calls[1][1]).toBe(2);
    expect(onRedirect).toHaveBeenCalledTimes(1);
    expect(onRedirect).toHaveBeenCalledWith({
      status: 301,
      method: "GET",
      from: "http://a.com/",
      to: "https://b.com/next",
      strippedHeaders: ["authorization"],
      remainingRedirects: 4,
    });
    expect(transport.sent[1].headers.has("authorization")).toBe(false);
  });

  it("fails with InvalidLocationError on a malformed Location", async () => {
    const transport = new FakeTransport({ "http://a.com/": { status: 302, location: "relative/path" } });
    const ex = new RedirectExchange(transport, createRequest("http://a.com/"), { maxRedirects: 5 });
    await expect(ex.run()).rejects.toBeInstanceOf(InvalidLocationError);
    expect(transport.sent).toHaveLength(1);
  });

  it("never sends when the body fails to buffer", async () => {
    async function* broken(): AsyncGenerator<string> {
      throw new Error("disk read failed");
    }
    const transport = new FakeTransport({});
    const ex = new RedirectExchange(transport, createRequest("http://a.com/", { method: "PUT", body: broken() }), {
      maxRedirects: 5,
    });

    await expect(ex.run()).rejects.toBeInstanceOf(BodyReadError);
    expect(transport.sent).toHaveLength(0);
  });

  it("never sends when the request cannot be built", async () => {
    const transport = new FakeTransport({});
    const ex = new RedirectExchange(transport, createRequest("not-absolute"), { maxRedirects: 5 });
    await expect(ex.run()).rejects.toBeInstanceOf(RequestBuildError);
    expect(transport.sent).toHaveLength(0);
  });

  it("wraps foreign transport failures in TransportError", async () => {
    const cause = new Error("ECONNREFUSED");
    const ex = new RedirectExchange(failingTransport(cause), createRequest("http://a.com/"), { maxRedirects: 5 });

    const err = await ex.run().catch((e: unknown) => e);
    expect(err).toBeInstanceOf(TransportError);
    if (err instanceof TransportError) {
      expect(err.message).toBe("Transport failed: ECONNREFUSED");
      expect(err.cause).toBe(cause);
      expect(err.code).toBe("ETRANSPORT");
    }
  });

  it("passes TransportError through unchanged", async () => {
    const original = new TransportError("upstream reset");
    const ex = new RedirectExchange(failingTransport(original), createRequest("http://a.com/"), { maxRedirects: 5 });
    await expect(ex.run()).rejects.toBe(original);
  });

  it("aborts an in-flight send and does not continue the chain", async () => {
    const ac = new AbortController();
    const seen: WireRequest[] = [];
    const transport: Transport = {
      send(req, signal) {
        seen.push(req);
        return new Promise<WireResponse>((_resolve, reject) => {
          signal?.addEventListener("abort", () => reject(new Error("aborted by caller")), { once: true });
        });
      },
    };

    const p = new RedirectExchange(transport, createRequest("http://a.com/"), {
      maxRedirects: 5,
      signal: ac.signal,
    }).run();
    await vi.waitFor(() => expect(seen).toHaveLength(1));
    ac.abort();

    await expect(p).rejects.toBeInstanceOf(RequestAbortedError);
  });

  it("stops between hops once aborted", async () => {
    const ac = new AbortController();
    let sends = 0;
    const transport: Transport = {
      async send(req) {
        sends += 1;
        ac.abort();
        const headers = new HeaderList([["location", "/again"]]);
        return { status: 302, headers, body: new Uint8Array(0), url: req.url };
      },
    };

    const ex = new RedirectExchange(transport, createRequest("http://a.com/"), { maxRedirects: 5, signal: ac.signal });
    await expect(ex.run()).rejects.toBeInstanceOf(RequestAbortedError);
    expect(sends).toBe(1);
  });

  it("can only run once", async () => {
    const ex = new RedirectExchange(new FakeTransport({}), createRequest("http://a.com/"), { maxRedirects: 1 });
    await ex.run();
    await expect(ex.run()).rejects.toThrow(/more than once/);
  });
});
