// src/exchange.ts
import { BodyBuffer } from "./buffer.js";
import { RequestAbortedError, TransportError } from "./errors.js";
import { RedirectStateMachine } from "./machine.js";
import type {
  HostComparison,
  OutgoingRequest,
  RedirectHop,
  Transport,
  WireRequest,
  WireResponse,
} from "./types.js";

export interface ExchangeObserver {
  onSend?: (req: WireRequest, attempt: number) => void;
  onRedirect?: (hop: RedirectHop) => void;
}

export interface ExchangeOptions {
  maxRedirects: number;
  hostComparison?: HostComparison;
  signal?: AbortSignal;
  observer?: ExchangeObserver;
}

export interface ExchangeResult {
  response: WireResponse;
  redirects: readonly RedirectHop[];
}

type ExchangeState =
  | { kind: "lazy"; request: OutgoingRequest; maxRedirects: number }
  | { kind: "buffering"; machine: RedirectStateMachine; buffer: BodyBuffer }
  | { kind: "requesting"; machine: RedirectStateMachine; request: WireRequest }
  | { kind: "done"; result: ExchangeResult }
  // placeholder held only while a step owns the previous state
  | { kind: "swapping" };

/**
 * Drives one request through its redirect chain:
 * lazy -> buffering -> requesting (-> requesting ...) -> done.
 *
 * Each step takes the current state out (leaving "swapping" behind) and puts
 * the next one in, so only one step ever holds the state machine.
 */
export class RedirectExchange {
  private state: ExchangeState;
  private readonly hostComparison: HostComparison;
  private readonly signal?: AbortSignal;
  private readonly observer: ExchangeObserver;
  private sends = 0;
  private started = false;

  constructor(
    private readonly transport: Transport,
    request: OutgoingRequest,
    opts: ExchangeOptions
  ) {
    this.state = { kind: "lazy", request, maxRedirects: opts.maxRedirects };
    this.hostComparison = opts.hostComparison ?? "exact";
    this.signal = opts.signal;
    this.observer = opts.observer ?? {};
  }

  /** Number of requests put on the wire so far. */
  get sendCount(): number {
    return this.sends;
  }

  /** May be called once. Every error is terminal. */
  async run(): Promise<ExchangeResult> {
    if (this.started) throw new Error("RedirectExchange.run() called more than once");
    this.started = true;

    for (;;) {
      if (this.signal?.aborted) throw new RequestAbortedError({ cause: this.signal.reason });
      await this.step();
      if (this.state.kind === "done") return this.state.result;
    }
  }

  private async step(): Promise<void> {
    const current = this.state;
    this.state = { kind: "swapping" };

    switch (current.kind) {
      case "lazy": {
        const machine = new RedirectStateMachine(current.request, current.maxRedirects, this.hostComparison);
        const buffer = new BodyBuffer(current.request.body);
        current.request.body = null;
        this.state = { kind: "buffering", machine, buffer };
        return;
      }
      case "buffering": {
        const body = await current.buffer.collect(this.signal);
        current.machine.setBody(body);
        this.state = { kind: "requesting", machine: current.machine, request: current.machine.createRequest() };
        return;
      }
      case "requesting": {
        const { machine, request } = current;
        const response = await this.send(request);
        const before = machine.history.length;
        const decision = machine.handleResponse(response);
        if (decision === "continue") {
          this.observer.onRedirect?.(machine.history[before]);
          this.state = { kind: "requesting", machine, request: machine.createRequest() };
        } else {
          this.state = { kind: "done", result: { response, redirects: machine.history } };
        }
        return;
      }
      case "done":
      case "swapping":
        throw new Error(`RedirectExchange stepped in state "${current.kind}"`);
    }
  }

  private async send(req: WireRequest): Promise<WireResponse> {
    this.sends += 1;
    this.observer.onSend?.(req, this.sends);
    try {
      return await this.transport.send(req, this.signal);
    } catch (err) {
      if (this.signal?.aborted) throw new RequestAbortedError({ cause: err });
      if (err instanceof TransportError) throw err;
      const message = err instanceof Error ? err.message : String(err);
      throw new TransportError(`Transport failed: ${message}`, { cause: err });
    }
  }
}
