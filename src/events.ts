import type { HttpMethod, RedirectHop } from "./types.js";

export type RedirectClientEventName =
  | "request:start"
  | "request:redirect"
  | "request:success"
  | "request:failure";

export interface RequestEventBase {
  requestId: string; // generated id, unique per call
}

export interface RequestStartEvent extends RequestEventBase {
  method: HttpMethod;
  url: string;
}

export interface RequestRedirectEvent extends RequestEventBase {
  hop: RedirectHop;
}

export interface RequestSuccessEvent extends RequestEventBase {
  status: number;
  url: string;
  redirects: number;
  durationMs: number;
}

export interface RequestFailureEvent extends RequestEventBase {
  error: unknown;
  durationMs: number;
}

export interface RedirectClientEvents {
  "request:start": [RequestStartEvent];
  "request:redirect": [RequestRedirectEvent];
  "request:success": [RequestSuccessEvent];
  "request:failure": [RequestFailureEvent];
}
