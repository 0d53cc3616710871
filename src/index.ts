export { RedirectClient, createRequest, followRedirects, followRedirectsMax } from "./client.js";
export type { OutgoingRequestInit } from "./client.js";
export { RedirectExchange } from "./exchange.js";
export type { ExchangeObserver, ExchangeOptions, ExchangeResult } from "./exchange.js";
export { RedirectStateMachine, SENSITIVE_HEADERS } from "./machine.js";
export type { MachineSnapshot, RedirectDecision } from "./machine.js";
export { BodyBuffer } from "./buffer.js";
export { isSameHost, parseUriReference, resolveLocation } from "./uri.js";
export type { UriReference } from "./uri.js";
export { HeaderList } from "./utils/headerList.js";
export type { HeaderEntry, HeadersInit } from "./utils/headerList.js";
export { createUndiciTransport } from "./http.js";
export type { UndiciTransportOptions } from "./http.js";
export { DEFAULT_MAX_REDIRECTS, loadConfig, loadLogLevel } from "./config.js";
export type { LogLevel, RedirectFollowerConfig } from "./config.js";
export { createLogger } from "./logger.js";
export type { Logger } from "./logger.js";
export * from "./errors.js";
export type * from "./events.js";
export type * from "./types.js";
