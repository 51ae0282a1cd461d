/**
 * HTTP Type Definitions
 */

import type { GirderRequest } from './request.ts';

/**
 * Request handler capability.
 *
 * One handler instance serves every request the server receives, so `call`
 * may run for many requests at once. It must produce exactly one Response
 * per call or fail by throwing (or rejecting), and must not hold on to the
 * request after it settles.
 */
export interface Handler {
  call(request: GirderRequest): Promise<Response> | Response;
}

/**
 * Plain function form of a handler
 */
export type HandlerFunction = (request: GirderRequest) => Promise<Response> | Response;

/**
 * Anything accepted where a handler is expected
 */
export type HandlerLike = Handler | HandlerFunction;

/**
 * Normalize a handler function or object to the Handler interface
 */
export function toHandler(handler: HandlerLike): Handler {
  if (typeof handler === 'function') {
    return { call: handler };
  }
  return handler;
}

/**
 * Address a server binds to
 */
export interface BindAddress {
  ip: string;
  port: number;
}

/**
 * Configuration a transport reads from its listener
 */
export interface TransportConfig {
  bindAddress: Readonly<BindAddress>;
}

/**
 * Request as produced by the transport layer, body already collected
 */
export interface RawRequest {
  method?: string;
  url?: string;
  httpVersion: string;
  headers: Record<string, string | string[] | undefined>;
  body: Uint8Array;
  remoteAddress?: string;
  encrypted?: boolean;
}

/**
 * Writable response sink exposed by the transport layer
 */
export interface RawResponse {
  /** True once the status line and headers have been written */
  readonly headersSent: boolean;
  writeHead(status: number, statusText: string, headers: Array<[string, string]>): void;
  write(chunk: Uint8Array): Promise<void>;
  end(): Promise<void>;
}

/**
 * Callback contract a transport drives for every request
 */
export interface TransportListener {
  config(): TransportConfig;
  handleRequest(raw: RawRequest, sink: RawResponse): Promise<void>;
}

export interface ServeOptions {
  /** Stops the transport when aborted */
  signal?: AbortSignal;
  /** Called once the listener is bound, with the address actually bound */
  onListen?: (address: BindAddress) => void;
}

/**
 * A raw transport server: binds, accepts and drives a listener
 */
export interface Transport {
  serve(listener: TransportListener, options?: ServeOptions): Promise<void>;
}

