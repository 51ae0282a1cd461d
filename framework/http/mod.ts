/**
 * HTTP Layer
 *
 * Binds one handler to an address and runs every request through it.
 *
 * Responsibilities:
 * - Adapt raw transport requests into GirderRequest values
 * - Share the handler safely across concurrent requests
 * - Write handler responses back, or the 500 fallback on failure
 * - Enable testability (in-memory transport and response)
 */

export { Server, type ListenOptions } from './server.ts';
export { Dispatcher, type DispatcherOptions } from './dispatcher.ts';
export { SharedHandler } from './shared.ts';
export { GirderRequest, type GirderRequestInit } from './request.ts';
export {
  GirderResponse,
  INTERNAL_SERVER_ERROR_BODY,
  writeBack,
  writeInternalServerError,
} from './response.ts';
export {
  NodeTransport,
  createRawResponse,
  readRawRequest,
  type IncomingLike,
  type NodeTransportOptions,
  type OutgoingLike,
} from './transport.ts';
export {
  MemoryTransport,
  MemoryResponse,
  rawRequest,
  type MemoryResponseOptions,
  type MemoryTransportOptions,
} from './testing.ts';
export {
  GirderError,
  GirderErrorCodes,
  AdaptationError,
  HandlerError,
  ResponseWriteError,
  ServerConsumedError,
  toError,
  type GirderErrorCode,
} from './errors.ts';
export {
  toHandler,
  type Handler,
  type HandlerFunction,
  type HandlerLike,
  type BindAddress,
  type TransportConfig,
  type RawRequest,
  type RawResponse,
  type TransportListener,
  type ServeOptions,
  type Transport,
} from './types.ts';
