/**
 * Girder Framework
 *
 * Single-handler HTTP server for Node.js.
 *
 * @module girder
 */

// HTTP/Server
export {
  Server,
  Dispatcher,
  SharedHandler,
  GirderRequest,
  GirderResponse,
  NodeTransport,
  MemoryTransport,
  MemoryResponse,
  rawRequest,
  writeBack,
  writeInternalServerError,
  toHandler,
  INTERNAL_SERVER_ERROR_BODY,
  GirderError,
  AdaptationError,
  HandlerError,
  ResponseWriteError,
  ServerConsumedError,
  type Handler,
  type HandlerFunction,
  type HandlerLike,
  type ListenOptions,
  type BindAddress,
  type RawRequest,
  type RawResponse,
  type Transport,
  type TransportListener,
} from './http/mod.ts';

// Configuration
export { Config, ConfigError, loadConfig, type ConfigOptions } from './config/mod.ts';

// Telemetry
export {
  Logger,
  getLogger,
  setLogger,
  withSpan,
  type LogLevel,
  type LogEntry,
  type LoggerOptions,
} from './telemetry/mod.ts';
