/**
 * HTTP Errors
 *
 * Failures that can occur while a request moves through the dispatcher.
 * None of them leave a single dispatch: the dispatcher logs them and answers
 * the request with the 500 fallback.
 */

/**
 * Error codes carried by Girder errors
 */
export const GirderErrorCodes = {
  ADAPTATION_ERROR: 'ADAPTATION_ERROR',
  HANDLER_ERROR: 'HANDLER_ERROR',
  RESPONSE_WRITE_ERROR: 'RESPONSE_WRITE_ERROR',
  SERVER_CONSUMED: 'SERVER_CONSUMED',
} as const;

export type GirderErrorCode = (typeof GirderErrorCodes)[keyof typeof GirderErrorCodes];

/**
 * Base class for errors raised by the framework
 */
export class GirderError extends Error {
  constructor(
    message: string,
    public readonly code: GirderErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'GirderError';
  }
}

/**
 * The raw transport request could not be turned into a GirderRequest
 */
export class AdaptationError extends GirderError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, GirderErrorCodes.ADAPTATION_ERROR, options);
    this.name = 'AdaptationError';
  }
}

/**
 * The handler threw, rejected, or returned something other than a Response
 */
export class HandlerError extends GirderError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, GirderErrorCodes.HANDLER_ERROR, options);
    this.name = 'HandlerError';
  }
}

/**
 * Writing a response onto the raw sink failed
 */
export class ResponseWriteError extends GirderError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, GirderErrorCodes.RESPONSE_WRITE_ERROR, options);
    this.name = 'ResponseWriteError';
  }
}

/**
 * listen() was called on a server that has already been started
 */
export class ServerConsumedError extends GirderError {
  constructor() {
    super('Server has already been started', GirderErrorCodes.SERVER_CONSUMED);
    this.name = 'ServerConsumedError';
  }
}

/**
 * Normalize a thrown value into an Error
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }
  return new Error(typeof value === 'string' ? value : String(value));
}
