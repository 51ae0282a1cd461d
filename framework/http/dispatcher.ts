/**
 * Dispatcher
 *
 * Per-request glue between a transport and the handler: adapt the raw
 * request, call the handler, write its Response back. Every request gets
 * exactly one response; anything that goes wrong before the response is
 * under way is answered with the plain-text 500.
 */

import { AdaptationError, HandlerError, toError } from './errors.ts';
import { GirderRequest } from './request.ts';
import { writeBack, writeInternalServerError } from './response.ts';
import { SharedHandler } from './shared.ts';
import type {
  BindAddress,
  RawRequest,
  RawResponse,
  TransportConfig,
  TransportListener,
} from './types.ts';
import { getLogger, type Logger } from '../telemetry/logger.ts';
import { recordSpanException, SpanKind, withSpan, type Span } from '../telemetry/otel.ts';

export interface DispatcherOptions {
  /** Logger for failed requests; defaults to the process-wide logger */
  logger?: Logger;
}

export class Dispatcher implements TransportListener {
  private readonly handler: SharedHandler;
  private readonly address: Readonly<BindAddress>;
  private readonly baseLogger: Logger;
  private readonly logger: Logger;
  private released = false;

  constructor(handler: SharedHandler, address: BindAddress, options: DispatcherOptions = {}) {
    this.handler = handler;
    this.address = Object.freeze({ ip: address.ip, port: address.port });
    this.baseLogger = options.logger ?? getLogger();
    this.logger = this.baseLogger.child({ component: 'dispatcher' });
  }

  config(): TransportConfig {
    return { bindAddress: this.address };
  }

  /**
   * Live references to the shared handler: this dispatcher, its clones and
   * every dispatch currently inside the handler
   */
  get references(): number {
    return this.handler.refCount;
  }

  /**
   * A second dispatcher over the same handler and address, for transports
   * that want one handle per connection or worker
   */
  clone(): Dispatcher {
    return new Dispatcher(this.handler.retain(), this.address, { logger: this.baseLogger });
  }

  /**
   * Drop this dispatcher's reference to the handler. Safe to call twice.
   */
  release(): void {
    if (this.released) return;
    this.released = true;
    this.handler.release();
  }

  /**
   * Answer one request. Never rejects.
   */
  async handleRequest(raw: RawRequest, sink: RawResponse): Promise<void> {
    await withSpan(`HTTP ${raw.method ?? 'UNKNOWN'}`, (span) => this.dispatch(raw, sink, span), {
      kind: SpanKind.SERVER,
      attributes: {
        'http.request.method': raw.method ?? '',
        'url.path': raw.url ?? '',
      },
    });
  }

  private async dispatch(raw: RawRequest, sink: RawResponse, span: Span): Promise<void> {
    let request: GirderRequest;
    try {
      request = GirderRequest.fromRaw(raw);
    } catch (error) {
      const err =
        error instanceof AdaptationError
          ? error
          : new AdaptationError(toError(error).message, { cause: error });
      this.logger.error('Error getting request', err);
      recordSpanException(span, err);
      await this.fail(sink, span);
      return;
    }

    let response: Response;
    try {
      response = await this.invoke(request);
    } catch (error) {
      const err = toError(error);
      this.logger.error(`Error handling ${request}`, err, { request: request.describe() });
      recordSpanException(span, err);
      await this.fail(sink, span);
      return;
    }

    try {
      await writeBack(response, sink);
      span.setAttribute('http.response.status_code', response.status);
    } catch (error) {
      const err = toError(error);
      this.logger.error('Error writing response', err, { request: request.toString() });
      recordSpanException(span, err);
      if (sink.headersSent) {
        await this.finish(sink);
      } else {
        await this.fail(sink, span);
      }
    }
  }

  private async invoke(request: GirderRequest): Promise<Response> {
    const handle = this.handler.retain();
    try {
      const result: unknown = await handle.call(request);
      if (!(result instanceof Response)) {
        throw new HandlerError(`Handler returned ${describeValue(result)} instead of a Response`);
      }
      return result;
    } catch (error) {
      if (error instanceof HandlerError) throw error;
      throw new HandlerError(toError(error).message, { cause: error });
    } finally {
      handle.release();
    }
  }

  private async fail(sink: RawResponse, span: Span): Promise<void> {
    span.setAttribute('http.response.status_code', 500);
    try {
      await writeInternalServerError(sink);
    } catch (error) {
      this.logger.error('Error writing response', toError(error));
    }
  }

  // Headers are already out, so the status cannot change; close what was sent
  private async finish(sink: RawResponse): Promise<void> {
    try {
      await sink.end();
    } catch (error) {
      this.logger.error('Error closing response', toError(error));
    }
  }
}

function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (typeof value === 'object') return `an instance of ${value.constructor?.name ?? 'Object'}`;
  return typeof value;
}
