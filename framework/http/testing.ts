/**
 * In-process transport for tests.
 *
 * MemoryTransport drives a listener without sockets; MemoryResponse records
 * everything written to it.
 */

import type {
  RawRequest,
  RawResponse,
  ServeOptions,
  Transport,
  TransportListener,
} from './types.ts';

/**
 * Build a RawRequest with sensible defaults for a GET of `/`
 */
export function rawRequest(overrides: Partial<RawRequest> = {}): RawRequest {
  return {
    method: 'GET',
    url: '/',
    httpVersion: '1.1',
    headers: { host: 'localhost' },
    body: new Uint8Array(0),
    ...overrides,
  };
}

export interface MemoryResponseOptions {
  /** Make every body write fail with this error */
  failOnWrite?: Error;
}

/**
 * RawResponse that keeps what was written
 */
export class MemoryResponse implements RawResponse {
  status = 0;
  statusText = '';
  headers: Array<[string, string]> = [];
  chunks: Uint8Array[] = [];
  /** How many times a status line was written */
  headCount = 0;
  endCount = 0;
  private failOnWrite?: Error;

  constructor(options: MemoryResponseOptions = {}) {
    this.failOnWrite = options.failOnWrite;
  }

  get headersSent(): boolean {
    return this.headCount > 0;
  }

  writeHead(status: number, statusText: string, headers: Array<[string, string]>): void {
    this.headCount++;
    this.status = status;
    this.statusText = statusText;
    this.headers = [...headers];
  }

  async write(chunk: Uint8Array): Promise<void> {
    if (this.failOnWrite) {
      throw this.failOnWrite;
    }
    this.chunks.push(chunk.slice());
  }

  async end(): Promise<void> {
    this.endCount++;
  }

  /**
   * First value of a header, matched case-insensitively
   */
  header(name: string): string | undefined {
    const lower = name.toLowerCase();
    return this.headers.find(([key]) => key.toLowerCase() === lower)?.[1];
  }

  text(): string {
    return Buffer.concat(this.chunks).toString('utf8');
  }
}

export interface MemoryTransportOptions {
  /** Make serve() fail the way a bind failure would */
  bindError?: Error;
}

/**
 * Transport that serves a listener inside the current process
 */
export class MemoryTransport implements Transport {
  private listener: TransportListener | null = null;
  private bindError?: Error;

  constructor(options: MemoryTransportOptions = {}) {
    this.bindError = options.bindError;
  }

  get listening(): boolean {
    return this.listener !== null;
  }

  serve(listener: TransportListener, options: ServeOptions = {}): Promise<void> {
    if (this.bindError) {
      return Promise.reject(this.bindError);
    }

    return new Promise<void>((resolve) => {
      const stop = (): void => {
        this.listener = null;
        resolve();
      };

      if (options.signal?.aborted) {
        stop();
        return;
      }

      this.listener = listener;
      options.signal?.addEventListener('abort', stop, { once: true });
      options.onListen?.({ ...listener.config().bindAddress });
    });
  }

  /**
   * Send one request through the listener and return what it wrote
   */
  async inject(raw: RawRequest, response: MemoryResponse = new MemoryResponse()): Promise<MemoryResponse> {
    if (!this.listener) {
      throw new Error('MemoryTransport is not serving');
    }
    await this.listener.handleRequest(raw, response);
    return response;
  }
}
