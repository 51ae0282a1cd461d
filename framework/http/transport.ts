/**
 * Node Transport
 *
 * Raw transport backed by node:http. Node parses the wire protocol; this
 * module collects each request body into a RawRequest and exposes the
 * ServerResponse as a RawResponse sink.
 */

import { createServer, type IncomingHttpHeaders, type IncomingMessage, type ServerResponse } from 'node:http';
import type { AddressInfo } from 'node:net';
import { toError } from './errors.ts';
import type {
  BindAddress,
  RawRequest,
  RawResponse,
  ServeOptions,
  Transport,
  TransportListener,
} from './types.ts';
import { getLogger, type Logger } from '../telemetry/logger.ts';

/**
 * The parts of an IncomingMessage the transport reads
 */
export interface IncomingLike extends AsyncIterable<Uint8Array | string> {
  method?: string;
  url?: string;
  httpVersion: string;
  headers: IncomingHttpHeaders;
  socket: { remoteAddress?: string; encrypted?: boolean };
}

/**
 * The parts of a ServerResponse the transport writes to
 */
export interface OutgoingLike {
  readonly headersSent: boolean;
  /** Set once the underlying connection is gone */
  readonly destroyed: boolean;
  writeHead(status: number, statusText: string, headers: string[]): unknown;
  write(chunk: Uint8Array, callback: (error?: Error | null) => void): boolean;
  end(callback: () => void): unknown;
  once(event: 'close', listener: () => void): unknown;
  off(event: 'close', listener: () => void): unknown;
}

/**
 * Read a request to the end and capture it as a RawRequest
 */
export async function readRawRequest(message: IncomingLike): Promise<RawRequest> {
  const chunks: Uint8Array[] = [];
  for await (const chunk of message) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
  }

  return {
    method: message.method,
    url: message.url,
    httpVersion: message.httpVersion,
    headers: message.headers,
    body: Buffer.concat(chunks),
    remoteAddress: message.socket.remoteAddress,
    encrypted: message.socket.encrypted === true,
  };
}

/**
 * Expose a ServerResponse as a RawResponse sink
 */
export function createRawResponse(res: OutgoingLike): RawResponse {
  return {
    get headersSent() {
      return res.headersSent;
    },
    writeHead(status, statusText, headers) {
      // flat [name, value, name, value] keeps repeated headers apart
      res.writeHead(status, statusText, headers.flat());
    },
    write(chunk) {
      return new Promise((resolve, reject) => {
        res.write(chunk, (error) => (error ? reject(error) : resolve()));
      });
    },
    // A response whose client has gone never finishes; settle on close too
    end() {
      return new Promise((resolve, reject) => {
        if (res.destroyed) {
          reject(new Error('Connection closed before the response was sent'));
          return;
        }
        const onClose = (): void => {
          reject(new Error('Connection closed before the response finished'));
        };
        res.once('close', onClose);
        res.end(() => {
          res.off('close', onClose);
          resolve();
        });
      });
    },
  };
}

export interface NodeTransportOptions {
  logger?: Logger;
}

export class NodeTransport implements Transport {
  private logger: Logger;

  constructor(options: NodeTransportOptions = {}) {
    this.logger = (options.logger ?? getLogger()).child({ component: 'transport' });
  }

  /**
   * Listen on the listener's bind address and hand it every request.
   * Rejects on a server error such as EADDRINUSE; resolves once `signal`
   * aborts and the server has closed.
   */
  serve(listener: TransportListener, options: ServeOptions = {}): Promise<void> {
    const { ip, port } = listener.config().bindAddress;
    const { signal, onListen } = options;

    if (signal?.aborted) {
      return Promise.resolve();
    }

    const server = createServer((req, res) => this.handle(listener, req, res));

    return new Promise<void>((resolve, reject) => {
      const stop = (): void => {
        if (!server.listening) {
          server.once('listening', stop);
          return;
        }
        server.close((error) => (error ? reject(error) : resolve()));
        server.closeAllConnections();
      };

      server.once('error', (error) => {
        signal?.removeEventListener('abort', stop);
        reject(error);
      });

      server.listen(port, ip, () => {
        const bound = boundAddress(server.address(), { ip, port });
        this.logger.info(`Listening on http://${bound.ip}:${bound.port}`);
        onListen?.(bound);
      });

      signal?.addEventListener('abort', stop, { once: true });
    });
  }

  private handle(listener: TransportListener, req: IncomingMessage, res: ServerResponse): void {
    void readRawRequest(req)
      .then((raw) => listener.handleRequest(raw, createRawResponse(res)))
      .catch((error: unknown) => {
        this.logger.error('Error reading request', toError(error), {
          method: req.method,
          url: req.url,
        });
        res.destroy();
      });
  }
}

function boundAddress(
  address: string | AddressInfo | null,
  fallback: BindAddress
): BindAddress {
  if (address && typeof address === 'object') {
    return { ip: address.address, port: address.port };
  }
  return fallback;
}
