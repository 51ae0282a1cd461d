/**
 * HTTP Server
 *
 * Holds the application's single handler and puts it on the network.
 *
 * ```ts
 * await Server.around(new GreetingHandler()).listen('127.0.0.1', 3000);
 * ```
 */

import { Dispatcher } from './dispatcher.ts';
import { ServerConsumedError } from './errors.ts';
import { SharedHandler } from './shared.ts';
import { NodeTransport } from './transport.ts';
import { toHandler, type Handler, type HandlerLike, type ServeOptions, type Transport } from './types.ts';
import { getLogger, type Logger } from '../telemetry/logger.ts';

export interface ListenOptions extends ServeOptions {
  /** Raw transport to serve on (default: node:http) */
  transport?: Transport;
  logger?: Logger;
}

export class Server {
  readonly handler: Handler;
  private consumed = false;

  private constructor(handler: Handler) {
    this.handler = handler;
  }

  /**
   * Wrap a handler in a new server
   */
  static around(handler: HandlerLike): Server {
    return new Server(toHandler(handler));
  }

  /**
   * Bind to `ip:port` and serve requests until the transport stops.
   *
   * Make this the last step of startup: the returned promise does not
   * settle while the server is running. It rejects if the transport fails
   * (for example when the address is in use) and resolves only after
   * `options.signal` aborts and the transport has closed. A server can be
   * started once.
   */
  async listen(ip: string, port: number, options: ListenOptions = {}): Promise<void> {
    if (this.consumed) {
      throw new ServerConsumedError();
    }
    this.consumed = true;

    const logger = options.logger ?? getLogger();
    const transport = options.transport ?? new NodeTransport({ logger });
    const dispatcher = new Dispatcher(new SharedHandler(this.handler), { ip, port }, { logger });

    try {
      await transport.serve(dispatcher, { signal: options.signal, onListen: options.onListen });
    } finally {
      dispatcher.release();
    }
  }
}
