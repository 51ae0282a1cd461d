/**
 * Response Builder and Response Adapter
 *
 * GirderResponse gives handlers a fluent way to build a native Response.
 * writeBack() streams a Response onto the transport's raw sink.
 */

import { STATUS_CODES } from 'node:http';
import { ResponseWriteError, toError } from './errors.ts';
import type { RawResponse } from './types.ts';

/**
 * Body written for every request that could not be answered normally
 */
export const INTERNAL_SERVER_ERROR_BODY = 'Internal Server Error';

/**
 * Fluent builder for the Response a handler returns
 *
 * ```ts
 * return new GirderResponse().status(201).json({ id });
 * ```
 */
export class GirderResponse {
  private code = 200;
  private readonly fields = new Headers();

  status(code: number): this {
    this.code = code;
    return this;
  }

  header(name: string, value: string): this {
    this.fields.set(name, value);
    return this;
  }

  /**
   * Set the Content-Type header
   */
  type(contentType: string): this {
    return this.header('Content-Type', contentType);
  }

  json(data: unknown): Response {
    return this.type('application/json; charset=utf-8').send(JSON.stringify(data));
  }

  text(content: string): Response {
    return this.type('text/plain; charset=utf-8').send(content);
  }

  /**
   * Send a body without touching Content-Type
   */
  send(content: string): Response {
    return this.build(content);
  }

  redirect(url: string, status: 301 | 302 | 303 | 307 | 308 = 302): Response {
    return this.status(status).header('Location', url).build();
  }

  notFound(message = 'Not Found'): Response {
    return this.status(404).json({ error: message });
  }

  build(body: string | null = null): Response {
    return new Response(body, { status: this.code, headers: new Headers(this.fields) });
  }
}

/**
 * Write a handler's Response onto the raw sink: status line, headers, then
 * the body as it streams out of the Response.
 *
 * @throws ResponseWriteError if the sink or the body stream fails
 */
export async function writeBack(response: Response, sink: RawResponse): Promise<void> {
  try {
    sink.writeHead(
      response.status,
      response.statusText || (STATUS_CODES[response.status] ?? ''),
      headerPairs(response.headers)
    );

    if (response.body) {
      const reader = response.body.getReader();
      for (;;) {
        const { done, value } = await reader.read();
        if (done) break;
        const chunk: Uint8Array = value;
        if (chunk.length > 0) {
          await sink.write(chunk);
        }
      }
    }

    await sink.end();
  } catch (error) {
    throw new ResponseWriteError(
      `Failed to write ${response.status} response: ${toError(error).message}`,
      { cause: error }
    );
  }
}

/**
 * Write the plain-text 500 response used for every dispatch failure
 */
export async function writeInternalServerError(sink: RawResponse): Promise<void> {
  const body = new TextEncoder().encode(INTERNAL_SERVER_ERROR_BODY);
  sink.writeHead(500, 'Internal Server Error', [
    ['content-type', 'text/plain; charset=utf-8'],
    ['content-length', String(body.length)],
  ]);
  await sink.write(body);
  await sink.end();
}

// Cookies are never folded into one line; they follow the other headers
function headerPairs(headers: Headers): Array<[string, string]> {
  const pairs: Array<[string, string]> = [];
  headers.forEach((value, name) => {
    if (name !== 'set-cookie') {
      pairs.push([name, value]);
    }
  });
  for (const cookie of headers.getSetCookie()) {
    pairs.push(['set-cookie', cookie]);
  }
  return pairs;
}
