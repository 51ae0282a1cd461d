/**
 * Request Adapter
 *
 * Turns a raw transport request into a GirderRequest: the method, target,
 * headers and body exactly as received, plus per-request state for the
 * handler.
 */

import { AdaptationError } from './errors.ts';
import type { RawRequest } from './types.ts';

export interface GirderRequestInit {
  method: string;
  url: URL;
  headers: Headers;
  body: Uint8Array;
  httpVersion: string;
  remoteAddress?: string;
}

// RFC 9110 token characters
const METHOD_PATTERN = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;
const VERSION_PATTERN = /^\d\.\d$/;
const HOST_PATTERN = /^[^\s/?#@\\]+$/;
const ABSOLUTE_TARGET_PATTERN = /^https?:\/\//i;

/**
 * Internal request handed to handlers
 */
export class GirderRequest {
  private readonly _method: string;
  private readonly _url: URL;
  private readonly _headers: Headers;
  private readonly _body: Uint8Array;
  private readonly _httpVersion: string;
  private readonly _remoteAddress?: string;
  private readonly _state = new Map<string, unknown>();

  constructor(init: GirderRequestInit) {
    this._method = init.method;
    this._url = init.url;
    this._headers = init.headers;
    this._body = init.body;
    this._httpVersion = init.httpVersion;
    this._remoteAddress = init.remoteAddress;
  }

  /**
   * Build a request from the transport's raw representation.
   * Any token method is accepted, and the body is kept whatever the method.
   *
   * @throws AdaptationError when the method, target, version or headers are malformed
   */
  static fromRaw(raw: RawRequest): GirderRequest {
    const method = raw.method ?? '';
    if (!METHOD_PATTERN.test(method)) {
      throw new AdaptationError(`Invalid request method: ${JSON.stringify(method)}`);
    }
    if (!VERSION_PATTERN.test(raw.httpVersion)) {
      throw new AdaptationError(`Invalid HTTP version: ${JSON.stringify(raw.httpVersion)}`);
    }

    const headers = adaptHeaders(raw.headers);
    return new GirderRequest({
      method,
      url: adaptTarget(raw.url, headers.get('host'), raw.encrypted === true),
      headers,
      body: new Uint8Array(raw.body),
      httpVersion: raw.httpVersion,
      remoteAddress: raw.remoteAddress,
    });
  }

  get method(): string {
    return this._method;
  }

  /**
   * Full URL
   */
  get url(): string {
    return this._url.href;
  }

  /**
   * URL path (without query string)
   */
  get path(): string {
    return this._url.pathname;
  }

  get query(): URLSearchParams {
    return this._url.searchParams;
  }

  get headers(): Headers {
    return this._headers;
  }

  /**
   * Get a specific header value
   */
  header(name: string): string | null {
    return this._headers.get(name);
  }

  get httpVersion(): string {
    return this._httpVersion;
  }

  get remoteAddress(): string | undefined {
    return this._remoteAddress;
  }

  /**
   * Per-request state owned by the handler for the duration of the call
   */
  get state(): Map<string, unknown> {
    return this._state;
  }

  get isSecure(): boolean {
    return this._url.protocol === 'https:';
  }

  get contentType(): string | null {
    return this.header('Content-Type');
  }

  get hostname(): string {
    return this._url.hostname;
  }

  /**
   * Client IP address (accounting for proxies)
   */
  get ip(): string {
    return (
      this.header('X-Forwarded-For')?.split(',')[0]?.trim() ??
      this.header('X-Real-IP') ??
      this._remoteAddress ??
      'unknown'
    );
  }

  /**
   * Copy of the body bytes; empty when nothing was sent
   */
  async bytes(): Promise<Uint8Array> {
    return this._body.slice();
  }

  async text(): Promise<string> {
    return new TextDecoder().decode(this._body);
  }

  /**
   * Parse the body as JSON
   */
  async json(): Promise<unknown> {
    return JSON.parse(await this.text());
  }

  /**
   * Fields worth logging when this request fails
   */
  describe(): Record<string, unknown> {
    const headers: Record<string, string> = {};
    this._headers.forEach((value, name) => {
      headers[name] = value;
    });
    return {
      method: this.method,
      url: this.url,
      httpVersion: this.httpVersion,
      remoteAddress: this.remoteAddress,
      headers,
    };
  }

  /**
   * Request line, e.g. `GET /users?page=2 HTTP/1.1`
   */
  toString(): string {
    return `${this.method} ${this._url.pathname}${this._url.search} HTTP/${this.httpVersion}`;
  }
}

function adaptHeaders(raw: RawRequest['headers']): Headers {
  const headers = new Headers();
  for (const [name, value] of Object.entries(raw)) {
    if (value === undefined) continue;
    const values = Array.isArray(value) ? value : [value];
    for (const item of values) {
      try {
        headers.append(name, item);
      } catch (error) {
        throw new AdaptationError(`Invalid header ${JSON.stringify(name)}`, { cause: error });
      }
    }
  }
  return headers;
}

function adaptTarget(target: string | undefined, host: string | null, encrypted: boolean): URL {
  if (!target) {
    throw new AdaptationError('Missing request target');
  }

  try {
    if (ABSOLUTE_TARGET_PATTERN.test(target)) {
      return new URL(target);
    }
    if (target.startsWith('/') || target === '*') {
      const authority = host ?? 'localhost';
      if (!HOST_PATTERN.test(authority)) {
        throw new AdaptationError(`Invalid Host header: ${JSON.stringify(authority)}`);
      }
      const path = target === '*' ? '/*' : target;
      return new URL(`${encrypted ? 'https' : 'http'}://${authority}${path}`);
    }
  } catch (error) {
    if (error instanceof AdaptationError) throw error;
    throw new AdaptationError(`Invalid request target: ${JSON.stringify(target)}`, {
      cause: error,
    });
  }

  throw new AdaptationError(`Invalid request target: ${JSON.stringify(target)}`);
}
