/**
 * Dispatcher Tests
 */

import { test } from 'node:test';
import assert from 'node:assert/strict';
import { setTimeout as delay } from 'node:timers/promises';
import { Dispatcher } from '../../framework/http/dispatcher.ts';
import { GirderResponse } from '../../framework/http/response.ts';
import { SharedHandler } from '../../framework/http/shared.ts';
import { MemoryResponse, rawRequest } from '../../framework/http/testing.ts';
import { toHandler, type Handler, type HandlerLike } from '../../framework/http/types.ts';
import { Logger, type LogEntry } from '../../framework/telemetry/logger.ts';

function captureLogger(): { logger: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  return { entries, logger: new Logger({ level: 'debug', output: (entry) => entries.push(entry) }) };
}

function createDispatcher(handler: HandlerLike, logger = captureLogger().logger): Dispatcher {
  return new Dispatcher(new SharedHandler(toHandler(handler)), { ip: '127.0.0.1', port: 8080 }, {
    logger,
  });
}

function countingHandler(): { handler: Handler; calls: () => number } {
  let count = 0;
  return {
    calls: () => count,
    handler: {
      call: () => {
        count++;
        return new GirderResponse().text('counted');
      },
    },
  };
}

test('Dispatcher.config - reports the bind address', () => {
  const dispatcher = createDispatcher(() => new Response('ok'));
  const config = dispatcher.config();
  assert.deepEqual(config, { bindAddress: { ip: '127.0.0.1', port: 8080 } });
  assert.equal(Object.isFrozen(config.bindAddress), true);
});

// Success pass-through

test('Dispatcher - writes a 200 response through unchanged', async () => {
  const dispatcher = createDispatcher(() => new GirderResponse().text('hello world'));
  const sink = new MemoryResponse();

  await dispatcher.handleRequest(rawRequest(), sink);

  assert.equal(sink.status, 200);
  assert.equal(sink.statusText, 'OK');
  assert.deepEqual(sink.headers, [['content-type', 'text/plain; charset=utf-8']]);
  assert.equal(sink.text(), 'hello world');
  assert.equal(sink.headCount, 1);
  assert.equal(sink.endCount, 1);
});

test('Dispatcher - writes a non-200 response with custom headers', async () => {
  const dispatcher = createDispatcher(
    () =>
      new Response('gone', {
        status: 404,
        headers: { 'X-Request-Id': 'abc', 'Cache-Control': 'no-store' },
      })
  );
  const sink = new MemoryResponse();

  await dispatcher.handleRequest(rawRequest({ url: '/missing' }), sink);

  assert.equal(sink.status, 404);
  assert.equal(sink.statusText, 'Not Found');
  assert.deepEqual(sink.headers, [
    ['cache-control', 'no-store'],
    ['content-type', 'text/plain;charset=UTF-8'],
    ['x-request-id', 'abc'],
  ]);
  assert.equal(sink.text(), 'gone');
});

test('Dispatcher - hands the adapted request to the handler', async () => {
  const seen: string[] = [];
  const dispatcher = createDispatcher(async (req) => {
    seen.push(req.method, req.path, req.header('x-token') ?? '', await req.text());
    return new Response(null, { status: 204 });
  });

  await dispatcher.handleRequest(
    rawRequest({
      method: 'POST',
      url: '/orders',
      headers: { host: 'localhost', 'x-token': 'test-secret' },
      body: new TextEncoder().encode('qty=2'),
    }),
    new MemoryResponse()
  );

  assert.deepEqual(seen, ['POST', '/orders', 'test-secret', 'qty=2']);
});

test('Dispatcher - hands TRACE requests and GET bodies to the handler', async () => {
  const seen: string[] = [];
  const dispatcher = createDispatcher(async (req) => {
    seen.push(`${req.method} ${await req.text()}`);
    return new Response('seen');
  });

  const traceSink = new MemoryResponse();
  await dispatcher.handleRequest(
    rawRequest({ method: 'TRACE', body: new TextEncoder().encode('loop') }),
    traceSink
  );
  const getSink = new MemoryResponse();
  await dispatcher.handleRequest(
    rawRequest({ body: new TextEncoder().encode('q=1') }),
    getSink
  );

  assert.deepEqual(seen, ['TRACE loop', 'GET q=1']);
  assert.equal(traceSink.status, 200);
  assert.equal(getSink.status, 200);
});

// Adaptation failure

test('Dispatcher - answers 500 without calling the handler when adaptation fails', async () => {
  const { handler, calls } = countingHandler();
  const { logger, entries } = captureLogger();
  const dispatcher = createDispatcher(handler, logger);
  const sink = new MemoryResponse();

  await dispatcher.handleRequest(rawRequest({ method: 'BAD METHOD' }), sink);

  assert.equal(calls(), 0);
  assert.equal(sink.status, 500);
  assert.equal(sink.text(), 'Internal Server Error');
  assert.equal(sink.headCount, 1);
  assert.equal(entries.length, 1);
  assert.equal(entries[0]?.level, 'error');
  assert.equal(entries[0]?.message, 'Error getting request');
  assert.equal(entries[0]?.error?.name, 'AdaptationError');
  assert.equal(entries[0]?.context?.component, 'dispatcher');
});

test('Dispatcher - answers 500 for an unparseable request target', async () => {
  const { handler, calls } = countingHandler();
  const dispatcher = createDispatcher(handler);
  const sink = new MemoryResponse();

  await dispatcher.handleRequest(rawRequest({ url: 'garbage' }), sink);

  assert.equal(calls(), 0);
  assert.equal(sink.status, 500);
  assert.equal(sink.text(), 'Internal Server Error');
});

// Handler failure

test('Dispatcher - answers 500 when the handler throws', async () => {
  const { logger, entries } = captureLogger();
  const dispatcher = createDispatcher(() => {
    throw new Error('boom');
  }, logger);
  const sink = new MemoryResponse();

  await dispatcher.handleRequest(rawRequest({ url: '/fail' }), sink);

  assert.equal(sink.status, 500);
  assert.equal(sink.statusText, 'Internal Server Error');
  assert.equal(sink.text(), 'Internal Server Error');
  assert.equal(entries.length, 1);
  assert.equal(entries[0]?.message, 'Error handling GET /fail HTTP/1.1');
  assert.equal(entries[0]?.error?.name, 'HandlerError');
  assert.equal(entries[0]?.error?.message, 'boom');
  assert.equal(entries[0]?.error?.cause, 'boom');
  assert.deepEqual(entries[0]?.context?.request, {
    method: 'GET',
    url: 'http://localhost/fail',
    httpVersion: '1.1',
    remoteAddress: undefined,
    headers: { host: 'localhost' },
  });
});

test('Dispatcher - answers 500 when the handler rejects', async () => {
  const dispatcher = createDispatcher(async () => {
    await delay(1);
    throw new Error('database unavailable');
  });
  const sink = new MemoryResponse();

  await dispatcher.handleRequest(rawRequest(), sink);

  assert.equal(sink.status, 500);
  assert.equal(sink.text(), 'Internal Server Error');
});

test('Dispatcher - answers 500 when the handler returns something other than a Response', async () => {
  const { logger, entries } = captureLogger();
  const notAResponse: Handler = { call: () => JSON.parse('"nope"') };
  const dispatcher = createDispatcher(notAResponse, logger);
  const sink = new MemoryResponse();

  await dispatcher.handleRequest(rawRequest(), sink);

  assert.equal(sink.status, 500);
  assert.equal(entries[0]?.error?.message, 'Handler returned string instead of a Response');
});

test('Dispatcher - adaptation and handler failures look the same on the wire', async () => {
  const adaptSink = new MemoryResponse();
  const handlerSink = new MemoryResponse();

  await createDispatcher(() => new Response('unused')).handleRequest(
    rawRequest({ httpVersion: 'banana' }),
    adaptSink
  );
  await createDispatcher(() => Promise.reject(new Error('nope'))).handleRequest(
    rawRequest(),
    handlerSink
  );

  assert.deepEqual(
    [adaptSink.status, adaptSink.statusText, adaptSink.headers, adaptSink.text()],
    [handlerSink.status, handlerSink.statusText, handlerSink.headers, handlerSink.text()]
  );
});

// Write failures and the exactly-once guarantee

test('Dispatcher - does not write a second status line after a mid-body failure', async () => {
  const { logger, entries } = captureLogger();
  const dispatcher = createDispatcher(() => new Response('partial body'), logger);
  const sink = new MemoryResponse({ failOnWrite: new Error('connection reset') });

  await dispatcher.handleRequest(rawRequest(), sink);

  assert.equal(sink.headCount, 1);
  assert.equal(sink.status, 200);
  assert.equal(sink.endCount, 1);
  assert.equal(entries[0]?.message, 'Error writing response');
  assert.equal(entries[0]?.error?.name, 'ResponseWriteError');
});

test('Dispatcher - falls back to 500 when write-back fails before the headers', async () => {
  class FailingHeadResponse extends MemoryResponse {
    private failed = false;

    override writeHead(status: number, statusText: string, headers: Array<[string, string]>): void {
      if (!this.failed) {
        this.failed = true;
        throw new Error('bad header value');
      }
      super.writeHead(status, statusText, headers);
    }
  }
  const dispatcher = createDispatcher(() => new Response('fine'));
  const sink = new FailingHeadResponse();

  await dispatcher.handleRequest(rawRequest(), sink);

  assert.equal(sink.headCount, 1);
  assert.equal(sink.status, 500);
  assert.equal(sink.text(), 'Internal Server Error');
});

test('Dispatcher.handleRequest - resolves even when the fallback cannot be written', async () => {
  const { logger, entries } = captureLogger();
  const dispatcher = createDispatcher(() => {
    throw new Error('boom');
  }, logger);
  const sink = new MemoryResponse({ failOnWrite: new Error('socket closed') });

  await assert.doesNotReject(dispatcher.handleRequest(rawRequest(), sink));

  assert.equal(sink.headCount, 1);
  assert.deepEqual(
    entries.map((entry) => entry.message),
    ['Error handling GET / HTTP/1.1', 'Error writing response']
  );
});

test('Dispatcher - writes exactly one response for every kind of request', async () => {
  const dispatcher = createDispatcher((req) => {
    if (req.path === '/throw') throw new Error('thrown');
    return new Response(req.path);
  });
  const requests = [
    rawRequest({ url: '/ok' }),
    rawRequest({ url: '/throw' }),
    rawRequest({ method: '' }),
    rawRequest({ url: undefined }),
    rawRequest({ headers: { 'bad header': 'x' } }),
  ];

  for (const raw of requests) {
    const sink = new MemoryResponse();
    await dispatcher.handleRequest(raw, sink);
    assert.equal(sink.headCount, 1);
    assert.equal(sink.endCount, 1);
  }
});

// Concurrency

test('Dispatcher - pairs 100 concurrent requests with their own responses', async () => {
  const dispatcher = createDispatcher(async (req) => {
    const id = req.query.get('id') ?? '';
    await delay(Number(id) % 7);
    return new Response(`response-${id}`, { headers: { 'X-Id': id } });
  });

  const sinks = Array.from({ length: 100 }, () => new MemoryResponse());
  await Promise.all(
    sinks.map((sink, i) => dispatcher.handleRequest(rawRequest({ url: `/item?id=${i}` }), sink))
  );

  sinks.forEach((sink, i) => {
    assert.equal(sink.status, 200);
    assert.equal(sink.text(), `response-${i}`);
    assert.equal(sink.header('x-id'), String(i));
    assert.equal(sink.headCount, 1);
  });
});

test('Dispatcher - holds a handler reference for each in-flight request', async () => {
  let releaseGate: () => void = () => undefined;
  const gate = new Promise<void>((resolve) => {
    releaseGate = resolve;
  });
  const dispatcher = createDispatcher(async () => {
    await gate;
    return new Response('done');
  });

  const pending = [1, 2, 3].map(() => dispatcher.handleRequest(rawRequest(), new MemoryResponse()));
  await delay(5);
  assert.equal(dispatcher.references, 4);

  releaseGate();
  await Promise.all(pending);
  assert.equal(dispatcher.references, 1);
});

// Cloning

test('Dispatcher.clone - shares the handler and address', async () => {
  const { handler, calls } = countingHandler();
  const dispatcher = createDispatcher(handler);
  const clone = dispatcher.clone();

  assert.equal(dispatcher.references, 2);
  assert.deepEqual(clone.config(), dispatcher.config());

  await clone.handleRequest(rawRequest(), new MemoryResponse());
  await dispatcher.handleRequest(rawRequest(), new MemoryResponse());
  assert.equal(calls(), 2);

  clone.release();
  clone.release();
  assert.equal(dispatcher.references, 1);
});

test('Dispatcher - answers 500 once its last handler reference is gone', async () => {
  const { handler, calls } = countingHandler();
  const { logger, entries } = captureLogger();
  const dispatcher = createDispatcher(handler, logger);
  dispatcher.release();
  const sink = new MemoryResponse();

  await dispatcher.handleRequest(rawRequest(), sink);

  assert.equal(calls(), 0);
  assert.equal(sink.status, 500);
  assert.equal(dispatcher.references, 0);
  assert.equal(entries[0]?.message, 'Error handling GET / HTTP/1.1');
  assert.equal(
    entries[0]?.error?.message,
    'SharedHandler retained after its last reference was released'
  );
});
