/**
 * Greeting Handler
 *
 * Sample application handler. Keeps a count of requests served, which is
 * safe to share: every call runs on the event loop.
 */

import { GirderResponse, type GirderRequest, type Handler } from '../../framework/mod.ts';

export class GreetingHandler implements Handler {
  private served = 0;

  get requestsServed(): number {
    return this.served;
  }

  async call(req: GirderRequest): Promise<Response> {
    this.served++;

    if (req.method === 'GET' && req.path === '/') {
      return new GirderResponse().text('Hello, world!');
    }

    if (req.method === 'GET' && req.path === '/greet') {
      const name = req.query.get('name')?.trim() || 'stranger';
      return new GirderResponse().text(`Hello, ${name}!`);
    }

    if (req.method === 'POST' && req.path === '/echo') {
      const body = await req.text();
      return new GirderResponse()
        .type(req.contentType ?? 'text/plain; charset=utf-8')
        .send(body);
    }

    if (req.method === 'GET' && req.path === '/stats') {
      return new GirderResponse().json({ requestsServed: this.served });
    }

    return new GirderResponse().notFound();
  }
}
