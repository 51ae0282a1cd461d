/**
 * Shared Handler Handle
 *
 * Reference-counted handle around the one handler a server runs. Every
 * dispatcher clone and every in-flight dispatch holds a reference; the
 * handler itself is never swapped or mutated through the handle.
 */

import type { GirderRequest } from './request.ts';
import type { Handler } from './types.ts';

export class SharedHandler {
  private readonly handler: Handler;
  private refs = 1;

  constructor(handler: Handler) {
    this.handler = handler;
  }

  /**
   * Number of live references, including the creator's
   */
  get refCount(): number {
    return this.refs;
  }

  /**
   * Take another reference to the same handler. A handle whose last
   * reference was released stays dead.
   */
  retain(): this {
    if (this.refs === 0) {
      throw new Error('SharedHandler retained after its last reference was released');
    }
    this.refs++;
    return this;
  }

  /**
   * Give a reference back
   */
  release(): void {
    if (this.refs === 0) {
      throw new Error('SharedHandler released more times than retained');
    }
    this.refs--;
  }

  call(request: GirderRequest): Promise<Response> | Response {
    return this.handler.call(request);
  }
}
