// packages/gateway/src/transport.ts
import { toError } from '@cmsync/utils';

import { GatewayError, RequestTimeoutError } from './errors.js';
import type { HttpResponse, HttpTransport, OutboundRequest } from './types.js';

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export type FetchTransportOptions = {
  fetch?: FetchLike;
};

/** HttpTransport over the global `fetch`, bounded by an AbortController timeout. */
export class FetchTransport implements HttpTransport {
  private readonly fetchImpl: FetchLike;

  constructor(opts: FetchTransportOptions = {}) {
    this.fetchImpl = opts.fetch ?? ((input, init) => fetch(input, init));
  }

  async send(req: OutboundRequest, opts: { timeoutMs: number }): Promise<HttpResponse> {
    const controller = new AbortController();
    const id = setTimeout(() => controller.abort(), opts.timeoutMs);

    try {
      const res = await this.fetchImpl(req.url, {
        method: req.method,
        headers: req.headers,
        body: req.body,
        signal: controller.signal,
      });
      return { status: res.status, body: await res.text() };
    } catch (e) {
      if (controller.signal.aborted) throw new RequestTimeoutError(req.url, opts.timeoutMs);
      throw new GatewayError('network', `Request failed: ${req.url}: ${toError(e).message}`, { cause: e });
    } finally {
      clearTimeout(id);
    }
  }
}
