/**
 * Transport over the runtime's global fetch.
 */

import type { Transport, TransportResponse } from "../search/types.js";

export interface FetchTransportOptions {
  /** Headers sent with every request; per-request headers win on conflict */
  defaultHeaders?: Record<string, string>;
  /** Abort a request after this many milliseconds */
  timeoutMs?: number;
}

export class FetchTransport implements Transport {
  private readonly defaultHeaders: Readonly<Record<string, string>>;
  private readonly timeoutMs: number | undefined;

  constructor(options: FetchTransportOptions = {}) {
    this.defaultHeaders = Object.freeze({ ...options.defaultHeaders });
    this.timeoutMs = options.timeoutMs;
  }

  async get(
    url: string,
    headers: Readonly<Record<string, string>> = {}
  ): Promise<TransportResponse> {
    const response = await fetch(url, {
      method: "GET",
      headers: { ...this.defaultHeaders, ...headers },
      signal: this.timeoutMs ? AbortSignal.timeout(this.timeoutMs) : undefined,
    });
    const body = Buffer.from(await response.arrayBuffer());

    // fetch has already decoded the body, so the encoding header no longer applies
    const responseHeaders: Record<string, string> = {};
    response.headers.forEach((value, name) => {
      if (name !== "content-encoding") {
        responseHeaders[name] = value;
      }
    });

    return { status: response.status, headers: responseHeaders, body };
  }
}
