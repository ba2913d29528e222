import type { IHttpClient, HttpResponse, HttpRequestOptions } from "./IHttpClient";

export interface RecordedRequest {
  url: string;
  options?: HttpRequestOptions;
}

/**
 * Scripted OTP for tests: each get() takes the next queued response, or
 * throws the next queued connection error, and records the request.
 */
export class InMemoryHttpClient implements IHttpClient {
  private readonly queue: Array<HttpResponse | Error> = [];
  private readonly requests: RecordedRequest[] = [];

  enqueueJson(body: unknown, status = 200): void {
    this.enqueueText(JSON.stringify(body), status);
  }

  enqueueText(body: string, status = 200): void {
    this.queue.push({ ok: status >= 200 && status < 300, status, body });
  }

  enqueueError(status: number, body: string): void {
    this.queue.push({ ok: false, status, body });
  }

  /** The next get() rejects the way fetch does when nothing listens on the port. */
  enqueueNetworkError(message: string): void {
    this.queue.push(Object.assign(new Error(message), { code: "ECONNREFUSED" }));
  }

  getRequests(): RecordedRequest[] {
    return [...this.requests];
  }

  async get(url: string, options?: HttpRequestOptions): Promise<HttpResponse> {
    this.requests.push({ url, options });
    const next = this.queue.shift();
    if (next === undefined) {
      throw new Error(`InMemoryHttpClient: no response queued for ${url}`);
    }
    if (next instanceof Error) {
      throw next;
    }
    return { ...next };
  }
}
