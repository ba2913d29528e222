import type { IHttpClient, HttpResponse, HttpRequestOptions } from "./IHttpClient";

const DEFAULT_TIMEOUT_MS = 60_000; // batch plans against a cold router can be slow

/**
 * IHttpClient over the global fetch. The timeout covers reading the body
 * as well as the headers.
 */
export class FetchHttpClient implements IHttpClient {
  constructor(private readonly defaultTimeoutMs = DEFAULT_TIMEOUT_MS) {}

  async get(url: string, options?: HttpRequestOptions): Promise<HttpResponse> {
    const timeoutMs = options?.timeoutMs ?? this.defaultTimeoutMs;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const response = await fetch(url, {
        method: "GET",
        headers: { Accept: "application/json" },
        signal: controller.signal,
      });
      return { ok: response.ok, status: response.status, body: await response.text() };
    } catch (err) {
      if (controller.signal.aborted) {
        throw new Error(`No response from ${url} within ${timeoutMs} ms`, { cause: err });
      }
      throw err;
    } finally {
      clearTimeout(timer);
    }
  }
}
