/**
 * GET-only HTTP seam for the OTP REST API. Bodies are read in full before
 * the response is returned, so callers never hold an open stream.
 */

export interface HttpResponse {
  ok: boolean;
  status: number;
  body: string;
}

export interface HttpRequestOptions {
  timeoutMs?: number;
}

export interface IHttpClient {
  get(url: string, options?: HttpRequestOptions): Promise<HttpResponse>;
}
