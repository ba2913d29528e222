import type { HttpResponse, IHttpClient } from "../http/IHttpClient";

export type JsonResult =
  | { ok: true; data: unknown }
  | { ok: false; error: string };

/**
 * GET a JSON document. Network failures, HTTP errors and unparseable bodies
 * all come back as { ok: false } with a message fit for the user.
 */
export async function getJson(
  http: IHttpClient,
  url: string,
  timeoutMs?: number
): Promise<JsonResult> {
  let response: HttpResponse;
  try {
    response = await http.get(url, { timeoutMs });
  } catch (err) {
    return { ok: false, error: `Request to OTP failed: ${err instanceof Error ? err.message : String(err)}` };
  }

  const text = response.body;
  if (!response.ok) {
    return { ok: false, error: `OTP returned HTTP ${response.status}: ${text.slice(0, 500)}` };
  }

  try {
    return { ok: true, data: JSON.parse(text) };
  } catch {
    return { ok: false, error: `OTP returned a body that is not JSON: ${text.slice(0, 500)}` };
  }
}
