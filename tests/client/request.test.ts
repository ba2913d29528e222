import { getJson } from "../../src/client/request";
import { InMemoryHttpClient } from "../../src/http/InMemoryHttpClient";

describe("getJson", () => {
  it("returns parsed data", async () => {
    const http = new InMemoryHttpClient();
    http.enqueueJson({ a: 1 });

    expect(await getJson(http, "http://x/", 100)).toEqual({ ok: true, data: { a: 1 } });
    expect(http.getRequests()[0].options).toEqual({ timeoutMs: 100 });
  });

  it("reports a failed request", async () => {
    const http = new InMemoryHttpClient();
    http.enqueueNetworkError("connect ECONNREFUSED 127.0.0.1:8080");

    expect(await getJson(http, "http://x/")).toEqual({
      ok: false,
      error: "Request to OTP failed: connect ECONNREFUSED 127.0.0.1:8080",
    });
  });

  it("reports an HTTP error with its body", async () => {
    const http = new InMemoryHttpClient();
    http.enqueueError(404, "Not found");

    expect(await getJson(http, "http://x/")).toEqual({ ok: false, error: "OTP returned HTTP 404: Not found" });
  });

  it("reports a body that is not JSON", async () => {
    const http = new InMemoryHttpClient();
    http.enqueueText("<html>oops</html>");

    expect(await getJson(http, "http://x/")).toEqual({
      ok: false,
      error: "OTP returned a body that is not JSON: <html>oops</html>",
    });
  });
});
