import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { HttpClient, isRetryableStatus } from "../http";
import type { FetchLike, HttpClientOptions } from "../http";
import { FetchFailedError } from "../errors";
import { fakeFetch, recordingSleep } from "./fakeFetch";

const URL_A = "https://charts.example.test/hot-100/2022-10-22/";

function client(handler: Parameters<typeof fakeFetch>[0], extra: Partial<HttpClientOptions> = {}) {
  const fake = fakeFetch(handler);
  const sleeper = recordingSleep();
  const http = new HttpClient({ fetchImpl: fake.fetchImpl, sleep: sleeper.sleep, ...extra });
  return { http, calls: fake.calls, delays: sleeper.delays };
}

describe("isRetryableStatus", () => {
  it("retries 429 and 5xx only", () => {
    assert.equal(isRetryableStatus(429), true);
    assert.equal(isRetryableStatus(500), true);
    assert.equal(isRetryableStatus(503), true);
    assert.equal(isRetryableStatus(404), false);
    assert.equal(isRetryableStatus(200), false);
  });
});

describe("HttpClient.get", () => {
  it("returns the body of a 200 on the first attempt", async () => {
    const { http, calls, delays } = client(() => ({ body: "<html>ok</html>" }));
    const res = await http.get(URL_A);
    assert.equal(res.status, 200);
    assert.equal(res.ok, true);
    assert.equal(res.body, "<html>ok</html>");
    assert.equal(res.url, URL_A);
    assert.equal(calls.length, 1);
    assert.deepEqual(delays, []);
  });

  it("retries a 503 and succeeds on the second attempt", async () => {
    const { http, calls, delays } = client((_, call) =>
      call === 0 ? { status: 503 } : { body: "second" }
    );
    const res = await http.get(URL_A);
    assert.equal(res.body, "second");
    assert.equal(calls.length, 2);
    assert.deepEqual(delays, [600]);
  });

  it("cancels the body of each retryable response", async () => {
    let cancelled = 0;
    const fetchImpl: FetchLike = async () =>
      new Response(
        new ReadableStream<Uint8Array>({
          cancel() {
            cancelled++;
          },
        }),
        { status: 503 }
      );
    const http = new HttpClient({ fetchImpl, sleep: recordingSleep().sleep, maxAttempts: 2 });
    await assert.rejects(http.get(URL_A), FetchFailedError);
    assert.equal(cancelled, 2);
  });

  it("gives up after three 500s with exponential backoff between attempts", async () => {
    const { http, calls, delays } = client(() => ({ status: 500 }));
    await assert.rejects(http.get(URL_A), (err: unknown) => {
      assert.ok(err instanceof FetchFailedError);
      assert.equal(err.status, 500);
      assert.equal(err.attempts, 3);
      assert.equal(err.url, URL_A);
      assert.equal(err.message, `Fetch failed for ${URL_A}: HTTP 500 (after 3 attempts)`);
      return true;
    });
    assert.equal(calls.length, 3);
    assert.deepEqual(delays, [600, 1200]);
  });

  it("does not retry a 404 and hands it back to the caller", async () => {
    const { http, calls, delays } = client(() => ({ status: 404, body: "missing" }));
    const res = await http.get(URL_A);
    assert.equal(res.status, 404);
    assert.equal(res.ok, false);
    assert.equal(res.body, "missing");
    assert.equal(calls.length, 1);
    assert.deepEqual(delays, []);
  });

  it("waits for Retry-After on 429", async () => {
    const { http, delays } = client((_, call) =>
      call === 0 ? { status: 429, headers: { "Retry-After": "2" } } : { body: "ok" }
    );
    const res = await http.get(URL_A);
    assert.equal(res.body, "ok");
    assert.deepEqual(delays, [2000]);
  });

  it("retries network errors", async () => {
    const { http, calls } = client((_, call) =>
      call === 0 ? new TypeError("fetch failed") : { body: "recovered" }
    );
    const res = await http.get(URL_A);
    assert.equal(res.body, "recovered");
    assert.equal(calls.length, 2);
  });

  it("reports a timeout once every attempt has been aborted", async () => {
    const sleeper = recordingSleep();
    const http = new HttpClient({
      timeoutMs: 5,
      maxAttempts: 2,
      sleep: sleeper.sleep,
      fetchImpl: (_url, init) =>
        new Promise<Response>((_, reject) => {
          init.signal?.addEventListener("abort", () => reject(new Error("aborted")));
        }),
    });
    await assert.rejects(http.get(URL_A), /timed out after 5ms \(after 2 attempts\)/);
    assert.deepEqual(sleeper.delays, [600]);
  });

  it("sends default and per-request headers", async () => {
    const seen: Headers[] = [];
    const http = new HttpClient({
      sleep: async () => {},
      fetchImpl: async (_url, init) => {
        seen.push(new Headers(init.headers));
        return new Response("ok");
      },
    });
    await http.get(URL_A, { headers: { Accept: "text/html" } });
    assert.equal(seen.length, 1);
    const headers = seen[0];
    assert.equal(headers.get("accept"), "text/html");
    assert.equal(headers.get("accept-language"), "en-US,en;q=0.9");
    assert.match(headers.get("user-agent") ?? "", /^Mozilla\/5\.0/);
  });
});

describe("HttpClient.backoffDelay", () => {
  it("doubles from the base and caps at maxBackoffMs", () => {
    const http = new HttpClient({ backoffMs: 600, maxBackoffMs: 5000 });
    assert.equal(http.backoffDelay(1), 600);
    assert.equal(http.backoffDelay(2), 1200);
    assert.equal(http.backoffDelay(3), 2400);
    assert.equal(http.backoffDelay(5), 5000);
  });
});

describe("HttpClient.getText / getJson", () => {
  it("parses JSON bodies", async () => {
    const { http } = client(() => ({ json: { results: [1, 2] } }));
    assert.deepEqual(await http.getJson(URL_A), { results: [1, 2] });
  });

  it("throws FetchFailedError for a non-2xx terminal response", async () => {
    const { http } = client(() => ({ status: 403 }));
    await assert.rejects(http.getText(URL_A), (err: unknown) => {
      assert.ok(err instanceof FetchFailedError);
      assert.equal(err.status, 403);
      return true;
    });
  });

  it("throws FetchFailedError for a body that is not JSON", async () => {
    const { http } = client(() => ({ body: "<html>" }));
    await assert.rejects(http.getJson(URL_A), /response is not JSON/);
  });
});
