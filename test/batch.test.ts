import { describe, expect, it, vi } from "vitest";
import { fetchAll, handleBatchRequests } from "../src/batch.js";
import { ProblemNotFoundError } from "../src/errors.js";
import type { HttpClient } from "../src/http.js";
import { lastPathSegment } from "../src/platforms/html.js";
import type { FetchResponse, FetchResult } from "../src/types.js";

const BASE = "https://judge.test/problem";

function countingClient(answer: (url: string, attempt: number) => FetchResult) {
  const attempts = new Map<string, number>();
  const client: HttpClient = {
    async get(url) {
      const attempt = (attempts.get(url) ?? 0) + 1;
      attempts.set(url, attempt);
      return answer(url, attempt);
    }
  };
  return { client, attempts };
}

const storeId = async (response: FetchResponse) => lastPathSegment(response.url);

describe("handleBatchRequests", () => {
  it("retries failed links exactly once and reports what still fails", async () => {
    const { client, attempts } = countingClient((url, attempt) => {
      if (url.endsWith("/dead")) return { url, status: 503, body: "" };
      if (url.endsWith("/flaky") && attempt === 1) return { url, error: "ECONNRESET" };
      return { url, status: 200, body: "" };
    });
    const links = [`${BASE}/a`, `${BASE}/flaky`, `${BASE}/dead`, `${BASE}/b`];

    const outcome = await handleBatchRequests(client, links, storeId, { concurrency: 2 });

    expect(outcome.stored).toEqual(["a", "b", "flaky"]);
    expect(outcome.unresolved).toEqual([`${BASE}/dead`]);
    expect(outcome.notFound).toEqual([]);
    expect(attempts.get(`${BASE}/a`)).toBe(1);
    expect(attempts.get(`${BASE}/flaky`)).toBe(2);
    expect(attempts.get(`${BASE}/dead`)).toBe(2);
  });

  it("fetches a repeated link once per wave", async () => {
    const { client, attempts } = countingClient((url) => ({ url, status: 500, body: "" }));

    const outcome = await handleBatchRequests(client, [`${BASE}/x`, `${BASE}/x`], storeId, { concurrency: 4 });

    expect(outcome.unresolved).toEqual([`${BASE}/x`]);
    expect(attempts.get(`${BASE}/x`)).toBe(2);
  });

  it("records pages without samples and keeps going", async () => {
    const { client, attempts } = countingClient((url) => ({ url, status: 200, body: "" }));
    const onResponse = vi.fn(async (response: FetchResponse) => {
      if (response.url.endsWith("/empty")) throw new ProblemNotFoundError(response.url);
      return lastPathSegment(response.url);
    });

    const outcome = await handleBatchRequests(client, [`${BASE}/empty`, `${BASE}/c`], onResponse, {
      concurrency: 1
    });

    expect(outcome).toEqual({ stored: ["c"], unresolved: [], notFound: [`${BASE}/empty`], failed: [] });
    expect(attempts.get(`${BASE}/empty`)).toBe(1);
    expect(onResponse).toHaveBeenCalledTimes(2);
  });

  it("keeps a failing handler from stopping the other links", async () => {
    const { client, attempts } = countingClient((url) => ({ url, status: 200, body: "" }));
    const onResponse = async (response: FetchResponse): Promise<string> => {
      if (response.url.endsWith("/a")) throw new Error("disk full");
      return lastPathSegment(response.url);
    };

    const outcome = await handleBatchRequests(client, [`${BASE}/a`, `${BASE}/b`], onResponse, { concurrency: 1 });

    expect(outcome).toEqual({ stored: ["b"], unresolved: [], notFound: [], failed: [`${BASE}/a`] });
    expect(attempts.get(`${BASE}/a`)).toBe(1);
  });

  it("does nothing for an empty link list", async () => {
    const { client, attempts } = countingClient((url) => ({ url, status: 200, body: "" }));

    expect(await handleBatchRequests(client, [], storeId, { concurrency: 3 })).toEqual({
      stored: [],
      unresolved: [],
      notFound: [],
      failed: []
    });
    expect(attempts.size).toBe(0);
  });
});

describe("fetchAll", () => {
  it("keeps at most `concurrency` requests in flight and preserves order", async () => {
    let inFlight = 0;
    let peak = 0;
    const client: HttpClient = {
      async get(url) {
        inFlight++;
        peak = Math.max(peak, inFlight);
        await new Promise((resolve) => setTimeout(resolve, 5));
        inFlight--;
        return { url, status: 200, body: url };
      }
    };
    const urls = Array.from({ length: 10 }, (_, i) => `${BASE}/${i}`);

    const results = await fetchAll(client, urls, 3);

    expect(peak).toBe(3);
    expect(results.map((result) => result.url)).toEqual(urls);
  });

  it("turns a thrown error into a failure result", async () => {
    const client: HttpClient = {
      async get() {
        throw new Error("socket hang up");
      }
    };

    expect(await fetchAll(client, [`${BASE}/a`], 2)).toEqual([{ url: `${BASE}/a`, error: "socket hang up" }]);
  });
});
