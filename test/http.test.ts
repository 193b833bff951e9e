import { afterEach, describe, expect, it, vi } from "vitest";
import { FetchFailedError } from "../src/errors.js";
import { createFetchClient, fetchPage } from "../src/http.js";
import type { FetchResult } from "../src/types.js";

const URL_UNDER_TEST = "https://judge.test/problems/A";

describe("createFetchClient", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("retries a 403 with the next header set", async () => {
    const fetchMock = vi
      .fn()
      .mockResolvedValueOnce(new Response("blocked", { status: 403 }))
      .mockResolvedValueOnce(new Response("ok", { status: 200 }));
    vi.stubGlobal("fetch", fetchMock);

    const result = await createFetchClient({ timeoutMs: 1000 }).get(URL_UNDER_TEST);

    expect(result).toEqual({ url: URL_UNDER_TEST, status: 200, body: "ok" });
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(fetchMock.mock.calls[1]?.[1]?.headers?.referer).toBe("https://judge.test");
  });

  it("returns the last 403 when every header set is refused", async () => {
    const fetchMock = vi.fn(async () => new Response("blocked", { status: 403 }));
    vi.stubGlobal("fetch", fetchMock);

    const result = await createFetchClient({ timeoutMs: 1000 }).get(URL_UNDER_TEST);

    expect(result).toEqual({ url: URL_UNDER_TEST, status: 403, body: "blocked" });
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  it("turns network errors into failure results", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => {
        throw new Error("getaddrinfo ENOTFOUND judge.test");
      })
    );

    expect(await createFetchClient({ timeoutMs: 1000 }).get(URL_UNDER_TEST)).toEqual({
      url: URL_UNDER_TEST,
      error: "getaddrinfo ENOTFOUND judge.test"
    });
  });
});

describe("fetchPage", () => {
  const clientOf = (results: FetchResult[]) => {
    const get = vi.fn(async (url: string): Promise<FetchResult> => results.shift() ?? { url, error: "exhausted" });
    return { get };
  };

  it("tries again until a 200 arrives", async () => {
    const client = clientOf([
      { url: URL_UNDER_TEST, status: 502, body: "" },
      { url: URL_UNDER_TEST, status: 200, body: "page" }
    ]);

    expect(await fetchPage(client, URL_UNDER_TEST)).toEqual({ url: URL_UNDER_TEST, status: 200, body: "page" });
    expect(client.get).toHaveBeenCalledTimes(2);
  });

  it("fails after three non-200 answers", async () => {
    const client = clientOf([
      { url: URL_UNDER_TEST, status: 500, body: "" },
      { url: URL_UNDER_TEST, status: 500, body: "" },
      { url: URL_UNDER_TEST, status: 500, body: "" }
    ]);

    await expect(fetchPage(client, URL_UNDER_TEST)).rejects.toThrow(`Could not fetch ${URL_UNDER_TEST}: HTTP 500`);
    expect(client.get).toHaveBeenCalledTimes(3);
  });

  it("fails at once on a network error", async () => {
    const client = clientOf([{ url: URL_UNDER_TEST, error: "ECONNREFUSED" }]);

    await expect(fetchPage(client, URL_UNDER_TEST)).rejects.toBeInstanceOf(FetchFailedError);
    expect(client.get).toHaveBeenCalledTimes(1);
  });
});
