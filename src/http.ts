import { FetchFailedError } from "./errors.js";
import { errorMessage, log } from "./logger.js";
import { isFetchFailure, type FetchResponse, type FetchResult } from "./types.js";

const BROWSER_USER_AGENT =
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/131.0.0.0 Safari/537.36";

const MAX_PAGE_TRIES = 3;

export interface HttpClient {
  get(url: string): Promise<FetchResult>;
}

export interface FetchClientOptions {
  timeoutMs: number;
}

function getCandidateHeaders(url: string): Record<string, string>[] {
  const origin = new URL(url).origin;
  const base = {
    "user-agent": BROWSER_USER_AGENT,
    accept: "text/html,application/xhtml+xml,application/json;q=0.9,*/*;q=0.8",
    "accept-language": "en-US,en;q=0.9",
    "cache-control": "no-cache",
    pragma: "no-cache"
  };

  return [base, { ...base, referer: origin }, { ...base, referer: `${origin}/` }];
}

/**
 * `HttpClient` over the global `fetch`. A 403 is retried with the next header
 * set; network errors and timeouts become a `FetchFailure` instead of throwing.
 */
export function createFetchClient(options: FetchClientOptions): HttpClient {
  return {
    async get(url: string): Promise<FetchResult> {
      let last: FetchResult = { url, error: "no request sent" };

      for (const headers of getCandidateHeaders(url)) {
        try {
          const response = await fetch(url, {
            headers,
            redirect: "follow",
            signal: AbortSignal.timeout(options.timeoutMs)
          });
          const body = await response.text();
          last = { url: response.url || url, status: response.status, body };
        } catch (error) {
          return { url, error: errorMessage(error) };
        }

        if (last.status !== 403) return last;
      }

      return last;
    }
  };
}

/** Single page fetch: up to three tries until a 200. */
export async function fetchPage(client: HttpClient, url: string): Promise<FetchResponse> {
  let detail = "";

  for (let attempt = 1; attempt <= MAX_PAGE_TRIES; attempt++) {
    const result = await client.get(url);
    if (isFetchFailure(result)) {
      throw new FetchFailedError(url, result.error);
    }
    if (result.status === 200) return result;

    detail = `HTTP ${result.status}`;
    log("info", "Retrying page fetch", { url, attempt, status: result.status });
  }

  throw new FetchFailedError(url, detail);
}
