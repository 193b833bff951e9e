import { NotFoundError } from "./errors.js";
import type { HttpClient } from "./http.js";
import { errorMessage, log } from "./logger.js";
import { isFetchFailure, type FetchResponse, type FetchResult } from "./types.js";

/** Handles one successful response and returns the problem id it stored. */
export type ResponseHandler = (response: FetchResponse, link: string) => Promise<string>;

export interface BatchOptions {
  concurrency: number;
}

export interface BatchOutcome {
  stored: string[];
  /** Links still failing after the retry wave. */
  unresolved: string[];
  /** Links whose page had no usable sample cases. */
  notFound: string[];
  /** Links whose handler failed for any other reason. */
  failed: string[];
}

/** Fetches every url with at most `concurrency` requests in flight, keeping input order. */
export async function fetchAll(client: HttpClient, urls: string[], concurrency: number): Promise<FetchResult[]> {
  const results: FetchResult[] = new Array<FetchResult>(urls.length);
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < urls.length) {
      const index = next++;
      const url = urls[index];
      try {
        results[index] = await client.get(url);
      } catch (error) {
        results[index] = { url, error: errorMessage(error) };
      }
    }
  };

  const workers = Math.max(1, Math.min(concurrency, urls.length));
  await Promise.all(Array.from({ length: workers }, () => worker()));
  return results;
}

async function runWave(
  client: HttpClient,
  links: string[],
  onResponse: ResponseHandler,
  options: BatchOptions,
  outcome: BatchOutcome
): Promise<string[]> {
  const responses = await fetchAll(client, links, options.concurrency);
  const failed: string[] = [];

  for (const [i, result] of responses.entries()) {
    const link = links[i];
    if (isFetchFailure(result) || result.status !== 200) {
      log("info", "Batch fetch failed", {
        link,
        reason: isFetchFailure(result) ? result.error : `HTTP ${result.status}`
      });
      failed.push(link);
      continue;
    }

    try {
      outcome.stored.push(await onResponse(result, link));
    } catch (error) {
      if (error instanceof NotFoundError) {
        log("warn", error.message, { link });
        outcome.notFound.push(link);
      } else {
        log("error", "Could not store problem", { link, error: errorMessage(error) });
        outcome.failed.push(link);
      }
    }
  }

  return failed;
}

/**
 * Fetches all links concurrently and feeds each 200 response to `onResponse`.
 * Failed fetches get exactly one more wave; whatever still fails is returned as
 * unresolved. A handler error only affects its own link.
 */
export async function handleBatchRequests(
  client: HttpClient,
  links: string[],
  onResponse: ResponseHandler,
  options: BatchOptions
): Promise<BatchOutcome> {
  const outcome: BatchOutcome = { stored: [], unresolved: [], notFound: [], failed: [] };
  const unique = [...new Set(links)];

  const failed = await runWave(client, unique, onResponse, options, outcome);
  if (failed.length > 0) {
    log("info", "Retrying failed links", { count: failed.length });
    outcome.unresolved = await runWave(client, failed, onResponse, options, outcome);
  }

  return outcome;
}
