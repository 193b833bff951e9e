import { handleBatchRequests } from "./batch.js";
import type { CacheStore } from "./cache.js";
import { NotFoundError, UnsupportedOperationError, UsageError } from "./errors.js";
import { fetchPage, type HttpClient } from "./http.js";
import { onInterrupt } from "./interrupt.js";
import { errorMessage, log } from "./logger.js";
import { getPlatform, type Platform } from "./platforms/index.js";
import { lastPathSegment } from "./platforms/html.js";
import type { ProblemRef, SupportedSite } from "./types.js";

export interface AcquireContext {
  cache: CacheStore;
  http: HttpClient;
  concurrency: number;
  notify: (message: string) => void;
}

export type AcquireStatus = "cached" | "done" | "not_found";

export interface AcquireOutcome {
  status: AcquireStatus;
  /** Problems found in cache or stored by this run. */
  problems: string[];
  /** Contest links still failing after the retry wave, or whose cases could not be stored. */
  unresolved: string[];
  /** Contest links whose page held no sample cases. */
  notFound: string[];
}

const locks = new Map<string, Promise<unknown>>();

/** Serializes work on the same (site, contest, problem) triple within this process. */
async function withLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
  const previous = locks.get(key) ?? Promise.resolve();
  const run = previous.then(fn, fn);
  const tail = run.catch(() => undefined);
  locks.set(key, tail);

  try {
    return await run;
  } finally {
    if (locks.get(key) === tail) locks.delete(key);
  }
}

function lockKey(site: SupportedSite, contest: string, problem: string): string {
  return `${site}/${contest}/${problem}`;
}

function problemLabel(platform: Platform, problem: string): string {
  return platform.contest ? `${platform.contest}-${problem}` : problem;
}

function outcome(status: AcquireStatus, problems: string[] = []): AcquireOutcome {
  return { status, problems, unresolved: [], notFound: [] };
}

/**
 * Undoes an aborted acquisition. A case directory this acquisition created is
 * dropped with any partial cases in it; anything older is only removed while empty.
 */
export async function cleanupAcquisition(
  cache: CacheStore,
  site: SupportedSite,
  contest: string,
  problem: string | null,
  created = false
): Promise<void> {
  try {
    if (created && problem !== null) {
      await cache.remove(site, contest, problem);
      log("debug", "Acquisition cleanup", { site, contest, problem, removed: true });
      return;
    }
    const removed = await cache.removeIfEmpty(site, contest, problem);
    log("debug", "Acquisition cleanup", { site, contest, problem, removed });
  } catch (error) {
    log("warn", "Acquisition cleanup failed", { site, contest, problem, error: errorMessage(error) });
  }
}

export async function downloadProblem(ref: ProblemRef, ctx: AcquireContext): Promise<AcquireOutcome> {
  const platform = getPlatform(ref);
  const { site, contest } = platform;
  const problem = platform.problem;
  if (!problem) {
    throw new UsageError("A problem code is required to download a single problem");
  }

  return withLock(lockKey(site, contest, problem), async () => {
    const inCache = await ctx.cache.ensureCaseDir(site, contest, problem);
    if (inCache && !ref.force) {
      ctx.notify("Test cases found in cache...");
      return outcome("cached", [problem]);
    }

    ctx.notify(`Fetching problem ${problemLabel(platform, problem)} from ${platform.displayName}...`);
    const created = !inCache;
    const dispose = onInterrupt(() => cleanupAcquisition(ctx.cache, site, contest, problem, created));

    try {
      const response = await fetchPage(ctx.http, platform.problemUrl());
      const cases = platform.parse(response);
      await ctx.cache.store(site, contest, problem, cases);
      ctx.notify("Done.");
      return outcome("done", [problem]);
    } catch (error) {
      await cleanupAcquisition(ctx.cache, site, contest, problem, created);
      if (!(error instanceof NotFoundError)) throw error;

      log("warn", error.message, { site, contest, problem });
      ctx.notify("Problem not found...");
      return outcome("not_found");
    } finally {
      dispose();
    }
  });
}

export async function downloadContest(ref: ProblemRef, ctx: AcquireContext): Promise<AcquireOutcome> {
  const platform = getPlatform(ref);
  const { site, contest } = platform;
  const contestUrl = platform.contestUrl();
  if (contestUrl === null) {
    throw new UnsupportedOperationError(`${platform.displayName} has no contests; download a single problem instead`);
  }
  if (!contest) {
    throw new UsageError("A contest code is required to download a contest");
  }

  await ctx.cache.ensureCaseDir(site, contest, null);
  // Problems whose case directory this run created and is still writing.
  const storing = new Set<string>();
  const dispose = onInterrupt(async () => {
    for (const problem of storing) {
      await cleanupAcquisition(ctx.cache, site, contest, problem, true);
    }
    await cleanupAcquisition(ctx.cache, site, contest, null);
  });

  try {
    ctx.notify(`Checking problems available for contest ${contest}...`);

    let links: string[];
    try {
      links = platform.getProblemLinks(await fetchPage(ctx.http, contestUrl));
    } catch (error) {
      await cleanupAcquisition(ctx.cache, site, contest, null);
      if (!(error instanceof NotFoundError)) throw error;

      ctx.notify("Contest not found...");
      return outcome("not_found");
    }

    ctx.notify(`Found ${links.length} problems..`);

    if (!ref.force) {
      const cached = new Set(await ctx.cache.listProblems(site, contest));
      links = links.filter((link) => !cached.has(lastPathSegment(link)));
    }

    const batch = await handleBatchRequests(
      ctx.http,
      links,
      async (response) => {
        const problem = platform.problemIdFromResponse(response);
        const cases = platform.parse(response);
        return withLock(lockKey(site, contest, problem), async () => {
          const created = !(await ctx.cache.ensureCaseDir(site, contest, problem));
          if (created) storing.add(problem);
          try {
            await ctx.cache.store(site, contest, problem, cases);
            return problem;
          } catch (error) {
            await cleanupAcquisition(ctx.cache, site, contest, problem, created);
            throw error;
          } finally {
            storing.delete(problem);
          }
        });
      },
      { concurrency: ctx.concurrency }
    );

    for (const link of batch.notFound) {
      ctx.notify(`Problem not found: ${link}`);
    }
    const unresolved = [...batch.unresolved, ...batch.failed];
    if (unresolved.length > 0) {
      ctx.notify(`Could not fetch ${unresolved.length} problem(s):\n${unresolved.join("\n")}`);
    }
    await cleanupAcquisition(ctx.cache, site, contest, null);
    ctx.notify("Done.");

    return { status: "done", problems: batch.stored, unresolved, notFound: batch.notFound };
  } finally {
    dispose();
  }
}
