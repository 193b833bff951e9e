import { createInterface as createLineReader } from "node:readline";
import { createInterface } from "node:readline/promises";
import { downloadContest, downloadProblem, type AcquireContext } from "./acquire.js";
import { addTest } from "./add-test.js";
import { parseFlags, resolveTarget, usage, type Flags } from "./args.js";
import { CacheStore } from "./cache.js";
import { loadDefaults, setDefault } from "./config.js";
import { resolveCacheRoot, resolveFetchConcurrency, resolveFetchTimeoutMs, resolveRunTimeoutMs } from "./env.js";
import { CpSamplesError, UsageError } from "./errors.js";
import { runSolution } from "./harness.js";
import { createFetchClient, type HttpClient } from "./http.js";
import { log } from "./logger.js";
import { getPlatform } from "./platforms/index.js";
import { renderReport } from "./report.js";

export interface LineSource {
  lines: AsyncIterator<string>;
  close(): void;
}

export interface CliDeps {
  cacheRoot: string;
  http: HttpClient;
  concurrency: number;
  timeoutMs: number;
  color: boolean;
  cwd: string;
  notify: (message: string) => void;
  confirm: (question: string) => Promise<boolean>;
  openLines: () => LineSource;
}

async function confirmOnTerminal(question: string): Promise<boolean> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    return (await rl.question(question)).trim() === "y";
  } finally {
    rl.close();
  }
}

function terminalLines(): LineSource {
  const rl = createLineReader({ input: process.stdin, terminal: false });
  return { lines: rl[Symbol.asyncIterator](), close: () => rl.close() };
}

export function createDefaultDeps(): CliDeps {
  return {
    cacheRoot: resolveCacheRoot(),
    http: createFetchClient({ timeoutMs: resolveFetchTimeoutMs() }),
    concurrency: resolveFetchConcurrency(),
    timeoutMs: resolveRunTimeoutMs(),
    color: Boolean(process.stdout.isTTY),
    cwd: process.cwd(),
    notify: (message) => console.log(message),
    confirm: confirmOnTerminal,
    openLines: terminalLines
  };
}

function requestsWork(flags: Flags): boolean {
  return Boolean(flags.clearCache || flags.addTest || flags.source || flags.site || flags.contest || flags.problem);
}

async function dispatch(flags: Flags, deps: CliDeps): Promise<number> {
  const { notify } = deps;

  if (flags.defaultSite) {
    await setDefault(deps.cacheRoot, "default_site", flags.defaultSite);
    notify(`Set default_site to ${flags.defaultSite}`);
  }
  if (flags.defaultContest) {
    await setDefault(deps.cacheRoot, "default_contest", flags.defaultContest);
    notify(`Set default_contest to ${flags.defaultContest}`);
  }
  if ((flags.defaultSite || flags.defaultContest) && !requestsWork(flags)) {
    return 0;
  }

  const target = resolveTarget(flags, await loadDefaults(deps.cacheRoot));
  const cache = new CacheStore(deps.cacheRoot);

  if (flags.clearCache) {
    const cleared = await cache.clear(target.site, () =>
      deps.confirm(`Remove entire cache for site ${target.site}? (y/N) : `)
    );
    notify(cleared ? "Done." : "Cache left untouched.");
    return 0;
  }

  const acquireCtx: AcquireContext = { cache, http: deps.http, concurrency: deps.concurrency, notify };

  if (flags.addTest) {
    if (!target.problem) {
      throw new UsageError("--add-test needs a problem (-p)");
    }
    const platform = getPlatform({ ...target, force: false });
    const problem = platform.problem ?? target.problem;
    const source = deps.openLines();
    try {
      await addTest(cache, { site: platform.site, contest: platform.contest, problem }, source.lines, notify);
    } finally {
      source.close();
    }
    return 0;
  }

  if (flags.source) {
    const report = await runSolution(
      { ...target, sourceFile: flags.source },
      {
        cache,
        acquire: (ref) => downloadProblem(ref, acquireCtx),
        notify,
        timeoutMs: deps.timeoutMs,
        cwd: deps.cwd
      }
    );
    notify(renderReport(report, { color: deps.color }));
    return report.kind === "completed" && report.cases.every((result) => result.verdict === "AC") ? 0 : 1;
  }

  if (target.problem !== null) {
    const outcome = await downloadProblem({ ...target, force: flags.force }, acquireCtx);
    return outcome.status === "not_found" ? 1 : 0;
  }

  const outcome = await downloadContest({ ...target, force: flags.force }, acquireCtx);
  return outcome.status === "not_found" || outcome.unresolved.length > 0 ? 1 : 0;
}

/** Runs one command line and returns the process exit code. */
export async function main(argv: readonly string[], overrides: Partial<CliDeps> = {}): Promise<number> {
  const deps: CliDeps = { ...createDefaultDeps(), ...overrides };

  try {
    const flags = parseFlags(argv);
    if (flags.help || argv.length === 0) {
      deps.notify(usage());
      return 0;
    }
    return await dispatch(flags, deps);
  } catch (error) {
    if (error instanceof UsageError) {
      deps.notify(`${error.message}\n\n${usage()}`);
      return 2;
    }
    if (error instanceof CpSamplesError) {
      log("debug", "Command failed", { code: error.code });
      deps.notify(`Error: ${error.message}`);
      return 1;
    }
    throw error;
  }
}
