import { mkdtemp, readFile, rm, stat } from "node:fs/promises";
import { tmpdir } from "node:os";
import { basename, extname, join, resolve } from "node:path";
import type { AcquireOutcome } from "./acquire.js";
import type { CacheStore } from "./cache.js";
import { SolutionNotFoundError } from "./errors.js";
import { onInterrupt } from "./interrupt.js";
import { findLanguage, LANGUAGES, resolvePlan, type LanguageTable } from "./languages.js";
import { log } from "./logger.js";
import { getPlatform } from "./platforms/index.js";
import { runToCompletion, runWithDeadline } from "./process.js";
import type { CaseResult, CaseSet, ExecutionPlan, ProblemRef, RunReport, RunRequest } from "./types.js";
import { classifyVerdict, normalizeOutput } from "./verdict.js";

export interface HarnessContext {
  cache: CacheStore;
  /** Called once on a cache miss, always with `force: true`. */
  acquire: (ref: ProblemRef) => Promise<AcquireOutcome>;
  notify: (message: string) => void;
  timeoutMs: number;
  languages?: LanguageTable;
  /** Directory the solution runs in and relative source paths resolve against. */
  cwd?: string;
  /** Parent of the per-run scratch directory; the OS temp dir by default. */
  tmpRoot?: string;
}

async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

async function runCase(
  plan: ExecutionPlan,
  caseSet: CaseSet,
  index: number,
  buildDir: string,
  ctx: HarnessContext
): Promise<CaseResult> {
  const stdoutPath = join(buildDir, `temp_output${index}`);
  const exit = await runWithDeadline(plan.runCommand, {
    stdinPath: join(caseSet.dir, String(index)),
    stdoutPath,
    timeoutMs: ctx.timeoutMs,
    cwd: ctx.cwd
  });

  const expectedOutput = normalizeOutput(caseSet.outputs[index]);
  const userOutput = exit === 0 ? normalizeOutput(await readFile(stdoutPath, "utf8")) : "";
  const verdict = classifyVerdict(exit, expectedOutput, userOutput);
  log("debug", "Case finished", { index, exit, verdict });

  return {
    serial: index + 1,
    input: caseSet.inputs[index],
    expectedOutput,
    userOutput: verdict === "AC" || verdict === "WA" ? userOutput : null,
    verdict
  };
}

async function compileAndRun(
  sourcePath: string,
  problem: string,
  caseSet: CaseSet,
  languages: LanguageTable,
  ctx: HarnessContext
): Promise<RunReport> {
  const buildDir = await mkdtemp(join(ctx.tmpRoot ?? tmpdir(), "cp-samples-"));
  const removeBuildDir = () => rm(buildDir, { recursive: true, force: true });
  const dispose = onInterrupt(removeBuildDir);

  try {
    const plan = resolvePlan(sourcePath, buildDir, languages);

    if (plan.compileCommand) {
      const compiled = await runToCompletion(plan.compileCommand, { cwd: ctx.cwd });
      if (compiled.exitCode !== 0) {
        return { kind: "compile_error", problem, exitCode: compiled.exitCode, stderr: compiled.stderr || compiled.stdout };
      }
    }

    const cases: CaseResult[] = [];
    for (let i = 0; i < caseSet.inputs.length; i++) {
      cases.push(await runCase(plan, caseSet, i, buildDir, ctx));
    }
    return { kind: "completed", problem, cases };
  } finally {
    dispose();
    await removeBuildDir();
  }
}

async function runSolutionOnce(request: RunRequest, ctx: HarnessContext, acquired: boolean): Promise<RunReport> {
  const sourcePath = resolve(ctx.cwd ?? process.cwd(), request.sourceFile);
  if (!(await isFile(sourcePath))) {
    throw new SolutionNotFoundError(sourcePath);
  }

  const languages = ctx.languages ?? LANGUAGES;
  findLanguage(sourcePath, languages);

  // Let the platform canonicalize the problem code (Spoj uppercases, Hackerrank slugs).
  const platform = getPlatform({
    site: request.site,
    contest: request.contest,
    problem: request.problem ?? basename(sourcePath, extname(sourcePath)),
    force: true
  });
  const { site, contest } = platform;
  const problem = platform.problem ?? "";

  if (!(await ctx.cache.hasCaseDir(site, contest, problem))) {
    if (acquired) {
      return { kind: "missing_cases", problem };
    }

    ctx.notify("Test cases not found locally...");
    await ctx.acquire({ site, contest, problem, force: true });
    ctx.notify("Running your solution against sample cases...");
    return runSolutionOnce(request, ctx, true);
  }

  const caseSet = await ctx.cache.readCases(site, contest, problem);
  return compileAndRun(sourcePath, problem, caseSet, languages, ctx);
}

/**
 * Locate cases, acquiring them once on a miss, then compile, run every case
 * under the deadline and report. Scratch files are removed whatever happens.
 */
export async function runSolution(request: RunRequest, ctx: HarnessContext): Promise<RunReport> {
  return runSolutionOnce(request, ctx, false);
}
