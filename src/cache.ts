import { mkdir, readFile, readdir, rm, rmdir, stat, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { CacheCorruptionError, MismatchedSamplesError } from "./errors.js";
import { log } from "./logger.js";
import type { CaseSet, ParsedCases, SupportedSite } from "./types.js";

const OUTPUT_SUFFIX = ".a";
const STATEMENT_FILE = "statement.txt";

function isMissing(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch (error) {
    if (isMissing(error)) return false;
    throw error;
  }
}

async function readOptional(path: string): Promise<string | undefined> {
  try {
    return await readFile(path, "utf8");
  } catch (error) {
    if (isMissing(error)) return undefined;
    throw error;
  }
}

/** Spoj has no contests, so its case paths skip the contest segment. */
export function contestSegment(site: SupportedSite, contest: string): string {
  return site === "spoj" ? "" : contest;
}

export type ConfirmFn = () => Promise<boolean>;

/**
 * On-disk case storage laid out as `root/site/contest/problem/{0,0.a,1,1.a,...}`.
 * Directory existence is the cache-hit signal.
 */
export class CacheStore {
  constructor(public readonly root: string) {}

  siteDir(site: SupportedSite): string {
    return join(this.root, site);
  }

  contestDir(site: SupportedSite, contest: string): string {
    return join(this.root, site, contestSegment(site, contest));
  }

  casePath(site: SupportedSite, contest: string, problem: string): string {
    return join(this.contestDir(site, contest), problem);
  }

  /**
   * Returns whether the case directory already existed, creating it when it
   * did not. With a `null` problem the same goes for the contest directory.
   */
  async ensureCaseDir(site: SupportedSite, contest: string, problem: string | null): Promise<boolean> {
    const dir = problem === null ? this.contestDir(site, contest) : this.casePath(site, contest, problem);
    if (await isDirectory(dir)) return true;

    await mkdir(dir, { recursive: true });
    return false;
  }

  async hasCaseDir(site: SupportedSite, contest: string, problem: string): Promise<boolean> {
    return isDirectory(this.casePath(site, contest, problem));
  }

  async caseCount(dir: string): Promise<number> {
    try {
      const entries = await readdir(dir);
      return entries.filter((name) => name.endsWith(OUTPUT_SUFFIX)).length;
    } catch (error) {
      if (isMissing(error)) return 0;
      throw error;
    }
  }

  /**
   * Appends cases after the ones already stored. Each input is written before
   * its output so the output count never runs ahead of the inputs.
   */
  async store(site: SupportedSite, contest: string, problem: string, cases: ParsedCases): Promise<number[]> {
    if (cases.inputs.length !== cases.outputs.length) {
      throw new MismatchedSamplesError(problem, cases.inputs.length, cases.outputs.length);
    }

    const dir = this.casePath(site, contest, problem);
    await mkdir(dir, { recursive: true });
    const offset = await this.caseCount(dir);

    const indices: number[] = [];
    for (const [i, input] of cases.inputs.entries()) {
      const index = offset + i;
      await writeFile(join(dir, String(index)), input, "utf8");
      await writeFile(join(dir, `${index}${OUTPUT_SUFFIX}`), cases.outputs[i] ?? "", "utf8");
      indices.push(index);
    }

    if (cases.statement) {
      await writeFile(join(dir, STATEMENT_FILE), cases.statement, "utf8");
    }

    log("debug", "Stored sample cases", { site, contest, problem, indices });
    return indices;
  }

  async readCases(site: SupportedSite, contest: string, problem: string): Promise<CaseSet> {
    const dir = this.casePath(site, contest, problem);
    const count = await this.caseCount(dir);
    const inputs: string[] = [];
    const outputs: string[] = [];

    for (let i = 0; i < count; i++) {
      const output = await readOptional(join(dir, `${i}${OUTPUT_SUFFIX}`));
      const input = await readOptional(join(dir, String(i)));
      if (input === undefined || output === undefined) {
        throw new CacheCorruptionError(join(dir, String(i)));
      }
      inputs.push(input);
      outputs.push(output);
    }

    const statement = await readOptional(join(dir, STATEMENT_FILE));
    return statement === undefined ? { dir, inputs, outputs } : { dir, inputs, outputs, statement };
  }

  async listProblems(site: SupportedSite, contest: string): Promise<string[]> {
    try {
      const entries = await readdir(this.contestDir(site, contest), { withFileTypes: true });
      return entries.filter((entry) => entry.isDirectory()).map((entry) => entry.name);
    } catch (error) {
      if (isMissing(error)) return [];
      throw error;
    }
  }

  /** Drops a case (or, with a `null` problem, contest) directory that holds nothing. */
  async removeIfEmpty(site: SupportedSite, contest: string, problem: string | null): Promise<boolean> {
    const dir = problem === null ? this.contestDir(site, contest) : this.casePath(site, contest, problem);
    if (dir === this.siteDir(site)) return false;
    if (!(await isDirectory(dir))) return false;
    if ((await readdir(dir)).length > 0) return false;

    await rmdir(dir);
    return true;
  }

  /** Drops a case directory with whatever it holds. */
  async remove(site: SupportedSite, contest: string, problem: string): Promise<void> {
    await rm(this.casePath(site, contest, problem), { recursive: true, force: true });
  }

  async clear(site: SupportedSite, confirm: ConfirmFn): Promise<boolean> {
    if (!(await confirm())) return false;

    const dir = this.siteDir(site);
    await rm(dir, { recursive: true, force: true });
    await mkdir(dir, { recursive: true });
    log("info", "Cleared cache", { site, dir });
    return true;
  }
}
