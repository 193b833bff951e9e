export const SUPPORTED_SITES = ["codeforces", "codechef", "spoj", "hackerrank"] as const;

export type SupportedSite = (typeof SUPPORTED_SITES)[number];

export function isSupportedSite(value: string): value is SupportedSite {
  return SUPPORTED_SITES.some((site) => site === value);
}

export interface ProblemRef {
  readonly site: SupportedSite;
  /** Empty string for judges without contests (Spoj). */
  readonly contest: string;
  /** `null` when a whole contest is being acquired. */
  readonly problem: string | null;
  readonly force: boolean;
}

export interface ParsedCases {
  inputs: string[];
  outputs: string[];
  statement?: string;
}

export interface CaseSet extends ParsedCases {
  dir: string;
}

export interface FetchResponse {
  /** Resolved URL after redirects. */
  url: string;
  status: number;
  body: string;
}

export interface FetchFailure {
  url: string;
  error: string;
}

export type FetchResult = FetchResponse | FetchFailure;

export function isFetchFailure(result: FetchResult): result is FetchFailure {
  return "error" in result;
}

export type VerdictCode = "AC" | "WA" | "RTE" | "TLE";

export interface CaseResult {
  serial: number;
  input: string;
  expectedOutput: string;
  /** Only present for AC and WA. */
  userOutput: string | null;
  verdict: VerdictCode;
}

export interface CommandSpec {
  command: string;
  args: string[];
}

export interface ExecutionPlan {
  readonly sourcePath: string;
  readonly language: string;
  readonly compileCommand: CommandSpec | null;
  readonly runCommand: CommandSpec;
}

export type RunReport =
  | { kind: "completed"; problem: string; cases: CaseResult[] }
  | { kind: "compile_error"; problem: string; exitCode: number; stderr: string }
  | { kind: "missing_cases"; problem: string };

export interface RunRequest {
  site: SupportedSite;
  contest: string;
  problem: string | null;
  sourceFile: string;
}
