import { TIMED_OUT, type ExitStatus } from "./process.js";
import type { VerdictCode } from "./types.js";

/** Trims the whole text and every line of it. Applying it twice changes nothing. */
export function normalizeOutput(text: string): string {
  return text
    .trim()
    .split("\n")
    .map((line) => line.trim())
    .join("\n");
}

/** Both outputs are expected to be normalized already. */
export function classifyVerdict(exit: ExitStatus, expected: string, actual: string): VerdictCode {
  if (exit === TIMED_OUT) return "TLE";
  if (exit !== 0) return "RTE";
  return expected === actual ? "AC" : "WA";
}
