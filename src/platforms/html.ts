import { load } from "cheerio";
import { MismatchedSamplesError } from "../errors.js";
import type { ParsedCases } from "../types.js";

const TAG_PATTERN = /<[^<]+?>/g;

export function stripTags(html: string): string {
  return html.replace(TAG_PATTERN, "");
}

/** Decodes entities left in tag-free text. */
export function decodeHtml(text: string): string {
  return load(text, null, false).root().text();
}

export function replaceAll(text: string, pairs: ReadonlyArray<readonly [string, string]>): string {
  return pairs.reduce((acc, [from, to]) => acc.split(from).join(to), text);
}

export function lastPathSegment(url: string): string {
  try {
    return new URL(url).pathname.split("/").filter(Boolean).pop() ?? "";
  } catch {
    return url.split("?")[0]?.split("/").filter(Boolean).pop() ?? "";
  }
}

/**
 * `crlf` lets the block bodies span carriage returns as well as newlines;
 * `lf` only newlines.
 */
export type LineMode = "lf" | "crlf";

function anyChar(mode: LineMode): string {
  return mode === "crlf" ? "(?:.|\\n|\\r)" : "(?:.|\\n)";
}

export interface SampleRegexes {
  input: RegExp;
  output: RegExp;
}

/**
 * Sample blocks of the form `<pre><b>Input:</b> ... <b>Output:</b> ... </pre>`
 * are split by deleting everything around the wanted half. `openEnded` lets
 * the input pattern swallow the output half up to the end of the string.
 */
export function buildSampleRegexes(mode: LineMode, openEnded: boolean): SampleRegexes {
  const any = anyChar(mode);
  const outputTail = openEnded ? `<b>Output:?</b>${any}*` : `<b>Output:?</b>${any}+</pre>`;

  return {
    input: new RegExp(`(<pre>${any}*<b>Input:?</b>:?|${outputTail})`, "g"),
    output: new RegExp(`(<pre>${any}${openEnded ? "*" : "+"}<b>Output:?</b>:?|</pre>)`, "g")
  };
}

export function splitSampleBlock(preHtml: string, regexes: SampleRegexes): { input: string; output: string } {
  const input = decodeHtml(stripTags(preHtml.replace(regexes.input, ""))).trim();
  const output = decodeHtml(stripTags(preHtml.replace(regexes.output, ""))).trim();
  return { input, output };
}

/** Every sample input needs exactly one output. */
export function requirePairedCases(problem: string, cases: ParsedCases): ParsedCases {
  if (cases.inputs.length !== cases.outputs.length) {
    throw new MismatchedSamplesError(problem, cases.inputs.length, cases.outputs.length);
  }
  return cases;
}
