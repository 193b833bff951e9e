import { load } from "cheerio";
import { ContestNotFoundError, ProblemNotFoundError, UsageError } from "../errors.js";
import type { FetchResponse, ParsedCases, ProblemRef } from "../types.js";
import { lastPathSegment, replaceAll, requirePairedCases, stripTags } from "./html.js";
import type { Platform } from "./types.js";

const BASE_URL = "https://codeforces.com";
const LOCALE = "locale=ru";
const GYM_THRESHOLD = 100000;

const LAYOUT_TAGS = [
  ["<br>", "\n"],
  ["<br/>", "\n"],
  ["</br>", ""],
  ["</p>", "\n"],
  ["<p>", "\n"],
  ["<div>", "\n"],
  ["</div>", "\n"],
  ["<li>", "\n *"]
] as const;

// Order matters: `\le` also rewrites the start of `\leftarrow`.
const TEX_SUBSTITUTIONS = [
  ["$$$", ""],
  ["\\le", "<="],
  ["\\ge", ">="],
  ["\\neq", "!="],
  ["&gt;", ">"],
  ["&lt;", "<"],
  ["\\ldots", "..."],
  ["\\dots", "..."],
  ["\\ ", " "],
  ["\\cdot", "*"],
  ["\\rightarrow", "->"],
  ["\\leftarrow", "<-"],
  ["&quot;", '"'],
  ["&nbsp;", " "],
  ["&amp;", "&"]
] as const;

export function formatCodeforcesText(html: string): string {
  let text = replaceAll(html, LAYOUT_TAGS);
  text = stripTags(text);
  text = replaceAll(text, TEX_SUBSTITUTIONS);
  text = text.replace(/\n{2,}/g, "\n\n");
  return text.replace(/^\s*/, "");
}

export class CodeforcesPlatform implements Platform {
  readonly site = "codeforces" as const;
  readonly displayName = "Codeforces";
  readonly contest: string;
  readonly problem: string | null;
  private readonly section: "contest" | "gym";

  constructor(ref: ProblemRef) {
    if (!/^\d+$/.test(ref.contest)) {
      throw new UsageError(`Codeforces contest id must be numeric, got "${ref.contest}"`);
    }
    this.contest = ref.contest;
    this.problem = ref.problem;
    this.section = Number(ref.contest) <= GYM_THRESHOLD ? "contest" : "gym";
  }

  problemUrl(): string {
    return `${BASE_URL}/${this.section}/${this.contest}/problem/${this.problem ?? ""}?${LOCALE}`;
  }

  contestUrl(): string {
    return `${BASE_URL}/${this.section}/${this.contest}?${LOCALE}`;
  }

  parse(response: FetchResponse): ParsedCases {
    const $ = load(response.body);
    const inputs = $("div.input")
      .map((_, el) => $(el).find("pre").first().html() ?? "")
      .get()
      .map(formatCodeforcesText);
    const outputs = $("div.output")
      .map((_, el) => $(el).find("pre").first().html() ?? "")
      .get()
      .map(formatCodeforcesText);

    if (inputs.length === 0 || outputs.length === 0) {
      throw new ProblemNotFoundError(response.url);
    }

    const statementHtml = $("div.problem-statement").first().html();
    const cases: ParsedCases = { inputs, outputs };
    if (statementHtml) {
      cases.statement = formatCodeforcesText(statementHtml);
    }
    return requirePairedCases(lastPathSegment(response.url), cases);
  }

  getProblemLinks(response: FetchResponse): string[] {
    const $ = load(response.body);
    const table = $("table.problems");
    if (table.length === 0) {
      throw new ContestNotFoundError(response.url);
    }

    return table
      .find("td.id a")
      .map((_, el) => $(el).attr("href"))
      .get()
      .map((href) => `${BASE_URL}${href}?${LOCALE}`);
  }

  problemIdFromResponse(response: FetchResponse): string {
    return lastPathSegment(response.url);
  }
}
