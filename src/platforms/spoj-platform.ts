import { load } from "cheerio";
import { ProblemNotFoundError, UnsupportedOperationError } from "../errors.js";
import type { FetchResponse, ParsedCases, ProblemRef } from "../types.js";
import { buildSampleRegexes, lastPathSegment, splitSampleBlock } from "./html.js";
import type { Platform } from "./types.js";

const SAMPLE_REGEXES = buildSampleRegexes("crlf", true);

/** Spoj problem codes are case-insensitive and there are no contests. */
export class SpojPlatform implements Platform {
  readonly site = "spoj" as const;
  readonly displayName = "SPOJ";
  readonly contest = "";
  readonly problem: string | null;

  constructor(ref: ProblemRef) {
    this.problem = ref.problem === null ? null : ref.problem.toUpperCase();
  }

  problemUrl(): string {
    return `https://www.spoj.com/problems/${this.problem ?? ""}/`;
  }

  contestUrl(): null {
    return null;
  }

  parse(response: FetchResponse): ParsedCases {
    const $ = load(response.body);
    const blocks = $("pre")
      .map((_, el) => $.html(el))
      .get()
      .map((pre) => splitSampleBlock(pre, SAMPLE_REGEXES));

    if (blocks.length === 0) {
      throw new ProblemNotFoundError(response.url);
    }

    return {
      inputs: blocks.map((block) => block.input),
      outputs: blocks.map((block) => block.output)
    };
  }

  getProblemLinks(): string[] {
    throw new UnsupportedOperationError("SPOJ has no contests");
  }

  problemIdFromResponse(response: FetchResponse): string {
    return lastPathSegment(response.url).toUpperCase();
  }
}
