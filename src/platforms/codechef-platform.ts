import { load } from "cheerio";
import { z } from "zod";
import { ContestNotFoundError, ProblemNotFoundError } from "../errors.js";
import type { FetchResponse, ParsedCases, ProblemRef } from "../types.js";
import { buildSampleRegexes, lastPathSegment, splitSampleBlock } from "./html.js";
import type { Platform } from "./types.js";

const API_URL = "https://codechef.com/api/contests";

const problemPayloadSchema = z.object({
  body: z.string()
});

const SAMPLE_REGEXES = buildSampleRegexes("lf", false);

function parsePayload(raw: string): z.infer<typeof problemPayloadSchema> | null {
  try {
    const result = problemPayloadSchema.safeParse(JSON.parse(raw));
    return result.success ? result.data : null;
  } catch {
    return null;
  }
}

export class CodechefPlatform implements Platform {
  readonly site = "codechef" as const;
  readonly displayName = "Codechef";
  readonly contest: string;
  readonly problem: string | null;

  constructor(ref: ProblemRef) {
    this.contest = ref.contest;
    this.problem = ref.problem;
  }

  problemUrl(): string {
    return `${API_URL}/${this.contest}/problems/${this.problem ?? ""}`;
  }

  contestUrl(): string {
    return `https://codechef.com/${this.contest}`;
  }

  parse(response: FetchResponse): ParsedCases {
    const payload = parsePayload(response.body);
    if (!payload) {
      throw new ProblemNotFoundError(response.url);
    }

    const $ = load(payload.body);
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

  getProblemLinks(response: FetchResponse): string[] {
    const $ = load(response.body);
    const table = $("table.dataTable");
    if (table.length === 0) {
      throw new ContestNotFoundError(response.url);
    }

    return table
      .find("div.problemname a")
      .map((_, el) => $(el).attr("href"))
      .get()
      .map((href) => `${API_URL}/${this.contest}/problems/${lastPathSegment(href)}`);
  }

  problemIdFromResponse(response: FetchResponse): string {
    return lastPathSegment(response.url);
  }
}
