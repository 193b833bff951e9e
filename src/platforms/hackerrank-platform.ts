import { load, type CheerioAPI } from "cheerio";
import { z } from "zod";
import { ContestNotFoundError, ProblemNotFoundError } from "../errors.js";
import type { FetchResponse, ParsedCases, ProblemRef } from "../types.js";
import { decodeHtml, lastPathSegment, requirePairedCases } from "./html.js";
import type { Platform } from "./types.js";

const API_URL = "https://www.hackerrank.com/rest/contests";

const challengeSchema = z.object({
  model: z.object({
    body_html: z.string()
  })
});

const challengeListSchema = z.object({
  models: z.array(z.object({ slug: z.string() }))
});

const PRE_WRAPPER = /(<pre>(<code>)?|(<\/code>)?<\/pre>)/g;

function parseJson<T>(raw: string, schema: z.ZodType<T>): T | null {
  try {
    const result = schema.safeParse(JSON.parse(raw));
    return result.success ? result.data : null;
  } catch {
    return null;
  }
}

export function toSlug(problem: string): string {
  return problem.split(/\s+/).filter(Boolean).join("-").toLowerCase();
}

/**
 * Sample blocks that mark every line with a `<span>` are joined line by line;
 * plain blocks only lose their `<pre>`/`<code>` wrapper.
 */
function extractSamples($: CheerioAPI, selector: string): string[] {
  return $(selector)
    .map((_, el) => {
      const pre = $(el).find("pre").first();
      if (pre.length === 0) return "";

      const spans = pre.find("span");
      const raw =
        spans.length > 0
          ? spans.map((__, span) => $(span).html() ?? "").get().join("\n")
          : $.html(pre).replace(PRE_WRAPPER, "");
      return decodeHtml(raw).trim();
    })
    .get();
}

export class HackerrankPlatform implements Platform {
  readonly site = "hackerrank" as const;
  readonly displayName = "Hackerrank";
  readonly contest: string;
  readonly problem: string | null;

  constructor(ref: ProblemRef) {
    this.contest = ref.contest;
    this.problem = ref.problem === null ? null : toSlug(ref.problem);
  }

  problemUrl(): string {
    return `${API_URL}/${this.contest}/challenges/${this.problem ?? ""}`;
  }

  contestUrl(): string {
    return `${API_URL}/${this.contest}/challenges`;
  }

  parse(response: FetchResponse): ParsedCases {
    const payload = parseJson(response.body, challengeSchema);
    if (!payload) {
      throw new ProblemNotFoundError(response.url);
    }

    const $ = load(payload.model.body_html);
    const inputs = extractSamples($, "div.challenge_sample_input");
    const outputs = extractSamples($, "div.challenge_sample_output");

    if (inputs.length === 0 || outputs.length === 0) {
      throw new ProblemNotFoundError(response.url);
    }
    return requirePairedCases(lastPathSegment(response.url), { inputs, outputs });
  }

  getProblemLinks(response: FetchResponse): string[] {
    const payload = parseJson(response.body, challengeListSchema);
    if (!payload) {
      throw new ContestNotFoundError(response.url);
    }
    return payload.models.map((challenge) => `${API_URL}/${this.contest}/challenges/${challenge.slug}`);
  }

  problemIdFromResponse(response: FetchResponse): string {
    return lastPathSegment(response.url);
  }
}
