import type { FetchResponse, ParsedCases, SupportedSite } from "../types.js";

/**
 * One judge. `getPlatform()` is the only place that picks an implementation;
 * the fetch/store flows in `acquire.ts` drive every judge through this shape.
 */
export interface Platform {
  readonly site: SupportedSite;
  readonly displayName: string;
  readonly contest: string;
  readonly problem: string | null;

  problemUrl(): string;
  /** `null` when the judge has no contests. */
  contestUrl(): string | null;
  /** @throws {ProblemNotFoundError} when the page holds no sample cases */
  parse(response: FetchResponse): ParsedCases;
  /** @throws {ContestNotFoundError} when the page lists no problems */
  getProblemLinks(response: FetchResponse): string[];
  /** Problem id to cache a contest problem under, taken from the resolved URL. */
  problemIdFromResponse(response: FetchResponse): string;
}
