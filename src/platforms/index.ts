import type { ProblemRef } from "../types.js";
import { CodechefPlatform } from "./codechef-platform.js";
import { CodeforcesPlatform } from "./codeforces-platform.js";
import { HackerrankPlatform } from "./hackerrank-platform.js";
import { SpojPlatform } from "./spoj-platform.js";
import type { Platform } from "./types.js";

export type { Platform } from "./types.js";

export function getPlatform(ref: ProblemRef): Platform {
  switch (ref.site) {
    case "codeforces":
      return new CodeforcesPlatform(ref);
    case "codechef":
      return new CodechefPlatform(ref);
    case "spoj":
      return new SpojPlatform(ref);
    case "hackerrank":
      return new HackerrankPlatform(ref);
    default:
      throw new Error(`Unsupported site: ${String(ref.site)}`);
  }
}
