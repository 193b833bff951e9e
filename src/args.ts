import type { Defaults } from "./config.js";
import { UsageError } from "./errors.js";
import { isSupportedSite, SUPPORTED_SITES, type SupportedSite } from "./types.js";

export function usage(): string {
  return [
    "Usage:",
    "  cp-samples -s <site> -c <contest> [-p <problem>] [--force]",
    "  cp-samples -s <site> -c <contest> [-p <problem>] --run <source-file>",
    "",
    "Options:",
    `  -s, --site               One of: ${SUPPORTED_SITES.join(", ")}`,
    "  -c, --contest            Contest code, e.g. 1234, JUNE17 (not used for spoj)",
    "  -p, --problem            Problem code, e.g. A, PRMQ; omit to fetch a whole contest",
    "  -f, --force              Download test cases even if they are cached",
    "  --run <file>             Run a solution against the cached sample cases",
    "  --add-test               Add a test case to a problem interactively",
    "  --set-default-site <s>   Site used when -s is omitted",
    "  --set-default-contest <c> Contest used when -c is omitted",
    "  --clear-cache            Clear cached test cases for the site",
    "  -h, --help               Show this message"
  ].join("\n");
}

export interface Flags {
  site?: string;
  contest?: string;
  problem?: string;
  force: boolean;
  addTest: boolean;
  source?: string;
  defaultSite?: SupportedSite;
  defaultContest?: string;
  clearCache: boolean;
  help: boolean;
}

function parseSite(raw: string, flag: string): SupportedSite {
  const value = raw.trim().toLowerCase();
  if (!isSupportedSite(value)) {
    throw new UsageError(`Invalid value for ${flag}: "${raw}" (choose from ${SUPPORTED_SITES.join(", ")})`);
  }
  return value;
}

export function parseFlags(argv: readonly string[]): Flags {
  const flags: Flags = { force: false, addTest: false, clearCache: false, help: false };

  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];

    const take = (): string => {
      const next = argv[i + 1];
      if (next === undefined) {
        throw new UsageError(`Missing value for ${a}`);
      }
      i++;
      return next;
    };

    switch (a) {
      case "-h":
      case "--help":
        flags.help = true;
        break;
      case "-s":
      case "--site":
        flags.site = parseSite(take(), a);
        break;
      case "-c":
      case "--contest":
        flags.contest = take();
        break;
      case "-p":
      case "--problem":
        flags.problem = take();
        break;
      case "-f":
      case "--force":
        flags.force = true;
        break;
      case "--add-test":
        flags.addTest = true;
        break;
      case "--run":
        flags.source = take();
        break;
      case "--set-default-site":
        flags.defaultSite = parseSite(take(), a);
        break;
      case "--set-default-contest":
        flags.defaultContest = take();
        break;
      case "--clear-cache":
        flags.clearCache = true;
        break;
      default:
        if (a.startsWith("-")) {
          throw new UsageError(`Unknown option: ${a}`);
        }
        throw new UsageError(`Unexpected positional argument: ${a}`);
    }
  }

  return flags;
}

export interface ResolvedTarget {
  site: SupportedSite;
  /** `""` for Spoj. */
  contest: string;
  problem: string | null;
}

/** Fills site and contest from the stored defaults where the flags leave them out. */
export function resolveTarget(flags: Flags, defaults: Defaults): ResolvedTarget {
  const rawSite = flags.site ?? defaults.default_site ?? undefined;
  if (!rawSite) {
    throw new UsageError("No site given; pass -s or set one with --set-default-site");
  }
  const site = parseSite(rawSite, "--site");
  const contest = site === "spoj" ? "" : (flags.contest ?? defaults.default_contest ?? "");

  return { site, contest, problem: flags.problem ?? null };
}
