import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { z } from "zod";
import { errorMessage, log } from "./logger.js";
import { SUPPORTED_SITES } from "./types.js";

const CONSTANTS_FILE = "constants.json";

const siteSchema = z.enum(SUPPORTED_SITES);

export const defaultsSchema = z.object({
  default_site: siteSchema.nullable().optional(),
  default_contest: z.string().nullable().optional()
});

export type Defaults = z.infer<typeof defaultsSchema>;

export type DefaultKey = keyof Defaults;

export function constantsPath(cacheRoot: string): string {
  return join(cacheRoot, CONSTANTS_FILE);
}

/** Stored default site and contest; a missing or unreadable file means no defaults. */
export async function loadDefaults(cacheRoot: string): Promise<Defaults> {
  let raw: string;
  try {
    raw = await readFile(constantsPath(cacheRoot), "utf8");
  } catch {
    return {};
  }

  try {
    const result = defaultsSchema.safeParse(JSON.parse(raw));
    if (result.success) return result.data;
    log("warn", "Ignoring invalid defaults file", { issues: result.error.issues.length });
  } catch (error) {
    log("warn", "Ignoring unreadable defaults file", { error: errorMessage(error) });
  }
  return {};
}

export async function setDefault(cacheRoot: string, key: DefaultKey, value: string): Promise<Defaults> {
  const next = defaultsSchema.parse({ ...(await loadDefaults(cacheRoot)), [key]: value });
  const path = constantsPath(cacheRoot);
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, `${JSON.stringify(next, null, 2)}\n`, "utf8");
  return next;
}
