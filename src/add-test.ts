import type { CacheStore } from "./cache.js";
import type { SupportedSite } from "./types.js";

/**
 * Collects lines until the input ends or two empty lines arrive in a row.
 * End of input contributes one trailing empty line.
 */
export async function readLongInput(lines: AsyncIterator<string>): Promise<string> {
  const collected: string[] = [];

  for (;;) {
    const next = await lines.next();
    if (next.done) {
      collected.push("");
      break;
    }
    const line = next.value;
    if (line === "" && collected.length > 0 && collected[collected.length - 1] === "") {
      break;
    }
    collected.push(line);
  }

  return collected.join("\n");
}

export interface AddTestTarget {
  site: SupportedSite;
  contest: string;
  problem: string;
}

export async function addTest(
  cache: CacheStore,
  target: AddTestTarget,
  lines: AsyncIterator<string>,
  notify: (message: string) => void
): Promise<number> {
  notify(`Adding new test to ${target.site} (contest: ${target.contest || "-"}, problem: ${target.problem})`);

  notify("Specify input (^D or two consecutive empty lines to stop):");
  const input = await readLongInput(lines);
  notify("Specify output (^D or two consecutive empty lines to stop):");
  const output = await readLongInput(lines);

  await cache.ensureCaseDir(target.site, target.contest, target.problem);
  const [index] = await cache.store(target.site, target.contest, target.problem, {
    inputs: [input],
    outputs: [output]
  });

  notify("Test is successfully added");
  return index;
}
