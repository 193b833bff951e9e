import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { HttpClient } from "../src/http.js";
import type { FetchResponse, FetchResult } from "../src/types.js";

export async function makeTempDir(prefix = "cp-samples-test-"): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export function page(url: string, body: string, status = 200): FetchResponse {
  return { url, status, body };
}

export interface FakeClient extends HttpClient {
  calls: string[];
}

/** In-process stand-in for the network: answers from a url → result map, 404 otherwise. */
export function fakeClient(routes: Record<string, FetchResult | ((url: string) => FetchResult)>): FakeClient {
  const calls: string[] = [];
  return {
    calls,
    async get(url: string): Promise<FetchResult> {
      calls.push(url);
      const route = routes[url];
      if (route === undefined) return { url, status: 404, body: "" };
      return typeof route === "function" ? route(url) : route;
    }
  };
}

export function codeforcesProblemPage(input: string, output: string): string {
  return [
    "<html><body>",
    '<div class="problem-statement"><p>Add the numbers.</p></div>',
    `<div class="input"><div class="title">Input</div><pre>${input}</pre></div>`,
    `<div class="output"><div class="title">Output</div><pre>${output}</pre></div>`,
    "</body></html>"
  ].join("");
}

export function codeforcesContestPage(contest: string, problems: string[]): string {
  const rows = problems
    .map((problem) => `<tr><td class="id"><a href="/contest/${contest}/problem/${problem}">${problem}</a></td></tr>`)
    .join("");
  return `<html><body><table class="problems">${rows}</table></body></html>`;
}
