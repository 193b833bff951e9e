import { homedir } from "node:os";
import { join } from "node:path";

export function optionalEnv(name: string): string | undefined {
  const value = process.env[name];
  if (!value) return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function numberEnv(name: string, fallback: number, max: number): number {
  const raw = optionalEnv(name);
  if (!raw) return fallback;
  const n = Number(raw);
  if (!Number.isFinite(n) || n <= 0) return fallback;
  return Math.min(Math.floor(n), max);
}

export function resolveCacheRoot(): string {
  return optionalEnv("CP_SAMPLES_CACHE_DIR") ?? join(homedir(), ".cache", "cp-samples");
}

/** Wall-clock limit for a single sample case. */
export function resolveRunTimeoutMs(): number {
  return numberEnv("CP_SAMPLES_TIMEOUT_MS", 2000, 60_000);
}

export function resolveFetchTimeoutMs(): number {
  return numberEnv("CP_SAMPLES_FETCH_TIMEOUT_MS", 15_000, 120_000);
}

export function resolveFetchConcurrency(): number {
  return numberEnv("CP_SAMPLES_FETCH_CONCURRENCY", 8, 32);
}

export function resolvePythonBinary(): string {
  return optionalEnv("CP_SAMPLES_PYTHON") ?? "python3";
}
