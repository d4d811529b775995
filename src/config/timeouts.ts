import { env } from "node:process";

const MIN_TIMEOUT_MS = 1_000; // 1s
const MAX_TIMEOUT_MS = 10 * 60_000; // 10m

function clampTimeout(value: number): number {
  if (!Number.isFinite(value)) return MIN_TIMEOUT_MS;
  return Math.max(MIN_TIMEOUT_MS, Math.min(MAX_TIMEOUT_MS, value));
}

function parseTimeoutEnv(name: string, defaultMs: number): number {
  const raw = env[name];
  if (!raw) return defaultMs;
  const n = Number(raw);
  if (!Number.isFinite(n) || n <= 0) return defaultMs;
  return n;
}

/** Per generator call deadline when the settings file does not set one */
export const DEFAULT_LLM_TIMEOUT_MS = clampTimeout(parseTimeoutEnv("LLM_TIMEOUT_MS", 45_000));

/** Socket connect deadline for the shared HTTP agent */
export const HTTP_CONNECT_TIMEOUT_MS = clampTimeout(parseTimeoutEnv("HTTP_CONNECT_TIMEOUT_MS", 3_000));

/** Headers/body deadline for the shared HTTP agent; kept above the per-call deadline */
export const HTTP_CLIENT_TIMEOUT_MS = clampTimeout(
  parseTimeoutEnv("HTTP_CLIENT_TIMEOUT_MS", DEFAULT_LLM_TIMEOUT_MS + 5_000),
);
