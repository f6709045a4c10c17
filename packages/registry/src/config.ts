import { z } from "zod";
import { DEFAULT_CACHE_TTL_MS } from "./cache.js";
import { CT_BASE, DEFAULT_PAGE_DELAY_MS, MAX_PAGE_SIZE } from "./clinicaltrials.js";
import { DEFAULT_TIMEOUT_MS } from "./fetchRegistry.js";

const intVar = (fallback: number, min: number, max = Number.MAX_SAFE_INTEGER) =>
  z.coerce.number().int().min(min).max(max).default(fallback);

const EnvSchema = z.object({
  CT_API_BASE_URL: z.string().url().default(CT_BASE),
  CT_PAGE_SIZE: intVar(MAX_PAGE_SIZE, 1, MAX_PAGE_SIZE),
  CT_PAGE_DELAY_MS: intVar(DEFAULT_PAGE_DELAY_MS, 0),
  CT_TIMEOUT_MS: intVar(DEFAULT_TIMEOUT_MS, 1),
  CT_MAX_STUDIES: intVar(1000, 0),
  TRIALS_CACHE_TTL_MS: intVar(DEFAULT_CACHE_TTL_MS, 0),
});

export interface RegistryConfig {
  baseUrl: string;
  pageSize: number;
  delayMs: number;
  timeoutMs: number;
  maxStudies: number;
  cacheTtlMs: number;
}

/** Read registry settings from the environment. Empty strings count as unset. */
export function loadRegistryConfig(
  env: Record<string, string | undefined> = process.env
): RegistryConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, v]) => v !== undefined && v.trim() !== "")
  );
  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const name = issue?.path.join(".") ?? "environment";
    throw new RangeError(`Invalid ${name}: ${issue?.message ?? "invalid value"}`);
  }
  const e = parsed.data;
  return {
    baseUrl: e.CT_API_BASE_URL,
    pageSize: e.CT_PAGE_SIZE,
    delayMs: e.CT_PAGE_DELAY_MS,
    timeoutMs: e.CT_TIMEOUT_MS,
    maxStudies: e.CT_MAX_STUDIES,
    cacheTtlMs: e.TRIALS_CACHE_TTL_MS,
  };
}
