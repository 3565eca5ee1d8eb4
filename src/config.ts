import { z } from "zod";

const DEFAULT_BASE_URL = "https://id.loc.gov";

const EnvSchema = z.object({
  IDLOC_BASE_URL: z
    .string()
    .url()
    .default(DEFAULT_BASE_URL)
    .transform((url) => url.replace(/\/+$/, "")),
  IDLOC_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  IDLOC_PAGE_DELAY_MS: z.coerce.number().int().nonnegative().default(1_000),
  IDLOC_SEARCH_LIMIT: z.coerce.number().int().nonnegative().default(20),
  PORT: z.coerce.number().int().positive().max(65_535).optional(),
  ALLOWED_ORIGINS: z
    .string()
    .transform((list) => list.split(",").map((o) => o.trim()).filter(Boolean))
    .optional(),
});

export interface Config {
  /** Origin for search and scheme discovery (no trailing slash) */
  baseUrl: string;
  timeoutMs: number;
  pageDelayMs: number;
  searchLimit: number;
  port: number | undefined;
  /** CORS origins for HTTP mode; unset allows any origin */
  allowedOrigins: string[] | undefined;
}

/** Treat empty strings as unset so `FOO= idloc ...` falls back to the default. */
function dropEmpty(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") out[key] = value;
  }
  return out;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = EnvSchema.parse(dropEmpty(env));
  return {
    baseUrl: parsed.IDLOC_BASE_URL,
    timeoutMs: parsed.IDLOC_TIMEOUT_MS,
    pageDelayMs: parsed.IDLOC_PAGE_DELAY_MS,
    searchLimit: parsed.IDLOC_SEARCH_LIMIT,
    port: parsed.PORT,
    allowedOrigins: parsed.ALLOWED_ORIGINS,
  };
}
