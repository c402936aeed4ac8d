// Configuration - environment variables, optionally loaded from .env

import { config as loadDotenv } from "dotenv";
import { z } from "zod/mini";
import { GgError } from "./domain/entities/errors.ts";

export const DEFAULT_MODEL = "gemini-2.5-flash";
export const DEFAULT_ORACLE_TIMEOUT_MS = 45_000;

export type GitguardConfig = {
  readonly apiKey: string | null;
  readonly model: string;
  readonly oracleTimeoutMs: number;
  readonly debug: boolean;
};

const EnvSchema = z.object({
  GEMINI_API_KEY: z.optional(z.string()),
  GITGUARD_MODEL: z.optional(z.string()),
  GITGUARD_ORACLE_TIMEOUT_MS: z.optional(z.string().check(z.regex(/^\d+$/))),
  GITGUARD_DEBUG: z.optional(z.string()),
});

/**
 * Build the configuration from an environment map.
 * Throws `invalid_config` when a value cannot be used.
 */
export function parseConfig(
  env: Readonly<Record<string, string | undefined>>,
): GitguardConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => issue.path.join("."));
    throw new GgError(
      "invalid_config",
      `Invalid configuration: ${fields.join(", ")}`,
    );
  }

  const values = parsed.data;
  const timeout = values.GITGUARD_ORACLE_TIMEOUT_MS
    ? Number(values.GITGUARD_ORACLE_TIMEOUT_MS)
    : DEFAULT_ORACLE_TIMEOUT_MS;
  if (timeout <= 0) {
    throw new GgError(
      "invalid_config",
      "GITGUARD_ORACLE_TIMEOUT_MS must be a positive number of milliseconds",
    );
  }

  const debug = (values.GITGUARD_DEBUG ?? "").trim().toLowerCase();

  return {
    apiKey: values.GEMINI_API_KEY?.trim() || null,
    model: values.GITGUARD_MODEL?.trim() || DEFAULT_MODEL,
    oracleTimeoutMs: timeout,
    debug: debug === "1" || debug === "true",
  };
}

/**
 * Load .env from the working directory (existing variables win), then
 * parse the process environment.
 */
export function loadConfig(): GitguardConfig {
  loadDotenv();
  return parseConfig(process.env);
}
