import { expect, test } from "vitest";
import {
  DEFAULT_MODEL,
  DEFAULT_ORACLE_TIMEOUT_MS,
  parseConfig,
} from "./config.ts";
import { GgError } from "./domain/entities/errors.ts";

function configError(env: Record<string, string>): GgError {
  try {
    parseConfig(env);
  } catch (e) {
    if (e instanceof GgError) return e;
    throw e;
  }
  throw new Error("expected parseConfig to throw");
}

test("parseConfig - defaults for an empty environment", () => {
  expect(parseConfig({})).toEqual({
    apiKey: null,
    model: DEFAULT_MODEL,
    oracleTimeoutMs: DEFAULT_ORACLE_TIMEOUT_MS,
    debug: false,
  });
});

test("parseConfig - reads every variable", () => {
  expect(parseConfig({
    GEMINI_API_KEY: " test-secret ",
    GITGUARD_MODEL: "gemini-2.5-pro",
    GITGUARD_ORACLE_TIMEOUT_MS: "10000",
    GITGUARD_DEBUG: "TRUE",
  })).toEqual({
    apiKey: "test-secret",
    model: "gemini-2.5-pro",
    oracleTimeoutMs: 10000,
    debug: true,
  });
});

test("parseConfig - blank API key counts as missing", () => {
  expect(parseConfig({ GEMINI_API_KEY: "   " }).apiKey).toBeNull();
});

test("parseConfig - debug accepts 1 and ignores other values", () => {
  expect(parseConfig({ GITGUARD_DEBUG: "1" }).debug).toBe(true);
  expect(parseConfig({ GITGUARD_DEBUG: "yes" }).debug).toBe(false);
});

test("parseConfig - rejects a non-numeric timeout", () => {
  const error = configError({ GITGUARD_ORACLE_TIMEOUT_MS: "soon" });

  expect(error.code).toBe("invalid_config");
  expect(error.message).toBe(
    "Invalid configuration: GITGUARD_ORACLE_TIMEOUT_MS",
  );
});

test("parseConfig - rejects a zero timeout", () => {
  const error = configError({ GITGUARD_ORACLE_TIMEOUT_MS: "0" });

  expect(error.code).toBe("invalid_config");
  expect(error.message).toBe(
    "GITGUARD_ORACLE_TIMEOUT_MS must be a positive number of milliseconds",
  );
});
