/**
 * Configuration loading tests
 */

import { loadConfig, TOKEN_PLACEHOLDER } from "../src/config";
import { ConfigurationError } from "../src/core/errors";

describe("loadConfig", () => {
  test("applies defaults around the token", () => {
    expect(loadConfig({ MONOBANK_API_TOKEN: "test-token" })).toEqual({
      token: "test-token",
      baseUrl: "https://api.monobank.ua",
      timeoutMs: 5000,
    });
  });

  test("reads overrides and trims the token", () => {
    const config = loadConfig({
      MONOBANK_API_TOKEN: "  test-token\n",
      MONOBANK_API_URL: "http://localhost:9000",
      MONOBANK_TIMEOUT_MS: "2500",
    });

    expect(config).toEqual({ token: "test-token", baseUrl: "http://localhost:9000", timeoutMs: 2500 });
  });

  test("fails when the token is missing", () => {
    expect(() => loadConfig({})).toThrow(ConfigurationError);
    expect(() => loadConfig({})).toThrow("Configuration error: MONOBANK_API_TOKEN is not set");
  });

  test("fails on an empty token", () => {
    expect(() => loadConfig({ MONOBANK_API_TOKEN: "   " })).toThrow("Configuration error: MONOBANK_API_TOKEN is empty");
  });

  test("fails on the sample placeholder", () => {
    expect(() => loadConfig({ MONOBANK_API_TOKEN: TOKEN_PLACEHOLDER })).toThrow(
      "Configuration error: MONOBANK_API_TOKEN is still the placeholder value"
    );
  });

  test("fails on a token with inner whitespace", () => {
    expect(() => loadConfig({ MONOBANK_API_TOKEN: "test token" })).toThrow(
      "Configuration error: MONOBANK_API_TOKEN must not contain whitespace"
    );
  });

  test("reports every bad variable", () => {
    let caught: unknown;
    try {
      loadConfig({ MONOBANK_API_TOKEN: "test-token", MONOBANK_API_URL: "not a url", MONOBANK_TIMEOUT_MS: "0" });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigurationError);
    expect(caught).toMatchObject({
      code: "configuration_error",
      details: { variables: ["MONOBANK_API_URL", "MONOBANK_TIMEOUT_MS"] },
    });
  });
});
