import { describe, expect, it } from "vitest";
import { DEFAULT_MODEL, DEFAULT_TIMEOUT_MS, loadConfig } from "./config.js";
import { InvalidInputError, MissingCredentialError } from "./errors.js";

describe("loadConfig", () => {
  it("fails before any call when the key is missing or blank", () => {
    expect(() => loadConfig({})).toThrow(MissingCredentialError);
    expect(() => loadConfig({ OPENAI_API_KEY: "   " })).toThrow("OPENAI_API_KEY environment variable not set");
  });

  it("applies defaults", () => {
    expect(loadConfig({ OPENAI_API_KEY: "test-secret" })).toEqual({
      apiKey   : "test-secret",
      model    : DEFAULT_MODEL,
      timeoutMs: DEFAULT_TIMEOUT_MS,
    });
  });

  it("reads the model and timeout overrides", () => {
    const config = loadConfig({ OPENAI_API_KEY: "test-secret", OPENAI_MODEL: "test-model", OPENAI_TIMEOUT_MS: "5000" });
    expect(config.model).toBe("test-model");
    expect(config.timeoutMs).toBe(5000);
  });

  it("rejects a timeout that is not a positive integer", () => {
    expect(() => loadConfig({ OPENAI_API_KEY: "test-secret", OPENAI_TIMEOUT_MS: "soon" })).toThrow(InvalidInputError);
  });
});
