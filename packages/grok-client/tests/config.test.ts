import { describe, it, expect } from "vitest";
import {
  API_KEY_ENV,
  DEFAULT_ENDPOINT,
  DEFAULT_MODEL,
  apiKeyFromEnv,
  resolveConfig,
} from "../src/config.js";
import { ConfigurationError, MissingCredentialError } from "../src/types/errors.js";

describe("resolveConfig", () => {
  it("fills defaults", () => {
    expect(resolveConfig({ apiKey: "test-secret" })).toEqual({
      apiKey: "test-secret",
      endpoint: DEFAULT_ENDPOINT,
      defaultModel: DEFAULT_MODEL,
      timeoutMs: 60_000,
      keepAliveMs: 30_000,
      keepAliveTimeoutMs: 10_000,
    });
    expect(DEFAULT_ENDPOINT).toBe("https://api.x.ai");
    expect(DEFAULT_MODEL).toBe("grok-code-fast-1");
  });

  it("keeps explicit values", () => {
    const config = resolveConfig({
      apiKey: "test-secret",
      endpoint: "http://localhost:50051",
      defaultModel: "grok-4",
      timeoutMs: 5_000,
    });
    expect(config.endpoint).toBe("http://localhost:50051");
    expect(config.defaultModel).toBe("grok-4");
    expect(config.timeoutMs).toBe(5_000);
  });

  it("rejects an empty key without echoing it", () => {
    expect(() => resolveConfig({ apiKey: "" })).toThrow(
      new ConfigurationError("Invalid client configuration: apiKey: API key is required"),
    );
  });

  it("rejects a non-http endpoint", () => {
    expect(() => resolveConfig({ apiKey: "test-secret", endpoint: "ftp://api.x.ai" })).toThrow(
      "endpoint: Endpoint scheme must be http or https",
    );
  });

  it("rejects a non-positive timeout", () => {
    expect(() => resolveConfig({ apiKey: "test-secret", timeoutMs: 0 })).toThrow(
      ConfigurationError,
    );
  });
});

describe("apiKeyFromEnv", () => {
  it("reads XAI_API_KEY", () => {
    expect(API_KEY_ENV).toBe("XAI_API_KEY");
    expect(apiKeyFromEnv({ XAI_API_KEY: "test-secret" })).toBe("test-secret");
  });

  it("throws MissingCredentialError when unset", () => {
    let caught: unknown;
    try {
      apiKeyFromEnv({});
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(MissingCredentialError);
    expect(caught instanceof MissingCredentialError && caught.variable).toBe("XAI_API_KEY");
    expect(caught instanceof Error && caught.message).toBe(
      "Environment variable XAI_API_KEY is not set",
    );
  });
});
