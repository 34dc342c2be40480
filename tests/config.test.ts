import { describe, it, expect } from "@jest/globals";
import { ConfigError, loadConfig } from "../src/config";
import { parseBoolEnv, parseIntEnv } from "../src/env";

describe("loadConfig", () => {
  it("applies defaults when nothing is set", () => {
    const config = loadConfig({});
    expect(config.provider).toBe("openrouter");
    expect(config.apiKeyVar).toBe("OPENROUTER_API_KEY");
    expect(config.apiKey).toBe("");
    expect(config.model).toBe("deepseek/deepseek-r1:free");
    expect(config.port).toBe(8080);
    expect(config.host).toBe("0.0.0.0");
    expect(config.corsOrigin).toBe("http://localhost:3000");
    expect(config.templateId).toBe("flat-merged");
    expect(config.sampling).toEqual({
      temperature: 0.5,
      maxOutputTokens: 2048,
      topP: 0.9,
      frequencyPenalty: 0.2,
      presencePenalty: 0.2,
    });
    expect(config.timeoutMs).toBe(60_000);
    expect(config.allowDegradedStart).toBe(false);
    expect(Object.isFrozen(config)).toBe(true);
  });

  it("picks the provider whose key is present", () => {
    const config = loadConfig({ GEMINI_API_KEY: "test-secret" });
    expect(config.provider).toBe("gemini");
    expect(config.apiKeyVar).toBe("GEMINI_API_KEY");
    expect(config.apiKey).toBe("test-secret");
    expect(config.model).toBe("gemini-1.5-flash");
  });

  it("lets an explicit provider and model win", () => {
    const config = loadConfig({
      LLM_PROVIDER: "OpenRouter",
      GEMINI_API_KEY: "test-secret",
      LLM_MODEL: "some/model",
    });
    expect(config.provider).toBe("openrouter");
    expect(config.apiKey).toBe("");
    expect(config.model).toBe("some/model");
  });

  it("reads numeric settings and trims the CORS origin", () => {
    const config = loadConfig({
      PORT: "9090",
      CORS_ORIGIN: "http://localhost:5173/",
      LLM_TEMPERATURE: "0.2",
      LLM_MAX_OUTPUT_TOKENS: "4096",
      LLM_TIMEOUT_MS: "10",
      ALLOW_DEGRADED_START: "true",
    });
    expect(config.port).toBe(9090);
    expect(config.corsOrigin).toBe("http://localhost:5173");
    expect(config.sampling.temperature).toBe(0.2);
    expect(config.sampling.maxOutputTokens).toBe(4096);
    expect(config.timeoutMs).toBe(1_000);
    expect(config.allowDegradedStart).toBe(true);
  });

  it("rejects unknown templates and providers", () => {
    expect(() => loadConfig({ TEMPLATE_ID: "bogus" })).toThrow(ConfigError);
    expect(() => loadConfig({ LLM_PROVIDER: "someone-else" })).toThrow(ConfigError);
  });

  it("lists each invalid field in the error", () => {
    try {
      loadConfig({ PORT: "not-a-port", CORS_ORIGIN: "nowhere" });
      throw new Error("expected ConfigError");
    } catch (e) {
      expect(e).toBeInstanceOf(ConfigError);
      if (!(e instanceof ConfigError)) return;
      expect(e.issues.map((issue) => issue.split(":")[0])).toEqual(["port", "corsOrigin"]);
    }
  });
});

describe("env helpers", () => {
  it("clamps integers and falls back on garbage", () => {
    expect(parseIntEnv("N", 5, 1, 10, { N: "50" })).toBe(10);
    expect(parseIntEnv("N", 5, 1, 10, { N: "abc" })).toBe(5);
    expect(parseIntEnv("N", 5, 1, 10, {})).toBe(5);
  });

  it("accepts 1 and true as enabled", () => {
    expect(parseBoolEnv("F", { F: "1" })).toBe(true);
    expect(parseBoolEnv("F", { F: "TRUE" })).toBe(true);
    expect(parseBoolEnv("F", { F: "yes" })).toBe(false);
  });
});
