import { describe, expect, it } from "vitest";
import { loadConfig } from "./env";

describe("loadConfig", () => {
  it("applies defaults to an empty environment", () => {
    const config = loadConfig({});

    expect(config).toEqual({
      env: "development",
      port: 8082,
      databaseUrl: undefined,
      corsOrigins: [],
      oracle: {
        provider: "gemini",
        apiKey: undefined,
        model: "gemini-2.0-flash",
        timeoutMs: 30000,
        maxAttempts: 2,
      },
      routing: {
        cityName: "Kazan",
        seedPolicy: "allow",
        defaultDurationHours: 4,
        travelMinutesPerKm: 2,
      },
    });
  });

  it("routes perplexity through the chat completions base URL", () => {
    const config = loadConfig({ ORACLE_PROVIDER: "perplexity", PERPLEXITY_API_KEY: " test-secret " });
    expect(config.oracle).toMatchObject({
      provider: "perplexity",
      apiKey: "test-secret",
      model: "sonar-pro",
      baseURL: "https://api.perplexity.ai",
    });
  });

  it("treats blank keys as missing", () => {
    expect(loadConfig({ ORACLE_PROVIDER: "openai", OPENAI_API_KEY: "   " }).oracle.apiKey).toBeUndefined();
  });

  it("splits CORS origins and reads numbers", () => {
    const config = loadConfig({
      CORS_ORIGINS: "http://localhost:8081, https://example.com,",
      PORT: "3000",
      SEED_POLICY: "reject",
      DEFAULT_DURATION_HOURS: "6",
    });
    expect(config.corsOrigins).toEqual(["http://localhost:8081", "https://example.com"]);
    expect(config.port).toBe(3000);
    expect(config.routing).toMatchObject({ seedPolicy: "reject", defaultDurationHours: 6 });
  });

  it("rejects invalid values", () => {
    expect(() => loadConfig({ ORACLE_MAX_ATTEMPTS: "5" })).toThrow(/ORACLE_MAX_ATTEMPTS/);
    expect(() => loadConfig({ SEED_POLICY: "sometimes" })).toThrow(/Invalid environment configuration/);
  });
});
