import { z } from "zod";

/**
 * Runtime configuration
 * - Read once from process.env (dotenv is loaded by the entry point).
 * - Components receive the parts they need at construction; nothing else reads process.env.
 */

const optionalKey = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() !== "" ? v.trim() : undefined));

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: z.coerce.number().int().positive().default(8082),
  DATABASE_URL: optionalKey,
  CORS_ORIGINS: z.string().default(""),

  ORACLE_PROVIDER: z.enum(["gemini", "openai", "perplexity"]).default("gemini"),
  GEMINI_API_KEY: optionalKey,
  GEMINI_MODEL: z.string().default("gemini-2.0-flash"),
  OPENAI_API_KEY: optionalKey,
  OPENAI_MODEL: z.string().default("gpt-4o-mini"),
  PERPLEXITY_API_KEY: optionalKey,
  PERPLEXITY_MODEL: z.string().default("sonar-pro"),
  ORACLE_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  ORACLE_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(3).default(2),

  ROUTE_CITY_NAME: z.string().default("Kazan"),
  SEED_POLICY: z.enum(["allow", "reject"]).default("allow"),
  DEFAULT_DURATION_HOURS: z.coerce.number().int().min(1).max(24).default(4),
});

export type OracleProvider = "gemini" | "openai" | "perplexity";
export type SeedPolicy = "allow" | "reject";

export interface OracleConfig {
  provider: OracleProvider;
  apiKey?: string;
  model: string;
  baseURL?: string;
  timeoutMs: number;
  maxAttempts: number;
}

export interface RoutingConfig {
  cityName: string;
  seedPolicy: SeedPolicy;
  defaultDurationHours: number;
  travelMinutesPerKm: number;
}

export interface AppConfig {
  env: "development" | "production" | "test";
  port: number;
  databaseUrl?: string;
  corsOrigins: string[];
  oracle: OracleConfig;
  routing: RoutingConfig;
}

// Perplexity speaks the chat completions protocol
const PERPLEXITY_BASE_URL = "https://api.perplexity.ai";

export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid environment configuration: ${issues}`);
  }
  const env = parsed.data;

  const oracle = ((): OracleConfig => {
    const common = { timeoutMs: env.ORACLE_TIMEOUT_MS, maxAttempts: env.ORACLE_MAX_ATTEMPTS };
    switch (env.ORACLE_PROVIDER) {
      case "openai":
        return { provider: "openai", apiKey: env.OPENAI_API_KEY, model: env.OPENAI_MODEL, ...common };
      case "perplexity":
        return {
          provider: "perplexity",
          apiKey: env.PERPLEXITY_API_KEY,
          model: env.PERPLEXITY_MODEL,
          baseURL: PERPLEXITY_BASE_URL,
          ...common,
        };
      case "gemini":
        return { provider: "gemini", apiKey: env.GEMINI_API_KEY, model: env.GEMINI_MODEL, ...common };
    }
  })();

  return {
    env: env.NODE_ENV,
    port: env.PORT,
    databaseUrl: env.DATABASE_URL,
    corsOrigins: env.CORS_ORIGINS.split(",").map((o) => o.trim()).filter(Boolean),
    oracle,
    routing: {
      cityName: env.ROUTE_CITY_NAME,
      seedPolicy: env.SEED_POLICY,
      defaultDurationHours: env.DEFAULT_DURATION_HOURS,
      travelMinutesPerKm: 2,
    },
  };
}
