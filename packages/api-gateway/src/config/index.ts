import { z } from "zod";
import { DEFAULT_RETRY_POLICY } from "@conduit/llm-orchestrator";
import type { RetryPolicy } from "@conduit/llm-orchestrator";

type Env = Record<string, string | undefined>;

function optionalEnv(env: Env, key: string, defaultValue = ""): string {
  return env[key] ?? defaultValue;
}

function parseEnv<T>(env: Env, key: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, defaultValue: string): T {
  const raw = optionalEnv(env, key, defaultValue);
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid environment variable ${key}=${JSON.stringify(raw)}: ${parsed.error.issues[0]?.message ?? "invalid"}`);
  }
  return parsed.data;
}

/** Unset or empty means "not configured" */
function parseOptionalEnv<T>(env: Env, key: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T | undefined {
  const raw = env[key];
  if (raw === undefined || raw === "") return undefined;
  return parseEnv(env, key, schema, raw);
}

const positiveInt = z.coerce.number().int().positive();
const nonNegativeInt = z.coerce.number().int().nonnegative();
const positiveNumber = z.coerce.number().positive();
const nonNegativeNumber = z.coerce.number().nonnegative();

const EnvName = z.enum(["development", "test", "staging", "production"]);
const LogLevel = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

export interface Config {
  readonly env: z.infer<typeof EnvName>;
  readonly port: number;
  readonly host: string;
  readonly logLevel: z.infer<typeof LogLevel>;

  // Optional persistence (response cache and ingress throttling use Redis when set)
  readonly redisUrl: string;

  // Response cache (in-memory backend)
  readonly cacheMaxEntries: number;
  readonly cacheSweepIntervalMs: number;

  // Provider token buckets
  readonly rateLimitCapacity: number;
  readonly rateLimitRefillPerSec: number;
  readonly rateLimitAdmissionTimeoutMs: number;

  // Per-scope budgets; unlimited / never reset when unset
  readonly budgetLimit: number | undefined;
  readonly budgetPeriodMs: number | undefined;

  readonly requestTimeoutMs: number;
  readonly retry: RetryPolicy;

  // Provider keys; a provider is enabled when its key is set
  readonly openaiApiKey: string;
  readonly perplexityApiKey: string;
  readonly groqApiKey: string;
  readonly defaultProvider: string;

  // HTTP ingress throttling
  readonly rateLimitMax: number;
  readonly rateLimitWindowMs: number;
}

export function loadConfig(env: Env = process.env): Config {
  return {
    env: parseEnv(env, "NODE_ENV", EnvName, "development"),
    port: parseEnv(env, "PORT", nonNegativeInt, "3001"),
    host: optionalEnv(env, "HOST", "0.0.0.0"),
    logLevel: parseEnv(env, "LOG_LEVEL", LogLevel, "info"),

    redisUrl: optionalEnv(env, "REDIS_URL", ""),   // optional, in-memory fallback

    cacheMaxEntries: parseEnv(env, "CACHE_MAX_ENTRIES", positiveInt, "10000"),
    cacheSweepIntervalMs: parseEnv(env, "CACHE_SWEEP_INTERVAL_MS", positiveInt, "60000"),

    rateLimitCapacity: parseEnv(env, "RATE_LIMIT_CAPACITY", positiveNumber, "60"),
    rateLimitRefillPerSec: parseEnv(env, "RATE_LIMIT_REFILL_PER_SEC", positiveNumber, "1"),
    rateLimitAdmissionTimeoutMs: parseEnv(env, "RATE_LIMIT_ADMISSION_TIMEOUT_MS", positiveInt, "30000"),

    budgetLimit: parseOptionalEnv(env, "BUDGET_LIMIT", nonNegativeNumber),
    budgetPeriodMs: parseOptionalEnv(env, "BUDGET_PERIOD_MS", positiveInt),

    requestTimeoutMs: parseEnv(env, "REQUEST_TIMEOUT_MS", positiveInt, "120000"),
    retry: {
      maxAttempts: parseEnv(env, "RETRY_MAX_ATTEMPTS", positiveInt, String(DEFAULT_RETRY_POLICY.maxAttempts)),
      baseDelayMs: parseEnv(env, "RETRY_BASE_DELAY_MS", nonNegativeInt, String(DEFAULT_RETRY_POLICY.baseDelayMs)),
      maxDelayMs: parseEnv(env, "RETRY_MAX_DELAY_MS", nonNegativeInt, String(DEFAULT_RETRY_POLICY.maxDelayMs)),
      jitterRatio: parseEnv(env, "RETRY_JITTER_RATIO", z.coerce.number().min(0).max(1), String(DEFAULT_RETRY_POLICY.jitterRatio)),
      maxRepairAttempts: parseEnv(env, "RETRY_MAX_REPAIR_ATTEMPTS", nonNegativeInt, String(DEFAULT_RETRY_POLICY.maxRepairAttempts)),
    },

    openaiApiKey: optionalEnv(env, "OPENAI_API_KEY"),
    perplexityApiKey: optionalEnv(env, "PERPLEXITY_API_KEY"),
    groqApiKey: optionalEnv(env, "GROQ_API_KEY"),
    defaultProvider: optionalEnv(env, "DEFAULT_PROVIDER"),

    rateLimitMax: parseEnv(env, "RATE_LIMIT_MAX", positiveInt, "100"),
    rateLimitWindowMs: parseEnv(env, "RATE_LIMIT_WINDOW_MS", positiveInt, "60000"),
  };
}
