import { z } from "zod";

export const CapabilitySchema = z.enum(["text", "vision"]);
export type Capability = z.infer<typeof CapabilitySchema>;

export const StrategySchema = z.enum(["traditional", "merged"]);
export type Strategy = z.infer<typeof StrategySchema>;

export const ProviderKindSchema = z.enum(["openai", "gemini"]);
export type ProviderKind = z.infer<typeof ProviderKindSchema>;

export const ProviderConfigSchema = z
  .object({
    id: z.string().min(1),
    kind: ProviderKindSchema,
    baseUrl: z.string().url(),
    apiKey: z.string().min(1),
    textModel: z.string().min(1),
    visionModel: z.string().min(1).nullable(),
    priority: z.number().int(),
    timeoutMs: z.number().int().positive(),
    pricing: z
      .object({
        inputPer1k: z.number().nonnegative(),
        outputPer1k: z.number().nonnegative(),
      })
      .strict(),
  })
  .strict();

export type ProviderConfig = z.infer<typeof ProviderConfigSchema>;

export const PipelineConfigSchema = z
  .object({
    strategy: StrategySchema,
    cacheTtlMs: z.number().int().positive(),
    maxConcurrency: z.number().int().min(1).max(64),
    deadlineMs: z.number().int().positive(),
    attemptsPerProvider: z.number().int().min(1).max(5),
    retryBaseMs: z.number().int().nonnegative(),
    retryMaxMs: z.number().int().nonnegative(),
    failedOutputDir: z.string().min(1),
    logLevel: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]),
    providers: z.array(ProviderConfigSchema),
  })
  .strict();

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;

export class ConfigError extends Error {
  public readonly code: "PROVIDER_CONFIG_MISSING" | "CONFIG_INVALID";

  public readonly cause?: unknown;

  constructor(code: ConfigError["code"], message: string, cause?: unknown) {
    super(message);
    this.name = "ConfigError";
    this.code = code;
    this.cause = cause;
  }
}

type Env = Record<string, string | undefined>;

function getEnv(env: Env, name: string): string | undefined {
  const v = env[name];
  return v && String(v).trim() ? String(v).trim() : undefined;
}

function numberEnv(env: Env, name: string, fallback: number): number {
  const raw = getEnv(env, name);
  if (raw === undefined) return fallback;
  const n = Number(raw);
  return Number.isFinite(n) ? n : fallback;
}

function intEnv(env: Env, name: string, fallback: number): number {
  return Math.floor(numberEnv(env, name, fallback));
}

const DEFAULT_BASE_URLS: Record<ProviderKind, string> = {
  openai: "https://api.openai.com",
  gemini: "https://generativelanguage.googleapis.com",
};

function providerFromEnv(env: Env, id: string, position: number, timeoutMs: number): ProviderConfig {
  const prefix = id.toUpperCase().replace(/[^A-Z0-9]+/g, "_");
  const kindRaw = getEnv(env, `${prefix}_KIND`) || (id === "gemini" ? "gemini" : "openai");
  const kind = ProviderKindSchema.safeParse(kindRaw.toLowerCase());
  if (!kind.success) {
    throw new ConfigError("CONFIG_INVALID", `Unsupported provider kind for ${id}: ${kindRaw}`);
  }

  const apiKey = getEnv(env, `${prefix}_API_KEY`);
  if (!apiKey) {
    throw new ConfigError("PROVIDER_CONFIG_MISSING", `Missing required env var: ${prefix}_API_KEY`);
  }

  const textModel =
    getEnv(env, `${prefix}_TEXT_MODEL`) || (kind.data === "gemini" ? "gemini-1.5-flash" : "gpt-4o-mini");

  return {
    id,
    kind: kind.data,
    baseUrl: getEnv(env, `${prefix}_BASE_URL`) || DEFAULT_BASE_URLS[kind.data],
    apiKey,
    textModel,
    visionModel: getEnv(env, `${prefix}_VISION_MODEL`) ?? null,
    priority: intEnv(env, `${prefix}_PRIORITY`, position),
    timeoutMs,
    pricing: {
      inputPer1k: numberEnv(env, `${prefix}_INPUT_COST_PER_1K`, 0),
      outputPer1k: numberEnv(env, `${prefix}_OUTPUT_COST_PER_1K`, 0),
    },
  };
}

export function loadPipelineConfig(env: Env = process.env): PipelineConfig {
  const timeoutMs = intEnv(env, "LLM_TIMEOUT_MS", 20_000);
  const providerIds = String(getEnv(env, "PIPELINE_PROVIDERS") || "")
    .split(",")
    .map((s) => s.trim().toLowerCase())
    .filter(Boolean);

  const seen = new Set<string>();
  const providers: ProviderConfig[] = [];
  providerIds.forEach((id, position) => {
    if (seen.has(id)) return;
    seen.add(id);
    providers.push(providerFromEnv(env, id, position, timeoutMs));
  });

  const parsed = PipelineConfigSchema.safeParse({
    strategy: (getEnv(env, "PIPELINE_STRATEGY") || "traditional").toLowerCase(),
    cacheTtlMs: intEnv(env, "PIPELINE_CACHE_TTL_MS", 30 * 60_000),
    maxConcurrency: intEnv(env, "PIPELINE_MAX_CONCURRENCY", 4),
    deadlineMs: intEnv(env, "PIPELINE_DEADLINE_MS", 60_000),
    attemptsPerProvider: intEnv(env, "LLM_ATTEMPTS_PER_PROVIDER", 1),
    retryBaseMs: intEnv(env, "LLM_RETRY_BASE_MS", 750),
    retryMaxMs: intEnv(env, "LLM_RETRY_MAX_MS", 10_000),
    failedOutputDir: getEnv(env, "PIPELINE_FAILED_OUTPUT_DIR") || "failed_json_replies",
    logLevel: (getEnv(env, "LOG_LEVEL") || "info").toLowerCase(),
    providers,
  });

  if (!parsed.success) {
    const first = parsed.error.issues[0];
    const where = first ? `${first.path.join(".")}: ${first.message}` : "unknown";
    throw new ConfigError("CONFIG_INVALID", `Invalid pipeline configuration (${where})`, parsed.error);
  }
  return parsed.data;
}
