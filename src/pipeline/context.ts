import { type CacheBackend, StageCache } from "../cache/stageCache";
import { loadPipelineConfig, type PipelineConfig } from "../config/pipelineConfig";
import { createRegistryFromConfig, type ProviderRegistry } from "../llm/registry";
import { createLogger, type Logger } from "../logging/logger";
import { createJsonlFailedOutputStore, type FailedOutputStore } from "../telemetry/failedOutputStore";
import { createLoggerTraceSink, type TraceSink } from "../telemetry/traceSink";
import { createPromptLoader, type PromptLoader } from "./prompts";

/**
 * Everything the orchestrator shares between requests. One per process;
 * the stage cache inside it is the only mutable state.
 */
export type PipelineContext = {
  config: PipelineConfig;
  logger: Logger;
  registry: ProviderRegistry;
  cache: StageCache;
  trace: TraceSink;
  failedOutputs: FailedOutputStore;
  prompts: PromptLoader;
  random?: () => number;
};

export type PipelineContextOverrides = Partial<Omit<PipelineContext, "config" | "cache">> & {
  config?: PipelineConfig;
  cacheBackend?: CacheBackend;
  now?: () => number;
};

export function createPipelineContext(overrides: PipelineContextOverrides = {}): PipelineContext {
  const config = overrides.config ?? loadPipelineConfig();
  const logger = overrides.logger ?? createLogger({ level: config.logLevel });
  return {
    config,
    logger,
    registry: overrides.registry ?? createRegistryFromConfig(config.providers),
    cache: new StageCache({
      ttlMs: config.cacheTtlMs,
      logger,
      backend: overrides.cacheBackend,
      now: overrides.now,
    }),
    trace: overrides.trace ?? createLoggerTraceSink(logger),
    failedOutputs: overrides.failedOutputs ?? createJsonlFailedOutputStore(config.failedOutputDir),
    prompts: overrides.prompts ?? createPromptLoader(),
    random: overrides.random,
  };
}
