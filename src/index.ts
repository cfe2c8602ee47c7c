export { loadPipelineConfig, ConfigError } from "./config/pipelineConfig";
export type { PipelineConfig, ProviderConfig, Strategy, Capability } from "./config/pipelineConfig";
export { createLogger, silentLogger } from "./logging/logger";
export type { Logger } from "./logging/logger";

export {
  ProviderError,
  createAdapter,
  createGeminiAdapter,
  createOpenAiCompatibleAdapter,
} from "./llm/provider";
export type { ProviderAdapter, ProviderCompletion, CallOptions, ImageInput } from "./llm/provider";
export { ProviderRegistry, createRegistryFromConfig } from "./llm/registry";

export { extractStructured, extractJson, UnparsableModelOutputError } from "./extract/extractStructured";
export { REPAIR_STEPS, repairJsonText } from "./extract/repairSteps";
export { scanJsonObjects } from "./extract/scanJsonObjects";

export { StageCache, createMemoryCacheBackend, CacheBackendError } from "./cache/stageCache";
export type { CacheBackend, StoredStageEntry } from "./cache/stageCache";
export { stageKey, storageKey, fingerprintOf } from "./cache/cacheKey";

export { Orchestrator } from "./pipeline/orchestrator";
export type { PipelineResult, RunOptions } from "./pipeline/orchestrator";
export { createPipelineContext } from "./pipeline/context";
export type { PipelineContext } from "./pipeline/context";
export { PipelineError } from "./pipeline/errors";
export type { PipelineErrorKind } from "./pipeline/errors";
export { callWithFallback } from "./pipeline/fallback";
export type { PipelineRequestInput, PipelineRequestV0 } from "./pipeline/schemas/pipelineRequestV0";
export type { StageKind, StageResult, CacheKey } from "./pipeline/stages";

export { createJsonlFailedOutputStore, createMemoryFailedOutputStore } from "./telemetry/failedOutputStore";
export type { FailedOutputStore } from "./telemetry/failedOutputStore";
export { createLoggerTraceSink, createMemoryTraceSink } from "./telemetry/traceSink";
export type { TraceSink } from "./telemetry/traceSink";
