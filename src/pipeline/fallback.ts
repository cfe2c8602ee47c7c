import type { Capability } from "../config/pipelineConfig";
import { type CallOptions, type ProviderAdapter, type ProviderCompletion, ProviderError } from "../llm/provider";
import type { ProviderRegistry } from "../llm/registry";
import type { Logger } from "../logging/logger";
import type { TraceSink } from "../telemetry/traceSink";
import { DeadlineExceededError, sleep, throwIfAborted } from "./deadline";
import type { PipelineStage } from "./stages";

export type RetryPolicy = {
  attemptsPerProvider: number;
  retryBaseMs: number;
  retryMaxMs: number;
};

export type FallbackDeps = {
  registry: ProviderRegistry;
  trace: TraceSink;
  logger: Logger;
  policy: RetryPolicy;
  random?: () => number;
};

export type FallbackCall = {
  requestId: string;
  stage: PipelineStage;
  capability: Capability;
  invoke: (adapter: ProviderAdapter, options: CallOptions) => Promise<ProviderCompletion>;
  options?: CallOptions;
};

export type FallbackSuccess = {
  adapter: ProviderAdapter;
  completion: ProviderCompletion;
  durationMs: number;
};

const RECOVERABLE = new Set(["PROVIDER_UNAVAILABLE", "PROVIDER_RATE_LIMITED", "PROVIDER_TIMEOUT"]);

export function isRecoverable(err: unknown): err is ProviderError {
  return err instanceof ProviderError && RECOVERABLE.has(err.code);
}

export function retryDelayMs(
  attempt: number,
  err: ProviderError,
  policy: RetryPolicy,
  random: () => number = Math.random,
): number {
  const cap = policy.retryMaxMs;
  const exp = Math.min(cap, policy.retryBaseMs * Math.pow(2, Math.max(0, attempt - 1)));
  const jitter = Math.floor(random() * Math.min(250, exp * 0.2));
  const computed = Math.min(cap, exp + jitter);

  if (err.retryAfterMs != null && Number.isFinite(err.retryAfterMs)) {
    return Math.min(cap, Math.max(computed, err.retryAfterMs));
  }
  return computed;
}

function modelFor(adapter: ProviderAdapter, capability: Capability): string | null {
  return capability === "vision" ? adapter.models.vision : adapter.models.text;
}

/**
 * Runs `call.invoke` against the registry's candidates for the capability in
 * priority order. Unavailable, rate-limited and timed-out providers are retried
 * up to `attemptsPerProvider` times and then left for the next candidate;
 * providers without the capability are skipped. Anything else is a problem
 * with the request itself and is thrown at once.
 */
export async function callWithFallback(deps: FallbackDeps, call: FallbackCall): Promise<FallbackSuccess> {
  const log = deps.logger.child({ component: "fallback", stage: call.stage });
  const options = call.options ?? {};
  const candidates = deps.registry.candidates(call.capability);
  if (candidates.length === 0) {
    throw new ProviderError("CAPABILITY_UNSUPPORTED", `No provider registered with capability: ${call.capability}`);
  }

  let lastError: ProviderError | null = null;

  for (const adapter of candidates) {
    for (let attempt = 1; attempt <= deps.policy.attemptsPerProvider; attempt += 1) {
      throwIfAborted(options.signal);
      const startedAt = Date.now();
      try {
        const completion = await call.invoke(adapter, options);
        const durationMs = Date.now() - startedAt;
        deps.trace.emit({
          schemaVersion: "v0",
          type: "provider_attempt",
          requestId: call.requestId,
          stage: call.stage,
          provider: adapter.id,
          model: completion.model || modelFor(adapter, call.capability),
          durationMs,
          inputTokens: completion.inputTokens,
          outputTokens: completion.outputTokens,
          fromCache: false,
          outcome: "success",
          ts: new Date().toISOString(),
        });
        return { adapter, completion, durationMs };
      } catch (err) {
        deps.trace.emit({
          schemaVersion: "v0",
          type: "provider_attempt",
          requestId: call.requestId,
          stage: call.stage,
          provider: adapter.id,
          model: modelFor(adapter, call.capability),
          durationMs: Date.now() - startedAt,
          inputTokens: 0,
          outputTokens: 0,
          fromCache: false,
          outcome: err instanceof ProviderError ? err.code : "UNEXPECTED_ERROR",
          ts: new Date().toISOString(),
        });

        if (options.signal?.aborted) throw new DeadlineExceededError();
        if (!(err instanceof ProviderError)) throw err;

        lastError = err;
        log.warn(
          { event: "provider_attempt_failed", provider: adapter.id, attempt, code: err.code, err: err.message },
          "provider attempt failed",
        );

        if (err.code === "CAPABILITY_UNSUPPORTED") break;
        if (!isRecoverable(err)) throw err;

        if (attempt < deps.policy.attemptsPerProvider) {
          await sleep(retryDelayMs(attempt, err, deps.policy, deps.random), options.signal);
        }
      }
    }
  }

  throw lastError ?? new ProviderError("PROVIDER_UNAVAILABLE", `All providers failed for ${call.stage}`);
}
