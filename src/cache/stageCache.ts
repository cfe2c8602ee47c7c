import type { Logger } from "../logging/logger";
import { errorMessage } from "../logging/logger";
import { DeadlineExceededError, raceWithSignal, throwIfAborted } from "../pipeline/deadline";
import {
  type CacheKey,
  type StageKind,
  type StageResult,
  safeParseStagePayload,
} from "../pipeline/stages";
import { storageKey } from "./cacheKey";

export type StoredStageResult = Omit<StageResult<StageKind>, "kind" | "payload"> & {
  kind: StageKind;
  payload: unknown;
};

export type StoredStageEntry = {
  result: StoredStageResult;
  expiresAt: number;
};

/** Storage behind the stage cache; may live outside the process. */
export interface CacheBackend {
  get(key: string): Promise<StoredStageEntry | undefined>;
  set(key: string, entry: StoredStageEntry): Promise<void>;
  delete(key: string): Promise<void>;
}

export class CacheBackendError extends Error {
  public readonly code = "CACHE_BACKEND_ERROR" as const;

  public readonly cause?: unknown;

  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = "CacheBackendError";
    this.cause = cause;
  }
}

export type MemoryCacheBackend = CacheBackend & { readonly entries: Map<string, StoredStageEntry> };

export function createMemoryCacheBackend(): MemoryCacheBackend {
  const entries = new Map<string, StoredStageEntry>();
  return {
    entries,
    async get(key) {
      return entries.get(key);
    },
    async set(key, entry) {
      entries.set(key, entry);
    },
    async delete(key) {
      entries.delete(key);
    },
  };
}

export type StageCacheStats = {
  hits: number;
  misses: number;
  computations: number;
  backendErrors: number;
};

export type StageCacheOptions = {
  ttlMs: number;
  logger: Logger;
  backend?: CacheBackend;
  now?: () => number;
};

type WaitOptions = { signal?: AbortSignal };

/** A computation that yields two stage results at once, and each of them on its own. */
export type PairComputation<A extends StageKind, B extends StageKind> = {
  both: () => Promise<[StageResult<A>, StageResult<B>]>;
  first: () => Promise<StageResult<A>>;
  second: () => Promise<StageResult<B>>;
};

// The owner's own deadline ran out, possibly wrapped by the caller's error type.
function isAbandonedFlight(err: unknown): boolean {
  if (err instanceof DeadlineExceededError) return true;
  return err instanceof Error && "cause" in err && err.cause instanceof DeadlineExceededError;
}

/**
 * Stage results keyed by (kind, fingerprint) with a TTL and at most one
 * computation in flight per key. Entries are never rewritten while live.
 */
export class StageCache {
  private readonly backend: CacheBackend;

  private readonly ttlMs: number;

  private readonly log: Logger;

  private readonly now: () => number;

  private readonly inflight = new Map<string, Promise<StoredStageResult>>();

  readonly stats: StageCacheStats = { hits: 0, misses: 0, computations: 0, backendErrors: 0 };

  constructor(opts: StageCacheOptions) {
    this.backend = opts.backend ?? createMemoryCacheBackend();
    this.ttlMs = opts.ttlMs;
    this.log = opts.logger.child({ component: "stage_cache" });
    this.now = opts.now ?? Date.now;
  }

  private backendFailed(op: string, key: string, err: unknown): void {
    this.stats.backendErrors += 1;
    const wrapped = new CacheBackendError(`Cache backend ${op} failed for ${key}: ${errorMessage(err)}`, err);
    this.log.warn({ event: "stage_cache_backend_error", op, key, err: wrapped }, "cache backend error, treating as miss");
  }

  private revive<K extends StageKind>(key: CacheKey<K>, stored: StoredStageResult): StageResult<K> | undefined {
    if (stored.kind !== key.kind) return undefined;
    const payload = safeParseStagePayload(key.kind, stored.payload);
    if (payload === undefined) return undefined;
    return {
      kind: key.kind,
      payload,
      provider: stored.provider,
      model: stored.model,
      inputTokens: stored.inputTokens,
      outputTokens: stored.outputTokens,
      durationMs: stored.durationMs,
      costUsd: stored.costUsd,
      fromCache: stored.fromCache,
      createdAt: stored.createdAt,
    };
  }

  private reviveOrThrow<K extends StageKind>(key: CacheKey<K>, stored: StoredStageResult): StageResult<K> {
    const result = this.revive(key, stored);
    if (!result) throw new Error(`Shared computation for ${storageKey(key)} produced a ${stored.kind} result`);
    return result;
  }

  async get<K extends StageKind>(key: CacheKey<K>): Promise<StageResult<K> | undefined> {
    const sk = storageKey(key);
    let entry: StoredStageEntry | undefined;
    try {
      entry = await this.backend.get(sk);
    } catch (err) {
      this.backendFailed("get", sk, err);
      return undefined;
    }
    if (!entry) return undefined;

    if (entry.expiresAt <= this.now()) {
      await this.deleteQuietly(sk);
      return undefined;
    }

    const result = this.revive(key, entry.result);
    if (!result) {
      this.log.warn({ event: "stage_cache_invalid_entry", key: sk }, "cached entry failed validation, ignoring");
    }
    return result;
  }

  /** Stores `result` unless a live entry already exists. Returns whether it was written. */
  async put<K extends StageKind>(key: CacheKey<K>, result: StageResult<K>, ttlMs: number = this.ttlMs): Promise<boolean> {
    if (result.kind !== key.kind) {
      throw new Error(`Cannot store a ${result.kind} result under a ${key.kind} key`);
    }
    const sk = storageKey(key);
    if (await this.get(key)) return false;
    try {
      await this.backend.set(sk, { result: structuredClone(result), expiresAt: this.now() + ttlMs });
      return true;
    } catch (err) {
      this.backendFailed("set", sk, err);
      return false;
    }
  }

  async invalidate(key: CacheKey<StageKind>): Promise<void> {
    await this.deleteQuietly(storageKey(key));
  }

  private async deleteQuietly(sk: string): Promise<void> {
    try {
      await this.backend.delete(sk);
    } catch (err) {
      this.backendFailed("delete", sk, err);
    }
  }

  // A live entry that got there first is the answer, not the fresh result.
  private async settle<K extends StageKind>(key: CacheKey<K>, result: StageResult<K>): Promise<StageResult<K>> {
    if (await this.put(key, result)) return result;
    const stored = await this.get(key);
    return stored ? { ...stored, fromCache: true } : result;
  }

  private track(sk: string, flight: Promise<StoredStageResult>): void {
    this.inflight.set(sk, flight);
    const release = () => {
      if (this.inflight.get(sk) === flight) this.inflight.delete(sk);
    };
    flight.then(release, release);
  }

  /**
   * Returns the cached result for `key` or computes it. Concurrent callers for
   * the same key share one computation; results they did not compute come
   * back with `fromCache: true`. A caller whose signal aborts stops waiting
   * but the computation continues and is stored.
   */
  async getOrCompute<K extends StageKind>(
    key: CacheKey<K>,
    compute: () => Promise<StageResult<K>>,
    opts: WaitOptions = {},
  ): Promise<StageResult<K>> {
    const sk = storageKey(key);
    let takeovers = 0;

    for (;;) {
      throwIfAborted(opts.signal);

      let flight = this.inflight.get(sk);
      if (!flight) {
        const cached = await this.get(key);
        if (cached) {
          this.stats.hits += 1;
          return { ...cached, fromCache: true };
        }
        flight = this.inflight.get(sk);
      }

      if (flight) {
        try {
          const shared = await raceWithSignal(flight, opts.signal);
          this.stats.hits += 1;
          return { ...this.reviveOrThrow(key, shared), fromCache: true };
        } catch (err) {
          throwIfAborted(opts.signal);
          // The owner gave up on its deadline; someone still waiting takes over once.
          if (isAbandonedFlight(err) && takeovers < 1) {
            takeovers += 1;
            continue;
          }
          throw err;
        }
      }

      this.stats.misses += 1;
      this.stats.computations += 1;
      const own = (async () => this.settle(key, await compute()))();
      this.track(sk, own.then((result) => structuredClone(result)));
      return raceWithSignal(own, opts.signal);
    }
  }

  /**
   * Two stage results produced by one computation. Nothing runs when both
   * are cached or in flight. When only one of them is, the other is computed
   * on its own; otherwise `both` runs once and stores both.
   */
  async getOrComputePair<A extends StageKind, B extends StageKind>(
    keys: [CacheKey<A>, CacheKey<B>],
    computation: PairComputation<A, B>,
    opts: WaitOptions = {},
  ): Promise<[StageResult<A>, StageResult<B>]> {
    throwIfAborted(opts.signal);
    const [ka, kb] = keys;
    const [ska, skb] = [storageKey(ka), storageKey(kb)];
    const [ca, cb] = await Promise.all([this.get(ka), this.get(kb)]);

    if (ca && cb) {
      this.stats.hits += 2;
      return [{ ...ca, fromCache: true }, { ...cb, fromCache: true }];
    }

    const claimedA = ca !== undefined || this.inflight.has(ska);
    const claimedB = cb !== undefined || this.inflight.has(skb);
    if (claimedA || claimedB) {
      return Promise.all([
        this.getOrCompute(ka, computation.first, opts),
        this.getOrCompute(kb, computation.second, opts),
      ]);
    }

    this.stats.misses += 2;
    this.stats.computations += 1;
    const group = (async (): Promise<[StageResult<A>, StageResult<B>]> => {
      const [ra, rb] = await computation.both();
      return Promise.all([this.settle(ka, ra), this.settle(kb, rb)]);
    })();
    this.track(ska, group.then(([ra]) => structuredClone(ra)));
    this.track(skb, group.then(([, rb]) => structuredClone(rb)));

    return raceWithSignal(group, opts.signal);
  }
}
