import type { LoadContext, ProviderLoadResult, SessionRecord, SubsetQuery } from "@sessiondex/contracts";
import { CacheCorruptionError, ProviderUnavailableError, asErrorMessage } from "./errors.js";
import { childLogger, type Logger } from "./logger.js";
import type { SessionProvider } from "./providers/types.js";

export type ProviderSkipReason = "unavailable" | "cache_unavailable";

export interface ProviderOutcome {
  provider: SessionProvider;
  result: ProviderLoadResult | null;
  error: Error | null;
  skipped: ProviderSkipReason | null;
}

export interface ProviderHealth {
  providerId: string;
  unavailableUntilMs: number | null;
  cacheUnavailableUntilMs: number | null;
  lastError: string | null;
}

export interface ProviderPoolOptions {
  cooldownMs: number;
  now?: () => number;
  logger?: Logger;
}

interface HealthState {
  unavailableUntilMs: number;
  cacheUnavailableUntilMs: number;
  lastError: string | null;
}

/** Calls providers with failure isolation and per-provider cooldowns. No call ever rejects. */
export class ProviderPool {
  private readonly health = new Map<string, HealthState>();
  private readonly now: () => number;
  private readonly log: Logger;

  constructor(
    private readonly providers: readonly SessionProvider[],
    private readonly options: ProviderPoolOptions,
  ) {
    this.now = options.now ?? Date.now;
    this.log = options.logger ?? childLogger("provider");
  }

  list(): readonly SessionProvider[] {
    return this.providers;
  }

  get(providerId: string): SessionProvider | undefined {
    return this.providers.find((provider) => provider.id === providerId);
  }

  async load(provider: SessionProvider, context: LoadContext): Promise<ProviderOutcome> {
    const state = this.stateFor(provider.id);
    const now = this.now();
    if (state.unavailableUntilMs > now) {
      return { provider, result: null, error: null, skipped: "unavailable" };
    }
    if (context.cachePolicy === "cacheOnly" && state.cacheUnavailableUntilMs > now) {
      return { provider, result: null, error: null, skipped: "cache_unavailable" };
    }

    try {
      const result = await provider.load(context);
      if (context.cachePolicy === "refresh") {
        state.lastError = null;
      }
      return { provider, result, error: null, skipped: null };
    } catch (error) {
      const normalized = error instanceof Error ? error : new Error(String(error));
      this.recordFailure(provider, normalized, context.cachePolicy === "cacheOnly");
      return { provider, result: null, error: normalized, skipped: null };
    }
  }

  async loadSubset(provider: SessionProvider, query: SubsetQuery): Promise<SessionRecord[] | null> {
    if (!provider.loadSubset) return null;
    if (this.stateFor(provider.id).unavailableUntilMs > this.now()) return [];
    try {
      return await provider.loadSubset(query);
    } catch (error) {
      const normalized = error instanceof Error ? error : new Error(String(error));
      this.recordFailure(provider, normalized, false);
      return [];
    }
  }

  async enrich(provider: SessionProvider, records: readonly SessionRecord[]): Promise<SessionRecord[] | null> {
    if (!provider.enrich) return null;
    if (this.stateFor(provider.id).unavailableUntilMs > this.now()) return [];
    try {
      return await provider.enrich(records);
    } catch (error) {
      const normalized = error instanceof Error ? error : new Error(String(error));
      this.recordFailure(provider, normalized, false);
      return [];
    }
  }

  healthSnapshot(): ProviderHealth[] {
    const now = this.now();
    return this.providers.map((provider) => {
      const state = this.stateFor(provider.id);
      return {
        providerId: provider.id,
        unavailableUntilMs: state.unavailableUntilMs > now ? state.unavailableUntilMs : null,
        cacheUnavailableUntilMs: state.cacheUnavailableUntilMs > now ? state.cacheUnavailableUntilMs : null,
        lastError: state.lastError,
      };
    });
  }

  private recordFailure(provider: SessionProvider, error: Error, cacheOnlyPass: boolean): void {
    const state = this.stateFor(provider.id);
    const until = this.now() + this.options.cooldownMs;
    state.lastError = asErrorMessage(error);
    if (error instanceof ProviderUnavailableError) {
      state.unavailableUntilMs = until;
    } else if (error instanceof CacheCorruptionError || cacheOnlyPass) {
      state.cacheUnavailableUntilMs = until;
    }
    this.log.warn({ providerId: provider.id, err: error, cacheOnlyPass }, "provider load failed");
  }

  private stateFor(providerId: string): HealthState {
    let state = this.health.get(providerId);
    if (!state) {
      state = { unavailableUntilMs: 0, cacheUnavailableUntilMs: 0, lastError: null };
      this.health.set(providerId, state);
    }
    return state;
  }
}
