import { KeyedDebouncer } from "../debounce.js";
import { childLogger, type Logger } from "../logger.js";
import { computeFilterResult, type FilterComputation } from "./compute.js";
import type { FilterSnapshot } from "./snapshot.js";

/** Runs `task(input)` away from the caller's turn and resolves with its return value. */
export type ComputeExecutor = <I, O>(task: (input: I) => O, input: I) => Promise<O>;

export const deferredExecutor: ComputeExecutor = (task, input) =>
  new Promise((resolve, reject) => {
    setImmediate(() => {
      try {
        resolve(task(input));
      } catch (error) {
        reject(error);
      }
    });
  });

export interface FilterEngineOptions {
  buildSnapshot: (generation: number) => FilterSnapshot;
  publish: (result: FilterComputation) => void;
  mergeResolvedPaths?: (entries: ReadonlyArray<[string, string]>) => void;
  debounceMs: number;
  executor?: ComputeExecutor;
  logger?: Logger;
}

export interface FilterEngineStats {
  runs: number;
  published: number;
  discardedStale: number;
  unchanged: number;
}

const APPLY_KEY = "filters";

/**
 * Schedules filter computations. Each `apply` issues a generation and a snapshot; at most one
 * computation is in flight and later requests collapse into a single follow-up. A result is only
 * published when its generation is still the latest and its digest differs from the last publish.
 */
export class FilterEngine {
  private generation = 0;
  private running: Promise<void> | null = null;
  private queued: FilterSnapshot | null = null;
  private lastDigest: string | null = null;
  private readonly executor: ComputeExecutor;
  private readonly log: Logger;
  private readonly debouncer: KeyedDebouncer<null>;
  private readonly stats: FilterEngineStats = { runs: 0, published: 0, discardedStale: 0, unchanged: 0 };

  constructor(private readonly options: FilterEngineOptions) {
    this.executor = options.executor ?? deferredExecutor;
    this.log = options.logger ?? childLogger("filter");
    this.debouncer = new KeyedDebouncer<null>({
      coalesce: () => null,
      delayMs: () => this.options.debounceMs,
      onFire: () => {
        this.apply();
      },
    });
  }

  /** Debounced `apply`. */
  schedule(): void {
    this.debouncer.schedule(APPLY_KEY, null);
  }

  apply(): number {
    this.debouncer.cancel(APPLY_KEY);
    this.generation += 1;
    const snapshot = this.options.buildSnapshot(this.generation);
    if (this.running) {
      this.queued = snapshot;
      return this.generation;
    }
    this.running = this.drain(snapshot);
    return this.generation;
  }

  /** Runs a pending debounced apply right away. */
  flush(): void {
    if (this.debouncer.has(APPLY_KEY)) this.apply();
  }

  hasPending(): boolean {
    return this.debouncer.has(APPLY_KEY) || this.running !== null;
  }

  currentGeneration(): number {
    return this.generation;
  }

  getStats(): FilterEngineStats {
    return { ...this.stats };
  }

  async whenIdle(): Promise<void> {
    while (this.running) {
      await this.running;
    }
  }

  stop(): void {
    this.debouncer.cancelAll();
    this.queued = null;
  }

  private async drain(first: FilterSnapshot): Promise<void> {
    let next: FilterSnapshot | null = first;
    try {
      while (next) {
        const snapshot: FilterSnapshot = next;
        next = null;
        await this.runOne(snapshot);
        next = this.queued;
        this.queued = null;
      }
    } finally {
      this.running = null;
    }
  }

  private async runOne(snapshot: FilterSnapshot): Promise<void> {
    let result: FilterComputation;
    try {
      result = await this.executor(computeFilterResult, snapshot);
    } catch (error) {
      this.log.error({ err: error, generation: snapshot.generation }, "filter computation failed");
      return;
    }
    this.stats.runs += 1;

    if (result.generation !== this.generation) {
      this.stats.discardedStale += 1;
      this.log.debug({ generation: result.generation, current: this.generation }, "stale filter result discarded");
      return;
    }
    if (result.resolvedPaths.length > 0) {
      this.options.mergeResolvedPaths?.(result.resolvedPaths);
    }
    if (result.digest === this.lastDigest) {
      this.stats.unchanged += 1;
      return;
    }
    this.lastDigest = result.digest;
    this.stats.published += 1;
    this.options.publish(result);
  }
}
