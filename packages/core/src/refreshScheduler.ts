import type { RefreshConfig, RefreshScope } from "@sessiondex/contracts";
import { scopeKey } from "./calendar.js";
import { KeyedDebouncer } from "./debounce.js";
import { childLogger, type Logger } from "./logger.js";

export const PRIMARY_CHANNEL = "primary";

export type TriggerOutcome = "scheduled" | "coalesced" | "queued_follow_up" | "dropped_executing" | "dropped_cooldown";

export interface RefreshJob {
  key: string;
  scope: RefreshScope;
  force: boolean;
  channel: string;
  generation: number;
}

/** Runs one refresh. `isCurrent` turns false as soon as a newer generation is issued on the job's channel. */
export type RefreshExecutor = (job: RefreshJob, isCurrent: () => boolean) => Promise<void>;

export interface TriggerOptions {
  force?: boolean;
  channel?: string;
}

export interface RefreshSchedulerOptions {
  execute: RefreshExecutor;
  timing: Pick<RefreshConfig, "forceDebounceMs" | "autoDebounceMs" | "completionCooldownMs">;
  now?: () => number;
  logger?: Logger;
}

interface PendingTrigger {
  scope: RefreshScope;
  force: boolean;
  channel: string;
  generation: number;
}

export class RefreshScheduler {
  private generation = 0;
  private readonly latestByChannel = new Map<string, number>();
  private readonly executing = new Map<string, Promise<void>>();
  private readonly followUps = new Map<string, PendingTrigger>();
  private readonly lastCompletedAt = new Map<string, number>();
  private readonly debouncer: KeyedDebouncer<PendingTrigger>;
  private readonly now: () => number;
  private readonly log: Logger;
  private executions = 0;

  constructor(private readonly options: RefreshSchedulerOptions) {
    this.now = options.now ?? Date.now;
    this.log = options.logger ?? childLogger("scheduler");
    this.debouncer = new KeyedDebouncer<PendingTrigger>({
      coalesce: (pending, next) => ({
        scope: next.scope,
        channel: next.channel,
        generation: next.generation,
        force: pending.force || next.force,
      }),
      delayMs: (payload) =>
        payload.force ? this.options.timing.forceDebounceMs : this.options.timing.autoDebounceMs,
      onFire: (key, payload) => this.run(key, payload),
    });
  }

  trigger(scope: RefreshScope, options: TriggerOptions = {}): TriggerOutcome {
    const key = scopeKey(scope);
    const force = options.force ?? false;
    const channel = options.channel ?? PRIMARY_CHANNEL;

    if (this.executing.has(key)) {
      if (!force) {
        this.log.debug({ key }, "refresh already executing, trigger dropped");
        return "dropped_executing";
      }
      const previous = this.followUps.get(key);
      this.followUps.set(key, { scope, force: true, channel, generation: this.issue(channel) });
      return previous ? "coalesced" : "queued_follow_up";
    }

    const debouncing = this.debouncer.has(key);
    if (!force && !debouncing) {
      const completedAt = this.lastCompletedAt.get(key);
      if (completedAt !== undefined && this.now() - completedAt < this.options.timing.completionCooldownMs) {
        this.log.debug({ key }, "refresh inside completion cooldown, trigger dropped");
        return "dropped_cooldown";
      }
    }

    this.debouncer.schedule(key, { scope, force, channel, generation: this.issue(channel) });
    return debouncing ? "coalesced" : "scheduled";
  }

  isCurrent(channel: string, generation: number): boolean {
    return this.latestByChannel.get(channel) === generation;
  }

  currentGeneration(): number {
    return this.generation;
  }

  executionCount(): number {
    return this.executions;
  }

  /** True while any trigger is debouncing, executing or queued as a follow-up. */
  hasPending(): boolean {
    return this.debouncer.size > 0 || this.executing.size > 0 || this.followUps.size > 0;
  }

  /** Resolves once nothing is executing. Debounced triggers that have not fired yet are not awaited. */
  async whenIdle(): Promise<void> {
    while (this.executing.size > 0) {
      await Promise.all(this.executing.values());
    }
  }

  stop(): void {
    this.debouncer.cancelAll();
    this.followUps.clear();
  }

  private issue(channel: string): number {
    this.generation += 1;
    this.latestByChannel.set(channel, this.generation);
    return this.generation;
  }

  private run(key: string, trigger: PendingTrigger): void {
    const job: RefreshJob = { key, ...trigger };
    this.executions += 1;
    const execution = this.execute(job).finally(() => {
      this.executing.delete(key);
      const followUp = this.followUps.get(key);
      if (followUp) {
        this.followUps.delete(key);
        this.debouncer.schedule(key, followUp);
      }
    });
    this.executing.set(key, execution);
  }

  private async execute(job: RefreshJob): Promise<void> {
    const startedAt = this.now();
    try {
      await this.options.execute(job, () => this.isCurrent(job.channel, job.generation));
      this.lastCompletedAt.set(job.key, this.now());
      this.log.debug({ key: job.key, force: job.force, durationMs: this.now() - startedAt }, "refresh completed");
    } catch (error) {
      this.log.error({ key: job.key, err: error }, "refresh failed");
    }
  }
}
