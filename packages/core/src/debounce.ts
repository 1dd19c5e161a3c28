export interface KeyedDebouncerOptions<P> {
  /** Combines a payload already waiting for `key` with a newly scheduled one. */
  coalesce: (pending: P, next: P) => P;
  delayMs: (payload: P) => number;
  onFire: (key: string, payload: P) => void;
}

interface PendingEntry<P> {
  payload: P;
  timer: NodeJS.Timeout;
}

/** Per-key trailing debounce: the timer restarts on every schedule and fires once with the coalesced payload. */
export class KeyedDebouncer<P> {
  private readonly pending = new Map<string, PendingEntry<P>>();

  constructor(private readonly options: KeyedDebouncerOptions<P>) {}

  schedule(key: string, payload: P): P {
    const existing = this.pending.get(key);
    const merged = existing ? this.options.coalesce(existing.payload, payload) : payload;
    if (existing) clearTimeout(existing.timer);
    const delay = Math.max(0, this.options.delayMs(merged));
    const timer = setTimeout(() => {
      const entry = this.pending.get(key);
      if (!entry || entry.timer !== timer) return;
      this.pending.delete(key);
      this.options.onFire(key, entry.payload);
    }, delay);
    this.pending.set(key, { payload: merged, timer });
    return merged;
  }

  has(key: string): boolean {
    return this.pending.has(key);
  }

  get size(): number {
    return this.pending.size;
  }

  cancel(key: string): boolean {
    const entry = this.pending.get(key);
    if (!entry) return false;
    clearTimeout(entry.timer);
    this.pending.delete(key);
    return true;
  }

  cancelAll(): void {
    for (const entry of this.pending.values()) {
      clearTimeout(entry.timer);
    }
    this.pending.clear();
  }
}
