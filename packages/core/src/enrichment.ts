import type { SessionRecord } from "@sessiondex/contracts";
import { asErrorMessage } from "./errors.js";
import { childLogger, type Logger } from "./logger.js";

export interface EnrichmentCandidate {
  providerId: string;
  record: SessionRecord;
}

export interface EnrichmentQueueOptions {
  /** Resolves with the upgraded records, or null when the provider cannot enrich. */
  enrich: (providerId: string, records: readonly SessionRecord[]) => Promise<SessionRecord[] | null>;
  commit: (providerId: string, records: readonly SessionRecord[]) => void;
  batchSize: number;
  concurrency: number;
  logger?: Logger;
}

export interface EnrichmentStats {
  requested: number;
  enriched: number;
  batches: number;
  failedBatches: number;
}

interface EnrichmentBatch {
  providerId: string;
  records: SessionRecord[];
}

function statSignature(record: SessionRecord): string {
  return `${record.filePath}|${record.fileMtimeMs ?? ""}|${record.fileSizeBytes ?? ""}|${record.parseQuality ?? ""}`;
}

/**
 * Background upgrade of cheaply parsed sessions. Candidates are tried once per file stat; batches
 * are grouped by provider, run `concurrency` at a time and committed as each one finishes.
 */
export class EnrichmentQueue {
  private queue: EnrichmentCandidate[] = [];
  private readonly queued = new Set<string>();
  private readonly attempted = new Map<string, string>();
  private running: Promise<void> | null = null;
  private inFlight = 0;
  private epoch = 0;
  private readonly log: Logger;
  private readonly stats: EnrichmentStats = { requested: 0, enriched: 0, batches: 0, failedBatches: 0 };

  constructor(private readonly options: EnrichmentQueueOptions) {
    this.log = options.logger ?? childLogger("enrichment");
  }

  /** Queues candidates not yet tried at their current stat; returns how many were added. */
  request(candidates: readonly EnrichmentCandidate[]): number {
    let added = 0;
    for (const candidate of candidates) {
      const { record } = candidate;
      if (this.queued.has(record.id)) continue;
      if (this.attempted.get(record.id) === statSignature(record)) continue;
      this.queued.add(record.id);
      this.queue.push(candidate);
      added += 1;
    }
    this.stats.requested += added;
    this.start();
    return added;
  }

  pendingCount(): number {
    return this.queue.length + this.inFlight;
  }

  hasPending(): boolean {
    return this.running !== null || this.queue.length > 0;
  }

  getStats(): EnrichmentStats {
    return { ...this.stats };
  }

  async whenIdle(): Promise<void> {
    while (this.running) {
      await this.running;
    }
  }

  /** Drops queued work; batches already running finish without committing. */
  stop(): void {
    this.epoch += 1;
    this.queue = [];
    this.queued.clear();
  }

  private start(): void {
    if (this.running || this.queue.length === 0) return;
    this.running = this.drain().finally(() => {
      this.running = null;
      this.start();
    });
  }

  private async drain(): Promise<void> {
    const { batchSize, concurrency } = this.options;
    while (this.queue.length > 0) {
      const taken = this.queue.splice(0, batchSize * concurrency);
      for (const { record } of taken) this.queued.delete(record.id);

      const byProvider = new Map<string, SessionRecord[]>();
      for (const { providerId, record } of taken) {
        const group = byProvider.get(providerId);
        if (group) group.push(record);
        else byProvider.set(providerId, [record]);
      }
      const batches: EnrichmentBatch[] = [];
      for (const [providerId, records] of byProvider) {
        for (let offset = 0; offset < records.length; offset += batchSize) {
          batches.push({ providerId, records: records.slice(offset, offset + batchSize) });
        }
      }

      for (let offset = 0; offset < batches.length; offset += concurrency) {
        await Promise.all(batches.slice(offset, offset + concurrency).map((batch) => this.runBatch(batch)));
      }
    }
  }

  private async runBatch(batch: EnrichmentBatch): Promise<void> {
    const epoch = this.epoch;
    for (const record of batch.records) this.attempted.set(record.id, statSignature(record));
    this.inFlight += batch.records.length;

    let enriched: SessionRecord[] | null = null;
    try {
      enriched = await this.options.enrich(batch.providerId, batch.records);
    } catch (error) {
      this.stats.failedBatches += 1;
      this.log.warn({ providerId: batch.providerId, size: batch.records.length, err: asErrorMessage(error) }, "enrichment batch failed");
      return;
    } finally {
      this.inFlight -= batch.records.length;
    }

    if (enriched === null || epoch !== this.epoch) return;
    this.stats.batches += 1;
    this.stats.enriched += enriched.length;
    if (enriched.length > 0) this.options.commit(batch.providerId, enriched);
    this.log.debug({ providerId: batch.providerId, requested: batch.records.length, enriched: enriched.length }, "enrichment batch committed");
  }
}
