import type { LoadContext, ProviderLoadResult, SessionRecord, SessionSource, SubsetQuery } from "@sessiondex/contracts";

/**
 * Enumerates and summarizes sessions for one agent kind and one locality.
 * `load` may run concurrently with itself for different contexts and must treat the context as read-only.
 * With `cachePolicy: "cacheOnly"` it answers from already materialized data only.
 */
export interface SessionProvider {
  readonly id: string;
  readonly label: string;
  readonly source: SessionSource;
  readonly roots: readonly string[];
  load(context: LoadContext): Promise<ProviderLoadResult>;
  /** Narrow query used by incremental hints. */
  loadSubset?(query: SubsetQuery): Promise<SessionRecord[]>;
  /**
   * Re-reads sessions at the `enriched` level. Sessions the provider does not own, or whose file
   * can no longer be read, are left out of the result.
   */
  enrich?(records: readonly SessionRecord[]): Promise<SessionRecord[]>;
}
