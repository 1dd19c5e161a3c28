import { access, stat } from "node:fs/promises";
import path from "node:path";
import fg from "fast-glob";
import type {
  CoverageSnapshot,
  LoadContext,
  ParseQuality,
  ProviderLoadResult,
  SessionRecord,
  SessionSource,
  SourceProfileConfig,
  SubsetQuery,
} from "@sessiondex/contracts";
import { CacheCorruptionError, ProviderUnavailableError, StaleFileError, asErrorMessage, errorCode } from "../errors.js";
import { childLogger, type Logger } from "../logger.js";
import { qualityRank } from "../reconciler.js";
import type { RecordCache } from "../recordCache.js";
import { inProjectDirectories, recordMatchesContext } from "../records.js";
import { expandHome, isPathWithin, sourceKey } from "../utils.js";
import { summarizeSessionFile, type FileStatInfo, type SummarizeRequest } from "./summarizer.js";
import type { SessionProvider } from "./types.js";

export interface DiscoveredFile extends FileStatInfo {
  path: string;
}

export interface FileSessionProviderOptions {
  profile: SourceProfileConfig;
  cache: RecordCache;
  summarize?: (request: SummarizeRequest) => Promise<SessionRecord>;
  logger?: Logger;
}

export interface FileProviderStats {
  parsed: number;
  reused: number;
  failed: number;
  removed: number;
}

/** Provider over one source profile: session logs matched by globs under the profile's roots. */
export class FileSessionProvider implements SessionProvider {
  readonly id: string;
  readonly label: string;
  readonly source: SessionSource;
  readonly roots: readonly string[];
  private readonly summarize: (request: SummarizeRequest) => Promise<SessionRecord>;
  private readonly log: Logger;
  private readonly stats: FileProviderStats = { parsed: 0, reused: 0, failed: 0, removed: 0 };

  constructor(private readonly options: FileSessionProviderOptions) {
    const { profile } = options;
    this.id = profile.name;
    this.source =
      profile.locality === "remote" ? { kind: profile.kind, locality: "remote", host: profile.host ?? "" } : { kind: profile.kind, locality: "local" };
    this.label = profile.locality === "remote" ? `${profile.kind}@${profile.host ?? "remote"}` : profile.kind;
    this.roots = profile.roots.map((root) => path.resolve(expandHome(root)));
    this.summarize = options.summarize ?? summarizeSessionFile;
    this.log = (options.logger ?? childLogger("provider")).child({ providerId: this.id });
  }

  getStats(): FileProviderStats {
    return { ...this.stats };
  }

  async load(context: LoadContext): Promise<ProviderLoadResult> {
    const { cache } = this.options;
    if (context.cachePolicy === "cacheOnly") {
      const summaries = cache
        .fetchByProvider(this.id, context.dateRange, context.dateDimension)
        .filter((record) => inProjectDirectories(record, context.projectDirectories));
      return { summaries, coverage: cache.coverageSnapshot(this.id), cacheHit: true };
    }

    const files = await this.discover();
    const records = await this.refreshFiles(files, { pruneMissing: true });
    const summaries = records.filter((record) => recordMatchesContext(record, context));
    return { summaries, coverage: this.coverageOrNull(), cacheHit: false };
  }

  async loadSubset(query: SubsetQuery): Promise<SessionRecord[]> {
    if (query.kind === "updated_since") {
      if (query.agent !== this.source.kind) return [];
      const files = (await this.discover()).filter((file) => file.mtimeMs >= query.sinceMs);
      const records = await this.refreshFiles(files, { pruneMissing: false });
      return records.filter((record) => (record.lastUpdatedAtMs ?? record.createdAtMs) >= query.sinceMs);
    }
    const files = await this.discover();
    const records = await this.refreshFiles(files, { pruneMissing: true });
    return records.filter((record) => inProjectDirectories(record, [query.directory]));
  }

  async enrich(records: readonly SessionRecord[]): Promise<SessionRecord[]> {
    const out: SessionRecord[] = [];
    for (const record of records) {
      if (!this.owns(record)) continue;
      let file: FileStatInfo;
      try {
        const fileStat = await stat(record.filePath);
        file = { sizeBytes: fileStat.size, mtimeMs: fileStat.mtimeMs };
      } catch (error) {
        this.log.debug({ filePath: record.filePath, err: asErrorMessage(error) }, "enrichment target missing");
        continue;
      }
      try {
        out.push(await this.summarize({ filePath: record.filePath, stat: file, level: "enriched", source: this.source }));
        this.stats.parsed += 1;
      } catch (error) {
        this.stats.failed += 1;
        this.log.warn({ filePath: record.filePath, code: errorCode(error), err: asErrorMessage(error) }, "session enrichment skipped");
      }
    }
    this.persist(out, []);
    return out;
  }

  owns(record: SessionRecord): boolean {
    return (
      sourceKey(record.source) === sourceKey(this.source) && this.roots.some((root) => isPathWithin(record.filePath, root))
    );
  }

  async discover(): Promise<DiscoveredFile[]> {
    const { profile } = this.options;
    if (this.source.locality === "remote" && !(await this.anyRootReachable())) {
      throw new ProviderUnavailableError(this.id, `no mirror root reachable for ${this.label}`);
    }

    const files: DiscoveredFile[] = [];
    const seen = new Set<string>();
    for (const root of this.roots) {
      const matches = await fg(profile.includeGlobs, {
        cwd: root,
        absolute: true,
        onlyFiles: true,
        dot: true,
        deep: profile.maxDepth,
        suppressErrors: true,
        ignore: profile.excludeGlobs,
        unique: true,
        followSymbolicLinks: false,
      });

      for (const match of matches) {
        const filePath = path.resolve(match);
        if (seen.has(filePath)) continue;
        seen.add(filePath);
        try {
          const fileStat = await stat(filePath);
          files.push({ path: filePath, sizeBytes: fileStat.size, mtimeMs: fileStat.mtimeMs });
        } catch {
          // vanished between glob and stat
        }
      }
    }
    return files.sort((a, b) => a.path.localeCompare(b.path));
  }

  private async anyRootReachable(): Promise<boolean> {
    for (const root of this.roots) {
      try {
        await access(root);
        return true;
      } catch {
        // try the next root
      }
    }
    return false;
  }

  /**
   * Re-summarizes files whose size or mtime moved since the cached row, reuses the rest and writes
   * the changes back. A file that fails to parse keeps its previous row, if any; a file that vanished
   * mid-refresh loses it.
   */
  private async refreshFiles(files: readonly DiscoveredFile[], options: { pruneMissing: boolean }): Promise<SessionRecord[]> {
    const cachedRows = this.readCachedRows();
    const cachedByPath = new Map(cachedRows.map((record) => [record.filePath, record]));
    const cacheEmpty = cachedRows.length === 0;

    const out: SessionRecord[] = [];
    const changed: SessionRecord[] = [];
    const stale: string[] = [];
    for (const file of files) {
      const cached = cachedByPath.get(file.path);
      if (cached && cached.fileMtimeMs === file.mtimeMs && cached.fileSizeBytes === file.sizeBytes) {
        this.stats.reused += 1;
        out.push(cached);
        continue;
      }

      const level: ParseQuality =
        cacheEmpty || (cached !== undefined && qualityRank(cached.parseQuality) >= qualityRank("full")) ? "full" : "metadata";
      try {
        const record = await this.summarize({ filePath: file.path, stat: file, level, source: this.source });
        this.stats.parsed += 1;
        changed.push(record);
        out.push(record);
      } catch (error) {
        this.stats.failed += 1;
        this.log.warn({ filePath: file.path, code: errorCode(error), err: asErrorMessage(error) }, "session file skipped");
        if (error instanceof StaleFileError) {
          if (cached) stale.push(file.path);
          continue;
        }
        if (cached) out.push(cached);
      }
    }

    const present = new Set(files.map((file) => file.path));
    const vanished = options.pruneMissing
      ? cachedRows.filter((record) => !present.has(record.filePath)).map((record) => record.filePath)
      : [];
    vanished.push(...stale);
    this.persist(changed, vanished);
    return out;
  }

  /** An unreadable cache counts as empty, which forces a full parse of every file. */
  private readCachedRows(): SessionRecord[] {
    try {
      return this.options.cache.fetchByProvider(this.id);
    } catch (error) {
      if (!(error instanceof CacheCorruptionError)) throw error;
      this.log.warn({ err: error.message }, "record cache unreadable, parsing every file");
      return [];
    }
  }

  private persist(changed: readonly SessionRecord[], vanished: readonly string[]): void {
    const { cache } = this.options;
    try {
      cache.upsert(this.id, changed);
      if (vanished.length > 0) {
        this.stats.removed += cache.deletePaths(this.id, vanished);
        this.log.debug({ count: vanished.length }, "pruned vanished session files");
      }
    } catch (error) {
      this.log.warn({ err: asErrorMessage(error) }, "record cache write failed");
    }
  }

  private coverageOrNull(): CoverageSnapshot | null {
    try {
      return this.options.cache.coverageSnapshot(this.id);
    } catch (error) {
      this.log.debug({ err: asErrorMessage(error) }, "coverage snapshot unavailable");
      return null;
    }
  }
}
