import path from "node:path";
import chokidar, { type FSWatcher } from "chokidar";
import { KeyedDebouncer } from "./debounce.js";
import { childLogger, type Logger } from "./logger.js";

export interface DirectoryWatcherOptions {
  debounceMs: number;
  /** Called once per burst per root with every path touched during the burst. */
  onChange: (root: string, paths: readonly string[]) => void;
  extensions?: readonly string[];
  logger?: Logger;
}

const DEFAULT_EXTENSIONS = [".jsonl", ".json"];

export class DirectoryWatcher {
  private watcher: FSWatcher | null = null;
  private roots: string[] = [];
  private readonly bursts: KeyedDebouncer<ReadonlySet<string>>;
  private readonly log: Logger;

  constructor(private readonly options: DirectoryWatcherOptions) {
    this.log = options.logger ?? childLogger("watcher");
    this.bursts = new KeyedDebouncer<ReadonlySet<string>>({
      coalesce: (pending, next) => new Set([...pending, ...next]),
      delayMs: () => this.options.debounceMs,
      onFire: (root, paths) => this.options.onChange(root, [...paths].sort()),
    });
  }

  watchedRoots(): readonly string[] {
    return this.roots;
  }

  async start(roots: readonly string[]): Promise<void> {
    await this.close();
    this.roots = Array.from(new Set(roots.map((root) => path.resolve(root))));
    if (this.roots.length === 0) return;

    this.watcher = chokidar.watch(this.roots, {
      ignoreInitial: true,
      persistent: true,
      followSymlinks: false,
      awaitWriteFinish: {
        stabilityThreshold: Math.max(50, this.options.debounceMs),
        pollInterval: 40,
      },
    });
    const onDirty = (rawPath: string): void => {
      this.notePath(rawPath);
    };
    this.watcher.on("add", onDirty);
    this.watcher.on("change", onDirty);
    this.watcher.on("unlink", onDirty);
    this.watcher.on("error", (error) => {
      this.log.warn({ err: error }, "watcher error");
    });
    this.log.debug({ roots: this.roots }, "watching session roots");
  }

  /** Attributes a changed path to the deepest watched root containing it and extends that root's burst. */
  notePath(rawPath: string): boolean {
    const extensions = this.options.extensions ?? DEFAULT_EXTENSIONS;
    const resolved = path.resolve(rawPath);
    if (!extensions.some((extension) => resolved.toLowerCase().endsWith(extension))) return false;
    const root = this.roots
      .filter((candidate) => resolved === candidate || resolved.startsWith(`${candidate}${path.sep}`))
      .sort((a, b) => b.length - a.length)[0];
    if (root === undefined) return false;
    this.bursts.schedule(root, new Set([resolved]));
    return true;
  }

  /** Tracks roots without starting chokidar. */
  setRoots(roots: readonly string[]): void {
    this.roots = Array.from(new Set(roots.map((root) => path.resolve(root))));
  }

  async close(): Promise<void> {
    this.bursts.cancelAll();
    if (this.watcher) {
      const current = this.watcher;
      this.watcher = null;
      await current.close();
    }
  }
}
