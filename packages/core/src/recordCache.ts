import { mkdirSync } from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import {
  AGENT_KINDS,
  type AgentKind,
  type CoverageSnapshot,
  type DateDimension,
  type DateRange,
  type ParseQuality,
  type SessionRecord,
} from "@sessiondex/contracts";
import type { CoverageDiskStore, StoredCoverage } from "./coverage/scanner.js";
import { CacheCorruptionError, asErrorMessage } from "./errors.js";
import { expandHome } from "./utils.js";

/** Persistent store behind `cacheOnly` loads. Stale checks use the file metadata kept with each record. */
export interface RecordCache {
  fetch(ids: readonly string[]): SessionRecord[];
  fetchByProvider(providerId: string, range?: DateRange | null, dimension?: DateDimension): SessionRecord[];
  fetchByPath(providerId: string, filePath: string): SessionRecord | null;
  upsert(providerId: string, records: readonly SessionRecord[]): void;
  invalidate(target: readonly string[] | "all"): number;
  deletePaths(providerId: string, filePaths: readonly string[]): number;
  coverageSnapshot(providerId: string): CoverageSnapshot;
  close(): void;
}

interface SessionRow {
  id: string;
  provider_id: string;
  source_kind: string;
  source_locality: string;
  source_host: string | null;
  file_path: string;
  cwd: string;
  created_at_ms: number;
  last_updated_at_ms: number | null;
  active_duration_ms: number | null;
  user_count: number;
  assistant_count: number;
  tool_count: number;
  event_count: number;
  file_size: number | null;
  file_mtime_ms: number | null;
  line_count: number;
  parse_quality: string | null;
  model: string | null;
  preview: string | null;
}

interface CoverageRow {
  mtime_ms: number;
  days: string;
}

interface SnapshotRow {
  session_count: number;
  earliest: number | null;
  latest: number | null;
}

function isAgentKind(value: string): value is AgentKind {
  return AGENT_KINDS.some((kind) => kind === value);
}

function isParseQuality(value: string | null): value is ParseQuality {
  return value === "metadata" || value === "full" || value === "enriched";
}

function rowToRecord(row: SessionRow): SessionRecord {
  if (!isAgentKind(row.source_kind)) {
    throw new CacheCorruptionError(`unknown source kind '${row.source_kind}' for ${row.file_path}`);
  }
  const record: SessionRecord = {
    id: row.id,
    source:
      row.source_locality === "remote"
        ? { kind: row.source_kind, locality: "remote", host: row.source_host ?? "" }
        : { kind: row.source_kind, locality: "local" },
    filePath: row.file_path,
    workingDirectory: row.cwd,
    createdAtMs: row.created_at_ms,
    lastUpdatedAtMs: row.last_updated_at_ms,
    activeDurationMs: row.active_duration_ms,
    userMessageCount: row.user_count,
    assistantMessageCount: row.assistant_count,
    toolInvocationCount: row.tool_count,
    eventCount: row.event_count,
    fileSizeBytes: row.file_size,
    fileMtimeMs: row.file_mtime_ms,
    lineCount: row.line_count,
  };
  if (isParseQuality(row.parse_quality)) record.parseQuality = row.parse_quality;
  if (row.model !== null) record.model = row.model;
  if (row.preview !== null) record.preview = row.preview;
  return record;
}

function recordToRow(providerId: string, record: SessionRecord): SessionRow {
  return {
    id: record.id,
    provider_id: providerId,
    source_kind: record.source.kind,
    source_locality: record.source.locality,
    source_host: record.source.host ?? null,
    file_path: record.filePath,
    cwd: record.workingDirectory,
    created_at_ms: record.createdAtMs,
    last_updated_at_ms: record.lastUpdatedAtMs,
    active_duration_ms: record.activeDurationMs,
    user_count: record.userMessageCount,
    assistant_count: record.assistantMessageCount,
    tool_count: record.toolInvocationCount,
    event_count: record.eventCount,
    file_size: record.fileSizeBytes,
    file_mtime_ms: record.fileMtimeMs,
    line_count: record.lineCount,
    parse_quality: record.parseQuality ?? null,
    model: record.model ?? null,
    preview: record.preview ?? null,
  };
}

function parseDays(raw: string): number[] {
  const parsed: unknown = JSON.parse(raw);
  if (!Array.isArray(parsed)) return [];
  return parsed.filter((value): value is number => typeof value === "number" && Number.isInteger(value));
}

export function openDatabase(dbPath: string): Database.Database {
  const resolved = dbPath === ":memory:" ? dbPath : path.resolve(expandHome(dbPath));
  if (resolved !== ":memory:") {
    mkdirSync(path.dirname(resolved), { recursive: true });
  }
  const db = new Database(resolved);
  if (resolved !== ":memory:") {
    db.pragma("journal_mode = WAL");
  }
  initSchema(db);
  return db;
}

function initSchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS sessions (
      id TEXT NOT NULL,
      provider_id TEXT NOT NULL,
      source_kind TEXT NOT NULL,
      source_locality TEXT NOT NULL,
      source_host TEXT,
      file_path TEXT NOT NULL,
      cwd TEXT NOT NULL,
      created_at_ms INTEGER NOT NULL,
      last_updated_at_ms INTEGER,
      active_duration_ms INTEGER,
      user_count INTEGER NOT NULL DEFAULT 0,
      assistant_count INTEGER NOT NULL DEFAULT 0,
      tool_count INTEGER NOT NULL DEFAULT 0,
      event_count INTEGER NOT NULL DEFAULT 0,
      file_size INTEGER,
      file_mtime_ms REAL,
      line_count INTEGER NOT NULL DEFAULT 0,
      parse_quality TEXT,
      model TEXT,
      preview TEXT,
      PRIMARY KEY (provider_id, file_path)
    );

    CREATE INDEX IF NOT EXISTS idx_sessions_id ON sessions (id);
    CREATE INDEX IF NOT EXISTS idx_sessions_cwd ON sessions (cwd);
    CREATE INDEX IF NOT EXISTS idx_sessions_last_updated ON sessions (last_updated_at_ms);
    CREATE INDEX IF NOT EXISTS idx_sessions_created ON sessions (created_at_ms);
    CREATE INDEX IF NOT EXISTS idx_sessions_source ON sessions (source_kind);

    CREATE TABLE IF NOT EXISTS coverage (
      file_path TEXT NOT NULL,
      month_key TEXT NOT NULL,
      cwd TEXT NOT NULL,
      mtime_ms REAL NOT NULL,
      days TEXT NOT NULL,
      PRIMARY KEY (file_path, month_key)
    );
  `);
}

const UPSERT_SQL = `INSERT INTO sessions (
    id, provider_id, source_kind, source_locality, source_host, file_path, cwd, created_at_ms,
    last_updated_at_ms, active_duration_ms, user_count, assistant_count, tool_count, event_count,
    file_size, file_mtime_ms, line_count, parse_quality, model, preview
  ) VALUES (
    @id, @provider_id, @source_kind, @source_locality, @source_host, @file_path, @cwd, @created_at_ms,
    @last_updated_at_ms, @active_duration_ms, @user_count, @assistant_count, @tool_count, @event_count,
    @file_size, @file_mtime_ms, @line_count, @parse_quality, @model, @preview
  )
  ON CONFLICT(provider_id, file_path) DO UPDATE SET
    id = excluded.id,
    source_kind = excluded.source_kind,
    source_locality = excluded.source_locality,
    source_host = excluded.source_host,
    cwd = excluded.cwd,
    created_at_ms = excluded.created_at_ms,
    last_updated_at_ms = excluded.last_updated_at_ms,
    active_duration_ms = excluded.active_duration_ms,
    user_count = excluded.user_count,
    assistant_count = excluded.assistant_count,
    tool_count = excluded.tool_count,
    event_count = excluded.event_count,
    file_size = excluded.file_size,
    file_mtime_ms = excluded.file_mtime_ms,
    line_count = excluded.line_count,
    parse_quality = excluded.parse_quality,
    model = excluded.model,
    preview = excluded.preview`;

/** better-sqlite3 backed record cache; also stores the coverage scanner's per-file day sets. */
export class SqliteRecordCache implements RecordCache, CoverageDiskStore {
  private readonly db: Database.Database;

  constructor(dbPathOrDatabase: string | Database.Database) {
    this.db = typeof dbPathOrDatabase === "string" ? openDatabase(dbPathOrDatabase) : dbPathOrDatabase;
  }

  fetch(ids: readonly string[]): SessionRecord[] {
    if (ids.length === 0) return [];
    const statement = this.db.prepare<[string], SessionRow>("SELECT * FROM sessions WHERE id = ?");
    return this.read(() => ids.flatMap((id) => statement.all(id)));
  }

  fetchByProvider(providerId: string, range: DateRange | null = null, dimension: DateDimension = "updated"): SessionRecord[] {
    if (!range) {
      const statement = this.db.prepare<[string], SessionRow>(
        "SELECT * FROM sessions WHERE provider_id = ? ORDER BY COALESCE(last_updated_at_ms, created_at_ms) DESC",
      );
      return this.read(() => statement.all(providerId));
    }
    if (dimension === "created") {
      const statement = this.db.prepare<[string, number, number], SessionRow>(
        "SELECT * FROM sessions WHERE provider_id = ? AND created_at_ms >= ? AND created_at_ms < ?",
      );
      return this.read(() => statement.all(providerId, range.startMs, range.endMs));
    }
    const statement = this.db.prepare<[string, number, number], SessionRow>(
      `SELECT * FROM sessions WHERE provider_id = ?
         AND created_at_ms < ?
         AND MAX(created_at_ms, COALESCE(last_updated_at_ms, created_at_ms)) >= ?`,
    );
    return this.read(() => statement.all(providerId, range.endMs, range.startMs));
  }

  fetchByPath(providerId: string, filePath: string): SessionRecord | null {
    const statement = this.db.prepare<[string, string], SessionRow>(
      "SELECT * FROM sessions WHERE provider_id = ? AND file_path = ?",
    );
    const rows = this.read(() => {
      const row = statement.get(providerId, filePath);
      return row ? [row] : [];
    });
    return rows[0] ?? null;
  }

  upsert(providerId: string, records: readonly SessionRecord[]): void {
    if (records.length === 0) return;
    const statement = this.db.prepare<[SessionRow]>(UPSERT_SQL);
    const writeAll = this.db.transaction((rows: SessionRow[]) => {
      for (const row of rows) statement.run(row);
    });
    writeAll(records.map((record) => recordToRow(providerId, record)));
  }

  invalidate(target: readonly string[] | "all"): number {
    if (target === "all") {
      return this.db.prepare("DELETE FROM sessions").run().changes;
    }
    const statement = this.db.prepare<[string]>("DELETE FROM sessions WHERE id = ?");
    const removeAll = this.db.transaction((ids: readonly string[]) => {
      let changes = 0;
      for (const id of ids) changes += statement.run(id).changes;
      return changes;
    });
    return removeAll(target);
  }

  deletePaths(providerId: string, filePaths: readonly string[]): number {
    if (filePaths.length === 0) return 0;
    const statement = this.db.prepare<[string, string]>("DELETE FROM sessions WHERE provider_id = ? AND file_path = ?");
    const removeAll = this.db.transaction((paths: readonly string[]) => {
      let changes = 0;
      for (const filePath of paths) changes += statement.run(providerId, filePath).changes;
      return changes;
    });
    return removeAll(filePaths);
  }

  coverageSnapshot(providerId: string): CoverageSnapshot {
    const statement = this.db.prepare<[string], SnapshotRow>(
      `SELECT COUNT(*) AS session_count,
              MIN(created_at_ms) AS earliest,
              MAX(COALESCE(last_updated_at_ms, created_at_ms)) AS latest
         FROM sessions WHERE provider_id = ?`,
    );
    try {
      const row = statement.get(providerId);
      return {
        sessionCount: row?.session_count ?? 0,
        earliestCreatedAtMs: row?.earliest ?? null,
        latestUpdatedAtMs: row?.latest ?? null,
      };
    } catch (error) {
      throw new CacheCorruptionError(asErrorMessage(error));
    }
  }

  getCoverage(filePath: string, month: string): StoredCoverage | null {
    const row = this.db
      .prepare<[string, string], CoverageRow>("SELECT mtime_ms, days FROM coverage WHERE file_path = ? AND month_key = ?")
      .get(filePath, month);
    if (!row) return null;
    try {
      return { mtimeMs: row.mtime_ms, days: parseDays(row.days) };
    } catch {
      // unreadable row, treat as a miss and let the scanner rewrite it
      return null;
    }
  }

  putCoverage(filePath: string, month: string, cwd: string, entry: StoredCoverage): void {
    this.db
      .prepare<[string, string, string, number, string]>(
        `INSERT INTO coverage (file_path, month_key, cwd, mtime_ms, days) VALUES (?, ?, ?, ?, ?)
         ON CONFLICT(file_path, month_key) DO UPDATE SET
           cwd = excluded.cwd, mtime_ms = excluded.mtime_ms, days = excluded.days`,
      )
      .run(filePath, month, cwd, entry.mtimeMs, JSON.stringify(entry.days));
  }

  deleteCoverage(month: string, cwdPrefix: string | null): number {
    if (cwdPrefix === null) {
      return this.db.prepare<[string]>("DELETE FROM coverage WHERE month_key = ?").run(month).changes;
    }
    return this.db
      .prepare<[string, string, string]>("DELETE FROM coverage WHERE month_key = ? AND (cwd = ? OR cwd LIKE ? ESCAPE '\\')")
      .run(month, cwdPrefix, `${cwdPrefix.replace(/[\\%_]/g, (char) => `\\${char}`).replace(/\/$/, "")}/%`).changes;
  }

  deleteCoverageForFile(filePath: string): number {
    return this.db.prepare<[string]>("DELETE FROM coverage WHERE file_path = ?").run(filePath).changes;
  }

  close(): void {
    this.db.close();
  }

  private read(query: () => SessionRow[]): SessionRecord[] {
    let rows: SessionRow[];
    try {
      rows = query();
    } catch (error) {
      throw new CacheCorruptionError(asErrorMessage(error));
    }
    return rows.map(rowToRecord);
  }
}
