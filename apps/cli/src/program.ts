import { Command, InvalidArgumentError, Option } from "commander";
import type { FilterState, PathTreeNode, SessionRecord, SortOrder } from "@sessiondex/contracts";
import { SORT_ORDERS } from "@sessiondex/contracts";
import {
  asRecord,
  daysInMonth,
  DEFAULT_CONFIG_PATH,
  effectiveTitle,
  loadConfig,
  loadIndex,
  mergeConfig,
  monthKey,
  parseDayKey,
  parseMonthKey,
  saveConfig,
  type SessionIndex,
} from "@sessiondex/core";
import { runServer, type RunServerOptions } from "@sessiondex/server";

export interface CliIo {
  out(line: string): void;
  err(line: string): void;
}

export interface ProgramDeps {
  io?: CliIo;
  /** Returns a started index whose first refresh has settled. */
  openIndex?: (configPath: string) => Promise<SessionIndex>;
  serve?: (options: RunServerOptions) => Promise<unknown>;
}

interface ListOptions {
  month?: number;
  day: number[];
  path?: string;
  project: string[];
  search?: string;
  sort?: SortOrder;
  created?: boolean;
  json?: boolean;
}

const consoleIo: CliIo = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

function printTable(io: CliIo, rows: string[][]): void {
  if (rows.length === 0) return;
  const header = rows[0];
  if (!header) return;
  const widths = header.map((_, col) => Math.max(...rows.map((row) => (row[col] ?? "").length)));
  for (const [idx, row] of rows.entries()) {
    const line = row
      .map((cell, col) => (cell ?? "").padEnd(widths[col] ?? 0))
      .join(idx === 0 ? " | " : "   ")
      .trimEnd();
    io.out(line);
    if (idx === 0) {
      io.out(widths.map((width) => "-".repeat(width)).join("-+-"));
    }
  }
}

function pad2(value: number): string {
  return String(value).padStart(2, "0");
}

function fmtClock(ms: number | null): string {
  if (ms === null) return "-";
  const date = new Date(ms);
  return `${pad2(date.getHours())}:${pad2(date.getMinutes())}`;
}

function sourceLabel(record: SessionRecord): string {
  return record.source.locality === "remote" ? `${record.source.kind}@${record.source.host ?? "remote"}` : record.source.kind;
}

function parseValue(input: string): unknown {
  if (input === "true") return true;
  if (input === "false") return false;
  const numeric = Number(input);
  if (!Number.isNaN(numeric) && input.trim() !== "") return numeric;
  return input;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function setPath(target: Record<string, unknown>, dottedKey: string, value: unknown): void {
  const parts = dottedKey.split(".").filter(Boolean);
  const lastKey = parts.pop();
  if (lastKey === undefined) return;

  let cursor = target;
  for (const key of parts) {
    const next = cursor[key];
    if (isPlainObject(next)) {
      cursor = next;
      continue;
    }
    const created: Record<string, unknown> = {};
    cursor[key] = created;
    cursor = created;
  }
  cursor[lastKey] = value;
}

function parseMonthOption(value: string): number {
  const parsed = parseMonthKey(value);
  if (parsed === null) throw new InvalidArgumentError("expected YYYY-MM");
  return parsed;
}

function collectDay(value: string, previous: number[]): number[] {
  const parsed = parseDayKey(value);
  if (parsed === null) throw new InvalidArgumentError("expected YYYY-MM-DD");
  return [...previous, parsed];
}

function collectString(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export function filterPatchFrom(opts: ListOptions): Partial<FilterState> {
  const patch: Partial<FilterState> = {
    selectedDays: opts.day,
    selectedProjectIds: opts.project,
    dateDimension: opts.created ? "created" : "updated",
  };
  if (opts.month !== undefined) patch.monthStartMs = opts.month;
  if (opts.path !== undefined) patch.selectedPath = opts.path;
  if (opts.search !== undefined) patch.quickSearch = opts.search;
  if (opts.sort !== undefined) patch.sortOrder = opts.sort;
  return patch;
}

export function renderTree(node: PathTreeNode, depth = 0): string[] {
  const line = `${"  ".repeat(depth)}${node.name} (${node.count})`;
  return [line, ...node.children.flatMap((child) => renderTree(child, depth + 1))];
}

export function buildProgram(deps: ProgramDeps = {}): Command {
  const io = deps.io ?? consoleIo;
  const openIndex = deps.openIndex ?? ((configPath: string) => loadIndex(configPath));
  const serve = deps.serve ?? runServer;

  const program = new Command();
  program.name("sessiondex").description("Browse agent CLI sessions by day, directory and project");
  program.option("--config <path>", "Config path", process.env.SESSIONDEX_CONFIG ?? DEFAULT_CONFIG_PATH);
  // subcommands inherit both settings, so they must precede the commands below
  program.exitOverride();
  program.configureOutput({
    writeOut: (text) => io.out(text.trimEnd()),
    writeErr: (text) => io.err(text.trimEnd()),
  });

  const configPath = (): string => program.opts<{ config: string }>().config;

  async function withIndex(run: (index: SessionIndex) => Promise<void>): Promise<void> {
    const index = await openIndex(configPath());
    try {
      await run(index);
    } finally {
      await index.close();
    }
  }

  program
    .command("list")
    .description("Show visible sessions grouped by day")
    .option("--month <YYYY-MM>", "Month to browse", parseMonthOption)
    .option("--day <YYYY-MM-DD>", "Select a day (repeatable)", collectDay, [])
    .option("--path <dir>", "Only sessions under this working directory")
    .option("--project <id>", "Select a project (repeatable)", collectString, [])
    .option("--search <text>", "Quick search over titles, paths and previews")
    .addOption(new Option("--sort <order>", "Sort order").choices(SORT_ORDERS))
    .option("--created", "Group by creation day instead of last update")
    .option("--json", "JSON output")
    .action(async (opts: ListOptions) => {
      await withIndex(async (index) => {
        const filter = index.requestFilterChange(filterPatchFrom(opts));
        await index.whenIdle();
        const sections = index.currentVisibleSections();
        if (opts.json) {
          io.out(JSON.stringify({ filter, sections }, null, 2));
          return;
        }
        if (sections.length === 0) {
          io.out("No sessions match.");
          return;
        }
        for (const section of sections) {
          io.out(`${section.title} (${section.sessions.length} sessions, ${section.totalEvents} events)`);
          printTable(io, [
            ["id", "agent", "updated", "events", "title"],
            ...section.sessions.map((record) => [
              record.id,
              sourceLabel(record),
              fmtClock(record.lastUpdatedAtMs),
              String(record.eventCount),
              effectiveTitle(record),
            ]),
          ]);
        }
        const status = index.currentStatus();
        if (status) io.err(`${status.level}: ${status.message}`);
      });
    });

  program
    .command("calendar <month>")
    .description("Sessions per day for a month (YYYY-MM)")
    .option("--created", "Count by creation day instead of activity")
    .option("--json", "JSON output")
    .action(async (month: string, opts: { created?: boolean; json?: boolean }) => {
      const monthStartMs = parseMonthOption(month);
      await withIndex(async (index) => {
        index.requestFilterChange({ monthStartMs, dateDimension: opts.created ? "created" : "updated" });
        await index.whenIdle();
        const counts = index.currentAggregates().monthCounts;
        const key = monthKey(monthStartMs);
        if (opts.json) {
          io.out(JSON.stringify({ month: key, counts }, null, 2));
          return;
        }
        const rows: string[][] = [["day", "sessions"]];
        for (let day = 1; day <= daysInMonth(monthStartMs); day += 1) {
          const count = counts[String(day)];
          if (count) rows.push([`${key}-${pad2(day)}`, String(count)]);
        }
        if (rows.length === 1) {
          io.out(`No sessions in ${key}.`);
          return;
        }
        printTable(io, rows);
      });
    });

  program
    .command("tree")
    .description("Working directories with session counts")
    .option("--json", "JSON output")
    .action(async (opts: { json?: boolean }) => {
      await withIndex(async (index) => {
        const tree = index.currentAggregates().pathTree;
        if (opts.json) {
          io.out(JSON.stringify(tree, null, 2));
          return;
        }
        if (!tree) {
          io.out("No sessions.");
          return;
        }
        for (const line of renderTree(tree)) io.out(line);
      });
    });

  program
    .command("serve")
    .description("Run the HTTP API with a live index")
    .option("--host <host>", "Server host", process.env.SESSIONDEX_HOST ?? "127.0.0.1")
    .option("--port <port>", "Server port", process.env.SESSIONDEX_PORT ?? "8787")
    .option("--no-watch", "Do not watch session roots for changes")
    .action(async (opts: { host: string; port: string; watch: boolean }) => {
      const port = Number(opts.port);
      if (!Number.isInteger(port) || port <= 0) throw new InvalidArgumentError(`invalid port: ${opts.port}`);
      await serve({ host: opts.host, port, configPath: configPath(), watch: opts.watch });
    });

  const configCmd = program.command("config").description("Configuration");

  configCmd.command("get [key]").action(async (key: string | undefined) => {
    const config = await loadConfig(configPath());
    let value: unknown = config;
    for (const part of (key ?? "").split(".").filter(Boolean)) {
      value = asRecord(value)[part];
    }
    io.out(JSON.stringify(value ?? null, null, 2));
  });

  configCmd.command("set <key> <value>").action(async (key: string, value: string) => {
    const config = await loadConfig(configPath());
    const mutable = asRecord(structuredClone(config));
    setPath(mutable, key, parseValue(value));
    const merged = mergeConfig(mutable);
    await saveConfig(merged, configPath());
    io.out(`updated ${key}`);
  });

  return program;
}
