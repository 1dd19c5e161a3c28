import { open, readFile } from "node:fs/promises";
import path from "node:path";
import type { ParseQuality, SessionRecord, SessionSource } from "@sessiondex/contracts";
import { ParseFailureError, StaleFileError, asErrorMessage } from "../errors.js";
import { asArray, asRecord, asString, parseEpochMs } from "../utils.js";

export const HEAD_BYTES = 64 * 1024;
/** Gaps longer than this between two events do not count as active time. */
export const ACTIVE_GAP_MS = 5 * 60_000;

export interface FileStatInfo {
  sizeBytes: number;
  mtimeMs: number;
}

export interface SummarizeRequest {
  filePath: string;
  stat: FileStatInfo;
  level: ParseQuality;
  source: SessionSource;
}

export function normalizePreview(text: string, maxLen = 140): string {
  const first = text.trim().split(/\r?\n/, 1)[0] ?? "";
  if (first.length <= maxLen) {
    return first;
  }
  return `${first.slice(0, Math.max(0, maxLen - 1))}…`;
}

export function parseJsonLines(text: string): Array<Record<string, unknown>> {
  const out: Array<Record<string, unknown>> = [];
  for (const line of text.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed) continue;
    try {
      const parsed: unknown = JSON.parse(trimmed);
      if (parsed && typeof parsed === "object" && !Array.isArray(parsed)) {
        out.push(asRecord(parsed));
      }
    } catch {
      // partial or corrupt line
    }
  }
  return out;
}

/** Whole-file JSON sessions keep their turns under `messages`; the document itself carries session fields. */
export function parseJsonDocument(text: string): Array<Record<string, unknown>> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return [];
  }
  const root = asRecord(parsed);
  const { messages, ...header } = root;
  return [header, ...asArray(messages).map(asRecord)];
}

export function extractTextBlocks(value: unknown): string[] {
  if (typeof value === "string") {
    return value ? [value] : [];
  }
  const out: string[] = [];
  for (const item of asArray(value)) {
    const record = asRecord(item);
    const itemType = asString(record.type);
    if (itemType === "text" || itemType === "input_text" || itemType === "output_text") {
      const text = asString(record.text);
      if (text) out.push(text);
    }
  }
  return out;
}

export function guessTimestamp(row: Record<string, unknown>): number | null {
  const fromRecord = (record: Record<string, unknown>): number | null =>
    parseEpochMs(record.timestamp) ??
    parseEpochMs(record.timestamp_ms) ??
    parseEpochMs(record.ts) ??
    parseEpochMs(record.startTime) ??
    parseEpochMs(record.created_at) ??
    parseEpochMs(record.lastUpdated) ??
    null;
  return fromRecord(row) ?? fromRecord(asRecord(row.payload)) ?? fromRecord(asRecord(row.message)) ?? null;
}

function firstString(...values: unknown[]): string {
  for (const value of values) {
    if (typeof value === "string" && value.trim()) return value.trim();
  }
  return "";
}

function sessionIdOf(row: Record<string, unknown>): string {
  const payload = asRecord(row.payload);
  return firstString(
    row.sessionId,
    row.session_id,
    asString(row.type) === "session_meta" ? payload.id : undefined,
    payload.session_id,
  );
}

function roleOf(row: Record<string, unknown>): string {
  const payload = asRecord(row.payload);
  const message = asRecord(row.message);
  return firstString(message.role, payload.role, row.role, row.type).toLowerCase();
}

function contentOf(row: Record<string, unknown>): unknown {
  const payload = asRecord(row.payload);
  const message = asRecord(row.message);
  return message.content ?? payload.content ?? row.content;
}

function isToolInvocation(row: Record<string, unknown>): boolean {
  const payloadType = asString(asRecord(row.payload).type);
  if (payloadType === "function_call" || payloadType === "custom_tool_call") return true;
  if (asString(row.type) === "tool_use") return true;
  if (asArray(row.toolCalls).length > 0) return true;
  return asArray(contentOf(row)).some((item) => asString(asRecord(item).type) === "tool_use");
}

function isToolResultOnly(content: unknown): boolean {
  const items = asArray(content);
  return items.length > 0 && items.every((item) => asString(asRecord(item).type) === "tool_result");
}

async function readHead(filePath: string, bytes: number): Promise<string> {
  const handle = await open(filePath, "r");
  try {
    const buffer = Buffer.alloc(bytes);
    const { bytesRead } = await handle.read(buffer, 0, bytes, 0);
    return buffer.subarray(0, bytesRead).toString("utf8");
  } finally {
    await handle.close();
  }
}

function activeDuration(timestamps: readonly number[]): number {
  let total = 0;
  for (let i = 1; i < timestamps.length; i += 1) {
    const gap = (timestamps[i] ?? 0) - (timestamps[i - 1] ?? 0);
    if (gap > 0 && gap <= ACTIVE_GAP_MS) total += gap;
  }
  return total;
}

/**
 * Summarizes one session log. `metadata` reads only the head of the file and leaves counters at zero;
 * `full` reads everything; `enriched` adds active duration on top of a full read.
 */
export async function summarizeSessionFile(request: SummarizeRequest): Promise<SessionRecord> {
  const { filePath, stat, level, source } = request;
  let text: string;
  try {
    text = level === "metadata" ? await readHead(filePath, HEAD_BYTES) : await readFile(filePath, "utf8");
  } catch (error) {
    throw new StaleFileError(`${filePath} (${asErrorMessage(error)})`);
  }

  const rows = filePath.endsWith(".json") ? parseJsonDocument(text) : parseJsonLines(text);
  if (rows.length === 0) {
    throw new ParseFailureError(filePath, "no JSON records");
  }

  let id = "";
  let cwd = "";
  let model = "";
  let preview = "";
  let userMessageCount = 0;
  let assistantMessageCount = 0;
  let toolInvocationCount = 0;
  const timestamps: number[] = [];

  for (const row of rows) {
    const payload = asRecord(row.payload);
    if (!id) id = sessionIdOf(row);
    if (!cwd) cwd = firstString(row.cwd, payload.cwd, row.projectPath);
    if (!model) model = firstString(row.model, payload.model, asRecord(row.message).model);
    const ts = guessTimestamp(row);
    if (ts !== null) timestamps.push(ts);

    const role = roleOf(row);
    const content = contentOf(row);
    if (role === "user" && !isToolResultOnly(content)) {
      userMessageCount += 1;
      if (!preview) preview = normalizePreview(extractTextBlocks(content).join(" "));
    } else if (role === "assistant" || role === "gemini" || role === "model") {
      assistantMessageCount += 1;
    }
    if (isToolInvocation(row)) toolInvocationCount += 1;
  }

  timestamps.sort((a, b) => a - b);
  const createdAtMs = timestamps[0] ?? stat.mtimeMs;
  const lastTimestamp = timestamps[timestamps.length - 1];
  const record: SessionRecord = {
    id: id || path.basename(filePath, path.extname(filePath)),
    source,
    filePath,
    workingDirectory: cwd,
    createdAtMs,
    lastUpdatedAtMs: level === "metadata" ? stat.mtimeMs : (lastTimestamp ?? stat.mtimeMs),
    activeDurationMs: level === "enriched" ? activeDuration(timestamps) : null,
    userMessageCount: level === "metadata" ? 0 : userMessageCount,
    assistantMessageCount: level === "metadata" ? 0 : assistantMessageCount,
    toolInvocationCount: level === "metadata" ? 0 : toolInvocationCount,
    eventCount: level === "metadata" ? 0 : rows.length,
    fileSizeBytes: stat.sizeBytes,
    fileMtimeMs: stat.mtimeMs,
    lineCount: level === "metadata" ? 0 : text.split(/\r?\n/).filter((line) => line.trim()).length,
    parseQuality: level,
  };
  if (model) record.model = model;
  if (preview) record.preview = preview;
  return record;
}
