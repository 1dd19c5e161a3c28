import Fastify, { type FastifyInstance } from "fastify";
import { z } from "zod";
import type {
  AgentKind,
  FilterState,
  IncrementalHint,
  RefreshScope,
  SessionOverlay,
  StreamEnvelope,
} from "@sessiondex/contracts";
import {
  asErrorMessage,
  asRecord,
  childLogger,
  DEFAULT_CONFIG_PATH,
  mergeConfig,
  saveConfig,
  SessionIndex,
  SessionIndexError,
  type AssignIntent,
} from "@sessiondex/core";

const HEARTBEAT_MS = 15_000;

const agentKindSchema = z.enum(["codex", "claude", "gemini"]);

const filterPatchSchema = z
  .object({
    selectedPath: z.string().nullable().optional(),
    selectedProjectIds: z.array(z.string()).optional(),
    selectedDays: z.array(z.number().int()).optional(),
    dateDimension: z.enum(["created", "updated"]).optional(),
    quickSearch: z.string().optional(),
    sortOrder: z.enum(["most_recent", "longest_duration", "most_activity", "alphabetical", "largest_size"]).optional(),
    monthStartMs: z.number().int().optional(),
  })
  .strict();

const refreshScopeSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("all") }),
  z.object({ kind: z.literal("day"), dayStartMs: z.number().int() }),
  z.object({ kind: z.literal("month"), monthStartMs: z.number().int() }),
]);

const refreshBodySchema = z.object({ scope: refreshScopeSchema.optional() });

const hintBodySchema = z.object({
  hint: z.discriminatedUnion("kind", [
    z.object({ kind: z.literal("agent_day"), agent: agentKindSchema, dayStartMs: z.number().int() }),
    z.object({ kind: z.literal("project_directory"), directory: z.string().min(1) }),
  ]),
  expiresAtMs: z.number().int().optional(),
});

const overlayBodySchema = z.object({ title: z.string().optional(), comment: z.string().optional() }).strict();

const intentBodySchema = z.object({
  projectId: z.string().min(1),
  expectedCwd: z.string().min(1),
  t0Ms: z.number().int().optional(),
  model: z.string().optional(),
});

const projectsBodySchema = z.object({
  projects: z.array(
    z.object({
      id: z.string().min(1),
      name: z.string(),
      directory: z.string().nullable().default(null),
      parentId: z.string().nullable().default(null),
      sources: z.array(agentKindSchema).default([]),
    }),
  ),
  memberships: z.record(z.string()).optional(),
});

const sessionsQuerySchema = z.object({
  agent: agentKindSchema.optional(),
  limit: z.coerce.number().int().positive().optional(),
});

const durationMs = z.number().int().nonnegative();
const nonEmptyPath = z.string().min(1);

const configPatchSchema = z
  .object({
    refresh: z
      .object({
        forceDebounceMs: durationMs,
        autoDebounceMs: durationMs,
        completionCooldownMs: durationMs,
        providerCooldownMs: durationMs,
        directoryDebounceMs: durationMs,
      })
      .partial()
      .strict(),
    coverage: z
      .object({ enabled: z.boolean(), debounceMs: durationMs, emptyRetryLimit: z.number().int().nonnegative() })
      .partial()
      .strict(),
    filter: z.object({ debounceMs: durationMs }).partial().strict(),
    enrichment: z
      .object({ enabled: z.boolean(), batchSize: z.number().int().positive(), concurrency: z.number().int().positive() })
      .partial()
      .strict(),
    hints: z.object({ agentDayWindowMs: durationMs, projectDirectoryWindowMs: durationMs }).partial().strict(),
    sources: z.record(
      z
        .object({
          enabled: z.boolean(),
          kind: agentKindSchema,
          locality: z.enum(["local", "remote"]),
          host: z.string(),
          roots: z.array(nonEmptyPath),
          includeGlobs: z.array(z.string()),
          excludeGlobs: z.array(z.string()),
          maxDepth: z.number().int().positive(),
        })
        .partial()
        .strict(),
    ),
    cache: z.object({ path: nonEmptyPath }).partial().strict(),
    overlays: z.object({ path: nonEmptyPath }).partial().strict(),
    logging: z
      .object({ level: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]) })
      .partial()
      .strict(),
  })
  .partial()
  .strict();

interface SessionParams {
  id: string;
}

type FilterPatchInput = z.infer<typeof filterPatchSchema>;
type OverlayInput = z.infer<typeof overlayBodySchema>;

export interface CreateServerOptions {
  index: SessionIndex;
  configPath?: string;
  heartbeatMs?: number;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function deepMergeConfig(base: Record<string, unknown>, patch: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(patch)) {
    const baseValue = out[key];
    if (isPlainObject(baseValue) && isPlainObject(value)) {
      out[key] = deepMergeConfig(baseValue, value);
      continue;
    }
    out[key] = value;
  }
  return out;
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`).join("; ");
}

export function toFilterPatch(input: FilterPatchInput): Partial<FilterState> {
  const patch: Partial<FilterState> = {};
  if (input.selectedPath !== undefined) patch.selectedPath = input.selectedPath;
  if (input.selectedProjectIds !== undefined) patch.selectedProjectIds = input.selectedProjectIds;
  if (input.selectedDays !== undefined) patch.selectedDays = input.selectedDays;
  if (input.dateDimension !== undefined) patch.dateDimension = input.dateDimension;
  if (input.quickSearch !== undefined) patch.quickSearch = input.quickSearch;
  if (input.sortOrder !== undefined) patch.sortOrder = input.sortOrder;
  if (input.monthStartMs !== undefined) patch.monthStartMs = input.monthStartMs;
  return patch;
}

function toOverlay(input: OverlayInput): SessionOverlay {
  return {
    ...(input.title !== undefined ? { title: input.title } : {}),
    ...(input.comment !== undefined ? { comment: input.comment } : {}),
  };
}

function toIntent(input: z.infer<typeof intentBodySchema>): AssignIntent {
  return {
    projectId: input.projectId,
    expectedCwd: input.expectedCwd,
    t0Ms: input.t0Ms ?? Date.now(),
    hints: input.model !== undefined ? { model: input.model } : {},
  };
}

function sseFrame(event: string, data: unknown): string {
  return `event: ${event}\ndata: ${JSON.stringify(data)}\n\n`;
}

export async function createServer(options: CreateServerOptions): Promise<FastifyInstance> {
  const server = Fastify({ logger: false });
  const index = options.index;
  const configPath = options.configPath ?? DEFAULT_CONFIG_PATH;
  const heartbeatMs = options.heartbeatMs ?? HEARTBEAT_MS;

  server.setErrorHandler(async (error, _request, reply) => {
    if (error instanceof SessionIndexError) {
      reply.code(500);
      return { error: error.message, code: error.code };
    }
    reply.code(error.statusCode ?? 500);
    return { error: error.message };
  });

  server.get("/api/healthz", async () => ({ ok: true }));

  server.get("/api/status", async () => ({
    status: index.currentStatus(),
    filter: index.currentFilterState(),
    providers: index.providerHealth(),
    stats: index.getPerformanceStats(),
  }));

  server.get("/api/sections", async () => ({
    filter: index.currentFilterState(),
    sections: index.currentVisibleSections(),
  }));

  server.get("/api/aggregates", async () => ({ aggregates: index.currentAggregates() }));

  server.get("/api/sessions", async (request, reply) => {
    const parsed = sessionsQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      reply.code(400);
      return { error: formatIssues(parsed.error) };
    }
    const agent: AgentKind | undefined = parsed.data.agent;
    const sessions = index
      .sessions()
      .filter((session) => (agent ? session.source.kind === agent : true))
      .slice(0, parsed.data.limit);
    return { sessions };
  });

  server.get<{ Params: SessionParams }>("/api/sessions/:id", async (request, reply) => {
    const params = request.params;
    const session = index.getSession(params.id);
    if (!session) {
      reply.code(404);
      return { error: `unknown session: ${params.id}` };
    }
    return { session };
  });

  server.put<{ Params: SessionParams }>("/api/sessions/:id/overlay", async (request, reply) => {
    const params = request.params;
    const parsed = overlayBodySchema.safeParse(request.body ?? {});
    if (!parsed.success) {
      reply.code(400);
      return { error: formatIssues(parsed.error) };
    }
    const session = await index.setUserOverlay(params.id, toOverlay(parsed.data));
    if (!session) {
      reply.code(404);
      return { error: `unknown session: ${params.id}` };
    }
    return { session };
  });

  server.post("/api/filters", async (request, reply) => {
    const parsed = filterPatchSchema.safeParse(request.body ?? {});
    if (!parsed.success) {
      reply.code(400);
      return { error: formatIssues(parsed.error) };
    }
    return { filter: index.requestFilterChange(toFilterPatch(parsed.data)) };
  });

  server.post("/api/refresh", async (request, reply) => {
    const parsed = refreshBodySchema.safeParse(request.body ?? {});
    if (!parsed.success) {
      reply.code(400);
      return { error: formatIssues(parsed.error) };
    }
    const scope: RefreshScope = parsed.data.scope ?? { kind: "all" };
    return { outcome: index.requestForceRefresh(scope) };
  });

  server.post("/api/retry", async () => ({ outcome: index.retry() }));

  server.post("/api/hints", async (request, reply) => {
    const parsed = hintBodySchema.safeParse(request.body ?? {});
    if (!parsed.success) {
      reply.code(400);
      return { error: formatIssues(parsed.error) };
    }
    const hint: IncrementalHint = parsed.data.hint;
    index.setHint(hint, parsed.data.expiresAtMs);
    return { ok: true };
  });

  server.post("/api/intents", async (request, reply) => {
    const parsed = intentBodySchema.safeParse(request.body ?? {});
    if (!parsed.success) {
      reply.code(400);
      return { error: formatIssues(parsed.error) };
    }
    return { matches: index.addAssignIntent(toIntent(parsed.data)) };
  });

  server.get("/api/projects", async () => ({
    projects: index.getProjects(),
    memberships: index.getMemberships(),
  }));

  server.put("/api/projects", async (request, reply) => {
    const parsed = projectsBodySchema.safeParse(request.body ?? {});
    if (!parsed.success) {
      reply.code(400);
      return { error: formatIssues(parsed.error) };
    }
    index.setProjects(parsed.data.projects);
    if (parsed.data.memberships) index.setMemberships(parsed.data.memberships);
    return { projects: index.getProjects(), memberships: index.getMemberships() };
  });

  server.get("/api/config", async () => ({ config: index.getConfig() }));

  server.post("/api/config", async (request, reply) => {
    const parsed = configPatchSchema.safeParse(request.body ?? {});
    if (!parsed.success) {
      reply.code(400);
      return { error: formatIssues(parsed.error) };
    }
    const mergedInput = deepMergeConfig(asRecord(index.getConfig()), asRecord(parsed.data));
    const merged = mergeConfig(mergedInput);
    await saveConfig(merged, configPath);
    // the running index keeps its timings until restart
    return { config: merged, restartRequired: true };
  });

  server.get("/api/stream", async (request, reply) => {
    reply.hijack();
    reply.raw.setHeader("Content-Type", "text/event-stream; charset=utf-8");
    reply.raw.setHeader("Cache-Control", "no-cache, no-transform");
    reply.raw.setHeader("Connection", "keep-alive");
    reply.raw.setHeader("X-Accel-Buffering", "no");

    const snapshot: StreamEnvelope = {
      id: "0",
      type: "snapshot",
      version: 0,
      payload: {
        filter: index.currentFilterState(),
        sections: index.currentVisibleSections(),
        aggregates: index.currentAggregates(),
        status: index.currentStatus(),
      },
    };
    reply.raw.write(sseFrame("snapshot", snapshot));

    const onStream = ({ envelope }: { envelope: StreamEnvelope }): void => {
      reply.raw.write(sseFrame(envelope.type, envelope));
    };

    const heartbeat = setInterval(() => {
      reply.raw.write(sseFrame("heartbeat", { ts: Date.now() }));
    }, heartbeatMs);

    index.on("stream", onStream);

    request.raw.on("close", () => {
      clearInterval(heartbeat);
      index.off("stream", onStream);
      reply.raw.end();
    });
  });

  return server;
}

export interface RunServerOptions {
  host?: string;
  port?: number;
  configPath?: string;
  watch?: boolean;
}

export async function runServer(options: RunServerOptions = {}): Promise<FastifyInstance> {
  const log = childLogger("server");
  const host = options.host ?? process.env.SESSIONDEX_HOST ?? "127.0.0.1";
  const port = options.port ?? Number(process.env.SESSIONDEX_PORT ?? "8787");
  const configPath = options.configPath ?? process.env.SESSIONDEX_CONFIG ?? DEFAULT_CONFIG_PATH;

  const index = await SessionIndex.fromConfigPath(configPath, { watch: options.watch ?? true });
  await index.start();

  const server = await createServer({ index, configPath });
  await server.listen({ host, port });

  const shutdown = async (): Promise<void> => {
    await server.close();
    await index.close();
  };
  process.once("SIGINT", () => {
    shutdown().then(
      () => process.exit(0),
      (error: unknown) => {
        log.error({ err: asErrorMessage(error) }, "shutdown failed");
        process.exit(1);
      },
    );
  });

  log.info({ host, port }, `session index server: http://${host}:${port}`);
  return server;
}
