import path from "node:path";
import Fastify, { type FastifyInstance } from "fastify";
import type { GlobalGestureMode, LineGestureMode, SelectionGesture } from "@linelens/contracts";
import {
  asErrorMessage,
  asRecord,
  DEFAULT_CONFIG_PATH,
  DebugSession,
  InvalidTargetError,
  isNonNegativeInt,
  loadConfig,
  patchConfig,
  saveConfig,
  type SessionStateEvent,
} from "@linelens/core";
import { EditorViews, type EditorViewsEvent } from "./views.js";

const HEARTBEAT_MS = 15_000;

const GLOBAL_MODES: readonly GlobalGestureMode[] = ["first", "last", "prev", "next", "clear", "clear_events"];
const LINE_MODES: readonly LineGestureMode[] = ["current", "current_prev", "current_next", "print", "print_all"];

export interface CreateServerOptions {
  session: DebugSession;
  views: EditorViews;
  configPath?: string;
}

function isOneOf<T extends string>(options: readonly T[], value: unknown): value is T {
  return typeof value === "string" && options.some((option) => option === value);
}

export function parseGesture(value: unknown): SelectionGesture | null {
  const record = asRecord(value);
  if (record.kind === "global") {
    return isOneOf(GLOBAL_MODES, record.mode) ? { kind: "global", mode: record.mode } : null;
  }
  if (record.kind !== "line") return null;

  const { filename, lineIndex, offset, mode } = record;
  if (
    typeof filename !== "string" ||
    !filename.trim() ||
    !isNonNegativeInt(lineIndex) ||
    !isNonNegativeInt(offset) ||
    !isOneOf(LINE_MODES, mode)
  ) {
    return null;
  }
  return { kind: "line", filename: path.resolve(filename), lineIndex, offset, mode };
}

function parseArgs(value: unknown): string[] | null {
  if (value === undefined) return [];
  if (!Array.isArray(value) || !value.every((arg): arg is string => typeof arg === "string")) return null;
  return value;
}

export async function createServer(options: CreateServerOptions): Promise<FastifyInstance> {
  const server = Fastify({ logger: false });
  const { session, views } = options;
  const configPath = options.configPath ?? DEFAULT_CONFIG_PATH;

  const onState = (event: SessionStateEvent): void => views.sessionState(event);
  const onChanged = (filename: string): void => {
    session.refreshFile(filename).catch((error: unknown) => {
      views.warning(`refresh ${filename}: ${asErrorMessage(error)}`);
    });
  };
  session.on("state", onState);
  views.on("changed", onChanged);
  server.addHook("onClose", async () => {
    session.off("state", onState);
    views.off("changed", onChanged);
  });

  server.get("/api/healthz", async () => ({ ok: true }));

  server.get("/api/session", async () => ({
    state: session.getState(),
    runId: session.runId,
    selection: (await session.getSelection()) ?? null,
  }));

  server.post("/api/session/start", async (request, reply) => {
    const body = asRecord(request.body);
    const args = parseArgs(body.args);
    if (typeof body.target !== "string" || !body.target.trim() || !args) {
      reply.code(400);
      return { ok: false, error: "expected { target: string, args?: string[] }" };
    }

    try {
      const handle = await session.start(body.target, args);
      handle.done.catch((error: unknown) => {
        views.warning(`run ${handle.runId}: ${asErrorMessage(error)}`);
      });
      return { ok: true, runId: handle.runId, cwd: handle.cwd };
    } catch (error) {
      reply.code(error instanceof InvalidTargetError ? 400 : 500);
      return { ok: false, error: asErrorMessage(error) };
    }
  });

  server.post("/api/session/cancel", async () => {
    await session.cancel();
    return { ok: true };
  });

  server.get("/api/views", async () => ({ views: views.list() }));

  server.post("/api/views", async (request, reply) => {
    const { filename } = asRecord(request.body);
    if (typeof filename !== "string" || !filename.trim()) {
      reply.code(400);
      return { ok: false, error: "expected { filename: string }" };
    }
    const view = await views.open(filename);
    await session.refreshFile(view.filename);
    return { ok: true, view: views.get(view.filename) ?? view };
  });

  server.delete("/api/views", async (request, reply) => {
    const { filename } = asRecord(request.body);
    if (typeof filename !== "string" || !views.close(filename)) {
      reply.code(404);
      return { ok: false, error: `view not open: ${String(filename)}` };
    }
    return { ok: true };
  });

  server.post("/api/gesture", async (request, reply) => {
    const gesture = parseGesture(asRecord(request.body).gesture);
    if (!gesture) {
      reply.code(400);
      return { ok: false, error: "invalid gesture" };
    }
    const changed = await session.onSelectionGesture(gesture);
    return { ok: true, changed };
  });

  server.get("/api/config", async () => ({ config: session.getConfig() }));

  server.post("/api/config", async (request) => {
    const merged = patchConfig(session.getConfig(), request.body);
    await saveConfig(merged, configPath);
    session.setConfig(merged);
    return { config: merged };
  });

  server.get("/api/stream", async (request, reply) => {
    reply.raw.setHeader("Content-Type", "text/event-stream; charset=utf-8");
    reply.raw.setHeader("Cache-Control", "no-cache, no-transform");
    reply.raw.setHeader("Connection", "keep-alive");
    reply.raw.setHeader("X-Accel-Buffering", "no");

    const snapshot = views.snapshot();
    const payload = { ...snapshot.payload, session: { state: session.getState(), runId: session.runId } };
    reply.raw.write(`event: snapshot\ndata: ${JSON.stringify({ ...snapshot, payload })}\n\n`);

    const onStream = ({ envelope }: EditorViewsEvent): void => {
      reply.raw.write(`event: ${envelope.type}\ndata: ${JSON.stringify(envelope)}\n\n`);
    };

    const heartbeat = setInterval(() => {
      reply.raw.write(`event: heartbeat\ndata: ${JSON.stringify({ ts: Date.now() })}\n\n`);
    }, HEARTBEAT_MS);

    views.on("stream", onStream);

    request.raw.on("close", () => {
      clearInterval(heartbeat);
      views.off("stream", onStream);
      reply.raw.end();
    });
  });

  return server;
}

export interface RunServerOptions {
  host?: string;
  port?: number;
  configPath?: string;
}

export async function runServer(options: RunServerOptions = {}): Promise<void> {
  const configPath = options.configPath ?? process.env.LINELENS_CONFIG ?? DEFAULT_CONFIG_PATH;
  const config = await loadConfig(configPath);
  const host = options.host ?? process.env.LINELENS_HOST ?? config.server.host;
  const port = options.port ?? Number(process.env.LINELENS_PORT ?? String(config.server.port));

  const views = new EditorViews();
  const session = new DebugSession({ config, editor: views });
  const server = await createServer({ session, views, configPath });

  await server.listen({ host, port });

  process.on("SIGINT", async () => {
    await session.cancel();
    await views.stop();
    await server.close();
    process.exit(0);
  });

  // eslint-disable-next-line no-console
  console.log(`linelens server: http://${host}:${port}`);
}
