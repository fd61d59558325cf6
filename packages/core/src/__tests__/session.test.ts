import { mkdtempSync, writeFileSync } from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, expect, it, vi } from "vitest";
import type { TraceMessage } from "@linelens/contracts";
import { mergeConfig } from "../config.js";
import { InvalidTargetError } from "../errors.js";
import { DebugSession, resolveRunTarget, type SessionStateEvent } from "../session.js";
import { createFakeTransports, FakeEditor, type FakeTransport } from "./fakes.js";

const FILES: TraceMessage = {
  type: "files_data",
  files: [{ fileIndex: 0, filename: "main.js", fileSize: 12, fileHash: "h1", lineCount: 3 }],
};

const EVENTS: TraceMessage = {
  type: "lines",
  events: [
    { fileIndex: 0, lineIndex: 0, offset: 10, value: 1 },
    { fileIndex: 0, lineIndex: 1, offset: 20, value: "two" },
    { fileIndex: 0, lineIndex: 0, offset: 10, value: 3 },
  ],
};

function setup() {
  const dir = mkdtempSync(path.join(os.tmpdir(), "linelens-session-"));
  const file = path.join(dir, "main.js");
  const editor = new FakeEditor();
  const { transports, factory } = createFakeTransports();
  const session = new DebugSession({
    config: mergeConfig({ files: { caseInsensitive: false }, refresh: { updatesPerSecond: 1000 } }),
    editor,
    createTransport: factory,
  });
  return { dir, file, editor, transports, session };
}

async function transportAt(transports: FakeTransport[], position: number): Promise<FakeTransport> {
  await vi.waitFor(() => expect(transports.length).toBeGreaterThan(position));
  const transport = transports[position];
  if (!transport) throw new Error(`no transport at ${position}`);
  return transport;
}

async function completedRun(messages: TraceMessage[], hash = "h1") {
  const context = setup();
  context.editor.openFile(context.file, 12, hash);
  const handle = await context.session.start(context.dir);
  const transport = await transportAt(context.transports, 0);
  transport.messages.push({ type: "status", status: "connected" });
  for (const message of messages) transport.messages.push(message);
  transport.finish(0);
  const result = await handle.done;
  return { ...context, transport, result };
}

describe("debug session", () => {
  it("runs the handshake and renders the latest event per line", async () => {
    const { dir, file, editor, transport, result } = await completedRun([FILES, EVENTS]);

    expect(result).toEqual({ runId: 1, status: "finished", exitCode: 0, error: "" });
    expect(transport.requests).toEqual(["file_set_positions", "start"]);
    expect(editor.annotations.get(file)).toEqual({
      on: true,
      edited: false,
      selectedLine: 0,
      entries: [{ offset: 10, text: "3" }, { offset: 20, text: "\"two\"" }, null],
    });
    expect(editor.messages).toEqual([`debug session starting: ${dir}`]);
    expect(editor.output).toBe("exit status: 0\n");
  });

  it("reports state transitions for a run", async () => {
    const { editor, transports, session, dir, file } = setup();
    editor.openFile(file, 12, "h1");
    const states: string[] = [];
    session.on("state", (event: SessionStateEvent) => states.push(event.state));

    const handle = await session.start(dir);
    const transport = await transportAt(transports, 0);
    transport.finish(0);
    await handle.done;

    expect(states).toEqual(["starting", "running", "finished", "idle"]);
    expect(session.getState()).toBe("idle");
  });

  it("moves the selection and reveals the selected event", async () => {
    const { session, editor, file } = await completedRun([FILES, EVENTS]);

    expect(await session.onSelectionGesture({ kind: "global", mode: "first" })).toBe(true);
    expect(editor.annotations.get(file)).toEqual({
      on: true,
      edited: false,
      selectedLine: 0,
      entries: [{ offset: 10, text: "1" }, { offset: 20, text: " " }, null],
    });
    expect(editor.reveals.at(-1)).toEqual({ filename: file, offset: 10 });

    expect(
      await session.onSelectionGesture({ kind: "line", filename: file, lineIndex: 0, offset: 10, mode: "current_next" }),
    ).toBe(true);
    expect((await session.getSelection())?.arrivalIndex).toBe(2);
  });

  it("reports no change for a gesture on an unknown file", async () => {
    const { session } = await completedRun([FILES, EVENTS]);
    expect(
      await session.onSelectionGesture({ kind: "line", filename: "/nowhere.js", lineIndex: 0, offset: 0, mode: "current" }),
    ).toBe(false);
  });

  it("prints the shown value and the line history", async () => {
    const { session, editor, file } = await completedRun([FILES, EVENTS]);

    await session.onSelectionGesture({ kind: "line", filename: file, lineIndex: 0, offset: 10, mode: "print" });
    expect(editor.messages.at(-1)).toBe("annotation at offset 10:\n\t3\n");

    await session.onSelectionGesture({ kind: "line", filename: file, lineIndex: 0, offset: 10, mode: "print_all" });
    expect(editor.messages.at(-1)).toBe("annotations (2 entries):\n\t1\n\t3\n");
  });

  it("suppresses annotations on an edited file and warns instead of revealing", async () => {
    const { session, editor, file } = await completedRun([FILES, EVENTS], "changed");

    expect(editor.annotations.get(file)).toEqual({ on: false, edited: true, selectedLine: -1, entries: [] });
    await session.onSelectionGesture({ kind: "global", mode: "first" });
    expect(editor.warnings).toEqual([`selection at edited file: ${file}: step 0`]);
    expect(editor.reveals).toEqual([]);
  });

  it("drops events with bad indices and keeps the rest", async () => {
    const { editor, file, result } = await completedRun([
      FILES,
      {
        type: "lines",
        events: [
          { fileIndex: 0, lineIndex: 5, offset: 1, value: 0 },
          { fileIndex: 0, lineIndex: 2, offset: 30, value: true },
        ],
      },
    ]);

    expect(result.status).toBe("finished");
    expect(editor.output).toBe("error: bad debug index: 5 len=3\nexit status: 0\n");
    expect(editor.annotations.get(file)?.entries).toEqual([null, null, { offset: 30, text: "true" }]);
  });

  it("reports an unhandled status without ending the run", async () => {
    const { editor, result } = await completedRun([{ type: "status", status: "paused" }]);
    expect(result.status).toBe("finished");
    expect(editor.output).toBe("error: unhandled status: paused\nexit status: 0\n");
  });

  it("fails the run on an error message from the program", async () => {
    const { editor, transports, session, dir } = setup();
    const handle = await session.start(dir);
    const transport = await transportAt(transports, 0);
    transport.messages.push(FILES);
    transport.messages.push({ type: "error", message: "boom" });

    const result = await handle.done;
    expect(result).toEqual({ runId: 1, status: "failed", exitCode: null, error: "boom" });
    expect(transport.cancelled).toBe(true);
    expect(editor.output).toBe("error: boom\nexit status: killed\n");
  });

  it("ends the run on file metadata with an out-of-range index", async () => {
    const { editor, transports, session, dir } = setup();
    const handle = await session.start(dir);
    const transport = await transportAt(transports, 0);
    transport.messages.push({
      type: "files_data",
      files: [{ fileIndex: 1, filename: "main.js", fileSize: 12, fileHash: "h1", lineCount: 3 }],
    });

    const result = await handle.done;
    expect(result.status).toBe("failed");
    expect(transport.requests).toEqual([]);
    expect(editor.output).toBe("error: bad file index at init: 1 len=1\nexit status: killed\n");
  });

  it("cancels a run and clears the views", async () => {
    const { editor, transports, session, dir, file } = setup();
    editor.openFile(file, 12, "h1");
    const handle = await session.start(dir);
    const transport = await transportAt(transports, 0);
    transport.messages.push(FILES);
    transport.messages.push(EVENTS);

    await session.cancel();
    const result = await handle.done;

    expect(result).toEqual({ runId: 1, status: "cancelled", exitCode: null, error: "" });
    expect(transport.cancelled).toBe(true);
    expect(editor.annotations.get(file)).toEqual({ on: false, edited: false, selectedLine: -1, entries: [] });
    expect(editor.output).toBe("");
    expect(await session.getSelection()).toBeUndefined();
  });

  it("cancels the previous run when a new one starts", async () => {
    const { transports, session, dir } = setup();
    const first = await session.start(dir);
    const firstTransport = await transportAt(transports, 0);

    const second = await session.start(dir);
    expect((await first.done).status).toBe("cancelled");
    expect(firstTransport.cancelled).toBe(true);

    const secondTransport = await transportAt(transports, 1);
    secondTransport.finish(0);
    expect(await second.done).toEqual({ runId: 2, status: "finished", exitCode: 0, error: "" });
    expect(session.runId).toBe(2);
  });

  it("cancels a run at any point after it starts", async () => {
    for (let yields = 0; yields < 12; yields += 1) {
      const { transports, session, dir } = setup();
      const handle = await session.start(dir);
      for (let i = 0; i < yields; i += 1) await Promise.resolve();
      await session.cancel();

      expect((await handle.done).status).toBe("cancelled");
      expect(transports.filter((transport) => !transport.cancelled)).toEqual([]);
      expect(session.getState()).toBe("idle");
    }
  });

  it("clears every open file before the next run shows its events", async () => {
    const { transports, session, editor, dir, file } = setup();
    const other = path.join(dir, "util.js");
    editor.openFile(file, 12, "h1");
    editor.openFile(other, 12, "h2");
    const files: TraceMessage = {
      type: "files_data",
      files: [
        { fileIndex: 0, filename: "main.js", fileSize: 12, fileHash: "h1", lineCount: 3 },
        { fileIndex: 1, filename: "util.js", fileSize: 12, fileHash: "h2", lineCount: 2 },
      ],
    };
    const eventsWith = (value: number): TraceMessage => ({
      type: "lines",
      events: [
        { fileIndex: 0, lineIndex: 0, offset: 10, value },
        { fileIndex: 1, lineIndex: 1, offset: 5, value },
      ],
    });

    const first = await session.start(dir);
    const firstTransport = await transportAt(transports, 0);
    firstTransport.messages.push({ type: "status", status: "connected" });
    firstTransport.messages.push(files);
    firstTransport.messages.push(eventsWith(1));
    await vi.waitFor(() => expect(editor.annotations.get(other)?.entries[1]).toEqual({ offset: 5, text: "1" }));
    const restartedAt = editor.history.length;

    const second = await session.start(dir);
    const secondTransport = await transportAt(transports, 1);
    secondTransport.messages.push({ type: "status", status: "connected" });
    secondTransport.messages.push(files);
    secondTransport.messages.push(eventsWith(42));
    secondTransport.finish(0);
    expect((await second.done).status).toBe("finished");
    expect((await first.done).status).toBe("cancelled");

    for (const filename of [file, other]) {
      const states = editor.history
        .slice(restartedAt)
        .filter((entry) => entry.filename === filename)
        .map((entry) => entry.state);
      const cleared = states.findIndex((state) => !state.on && state.entries.length === 0);
      const shown = states.findIndex((state) => state.entries.some((entry) => entry?.text === "42"));
      expect(cleared).toBeGreaterThanOrEqual(0);
      expect(shown).toBeGreaterThan(cleared);
      expect(states.at(-1)?.entries.some((entry) => entry?.text === "42")).toBe(true);
    }
  });

  it("runs a file target from its directory with the given arguments", async () => {
    const { transports, session, dir, file } = setup();
    writeFileSync(file, "console.log(1);\n");

    const handle = await session.start(file, ["-v"]);
    expect(handle.cwd).toBe(dir);
    const transport = await transportAt(transports, 0);
    expect(transport.launch.cwd).toBe(dir);
    expect(transport.launch.args).toEqual(["-v"]);
    transport.finish(0);
    await handle.done;
  });

  it("rejects a missing target", async () => {
    const { session, dir } = setup();
    await expect(session.start(path.join(dir, "missing"))).rejects.toThrow(InvalidTargetError);
    expect(() => resolveRunTarget(path.join(dir, "missing"))).toThrow("can't run on this target");
  });

  it("clears recorded events but keeps the file table", async () => {
    const { session, editor, file } = await completedRun([FILES, EVENTS]);

    expect(await session.onSelectionGesture({ kind: "global", mode: "clear_events" })).toBe(true);
    expect(editor.annotations.get(file)).toEqual({ on: true, edited: false, selectedLine: -1, entries: [null, null, null] });
    expect((await session.getSelection())?.arrivalIndex).toBe(-1);
  });

  it("clears annotations for a file the run does not know", async () => {
    const { session, editor } = await completedRun([FILES, EVENTS]);
    await session.refreshFile("/elsewhere/other.js");
    expect(editor.annotations.get("/elsewhere/other.js")).toEqual({
      on: false,
      edited: false,
      selectedLine: -1,
      entries: [],
    });
  });
});
