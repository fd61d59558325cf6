import { EventEmitter } from "node:events";
import { statSync } from "node:fs";
import path from "node:path";
import type {
  AnnotationState,
  AppConfig,
  LineEventMessage,
  LineGesture,
  RunResult,
  RunStatus,
  SelectionGesture,
  SelectionSnapshot,
  SessionState,
  TraceMessage,
} from "@linelens/contracts";
import { asErrorMessage, IndexError, InvalidTargetError, StaleSelectionError, TransportError } from "./errors.js";
import { createValueFormatter, type ValueFormatter } from "./format.js";
import { intervalForRate, RefreshScheduler } from "./refreshScheduler.js";
import { AsyncMutex } from "./rwLock.js";
import { TraceIndex } from "./traceIndex.js";
import { TraceState } from "./traceState.js";
import { ProcessTransport, type TraceTransport, type TransportFactory } from "./transport.js";

/** The text/editor UI as seen by the session controller. */
export interface EditorBridge {
  openFiles(): string[];
  contentMatches(filename: string, size: number, hash: string): boolean;
  setAnnotations(filename: string, state: AnnotationState): void;
  revealSource(filename: string, offset: number): void;
  message(text: string): void;
  warning(text: string): void;
  clearOutput(): void;
  writeOutput(text: string): void;
}

export interface DebugSessionOptions {
  config: AppConfig;
  editor: EditorBridge;
  createTransport?: TransportFactory;
}

export interface RunHandle {
  runId: number;
  cwd: string;
  done: Promise<RunResult>;
}

export interface SessionStateEvent {
  state: SessionState;
  runId: number;
}

const ABORTED = Symbol("aborted");

export function clearedAnnotations(): AnnotationState {
  return { on: false, edited: false, selectedLine: -1, entries: [] };
}

export function resolveRunTarget(target: string): string {
  const resolved = path.resolve(target);
  let isDirectory = false;
  let isFile = false;
  try {
    const stats = statSync(resolved);
    isDirectory = stats.isDirectory();
    isFile = stats.isFile();
  } catch (error) {
    throw new InvalidTargetError(`can't run on this target: ${target}: ${asErrorMessage(error)}`);
  }
  if (isDirectory) return resolved;
  if (isFile) return path.dirname(resolved);
  throw new InvalidTargetError(`can't run on this target: ${target}`);
}

function nextOrAbort<T>(
  iterator: AsyncIterator<T>,
  signal: AbortSignal,
): Promise<IteratorResult<T> | typeof ABORTED> {
  if (signal.aborted) return Promise.resolve(ABORTED);
  return new Promise((resolve, reject) => {
    const onAbort = (): void => resolve(ABORTED);
    signal.addEventListener("abort", onAbort, { once: true });
    iterator.next().then(
      (result) => {
        signal.removeEventListener("abort", onAbort);
        resolve(result);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      },
    );
  });
}

/**
 * Owns at most one debug run. Starting a run cancels the previous one, and the
 * new trace index is only installed once the previous ingestion task has left
 * the run gate.
 */
export class DebugSession extends EventEmitter {
  private readonly trace = new TraceState();
  private readonly runGate = new AsyncMutex();
  private readonly editor: EditorBridge;
  private readonly createTransport: TransportFactory;
  private config: AppConfig;
  private formatter: ValueFormatter;
  private abortController: AbortController | null = null;
  private activeRunId = 0;
  private state: SessionState = "idle";
  private current: Promise<RunResult> | null = null;

  constructor(options: DebugSessionOptions) {
    super();
    this.config = options.config;
    this.editor = options.editor;
    this.formatter = createValueFormatter(options.config.annotations.maxValueLength);
    this.createTransport = options.createTransport ?? ((launch) => new ProcessTransport(this.config.runner, launch));
  }

  getConfig(): AppConfig {
    return this.config;
  }

  // Takes effect for the next run.
  setConfig(config: AppConfig): void {
    this.config = config;
    this.formatter = createValueFormatter(config.annotations.maxValueLength);
  }

  getState(): SessionState {
    return this.state;
  }

  get runId(): number {
    return this.activeRunId;
  }

  async getSelection(): Promise<SelectionSnapshot | undefined> {
    return this.trace.read((index) => index.getSelection());
  }

  async waitForRun(): Promise<RunResult | null> {
    return this.current ? this.current : null;
  }

  async start(target: string, args: string[] = []): Promise<RunHandle> {
    const cwd = resolveRunTarget(target);

    await this.cancelAndClear();
    // Another start may have slipped in while the index was being cleared.
    this.abortController?.abort();
    this.editor.clearOutput();

    this.activeRunId += 1;
    const runId = this.activeRunId;
    const controller = new AbortController();
    this.abortController = controller;
    this.setState("starting", runId);
    this.editor.message(`debug session starting: ${cwd}`);

    const done = this.runExclusive(runId, cwd, args, controller.signal);
    this.current = done;
    return { runId, cwd, done };
  }

  async cancel(): Promise<void> {
    await this.cancelAndClear();
  }

  async refresh(): Promise<void> {
    await this.trace.read((index) => {
      for (const filename of this.editor.openFiles()) {
        this.renderFile(index, filename);
      }
    });
  }

  async refreshFile(filename: string): Promise<void> {
    const rendered = await this.trace.read((index) => {
      this.renderFile(index, filename);
      return true;
    });
    if (!rendered) {
      this.editor.setAnnotations(filename, clearedAnnotations());
    }
  }

  async onSelectionGesture(gesture: SelectionGesture): Promise<boolean> {
    if (gesture.kind === "line" && (gesture.mode === "print" || gesture.mode === "print_all")) {
      const all = gesture.mode === "print_all";
      const text = await this.trace.read((index) => this.describeLine(index, gesture, all));
      if (text) this.editor.message(text);
      return false;
    }

    const changed = await this.trace.write((index) => this.applyGesture(index, gesture));
    if (!changed) return false;

    await this.trace.read((index) => {
      for (const filename of this.editor.openFiles()) {
        this.renderFile(index, filename);
      }
      this.revealSelection(index);
    });
    return true;
  }

  private setState(state: SessionState, runId: number): void {
    this.state = state;
    this.emit("state", { state, runId } satisfies SessionStateEvent);
  }

  private async cancelAndClear(): Promise<void> {
    this.abortController?.abort();
    this.abortController = null;
    await this.trace.replace(null, () => this.clearViews());
  }

  private clearViews(): void {
    for (const filename of this.editor.openFiles()) {
      this.editor.setAnnotations(filename, clearedAnnotations());
    }
  }

  private async runExclusive(runId: number, cwd: string, args: string[], signal: AbortSignal): Promise<RunResult> {
    const release = await this.runGate.acquire();
    try {
      if (signal.aborted) return this.cancelledBeforeLaunch(runId);
      await this.trace.replace(
        new TraceIndex({
          formatter: this.formatter,
          placeholder: this.config.annotations.placeholder,
          caseInsensitive: this.config.files.caseInsensitive,
        }),
      );
      await this.refresh();
      // A cancel may land while the previous run's state is being cleared.
      if (signal.aborted) return this.cancelledBeforeLaunch(runId);
      return await this.execute(runId, cwd, args, signal);
    } finally {
      release();
      if (this.activeRunId === runId) this.setState("idle", runId);
    }
  }

  private cancelledBeforeLaunch(runId: number): RunResult {
    if (this.activeRunId === runId) this.setState("cancelled", runId);
    return { runId, status: "cancelled", exitCode: null, error: "" };
  }

  private async execute(runId: number, cwd: string, args: string[], signal: AbortSignal): Promise<RunResult> {
    const output = (text: string): void => {
      if (!signal.aborted) this.editor.writeOutput(text);
    };

    let transport: TraceTransport;
    try {
      transport = this.createTransport({ cwd, args, output });
    } catch (error) {
      const message = asErrorMessage(error);
      output(`error: ${message}\n`);
      if (this.activeRunId === runId) this.setState("finished", runId);
      return { runId, status: "failed", exitCode: null, error: message };
    }

    const onAbort = (): void => transport.cancel();
    signal.addEventListener("abort", onAbort, { once: true });
    if (signal.aborted) onAbort();
    if (this.activeRunId === runId) this.setState("running", runId);

    const scheduler = new RefreshScheduler({
      intervalMs: intervalForRate(this.config.refresh.updatesPerSecond),
      refresh: () => this.refresh(),
      onError: (error) => output(`error: refresh: ${asErrorMessage(error)}\n`),
    });

    let status: RunStatus = "finished";
    let failure = "";
    try {
      status = await this.ingest(transport, cwd, scheduler, signal, output);
    } catch (error) {
      status = "failed";
      failure = asErrorMessage(error);
      output(`error: ${failure}\n`);
      transport.cancel();
    } finally {
      await scheduler.flush();
    }

    if (this.activeRunId === runId) {
      this.setState(status === "cancelled" ? "cancelled" : "finished", runId);
    }
    const exitCode = await transport.wait();
    signal.removeEventListener("abort", onAbort);
    output(`exit status: ${exitCode === null ? "killed" : exitCode}\n`);
    return { runId, status, exitCode, error: failure };
  }

  private async ingest(
    transport: TraceTransport,
    cwd: string,
    scheduler: RefreshScheduler,
    signal: AbortSignal,
    output: (text: string) => void,
  ): Promise<RunStatus> {
    const iterator = transport.messages[Symbol.asyncIterator]();
    try {
      for (;;) {
        const next = await nextOrAbort(iterator, signal);
        if (next === ABORTED) return "cancelled";
        if (next.done) return signal.aborted ? "cancelled" : "finished";
        await this.handleMessage(next.value, transport, cwd, output);
        scheduler.notify();
      }
    } finally {
      await iterator.return?.();
    }
  }

  private async handleMessage(
    message: TraceMessage,
    transport: TraceTransport,
    cwd: string,
    output: (text: string) => void,
  ): Promise<void> {
    switch (message.type) {
      case "status":
        if (message.status !== "connected") {
          output(`error: unhandled status: ${message.status}\n`);
          return;
        }
        await this.control("request file set positions", () => transport.requestFileSetPositions(), output);
        return;
      case "files_data": {
        const files = message.files.map((file) => ({ ...file, filename: path.resolve(cwd, file.filename) }));
        // IndexError here is a protocol violation and ends the run.
        const applied = await this.trace.write((index) => {
          index.applyFileMetadata(files);
          return true;
        });
        if (applied) {
          await this.control("request start", () => transport.requestStart(), output);
        }
        return;
      }
      case "line":
        await this.applyEvents([message.event], output);
        return;
      case "lines":
        await this.applyEvents(message.events, output);
        return;
      case "error":
        throw new TransportError(message.message);
    }
  }

  private async applyEvents(events: readonly LineEventMessage[], output: (text: string) => void): Promise<void> {
    const dropped = await this.trace.write((index) => {
      const errors: string[] = [];
      for (const event of events) {
        try {
          index.applyEvent(event.fileIndex, event.lineIndex, { offset: event.offset, value: event.value });
        } catch (error) {
          if (!(error instanceof IndexError)) throw error;
          errors.push(error.message);
        }
      }
      return errors;
    });
    for (const message of dropped ?? []) {
      output(`error: ${message}\n`);
    }
  }

  private async control(label: string, request: () => Promise<void>, output: (text: string) => void): Promise<void> {
    try {
      await request();
    } catch (error) {
      output(`error: ${label}: ${asErrorMessage(error)}\n`);
    }
  }

  private renderFile(index: TraceIndex, filename: string): void {
    const fileIndex = index.fileIndexOf(filename);
    const descriptor = fileIndex === undefined ? undefined : index.descriptor(fileIndex);
    if (fileIndex === undefined || !descriptor) {
      this.editor.setAnnotations(filename, clearedAnnotations());
      return;
    }

    const resolution = index.resolveSelectionForFile(fileIndex);
    const edited = !this.editor.contentMatches(filename, descriptor.fileSize, descriptor.fileHash);
    if (edited) {
      if (resolution?.selected) index.markSelectionEdited();
      this.editor.setAnnotations(filename, { on: false, edited: true, selectedLine: -1, entries: [] });
      return;
    }

    this.editor.setAnnotations(filename, {
      on: true,
      edited: false,
      selectedLine: resolution?.selected?.lineIndex ?? -1,
      entries: resolution?.entries ?? [],
    });
  }

  private applyGesture(index: TraceIndex, gesture: SelectionGesture): boolean {
    if (gesture.kind === "global") {
      switch (gesture.mode) {
        case "clear":
          index.clearSelection();
          return true;
        case "clear_events":
          index.clearEvents();
          return true;
        default:
          return index.moveSelection(gesture.mode);
      }
    }

    const fileIndex = index.fileIndexOf(gesture.filename);
    if (fileIndex === undefined) return false;
    switch (gesture.mode) {
      case "current":
      case "current_prev":
      case "current_next":
        return index.moveSelectionWithinLine(fileIndex, gesture.lineIndex, gesture.mode);
      default:
        return false;
    }
  }

  private describeLine(index: TraceIndex, gesture: LineGesture, all: boolean): string | null {
    const fileIndex = index.fileIndexOf(gesture.filename);
    if (fileIndex === undefined) return null;
    const step = index.shownStep(fileIndex, gesture.lineIndex);
    const events = index.lineEvents(fileIndex, gesture.lineIndex);
    const shown = events[step];
    if (step < 0 || !shown) return null;

    if (!all) {
      return `annotation at offset ${gesture.offset}:\n\t${this.formatter.full(shown.payload.value)}\n`;
    }
    const entries = events.slice(0, step + 1);
    const body = entries.map((event) => `\t${this.formatter.full(event.payload.value)}\n`).join("");
    return `annotations (${entries.length} entries):\n${body}`;
  }

  private revealSelection(index: TraceIndex): void {
    const selection = index.getSelection();
    if (selection.arrivalIndex < 0) return;

    const location = selection.resolved ? selection : index.locateArrival(selection.arrivalIndex);
    if (!location) return;
    const descriptor = index.descriptor(location.fileIndex);
    if (!descriptor) return;

    const edited = selection.resolved
      ? selection.edited
      : !this.editor.contentMatches(descriptor.filename, descriptor.fileSize, descriptor.fileHash);
    if (edited) {
      this.editor.warning(new StaleSelectionError(descriptor.filename, selection.arrivalIndex).message);
      return;
    }

    // The selected event may not have been received yet.
    const event = index.eventAt(location);
    if (!event) return;
    this.editor.revealSource(descriptor.filename, event.offset);
  }
}
