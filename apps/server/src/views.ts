import { EventEmitter } from "node:events";
import { readFileSync } from "node:fs";
import { readFile } from "node:fs/promises";
import path from "node:path";
import chokidar, { type FSWatcher } from "chokidar";
import type { AnnotationState, StreamEnvelope } from "@linelens/contracts";
import {
  asErrorMessage,
  clearedAnnotations,
  contentDigest,
  digestMatches,
  type ContentDigest,
  type EditorBridge,
  type SessionStateEvent,
} from "@linelens/core";

export interface FileView {
  filename: string;
  digest: ContentDigest | null;
  annotations: AnnotationState;
}

export interface EditorViewsOptions {
  watch?: boolean;
}

export interface EditorViewsEvent {
  envelope: StreamEnvelope;
}

async function readDigest(filename: string): Promise<ContentDigest | null> {
  try {
    return contentDigest(await readFile(filename));
  } catch {
    return null;
  }
}

function readDigestSync(filename: string): ContentDigest | null {
  try {
    return contentDigest(readFileSync(filename));
  } catch {
    return null;
  }
}

/**
 * The open file views behind the web UI. Annotations pushed by the session are
 * kept per view and broadcast as stream envelopes; a view's content digest is
 * recomputed whenever the file changes on disk.
 */
export class EditorViews extends EventEmitter implements EditorBridge {
  private readonly views = new Map<string, FileView>();
  private readonly watchEnabled: boolean;
  private watcher: FSWatcher | null = null;
  private streamVersion = 0;
  private output = "";

  constructor(options: EditorViewsOptions = {}) {
    super();
    this.watchEnabled = options.watch ?? true;
  }

  list(): FileView[] {
    return Array.from(this.views.values(), (view) => ({ ...view }));
  }

  get(filename: string): FileView | undefined {
    return this.views.get(path.resolve(filename));
  }

  getOutput(): string {
    return this.output;
  }

  async open(filename: string): Promise<FileView> {
    const resolved = path.resolve(filename);
    const existing = this.views.get(resolved);
    if (existing) return existing;

    const view: FileView = { filename: resolved, digest: await readDigest(resolved), annotations: clearedAnnotations() };
    this.views.set(resolved, view);
    this.watch(resolved);
    return view;
  }

  close(filename: string): boolean {
    const resolved = path.resolve(filename);
    if (!this.views.delete(resolved)) return false;
    this.watcher?.unwatch(resolved);
    return true;
  }

  async stop(): Promise<void> {
    if (this.watcher) {
      await this.watcher.close();
      this.watcher = null;
    }
  }

  /** Re-reads a view's content; returns false when the view is not open. */
  async rehash(filename: string): Promise<boolean> {
    const view = this.views.get(path.resolve(filename));
    if (!view) return false;
    view.digest = await readDigest(view.filename);
    return true;
  }

  openFiles(): string[] {
    return Array.from(this.views.keys());
  }

  contentMatches(filename: string, size: number, hash: string): boolean {
    const view = this.views.get(filename);
    const digest = view ? view.digest : readDigestSync(filename);
    return digestMatches(digest, size, hash);
  }

  setAnnotations(filename: string, state: AnnotationState): void {
    const view = this.views.get(filename);
    if (view) view.annotations = state;
    this.emitStream("annotations", { filename, state });
  }

  revealSource(filename: string, offset: number): void {
    this.emitStream("reveal", { filename, offset });
  }

  message(text: string): void {
    this.emitStream("message", { text });
  }

  warning(text: string): void {
    this.emitStream("warning", { text });
  }

  clearOutput(): void {
    this.output = "";
    this.emitStream("output_cleared", {});
  }

  writeOutput(text: string): void {
    this.output += text;
    this.emitStream("output", { text });
  }

  sessionState(event: SessionStateEvent): void {
    this.emitStream("session_state", { state: event.state, runId: event.runId });
  }

  snapshot(): StreamEnvelope {
    return {
      id: String(this.streamVersion),
      type: "snapshot",
      version: this.streamVersion,
      payload: { views: this.list(), output: this.output },
    };
  }

  private watch(filename: string): void {
    if (!this.watchEnabled) return;
    if (this.watcher) {
      this.watcher.add(filename);
      return;
    }
    this.watcher = chokidar.watch(filename, {
      ignoreInitial: true,
      persistent: true,
      awaitWriteFinish: {
        stabilityThreshold: 50,
        pollInterval: 40,
      },
    });
    const onDirty = (rawPath: string): void => {
      const resolved = path.resolve(rawPath);
      this.rehash(resolved).then(
        (open) => {
          if (open) this.emit("changed", resolved);
        },
        (error: unknown) => this.warning(`rehash ${resolved}: ${asErrorMessage(error)}`),
      );
    };
    this.watcher.on("change", onDirty);
    this.watcher.on("unlink", onDirty);
    this.watcher.on("error", (error: unknown) => this.warning(`watch: ${asErrorMessage(error)}`));
  }

  private emitStream(type: StreamEnvelope["type"], payload: Record<string, unknown>): void {
    this.streamVersion += 1;
    const envelope: StreamEnvelope = {
      id: String(this.streamVersion),
      type,
      version: this.streamVersion,
      payload,
    };
    this.emit("stream", { envelope } satisfies EditorViewsEvent);
  }
}
