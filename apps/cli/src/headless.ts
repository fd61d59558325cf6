import { readFileSync } from "node:fs";
import path from "node:path";
import type { AnnotationState, AppConfig, RunResult } from "@linelens/contracts";
import {
  asErrorMessage,
  clearedAnnotations,
  contentDigest,
  DebugSession,
  digestMatches,
  type EditorBridge,
  type TransportFactory,
} from "@linelens/core";

type Write = (text: string) => void;

function withNewline(text: string): string {
  return text.endsWith("\n") ? text : `${text}\n`;
}

/** Terminal stand-in for an editor: program output goes to stdout, notices to stderr. */
export class ConsoleEditor implements EditorBridge {
  private readonly files: string[];
  private readonly annotations = new Map<string, AnnotationState>();

  constructor(
    files: string[],
    private readonly out: Write,
    private readonly err: Write,
  ) {
    this.files = files.map((file) => path.resolve(file));
  }

  annotationsFor(filename: string): AnnotationState {
    return this.annotations.get(filename) ?? clearedAnnotations();
  }

  openFiles(): string[] {
    return [...this.files];
  }

  contentMatches(filename: string, size: number, hash: string): boolean {
    try {
      return digestMatches(contentDigest(readFileSync(filename)), size, hash);
    } catch {
      return false;
    }
  }

  setAnnotations(filename: string, state: AnnotationState): void {
    this.annotations.set(filename, state);
  }

  // No cursor to move in a terminal.
  revealSource(): void {}

  message(text: string): void {
    this.err(withNewline(text));
  }

  warning(text: string): void {
    this.err(withNewline(`warning: ${text}`));
  }

  // Output already written stays on the terminal.
  clearOutput(): void {}

  writeOutput(text: string): void {
    this.out(text);
  }
}

export function formatAnnotations(filename: string, state: AnnotationState): string {
  if (state.edited) return `${filename}: changed since the run started\n`;
  if (!state.on) return `${filename}: no annotations\n`;

  const width = String(state.entries.length).length;
  const lines = state.entries.flatMap((entry, lineIndex) => {
    if (!entry) return [];
    const marker = lineIndex === state.selectedLine ? ">" : " ";
    return [`${String(lineIndex + 1).padStart(width)}${marker} ${entry.text}`];
  });
  return `${filename}:\n${lines.map((line) => `${line}\n`).join("")}`;
}

export interface HeadlessRunOptions {
  config: AppConfig;
  target: string;
  args: string[];
  files: string[];
  out: Write;
  err: Write;
  createTransport?: TransportFactory;
  signal?: AbortSignal;
}

/** Runs one program to completion, then prints the final annotations of each file. */
export async function runHeadless(options: HeadlessRunOptions): Promise<RunResult> {
  const editor = new ConsoleEditor(options.files, options.out, options.err);
  const session = new DebugSession({
    config: options.config,
    editor,
    ...(options.createTransport ? { createTransport: options.createTransport } : {}),
  });

  const handle = await session.start(options.target, options.args);
  const onAbort = (): void => {
    session.cancel().catch((error: unknown) => options.err(`error: cancel: ${asErrorMessage(error)}\n`));
  };
  options.signal?.addEventListener("abort", onAbort, { once: true });

  const result = await handle.done;
  options.signal?.removeEventListener("abort", onAbort);
  for (const filename of editor.openFiles()) {
    options.out(formatAnnotations(filename, editor.annotationsFor(filename)));
  }
  return result;
}

export function exitCodeFor(result: RunResult): number {
  if (result.status === "finished" && result.exitCode !== null) return result.exitCode;
  return 1;
}
