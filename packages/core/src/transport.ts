import { spawn, type ChildProcess } from "node:child_process";
import { createInterface } from "node:readline";
import { Duplex } from "node:stream";
import type {
  ControlRequest,
  FileDescriptor,
  LineEventMessage,
  RunnerConfig,
  TraceMessage,
  TraceValue,
} from "@linelens/contracts";
import { asErrorMessage, TransportError } from "./errors.js";
import { AsyncMessageQueue } from "./messageQueue.js";
import { asRecord, isNonNegativeInt } from "./utils.js";

/** The launched, instrumented program as seen by the session controller. */
export interface TraceTransport {
  readonly messages: AsyncIterable<TraceMessage>;
  requestFileSetPositions(): Promise<void>;
  requestStart(): Promise<void>;
  cancel(): void;
  wait(): Promise<number | null>;
}

export interface TransportLaunchOptions {
  cwd: string;
  args: string[];
  output: (text: string) => void;
}

export type TransportFactory = (options: TransportLaunchOptions) => TraceTransport;

function isTraceValue(value: unknown): value is TraceValue {
  if (value === null) return true;
  switch (typeof value) {
    case "string":
    case "boolean":
      return true;
    case "number":
      return Number.isFinite(value);
    case "object":
      if (Array.isArray(value)) return value.every(isTraceValue);
      return Object.values(asRecord(value)).every(isTraceValue);
    default:
      return false;
  }
}

function decodeLineEvent(value: unknown): LineEventMessage {
  const record = asRecord(value);
  const { fileIndex, lineIndex, offset } = record;
  if (typeof fileIndex !== "number" || typeof lineIndex !== "number" || !isNonNegativeInt(offset)) {
    throw new TransportError(`malformed line event: ${JSON.stringify(value)}`);
  }
  const payload = record.value ?? null;
  if (!isTraceValue(payload)) {
    throw new TransportError("malformed line event value");
  }
  return { fileIndex, lineIndex, offset, value: payload };
}

function decodeFileDescriptor(value: unknown): FileDescriptor {
  const record = asRecord(value);
  const { fileIndex, filename, fileSize, fileHash, lineCount } = record;
  if (
    typeof fileIndex !== "number" ||
    typeof filename !== "string" ||
    !isNonNegativeInt(fileSize) ||
    typeof fileHash !== "string" ||
    typeof lineCount !== "number"
  ) {
    throw new TransportError(`malformed file descriptor: ${JSON.stringify(value)}`);
  }
  return { fileIndex, filename, fileSize, fileHash, lineCount };
}

/**
 * Decodes one protocol line. Index ranges are not checked here: that is the
 * trace index's job, and a bad index must not end the run.
 */
export function decodeTraceMessage(line: string): TraceMessage {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch (error) {
    throw new TransportError(`decode: ${asErrorMessage(error)}`, { cause: error });
  }
  const record = asRecord(parsed);
  switch (record.type) {
    case "status":
      if (typeof record.status !== "string") break;
      return { type: "status", status: record.status };
    case "files_data":
      if (!Array.isArray(record.files)) break;
      return { type: "files_data", files: record.files.map(decodeFileDescriptor) };
    case "line":
      return { type: "line", event: decodeLineEvent(record.event) };
    case "lines":
      if (!Array.isArray(record.events)) break;
      return { type: "lines", events: record.events.map(decodeLineEvent) };
    case "error":
      return { type: "error", message: typeof record.message === "string" ? record.message : "unknown error" };
    default:
      break;
  }
  throw new TransportError(`unexpected message: ${line.slice(0, 200)}`);
}

export function encodeControlRequest(request: ControlRequest): string {
  return `${JSON.stringify(request)}\n`;
}

/**
 * Runs the instrumented program as a child process. Its stdout and stderr are
 * run output; trace messages travel as newline-delimited JSON on an extra pipe.
 */
export class ProcessTransport implements TraceTransport {
  readonly messages = new AsyncMessageQueue<TraceMessage>();
  private readonly child: ChildProcess;
  private readonly channel: Duplex | null;
  private readonly exited: Promise<number | null>;

  constructor(runner: RunnerConfig, options: TransportLaunchOptions) {
    const fd = Math.max(3, runner.protocolFd);
    const stdio: Array<"ignore" | "pipe"> = ["ignore", "pipe", "pipe"];
    while (stdio.length < fd) stdio.push("ignore");
    stdio.push("pipe");

    this.child = spawn(runner.command, [...runner.args, ...options.args], { cwd: options.cwd, stdio });
    this.exited = new Promise((resolve) => {
      this.child.once("close", (code) => resolve(code));
      this.child.once("error", () => resolve(null));
    });

    // Decoding on the stream keeps multi-byte characters split across chunks intact.
    for (const stream of [this.child.stdout, this.child.stderr]) {
      stream?.setEncoding("utf8");
      stream?.on("data", (chunk: string) => options.output(chunk));
    }
    this.child.once("error", (error) => {
      this.messages.fail(new TransportError(`launch ${runner.command}: ${error.message}`, { cause: error }));
    });

    const channel = this.child.stdio[fd];
    this.channel = channel instanceof Duplex ? channel : null;
    if (!this.channel) {
      this.messages.fail(new TransportError(`no protocol pipe on fd ${fd}`));
      return;
    }
    this.channel.on("error", (error: Error) => {
      // The program may close its end before reading control requests; send() reports that.
      if ("code" in error && error.code === "EPIPE") return;
      this.messages.fail(new TransportError(`read: ${error.message}`, { cause: error }));
    });

    const lines = createInterface({ input: this.channel, crlfDelay: Infinity });
    lines.on("line", (line) => {
      if (!line.trim()) return;
      try {
        this.messages.push(decodeTraceMessage(line));
      } catch (error) {
        this.messages.fail(error instanceof TransportError ? error : new TransportError(asErrorMessage(error)));
        lines.close();
      }
    });
    lines.on("close", () => this.messages.close());
  }

  requestFileSetPositions(): Promise<void> {
    return this.send({ type: "request_file_set_positions" });
  }

  requestStart(): Promise<void> {
    return this.send({ type: "request_start" });
  }

  cancel(): void {
    if (this.child.exitCode === null && this.child.signalCode === null) {
      this.child.kill("SIGTERM");
    }
  }

  wait(): Promise<number | null> {
    return this.exited;
  }

  private send(request: ControlRequest): Promise<void> {
    const channel = this.channel;
    if (!channel || !channel.writable) {
      return Promise.reject(new TransportError("protocol pipe is closed"));
    }
    return new Promise((resolve, reject) => {
      channel.write(encodeControlRequest(request), (error) => {
        if (error) reject(error);
        else resolve();
      });
    });
  }
}
