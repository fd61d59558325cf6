export type TraceValue = null | boolean | number | string | TraceValue[] | { [key: string]: TraceValue };

export type SessionState = "idle" | "starting" | "running" | "cancelled" | "finished";
export type RunStatus = "finished" | "cancelled" | "failed";

export type SelectionMove = "first" | "last" | "prev" | "next";
export type LineStepMode = "current" | "current_prev" | "current_next";
export type LineGestureMode = LineStepMode | "print" | "print_all";
export type GlobalGestureMode = SelectionMove | "clear" | "clear_events";

export interface FileDescriptor {
  fileIndex: number;
  filename: string;
  fileSize: number;
  fileHash: string;
  lineCount: number;
}

export interface LineEventMessage {
  fileIndex: number;
  lineIndex: number;
  offset: number;
  value: TraceValue;
}

export interface StatusMessage {
  type: "status";
  status: string;
}

export interface FilesDataMessage {
  type: "files_data";
  files: FileDescriptor[];
}

export interface LineMessage {
  type: "line";
  event: LineEventMessage;
}

export interface LinesMessage {
  type: "lines";
  events: LineEventMessage[];
}

export interface ErrorMessage {
  type: "error";
  message: string;
}

export type TraceMessage = StatusMessage | FilesDataMessage | LineMessage | LinesMessage | ErrorMessage;

export type ControlRequest = { type: "request_file_set_positions" } | { type: "request_start" };

export interface Annotation {
  offset: number;
  text: string;
}

export interface AnnotationState {
  on: boolean;
  edited: boolean;
  selectedLine: number;
  entries: (Annotation | null)[];
}

export interface LineGesture {
  kind: "line";
  filename: string;
  lineIndex: number;
  offset: number;
  mode: LineGestureMode;
}

export interface GlobalGesture {
  kind: "global";
  mode: GlobalGestureMode;
}

export type SelectionGesture = LineGesture | GlobalGesture;

export interface SelectionSnapshot {
  arrivalIndex: number;
  lastArrivalIndex: number;
  fileIndex: number;
  lineIndex: number;
  lineStep: number;
  edited: boolean;
  resolved: boolean;
}

export interface RunResult {
  runId: number;
  status: RunStatus;
  exitCode: number | null;
  error: string;
}

export interface RefreshConfig {
  updatesPerSecond: number;
}

export interface FilesConfig {
  caseInsensitive: boolean;
}

export interface AnnotationsConfig {
  maxValueLength: number;
  placeholder: string;
}

export interface RunnerConfig {
  command: string;
  args: string[];
  protocolFd: number;
}

export interface ServerConfig {
  host: string;
  port: number;
}

export interface AppConfig {
  refresh: RefreshConfig;
  files: FilesConfig;
  annotations: AnnotationsConfig;
  runner: RunnerConfig;
  server: ServerConfig;
}

export interface StreamEnvelope {
  id: string;
  type:
    | "snapshot"
    | "annotations"
    | "reveal"
    | "message"
    | "warning"
    | "output"
    | "output_cleared"
    | "session_state"
    | "heartbeat";
  version: number;
  payload: Record<string, unknown>;
}
