import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import os from "node:os";
import TOML, { type JsonMap } from "@iarna/toml";
import type {
  AnnotationsConfig,
  AppConfig,
  FilesConfig,
  RefreshConfig,
  RunnerConfig,
  ServerConfig,
} from "@linelens/contracts";
import { DEFAULT_CONFIG } from "./defaults.js";
import { asRecord } from "./utils.js";

export const DEFAULT_CONFIG_PATH = path.join(os.homedir(), ".linelens", "config.toml");

export type PartialAppConfigInput = { [K in keyof AppConfig]?: Partial<AppConfig[K]> };

type Section = Record<string, unknown>;

const SECTIONS = ["refresh", "files", "annotations", "runner", "server"] as const;

function toFiniteNumber(value: unknown): number | null {
  return typeof value === "number" && Number.isFinite(value) ? value : null;
}

function positiveIntOrDefault(value: unknown, fallback: number): number {
  const numeric = toFiniteNumber(value);
  if (numeric === null || numeric <= 0) return fallback;
  return Math.round(numeric);
}

function nonEmptyStringOrDefault(value: unknown, fallback: string): string {
  return typeof value === "string" && value.trim() ? value : fallback;
}

function mergeRefresh(input: Section): RefreshConfig {
  const defaults = DEFAULT_CONFIG.refresh;
  const rate = toFiniteNumber(input.updatesPerSecond);
  return {
    updatesPerSecond: rate !== null && rate > 0 ? Math.min(rate, 1000) : defaults.updatesPerSecond,
  };
}

function mergeFiles(input: Section): FilesConfig {
  const defaults = DEFAULT_CONFIG.files;
  return {
    caseInsensitive: typeof input.caseInsensitive === "boolean" ? input.caseInsensitive : defaults.caseInsensitive,
  };
}

function mergeAnnotations(input: Section): AnnotationsConfig {
  const defaults = DEFAULT_CONFIG.annotations;
  return {
    maxValueLength: positiveIntOrDefault(input.maxValueLength, defaults.maxValueLength),
    // A placeholder of only spaces is valid, so only the type is checked.
    placeholder:
      typeof input.placeholder === "string" && input.placeholder.length > 0 ? input.placeholder : defaults.placeholder,
  };
}

function mergeRunner(input: Section): RunnerConfig {
  const defaults = DEFAULT_CONFIG.runner;
  const args = Array.isArray(input.args)
    ? input.args.filter((arg): arg is string => typeof arg === "string")
    : defaults.args;
  return {
    command: nonEmptyStringOrDefault(input.command, defaults.command),
    args,
    protocolFd: Math.max(3, positiveIntOrDefault(input.protocolFd, defaults.protocolFd)),
  };
}

function mergeServer(input: Section): ServerConfig {
  const defaults = DEFAULT_CONFIG.server;
  const port = positiveIntOrDefault(input.port, defaults.port);
  return {
    host: nonEmptyStringOrDefault(input.host, defaults.host),
    port: port <= 65_535 ? port : defaults.port,
  };
}

/** Validates an untrusted config document, field by field. */
export function parseConfig(input: unknown): AppConfig {
  const record = asRecord(input);
  return {
    refresh: mergeRefresh(asRecord(record.refresh)),
    files: mergeFiles(asRecord(record.files)),
    annotations: mergeAnnotations(asRecord(record.annotations)),
    runner: mergeRunner(asRecord(record.runner)),
    server: mergeServer(asRecord(record.server)),
  };
}

export function mergeConfig(input?: PartialAppConfigInput): AppConfig {
  return parseConfig(input);
}

// Fields missing from the patch keep their current value.
export function patchConfig(base: AppConfig, patch: unknown): AppConfig {
  const record = asRecord(patch);
  const merged: Record<string, Section> = {};
  for (const section of SECTIONS) {
    merged[section] = { ...base[section], ...asRecord(record[section]) };
  }
  return parseConfig(merged);
}

function toTomlTable(config: AppConfig): JsonMap {
  return {
    refresh: { ...config.refresh },
    files: { ...config.files },
    annotations: { ...config.annotations },
    runner: { ...config.runner, args: [...config.runner.args] },
    server: { ...config.server },
  };
}

export async function loadConfig(configPath = DEFAULT_CONFIG_PATH): Promise<AppConfig> {
  try {
    const raw = await readFile(configPath, "utf8");
    return parseConfig(TOML.parse(raw));
  } catch {
    return mergeConfig();
  }
}

export async function saveConfig(config: AppConfig, configPath = DEFAULT_CONFIG_PATH): Promise<void> {
  const dir = path.dirname(configPath);
  await mkdir(dir, { recursive: true });
  await writeFile(configPath, TOML.stringify(toTomlTable(config)), "utf8");
}
