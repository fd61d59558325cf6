import { mkdtemp, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { loadConfig, mergeConfig, patchConfig, saveConfig } from "../config.js";
import { DEFAULT_CONFIG } from "../defaults.js";

describe("config", () => {
  it("provides defaults for refresh, annotations, runner, and server", () => {
    const config = mergeConfig();
    expect(config.refresh.updatesPerSecond).toBe(15);
    expect(config.annotations).toEqual({ maxValueLength: 80, placeholder: " " });
    expect(config.runner).toEqual({ command: "node", args: [], protocolFd: 3 });
    expect(config.server).toEqual({ host: "127.0.0.1", port: 8790 });
    expect(config.files.caseInsensitive).toBe(DEFAULT_CONFIG.files.caseInsensitive);
  });

  it("falls back to defaults for out-of-range values", () => {
    const config = mergeConfig({
      refresh: { updatesPerSecond: -2 },
      annotations: { maxValueLength: 0, placeholder: "" },
      runner: { command: "  ", protocolFd: 1 },
      server: { host: "", port: 70_000 },
    });
    expect(config.refresh.updatesPerSecond).toBe(15);
    expect(config.annotations).toEqual({ maxValueLength: 80, placeholder: " " });
    expect(config.runner).toEqual({ command: "node", args: [], protocolFd: 3 });
    expect(config.server).toEqual({ host: "127.0.0.1", port: 8790 });
  });

  it("caps the refresh rate", () => {
    expect(mergeConfig({ refresh: { updatesPerSecond: 5000 } }).refresh.updatesPerSecond).toBe(1000);
  });

  it("loads nested sections from TOML", async () => {
    const root = await mkdtemp(path.join(os.tmpdir(), "linelens-config-"));
    const configPath = path.join(root, "config.toml");
    await writeFile(
      configPath,
      `
[refresh]
updatesPerSecond = 30

[files]
caseInsensitive = true

[annotations]
maxValueLength = 40
placeholder = "."

[runner]
command = "python3"
args = ["-u", "trace.py"]
protocolFd = 4

[server]
port = 9000
`,
      "utf8",
    );

    const config = await loadConfig(configPath);
    expect(config.refresh.updatesPerSecond).toBe(30);
    expect(config.files.caseInsensitive).toBe(true);
    expect(config.annotations).toEqual({ maxValueLength: 40, placeholder: "." });
    expect(config.runner).toEqual({ command: "python3", args: ["-u", "trace.py"], protocolFd: 4 });
    expect(config.server).toEqual({ host: "127.0.0.1", port: 9000 });
  });

  it("returns defaults when the file is missing", async () => {
    const root = await mkdtemp(path.join(os.tmpdir(), "linelens-config-"));
    const config = await loadConfig(path.join(root, "missing.toml"));
    expect(config).toEqual(mergeConfig());
  });

  it("reads back a saved config", async () => {
    const root = await mkdtemp(path.join(os.tmpdir(), "linelens-config-"));
    const configPath = path.join(root, "nested", "config.toml");
    const config = mergeConfig({
      files: { caseInsensitive: false },
      runner: { command: "python3", args: ["-u", "trace.py"], protocolFd: 5 },
    });
    await saveConfig(config, configPath);
    expect(await loadConfig(configPath)).toEqual(config);
  });

  it("patches single fields and keeps the rest", () => {
    const base = mergeConfig({ runner: { command: "python3", args: ["-u", "trace.py"] } });
    const patched = patchConfig(base, { runner: { args: ["trace.py"] }, server: { port: "not a port" }, bogus: 1 });
    expect(patched.runner).toEqual({ command: "python3", args: ["trace.py"], protocolFd: 3 });
    expect(patched.server).toEqual(base.server);
    expect(patched.refresh).toEqual(base.refresh);
  });
});
