#!/usr/bin/env tsx
import { Command } from "commander";
import { asRecord, DEFAULT_CONFIG_PATH, expandHome, loadConfig, patchConfig, saveConfig } from "@linelens/core";
import { runServer } from "@linelens/server";
import { exitCodeFor, runHeadless } from "./headless.js";

function parseValue(input: string): unknown {
  if (input === "true") return true;
  if (input === "false") return false;
  if (input.startsWith("[")) {
    try {
      return JSON.parse(input);
    } catch {
      return input;
    }
  }
  const numeric = Number(input);
  if (!Number.isNaN(numeric) && input.trim() !== "") return numeric;
  return input;
}

function setPath(target: Record<string, unknown>, dottedKey: string, value: unknown): void {
  const parts = dottedKey.split(".").filter(Boolean);
  const lastKey = parts.pop();
  if (!lastKey) return;

  let cursor = target;
  for (const key of parts) {
    const child = asRecord(cursor[key]);
    cursor[key] = child;
    cursor = child;
  }
  cursor[lastKey] = value;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function configPathOption(): string {
  return expandHome(program.opts<{ config: string }>().config);
}

async function serve(): Promise<void> {
  const opts = program.opts<{ host?: string; port?: string }>();
  await runServer({
    configPath: configPathOption(),
    ...(opts.host ? { host: opts.host } : {}),
    ...(opts.port ? { port: Number(opts.port) } : {}),
  });
}

const program = new Command();
program.name("linelens").description("Annotate source lines with values recorded by a running program");
program.option("--config <path>", "Config path", process.env.LINELENS_CONFIG ?? DEFAULT_CONFIG_PATH);
program.option("--host <host>", "Server host");
program.option("--port <port>", "Server port");
program.addHelpText(
  "after",
  `
Examples:
  $ linelens serve --port 8790
  $ linelens run ./demo trace.js --file ./demo/main.js
  $ linelens config set refresh.updatesPerSecond 30
`,
);

program.command("serve").description("Start the HTTP bridge for editor views").action(serve);

program
  .command("run <target> [args...]")
  .description("Run a program headless and print the final annotations")
  .option("--file <path>", "Print annotations for this file (repeatable)", collect, [])
  .action(async (target: string, args: string[], opts: { file: string[] }) => {
    const config = await loadConfig(configPathOption());
    const controller = new AbortController();
    const onSigint = (): void => controller.abort();
    process.once("SIGINT", onSigint);

    const result = await runHeadless({
      config,
      target,
      args,
      files: opts.file,
      out: (text) => process.stdout.write(text),
      err: (text) => process.stderr.write(text),
      signal: controller.signal,
    });
    process.off("SIGINT", onSigint);
    if (result.error) console.error(`run failed: ${result.error}`);
    process.exitCode = exitCodeFor(result);
  });

const configCmd = program.command("config").description("Configuration");

configCmd.command("get").option("--json", "JSON output").action(async (opts: { json?: boolean }) => {
  const config = await loadConfig(configPathOption());
  console.log(JSON.stringify(config, null, opts.json ? undefined : 2));
});

configCmd.command("set <key> <value>").action(async (key: string, value: string) => {
  const configPath = configPathOption();
  const config = await loadConfig(configPath);
  const patch: Record<string, unknown> = {};
  setPath(patch, key, parseValue(value));
  await saveConfig(patchConfig(config, patch), configPath);
  console.log(`updated ${key}`);
});

program.action(serve);

program.parseAsync(process.argv).catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(message);
  process.exitCode = 1;
});
