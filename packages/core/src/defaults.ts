import type { AppConfig } from "@linelens/contracts";

export const DEFAULT_UPDATES_PER_SECOND = 15;

export const DEFAULT_CONFIG: AppConfig = {
  refresh: {
    updatesPerSecond: DEFAULT_UPDATES_PER_SECOND,
  },
  files: {
    caseInsensitive: process.platform === "darwin" || process.platform === "win32",
  },
  annotations: {
    maxValueLength: 80,
    placeholder: " ",
  },
  runner: {
    command: "node",
    args: [],
    protocolFd: 3,
  },
  server: {
    host: "127.0.0.1",
    port: 8790,
  },
};
