export * from "./config.js";
export * from "./defaults.js";
export * from "./errors.js";
export * from "./format.js";
export * from "./lineEvents.js";
export * from "./messageQueue.js";
export * from "./refreshScheduler.js";
export * from "./rwLock.js";
export * from "./session.js";
export * from "./traceIndex.js";
export * from "./traceState.js";
export * from "./transport.js";
export * from "./utils.js";
