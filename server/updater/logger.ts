import type { UpdaterLogger } from "./types.js";

export function createConsoleLogger(tag = "updater"): UpdaterLogger {
  return {
    info: (message) => console.log(`[${tag}] ${message}`),
    warn: (message) => console.warn(`[${tag}] ${message}`),
    error: (message) => console.error(`[${tag}-error] ${message}`)
  };
}
