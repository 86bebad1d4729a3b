// Diagnostics go to stderr: standard output may carry the photon list.
const DEBUG_LOGS = process.env.GRISU_DEBUG === "true" || process.env.DEBUG === "true";

export function debugLog(...args: unknown[]): void {
  if (DEBUG_LOGS) console.error(...args);
}

export function debugWarn(...args: unknown[]): void {
  if (DEBUG_LOGS) console.warn(...args);
}

export function logError(...args: unknown[]): void {
  console.error(...args);
}
