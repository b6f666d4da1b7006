/**
 * Debug logging
 *
 * The terminal UI owns stdout while it runs, so chatty `[Tag]` logs stay off unless
 * debugging was switched on from the config (`--debug` / GRIDSKETCH_DEBUG).
 */

let enabled = false;

export function setDebugLogging(on: boolean): void {
  enabled = on;
}

export function isDebugLogging(): boolean {
  return enabled;
}

export function debugLog(tag: string, message: string, data?: unknown): void {
  if (!enabled) return;
  if (data === undefined) {
    console.log(`[${tag}] ${message}`);
  } else {
    console.log(`[${tag}] ${message}`, data);
  }
}
