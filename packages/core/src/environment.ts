import { url as inspectorUrl } from "node:inspector";

export interface SessionInfo {
  /** The process is driven by a person rather than automation. */
  readonly interactive: boolean;
  readonly debuggerAttached: boolean;
}

function isFalsyFlag(value: string): boolean {
  const lower = value.toLowerCase();
  return lower === "" || lower === "0" || lower === "false";
}

/**
 * Treat CI runners and dumb terminals as non-interactive.
 */
export function isInteractiveSession(
  env: NodeJS.ProcessEnv = process.env
): boolean {
  if (env.CI !== undefined && !isFalsyFlag(env.CI)) {
    return false;
  }
  if (env.TERM === "dumb") {
    return false;
  }
  return true;
}

export function isDebuggerAttached(): boolean {
  return inspectorUrl() !== undefined;
}

export function detectSession(
  env: NodeJS.ProcessEnv = process.env
): SessionInfo {
  return Object.freeze({
    interactive: isInteractiveSession(env),
    debuggerAttached: isDebuggerAttached(),
  });
}
