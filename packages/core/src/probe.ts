/**
 * Stream capability probe.
 *
 * A standard stream counts as redirected when its descriptor is not a
 * character device, or when it is one but not a terminal (the null device is
 * a character device too).
 */
import type { Logger } from "@conkit/shared";
import { fstatSync } from "node:fs";
import { isatty } from "node:tty";

export const STDIN_FD = 0;
export const STDOUT_FD = 1;

export interface RedirectionState {
  readonly inputRedirected: boolean;
  readonly outputRedirected: boolean;
}

/** OS queries the probe relies on. */
export interface HandleInspector {
  isCharacterDevice(fd: number): boolean;
  isTerminal(fd: number): boolean;
}

export const nodeHandleInspector: HandleInspector = {
  isCharacterDevice: (fd) => fstatSync(fd).isCharacterDevice(),
  isTerminal: (fd) => isatty(fd),
};

export interface ProbeOptions {
  inspector?: HandleInspector;
  logger?: Logger;
}

/**
 * Classify one descriptor. Any failure to query it is treated as redirected,
 * which switches interactive behavior off.
 */
export function isStreamRedirected(
  fd: number,
  options: ProbeOptions = {}
): boolean {
  const inspector = options.inspector ?? nodeHandleInspector;
  try {
    return !inspector.isCharacterDevice(fd) || !inspector.isTerminal(fd);
  } catch (error) {
    options.logger?.debug("Stream probe failed, assuming redirected", {
      fd,
      error: error instanceof Error ? error.message : String(error),
    });
    return true;
  }
}

/**
 * Probe stdin and stdout once. The returned state is frozen: redirection is
 * fixed when the process starts.
 */
export function detectRedirection(
  options: ProbeOptions = {}
): RedirectionState {
  const state = Object.freeze({
    inputRedirected: isStreamRedirected(STDIN_FD, options),
    outputRedirected: isStreamRedirected(STDOUT_FD, options),
  });
  options.logger?.debug("Detected stream redirection", { ...state });
  return state;
}

let processState: RedirectionState | null = null;

/**
 * Redirection state of the current process, probed on first access and
 * cached for the process lifetime. Options only apply to that first probe.
 */
export function getProcessRedirection(
  options: ProbeOptions = {}
): RedirectionState {
  if (!processState) {
    processState = detectRedirection(options);
  }
  return processState;
}

/**
 * Forget the cached state (useful for testing).
 */
export function resetProcessRedirection(): void {
  processState = null;
}
