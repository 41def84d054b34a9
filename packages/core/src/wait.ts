/**
 * "Press any key" prompts with an optional countdown.
 *
 * States: idle -> waiting-for-key -> done, or idle -> counting-down -> done.
 * Non-interactive sessions and redirected input skip straight to done.
 */
import { silentLogger, type Logger } from "@conkit/shared";
import { setTimeout as delay } from "node:timers/promises";

import { clearLine, moveCursor } from "./cursor";
import type { SessionInfo } from "./environment";
import { isInputKey } from "./keys";
import type { RedirectionState } from "./probe";
import type { Terminal } from "./terminal/types";

export const DEFAULT_WAIT_MESSAGE = "Press any key to continue...";
export const DEBUG_WAIT_MESSAGE = "Press any key to quit...";
export const DEFAULT_POLL_INTERVAL_MS = 100;

const SECOND_MS = 1000;

export type WaitState = "idle" | "waiting-for-key" | "counting-down" | "done";

/** Why a wait ended. */
export type WaitOutcome = "skipped" | "key" | "timeout";

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = async (ms) => {
  await delay(ms);
};

export interface WaitContext {
  terminal: Terminal;
  redirection: RedirectionState;
  session: SessionInfo;
  /** Message used when the caller passes none. */
  defaultMessage?: string;
  pollIntervalMs?: number;
  sleep?: Sleep;
  logger?: Logger;
}

export interface WaitOptions {
  /** Prompt to show; `""` shows nothing, `undefined` the default prompt. */
  message?: string;
  /** Seconds to wait before giving up; negative waits indefinitely. */
  timeout?: number;
  /**
   * Draw one dot per second of timeout and erase one as each passes. Only as
   * many dots as fit on the line are drawn.
   */
  showDots?: boolean;
}

/**
 * Drop key presses that arrived before anyone asked for them.
 */
export async function clearKeyBuffer(
  terminal: Terminal,
  redirection: RedirectionState
): Promise<void> {
  if (redirection.inputRedirected) {
    return;
  }
  while (terminal.keyAvailable()) {
    await terminal.readKey();
  }
}

async function takeQualifyingKey(terminal: Terminal): Promise<boolean> {
  if (!terminal.keyAvailable()) {
    return false;
  }
  const key = await terminal.readKey();
  return isInputKey(key.name);
}

function eraseDot(terminal: Terminal, redirection: RedirectionState): void {
  moveCursor(terminal, redirection, -1);
  terminal.write(" ");
  moveCursor(terminal, redirection, -1);
}

/**
 * Wait for a key press if a person is at the keyboard.
 *
 * With a timeout, polls in slices of `pollIntervalMs` and gives up once the
 * timeout has elapsed; the key buffer is drained before and after. Without a
 * timeout, reads keys until one that is not a modifier or media key arrives.
 */
export async function wait(
  ctx: WaitContext,
  options: WaitOptions = {}
): Promise<WaitOutcome> {
  const { terminal, redirection, session } = ctx;
  const logger = ctx.logger ?? silentLogger;
  let state: WaitState = "idle";
  const transition = (next: WaitState): void => {
    logger.debug("Wait state change", { from: state, to: next });
    state = next;
  };

  if (!session.interactive || redirection.inputRedirected) {
    transition("done");
    return "skipped";
  }

  const message = options.message ?? ctx.defaultMessage ?? DEFAULT_WAIT_MESSAGE;
  const timeout = options.timeout ?? -1;
  const showDots = options.showDots ?? false;
  const slice = Math.max(ctx.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS, 1);
  const pause = ctx.sleep ?? sleep;

  await terminal.startKeyCapture();
  try {
    if (message !== "") {
      clearLine(terminal, redirection);
      terminal.write(message);
    }

    if (timeout < 0) {
      transition("waiting-for-key");
      await clearKeyBuffer(terminal, redirection);
      let key = await terminal.readKey();
      while (!isInputKey(key.name)) {
        logger.debug("Ignoring key", { key: key.name });
        key = await terminal.readKey();
      }
      transition("done");
      return "key";
    }

    transition("counting-down");
    const seconds = Math.trunc(timeout);
    // One dot per second, as many as fit on the rest of the line
    let dots = showDots
      ? Math.min(
          seconds,
          Math.max(terminal.columns - 1 - terminal.getCursorColumn(), 0)
        )
      : 0;
    if (dots > 0) {
      terminal.write(".".repeat(dots));
    }

    const timeoutMs = seconds * SECOND_MS;
    let elapsed = 0;
    // Drawn dots stand for the last seconds of the countdown
    let nextSecond = (seconds - dots + 1) * SECOND_MS;
    let pressed = false;

    await clearKeyBuffer(terminal, redirection);
    while (elapsed < timeoutMs) {
      if (await takeQualifyingKey(terminal)) {
        pressed = true;
        break;
      }
      await pause(slice);
      elapsed += slice;
      if (dots > 0 && elapsed >= nextSecond) {
        nextSecond += SECOND_MS;
        dots -= 1;
        eraseDot(terminal, redirection);
      }
    }
    await clearKeyBuffer(terminal, redirection);

    if (message !== "") {
      terminal.write("\n");
    }
    transition("done");
    return pressed ? "key" : "timeout";
  } finally {
    terminal.stopKeyCapture();
  }
}

/**
 * Wait once before exit when a debugger is attached, so the last output
 * stays readable.
 */
export async function waitIfDebug(ctx: WaitContext): Promise<WaitOutcome> {
  if (!ctx.session.debuggerAttached) {
    return "skipped";
  }
  return wait(ctx, { message: DEBUG_WAIT_MESSAGE });
}
