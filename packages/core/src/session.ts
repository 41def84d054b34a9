/**
 * Terminal session: one place that knows the stream state and hands it to
 * layout, cursor, formatting and wait helpers.
 */
import { silentLogger, type Logger } from "@conkit/shared";

import { withForegroundColor } from "./color-scope";
import { clearLine, moveCursor } from "./cursor";
import { detectSession, type SessionInfo } from "./environment";
import { plainClassifier, writeFormatted, type CharClassifier } from "./format";
import { formatWrapped, formatWrappedText } from "./layout/wrap";
import { getProcessRedirection, type RedirectionState } from "./probe";
import { DEFAULT_CONFIG, type ConkitConfig } from "./schema/config";
import { NodeTerminal } from "./terminal/node-terminal";
import type { ConsoleColor, Terminal } from "./terminal/types";
import {
  clearKeyBuffer,
  wait,
  waitIfDebug,
  type Sleep,
  type WaitContext,
  type WaitOptions,
  type WaitOutcome,
} from "./wait";

export interface TerminalSessionOptions {
  terminal?: Terminal;
  redirection?: RedirectionState;
  session?: SessionInfo;
  config?: ConkitConfig;
  logger?: Logger;
  sleep?: Sleep;
}

export interface WrapOptions {
  /** Align continuation lines to the last double space. */
  tableMode?: boolean;
  /** Override the detected width. */
  width?: number;
}

export interface TerminalSession {
  readonly terminal: Terminal;
  readonly redirection: RedirectionState;
  readonly info: SessionInfo;

  /** Width wrapping uses: the window, or the fallback when redirected. */
  wrapWidth(): number;
  formatWrapped(input: string, options?: WrapOptions): string;
  writeWrapped(text: string, options?: WrapOptions): void;
  writeWrappedFormatted(
    text: string,
    classify: CharClassifier,
    options?: WrapOptions
  ): void;
  writeFormatted(text: string, classify?: CharClassifier): void;

  moveCursor(count: number): void;
  clearLine(): void;

  withColor<T>(color: ConsoleColor, fn: () => T): T;

  clearKeyBuffer(): Promise<void>;
  wait(options?: WaitOptions): Promise<WaitOutcome>;
  waitIfDebug(): Promise<WaitOutcome>;

  /**
   * Report an error in red on stderr, pause if a debugger is attached, and
   * resolve to `exitCode` for the caller to exit with.
   */
  exitError(message: string, exitCode: number): Promise<number>;
}

export function createTerminalSession(
  options: TerminalSessionOptions = {}
): TerminalSession {
  const logger = options.logger ?? silentLogger;
  const config = options.config ?? DEFAULT_CONFIG;
  const terminal = options.terminal ?? new NodeTerminal();
  const redirection = options.redirection ?? getProcessRedirection({ logger });
  const info = options.session ?? detectSession();

  const waitContext: WaitContext = {
    terminal,
    redirection,
    session: info,
    defaultMessage: config.wait.message,
    pollIntervalMs: config.wait.poll_interval_ms,
    logger: logger.child({ component: "wait" }),
    ...(options.sleep ? { sleep: options.sleep } : {}),
  };

  const wrapWidth = (): number =>
    redirection.outputRedirected
      ? config.layout.fallback_width
      : terminal.columns;

  const resolveWrap = (wrap: WrapOptions = {}) => ({
    width: wrap.width ?? wrapWidth(),
    tableMode: wrap.tableMode ?? config.layout.table_mode,
  });

  return {
    terminal,
    redirection,
    info,

    wrapWidth,

    formatWrapped(input, wrap) {
      const { width, tableMode } = resolveWrap(wrap);
      return formatWrapped(input, width, tableMode);
    },

    writeWrapped(text, wrap) {
      const { width, tableMode } = resolveWrap(wrap);
      for (const block of formatWrappedText(text, width, tableMode)) {
        terminal.write(block);
      }
    },

    writeWrappedFormatted(text, classify, wrap) {
      const { width, tableMode } = resolveWrap(wrap);
      // Hidden marker characters still count toward the wrap width
      for (const block of formatWrappedText(text, width, tableMode)) {
        writeFormatted(terminal, block, classify);
      }
    },

    writeFormatted(text, classify = plainClassifier) {
      writeFormatted(terminal, text, classify);
    },

    moveCursor(count) {
      moveCursor(terminal, redirection, count);
    },

    clearLine() {
      clearLine(terminal, redirection);
    },

    withColor(color, fn) {
      return withForegroundColor(terminal, color, fn);
    },

    clearKeyBuffer() {
      return clearKeyBuffer(terminal, redirection);
    },

    wait(waitOptions = {}) {
      return wait(waitContext, {
        ...waitOptions,
        showDots: waitOptions.showDots ?? config.wait.show_dots,
      });
    },

    waitIfDebug() {
      return waitIfDebug(waitContext);
    },

    async exitError(message, exitCode) {
      clearLine(terminal, redirection);
      withForegroundColor(terminal, "red", () => {
        terminal.writeError(`${message}\n`);
      });
      logger.debug("Reported error", { exitCode });
      await waitIfDebug(waitContext);
      return exitCode;
    },
  };
}
