import {
  DEFAULT_CONFIG,
  MemoryTerminal,
  createTerminalSession,
  type ConkitConfig,
  type RedirectionState,
} from "@conkit/core";
import { silentLogger } from "@conkit/shared";

import type { CliContext } from "../src/context";

export interface TestContextOptions {
  columns?: number;
  redirection?: RedirectionState;
  config?: ConkitConfig;
  input?: string | Error;
  cwd?: string;
}

export function createTestContext(options: TestContextOptions = {}): {
  ctx: CliContext;
  terminal: MemoryTerminal;
} {
  const terminal = new MemoryTerminal({ columns: options.columns ?? 40 });
  const config = options.config ?? DEFAULT_CONFIG;
  const session = createTerminalSession({
    terminal,
    redirection: options.redirection ?? {
      inputRedirected: false,
      outputRedirected: false,
    },
    session: { interactive: true, debuggerAttached: false },
    config,
    sleep: async () => undefined,
  });
  const input = options.input ?? "";

  const ctx: CliContext = {
    cwd: options.cwd ?? process.cwd(),
    config,
    logger: silentLogger,
    session,
    readInput: () =>
      typeof input === "string" ? Promise.resolve(input) : Promise.reject(input),
    exitCode: 0,
  };
  return { ctx, terminal };
}

/** argv as the entry point sees it. */
export function argv(...args: string[]): string[] {
  return ["node", "conkit", ...args];
}
