import {
  createTerminalSession,
  loadConfig,
  setColorMode,
  type ConkitConfig,
  type Terminal,
  type TerminalSession,
} from "@conkit/core";
import { createLogger, type Logger } from "@conkit/shared";

import { readStream } from "./utils/stdin";

/**
 * Everything a command needs, built once per invocation.
 */
export interface CliContext {
  cwd: string;
  config: ConkitConfig;
  logger: Logger;
  session: TerminalSession;
  /** Reads piped input for commands that accept it. */
  readInput: () => Promise<string>;
  /** Exit code the entry point hands to the process. */
  exitCode: number;
}

export interface CliContextOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  terminal?: Terminal;
}

export async function createCliContext(
  options: CliContextOptions = {}
): Promise<CliContext> {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;

  // Config problems are reported before the configured level is known
  const bootLogger = createLogger({ level: "warn", context: { cli: true } });
  const config = await loadConfig({ cwd, env, logger: bootLogger });

  const logger = createLogger({ level: config.log.level });
  setColorMode(config.output.color);

  const session = createTerminalSession({
    config,
    logger,
    ...(options.terminal ? { terminal: options.terminal } : {}),
  });

  return {
    cwd,
    config,
    logger,
    session,
    readInput: () => readStream(),
    exitCode: 0,
  };
}
