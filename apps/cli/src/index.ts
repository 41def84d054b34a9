import { createTerminalSession, setColorMode } from "@conkit/core";
import { VERSION } from "@conkit/shared";
import { Command, CommanderError } from "commander";

import { createConfigCommand } from "./commands/config";
import { createFailCommand } from "./commands/fail";
import { createProbeCommand } from "./commands/probe";
import { createWaitCommand } from "./commands/wait";
import { createWrapCommand } from "./commands/wrap";
import { createCliContext, type CliContext } from "./context";

type RootCommandOptions = {
  color?: boolean;
};

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Build the command tree. Help and parse errors go through the session's
 * terminal, and commander throws instead of exiting the process.
 */
export function createProgram(ctx: CliContext): Command {
  const program = new Command();
  program.enablePositionalOptions();

  program
    .name("conkit")
    .description(
      "Wrap text, color output and prompt for keys, with redirect-aware terminal handling"
    )
    .version(VERSION)
    .option("--no-color", "Disable colored output")
    .configureOutput({
      writeOut: (text) => ctx.session.terminal.write(text),
      writeErr: (text) => ctx.session.terminal.writeError(text),
    })
    .exitOverride()
    .hook("preAction", (thisCommand) => {
      const options = thisCommand.opts<RootCommandOptions>();
      if (options.color === false) {
        setColorMode("never");
      }
    });

  for (const create of [
    createWrapCommand,
    createWaitCommand,
    createProbeCommand,
    createFailCommand,
    createConfigCommand,
  ]) {
    program.addCommand(create(ctx).copyInheritedSettings(program));
  }

  return program;
}

/**
 * Run the CLI and resolve to the process exit code.
 */
export async function run(
  argv: string[] = process.argv,
  context?: CliContext
): Promise<number> {
  let ctx: CliContext;
  try {
    ctx = context ?? (await createCliContext());
  } catch (error) {
    return createTerminalSession().exitError(errorMessage(error), 1);
  }

  const program = createProgram(ctx);
  try {
    await program.parseAsync(argv);
  } catch (error) {
    // Commander has already printed its own message
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    ctx.logger.debug("Command failed", { error: errorMessage(error) });
    return ctx.session.exitError(errorMessage(error), 1);
  }
  return ctx.exitCode;
}

export { createCliContext, type CliContext } from "./context";
export { buildProbeReport, type ProbeReport } from "./commands/probe";
