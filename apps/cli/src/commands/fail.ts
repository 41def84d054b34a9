import { Command } from "commander";

import type { CliContext } from "../context";
import { parsePositiveInteger } from "../utils/parse";

interface FailCommandOptions {
  code: number;
}

export function createFailCommand(ctx: CliContext): Command {
  return new Command("fail")
    .description("Report an error in red on stderr and exit non-zero")
    .argument("<message>", "Error message")
    .option("--code <number>", "Exit code", parsePositiveInteger, 1)
    .action(async (message: string, options: FailCommandOptions) => {
      ctx.exitCode = await ctx.session.exitError(message, options.code);
    });
}
