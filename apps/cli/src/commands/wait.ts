import type { WaitOptions } from "@conkit/core";
import { Command } from "commander";

import type { CliContext } from "../context";
import { parseNonNegativeInteger } from "../utils/parse";

interface WaitCommandOptions {
  timeout?: number;
  dots?: boolean;
  message?: string;
}

export function createWaitCommand(ctx: CliContext): Command {
  return new Command("wait")
    .description("Pause until a key is pressed or the timeout runs out")
    .option(
      "--timeout <seconds>",
      "Give up after this many seconds",
      parseNonNegativeInteger
    )
    .option("--dots", "Count the remaining seconds down as dots")
    .option("-m, --message <text>", "Prompt to show")
    .action(async (options: WaitCommandOptions) => {
      const waitOptions: WaitOptions = {
        ...(options.message !== undefined ? { message: options.message } : {}),
        ...(options.timeout !== undefined ? { timeout: options.timeout } : {}),
        ...(options.dots ? { showDots: true } : {}),
      };
      const outcome = await ctx.session.wait(waitOptions);
      ctx.logger.info("Wait finished", { outcome });
    });
}
