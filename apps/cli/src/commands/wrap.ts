import { createMarkerClassifier } from "@conkit/core";
import { Command } from "commander";

import type { CliContext } from "../context";
import { parsePositiveInteger } from "../utils/parse";
import { stripTrailingNewline } from "../utils/stdin";

interface WrapCommandOptions {
  table?: boolean;
  width?: number;
  highlight?: boolean;
}

// `code` spans show in cyan; the backticks themselves are hidden
const highlightCode = createMarkerClassifier({ "`": "cyan" });

export function createWrapCommand(ctx: CliContext): Command {
  return new Command("wrap")
    .description("Wrap text to the terminal width")
    .argument("[text...]", "Text to wrap (reads stdin when omitted)")
    .option(
      "-t, --table",
      "Align continuation lines with the column after the last double space"
    )
    .option(
      "-w, --width <columns>",
      "Wrap width (default: terminal width)",
      parsePositiveInteger
    )
    .option("--highlight", "Show `backticked` spans in color")
    .action(async (words: string[], options: WrapCommandOptions) => {
      const text =
        words.length > 0
          ? words.join(" ")
          : stripTrailingNewline(await ctx.readInput());
      const wrap = { tableMode: options.table, width: options.width };

      ctx.logger.debug("Wrapping", {
        width: options.width ?? ctx.session.wrapWidth(),
        source: words.length > 0 ? "args" : "stdin",
      });

      if (options.highlight) {
        ctx.session.writeWrappedFormatted(text, highlightCode, wrap);
      } else {
        ctx.session.writeWrapped(text, wrap);
      }
    });
}
