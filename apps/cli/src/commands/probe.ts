import { Command } from "commander";

import type { CliContext } from "../context";

interface ProbeCommandOptions {
  json?: boolean;
}

export interface ProbeReport {
  input_redirected: boolean;
  output_redirected: boolean;
  interactive: boolean;
  debugger_attached: boolean;
  wrap_width: number;
}

export function buildProbeReport(ctx: CliContext): ProbeReport {
  const { redirection, info } = ctx.session;
  return {
    input_redirected: redirection.inputRedirected,
    output_redirected: redirection.outputRedirected,
    interactive: info.interactive,
    debugger_attached: info.debuggerAttached,
    wrap_width: ctx.session.wrapWidth(),
  };
}

function row(label: string, value: string): string {
  return `${label.padEnd(11)}  ${value}`;
}

export function createProbeCommand(ctx: CliContext): Command {
  return new Command("probe")
    .description("Show how the standard streams and session were detected")
    .option("--json", "Output a JSON object")
    .action((options: ProbeCommandOptions) => {
      const report = buildProbeReport(ctx);

      if (options.json) {
        ctx.session.terminal.write(`${JSON.stringify(report)}\n`);
        return;
      }

      const stream = (redirected: boolean) =>
        redirected ? "redirected" : "terminal";
      ctx.session.writeWrapped(
        [
          row("stdin", stream(report.input_redirected)),
          row("stdout", stream(report.output_redirected)),
          row("interactive", report.interactive ? "yes" : "no"),
          row("debugger", report.debugger_attached ? "attached" : "none"),
          row("width", String(report.wrap_width)),
        ].join("\n"),
        { tableMode: true }
      );
    });
}
