import { describe, expect, it, vi } from "vitest";

import { createMarkerClassifier } from "../src/format";
import { DEFAULT_CONFIG, type ConkitConfig } from "../src/schema/config";
import { createTerminalSession } from "../src/session";
import { MemoryTerminal } from "../src/terminal/memory-terminal";

const interactive = { interactive: true, debuggerAttached: false };

function sessionFor(
  terminal: MemoryTerminal,
  outputRedirected: boolean,
  config: ConkitConfig = DEFAULT_CONFIG
) {
  return createTerminalSession({
    terminal,
    redirection: { inputRedirected: false, outputRedirected },
    session: interactive,
    config,
    sleep: vi.fn(async () => undefined),
  });
}

describe("createTerminalSession", () => {
  it("wraps to the window width on a terminal", () => {
    const terminal = new MemoryTerminal({ columns: 11 });
    const session = sessionFor(terminal, false);

    session.writeWrapped("The quick brown fox jumps");

    expect(session.wrapWidth()).toBe(11);
    expect(terminal.output).toBe("The quick\nbrown fox\njumps\n");
  });

  it("wraps to the fallback width when output is redirected", () => {
    const terminal = new MemoryTerminal({ columns: 11 });
    const config: ConkitConfig = {
      ...DEFAULT_CONFIG,
      layout: { fallback_width: 16, table_mode: false },
    };
    const session = sessionFor(terminal, true, config);

    session.writeWrapped("The quick brown fox jumps");

    expect(session.wrapWidth()).toBe(16);
    expect(terminal.output).toBe("The quick brown\nfox jumps\n");
  });

  it("wraps every source line and applies table mode", () => {
    const terminal = new MemoryTerminal({ columns: 80 });
    const session = sessionFor(terminal, false);

    session.writeWrapped("-w  width to wrap at\n-t  table mode", {
      width: 14,
      tableMode: true,
    });

    expect(terminal.output).toBe(
      "-w  width to\n    wrap at\n-t  table\n    mode\n"
    );
  });

  it("counts hidden markers toward the wrap width", () => {
    const terminal = new MemoryTerminal({ columns: 80 });
    const session = sessionFor(terminal, false);

    session.writeWrappedFormatted(
      "use `abc` now",
      createMarkerClassifier({ "`": "cyan" }),
      { width: 11 }
    );

    // "use `abc`" fills the line although only "use abc" is shown
    expect(terminal.output).toBe("use abc\nnow\n");
    expect(terminal.getForeground()).toBe("default");
  });

  it("reports errors in red and resolves to the exit code", async () => {
    const terminal = new MemoryTerminal({ columns: 20 });
    const session = sessionFor(terminal, true);

    const code = await session.exitError("Something broke", 3);

    expect(code).toBe(3);
    expect(terminal.output).toBe("\n");
    expect(terminal.errorWrites).toEqual([
      { text: "Something broke\n", foreground: "red", background: "default" },
    ]);
    expect(terminal.getForeground()).toBe("default");
  });

  it("uses configured wait defaults", async () => {
    const terminal = new MemoryTerminal({ columns: 40 });
    const config: ConkitConfig = {
      ...DEFAULT_CONFIG,
      wait: { message: "Continuing in", poll_interval_ms: 500, show_dots: true },
    };
    const sleep = vi.fn(async () => undefined);
    const session = createTerminalSession({
      terminal,
      redirection: { inputRedirected: false, outputRedirected: false },
      session: interactive,
      config,
      sleep,
    });

    const outcome = await session.wait({ timeout: 2 });

    expect(outcome).toBe("timeout");
    expect(sleep).toHaveBeenCalledTimes(4);
    expect(sleep).toHaveBeenCalledWith(500);
    expect(terminal.screen()).toEqual(["Continuing in", ""]);
  });

  it("clears pending keys", async () => {
    const terminal = new MemoryTerminal({ keys: ["a", "b"] });
    const session = sessionFor(terminal, false);

    await session.clearKeyBuffer();

    expect(terminal.bufferedKeys).toBe(0);
  });
});
