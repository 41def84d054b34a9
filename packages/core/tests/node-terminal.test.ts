import { PassThrough } from "node:stream";
import { afterEach, describe, expect, it } from "vitest";

import { resetColorInstance, setColorMode } from "../src/colors";
import { createTerminalSession } from "../src/session";
import { NodeTerminal } from "../src/terminal/node-terminal";

class FakeOutput extends PassThrough {
  columns = 30;
  chunks: string[] = [];

  override write(chunk: unknown): boolean {
    this.chunks.push(String(chunk));
    return true;
  }

  text(): string {
    return this.chunks.join("");
  }
}

function terminalWith(): {
  terminal: NodeTerminal;
  input: PassThrough;
  output: FakeOutput;
  error: FakeOutput;
} {
  const input = new PassThrough();
  const output = new FakeOutput();
  const error = new FakeOutput();
  const terminal = new NodeTerminal({
    input: input as unknown as NodeJS.ReadStream,
    output: output as unknown as NodeJS.WriteStream,
    error: error as unknown as NodeJS.WriteStream,
  });
  return { terminal, input, output, error };
}

describe("NodeTerminal", () => {
  afterEach(() => {
    resetColorInstance();
  });

  it("tracks the cursor column from written text", () => {
    const { terminal } = terminalWith();

    terminal.write("abc\nde");
    expect(terminal.getCursorColumn()).toBe(2);

    terminal.write("\rx");
    expect(terminal.getCursorColumn()).toBe(1);
  });

  it("moves the cursor with a 1-based column escape", () => {
    const { terminal, output } = terminalWith();

    terminal.setCursorColumn(4);

    expect(output.text()).toBe("\u001B[5G");
    expect(terminal.getCursorColumn()).toBe(4);
  });

  it("reads the window width from the output stream", () => {
    const { terminal, output } = terminalWith();

    expect(terminal.columns).toBe(30);
    output.columns = 0;
    expect(terminal.columns).toBe(80);
  });

  it("sends color codes with the next text, only on change", () => {
    setColorMode("always");
    const { terminal, output } = terminalWith();

    terminal.setForeground("red");
    terminal.write("a");
    terminal.setForeground("red");
    terminal.write("b");
    terminal.setForeground("default");
    terminal.write("c");
    terminal.setBackground("blue");
    terminal.write("d");
    terminal.setBackground("default");
    terminal.write("e");

    expect(output.chunks).toEqual([
      "\u001B[31ma",
      "b",
      "\u001B[39mc",
      "\u001B[44md",
      "\u001B[49me",
    ]);
  });

  it("writes nothing to stdout for a color change that is undone unused", () => {
    setColorMode("always");
    const { terminal, output } = terminalWith();

    terminal.setForeground("red");
    terminal.setForeground("default");
    terminal.write("x");

    expect(output.chunks).toEqual(["x"]);
  });

  it("emits no color codes when color is off", () => {
    setColorMode("never");
    const { terminal, output } = terminalWith();

    terminal.setForeground("red");
    terminal.write("x");

    expect(output.text()).toBe("x");
    expect(terminal.getForeground()).toBe("red");
  });

  it("carries the current colors onto stderr", () => {
    setColorMode("always");
    const { terminal, error } = terminalWith();

    terminal.setForeground("red");
    terminal.writeError("failed\n");

    expect(error.text()).toBe("\u001B[31mfailed\n\u001B[39m");
  });

  it("keeps exitError color codes off redirected stdout", async () => {
    setColorMode("always");
    const { terminal, output, error } = terminalWith();
    const session = createTerminalSession({
      terminal,
      redirection: { inputRedirected: false, outputRedirected: true },
      session: { interactive: false, debuggerAttached: false },
    });

    await expect(session.exitError("boom", 2)).resolves.toBe(2);

    expect(output.text()).toBe("\n");
    expect(error.text()).toBe("\u001B[31mboom\n\u001B[39m");
  });

  it("queues key presses while capturing", async () => {
    const { terminal, input } = terminalWith();

    await terminal.startKeyCapture();
    input.write("a");
    await new Promise((resolve) => setImmediate(resolve));

    expect(terminal.keyAvailable()).toBe(true);
    await expect(terminal.readKey()).resolves.toMatchObject({
      name: "a",
      sequence: "a",
      ctrl: false,
    });
    expect(terminal.keyAvailable()).toBe(false);

    terminal.stopKeyCapture();
  });

  it("hands a waiting reader the next key", async () => {
    const { terminal, input } = terminalWith();

    await terminal.startKeyCapture();
    const next = terminal.readKey();
    input.write("\r");

    await expect(next).resolves.toMatchObject({ name: "return" });
    terminal.stopKeyCapture();
  });
});
