import { describe, expect, it } from "vitest";

import { ColorScope, withForegroundColor } from "../src/color-scope";
import { MemoryTerminal } from "../src/terminal/memory-terminal";

describe("ColorScope", () => {
  it("sets the color and restores it on release", () => {
    const terminal = new MemoryTerminal({ foreground: "gray" });

    const scope = new ColorScope(terminal, "red");
    expect(terminal.getForeground()).toBe("red");

    scope.release();
    expect(terminal.getForeground()).toBe("gray");
  });

  it("restores only once", () => {
    const terminal = new MemoryTerminal();
    const scope = new ColorScope(terminal, "red");

    scope.release();
    terminal.setForeground("green");
    scope.release();

    expect(terminal.getForeground()).toBe("green");
  });
});

describe("withForegroundColor", () => {
  it("returns the callback result", () => {
    const terminal = new MemoryTerminal();

    expect(withForegroundColor(terminal, "cyan", () => 42)).toBe(42);
    expect(terminal.getForeground()).toBe("default");
  });

  it("restores the color when the callback throws", () => {
    const terminal = new MemoryTerminal({ foreground: "white" });

    expect(() =>
      withForegroundColor(terminal, "red", () => {
        throw new Error("boom");
      })
    ).toThrow("boom");
    expect(terminal.getForeground()).toBe("white");
  });

  it("colors stderr writes made inside the scope", () => {
    const terminal = new MemoryTerminal();

    withForegroundColor(terminal, "red", () => {
      terminal.writeError("failed\n");
    });

    expect(terminal.errorWrites).toEqual([
      { text: "failed\n", foreground: "red", background: "default" },
    ]);
  });
});
