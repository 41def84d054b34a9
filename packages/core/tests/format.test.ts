import { describe, expect, it } from "vitest";

import {
  createMarkerClassifier,
  plainClassifier,
  writeFormatted,
  type FormatDecision,
} from "../src/format";
import { MemoryTerminal } from "../src/terminal/memory-terminal";

describe("writeFormatted", () => {
  it("reproduces the text and restores both colors", () => {
    const terminal = new MemoryTerminal({
      foreground: "white",
      background: "blue",
    });

    writeFormatted(terminal, "Ready: 3 items", plainClassifier);

    expect(terminal.output).toBe("Ready: 3 items");
    expect(terminal.getForeground()).toBe("white");
    expect(terminal.getBackground()).toBe("blue");
  });

  it("drops characters the classifier hides", () => {
    const terminal = new MemoryTerminal();

    writeFormatted(terminal, "a_b_c", (char) => ({ emit: char !== "_" }));

    expect(terminal.output).toBe("abc");
  });

  it("applies colors before the character they come with", () => {
    const terminal = new MemoryTerminal();
    const seen: string[] = [];
    const original = terminal.write.bind(terminal);
    terminal.write = (text: string) => {
      seen.push(`${terminal.getForeground()}:${text}`);
      original(text);
    };

    writeFormatted(terminal, "ab", (char): FormatDecision =>
      char === "b" ? { emit: true, foreground: "red" } : { emit: true }
    );

    expect(seen).toEqual(["default:a", "red:b"]);
    expect(terminal.getForeground()).toBe("default");
  });

  it("restores colors when a write throws", () => {
    const terminal = new MemoryTerminal({ foreground: "green" });
    terminal.write = () => {
      throw new Error("EPIPE");
    };

    expect(() =>
      writeFormatted(terminal, "x", () => ({
        emit: true,
        foreground: "red",
        background: "yellow",
      }))
    ).toThrow("EPIPE");
    expect(terminal.getForeground()).toBe("green");
    expect(terminal.getBackground()).toBe("default");
  });
});

describe("createMarkerClassifier", () => {
  it("toggles marker colors and hides the markers", () => {
    const terminal = new MemoryTerminal();
    const classify = createMarkerClassifier({ "`": "cyan" });

    writeFormatted(terminal, "run `conkit wrap` now", classify);

    expect(terminal.output).toBe("run conkit wrap now");
    expect(terminal.colorChanges).toEqual([
      { target: "foreground", color: "cyan" },
      { target: "foreground", color: "default" },
      { target: "foreground", color: "default" },
      { target: "background", color: "default" },
    ]);
  });

  it("switches between markers without closing the first", () => {
    const classify = createMarkerClassifier({ "*": "yellow", "`": "cyan" });

    expect(classify("*")).toEqual({ emit: false, foreground: "yellow" });
    expect(classify("`")).toEqual({ emit: false, foreground: "cyan" });
    expect(classify("`")).toEqual({ emit: false, foreground: "default" });
    expect(classify("x")).toEqual({ emit: true });
  });

  it("returns to the configured base color", () => {
    const classify = createMarkerClassifier({ "`": "cyan" }, { base: "gray" });

    classify("`");

    expect(classify("`")).toEqual({ emit: false, foreground: "gray" });
  });
});
