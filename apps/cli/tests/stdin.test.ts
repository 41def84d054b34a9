import { PassThrough } from "node:stream";
import { describe, expect, it } from "vitest";

import { readStream, stripTrailingNewline } from "../src/utils/stdin";

const nextTick = (): Promise<void> =>
  new Promise((resolve) => {
    setImmediate(resolve);
  });

describe("readStream", () => {
  it("keeps a character whose bytes arrive in separate chunks", async () => {
    const stream = new PassThrough();
    const bytes = Buffer.from("Ω", "utf8");

    const pending = readStream(stream);
    stream.write(bytes.subarray(0, 1));
    await nextTick();
    stream.write(bytes.subarray(1));
    await nextTick();
    stream.end();

    await expect(pending).resolves.toBe("Ω");
  });

  it("joins every chunk in order", async () => {
    const stream = new PassThrough();

    const pending = readStream(stream);
    stream.write("one ");
    stream.end("two\n");

    await expect(pending).resolves.toBe("one two\n");
  });
});

describe("stripTrailingNewline", () => {
  it("drops one trailing line break", () => {
    expect(stripTrailingNewline("text\n\n")).toBe("text\n");
    expect(stripTrailingNewline("text\r\n")).toBe("text");
  });

  it("leaves text without a line break alone", () => {
    expect(stripTrailingNewline("text")).toBe("text");
    expect(stripTrailingNewline("")).toBe("");
  });
});
