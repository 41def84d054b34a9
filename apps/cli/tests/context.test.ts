import {
  MemoryTerminal,
  PATHS,
  resetColorInstance,
} from "@conkit/core";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterAll, afterEach, describe, expect, it } from "vitest";

import { createCliContext } from "../src/context";

const tempRoot = await mkdtemp(join(tmpdir(), "conkit-context-"));
const originalPaths = { ...PATHS };

afterEach(() => {
  Object.assign(PATHS, originalPaths);
  resetColorInstance();
});

afterAll(async () => {
  await rm(tempRoot, { recursive: true, force: true });
});

describe("createCliContext", () => {
  it("loads project config and environment overrides", async () => {
    Object.assign(PATHS, { configFile: join(tempRoot, "missing.toml") });
    await writeFile(
      join(tempRoot, ".conkit.toml"),
      "[wait]\nshow_dots = true\n"
    );
    const terminal = new MemoryTerminal();

    const ctx = await createCliContext({
      cwd: tempRoot,
      env: { CONKIT_LOG_LEVEL: "error" },
      terminal,
    });

    expect(ctx.config.wait.show_dots).toBe(true);
    expect(ctx.config.log.level).toBe("error");
    expect(ctx.session.terminal).toBe(terminal);
    expect(ctx.exitCode).toBe(0);
  });
});
