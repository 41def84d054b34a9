import {
  DEFAULT_CONFIG,
  PATHS,
  ensureConfigDir,
  getConfigPaths,
  serializeConfigObject,
} from "@conkit/core";
import { Command } from "commander";
import { writeFile } from "node:fs/promises";

import type { CliContext } from "../context";

interface ConfigCommandOptions {
  path?: boolean;
  json?: boolean;
  init?: boolean;
}

function isExistingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "EEXIST";
}

/** Write the defaults to the user config file unless one is there already. */
async function initUserConfig(): Promise<boolean> {
  await ensureConfigDir();
  try {
    await writeFile(PATHS.configFile, serializeConfigObject(DEFAULT_CONFIG), {
      flag: "wx",
    });
    return true;
  } catch (error) {
    if (isExistingFile(error)) {
      return false;
    }
    throw error;
  }
}

export function createConfigCommand(ctx: CliContext): Command {
  return new Command("config")
    .description("Show the effective configuration")
    .option("--path", "Show config file paths")
    .option("--json", "Output JSON")
    .option("--init", "Create the user config file with default values")
    .action(async (options: ConfigCommandOptions) => {
      const { terminal } = ctx.session;

      if (options.init) {
        const created = await initUserConfig();
        terminal.write(
          created
            ? `Created ${PATHS.configFile}\n`
            : `Already exists: ${PATHS.configFile}\n`
        );
        return;
      }

      if (options.path) {
        const paths = await getConfigPaths(ctx.cwd);
        if (options.json) {
          terminal.write(
            `${JSON.stringify({
              config: paths.user,
              ...(paths.project ? { project: paths.project } : {}),
            })}\n`
          );
          return;
        }
        terminal.write(`Config:  ${paths.user}\n`);
        if (paths.project) {
          terminal.write(`Project: ${paths.project}\n`);
        }
        return;
      }

      if (options.json) {
        terminal.write(`${JSON.stringify(ctx.config, null, 2)}\n`);
        return;
      }
      terminal.write(serializeConfigObject(ctx.config));
    });
}
