/**
 * Centralized color handling using ansis with lazy initialization.
 *
 * ansis evaluates color support at module load time, but CLI flags and
 * config are processed after imports. This module defers the color decision
 * until first use, allowing them to take effect.
 */
import ansis, { Ansis } from "ansis";

import type { NamedColor } from "./terminal/types";

export type ColorMode = "auto" | "always" | "never";

let colorInstance: Ansis | null = null;
let colorMode: ColorMode = "auto";

/**
 * Determine if color should be used.
 * Respects NO_COLOR, FORCE_COLOR, and TERM=dumb conventions.
 */
export function shouldUseColor(
  stream: { isTTY?: boolean } = process.stdout,
  env: NodeJS.ProcessEnv = process.env
): boolean {
  if (env.NO_COLOR) {
    return false;
  }
  if (env.FORCE_COLOR) {
    return true;
  }
  if (env.TERM === "dumb") {
    return false;
  }
  return stream.isTTY ?? false;
}

/**
 * Get the ansis instance, initializing on first access.
 */
export function getAnsis(): Ansis {
  if (colorInstance) {
    return colorInstance;
  }

  if (colorMode === "always") {
    // ansis runs its own detection; forcing needs an explicit level
    colorInstance = new Ansis(3);
  } else if (colorMode === "auto" && shouldUseColor()) {
    colorInstance = ansis;
  } else {
    colorInstance = new Ansis(0);
  }
  return colorInstance;
}

/**
 * Override the color decision. Takes effect on the next `getAnsis()` call.
 */
export function setColorMode(mode: ColorMode): void {
  colorMode = mode;
  colorInstance = null;
}

/**
 * Reset the color instance (useful for testing or dynamic reconfiguration).
 */
export function resetColorInstance(): void {
  colorMode = "auto";
  colorInstance = null;
}

const BACKGROUND_STYLE = {
  black: "bgBlack",
  red: "bgRed",
  green: "bgGreen",
  yellow: "bgYellow",
  blue: "bgBlue",
  magenta: "bgMagenta",
  cyan: "bgCyan",
  white: "bgWhite",
  gray: "bgGray",
  redBright: "bgRedBright",
  greenBright: "bgGreenBright",
  yellowBright: "bgYellowBright",
  blueBright: "bgBlueBright",
  magentaBright: "bgMagentaBright",
  cyanBright: "bgCyanBright",
  whiteBright: "bgWhiteBright",
} as const satisfies Record<NamedColor, string>;

/** Escape sequences that switch a named color on and back off. */
export interface ColorCodes {
  open: string;
  close: string;
}

export function foregroundCodes(color: NamedColor, a = getAnsis()): ColorCodes {
  const style = a[color];
  return { open: style.open, close: style.close };
}

export function backgroundCodes(color: NamedColor, a = getAnsis()): ColorCodes {
  const style = a[BACKGROUND_STYLE[color]];
  return { open: style.open, close: style.close };
}
