import type { ConsoleColor, Terminal } from "./terminal/types";

/**
 * Foreground color change that is undone on release.
 *
 * ```ts
 * const scope = new ColorScope(terminal, "red");
 * try {
 *   terminal.writeError("failed\n");
 * } finally {
 *   scope.release();
 * }
 * ```
 */
export class ColorScope {
  private readonly previous: ConsoleColor;
  private released = false;

  constructor(
    private readonly terminal: Terminal,
    color: ConsoleColor
  ) {
    this.previous = terminal.getForeground();
    terminal.setForeground(color);
  }

  /** Restore the captured color. Later calls do nothing. */
  release(): void {
    if (this.released) {
      return;
    }
    this.released = true;
    this.terminal.setForeground(this.previous);
  }
}

/**
 * Run `fn` with the foreground set to `color`, restoring the previous color
 * however `fn` exits.
 */
export function withForegroundColor<T>(
  terminal: Terminal,
  color: ConsoleColor,
  fn: () => T
): T {
  const scope = new ColorScope(terminal, color);
  try {
    return fn();
  } finally {
    scope.release();
  }
}
