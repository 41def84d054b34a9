import type { RedirectionState } from "./probe";
import type { Terminal } from "./terminal/types";

/**
 * Move the cursor within the current line. Positive counts move right.
 * The target column is clamped to the window; redirected output has no
 * cursor and is left alone.
 */
export function moveCursor(
  terminal: Terminal,
  redirection: RedirectionState,
  count: number
): void {
  if (redirection.outputRedirected) {
    return;
  }

  const lastColumn = Math.max(terminal.columns - 1, 0);
  let column = terminal.getCursorColumn() + Math.trunc(count);
  if (column < 0) {
    column = 0;
  }
  if (column > lastColumn) {
    column = lastColumn;
  }
  terminal.setCursorColumn(column);
}

/**
 * Blank the current line and return to its first column. On redirected
 * output a newline stands in for the clear.
 */
export function clearLine(
  terminal: Terminal,
  redirection: RedirectionState
): void {
  if (redirection.outputRedirected) {
    terminal.write("\n");
    return;
  }

  terminal.setCursorColumn(0);
  // One short of the width so the terminal does not wrap
  terminal.write(" ".repeat(Math.max(terminal.columns - 1, 0)));
  terminal.setCursorColumn(0);
}
