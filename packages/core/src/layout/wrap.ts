/**
 * Width-aware word wrapping with indent inference.
 *
 * Continuation lines repeat the first line's indent so hanging-indent and
 * key/value text stays aligned:
 *
 * ```
 * formatWrapped("  key: value that is long", 15, false)
 * // "  key: value\n  that is long\n"
 * ```
 */

/** Width used when output is not a terminal. */
export const FALLBACK_WIDTH = 80;

/** Smallest width that still fits one character per line. */
export const MIN_WRAP_WIDTH = 2;

const TABLE_GAP = "  ";

/**
 * Indent for continuation lines.
 *
 * Table mode aligns to the text after the last run of two spaces; otherwise
 * the leading spaces are kept.
 */
export function inferIndent(input: string, tableMode: boolean): number {
  if (tableMode) {
    const gap = input.lastIndexOf(TABLE_GAP);
    return gap === -1 ? 0 : gap + TABLE_GAP.length;
  }

  let indent = 0;
  while (input[indent] === " ") {
    indent += 1;
  }
  return indent;
}

function usableWidth(width: number): number {
  if (!Number.isFinite(width)) {
    return MIN_WRAP_WIDTH;
  }
  return Math.max(Math.trunc(width), MIN_WRAP_WIDTH);
}

/**
 * Split one line of text into display lines of at most `width - 1`
 * characters, breaking at spaces where possible.
 *
 * Every line after the first carries the inferred indent, and from then on
 * the width shrinks by that indent. A line with no space to break at is cut
 * at `width - 1` characters.
 */
export function wrapLines(
  input: string,
  width: number,
  tableMode = false
): string[] {
  if (input.trimEnd() === "") {
    return [""];
  }

  const indent = inferIndent(input, tableMode);
  const indentStr = " ".repeat(indent);
  const lines: string[] = [];

  let available = usableWidth(width);
  let haveReducedWidth = false;
  let remaining = input;

  do {
    let pos = available - 1;
    let skip = 0;
    if (pos >= remaining.length) {
      pos = remaining.length;
    } else {
      while (pos > 0 && remaining[pos] !== " ") {
        pos -= 1;
      }
      if (pos === 0) {
        pos = available - 1;
      } else {
        // the space at the break is consumed
        skip = 1;
      }
    }

    const chunk = remaining.slice(0, pos);
    lines.push(lines.length > 0 ? indentStr + chunk : chunk);
    remaining = remaining.slice(pos + skip);

    if (remaining.length > 0 && !haveReducedWidth) {
      available = Math.max(available - indent, MIN_WRAP_WIDTH);
      haveReducedWidth = true;
    }
  } while (remaining.length > 0);

  return lines;
}

/**
 * Wrap `input` to `width` columns and return it with every line terminated
 * by a newline. Blank input yields a single newline.
 */
export function formatWrapped(
  input: string,
  width: number,
  tableMode = false
): string {
  return wrapLines(input, width, tableMode)
    .map((line) => `${line}\n`)
    .join("");
}

/**
 * Wrap multi-line text: each source line is trimmed at the end and wrapped
 * on its own.
 */
export function formatWrappedText(
  text: string,
  width: number,
  tableMode = false
): string[] {
  return text
    .split("\n")
    .map((line) => formatWrapped(line.trimEnd(), width, tableMode));
}
