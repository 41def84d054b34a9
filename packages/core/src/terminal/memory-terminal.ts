import type { ConsoleColor, KeyPress, Terminal } from "./types";

export interface MemoryTerminalOptions {
  columns?: number;
  foreground?: ConsoleColor;
  background?: ConsoleColor;
  /** Key names already waiting in the buffer. */
  keys?: string[];
}

export interface ColorChange {
  target: "foreground" | "background";
  color: ConsoleColor;
}

export function keyPress(name: string): KeyPress {
  return {
    name,
    sequence: name.length === 1 ? name : "",
    ctrl: false,
    meta: false,
    shift: false,
  };
}

/**
 * In-process terminal simulation.
 *
 * Keeps a screen of rows with a cursor that overwrites in place, the raw
 * stdout/stderr transcripts, the color history, and counters for cursor
 * access so callers can assert what was (not) touched.
 */
export class MemoryTerminal implements Terminal {
  readonly columns: number;

  /** Everything written to stdout, in order. */
  output = "";
  /** Everything written to stderr, in order. */
  errorOutput = "";
  /** stderr writes with the colors in force when they were made. */
  readonly errorWrites: Array<{
    text: string;
    foreground: ConsoleColor;
    background: ConsoleColor;
  }> = [];
  readonly colorChanges: ColorChange[] = [];

  cursorReads = 0;
  cursorWrites = 0;
  captureStarts = 0;
  captureStops = 0;

  private readonly rows: string[] = [""];
  private row = 0;
  private column = 0;
  private foreground: ConsoleColor;
  private background: ConsoleColor;
  private readonly pending: KeyPress[];
  private readonly waiters: Array<(key: KeyPress) => void> = [];

  constructor(options: MemoryTerminalOptions = {}) {
    this.columns = options.columns ?? 80;
    this.foreground = options.foreground ?? "default";
    this.background = options.background ?? "default";
    this.pending = (options.keys ?? []).map((name) => keyPress(name));
  }

  getCursorColumn(): number {
    this.cursorReads += 1;
    return this.column;
  }

  setCursorColumn(column: number): void {
    this.cursorWrites += 1;
    this.column = column;
  }

  getForeground(): ConsoleColor {
    return this.foreground;
  }

  setForeground(color: ConsoleColor): void {
    this.foreground = color;
    this.colorChanges.push({ target: "foreground", color });
  }

  getBackground(): ConsoleColor {
    return this.background;
  }

  setBackground(color: ConsoleColor): void {
    this.background = color;
    this.colorChanges.push({ target: "background", color });
  }

  write(text: string): void {
    this.output += text;
    for (const char of text) {
      this.put(char);
    }
  }

  writeError(text: string): void {
    this.errorOutput += text;
    this.errorWrites.push({
      text,
      foreground: this.foreground,
      background: this.background,
    });
  }

  /** Queue a key press as if the user had typed it. */
  press(name: string): void {
    const key = keyPress(name);
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(key);
    } else {
      this.pending.push(key);
    }
  }

  keyAvailable(): boolean {
    return this.pending.length > 0;
  }

  /** Number of key presses still buffered. */
  get bufferedKeys(): number {
    return this.pending.length;
  }

  readKey(): Promise<KeyPress> {
    const next = this.pending.shift();
    if (next) {
      return Promise.resolve(next);
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  async startKeyCapture(): Promise<void> {
    this.captureStarts += 1;
  }

  stopKeyCapture(): void {
    this.captureStops += 1;
  }

  /** Screen rows with trailing blanks removed. */
  screen(): string[] {
    return this.rows.map((line) => line.trimEnd());
  }

  private put(char: string): void {
    if (char === "\n") {
      this.row += 1;
      this.column = 0;
      if (this.rows.length <= this.row) {
        this.rows.push("");
      }
      return;
    }
    if (char === "\r") {
      this.column = 0;
      return;
    }

    const line = (this.rows[this.row] ?? "").padEnd(this.column, " ");
    this.rows[this.row] =
      line.slice(0, this.column) + char + line.slice(this.column + 1);
    this.column += 1;
    if (this.column >= this.columns) {
      this.put("\n");
    }
  }
}
