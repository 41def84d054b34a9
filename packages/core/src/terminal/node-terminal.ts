import { emitKeypressEvents, type Key } from "node:readline";
import { setImmediate as nextTurn } from "node:timers/promises";

import {
  backgroundCodes,
  foregroundCodes,
  type ColorCodes,
} from "../colors";
import type { ConsoleColor, KeyPress, NamedColor, Terminal } from "./types";

const ESC = "\u001B[";
const FALLBACK_COLUMNS = 80;

export interface NodeTerminalOptions {
  input?: NodeJS.ReadStream;
  output?: NodeJS.WriteStream;
  error?: NodeJS.WriteStream;
}

function toKeyPress(text: string | undefined, key: Key | undefined): KeyPress {
  const sequence = key?.sequence ?? text ?? "";
  return {
    name: key?.name ?? sequence,
    sequence,
    ctrl: key?.ctrl ?? false,
    meta: key?.meta ?? false,
    shift: key?.shift ?? false,
  };
}

function colorSwitch(
  from: ConsoleColor,
  to: ConsoleColor,
  codesFor: (color: NamedColor) => ColorCodes
): string {
  if (from === to) {
    return "";
  }
  if (to === "default") {
    return from === "default" ? "" : codesFor(from).close;
  }
  return codesFor(to).open;
}

/**
 * Terminal backed by the process streams.
 *
 * Node cannot ask the terminal where the cursor is, so the column is tracked
 * from what this instance writes. Colors are held as state; stdout gets the
 * ansis open/close codes for a change only with the next text written to it,
 * and stderr writes carry their own codes.
 */
export class NodeTerminal implements Terminal {
  private readonly input: NodeJS.ReadStream;
  private readonly output: NodeJS.WriteStream;
  private readonly error: NodeJS.WriteStream;

  private column = 0;
  private foreground: ConsoleColor = "default";
  private background: ConsoleColor = "default";
  // Colors last sent to stdout
  private shownForeground: ConsoleColor = "default";
  private shownBackground: ConsoleColor = "default";

  private readonly pending: KeyPress[] = [];
  private readonly waiters: Array<(key: KeyPress) => void> = [];
  private capturing = false;
  private rawModeSet = false;

  constructor(options: NodeTerminalOptions = {}) {
    this.input = options.input ?? process.stdin;
    this.output = options.output ?? process.stdout;
    this.error = options.error ?? process.stderr;
  }

  get columns(): number {
    const columns = this.output.columns;
    return columns && columns > 0 ? columns : FALLBACK_COLUMNS;
  }

  getCursorColumn(): number {
    return this.column;
  }

  setCursorColumn(column: number): void {
    // CHA is 1-based
    this.output.write(`${ESC}${column + 1}G`);
    this.column = column;
  }

  getForeground(): ConsoleColor {
    return this.foreground;
  }

  setForeground(color: ConsoleColor): void {
    this.foreground = color;
  }

  getBackground(): ConsoleColor {
    return this.background;
  }

  setBackground(color: ConsoleColor): void {
    this.background = color;
  }

  write(text: string): void {
    if (text === "") {
      return;
    }
    this.output.write(`${this.pendingColorCodes()}${text}`);
    this.advance(text);
  }

  writeError(text: string): void {
    let open = "";
    let close = "";
    if (this.foreground !== "default") {
      const codes = foregroundCodes(this.foreground);
      open += codes.open;
      close = codes.close + close;
    }
    if (this.background !== "default") {
      const codes = backgroundCodes(this.background);
      open += codes.open;
      close = codes.close + close;
    }
    this.error.write(`${open}${text}${close}`);
  }

  keyAvailable(): boolean {
    return this.pending.length > 0;
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
    if (this.capturing) {
      return;
    }
    this.capturing = true;
    emitKeypressEvents(this.input);
    if (this.input.isTTY) {
      this.input.setRawMode(true);
      this.rawModeSet = true;
    }
    this.input.on("keypress", this.onKeypress);
    this.input.resume();
    // Let bytes already sitting in the stream reach the buffer
    await nextTurn();
  }

  stopKeyCapture(): void {
    if (!this.capturing) {
      return;
    }
    this.capturing = false;
    this.input.off("keypress", this.onKeypress);
    if (this.rawModeSet) {
      this.input.setRawMode(false);
      this.rawModeSet = false;
    }
    this.input.pause();
    this.pending.length = 0;
  }

  private readonly onKeypress = (
    text: string | undefined,
    key: Key | undefined
  ): void => {
    const press = toKeyPress(text, key);

    // Raw mode swallows the interrupt; hand it back to the process
    if (press.ctrl && press.name === "c") {
      this.stopKeyCapture();
      process.kill(process.pid, "SIGINT");
      return;
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(press);
    } else {
      this.pending.push(press);
    }
  };

  private pendingColorCodes(): string {
    const codes =
      colorSwitch(this.shownForeground, this.foreground, foregroundCodes) +
      colorSwitch(this.shownBackground, this.background, backgroundCodes);
    this.shownForeground = this.foreground;
    this.shownBackground = this.background;
    return codes;
  }

  private advance(text: string): void {
    const columns = this.columns;
    for (const char of text) {
      if (char === "\n" || char === "\r") {
        this.column = 0;
      } else if (char === "\b") {
        this.column = Math.max(0, this.column - 1);
      } else {
        this.column += 1;
        if (this.column >= columns) {
          this.column = 0;
        }
      }
    }
  }
}
