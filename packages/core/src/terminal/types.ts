/**
 * Terminal primitives consumed by the layout, cursor, formatting and wait
 * modules. Implementations: NodeTerminal (process streams) and
 * MemoryTerminal (in-process simulation).
 */

export const NAMED_COLORS = [
  "black",
  "red",
  "green",
  "yellow",
  "blue",
  "magenta",
  "cyan",
  "white",
  "gray",
  "redBright",
  "greenBright",
  "yellowBright",
  "blueBright",
  "magentaBright",
  "cyanBright",
  "whiteBright",
] as const;

export type NamedColor = (typeof NAMED_COLORS)[number];

/** A foreground or background color; "default" is the terminal's own. */
export type ConsoleColor = NamedColor | "default";

export function isConsoleColor(value: string): value is ConsoleColor {
  return (
    value === "default" ||
    (NAMED_COLORS as readonly string[]).includes(value)
  );
}

/**
 * A single key press. `name` identifies the key ("a", "return", "f5",
 * "volumeup"); printable keys without a name use their character.
 */
export interface KeyPress {
  name: string;
  sequence: string;
  ctrl: boolean;
  meta: boolean;
  shift: boolean;
}

export interface Terminal {
  /** Current window width in columns. */
  readonly columns: number;

  getCursorColumn(): number;
  setCursorColumn(column: number): void;

  getForeground(): ConsoleColor;
  setForeground(color: ConsoleColor): void;
  getBackground(): ConsoleColor;
  setBackground(color: ConsoleColor): void;

  /** Write to standard output. */
  write(text: string): void;
  /** Write to standard error, in the current colors. */
  writeError(text: string): void;

  /** Non-blocking peek: is a key press waiting in the buffer? */
  keyAvailable(): boolean;
  /** Take the next key press, waiting for one if the buffer is empty. */
  readKey(): Promise<KeyPress>;

  /**
   * Start receiving key presses. Resolves once input already pending on the
   * stream has been buffered.
   */
  startKeyCapture(): Promise<void>;
  stopKeyCapture(): void;
}
