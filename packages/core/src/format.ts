/**
 * Classifier-driven colored output.
 */
import type { ConsoleColor, Terminal } from "./terminal/types";

/** What to do with one character. Colors apply before it is written. */
export interface FormatDecision {
  emit: boolean;
  foreground?: ConsoleColor;
  background?: ConsoleColor;
}

export type CharClassifier = (char: string) => FormatDecision;

/** Emit every character, leave colors alone. */
export const plainClassifier: CharClassifier = () => ({ emit: true });

export interface MarkerClassifierOptions {
  /** Color outside of any marker pair. Default: "default" */
  base?: ConsoleColor;
}

/**
 * Classifier for inline markup: each marker character toggles its color on
 * and off and is not shown.
 *
 * ```ts
 * const classify = createMarkerClassifier({ "`": "cyan" });
 * writeFormatted(terminal, "run `conkit wrap` now", classify);
 * ```
 */
export function createMarkerClassifier(
  markers: Record<string, ConsoleColor>,
  options: MarkerClassifierOptions = {}
): CharClassifier {
  const base = options.base ?? "default";
  let active: string | null = null;

  return (char) => {
    const color = markers[char];
    if (color === undefined) {
      return { emit: true };
    }
    if (active === char) {
      active = null;
      return { emit: false, foreground: base };
    }
    active = char;
    return { emit: false, foreground: color };
  };
}

/**
 * Write `text` through `classify`, applying the colors it asks for and
 * dropping hidden characters. Both colors in force before the call are
 * restored afterwards, including when a write throws.
 */
export function writeFormatted(
  terminal: Terminal,
  text: string,
  classify: CharClassifier
): void {
  const previousForeground = terminal.getForeground();
  const previousBackground = terminal.getBackground();
  let run = "";

  const flush = (): void => {
    if (run !== "") {
      terminal.write(run);
      run = "";
    }
  };

  try {
    for (const char of text) {
      const decision = classify(char);
      if (
        decision.foreground !== undefined &&
        decision.foreground !== terminal.getForeground()
      ) {
        flush();
        terminal.setForeground(decision.foreground);
      }
      if (
        decision.background !== undefined &&
        decision.background !== terminal.getBackground()
      ) {
        flush();
        terminal.setBackground(decision.background);
      }
      if (decision.emit) {
        run += char;
      }
    }
    flush();
  } finally {
    terminal.setForeground(previousForeground);
    terminal.setBackground(previousBackground);
  }
}
