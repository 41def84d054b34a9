/**
 * Conkit Core Library
 *
 * Width-aware wrapping, colored output, cursor control and "press any key"
 * prompts that stay correct when the standard streams are redirected.
 */

// Terminal
export {
  NAMED_COLORS,
  isConsoleColor,
  type ConsoleColor,
  type KeyPress,
  type NamedColor,
  type Terminal,
} from "./terminal/types";
export { NodeTerminal, type NodeTerminalOptions } from "./terminal/node-terminal";
export {
  MemoryTerminal,
  keyPress,
  type ColorChange,
  type MemoryTerminalOptions,
} from "./terminal/memory-terminal";

// Colors
export {
  backgroundCodes,
  foregroundCodes,
  getAnsis,
  resetColorInstance,
  setColorMode,
  shouldUseColor,
  type ColorCodes,
  type ColorMode,
} from "./colors";
export { ColorScope, withForegroundColor } from "./color-scope";

// Environment
export {
  detectRedirection,
  getProcessRedirection,
  isStreamRedirected,
  nodeHandleInspector,
  resetProcessRedirection,
  STDIN_FD,
  STDOUT_FD,
  type HandleInspector,
  type ProbeOptions,
  type RedirectionState,
} from "./probe";
export {
  detectSession,
  isDebuggerAttached,
  isInteractiveSession,
  type SessionInfo,
} from "./environment";

// Layout
export {
  FALLBACK_WIDTH,
  MIN_WRAP_WIDTH,
  formatWrapped,
  formatWrappedText,
  inferIndent,
  wrapLines,
} from "./layout/wrap";

// Output
export { clearLine, moveCursor } from "./cursor";
export {
  createMarkerClassifier,
  plainClassifier,
  writeFormatted,
  type CharClassifier,
  type FormatDecision,
  type MarkerClassifierOptions,
} from "./format";

// Interaction
export { IGNORED_KEYS, isInputKey } from "./keys";
export {
  DEBUG_WAIT_MESSAGE,
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_WAIT_MESSAGE,
  clearKeyBuffer,
  sleep,
  wait,
  waitIfDebug,
  type Sleep,
  type WaitContext,
  type WaitOptions,
  type WaitOutcome,
  type WaitState,
} from "./wait";

// Session
export {
  createTerminalSession,
  type TerminalSession,
  type TerminalSessionOptions,
  type WrapOptions,
} from "./session";

// Config
export {
  applyEnvOverrides,
  findProjectConfigPath,
  getConfigPaths,
  loadConfig,
  parseConfigText,
  serializeConfigObject,
  type ConfigPaths,
  type LoadConfigOptions,
} from "./config";
export { ConfigError } from "./errors";
export { PATHS, PROJECT_CONFIG_FILENAME, ensureConfigDir } from "./paths";
export {
  ConkitConfigSchema,
  DEFAULT_CONFIG,
  type ConkitConfig,
  type LayoutConfig,
  type LogConfig,
  type OutputConfig,
  type WaitConfig,
} from "./schema/config";
