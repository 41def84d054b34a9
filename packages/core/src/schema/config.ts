import { LOG_LEVELS } from "@conkit/shared";
import { z } from "zod";

/**
 * Text layout defaults.
 */
export const LayoutConfigSchema = z.object({
  /** Wrap width used when output is redirected */
  fallback_width: z.number().int().positive().default(80),
  /** Align continuation lines to the last double space by default */
  table_mode: z.boolean().default(false),
});

export type LayoutConfig = z.infer<typeof LayoutConfigSchema>;

/**
 * Wait prompt defaults.
 */
export const WaitConfigSchema = z.object({
  /** Prompt shown when none is given */
  message: z.string().default("Press any key to continue..."),
  /** Countdown poll slice in milliseconds */
  poll_interval_ms: z.number().int().positive().default(100),
  /** Draw countdown dots by default */
  show_dots: z.boolean().default(false),
});

export type WaitConfig = z.infer<typeof WaitConfigSchema>;

export const OutputConfigSchema = z.object({
  /** auto follows NO_COLOR/FORCE_COLOR/TERM and the stdout TTY state */
  color: z.enum(["auto", "always", "never"]).default("auto"),
});

export type OutputConfig = z.infer<typeof OutputConfigSchema>;

export const LogConfigSchema = z.object({
  level: z.enum(LOG_LEVELS).default("warn"),
});

export type LogConfig = z.infer<typeof LogConfigSchema>;

/**
 * Conkit configuration schema.
 * Stored in ~/.config/conkit/config.toml (user) and .conkit.toml (project)
 */
export const ConkitConfigSchema = z.object({
  layout: LayoutConfigSchema.default({}),
  wait: WaitConfigSchema.default({}),
  output: OutputConfigSchema.default({}),
  log: LogConfigSchema.default({}),
});

export type ConkitConfig = z.infer<typeof ConkitConfigSchema>;

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: ConkitConfig = ConkitConfigSchema.parse({});
