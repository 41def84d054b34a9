import type { ZodIssue } from "zod";

/**
 * Configuration could not be parsed or failed validation.
 */
export class ConfigError extends Error {
  readonly issues: ZodIssue[];
  readonly path: string | undefined;

  constructor(options: {
    message: string;
    issues?: ZodIssue[];
    path?: string;
    cause?: unknown;
  }) {
    super(options.message, { cause: options.cause });
    this.name = "ConfigError";
    this.issues = options.issues ?? [];
    this.path = options.path;
  }
}
