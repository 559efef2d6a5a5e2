/**
 * Error handling for foldback
 * Typed errors with context and recovery information
 */

/**
 * Base error class for foldback
 */
export class FoldbackError extends Error {
  readonly code: string;
  readonly context: Record<string, unknown>;
  readonly recoverable: boolean;
  readonly suggestion?: string;

  constructor(
    message: string,
    options: {
      code: string;
      context?: Record<string, unknown>;
      recoverable?: boolean;
      suggestion?: string;
      cause?: Error;
    },
  ) {
    super(message, { cause: options.cause });
    this.name = "FoldbackError";
    this.code = options.code;
    this.context = options.context ?? {};
    this.recoverable = options.recoverable ?? false;
    this.suggestion = options.suggestion;

    Error.captureStackTrace(this, FoldbackError);
  }

  /**
   * Convert to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      recoverable: this.recoverable,
      suggestion: this.suggestion,
      stack: this.stack,
      cause: this.cause instanceof Error ? this.cause.message : this.cause,
    };
  }
}

/**
 * File system error
 */
export class FileSystemError extends FoldbackError {
  constructor(
    message: string,
    options: {
      path: string;
      operation: "read" | "write" | "copy" | "delete" | "walk";
      cause?: Error;
    },
  ) {
    super(message, {
      code: "FILESYSTEM_ERROR",
      context: { path: options.path, operation: options.operation },
      recoverable: false,
      suggestion: `Check that the path exists and you have permissions: ${options.path}`,
      cause: options.cause,
    });
    this.name = "FileSystemError";
  }
}

/**
 * Configuration error
 */
export class ConfigError extends FoldbackError {
  readonly issues: ConfigIssue[];

  constructor(
    message: string,
    options: {
      issues?: ConfigIssue[];
      configPath?: string;
      cause?: Error;
    } = {},
  ) {
    super(message, {
      code: "CONFIG_ERROR",
      context: { configPath: options.configPath, issues: options.issues },
      recoverable: true,
      suggestion: "Check ~/.foldback/config.json for errors",
      cause: options.cause,
    });
    this.name = "ConfigError";
    this.issues = options.issues ?? [];
  }

  /**
   * Format issues as a readable string
   */
  formatIssues(): string {
    if (this.issues.length === 0) return "";
    return this.issues.map((i) => `  - ${i.path}: ${i.message}`).join("\n");
  }
}

export interface ConfigIssue {
  path: string;
  message: string;
}

/**
 * Validation error for caller-supplied values
 */
export class ValidationError extends FoldbackError {
  readonly field?: string;

  constructor(
    message: string,
    options: {
      field?: string;
      cause?: Error;
    } = {},
  ) {
    super(message, {
      code: "VALIDATION_ERROR",
      context: { field: options.field },
      recoverable: true,
      suggestion: "Check the input data format",
      cause: options.cause,
    });
    this.name = "ValidationError";
    this.field = options.field;
  }
}

/**
 * Checkpoint lifecycle error, raised for operations that cannot be
 * expressed as a boolean result (e.g. a snapshot directory that cannot be created)
 */
export class CheckpointError extends FoldbackError {
  readonly root: string;

  constructor(
    message: string,
    options: {
      root: string;
      recoverable?: boolean;
      cause?: Error;
    },
  ) {
    super(message, {
      code: "CHECKPOINT_ERROR",
      context: { root: options.root },
      recoverable: options.recoverable ?? true,
      suggestion: `Checkpoint for '${options.root}' failed. Check free space in the staging directory.`,
      cause: options.cause,
    });
    this.name = "CheckpointError";
    this.root = options.root;
  }
}

/**
 * Check if error is a foldback error
 */
export function isFoldbackError(error: unknown): error is FoldbackError {
  return error instanceof FoldbackError;
}

/**
 * Default suggestions for common error codes.
 * Used as fallback when an error doesn't have a specific suggestion.
 */
export const ERROR_SUGGESTIONS: Record<string, string> = {
  CONFIG_ERROR: "Check ~/.foldback/config.json or remove it to start from defaults.",
  FILESYSTEM_ERROR: "Check that the path exists and you have read/write permissions.",
  VALIDATION_ERROR: "Check the input data format. See 'foldback --help' for usage.",
  CHECKPOINT_ERROR: "Retry the checkpoint once the staging directory is writable.",
  UNEXPECTED_ERROR: "An unexpected error occurred. Run with --log-level debug for details.",
};

/**
 * Format error for display
 */
export function formatError(error: unknown): string {
  if (error instanceof FoldbackError) {
    let message = `[${error.code}] ${error.message}`;
    const suggestion = error.suggestion ?? ERROR_SUGGESTIONS[error.code];
    if (suggestion) {
      message += `\n  Suggestion: ${suggestion}`;
    }
    if (error instanceof ConfigError && error.issues.length > 0) {
      message += `\n${error.formatIssues()}`;
    }
    return message;
  }

  if (error instanceof Error) {
    return `${error.message}\n  Suggestion: ${ERROR_SUGGESTIONS["UNEXPECTED_ERROR"]}`;
  }

  return String(error);
}

/**
 * Message of an unknown thrown value. For a wrapped foldback error the
 * underlying cause is reported, since it names the failing system call.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof FoldbackError && error.cause instanceof Error) {
    return error.cause.message;
  }
  return error instanceof Error ? error.message : String(error);
}
