/**
 * Error type definitions for the sectionpick CLI
 *
 * The navigation core never throws; these errors come from the edges:
 * config and menu loading, and terminal setup.
 *
 * Each error carries:
 * - hint: how the user can fix the problem
 * - code: the process exit code
 */

/**
 * Base class for all CLI errors.
 */
export class CLIError extends Error {
  /** Recovery suggestion shown to the user */
  public readonly hint?: string;

  /** Exit code (1-255, 0 is reserved for success) */
  public readonly code: number;

  constructor(message: string, hint?: string, code: number = 1) {
    super(message);
    // Keeps instanceof working after transpilation
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'CLIError';
    this.hint = hint;
    this.code = code;
  }
}

/**
 * Invalid TOML or out-of-range values in config.toml.
 *
 * Exit code 2: Configuration error
 */
export class ConfigError extends CLIError {
  constructor(message: string, hint?: string) {
    super(
      message,
      hint ?? 'Run: sectionpick config list  to see valid options',
      2
    );
    this.name = 'ConfigError';
  }
}

/**
 * A menu or state file that doesn't exist.
 *
 * Exit code 3: File not found
 */
export class FileNotFoundError extends CLIError {
  constructor(path: string) {
    super(
      `Path does not exist: ${path}`,
      'Check the path and try again',
      3
    );
    this.name = 'FileNotFoundError';
  }
}

/**
 * Input that failed schema validation (menu files, CLI options).
 *
 * Exit code 1: General error
 */
export class ValidationError extends CLIError {
  /** Individual validation issues */
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    const hint =
      issues.length > 0
        ? `Issues:\n  ${issues.join('\n  ')}`
        : 'Check your input and try again';
    super(message, hint, 1);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

/**
 * The terminal can't be switched to raw mode (stdin is not a TTY).
 *
 * Exit code 4: Terminal error
 */
export class TerminalError extends CLIError {
  constructor(message: string) {
    super(
      message,
      'Run sectionpick from an interactive terminal, not through a pipe',
      4
    );
    this.name = 'TerminalError';
  }
}
