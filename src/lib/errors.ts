/**
 * Error hierarchy.
 *
 * Every error carries a stable `code` for JSON output and a free-form
 * `context`. Which ones travel as `Result` values and which are thrown is
 * decided by the caller: a document that does not parse is data, a parser
 * that cannot start is an environment failure.
 */
export class GapfillError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = "GapfillError";
    Error.captureStackTrace?.(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

/**
 * A Python document that does not parse cleanly
 */
export class ParseError extends GapfillError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly line?: number,
    context?: Record<string, unknown>
  ) {
    super(message, "PARSE_ERROR", { ...context, filePath, line });
    this.name = "ParseError";
  }
}

/**
 * The tree-sitter runtime or the Python grammar could not be loaded
 */
export class ParserUnavailableError extends GapfillError {
  constructor(message: string, public readonly wasmPath?: string) {
    super(message, "PARSER_UNAVAILABLE", wasmPath === undefined ? undefined : { wasmPath });
    this.name = "ParserUnavailableError";
  }
}

/**
 * Missing or invalid `.gapfill.yml`, or bad AI settings
 */
export class ConfigError extends GapfillError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "CONFIG_ERROR", context);
    this.name = "ConfigError";
  }
}

export class GenerationError extends GapfillError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "GENERATION_ERROR", context);
    this.name = "GenerationError";
  }
}

export class GitError extends GapfillError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "GIT_ERROR", context);
    this.name = "GitError";
  }
}
