// Error classes
export {
  GapfillError,
  ParserUnavailableError,
  ParseError,
  ConfigError,
  GenerationError,
  GitError,
} from "./errors.js";

// Result type and utilities
export { ok, err, unwrapOr, tryCatchAsync } from "./result.js";
export type { Result } from "./result.js";

// Logger
export { logger } from "./logger.js";
export type { LogLevel } from "./logger.js";
