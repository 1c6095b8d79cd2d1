import chalk from "chalk";

/**
 * Log levels from most to least verbose
 */
export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

interface LoggerConfig {
  level: LogLevel;
  prefix?: string;
}

/**
 * Coloured logger. Everything goes to stderr so `--output json` keeps stdout
 * machine-readable.
 */
export class Logger {
  private level: LogLevel = "info";
  private prefix = "";
  private parent: Logger | undefined;

  configure(config: Partial<LoggerConfig>): void {
    if (config.level !== undefined) {
      this.level = config.level;
    }
    if (config.prefix !== undefined) {
      this.prefix = config.prefix;
    }
  }

  getLevel(): LogLevel {
    return this.parent ? this.parent.getLevel() : this.level;
  }

  isEnabled(level: LogLevel): boolean {
    return level !== "silent" && LOG_LEVELS[level] >= LOG_LEVELS[this.getLevel()];
  }

  private format(message: string): string {
    return this.prefix ? `${this.prefix} ${message}` : message;
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.isEnabled("debug")) {
      console.error(chalk.gray(this.format(message)), ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.isEnabled("info")) {
      console.error(this.format(message), ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.isEnabled("warn")) {
      console.error(chalk.yellow(this.format(message)), ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.isEnabled("error")) {
      console.error(chalk.red(this.format(message)), ...args);
    }
  }

  success(message: string, ...args: unknown[]): void {
    if (this.isEnabled("info")) {
      console.error(chalk.green(this.format(message)), ...args);
    }
  }

  /**
   * Child loggers follow the parent's level, so module-level children pick up
   * a later `configure()` call.
   */
  child(prefix: string): Logger {
    const child = new Logger();
    child.parent = this;
    child.prefix = this.prefix ? `${this.prefix} ${prefix}` : prefix;
    return child;
  }
}

/**
 * Global logger instance
 */
export const logger = new Logger();
