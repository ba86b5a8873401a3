export type LogLevel = "debug" | "info" | "warn" | "error";

export type LoggerConfig = {
  level?: LogLevel;
  useColors?: boolean;
  useTimestamps?: boolean;
  scope?: string; // Tag printed after the level, e.g. [pipeline]
};

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: "\x1b[90m", // Gray
  info: "\x1b[36m", // Cyan
  warn: "\x1b[33m", // Yellow
  error: "\x1b[31m", // Red
};

const SCOPE_COLOR = "\x1b[35m"; // Magenta
const RESET = "\x1b[0m";

/**
 * Console logger with level filtering, optional colours and a scope tag.
 * Extra arguments are passed through to console so context objects stay
 * inspectable.
 */
export class Logger {
  private level: LogLevel;
  private useColors: boolean;
  private useTimestamps: boolean;
  private scope: string | undefined;

  constructor(config?: LoggerConfig) {
    this.level = config?.level ?? "info";
    this.useColors = config?.useColors ?? Boolean(process.stdout.isTTY);
    this.useTimestamps = config?.useTimestamps ?? true;
    this.scope = config?.scope;
  }

  /**
   * Derive a logger sharing this one's settings, tagged with a nested scope.
   */
  child(scope: string): Logger {
    return new Logger({
      level: this.level,
      useColors: this.useColors,
      useTimestamps: this.useTimestamps,
      scope: this.scope ? `${this.scope}:${scope}` : scope,
    });
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  formatMessage(level: LogLevel, message: string): string {
    const parts: string[] = [];

    if (this.useTimestamps) {
      parts.push(new Date().toISOString());
    }

    const levelTag = `[${level.toUpperCase()}]`;
    parts.push(
      this.useColors ? `${LEVEL_COLORS[level]}${levelTag}${RESET}` : levelTag
    );

    if (this.scope) {
      const scopeTag = `[${this.scope}]`;
      parts.push(this.useColors ? `${SCOPE_COLOR}${scopeTag}${RESET}` : scopeTag);
    }

    parts.push(message);

    return parts.join(" ");
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.isLevelEnabled("debug")) {
      console.debug(this.formatMessage("debug", message), ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.isLevelEnabled("info")) {
      console.log(this.formatMessage("info", message), ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.isLevelEnabled("warn")) {
      console.warn(this.formatMessage("warn", message), ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.isLevelEnabled("error")) {
      console.error(this.formatMessage("error", message), ...args);
    }
  }
}
