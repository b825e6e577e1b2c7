import { appendFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import chalk from "chalk";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

const LEVEL_COLOR: Record<LogLevel, (s: string) => string> = {
  debug: chalk.dim,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red,
};

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Logger whose scope is nested under this one (`graph:debate`) */
  child(scope: string): Logger;
  /** Resolve once every pending file append has been written */
  flush(): Promise<void>;
}

export interface LoggerOptions {
  scope?: string;
  /** Append lines to this file */
  file?: string;
  /** Echo lines to stderr */
  console?: boolean;
  level?: LogLevel;
}

/** Shared sink so child loggers write through one ordered queue */
class LogSink {
  private pending: Promise<void> = Promise.resolve();
  private dirReady = false;
  private reportedFailure = false;

  constructor(
    private readonly file: string | undefined,
    private readonly echo: boolean,
    private readonly minLevel: LogLevel,
  ) {}

  write(level: LogLevel, scope: string, message: string): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) return;

    const tag = scope ? ` [${scope}]` : "";
    const line = `[${new Date().toISOString()}] ${level.toUpperCase()}${tag} ${message}\n`;

    if (this.echo) {
      process.stderr.write(LEVEL_COLOR[level](line));
    }

    const file = this.file;
    if (!file) return;
    this.pending = this.pending
      .then(async () => {
        if (!this.dirReady) {
          await mkdir(dirname(file), { recursive: true });
          this.dirReady = true;
        }
        await appendFile(file, line, "utf-8");
      })
      .catch((err: unknown) => {
        if (this.reportedFailure) return;
        this.reportedFailure = true;
        process.stderr.write(`log file ${file} is not writable: ${String(err)}\n`);
      });
  }

  flush(): Promise<void> {
    return this.pending;
  }
}

class ScopedLogger implements Logger {
  constructor(
    private readonly sink: LogSink,
    private readonly scope: string,
  ) {}

  debug(message: string): void {
    this.sink.write("debug", this.scope, message);
  }

  info(message: string): void {
    this.sink.write("info", this.scope, message);
  }

  warn(message: string): void {
    this.sink.write("warn", this.scope, message);
  }

  error(message: string): void {
    this.sink.write("error", this.scope, message);
  }

  child(scope: string): Logger {
    return new ScopedLogger(this.sink, this.scope ? `${this.scope}:${scope}` : scope);
  }

  flush(): Promise<void> {
    return this.sink.flush();
  }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const sink = new LogSink(options.file, options.console ?? false, options.level ?? "info");
  return new ScopedLogger(sink, options.scope ?? "");
}

/** Discards everything */
export const silentLogger: Logger = createLogger({ console: false, level: "error" });
