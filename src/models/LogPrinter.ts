import { safeStringify } from "./utils/safeStringify";

/**
 * - `pretty`: one headline per log plus indented error, data and context lines
 * - `json`: one JSON object per log
 * - `none`: prints nothing; listeners still run
 */
export type PrintStrategy = "pretty" | "json" | "none";

export type LogLevels =
  | "trace"
  | "debug"
  | "info"
  | "warn"
  | "error"
  | "critical";

export interface PrintableLog {
  level: LogLevels;
  source?: string;
  message: unknown;
  timestamp: Date;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
  data?: Record<string, unknown>;
  context?: Record<string, unknown>;
}

export interface LogPrinterOptions {
  strategy: PrintStrategy;
  useColors: boolean;
}

type Writer = (msg: string) => void;

interface Writers {
  log: Writer;
  error: Writer;
}

const LEVEL_COLORS: Readonly<Record<LogLevels, string>> = {
  trace: "\x1b[90m",
  debug: "\x1b[36m",
  info: "\x1b[32m",
  warn: "\x1b[33m",
  error: "\x1b[31m",
  critical: "\x1b[35m",
};
const DIM = "\x1b[2m";
const RESET = "\x1b[0m";

// Nested values in data and context blocks print as "[Object]" past this
const DETAIL_DEPTH = 3;

const defaultWriters = (): Writers => ({
  // eslint-disable-next-line no-console
  log: (msg) => console.log(msg),
  // eslint-disable-next-line no-console
  error: (msg) => console.error(msg),
});

export class LogPrinter {
  private static writers: Writers = defaultWriters();

  /** Redirects output, e.g. to capture it in tests. */
  public static setWriters(writers: Partial<Writers>) {
    LogPrinter.writers = { ...LogPrinter.writers, ...writers };
  }

  public static resetWriters() {
    LogPrinter.writers = defaultWriters();
  }

  constructor(private readonly options: LogPrinterOptions) {}

  public print(log: PrintableLog): void {
    const { strategy } = this.options;
    if (strategy === "none") {
      return;
    }

    const lines =
      strategy === "json" ? [safeStringify(log)] : this.prettyLines(log);
    // warn and above go to stderr
    const write = LogPrinter.severe(log.level)
      ? LogPrinter.writers.error
      : LogPrinter.writers.log;
    for (const line of lines) {
      write(line);
    }
  }

  private static severe(level: LogLevels): boolean {
    return level === "warn" || level === "error" || level === "critical";
  }

  private prettyLines(log: PrintableLog): string[] {
    const { level, source, message, timestamp, error, data, context } = log;
    const headline = [
      timestamp.toISOString().slice(11, 23),
      this.paint(LEVEL_COLORS[level], level.toUpperCase().padEnd(8)),
      source ? `[${source}]` : "",
      typeof message === "object" && message !== null
        ? safeStringify(message)
        : String(message),
    ]
      .filter(Boolean)
      .join(" ");

    const lines = [headline];
    if (error) {
      lines.push(this.detail(`error: ${error.name}: ${error.message}`));
      // The first stack line repeats name and message
      for (const frame of error.stack?.split("\n").slice(1) ?? []) {
        lines.push(this.detail(`  ${frame.trim()}`));
      }
    }
    if (data && Object.keys(data).length > 0) {
      lines.push(this.detail(`data: ${this.compact(data)}`));
    }
    if (context) {
      const { source: _source, ...rest } = context;
      if (Object.keys(rest).length > 0) {
        lines.push(this.detail(`context: ${this.compact(rest)}`));
      }
    }
    return lines;
  }

  private compact(value: Record<string, unknown>): string {
    return safeStringify(value, { maxDepth: DETAIL_DEPTH });
  }

  private detail(text: string): string {
    return `  ${this.paint(DIM, text)}`;
  }

  private paint(color: string, text: string): string {
    return this.options.useColors ? `${color}${text}${RESET}` : text;
  }
}
