import { LogPrinter } from "./LogPrinter";
import type { LogLevels, PrintableLog, PrintStrategy } from "./LogPrinter";

export type { LogLevels, PrintStrategy };

export interface ILogInfo {
  source?: string;
  error?: unknown;
  data?: Record<string, unknown>;
  [key: string]: unknown;
}

export type ILog = PrintableLog;

export type LogListener = (log: ILog) => void;

export interface LoggerOptions {
  printThreshold: null | LogLevels;
  printStrategy: PrintStrategy;
  /** Defaults to false; `loadConfig()` derives it from NO_COLOR and the TTY. */
  useColors?: boolean;
}

/**
 * Structured, synchronous logger. Listeners see every log; the printer only
 * sees logs at or above the print threshold.
 */
export class Logger {
  private printThreshold: null | LogLevels;
  private printStrategy: PrintStrategy;
  private useColors: boolean;
  private boundContext: Record<string, unknown>;
  private printer: LogPrinter;
  private source?: string;
  // Children created through .with() share listeners with their root
  private rootLogger?: Logger;
  public localListeners: LogListener[] = [];

  public static Severity: Readonly<Record<LogLevels, number>> = {
    trace: 0,
    debug: 1,
    info: 2,
    warn: 3,
    error: 4,
    critical: 5,
  };

  constructor(
    options: LoggerOptions,
    boundContext: Record<string, unknown> = {},
    source?: string,
    printer?: LogPrinter,
  ) {
    this.boundContext = { ...boundContext };
    this.printThreshold = options.printThreshold;
    this.printStrategy = options.printStrategy;
    this.useColors = options.useColors ?? false;

    this.source = source;

    this.printer =
      printer ??
      new LogPrinter({
        strategy: this.printStrategy,
        useColors: this.useColors,
      });
  }

  /**
   * Creates a new logger instance with additional bound context
   */
  public with({
    source,
    context,
  }: {
    source?: string;
    context?: Record<string, unknown>;
  }): Logger {
    const child = new Logger(
      {
        printThreshold: this.printThreshold,
        printStrategy: this.printStrategy,
        useColors: this.useColors,
      },
      { ...this.boundContext, ...context },
      source ?? this.source,
      this.printer,
    );
    child.rootLogger = this.rootLogger ?? this;
    return child;
  }

  public log(level: LogLevels, message: unknown, logInfo: ILogInfo = {}) {
    const { source, error, data, ...context } = logInfo;

    const log: ILog = {
      level,
      message,
      source: source || this.source,
      timestamp: new Date(),
      error: error ? this.extractErrorInfo(error) : undefined,
      data: data || undefined,
      context: { ...this.boundContext, ...context },
    };

    const root = this.rootLogger ?? this;
    root.triggerLogListeners(log);

    if (this.canPrint(level)) {
      this.printer.print(log);
    }
  }

  private extractErrorInfo(error: unknown): NonNullable<ILog["error"]> {
    if (error instanceof Error) {
      return {
        name: error.name,
        message: error.message,
        stack: error.stack,
      };
    }

    return {
      name: "UnknownError",
      message: String(error),
    };
  }

  public trace(message: unknown, logInfo?: ILogInfo) {
    this.log("trace", message, logInfo);
  }

  public debug(message: unknown, logInfo?: ILogInfo) {
    this.log("debug", message, logInfo);
  }

  public info(message: unknown, logInfo?: ILogInfo) {
    this.log("info", message, logInfo);
  }

  public warn(message: unknown, logInfo?: ILogInfo) {
    this.log("warn", message, logInfo);
  }

  public error(message: unknown, logInfo?: ILogInfo) {
    this.log("error", message, logInfo);
  }

  public critical(message: unknown, logInfo?: ILogInfo) {
    this.log("critical", message, logInfo);
  }

  /**
   * Direct print for tests and advanced scenarios. Delegates to LogPrinter.
   */
  public print(log: ILog) {
    this.printer.print(log);
  }

  /**
   * @param listener - A listener that will be triggered for every log.
   */
  public onLog(listener: LogListener) {
    const root = this.rootLogger ?? this;
    root.localListeners.push(listener);
  }

  private canPrint(level: LogLevels): boolean {
    if (this.printThreshold === null) {
      return false;
    }
    return Logger.Severity[level] >= Logger.Severity[this.printThreshold];
  }

  private triggerLogListeners(log: ILog) {
    for (const listener of this.localListeners) {
      try {
        listener(log);
      } catch (error) {
        // A failing listener never breaks the code that logged
        this.print({
          level: "error",
          message: "Error in log listener",
          timestamp: new Date(),
          error: {
            name: "ListenerError",
            message: error instanceof Error ? error.message : String(error),
          },
        });
      }
    }
  }
}
