import { z } from "zod";
import { Env } from "./models/Env";
import { Logger } from "./models/Logger";
import type { LogLevels, PrintStrategy } from "./models/Logger";
import { validationError } from "./errors";
import { parseWithSchema } from "./tools/validation";

export const LOG_LEVEL_ENV = "FIELDKIT_LOG_LEVEL";
export const LOG_FORMAT_ENV = "FIELDKIT_LOG_FORMAT";
export const NO_COLOR_ENV = "NO_COLOR";

const logLevelSchema = z
  .enum(["trace", "debug", "info", "warn", "error", "critical", "none"])
  .transform((level): LogLevels | null => (level === "none" ? null : level));

const printStrategySchema = z.enum(["pretty", "json", "none"]);

export interface FieldkitConfig {
  /** `null` disables printing; listeners still receive every log. */
  logLevel: LogLevels | null;
  logFormat: PrintStrategy;
  useColors: boolean;
}

const defaults: FieldkitConfig = {
  logLevel: "info",
  logFormat: "pretty",
  useColors: false,
};

export const DEFAULT_CONFIG = Object.freeze(defaults);

/**
 * Reads the library configuration from the environment. Colors are on when
 * output is a terminal and NO_COLOR is unset or empty.
 */
export function loadConfig(
  env: Env = new Env(),
  isTTY: boolean = Boolean(process.stdout.isTTY),
): FieldkitConfig {
  env.set(LOG_LEVEL_ENV, {
    cast: "string",
    defaultValue: DEFAULT_CONFIG.logLevel,
  });
  env.set(LOG_FORMAT_ENV, {
    cast: "string",
    defaultValue: DEFAULT_CONFIG.logFormat,
  });
  env.set(NO_COLOR_ENV, { cast: "string", defaultValue: "" });

  return {
    logLevel: parseWithSchema(
      logLevelSchema,
      env.get(LOG_LEVEL_ENV),
      "Config",
      LOG_LEVEL_ENV,
    ),
    logFormat: parseWithSchema(
      printStrategySchema,
      env.get(LOG_FORMAT_ENV),
      "Config",
      LOG_FORMAT_ENV,
    ),
    useColors: isTTY && env.get(NO_COLOR_ENV) === "",
  };
}

export function createLogger(config: FieldkitConfig = loadConfig()): Logger {
  return new Logger({
    printThreshold: config.logLevel,
    printStrategy: config.logFormat,
    useColors: config.useColors,
  });
}

let defaultLogger: Logger | undefined;

/**
 * The logger used by registries and factories when none is given. Created
 * from the environment on first use; an invalid environment falls back to
 * `DEFAULT_CONFIG` and is reported once.
 */
export function getDefaultLogger(): Logger {
  if (!defaultLogger) {
    defaultLogger = createDefaultLogger();
  }
  return defaultLogger;
}

function createDefaultLogger(): Logger {
  try {
    return createLogger(loadConfig());
  } catch (error) {
    if (!validationError.is(error)) {
      throw error;
    }
    const logger = createLogger(DEFAULT_CONFIG);
    logger.warn("Invalid logging configuration, using defaults", {
      source: "fieldkit.config",
      error,
    });
    return logger;
  }
}

export function setDefaultLogger(logger: Logger | undefined) {
  defaultLogger = logger;
}
