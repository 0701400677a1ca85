import {
  createLogger,
  getDefaultLogger,
  loadConfig,
  LOG_FORMAT_ENV,
  LOG_LEVEL_ENV,
  NO_COLOR_ENV,
  setDefaultLogger,
} from "../config";
import { defineFactory } from "../definers/defineFactory";
import { Env } from "../models/Env";
import { Logger } from "../models/Logger";
import { LogPrinter } from "../models/LogPrinter";
import { validationError } from "../errors";

describe("config", () => {
  it("defaults to info level and pretty output", () => {
    expect(loadConfig(new Env({}), false)).toEqual({
      logLevel: "info",
      logFormat: "pretty",
      useColors: false,
    });
  });

  it("reads level and format from the environment", () => {
    const env = new Env({ [LOG_LEVEL_ENV]: "trace", [LOG_FORMAT_ENV]: "json" });
    expect(loadConfig(env, false)).toEqual({
      logLevel: "trace",
      logFormat: "json",
      useColors: false,
    });
  });

  it("uses colors on a terminal unless NO_COLOR is set", () => {
    expect(loadConfig(new Env({}), true).useColors).toBe(true);
    expect(loadConfig(new Env({ [NO_COLOR_ENV]: "" }), true).useColors).toBe(
      true,
    );
    expect(loadConfig(new Env({ [NO_COLOR_ENV]: "1" }), true).useColors).toBe(
      false,
    );
  });

  it("maps the none level to a disabled print threshold", () => {
    expect(loadConfig(new Env({ [LOG_LEVEL_ENV]: "none" })).logLevel).toBeNull();
  });

  it("rejects unknown values", () => {
    let caught: unknown;
    try {
      loadConfig(new Env({ [LOG_FORMAT_ENV]: "xml" }));
    } catch (err) {
      caught = err;
    }

    expect(validationError.is(caught)).toBe(true);
    if (validationError.is(caught)) {
      expect(caught.data.subject).toBe("Config");
      expect(caught.data.id).toBe(LOG_FORMAT_ENV);
    }
  });

  it("creates a logger that honors the configured threshold and format", () => {
    const out: string[] = [];
    LogPrinter.setWriters({ log: (msg) => out.push(msg) });
    try {
      const logger = createLogger({
        logLevel: "debug",
        logFormat: "json",
        useColors: false,
      });
      logger.trace("hidden");
      logger.debug("shown");
    } finally {
      LogPrinter.resetWriters();
    }

    expect(out).toHaveLength(1);
    expect(JSON.parse(out[0])).toMatchObject({ level: "debug", message: "shown" });
  });

  it("lets the default logger be replaced and recreated", () => {
    const custom = new Logger({ printThreshold: null, printStrategy: "none" });
    setDefaultLogger(custom);
    expect(getDefaultLogger()).toBe(custom);

    setDefaultLogger(undefined);
    const created = getDefaultLogger();
    expect(created).toBeInstanceOf(Logger);
    expect(getDefaultLogger()).toBe(created);
  });

  describe("with an invalid logging environment", () => {
    const previous = process.env[LOG_LEVEL_ENV];
    let errs: string[];

    beforeEach(() => {
      errs = [];
      LogPrinter.setWriters({ error: (msg) => errs.push(msg) });
      process.env[LOG_LEVEL_ENV] = "INFO";
      setDefaultLogger(undefined);
    });

    afterEach(() => {
      if (previous === undefined) {
        delete process.env[LOG_LEVEL_ENV];
      } else {
        process.env[LOG_LEVEL_ENV] = previous;
      }
      LogPrinter.resetWriters();
    });

    it("still builds, registers and batches through the default logger", () => {
      const points = defineFactory({
        id: "points",
        fields: { x: 1 },
        register: true,
      });

      expect(points.build()).toEqual({ x: 1 });
      expect(points.batch(2)).toEqual([{ x: 1 }, { x: 1 }]);
    });

    it("falls back to the defaults and warns once", () => {
      const logger = getDefaultLogger();

      expect(getDefaultLogger()).toBe(logger);
      expect(
        errs.filter((line) =>
          line.includes("Invalid logging configuration, using defaults"),
        ),
      ).toEqual([
        expect.stringMatching(
          / WARN {5}\[fieldkit\.config\] Invalid logging configuration, using defaults$/,
        ),
      ]);
      expect(errs[1]).toMatch(
        /^ {2}error: fieldkit\.errors\.validation: Config validation failed for FIELDKIT_LOG_LEVEL: /,
      );
    });
  });
});
