/**
 * Unit tests for structured logging system
 *
 * Tests the Logger class with configurable levels, output formatting,
 * child context enrichment and environment-based configuration.
 */

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  logger as defaultLogger,
  Logger,
  LogLevel,
  parseLogLevel,
  type LogEntry,
} from "../../../src/lib/logger.js";

describe("Logger System", () => {
  let errorSpy: ReturnType<typeof vi.spyOn>;
  let warnSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    warnSpy = vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("LogLevel Enum", () => {
    it("should have correct numeric values", () => {
      expect(LogLevel.DEBUG).toBe(0);
      expect(LogLevel.INFO).toBe(1);
      expect(LogLevel.WARN).toBe(2);
      expect(LogLevel.ERROR).toBe(3);
      expect(LogLevel.SILENT).toBe(4);
    });

    it("should provide string names for each level", () => {
      expect(LogLevel[LogLevel.DEBUG]).toBe("DEBUG");
      expect(LogLevel[LogLevel.SILENT]).toBe("SILENT");
    });
  });

  describe("parseLogLevel", () => {
    it("should parse level names case-insensitively", () => {
      expect(parseLogLevel("debug")).toBe(LogLevel.DEBUG);
      expect(parseLogLevel("Info")).toBe(LogLevel.INFO);
      expect(parseLogLevel("WARN")).toBe(LogLevel.WARN);
      expect(parseLogLevel("error")).toBe(LogLevel.ERROR);
      expect(parseLogLevel("silent")).toBe(LogLevel.SILENT);
    });

    it("should return undefined for unknown or missing names", () => {
      expect(parseLogLevel("verbose")).toBeUndefined();
      expect(parseLogLevel(undefined)).toBeUndefined();
    });
  });

  describe("Level filtering", () => {
    it("should default to WARN when LOG_LEVEL is unset", () => {
      const entries: LogEntry[] = [];
      const logger = new Logger({ output: (entry) => entries.push(entry) });

      logger.info("hidden");
      logger.warn("shown");

      expect(entries.map((entry) => entry.message)).toEqual(["shown"]);
    });

    it("should read LOG_LEVEL from the environment", () => {
      process.env.LOG_LEVEL = "debug";
      const entries: LogEntry[] = [];
      const logger = new Logger({ output: (entry) => entries.push(entry) });

      logger.debug("visible");

      expect(entries).toHaveLength(1);
      expect(entries[0]?.levelName).toBe("DEBUG");
    });

    it("should prefer an explicit level over LOG_LEVEL", () => {
      process.env.LOG_LEVEL = "debug";
      const entries: LogEntry[] = [];
      const logger = new Logger({ level: LogLevel.ERROR, output: (entry) => entries.push(entry) });

      logger.warn("hidden");
      logger.error("shown");

      expect(entries.map((entry) => entry.message)).toEqual(["shown"]);
    });

    it("should emit nothing at SILENT", () => {
      const entries: LogEntry[] = [];
      const logger = new Logger({ level: LogLevel.SILENT, output: (entry) => entries.push(entry) });

      logger.error("hidden");

      expect(entries).toEqual([]);
      expect(logger.isLevelEnabled(LogLevel.ERROR)).toBe(false);
    });
  });

  describe("Entries", () => {
    it("should include component, context and error", () => {
      const entries: LogEntry[] = [];
      const logger = new Logger({
        level: LogLevel.DEBUG,
        component: "compiler",
        output: (entry) => entries.push(entry),
      });
      const failure = new Error("boom");

      logger.info("Compiled", { rule: "rotate" }, failure);

      expect(entries[0]).toMatchObject({
        level: LogLevel.INFO,
        levelName: "INFO",
        message: "Compiled",
        component: "compiler",
        context: { rule: "rotate" },
        error: failure,
      });
    });

    it("should omit empty optional fields", () => {
      const entries: LogEntry[] = [];
      const logger = new Logger({ level: LogLevel.DEBUG, output: (entry) => entries.push(entry) });

      logger.debug("bare");

      expect(entries[0]).not.toHaveProperty("context");
      expect(entries[0]).not.toHaveProperty("error");
      expect(entries[0]).not.toHaveProperty("component");
    });
  });

  describe("Child loggers", () => {
    it("should merge child context into every entry", () => {
      const entries: LogEntry[] = [];
      const parent = new Logger({
        level: LogLevel.DEBUG,
        component: "compiler",
        output: (entry) => entries.push(entry),
      });

      parent.child({ bucket: "logs" }).debug("step", { state: "Compiling" });

      expect(entries[0]?.context).toEqual({ bucket: "logs", state: "Compiling" });
      expect(entries[0]?.component).toBe("compiler");
    });

    it("should override the component when given", () => {
      const entries: LogEntry[] = [];
      const parent = new Logger({
        level: LogLevel.DEBUG,
        component: "compiler",
        output: (entry) => entries.push(entry),
      });

      parent.child({}, "lifecycle").info("rule");

      expect(entries[0]?.component).toBe("lifecycle");
    });

    it("should inherit the parent level", () => {
      const entries: LogEntry[] = [];
      const parent = new Logger({ level: LogLevel.ERROR, output: (entry) => entries.push(entry) });

      parent.child({ bucket: "logs" }).warn("hidden");

      expect(entries).toEqual([]);
    });
  });

  describe("Default output", () => {
    it("should pretty-print warnings to console.error", () => {
      const logger = new Logger({ level: LogLevel.WARN, component: "compiler", prettyPrint: true });

      logger.warn("Descriptor rejected");

      expect(errorSpy).toHaveBeenCalledTimes(1);
      expect(String(errorSpy.mock.calls[0]?.[0])).toContain("WARN  [compiler] Descriptor rejected");
    });

    it("should route debug and info to console.warn", () => {
      const logger = new Logger({ level: LogLevel.DEBUG, prettyPrint: true });

      logger.debug("one");
      logger.info("two");

      expect(warnSpy).toHaveBeenCalledTimes(2);
      expect(errorSpy).not.toHaveBeenCalled();
    });

    it("should append context to pretty output", () => {
      const logger = new Logger({ level: LogLevel.INFO, prettyPrint: true });

      logger.info("with context", { bucket: "logs" });

      expect(String(warnSpy.mock.calls[0]?.[0])).toContain('Context: {\n  "bucket": "logs"\n}');
    });

    it("should emit JSON lines when pretty printing is off", () => {
      const logger = new Logger({
        level: LogLevel.ERROR,
        component: "compiler",
        prettyPrint: false,
      });

      logger.error("failed", undefined, new Error("boom"));

      const parsed: unknown = JSON.parse(String(errorSpy.mock.calls[0]?.[0]));
      expect(parsed).toMatchObject({
        levelName: "ERROR",
        message: "failed",
        component: "compiler",
        error: { name: "Error", message: "boom" },
      });
    });

    it("should pretty-print unless NODE_ENV is production", () => {
      process.env.NODE_ENV = "production";
      const logger = new Logger({ level: LogLevel.WARN });

      logger.warn("json please");

      const parsed: unknown = JSON.parse(String(errorSpy.mock.calls[0]?.[0]));
      expect(parsed).toMatchObject({ message: "json please" });
    });
  });

  describe("Default instance", () => {
    it("should export a shared logger", () => {
      expect(defaultLogger).toBeInstanceOf(Logger);
    });
  });
});
