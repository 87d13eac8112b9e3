import { describe, it, expect, beforeEach, afterEach, jest } from "@jest/globals";
import { isLogLevel, Logger } from "../src/logger";

describe("Logger", () => {
  let logger: Logger;

  beforeEach(() => {
    logger = new Logger("debug", false); // Disable console output for tests
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe("logging levels", () => {
    it("should log at every level", () => {
      logger.debug("Debug message", { index: 3 });
      logger.info("Info message");
      logger.warn("Warning message");
      logger.error("Error message");

      const entries = logger.getEntries();
      expect(entries.map((entry) => entry.level)).toEqual(["debug", "info", "warn", "error"]);
      expect(entries[0].message).toBe("Debug message");
    });

    it("should only log at or above configured level", () => {
      const infoLogger = new Logger("info", false);
      infoLogger.debug("Debug message");
      infoLogger.info("Info message");
      infoLogger.warn("Warn message");

      const entries = infoLogger.getEntries();
      expect(entries).toHaveLength(2);
      expect(entries[0].level).toBe("info");
      expect(entries[1].level).toBe("warn");
    });

    it("should change logging level dynamically", () => {
      logger.setLevel("warn");
      logger.debug("Debug");
      logger.info("Info");
      logger.warn("Warn");

      expect(logger.getLevel()).toBe("warn");
      expect(logger.getEntries().map((entry) => entry.level)).toEqual(["warn"]);
    });
  });

  describe("context management", () => {
    it("should merge context updates", () => {
      logger.setContext({ command: "verify" });
      logger.setContext({ mode: "verify", phase: "replay" });
      logger.info("Message");

      expect(logger.getEntries()[0].context).toEqual({ command: "verify", mode: "verify", phase: "replay" });
    });

    it("should drop context keys", () => {
      logger.setContext({ command: "encode", mode: "encode", phase: "hashing" });
      logger.popContext(["phase"]);
      logger.info("Message");

      expect(logger.getEntries()[0].context).toEqual({ command: "encode", mode: "encode" });
    });

    it("should clear all context", () => {
      logger.setContext({ command: "generate" });
      logger.clearContext();
      logger.info("Message");

      expect(logger.getEntries()[0].context).toBeUndefined();
    });
  });

  describe("data attachments", () => {
    it("should attach a copy of the data", () => {
      const data = { index: 4, position: 4 };
      logger.debug("Output bit differs from specification", data);
      data.index = 99;

      expect(logger.getEntries()[0].data).toEqual({ index: 4, position: 4 });
    });

    it("should omit empty data", () => {
      logger.info("Message", {});
      expect(logger.getEntries()[0].data).toBeUndefined();
    });
  });

  describe("timers", () => {
    it("should log the elapsed time when a timer ends", () => {
      jest.spyOn(Date, "now").mockReturnValueOnce(1000).mockReturnValueOnce(1042);

      logger.startTimer("encode");
      const duration = logger.endTimer("encode", "Encoded specification");

      expect(duration).toBe(42);
      const entries = logger.getEntries();
      expect(entries).toHaveLength(1);
      expect(entries[0].level).toBe("debug");
      expect(entries[0].data).toEqual({ duration: 42 });
    });

    it("should warn about a timer that was never started", () => {
      expect(logger.endTimer("missing", "Done")).toBe(0);
      expect(logger.getEntries()[0]).toMatchObject({ level: "warn", message: 'Timer "missing" not found' });
    });
  });

  describe("console output", () => {
    it("should prefix messages with the context and append data", () => {
      const spy = jest.spyOn(console, "log").mockImplementation(() => undefined);
      const consoleLogger = new Logger("info", true);
      consoleLogger.setContext({ command: "encode", mode: "encode", component: "registry" });
      consoleLogger.info("Stored specification", { id: "sum-v1" });

      expect(spy).toHaveBeenCalledWith("[encode] (encode) <registry>: Stored specification\n  id: sum-v1");
    });

    it("should route warnings to console.warn", () => {
      const spy = jest.spyOn(console, "warn").mockImplementation(() => undefined);
      const consoleLogger = new Logger("info", true);
      consoleLogger.warn("Careful", { mismatches: [0, 2] });

      expect(spy).toHaveBeenCalledWith("Careful\n  mismatches: [2 items]");
    });
  });

  describe("entry filtering", () => {
    it("should filter entries by component", () => {
      logger.setContext({ component: "registry" });
      logger.info("Message 1");

      logger.setContext({ component: "audit" });
      logger.info("Message 2");

      const registryEntries = logger.getEntriesForComponent("registry");
      expect(registryEntries).toHaveLength(1);
      expect(registryEntries[0].message).toBe("Message 1");
    });

    it("should filter entries by level", () => {
      logger.debug("Debug");
      logger.info("Info");
      logger.warn("Warn");
      logger.error("Error");

      const warnAndAbove = logger.getEntriesAtLevel("warn");
      expect(warnAndAbove.map((entry) => entry.level)).toEqual(["warn", "error"]);
    });
  });

  describe("summary", () => {
    it("should provide accurate statistics", () => {
      logger.debug("Debug");
      logger.info("Info 1");
      logger.info("Info 2");
      logger.warn("Warn");
      logger.error("Error");

      expect(logger.getSummary()).toEqual({
        totalEntries: 5,
        debugCount: 1,
        infoCount: 2,
        warnCount: 1,
        errorCount: 1,
      });
    });
  });

  describe("export and clearing", () => {
    it("should export entries as JSON", () => {
      logger.setContext({ command: "list" });
      logger.info("Message", { count: 2 });

      const json = logger.toJSON();
      expect(json).toHaveLength(1);
      expect(json[0].context?.command).toBe("list");
      expect(json[0].data?.count).toBe(2);
    });

    it("should clear all entries", () => {
      logger.info("Message 1");
      logger.info("Message 2");
      logger.clear();
      expect(logger.getEntries()).toHaveLength(0);
    });
  });
});

describe("isLogLevel", () => {
  it("should recognise the four levels", () => {
    expect(isLogLevel("debug")).toBe(true);
    expect(isLogLevel("error")).toBe(true);
    expect(isLogLevel("trace")).toBe(false);
    expect(isLogLevel(1)).toBe(false);
  });
});
