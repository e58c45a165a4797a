import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";
import { createLogger, createNoopLogger } from "./logger.js";
import { fixedClock } from "./adapters/system-clock.js";

const clock = fixedClock(new Date(Date.UTC(2024, 0, 15, 13, 45, 2)));

describe("logger", () => {
  let consoleLogSpy: MockInstance;
  let consoleErrorSpy: MockInstance;

  beforeEach(() => {
    consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("createLogger", () => {
    describe("log level filtering", () => {
      it("logs debug when level is debug", () => {
        const logger = createLogger({ level: "debug", json: false, clock });
        logger.debug("test message");
        expect(consoleLogSpy).toHaveBeenCalledTimes(1);
      });

      it("does not log debug when level is info", () => {
        const logger = createLogger({ level: "info", json: false, clock });
        logger.debug("test message");
        expect(consoleLogSpy).not.toHaveBeenCalled();
      });

      it("does not log warn when level is error", () => {
        const logger = createLogger({ level: "error", json: false, clock });
        logger.warn("test message");
        expect(consoleErrorSpy).not.toHaveBeenCalled();
      });
    });

    describe("output routing", () => {
      it("logs info to stdout", () => {
        const logger = createLogger({ level: "debug", json: false, clock });
        logger.info("info message");
        expect(consoleLogSpy).toHaveBeenCalled();
        expect(consoleErrorSpy).not.toHaveBeenCalled();
      });

      it("logs warn and error to stderr", () => {
        const logger = createLogger({ level: "debug", json: false, clock });
        logger.warn("warn message");
        logger.error("error message");
        expect(consoleErrorSpy).toHaveBeenCalledTimes(2);
        expect(consoleLogSpy).not.toHaveBeenCalled();
      });
    });

    describe("human-readable format", () => {
      it("prints timestamp, padded level, message and metadata", () => {
        const logger = createLogger({ level: "debug", json: false, clock });
        logger.info("Cleaned directory", { removed: 3 });

        expect(consoleLogSpy).toHaveBeenCalledWith(
          '[2024-01-15T13:45:02.000Z] INFO  Cleaned directory {"removed":3}'
        );
      });

      it("omits metadata section when empty", () => {
        const logger = createLogger({ level: "debug", json: false, clock });
        logger.warn("Skipping file");

        expect(consoleErrorSpy).toHaveBeenCalledWith("[2024-01-15T13:45:02.000Z] WARN  Skipping file");
      });
    });

    describe("JSON format", () => {
      it("outputs one JSON object per entry", () => {
        const logger = createLogger({ level: "debug", json: true, clock });
        logger.info("App download complete", { applicationId: "987" });

        const parsed = JSON.parse(consoleLogSpy.mock.calls[0][0] as string);
        expect(parsed).toEqual({
          timestamp: "2024-01-15T13:45:02.000Z",
          level: "info",
          message: "App download complete",
          applicationId: "987",
        });
      });
    });

    describe("child logger", () => {
      it("includes default meta on all logs", () => {
        const logger = createLogger({ level: "debug", json: true, clock });
        const child = logger.child({ referenceId: "foo_abc123" });

        child.info("message 1");
        child.warn("message 2");

        const output1 = JSON.parse(consoleLogSpy.mock.calls[0][0] as string);
        const output2 = JSON.parse(consoleErrorSpy.mock.calls[0][0] as string);

        expect(output1.referenceId).toBe("foo_abc123");
        expect(output2.referenceId).toBe("foo_abc123");
      });

      it("per-call metadata overrides default meta", () => {
        const logger = createLogger({ level: "debug", json: true, clock });
        const child = logger.child({ component: "default" });

        child.info("message", { component: "override" });

        const output = JSON.parse(consoleLogSpy.mock.calls[0][0] as string);
        expect(output.component).toBe("override");
      });

      it("merges meta of nested children", () => {
        const logger = createLogger({ level: "debug", json: true, clock });
        const nested = logger.child({ referenceId: "foo_abc123" }).child({ component: "platform-cli" });

        nested.info("nested message");

        const output = JSON.parse(consoleLogSpy.mock.calls[0][0] as string);
        expect(output.referenceId).toBe("foo_abc123");
        expect(output.component).toBe("platform-cli");
      });
    });
  });

  describe("createNoopLogger", () => {
    it("returns a logger that does nothing, including its children", () => {
      const logger = createNoopLogger();

      logger.info("info");
      logger.error("error");
      logger.child({ service: "test" }).warn("warn");

      expect(consoleLogSpy).not.toHaveBeenCalled();
      expect(consoleErrorSpy).not.toHaveBeenCalled();
    });
  });
});
