import {
  NullLogger,
  StructuredLogger,
  parseLogLevel,
  type LogEntry,
} from "../logger.js";

describe("StructuredLogger", () => {
  test("sends entries at or above the minimum level to the sink", () => {
    const entries: LogEntry[] = [];
    const logger = new StructuredLogger({
      minLevel: "info",
      sink: (e) => entries.push(e),
      clock: () => 42,
    });
    logger.debug("hidden");
    logger.info("scanned", { files: 3 });
    logger.error("boom", {});
    expect(entries).toEqual([
      {
        ts: 42,
        level: "info",
        scope: undefined,
        message: "scanned",
        meta: { files: 3 },
      },
      {
        ts: 42,
        level: "error",
        scope: undefined,
        message: "boom",
        meta: undefined,
      },
    ]);
  });

  test("child loggers nest scopes and share the sink", () => {
    const entries: LogEntry[] = [];
    const root = new StructuredLogger({
      scope: "cli",
      sink: (e) => entries.push(e),
    });
    root.child("scan").child("walk").warn("slow");
    expect(entries.map((e) => e.scope)).toEqual(["cli.scan.walk"]);
  });

  test("echo writer receives entries", () => {
    const echoed: string[] = [];
    const logger = new StructuredLogger({
      minLevel: "debug",
      echo: (e) => echoed.push(`${e.level}:${e.message}`),
    });
    logger.debug("one");
    expect(echoed).toEqual(["debug:one"]);
    expect(logger.isLevelEnabled("debug")).toBe(true);
  });

  test("NullLogger is disabled at every level", () => {
    expect(new NullLogger().isLevelEnabled("error")).toBe(false);
  });
});

describe("parseLogLevel", () => {
  test("normalizes known levels and falls back when unset", () => {
    expect(parseLogLevel(" WARN ")).toBe("warn");
    expect(parseLogLevel(undefined, "error")).toBe("error");
    expect(parseLogLevel("  ")).toBe("info");
  });

  test("rejects unknown levels", () => {
    expect(() => parseLogLevel("loud")).toThrow(
      'Unknown log level "loud". Try one of: debug, info, warn, error',
    );
  });
});
