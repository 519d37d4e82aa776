import { LogLevel, Logger, formatRecord } from "./logger";

describe("formatRecord", () => {
  it("renders the header, stack trace and context", () => {
    const formatted = formatRecord({
      time: "2024-01-01T00:00:00.000Z",
      level: LogLevel.warning,
      logger: "Common",
      message: "Indexer skipped",
      stackTrace: "Error: boom\n    at run (index.js:1:1)",
      context: { label: "//lib:L", count: 2, tags: ["a"] },
    });

    expect(formatted).toBe(
      [
        "---",
        "time: 2024-01-01T00:00:00.000Z",
        "level: WARNING",
        "logger: Common",
        'message: "Indexer skipped"',
        "stackTrace: |",
        "  Error: boom",
        "      at run (index.js:1:1)",
        "context:",
        "  label: //lib:L",
        "  count: 2",
        '  tags: ["a"]',
      ].join("\n"),
    );
  });

  it("leaves out empty sections", () => {
    const formatted = formatRecord({
      time: "2024-01-01T00:00:00.000Z",
      level: LogLevel.info,
      logger: "Common",
      message: "Done",
      context: {},
    });
    expect(formatted.split("\n")).toHaveLength(5);
  });
});

describe("Logger", () => {
  const lines: string[] = [];

  beforeEach(() => {
    lines.length = 0;
    Logger.writer = (formatted) => lines.push(formatted);
  });

  afterEach(() => {
    Logger.setLevel(LogLevel.info);
  });

  it("drops records below the global level", () => {
    const logger = new Logger({ name: "Test" });
    Logger.setLevel("warn");

    logger.log("hidden");
    logger.warn("shown");

    expect(lines).toHaveLength(1);
    expect(logger.last(10).map((record) => record.message)).toEqual(["shown"]);
  });

  it("falls back to info for unknown level names", () => {
    Logger.setLevel("verbose");
    expect(Logger.level).toBe(LogLevel.info);
  });

  it("keeps a bounded history", () => {
    const logger = new Logger({ name: "Test", historySize: 2 });

    logger.log("one");
    logger.log("two");
    logger.log("three");

    expect(logger.last(5).map((record) => record.message)).toEqual(["two", "three"]);
  });

  it("moves the error into the stack trace", () => {
    const logger = new Logger({ name: "Test" });
    const error = new Error("boom");

    logger.error("Failed", { error, step: "write" });

    const [record] = logger.last(1);
    expect(record.stackTrace).toBe(error.stack);
    expect(record.context).toEqual({ step: "write" });
  });
});
