import { afterEach, describe, expect, it } from "vitest";
import logger, { consoleLine, setLogLevel } from "../src/utils/logger.js";

describe("logger", () => {
  const initial = logger.level;

  afterEach(() => {
    setLogLevel(initial);
  });

  it("tags console lines with the module", () => {
    expect(consoleLine({ level: "info", message: "3 songs", timestamp: "12:00:00", module: "sync" }))
      .toBe("12:00:00 info: [sync] 3 songs");
  });

  it("leaves the tag out when no module is given", () => {
    expect(consoleLine({ level: "warn", message: "careful", timestamp: "12:00:00" })).toBe("12:00:00 warn: careful");
  });

  it("appends the stack on its own lines", () => {
    expect(consoleLine({ level: "error", message: "boom", timestamp: "12:00:00", module: "cli", stack: "Error: boom\n    at x" }))
      .toBe("12:00:00 error: [cli] boom\nError: boom\n    at x");
  });

  it("changes the level at run time", () => {
    setLogLevel("debug");
    expect(logger.level).toBe("debug");
    expect(logger.isDebugEnabled()).toBe(true);
  });
});
