import { afterEach, describe, it, expect, vi } from "vitest";
import { createConsoleLogger } from "./logger.js";

describe("createConsoleLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("writes prefixed lines at or above the threshold", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const logger = createConsoleLogger("Engine", "info");

    logger.debug("hidden");
    logger.info("started");
    logger.warn("slow");
    logger.error("broken");

    expect(warn.mock.calls).toEqual([["[Engine] started"], ["[Engine] slow"]]);
    expect(error.mock.calls).toEqual([["[Engine] broken"]]);
  });

  it("writes nothing when silent", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const logger = createConsoleLogger("Engine", "silent");
    logger.warn("x");
    logger.error("y");
    expect(warn).not.toHaveBeenCalled();
    expect(error).not.toHaveBeenCalled();
  });
});
