import { afterEach, describe, expect, it, vi } from "vitest";
import { Logger } from "./logger";

describe("Logger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prints messages at or above its level", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const logger = new Logger("info");

    logger.debug("hidden");
    logger.info("shown");
    logger.warn("careful");

    expect(log.mock.calls).toEqual([["[INFO] shown"]]);
    expect(warn.mock.calls).toEqual([["[WARN] careful"]]);
  });

  it("prints debug output at debug level", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});

    new Logger("debug").debug("details");

    expect(log).toHaveBeenCalledWith("[DEBUG] details");
  });

  it("always prints errors", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});

    new Logger("error").error("broken");

    expect(error).toHaveBeenCalledWith("[ERROR] broken");
  });
});
