import { afterEach, describe, it, expect, vi } from "vitest";
import { Logger } from "./logger";

describe("Logger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("filters messages below the configured level", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    const logger = new Logger("warn");
    logger.debug("hidden");
    logger.info("hidden");
    logger.warn("shown");

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith("[WARN] shown");
  });

  it("prints nothing when silent", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});

    new Logger("silent").error("hidden");

    expect(error).not.toHaveBeenCalled();
  });
});
