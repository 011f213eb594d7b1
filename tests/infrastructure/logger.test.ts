import { afterEach, describe, expect, it, vi } from "vitest";
import { ConsoleLogger, LogLevel } from "../../src/infrastructure/logging/logger";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("ConsoleLogger", () => {
  it("writes every level to stderr with a level tag", () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const logger = new ConsoleLogger(LogLevel.DEBUG);

    logger.debug("tokenised", { tokens: 3 });
    logger.info("started");

    expect(errorSpy).toHaveBeenNthCalledWith(1, "[DEBUG] tokenised", { tokens: 3 });
    expect(errorSpy).toHaveBeenNthCalledWith(2, "[INFO] started", "");
  });

  it("skips messages below the configured level", () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const logger = new ConsoleLogger(LogLevel.WARN);

    logger.info("hidden");
    logger.warn("careful", { option: "start" });

    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(errorSpy).toHaveBeenCalledWith("[WARN] careful", { option: "start" });
  });
});
