import { describe, expect, it, vi } from "vitest";
import { InvalidConfigurationError } from "../../src/domain/errors/invalid-configuration.error";
import { ErrorHandler, ErrorType } from "../../src/infrastructure/error/error-handler";
import type { ILogger } from "../../src/infrastructure/logging/logger";
import { Result } from "../../src/infrastructure/result/result";

function createLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } satisfies ILogger;
}

const unwrap = <T>(result: Result<T>) =>
  result.fold<T | Error>(
    (data) => data,
    (error) => error,
  );

describe("ErrorHandler", () => {
  it("returns a successful result when the operation resolves", async () => {
    const handler = new ErrorHandler(createLogger());
    const result = await handler.safeExecute(
      async () => 42,
      ErrorType.ANALYSIS,
      "analyze text",
    );

    expect(result.success).toBe(true);
    expect(unwrap(result)).toBe(42);
  });

  it("logs failures and keeps the cause in the message", async () => {
    const logger = createLogger();
    const handler = new ErrorHandler(logger);
    const result = await handler.safeExecute(
      async () => {
        throw new Error("boom");
      },
      ErrorType.ANALYSIS,
      "analyze text",
      { text: "x" },
    );

    expect(result.success).toBe(false);
    expect(result.error?.message).toBe("Failed to analyze text: boom");
    expect(logger.error).toHaveBeenCalledWith(
      "Failed to analyze text",
      expect.objectContaining({
        type: ErrorType.ANALYSIS,
        code: "ANALYSIS_ANALYZE_TEXT_FAILED",
        context: { text: "x" },
        error: "boom",
      }),
    );
  });

  it("logs configuration errors as warnings", async () => {
    const logger = createLogger();
    const handler = new ErrorHandler(logger);
    await handler.safeExecute(
      async () => {
        throw new InvalidConfigurationError("start", "names", "bad start");
      },
      ErrorType.ANALYSIS,
      "build analyzer",
    );

    expect(logger.error).not.toHaveBeenCalled();
    expect(logger.warn).toHaveBeenCalledWith(
      "Failed to build analyzer",
      expect.objectContaining({ type: ErrorType.CONFIGURATION }),
    );
  });

  it("wraps values thrown that are not errors", () => {
    const handler = new ErrorHandler(createLogger());
    const result = handler.handleError<number>(
      "oops",
      ErrorType.SEARCH,
      "SEARCH_FAILED",
      "Failed to search documents",
    );

    expect(result.error?.message).toBe("Failed to search documents: oops");
  });
});

describe("Result", () => {
  it("maps successful data", () => {
    expect(unwrap(Result.success(2).map((value) => value * 3))).toBe(6);
  });

  it("carries the error through map", () => {
    const error = new Error("nope");
    const mapped = Result.failure<number>(error).map((value) => value * 3);

    expect(mapped.success).toBe(false);
    expect(mapped.error).toBe(error);
  });
});
