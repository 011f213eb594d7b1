import { describe, expect, it } from "vitest";
import { ConfigManager } from "../../src/infrastructure/config/config-manager";
import { LogLevel } from "../../src/infrastructure/logging/logger";

describe("ConfigManager", () => {
  it("provides defaults", () => {
    const config = new ConfigManager();

    expect(config.getAnalyzerConfig()).toEqual({
      name: "inline_annotation",
      settings: {},
    });
    expect(config.getLoggingConfig()).toEqual({ level: LogLevel.INFO });
  });

  it("merges partial configuration", () => {
    const config = new ConfigManager({
      analyzer: { name: "custom", settings: { start: "<" } },
    });

    expect(config.getConfig()).toEqual({
      analyzer: { name: "custom", settings: { start: "<" } },
      logging: { level: LogLevel.INFO },
    });
  });

  it("reads annotation settings and log level from the environment", () => {
    const config = ConfigManager.fromEnvironment({
      ANNOTATION_ANALYZER_NAME: "names",
      ANNOTATION_START: "<",
      ANNOTATION_END: ">",
      ANNOTATION_TOKEN_TYPE: "alias",
      LOG_LEVEL: "DEBUG",
      UNRELATED: "ignored",
    });

    expect(config.getAnalyzerConfig()).toEqual({
      name: "names",
      settings: { start: "<", end: ">", "token-type": "alias" },
    });
    expect(config.getLoggingConfig().level).toBe(LogLevel.DEBUG);
  });

  it("falls back to info for an unknown log level", () => {
    const config = ConfigManager.fromEnvironment({ LOG_LEVEL: "verbose" });
    expect(config.getLoggingConfig().level).toBe(LogLevel.INFO);
  });

  it("keeps invalid settings raw until the analyzer is built", () => {
    const config = ConfigManager.fromEnvironment({ ANNOTATION_DELIMITER: ";;" });
    expect(config.getAnalyzerConfig().settings).toEqual({ delimiter: ";;" });
  });
});
