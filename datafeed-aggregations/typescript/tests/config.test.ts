import { describe, it, expect } from "vitest";
import {
  ValidatorConfig,
  ValidatorConfigBuilder,
  createDefaultConfig,
  fromEnv,
  validateConfig,
} from "../src/config.js";
import { ConfigurationError } from "../src/errors/index.js";

describe("ValidatorConfig", () => {
  it("should default to lenient validation", () => {
    expect(createDefaultConfig()).toEqual({
      strictCompositeSources: false,
      validateTimeRange: false,
      logLevel: "info",
      logJson: false,
    });
  });

  it("should fill in defaults for a partial configuration", () => {
    expect(validateConfig({ strictCompositeSources: true })).toEqual({
      strictCompositeSources: true,
      validateTimeRange: false,
      logLevel: "info",
      logJson: false,
    });
  });

  it("should reject unknown keys and invalid values", () => {
    expect(() => validateConfig({ strict: true })).toThrow(ConfigurationError);
    expect(() => validateConfig({ logLevel: "verbose" })).toThrow(ConfigurationError);
  });

  it("should build a configuration fluently", () => {
    const config = ValidatorConfig.builder()
      .strictCompositeSources()
      .validateTimeRange()
      .logLevel("debug")
      .logJson(false)
      .build();

    expect(config).toEqual({
      strictCompositeSources: true,
      validateTimeRange: true,
      logLevel: "debug",
      logJson: false,
    });
  });

  it("should not share state between builds", () => {
    const builder = new ValidatorConfigBuilder();
    const first = builder.build();
    builder.strictCompositeSources();

    expect(first.strictCompositeSources).toBe(false);
  });
});

describe("fromEnv", () => {
  it("should read configuration from the environment", () => {
    const config = fromEnv({
      DATAFEED_STRICT_COMPOSITE_SOURCES: "true",
      DATAFEED_VALIDATE_TIME_RANGE: "0",
      DATAFEED_LOG_LEVEL: "WARN",
      DATAFEED_LOG_JSON: "1",
    });

    expect(config).toEqual({
      strictCompositeSources: true,
      validateTimeRange: false,
      logLevel: "warn",
      logJson: true,
    });
  });

  it("should use defaults for unset or blank variables", () => {
    expect(fromEnv({ DATAFEED_LOG_LEVEL: "  " })).toEqual(createDefaultConfig());
  });

  it("should reject invalid booleans", () => {
    expect(() => fromEnv({ DATAFEED_VALIDATE_TIME_RANGE: "maybe" })).toThrow(
      "Invalid boolean for DATAFEED_VALIDATE_TIME_RANGE: maybe"
    );
  });
});
