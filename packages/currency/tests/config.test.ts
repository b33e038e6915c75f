import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import { loadConfig, toCurrencyConfig } from "../src/config.js";
import { createLogger, createLoggerFromConfig, silentLogger } from "../src/logger.js";

describe("loadConfig", () => {
  it("applies defaults to an empty environment", () => {
    const config = loadConfig({});

    expect(config.MINTAGE_ROOT_AUTHORITY).toBe("0xa550c18");
    expect(config.MINTAGE_MINT_CEILING).toBe(1_000_000_000_000_000n);
    expect(config.LOG_LEVEL).toBe("info");
    expect(config.NODE_ENV).toBe("development");
  });

  it("reads overrides", () => {
    const config = loadConfig({
      MINTAGE_ROOT_AUTHORITY: "0xBEEF",
      MINTAGE_MINT_CEILING: "500",
      LOG_LEVEL: "debug",
      NODE_ENV: "test",
    });

    expect(toCurrencyConfig(config)).toEqual({
      rootAuthority: "0xbeef",
      mintCeiling: 500n,
    });
    expect(config.LOG_LEVEL).toBe("debug");
  });

  it("rejects a malformed root authority", () => {
    expect(() => loadConfig({ MINTAGE_ROOT_AUTHORITY: "root" })).toThrow(ZodError);
  });

  it("rejects a non-numeric or zero ceiling", () => {
    expect(() => loadConfig({ MINTAGE_MINT_CEILING: "lots" })).toThrow(ZodError);
    expect(() => loadConfig({ MINTAGE_MINT_CEILING: "0" })).toThrow(ZodError);
  });

  it("rejects a ceiling beyond u64", () => {
    expect(() => loadConfig({ MINTAGE_MINT_CEILING: "18446744073709551616" })).toThrow(ZodError);
  });

  it("rejects unknown log levels", () => {
    expect(() => loadConfig({ LOG_LEVEL: "verbose" })).toThrow(ZodError);
  });
});

describe("loggers", () => {
  it("creates a named logger at the requested level", () => {
    const logger = createLogger({ level: "warn" });
    expect(logger.level).toBe("warn");
  });

  it("takes its level from configuration", () => {
    const logger = createLoggerFromConfig(loadConfig({ LOG_LEVEL: "error", NODE_ENV: "test" }));
    expect(logger.level).toBe("error");
  });

  it("silences everything", () => {
    expect(silentLogger().level).toBe("silent");
  });
});
