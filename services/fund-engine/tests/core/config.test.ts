import { existsSync } from "fs";
import { join } from "path";
import { afterEach, describe, expect, it, vi } from "vitest";

import { loadConfig } from "../../src/config.js";
import { createLogger } from "../../src/core/logger.js";

describe("loadConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig({});

    expect(config.logLevel).toBe("info");
    expect(config.irr).toEqual({ maxIterations: 100, tolerance: 1e-6, initialGuess: 0.1 });
    expect(config.defaultProjectionQuarters).toBe(20);
    expect(config.managementFeeRate).toBe(0.02);
    expect(existsSync(join(config.contractsDir, "fund_engine_v1.schema.json"))).toBe(true);
  });

  it("coerces numeric variables", () => {
    const config = loadConfig({
      LOG_LEVEL: "debug",
      IRR_MAX_ITERATIONS: "250",
      DEFAULT_PROJECTION_QUARTERS: "40",
      CONTRACTS_DIR: "/srv/contracts",
    });

    expect(config.logLevel).toBe("debug");
    expect(config.irr.maxIterations).toBe(250);
    expect(config.defaultProjectionQuarters).toBe(40);
    expect(config.contractsDir).toBe("/srv/contracts");
  });

  it("names the offending variable", () => {
    expect(() => loadConfig({ IRR_TOLERANCE: "abc" })).toThrow(/IRR_TOLERANCE/);
    expect(() => loadConfig({ LOG_LEVEL: "verbose" })).toThrow(/LOG_LEVEL/);
    expect(() => loadConfig({ DEFAULT_PROJECTION_QUARTERS: "2.5" })).toThrow(
      /DEFAULT_PROJECTION_QUARTERS/,
    );
  });
});

describe("createLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prefixes level and scope and redacts sensitive meta", () => {
    const sink = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const log = createLogger("metrics", "debug");

    log.info("solved", { token: "test-secret", fund_id: 3 });

    expect(sink).toHaveBeenCalledWith("[INFO] [metrics] solved", '{"token":"[REDACTED]","fund_id":3}');
  });

  it("drops messages below the threshold", () => {
    const sink = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const log = createLogger("metrics", "warn");

    log.info("ignored");

    expect(sink).not.toHaveBeenCalled();
  });
});
