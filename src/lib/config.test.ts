import { describe, it, expect } from "vitest";
import { loadConfig } from "./config";
import { InvalidArgumentError } from "./errors";

describe("loadConfig", () => {
  it("falls back to defaults", () => {
    expect(loadConfig({})).toEqual({
      logLevel: "info",
      gibbsIterations: 10_000,
      gibbsBurnIn: 500,
      gibbsChains: 1,
      seed: undefined,
      probabilityTolerance: 1e-6,
      maxEnumerationStates: 2 ** 24,
      queryCacheSize: 100,
    });
  });

  it("reads and coerces overrides", () => {
    const config = loadConfig({
      BAYESNET_LOG_LEVEL: "debug",
      BAYESNET_GIBBS_ITERATIONS: "2500",
      BAYESNET_GIBBS_CHAINS: "4",
      BAYESNET_SEED: "42",
      BAYESNET_PROBABILITY_TOLERANCE: "0.001",
      BAYESNET_QUERY_CACHE_SIZE: "0",
    });

    expect(config.logLevel).toBe("debug");
    expect(config.gibbsIterations).toBe(2500);
    expect(config.gibbsChains).toBe(4);
    expect(config.seed).toBe(42);
    expect(config.probabilityTolerance).toBe(0.001);
    expect(config.queryCacheSize).toBe(0);
  });

  it("treats blank values as unset", () => {
    expect(loadConfig({ BAYESNET_GIBBS_BURN_IN: "  " }).gibbsBurnIn).toBe(500);
  });

  it("is frozen", () => {
    expect(Object.isFrozen(loadConfig({}))).toBe(true);
  });

  it("names every invalid key", () => {
    expect(() =>
      loadConfig({ BAYESNET_LOG_LEVEL: "loud", BAYESNET_GIBBS_CHAINS: "0" }),
    ).toThrow(InvalidArgumentError);
    expect(() =>
      loadConfig({ BAYESNET_LOG_LEVEL: "loud", BAYESNET_GIBBS_CHAINS: "0" }),
    ).toThrow(/BAYESNET_LOG_LEVEL: .*; BAYESNET_GIBBS_CHAINS: /);
  });
});
