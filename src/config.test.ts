/**
 * config.test.ts - Unit tests for environment configuration
 */

import { describe, it, expect } from "vitest";
import { loadConfig } from "./config";
import { ConfigError } from "./errors";

describe("loadConfig", () => {
  it("uses defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({
      store: { host: "localhost", port: 9500, ssl: false },
      voyageApiKey: undefined,
      voyageModel: undefined,
      bands: [0.8, 1.0, 1.2],
    });
  });

  it("reads every key", () => {
    const config = loadConfig({
      CHROMA_HOST: "chroma.internal",
      CHROMA_PORT: "8000",
      CHROMA_SSL: "true",
      VOYAGE_API_KEY: "test-secret",
      VOYAGE_MODEL: "voyage-3",
      DISTANCE_BANDS: "0.5,0.7,0.9",
    });

    expect(config).toEqual({
      store: { host: "chroma.internal", port: 8000, ssl: true },
      voyageApiKey: "test-secret",
      voyageModel: "voyage-3",
      bands: [0.5, 0.7, 0.9],
    });
  });

  it("treats empty values as unset", () => {
    expect(loadConfig({ CHROMA_PORT: "", CHROMA_HOST: "  " }).store).toEqual({
      host: "localhost",
      port: 9500,
      ssl: false,
    });
  });

  it("rejects a non-numeric port", () => {
    expect(() => loadConfig({ CHROMA_PORT: "abc" })).toThrow(ConfigError);
    expect(() => loadConfig({ CHROMA_PORT: "abc" })).toThrow(/CHROMA_PORT/);
  });

  it("rejects an out-of-range port", () => {
    expect(() => loadConfig({ CHROMA_PORT: "70000" })).toThrow(ConfigError);
  });

  it("rejects an unknown CHROMA_SSL value", () => {
    expect(() => loadConfig({ CHROMA_SSL: "yes" })).toThrow(/CHROMA_SSL/);
  });

  it("rejects malformed distance bands", () => {
    expect(() => loadConfig({ DISTANCE_BANDS: "1.2,1.0,0.8" })).toThrow(
      "Invalid environment configuration: DISTANCE_BANDS: band edges must be strictly ascending, got 1.2,1,0.8"
    );
  });
});
