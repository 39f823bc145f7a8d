import { afterEach, describe, it, expect, vi } from "vitest";
import { getServerDataset, resetServerDataset } from "./server-dataset";
import { ConfigError, ValidationError } from "./errors";

describe("getServerDataset", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    resetServerDataset();
  });

  it("builds the configured preset once and reuses it", () => {
    vi.stubEnv("TELEMETRY_PRESET", "smallServer");
    const first = getServerDataset();
    expect(first.stats.players).toBe(24);
    expect(getServerDataset()).toBe(first);
  });

  it("reports a bad environment as a server config error", () => {
    vi.stubEnv("TELEMETRY_SEED", "1.5");
    try {
      getServerDataset();
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      expect(err).not.toBeInstanceOf(ValidationError);
    }
  });
});
