import { describe, it, expect } from "vitest";
import {
  filterParamsFromQuery,
  validateExportScope,
  validateFilterParams,
  validateGeneratorConfig,
  validateTableName,
} from "./validation";
import { ValidationError } from "./errors";
import { params } from "@/test/fixtures";

describe("validateFilterParams", () => {
  it("accepts defaults", () => {
    expect(validateFilterParams(params())).toEqual(params());
  });

  it("names the offending field", () => {
    try {
      validateFilterParams({ ...params(), dayRange: [5, 2] });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ValidationError);
      if (err instanceof ValidationError) {
        expect(err.issues).toEqual(["dayRange: range start must not exceed range end"]);
      }
    }
  });

  it("rejects unknown enum values", () => {
    expect(() => validateFilterParams({ ...params(), mode: "Peaceful" })).toThrow(ValidationError);
    expect(() => validateFilterParams({ ...params(), biomes: ["Ocean"] })).toThrow(ValidationError);
  });
});

describe("validateGeneratorConfig", () => {
  it("rejects a non-positive world", () => {
    expect(() =>
      validateGeneratorConfig({ seed: 1, nPlayers: 0, maxDays: 10, miningEvents: 1, deathEvents: 1, economyTxnPerPlayer: 1 }),
    ).toThrow(ValidationError);
  });
});

describe("validateTableName", () => {
  it("accepts known tables", () => {
    expect(validateTableName("mining")).toBe("mining");
  });

  it("rejects others", () => {
    expect(() => validateTableName("players")).toThrow(ValidationError);
    expect(() => validateTableName(null)).toThrow(ValidationError);
  });
});

describe("validateExportScope", () => {
  it("defaults to the filtered selection", () => {
    expect(validateExportScope(null)).toBe("filtered");
    expect(validateExportScope("raw")).toBe("raw");
  });

  it("rejects other scopes", () => {
    expect(() => validateExportScope("all")).toThrow(ValidationError);
  });
});

describe("filterParamsFromQuery", () => {
  const defaults = params({}, 90);

  it("falls back to defaults for absent keys", () => {
    expect(filterParamsFromQuery(new URLSearchParams(), defaults)).toEqual(defaults);
  });

  it("decodes every parameter", () => {
    const search = new URLSearchParams("mode=Creative&dayLo=10&dayHi=20&biomes=Forest,Desert&resources=Gold&activeOnly=1&honestOnly=true");
    expect(filterParamsFromQuery(search, defaults)).toEqual({
      mode: "Creative",
      dayRange: [10, 20],
      biomes: ["Forest", "Desert"],
      resources: ["Gold"],
      activeOnly: true,
      honestOnly: true,
    });
  });

  it("reads plain integers, including surrounding spaces", () => {
    expect(filterParamsFromQuery(new URLSearchParams("dayLo=%2012&dayHi=40"), defaults).dayRange).toEqual([12, 40]);
  });

  it("reads an empty list as no selection", () => {
    expect(filterParamsFromQuery(new URLSearchParams("biomes="), defaults).biomes).toEqual([]);
  });

  it.each(["dayLo=abc", "dayLo=0x10", "dayLo=1e1", "dayHi=20.0", "activeOnly=yes", "mode=Peaceful", "dayLo=50&dayHi=10"])("rejects %s", (query) => {
    expect(() => filterParamsFromQuery(new URLSearchParams(query), defaults)).toThrow(ValidationError);
  });
});
