import { describe, it, expect } from "vitest";
import {
  biomeFootprint,
  dailyPlaytime,
  deathCauses,
  depthHistogram,
  projectCharts,
  resourcesByBiome,
  richestPlayers,
  topPlayersByPlaytime,
  wealthByPlayer,
  wealthHistogram,
} from "./chart-projector";
import { activityRow, deathRow, economyRow, miningRow, tables } from "@/test/fixtures";

describe("dailyPlaytime", () => {
  it("sums hours per day in ascending day order", () => {
    const rows = [
      activityRow({ day: 3, hours_played: 1 }),
      activityRow({ day: 1, hours_played: 2 }),
      activityRow({ day: 3, hours_played: 0.5 }),
    ];
    expect(dailyPlaytime(rows)).toEqual([
      { day: 1, hours_played: 2 },
      { day: 3, hours_played: 1.5 },
    ]);
  });
});

describe("topPlayersByPlaytime", () => {
  it("puts the unique maximum first and keeps tie order of first appearance", () => {
    const rows = [
      activityRow({ player: "Player_b", hours_played: 4 }),
      activityRow({ player: "Player_a", hours_played: 4 }),
      activityRow({ player: "Player_c", hours_played: 2 }),
      activityRow({ player: "Player_c", hours_played: 3 }),
    ];
    expect(topPlayersByPlaytime(rows)).toEqual([
      { player: "Player_c", hours_played: 5 },
      { player: "Player_b", hours_played: 4 },
      { player: "Player_a", hours_played: 4 },
    ]);
  });

  it("truncates to the top 15", () => {
    const rows = Array.from({ length: 20 }, (_, i) => activityRow({ player: `Player_${i + 1}`, hours_played: i + 1 }));
    const top = topPlayersByPlaytime(rows);
    expect(top).toHaveLength(15);
    expect(top[0]).toEqual({ player: "Player_20", hours_played: 20 });
    expect(top[14]).toEqual({ player: "Player_6", hours_played: 6 });
    expect(topPlayersByPlaytime(rows, 3).map((p) => p.player)).toEqual(["Player_20", "Player_19", "Player_18"]);
  });
});

describe("depthHistogram", () => {
  it("spreads the observed range over 60 bins with the maximum in the last bin", () => {
    const rows = [
      miningRow({ y_level: -64, resource: "Diamond" }),
      miningRow({ y_level: 127, resource: "Coal" }),
      miningRow({ y_level: 0, resource: "Iron" }),
    ];
    const bins = depthHistogram(rows);
    expect(bins).toHaveLength(60);
    expect(bins[0].binStart).toBe(-64);
    expect(bins[59].binEnd).toBeCloseTo(127);
    expect(bins[0]).toMatchObject({ total: 1, Diamond: 1, Coal: 0 });
    expect(bins[20]).toMatchObject({ total: 1, Iron: 1 });
    expect(bins[59]).toMatchObject({ total: 1, Coal: 1 });
    expect(bins.reduce((s, b) => s + b.total, 0)).toBe(3);
  });

  it("uses a single bin when every event sits at one depth", () => {
    const bins = depthHistogram([miningRow({ y_level: 12 }), miningRow({ y_level: 12, resource: "Gold" })]);
    expect(bins).toEqual([
      { binStart: 12, binEnd: 12, binLabel: "12.0", total: 2, Diamond: 0, Iron: 1, Gold: 1, Redstone: 0, Coal: 0 },
    ]);
  });

  it("is empty for no events", () => {
    expect(depthHistogram([])).toEqual([]);
  });
});

describe("resourcesByBiome", () => {
  it("counts non-empty pairs sorted by biome then resource", () => {
    const rows = [
      miningRow({ biome: "Swamp", resource: "Iron" }),
      miningRow({ biome: "Desert", resource: "Iron" }),
      miningRow({ biome: "Swamp", resource: "Coal" }),
      miningRow({ biome: "Swamp", resource: "Iron" }),
    ];
    expect(resourcesByBiome(rows)).toEqual([
      { biome: "Desert", resource: "Iron", count: 1 },
      { biome: "Swamp", resource: "Coal", count: 1 },
      { biome: "Swamp", resource: "Iron", count: 2 },
    ]);
  });
});

describe("biomeFootprint", () => {
  it("orders by count, then by name", () => {
    const rows = [
      miningRow({ biome: "Forest" }),
      miningRow({ biome: "Desert" }),
      miningRow({ biome: "End" }),
      miningRow({ biome: "Forest" }),
      miningRow({ biome: "End" }),
      miningRow({ biome: "Desert" }),
      miningRow({ biome: "End" }),
    ];
    expect(biomeFootprint(rows)).toEqual([
      { biome: "End", area: 3 },
      { biome: "Desert", area: 2 },
      { biome: "Forest", area: 2 },
    ]);
  });
});

describe("economy projections", () => {
  const rows = [
    economyRow({ player: "Player_2", balance: 10 }),
    economyRow({ player: "Player_10", balance: 20 }),
    economyRow({ player: "Player_2", balance: 10 }),
    economyRow({ player: "Player_3", balance: 30 }),
  ];

  it("sums balance per player in player order", () => {
    expect(wealthByPlayer(rows)).toEqual([
      { player: "Player_10", balance: 20 },
      { player: "Player_2", balance: 20 },
      { player: "Player_3", balance: 30 },
    ]);
  });

  it("ranks the richest with ties in first-seen order", () => {
    expect(richestPlayers(rows)).toEqual([
      { player: "Player_3", balance: 30 },
      { player: "Player_2", balance: 20 },
      { player: "Player_10", balance: 20 },
    ]);
  });

  it("bins per-player wealth", () => {
    const wealth = [
      { player: "a", balance: 10 },
      { player: "b", balance: 20 },
      { player: "c", balance: 30 },
    ];
    expect(wealthHistogram(wealth, 2)).toEqual([
      { binStart: 10, binEnd: 20, binLabel: "15.0", count: 1 },
      { binStart: 20, binEnd: 30, binLabel: "25.0", count: 2 },
    ]);
  });
});

describe("deathCauses", () => {
  it("counts causes, most frequent first", () => {
    const rows = [deathRow({ cause: "Void" }), deathRow({ cause: "Fall" }), deathRow({ cause: "Creeper" }), deathRow({ cause: "Fall" })];
    expect(deathCauses(rows)).toEqual([
      { cause: "Fall", count: 2 },
      { cause: "Creeper", count: 1 },
      { cause: "Void", count: 1 },
    ]);
  });
});

describe("projectCharts", () => {
  it("does not depend on input row order apart from top-N ties", () => {
    const mining = [
      miningRow({ biome: "Plains", resource: "Gold", y_level: -10 }),
      miningRow({ biome: "End", resource: "Redstone", y_level: 40 }),
      miningRow({ biome: "Plains", resource: "Iron", y_level: 90 }),
      miningRow({ biome: "Nether", resource: "Gold", y_level: 5 }),
    ];
    const deaths = [deathRow({ cause: "PvP" }), deathRow({ cause: "Lava" }), deathRow({ cause: "PvP" })];
    const forward = projectCharts(tables({ mining, deaths }));
    const reversed = projectCharts(tables({ mining: [...mining].reverse(), deaths: [...deaths].reverse() }));

    expect(reversed.depthHistogram).toEqual(forward.depthHistogram);
    expect(reversed.biomeResources).toEqual(forward.biomeResources);
    expect(reversed.biomeFootprint).toEqual(forward.biomeFootprint);
    expect(reversed.deathCauses).toEqual(forward.deathCauses);
  });

  it("returns empty tables for an empty selection", () => {
    expect(projectCharts(tables())).toEqual({
      dailyPlaytime: [],
      topPlayers: [],
      depthHistogram: [],
      biomeResources: [],
      biomeFootprint: [],
      wealth: [],
      wealthHistogram: [],
      richestPlayers: [],
      deathCauses: [],
    });
  });
});
