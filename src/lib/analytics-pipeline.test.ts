import { describe, it, expect } from "vitest";
import { AnalyticsPipeline, rowCounts } from "./analytics-pipeline";
import { generateTelemetryData } from "./telemetry-synth-engine";
import { ValidationError } from "./errors";
import { activityRow, params, tables } from "@/test/fixtures";

describe("AnalyticsPipeline", () => {
  it("runs filter, KPIs and charts end to end", () => {
    const raw = tables({
      activity: [
        activityRow({ day: 1, mode: "Survival", hours_played: 5, player: "Player_1" }),
        activityRow({ day: 1, mode: "Survival", hours_played: 3, player: "Player_2" }),
        activityRow({ day: 2, mode: "Creative", hours_played: 10, player: "Player_3" }),
      ],
    });
    const snapshot = new AnalyticsPipeline(raw).run(params({ mode: "Survival", dayRange: [1, 2] }));

    expect(snapshot.filtered.activity).toHaveLength(2);
    expect(snapshot.kpis.total_playtime).toBe(8);
    expect(snapshot.kpis.unique_players).toBe(2);
    expect(snapshot.kpis.avg_playtime_per_player).toBe(4);
    expect(snapshot.charts.dailyPlaytime).toEqual([{ day: 1, hours_played: 8 }]);
    expect(snapshot.kpis.top_biome).toBe("—");
  });

  it("keeps sessions over shared raw tables independent", () => {
    const { tables: raw } = generateTelemetryData({
      seed: 11,
      nPlayers: 8,
      maxDays: 20,
      miningEvents: 300,
      deathEvents: 100,
      economyTxnPerPlayer: 8,
    });
    const before = structuredClone(raw);
    const survival = new AnalyticsPipeline(raw);
    const hardcore = new AnalyticsPipeline(raw);

    const first = survival.run(params({ mode: "Survival" }, 20));
    hardcore.run(params({ mode: "Hardcore", dayRange: [3, 7], activeOnly: true }, 20));
    const again = survival.run(params({ mode: "Survival" }, 20));

    expect(again).toEqual(first);
    expect(raw).toEqual(before);
    expect(survival.raw).toBe(hardcore.raw);
  });

  it("rejects malformed params before filtering", () => {
    const pipeline = new AnalyticsPipeline(tables());
    expect(() => pipeline.run(params({ dayRange: [9, 2] }))).toThrow(ValidationError);
  });
});

describe("rowCounts", () => {
  it("reports the size of each table", () => {
    expect(rowCounts(tables({ activity: [activityRow(), activityRow()] }))).toEqual({
      activity: 2,
      mining: 0,
      economy: 0,
      deaths: 0,
    });
  });
});
