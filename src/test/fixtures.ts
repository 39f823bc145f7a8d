import type {
  ActivityRecord,
  DeathRecord,
  EconomyRecord,
  FilterParams,
  MiningRecord,
  TelemetryTables,
} from "@/lib/types";
import { defaultFilterParams } from "@/lib/config";

export function activityRow(patch: Partial<ActivityRecord> = {}): ActivityRecord {
  return { day: 1, player: "Player_1", hours_played: 1, style: "Builder", mode: "Survival", ...patch };
}

export function miningRow(patch: Partial<MiningRecord> = {}): MiningRecord {
  return { day: 1, player: "Player_1", resource: "Iron", y_level: 0, biome: "Forest", mode: "Survival", ...patch };
}

export function economyRow(patch: Partial<EconomyRecord> = {}): EconomyRecord {
  return { day: 1, player: "Player_1", balance: 10, mode: "Survival", cheater: false, ...patch };
}

export function deathRow(patch: Partial<DeathRecord> = {}): DeathRecord {
  return { day: 1, player: "Player_1", cause: "Lava", mode: "Survival", ...patch };
}

export function tables(patch: Partial<TelemetryTables> = {}): TelemetryTables {
  return { activity: [], mining: [], economy: [], deaths: [], ...patch };
}

export function params(patch: Partial<FilterParams> = {}, maxDays = 365): FilterParams {
  return { ...defaultFilterParams(maxDays), ...patch };
}
