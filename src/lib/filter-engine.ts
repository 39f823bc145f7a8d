// ─── Filter Engine ──────────────────────────────────────────────────────────
// Boolean-mask filtering of the raw tables by the sidebar parameters. Every
// filter keeps source order and returns a new array.

import { DASHBOARD_DEFAULTS } from "./config";
import { validateFilterParams } from "./validation";
import type {
  ActivityRecord,
  Biome,
  DeathRecord,
  EconomyRecord,
  FilterParams,
  GameMode,
  MiningRecord,
  Resource,
  TelemetryTables,
} from "./types";

interface DayModeRow {
  day: number;
  mode: GameMode;
}

function inSlice(row: DayModeRow, params: FilterParams): boolean {
  const [lo, hi] = params.dayRange;
  return row.day >= lo && row.day <= hi && row.mode === params.mode;
}

export function filterActivity(rows: readonly ActivityRecord[], params: FilterParams): ActivityRecord[] {
  return rows.filter(
    (r) => inSlice(r, params) && (!params.activeOnly || r.hours_played > DASHBOARD_DEFAULTS.activeHoursThreshold),
  );
}

export function filterMining(rows: readonly MiningRecord[], params: FilterParams): MiningRecord[] {
  const biomes = new Set<Biome>(params.biomes);
  const resources = new Set<Resource>(params.resources);
  return rows.filter((r) => inSlice(r, params) && biomes.has(r.biome) && resources.has(r.resource));
}

export function filterEconomy(rows: readonly EconomyRecord[], params: FilterParams): EconomyRecord[] {
  return rows.filter((r) => inSlice(r, params) && (!params.honestOnly || !r.cheater));
}

export function filterDeaths(rows: readonly DeathRecord[], params: FilterParams): DeathRecord[] {
  return rows.filter((r) => inSlice(r, params));
}

/** Filters all four tables with params that already passed validation. */
export function applyFilters(raw: TelemetryTables, params: FilterParams): TelemetryTables {
  return {
    activity: filterActivity(raw.activity, params),
    mining: filterMining(raw.mining, params),
    economy: filterEconomy(raw.economy, params),
    deaths: filterDeaths(raw.deaths, params),
  };
}

/** Validates `params`, then filters all four tables. */
export function filterTables(raw: TelemetryTables, params: FilterParams): TelemetryTables {
  return applyFilters(raw, validateFilterParams(params));
}
