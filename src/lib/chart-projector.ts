// ─── Chart-Data Projector ───────────────────────────────────────────────────
// Grouped and sorted tables behind each dashboard chart. Output order is fixed
// by the data (day, name, count) except for top-N ties, which keep the order
// in which players were first seen.

import { DASHBOARD_DEFAULTS } from "./config";
import type {
  ActivityRecord,
  Biome,
  BiomeFootprint,
  BiomeResourceCount,
  ChartTables,
  DailyPlaytimePoint,
  DeathCause,
  DeathCauseCount,
  DeathRecord,
  DepthBin,
  EconomyRecord,
  MiningRecord,
  PlayerPlaytime,
  PlayerWealth,
  Resource,
  TelemetryTables,
  WealthBin,
} from "./types";

// ─── Helpers ────────────────────────────────────────────────────────────────

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function groupSum<T>(rows: readonly T[], key: (row: T) => string, value: (row: T) => number): Map<string, number> {
  const out = new Map<string, number>();
  for (const row of rows) {
    const k = key(row);
    out.set(k, (out.get(k) ?? 0) + value(row));
  }
  return out;
}

function countBy<K extends string>(values: readonly K[]): Map<K, number> {
  const out = new Map<K, number>();
  for (const v of values) out.set(v, (out.get(v) ?? 0) + 1);
  return out;
}

function byCountThenName<K extends string>(counts: Map<K, number>): [K, number][] {
  return [...counts.entries()].sort((a, b) => b[1] - a[1] || compareStrings(a[0], b[0]));
}

// Stable sort: equal totals stay in first-encounter order
function topByValue(totals: Map<string, number>, n: number): [string, number][] {
  return [...totals.entries()].sort((a, b) => b[1] - a[1]).slice(0, n);
}

interface BinLayout {
  min: number;
  width: number;
  bins: number;
}

function binLayout(values: readonly number[], bins: number): BinLayout | null {
  if (values.length === 0) return null;
  let min = Infinity;
  let max = -Infinity;
  for (const v of values) {
    if (v < min) min = v;
    if (v > max) max = v;
  }
  if (min === max) return { min, width: 0, bins: 1 };
  return { min, width: (max - min) / bins, bins };
}

function binIndex(v: number, layout: BinLayout): number {
  if (layout.width === 0) return 0;
  return Math.min(layout.bins - 1, Math.floor((v - layout.min) / layout.width));
}

function binBounds(i: number, layout: BinLayout) {
  const binStart = layout.min + layout.width * i;
  const binEnd = layout.width === 0 ? layout.min : binStart + layout.width;
  return { binStart, binEnd, binLabel: ((binStart + binEnd) / 2).toFixed(1) };
}

function emptyResourceCounts(): Record<Resource, number> {
  return { Diamond: 0, Iron: 0, Gold: 0, Redstone: 0, Coal: 0 };
}

// ─── Players ────────────────────────────────────────────────────────────────

export function dailyPlaytime(activity: readonly ActivityRecord[]): DailyPlaytimePoint[] {
  const byDay = new Map<number, number>();
  for (const r of activity) byDay.set(r.day, (byDay.get(r.day) ?? 0) + r.hours_played);
  return [...byDay.entries()]
    .sort((a, b) => a[0] - b[0])
    .map(([day, hours_played]) => ({ day, hours_played }));
}

export function topPlayersByPlaytime(activity: readonly ActivityRecord[], n: number = DASHBOARD_DEFAULTS.topN): PlayerPlaytime[] {
  const totals = groupSum(activity, (r) => r.player, (r) => r.hours_played);
  return topByValue(totals, n).map(([player, hours_played]) => ({ player, hours_played }));
}

// ─── Mining ─────────────────────────────────────────────────────────────────

export function depthHistogram(mining: readonly MiningRecord[], bins: number = DASHBOARD_DEFAULTS.depthBins): DepthBin[] {
  const layout = binLayout(mining.map((r) => r.y_level), bins);
  if (!layout) return [];
  const out: DepthBin[] = Array.from({ length: layout.bins }, (_, i) => ({
    ...binBounds(i, layout),
    total: 0,
    ...emptyResourceCounts(),
  }));
  for (const r of mining) {
    const bin = out[binIndex(r.y_level, layout)];
    bin[r.resource]++;
    bin.total++;
  }
  return out;
}

export function resourcesByBiome(mining: readonly MiningRecord[]): BiomeResourceCount[] {
  const counts = new Map<string, BiomeResourceCount>();
  for (const r of mining) {
    const k = `${r.biome}|${r.resource}`;
    const row = counts.get(k);
    if (row) row.count++;
    else counts.set(k, { biome: r.biome, resource: r.resource, count: 1 });
  }
  return [...counts.values()].sort(
    (a, b) => compareStrings(a.biome, b.biome) || compareStrings(a.resource, b.resource),
  );
}

export function biomeFootprint(mining: readonly MiningRecord[]): BiomeFootprint[] {
  return byCountThenName(countBy<Biome>(mining.map((r) => r.biome))).map(([biome, area]) => ({ biome, area }));
}

// ─── Economy ────────────────────────────────────────────────────────────────

export function wealthByPlayer(economy: readonly EconomyRecord[]): PlayerWealth[] {
  const totals = groupSum(economy, (r) => r.player, (r) => r.balance);
  return [...totals.entries()]
    .sort((a, b) => compareStrings(a[0], b[0]))
    .map(([player, balance]) => ({ player, balance }));
}

export function wealthHistogram(wealth: readonly PlayerWealth[], bins: number = DASHBOARD_DEFAULTS.wealthBins): WealthBin[] {
  const layout = binLayout(wealth.map((w) => w.balance), bins);
  if (!layout) return [];
  const out: WealthBin[] = Array.from({ length: layout.bins }, (_, i) => ({ ...binBounds(i, layout), count: 0 }));
  for (const w of wealth) out[binIndex(w.balance, layout)].count++;
  return out;
}

export function richestPlayers(economy: readonly EconomyRecord[], n: number = DASHBOARD_DEFAULTS.topN): PlayerWealth[] {
  const totals = groupSum(economy, (r) => r.player, (r) => r.balance);
  return topByValue(totals, n).map(([player, balance]) => ({ player, balance }));
}

// ─── Chaos ──────────────────────────────────────────────────────────────────

export function deathCauses(deaths: readonly DeathRecord[]): DeathCauseCount[] {
  return byCountThenName(countBy<DeathCause>(deaths.map((r) => r.cause))).map(([cause, count]) => ({ cause, count }));
}

export function projectCharts(filtered: TelemetryTables): ChartTables {
  const wealth = wealthByPlayer(filtered.economy);
  return {
    dailyPlaytime: dailyPlaytime(filtered.activity),
    topPlayers: topPlayersByPlaytime(filtered.activity),
    depthHistogram: depthHistogram(filtered.mining),
    biomeResources: resourcesByBiome(filtered.mining),
    biomeFootprint: biomeFootprint(filtered.mining),
    wealth,
    wealthHistogram: wealthHistogram(wealth),
    richestPlayers: richestPlayers(filtered.economy),
    deathCauses: deathCauses(filtered.deaths),
  };
}
