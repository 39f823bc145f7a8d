// ─── Metrics Aggregator ─────────────────────────────────────────────────────
// Scalar KPIs over the filtered tables. Empty selections never throw: ratios
// go through safeDivide and categorical modes fall back to the "—" sentinel.

import { DASHBOARD_DEFAULTS } from "./config";
import type { KpiSet, TelemetryTables } from "./types";

export function safeDivide(numerator: number, denominator: number, fallback = 0): number {
  return denominator === 0 || !Number.isFinite(denominator) ? fallback : numerator / denominator;
}

export function sum(values: Iterable<number>): number {
  let total = 0;
  for (const v of values) total += v;
  return total;
}

export function countDistinct(values: Iterable<string>): number {
  return new Set(values).size;
}

/**
 * Most frequent value. Among values sharing the top count, the one seen first
 * wins, so the result follows the order of the input table.
 */
export function mostFrequent<T extends string>(values: Iterable<T>): T | undefined {
  const counts = new Map<T, number>();
  for (const v of values) counts.set(v, (counts.get(v) ?? 0) + 1);
  let best: T | undefined;
  let bestCount = 0;
  for (const [value, count] of counts) {
    if (count > bestCount) {
      best = value;
      bestCount = count;
    }
  }
  return best;
}

export function chaosIndex(deathsCount: number, uniquePlayers: number): number {
  return safeDivide(deathsCount, Math.max(uniquePlayers, 1));
}

export function computeKpis(filtered: TelemetryTables): KpiSet {
  const { activity, mining, deaths } = filtered;

  const uniquePlayers = countDistinct(activity.map((r) => r.player));
  const totalPlaytime = sum(activity.map((r) => r.hours_played));

  return {
    unique_players: uniquePlayers,
    total_playtime: totalPlaytime,
    avg_playtime_per_player: safeDivide(totalPlaytime, uniquePlayers),
    avg_session_length: safeDivide(totalPlaytime, activity.length),
    mining_events: mining.length,
    deaths_count: deaths.length,
    chaos_index: chaosIndex(deaths.length, uniquePlayers),
    top_biome: mostFrequent(mining.map((r) => r.biome)) ?? DASHBOARD_DEFAULTS.emptySentinel,
    top_resource: mostFrequent(mining.map((r) => r.resource)) ?? DASHBOARD_DEFAULTS.emptySentinel,
  };
}

// ─── Display formatting ─────────────────────────────────────────────────────

export interface KpiDisplay {
  key: keyof KpiSet;
  label: string;
  value: string;
}

export function formatKpis(kpis: KpiSet): KpiDisplay[] {
  return [
    { key: "unique_players", label: "Active Players", value: String(kpis.unique_players) },
    { key: "avg_playtime_per_player", label: "Avg Playtime / Player", value: `${kpis.avg_playtime_per_player.toFixed(2)} h` },
    { key: "total_playtime", label: "Total Playtime", value: `${kpis.total_playtime.toFixed(0)} h` },
    { key: "mining_events", label: "Mining Events", value: String(kpis.mining_events) },
    { key: "deaths_count", label: "Deaths", value: String(kpis.deaths_count) },
    { key: "chaos_index", label: "Chaos Index", value: kpis.chaos_index.toFixed(2) },
    { key: "top_biome", label: "Top Biome", value: kpis.top_biome },
    { key: "top_resource", label: "Top Resource", value: kpis.top_resource },
    { key: "avg_session_length", label: "Avg Session", value: `${kpis.avg_session_length.toFixed(2)} h` },
  ];
}
