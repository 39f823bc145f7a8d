// ─── Analytics Pipeline ─────────────────────────────────────────────────────
// One object per dashboard session. It holds the raw tables by reference and
// recomputes filter → KPIs + chart tables on every run; nothing else is kept
// between calls, so sessions sharing the same raw tables never see each
// other's selections.

import { applyFilters, filterTables } from "./filter-engine";
import { computeKpis } from "./metrics";
import { projectCharts } from "./chart-projector";
import { validateFilterParams } from "./validation";
import type { DashboardSnapshot, FilterParams, TelemetryTables } from "./types";

export class AnalyticsPipeline {
  constructor(readonly raw: TelemetryTables) {}

  filter(params: FilterParams): TelemetryTables {
    return filterTables(this.raw, params);
  }

  run(params: FilterParams): DashboardSnapshot {
    const checked = validateFilterParams(params);
    const filtered = applyFilters(this.raw, checked);
    return {
      params: checked,
      filtered,
      kpis: computeKpis(filtered),
      charts: projectCharts(filtered),
    };
  }
}

export function rowCounts(tables: TelemetryTables): Record<keyof TelemetryTables, number> {
  return {
    activity: tables.activity.length,
    mining: tables.mining.length,
    economy: tables.economy.length,
    deaths: tables.deaths.length,
  };
}
