"use client";

import { useState, useMemo, useCallback } from "react";
import { AnalyticsPipeline } from "@/lib/analytics-pipeline";
import { defaultFilterParams } from "@/lib/config";
import { isValidationError } from "@/lib/errors";
import { GENERATOR_PRESETS, generateTelemetryData } from "@/lib/telemetry-synth-engine";
import type { GeneratorPresetKey } from "@/lib/telemetry-synth-engine";
import type { DashboardSnapshot, DashboardTab, FilterParams } from "@/lib/types";
import TabIndicator from "@/components/TabIndicator";
import FilterSidebar from "@/components/FilterSidebar";
import KpiCards from "@/components/KpiCards";
import PlayerCharts from "@/components/PlayerCharts";
import MiningCharts from "@/components/MiningCharts";
import BiomeTreemap from "@/components/BiomeTreemap";
import EconomyCharts from "@/components/EconomyCharts";
import ChaosPanel from "@/components/ChaosPanel";
import RawDataTable from "@/components/RawDataTable";
import PipelineOverview from "@/components/PipelineOverview";
import { InfoBanner } from "@/components/InfoTooltip";
import { Box, Database, Users } from "lucide-react";

type SnapshotResult = { ok: true; snapshot: DashboardSnapshot } | { ok: false; error: string };

export default function Home() {
  const [preset, setPreset] = useState<GeneratorPresetKey>("reference");
  const [currentTab, setCurrentTab] = useState<DashboardTab>("statistics");

  // Raw tables live for the page's lifetime; only a preset switch regenerates them
  const dataset = useMemo(() => generateTelemetryData(GENERATOR_PRESETS[preset].config), [preset]);
  const pipeline = useMemo(() => new AnalyticsPipeline(dataset.tables), [dataset]);
  const [params, setParams] = useState<FilterParams>(() => defaultFilterParams(dataset.stats.days));

  const handlePresetChange = useCallback((next: GeneratorPresetKey) => {
    setPreset(next);
    setParams((prev) => ({ ...defaultFilterParams(GENERATOR_PRESETS[next].config.maxDays), mode: prev.mode }));
  }, []);

  const result = useMemo<SnapshotResult>(() => {
    try {
      return { ok: true, snapshot: pipeline.run(params) };
    } catch (err) {
      if (isValidationError(err)) return { ok: false, error: err.message };
      throw err;
    }
  }, [pipeline, params]);

  return (
    <div className="min-h-screen bg-zinc-950 text-zinc-100">
      {/* ─── Header ─── */}
      <header className="border-b border-zinc-800 bg-zinc-950/80 backdrop-blur-sm sticky top-0 z-50">
        <div className="max-w-[1600px] mx-auto px-6 py-3 flex items-center justify-between">
          <div className="flex items-center gap-3">
            <div className="w-8 h-8 bg-gradient-to-br from-emerald-500 to-lime-600 rounded-lg flex items-center justify-center">
              <Box size={18} className="text-white" />
            </div>
            <div>
              <h1 className="text-base font-bold text-zinc-100">World Telemetry Analytics</h1>
              <p className="text-[10px] text-zinc-500">Activity → Mining → Economy → Deaths</p>
            </div>
          </div>
          <div className="flex items-center gap-4 text-xs text-zinc-500">
            <div className="flex items-center gap-1.5">
              <Database size={12} />
              <span>{dataset.stats.activityRows + dataset.stats.miningRows + dataset.stats.economyRows + dataset.stats.deathRows} rows</span>
            </div>
            <div className="flex items-center gap-1.5">
              <Users size={12} />
              <span>{dataset.stats.players} players</span>
            </div>
          </div>
        </div>
      </header>

      <main className="max-w-[1600px] mx-auto px-6 py-6 grid grid-cols-[260px_1fr] gap-6">
        <FilterSidebar
          params={params}
          maxDays={dataset.stats.days}
          preset={preset}
          onParamsChange={setParams}
          onPresetChange={handlePresetChange}
        />

        <div className="space-y-4 min-w-0">
          <TabIndicator currentTab={currentTab} onTabChange={setCurrentTab} />

          {!result.ok ? (
            <InfoBanner title="Invalid filter selection">{result.error}</InfoBanner>
          ) : (
            <>
              {currentTab === "statistics" && <KpiCards kpis={result.snapshot.kpis} />}
              {currentTab === "players" && (
                <PlayerCharts dailyPlaytime={result.snapshot.charts.dailyPlaytime} topPlayers={result.snapshot.charts.topPlayers} />
              )}
              {currentTab === "mining" && (
                <MiningCharts depthHistogram={result.snapshot.charts.depthHistogram} biomeResources={result.snapshot.charts.biomeResources} />
              )}
              {currentTab === "biomes" && <BiomeTreemap footprint={result.snapshot.charts.biomeFootprint} />}
              {currentTab === "economy" && (
                <EconomyCharts
                  wealthHistogram={result.snapshot.charts.wealthHistogram}
                  richestPlayers={result.snapshot.charts.richestPlayers}
                  honestOnly={params.honestOnly}
                />
              )}
              {currentTab === "chaos" && <ChaosPanel deathCauses={result.snapshot.charts.deathCauses} kpis={result.snapshot.kpis} />}
              {currentTab === "raw_data" && <RawDataTable raw={dataset.tables} filtered={result.snapshot.filtered} params={result.snapshot.params} />}
              {currentTab === "pipeline" && <PipelineOverview stats={dataset.stats} />}
            </>
          )}
        </div>
      </main>
    </div>
  );
}
