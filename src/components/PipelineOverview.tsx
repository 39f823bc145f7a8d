"use client";

import { ChevronRight } from "lucide-react";
import { InfoBanner } from "@/components/InfoTooltip";
import type { TelemetryStats } from "@/lib/telemetry-synth-engine";

const STAGES = [
  {
    title: "Data Generation",
    body: "Four tables are generated once per world from a fixed seed: activity (players × days rows), mining, economy (8 rows per player) and deaths.",
  },
  {
    title: "Global Filtering",
    body: "Every table is cut to the selected mode and inclusive day range. Mining also keeps only the selected biomes and resources; activity can drop sessions of 2 hours or less, economy can drop cheaters.",
  },
  {
    title: "Metrics",
    body: "Distinct players, total and average playtime, event counts, the chaos index and the most frequent biome and resource. Ratios go through one safe-divide helper; empty selections read 0 or “—”.",
  },
  {
    title: "Chart Tables",
    body: "Daily playtime, top 15 players, a 60-bin depth histogram, biome × resource counts, biome footprint, wealth histogram with the 15 richest players, and death causes.",
  },
];

export default function PipelineOverview({ stats }: { stats: TelemetryStats }) {
  return (
    <div className="space-y-4">
      <div className="grid grid-cols-4 gap-3">
        {STAGES.map((stage, i) => (
          <div key={stage.title} className="bg-zinc-900 border border-zinc-800 rounded-xl p-4">
            <div className="flex items-center gap-1.5 text-sm font-bold text-zinc-200 mb-2">
              <span className="w-5 h-5 rounded-full bg-emerald-600 text-white text-[10px] flex items-center justify-center">{i + 1}</span>
              {stage.title}
              {i < STAGES.length - 1 && <ChevronRight size={12} className="ml-auto text-zinc-600" />}
            </div>
            <p className="text-[11px] text-zinc-400 leading-relaxed">{stage.body}</p>
          </div>
        ))}
      </div>
      <InfoBanner title="Current world" variant="tip">
        Seed {stats.seed}: {stats.players} players over {stats.days} days, {stats.activityRows} activity rows,{" "}
        {stats.miningRows} mining events, {stats.economyRows} economy rows and {stats.deathRows} deaths. All tabs read
        the same filtered tables, so numbers agree across views.
      </InfoBanner>
    </div>
  );
}
