"use client";

import { Users, Clock, Hourglass, Pickaxe, Skull, Flame, Trees, Gem, Timer } from "lucide-react";
import { formatKpis } from "@/lib/metrics";
import type { KpiSet } from "@/lib/types";

const ICONS: Record<keyof KpiSet, React.ReactNode> = {
  unique_players: <Users size={14} className="text-blue-400" />,
  avg_playtime_per_player: <Clock size={14} className="text-cyan-400" />,
  total_playtime: <Hourglass size={14} className="text-purple-400" />,
  mining_events: <Pickaxe size={14} className="text-amber-400" />,
  deaths_count: <Skull size={14} className="text-rose-400" />,
  chaos_index: <Flame size={14} className="text-orange-400" />,
  top_biome: <Trees size={14} className="text-emerald-400" />,
  top_resource: <Gem size={14} className="text-sky-400" />,
  avg_session_length: <Timer size={14} className="text-zinc-400" />,
};

export default function KpiCards({ kpis }: { kpis: KpiSet }) {
  return (
    <div className="grid grid-cols-3 xl:grid-cols-9 gap-3">
      {formatKpis(kpis).map((kpi) => (
        <div key={kpi.key} className="bg-zinc-900 border border-zinc-800 rounded-xl p-3">
          <div className="flex items-center gap-1.5 text-[11px] text-zinc-500 mb-1">
            {ICONS[kpi.key]}
            <span className="truncate">{kpi.label}</span>
          </div>
          <div className="text-xl font-bold text-zinc-100 font-mono truncate">{kpi.value}</div>
        </div>
      ))}
    </div>
  );
}
