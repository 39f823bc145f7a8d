"use client";

import {
  BarChart,
  Bar,
  XAxis,
  YAxis,
  CartesianGrid,
  Tooltip,
  ResponsiveContainer,
  Cell,
} from "recharts";
import { Skull } from "lucide-react";
import ChartCard, { AXIS_LINE, AXIS_TICK, TOOLTIP_STYLE, viridis } from "@/components/ChartCard";
import { InfoBanner } from "@/components/InfoTooltip";
import type { DeathCauseCount, KpiSet } from "@/lib/types";

interface ChaosPanelProps {
  deathCauses: DeathCauseCount[];
  kpis: KpiSet;
}

export default function ChaosPanel({ deathCauses, kpis }: ChaosPanelProps) {
  const max = deathCauses.length ? deathCauses[0].count : 0;
  const min = deathCauses.length ? deathCauses[deathCauses.length - 1].count : 0;

  return (
    <div className="space-y-4">
      <ChartCard title="Death Causes" hint="Filtered deaths counted per cause, most frequent first." empty={deathCauses.length === 0}>
        <ResponsiveContainer width="100%" height="100%">
          <BarChart data={deathCauses}>
            <CartesianGrid strokeDasharray="3 3" stroke="#27272a" />
            <XAxis dataKey="cause" tick={AXIS_TICK} axisLine={AXIS_LINE} />
            <YAxis tick={AXIS_TICK} axisLine={AXIS_LINE} allowDecimals={false} />
            <Tooltip contentStyle={TOOLTIP_STYLE} formatter={(value) => [value, "Deaths"]} />
            <Bar dataKey="count" radius={[4, 4, 0, 0]}>
              {deathCauses.map((d) => (
                <Cell key={d.cause} fill={viridis(d.count, min, max)} />
              ))}
            </Bar>
          </BarChart>
        </ResponsiveContainer>
      </ChartCard>

      <div className="grid grid-cols-3 gap-4">
        <div className="bg-zinc-900 border border-zinc-800 rounded-xl p-4">
          <div className="flex items-center gap-2 text-xs text-zinc-500 mb-1">
            <Skull size={12} className="text-rose-400" />
            Chaos Index
          </div>
          <div className="text-3xl font-bold text-zinc-100 font-mono">{kpis.chaos_index.toFixed(2)}</div>
          <div className="text-[11px] text-zinc-500 mt-1">
            {kpis.deaths_count} deaths / {Math.max(kpis.unique_players, 1)} players
          </div>
        </div>
        <div className="col-span-2">
          <InfoBanner title="Chaos index">
            Deaths per active player within the selected filters. The player count is floored at one, so a selection
            with no activity and no deaths reads 0.
          </InfoBanner>
        </div>
      </div>
    </div>
  );
}
