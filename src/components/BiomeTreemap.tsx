"use client";

import { Treemap, Tooltip, ResponsiveContainer } from "recharts";
import ChartCard, { TOOLTIP_STYLE, viridis } from "@/components/ChartCard";
import { safeDivide } from "@/lib/metrics";
import type { BiomeFootprint } from "@/lib/types";

export default function BiomeTreemap({ footprint }: { footprint: BiomeFootprint[] }) {
  const total = footprint.reduce((s, f) => s + f.area, 0);
  const max = footprint.length ? footprint[0].area : 0;
  const min = footprint.length ? footprint[footprint.length - 1].area : 0;
  const cells = footprint.map((f) => ({ name: f.biome, size: f.area }));

  return (
    <div className="grid grid-cols-3 gap-4">
      <div className="col-span-2">
        <ChartCard
          title="Biome Distribution"
          hint="Each biome's area is its share of the filtered mining events."
          empty={footprint.length === 0}
          height={380}
        >
          <ResponsiveContainer width="100%" height="100%">
            <Treemap data={cells} dataKey="size" stroke="#18181b" fill="#277f8e" isAnimationActive={false}>
              <Tooltip contentStyle={TOOLTIP_STYLE} />
            </Treemap>
          </ResponsiveContainer>
        </ChartCard>
      </div>
      <div className="bg-zinc-900 border border-zinc-800 rounded-xl p-4">
        <h4 className="text-sm font-bold text-zinc-200 mb-3">Footprint</h4>
        <div className="space-y-2">
          {footprint.map((f) => (
            <div key={f.biome} className="flex items-center gap-2 text-xs">
              <div className="w-3 h-3 rounded-sm shrink-0" style={{ backgroundColor: viridis(f.area, min, max) }} />
              <span className="text-zinc-300 flex-1">{f.biome}</span>
              <span className="text-zinc-500 font-mono">{f.area}</span>
              <span className="text-zinc-400 font-mono w-12 text-right">{(safeDivide(f.area, total) * 100).toFixed(1)}%</span>
            </div>
          ))}
          {footprint.length === 0 && <p className="text-xs text-zinc-600">No mining events selected.</p>}
        </div>
      </div>
    </div>
  );
}
