"use client";

import { useMemo } from "react";
import {
  BarChart,
  Bar,
  XAxis,
  YAxis,
  CartesianGrid,
  Tooltip,
  ResponsiveContainer,
  Legend,
} from "recharts";
import ChartCard, { AXIS_LINE, AXIS_TICK, RESOURCE_COLORS, TOOLTIP_STYLE } from "@/components/ChartCard";
import { RESOURCES } from "@/lib/types";
import type { Biome, BiomeResourceCount, DepthBin, Resource } from "@/lib/types";

interface MiningChartsProps {
  depthHistogram: DepthBin[];
  biomeResources: BiomeResourceCount[];
}

type BiomeRow = { biome: Biome } & Partial<Record<Resource, number>>;

// One row per biome, one column per resource, for the grouped bar chart
function pivotByBiome(rows: BiomeResourceCount[]): BiomeRow[] {
  const byBiome = new Map<Biome, BiomeRow>();
  for (const r of rows) {
    const row = byBiome.get(r.biome) ?? { biome: r.biome };
    row[r.resource] = r.count;
    byBiome.set(r.biome, row);
  }
  return [...byBiome.values()];
}

export default function MiningCharts({ depthHistogram, biomeResources }: MiningChartsProps) {
  const biomeRows = useMemo(() => pivotByBiome(biomeResources), [biomeResources]);

  return (
    <div className="space-y-4">
      <ChartCard
        title="Mining Depth Distribution"
        hint="Mining events bucketed into 60 equal-width y-level bins across the observed depth range, stacked by resource."
        empty={depthHistogram.length === 0}
        height={360}
      >
        <ResponsiveContainer width="100%" height="100%">
          <BarChart data={depthHistogram} barCategoryGap={0}>
            <CartesianGrid strokeDasharray="3 3" stroke="#27272a" />
            <XAxis dataKey="binLabel" tick={{ ...AXIS_TICK, fontSize: 9 }} axisLine={AXIS_LINE} interval="preserveStartEnd" />
            <YAxis tick={AXIS_TICK} axisLine={AXIS_LINE} />
            <Tooltip
              contentStyle={TOOLTIP_STYLE}
              labelFormatter={(label) => {
                const bin = depthHistogram.find((b) => b.binLabel === label);
                return bin ? `y ${bin.binStart.toFixed(1)} – ${bin.binEnd.toFixed(1)}` : String(label);
              }}
            />
            <Legend wrapperStyle={{ fontSize: 11 }} />
            {RESOURCES.map((resource) => (
              <Bar key={resource} dataKey={resource} stackId="depth" fill={RESOURCE_COLORS[resource]} />
            ))}
          </BarChart>
        </ResponsiveContainer>
      </ChartCard>

      <ChartCard title="Resources by Biome" hint="Event count for every biome and resource pair present in the selection." empty={biomeRows.length === 0}>
        <ResponsiveContainer width="100%" height="100%">
          <BarChart data={biomeRows}>
            <CartesianGrid strokeDasharray="3 3" stroke="#27272a" />
            <XAxis dataKey="biome" tick={AXIS_TICK} axisLine={AXIS_LINE} />
            <YAxis tick={AXIS_TICK} axisLine={AXIS_LINE} />
            <Tooltip contentStyle={TOOLTIP_STYLE} />
            <Legend wrapperStyle={{ fontSize: 11 }} />
            {RESOURCES.map((resource) => (
              <Bar key={resource} dataKey={resource} fill={RESOURCE_COLORS[resource]} radius={[2, 2, 0, 0]} />
            ))}
          </BarChart>
        </ResponsiveContainer>
      </ChartCard>
    </div>
  );
}
