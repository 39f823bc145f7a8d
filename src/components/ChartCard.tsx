"use client";

import InfoTooltip from "@/components/InfoTooltip";
import type { Resource } from "@/lib/types";

// Plotly "Bold" qualitative palette
export const BOLD_COLORS = ["#7F3C8D", "#11A579", "#3969AC", "#F2B701", "#E73F74", "#80BA5A", "#E68310", "#008695"];

export const RESOURCE_COLORS: Record<Resource, string> = {
  Diamond: "#3969AC",
  Iron: "#7F3C8D",
  Gold: "#F2B701",
  Redstone: "#E73F74",
  Coal: "#80BA5A",
};

const VIRIDIS = ["#440154", "#46327e", "#365c8d", "#277f8e", "#1fa187", "#4ac16d", "#a0da39", "#fde725"];

export function viridis(value: number, min: number, max: number): string {
  const t = max > min ? (value - min) / (max - min) : 1;
  return VIRIDIS[Math.min(VIRIDIS.length - 1, Math.max(0, Math.round(t * (VIRIDIS.length - 1))))];
}

export const TOOLTIP_STYLE = { backgroundColor: "#18181b", border: "1px solid #3f3f46", borderRadius: "8px", fontSize: "11px" };
export const AXIS_TICK = { fill: "#71717a", fontSize: 10 };
export const AXIS_LINE = { stroke: "#3f3f46" };

interface ChartCardProps {
  title: string;
  hint?: string;
  empty?: boolean;
  height?: number;
  children: React.ReactNode;
}

export default function ChartCard({ title, hint, empty = false, height = 320, children }: ChartCardProps) {
  return (
    <div className="bg-zinc-900 border border-zinc-800 rounded-xl p-4">
      <div className="flex items-center gap-2 mb-3">
        <h4 className="text-sm font-bold text-zinc-200">{title}</h4>
        {hint && <InfoTooltip title={title} content={hint} />}
      </div>
      <div style={{ height }}>
        {empty ? (
          <div className="h-full flex items-center justify-center text-xs text-zinc-600">
            No rows match the current filters
          </div>
        ) : (
          children
        )}
      </div>
    </div>
  );
}
