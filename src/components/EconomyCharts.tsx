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
import ChartCard, { AXIS_LINE, AXIS_TICK, BOLD_COLORS, TOOLTIP_STYLE, viridis } from "@/components/ChartCard";
import type { PlayerWealth, WealthBin } from "@/lib/types";

interface EconomyChartsProps {
  wealthHistogram: WealthBin[];
  richestPlayers: PlayerWealth[];
  honestOnly: boolean;
}

export default function EconomyCharts({ wealthHistogram, richestPlayers, honestOnly }: EconomyChartsProps) {
  const maxRich = richestPlayers.length ? richestPlayers[0].balance : 0;
  const minRich = richestPlayers.length ? richestPlayers[richestPlayers.length - 1].balance : 0;

  return (
    <div className="space-y-4">
      <ChartCard
        title="Wealth Distribution"
        hint={`Per-player balance totals in 40 equal-width bins${honestOnly ? ", cheaters excluded" : ""}.`}
        empty={wealthHistogram.length === 0}
      >
        <ResponsiveContainer width="100%" height="100%">
          <BarChart data={wealthHistogram} barCategoryGap={1}>
            <CartesianGrid strokeDasharray="3 3" stroke="#27272a" />
            <XAxis dataKey="binLabel" tick={{ ...AXIS_TICK, fontSize: 9 }} axisLine={AXIS_LINE} interval="preserveStartEnd" />
            <YAxis tick={AXIS_TICK} axisLine={AXIS_LINE} allowDecimals={false} />
            <Tooltip
              contentStyle={TOOLTIP_STYLE}
              formatter={(value) => [value, "Players"]}
              labelFormatter={(label) => {
                const bin = wealthHistogram.find((b) => b.binLabel === label);
                return bin ? `Balance ${bin.binStart.toFixed(0)} – ${bin.binEnd.toFixed(0)}` : String(label);
              }}
            />
            <Bar dataKey="count" fill={BOLD_COLORS[1]} />
          </BarChart>
        </ResponsiveContainer>
      </ChartCard>

      <ChartCard title="Richest Players" hint="Top 15 players by summed balance." empty={richestPlayers.length === 0}>
        <ResponsiveContainer width="100%" height="100%">
          <BarChart data={richestPlayers}>
            <CartesianGrid strokeDasharray="3 3" stroke="#27272a" />
            <XAxis dataKey="player" tick={{ ...AXIS_TICK, fontSize: 9 }} axisLine={AXIS_LINE} interval={0} angle={-30} textAnchor="end" height={50} />
            <YAxis tick={AXIS_TICK} axisLine={AXIS_LINE} />
            <Tooltip contentStyle={TOOLTIP_STYLE} formatter={(value) => [Number(value).toFixed(2), "Balance"]} />
            <Bar dataKey="balance" radius={[4, 4, 0, 0]}>
              {richestPlayers.map((p) => (
                <Cell key={p.player} fill={viridis(p.balance, minRich, maxRich)} />
              ))}
            </Bar>
          </BarChart>
        </ResponsiveContainer>
      </ChartCard>
    </div>
  );
}
