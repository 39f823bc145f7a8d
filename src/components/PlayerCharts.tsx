"use client";

import {
  LineChart,
  Line,
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
import type { DailyPlaytimePoint, PlayerPlaytime } from "@/lib/types";

interface PlayerChartsProps {
  dailyPlaytime: DailyPlaytimePoint[];
  topPlayers: PlayerPlaytime[];
}

export default function PlayerCharts({ dailyPlaytime, topPlayers }: PlayerChartsProps) {
  const minTop = topPlayers.length ? topPlayers[topPlayers.length - 1].hours_played : 0;
  const maxTop = topPlayers.length ? topPlayers[0].hours_played : 0;

  return (
    <div className="space-y-4">
      <ChartCard
        title="Player Activity Over Time"
        hint="Total hours played per day across the filtered sessions."
        empty={dailyPlaytime.length === 0}
      >
        <ResponsiveContainer width="100%" height="100%">
          <LineChart data={dailyPlaytime}>
            <CartesianGrid strokeDasharray="3 3" stroke="#27272a" />
            <XAxis dataKey="day" tick={AXIS_TICK} axisLine={AXIS_LINE} />
            <YAxis tick={AXIS_TICK} axisLine={AXIS_LINE} />
            <Tooltip
              contentStyle={TOOLTIP_STYLE}
              formatter={(value) => [`${Number(value).toFixed(1)} h`, "Hours played"]}
              labelFormatter={(label) => `Day ${label}`}
            />
            <Line type="monotone" dataKey="hours_played" stroke={BOLD_COLORS[0]} dot={false} strokeWidth={1.5} />
          </LineChart>
        </ResponsiveContainer>
      </ChartCard>

      <ChartCard
        title="Top Players"
        hint="The 15 players with the most hours in the selection. Equal totals keep the order players first appeared in."
        empty={topPlayers.length === 0}
      >
        <ResponsiveContainer width="100%" height="100%">
          <BarChart data={topPlayers}>
            <CartesianGrid strokeDasharray="3 3" stroke="#27272a" />
            <XAxis dataKey="player" tick={{ ...AXIS_TICK, fontSize: 9 }} axisLine={AXIS_LINE} interval={0} angle={-30} textAnchor="end" height={50} />
            <YAxis tick={AXIS_TICK} axisLine={AXIS_LINE} />
            <Tooltip contentStyle={TOOLTIP_STYLE} formatter={(value) => [`${Number(value).toFixed(1)} h`, "Hours played"]} />
            <Bar dataKey="hours_played" radius={[4, 4, 0, 0]}>
              {topPlayers.map((p) => (
                <Cell key={p.player} fill={viridis(p.hours_played, minTop, maxTop)} />
              ))}
            </Bar>
          </BarChart>
        </ResponsiveContainer>
      </ChartCard>
    </div>
  );
}
