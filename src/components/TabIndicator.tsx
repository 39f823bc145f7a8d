"use client";

import { DashboardTab } from "@/lib/types";
import { BarChart3, Users, Pickaxe, Trees, Coins, Skull, Table, Workflow } from "lucide-react";

const TABS: { id: DashboardTab; label: string; icon: React.ReactNode; description: string }[] = [
  { id: "statistics", label: "Statistics", icon: <BarChart3 size={16} />, description: "Key metrics" },
  { id: "players", label: "Players", icon: <Users size={16} />, description: "Playtime & top players" },
  { id: "mining", label: "Mining", icon: <Pickaxe size={16} />, description: "Depth & resources" },
  { id: "biomes", label: "Biomes", icon: <Trees size={16} />, description: "Mining footprint" },
  { id: "economy", label: "Economy", icon: <Coins size={16} />, description: "Wealth distribution" },
  { id: "chaos", label: "Chaos", icon: <Skull size={16} />, description: "Deaths & chaos index" },
  { id: "raw_data", label: "Raw Data", icon: <Table size={16} />, description: "Filtered tables" },
  { id: "pipeline", label: "Pipeline", icon: <Workflow size={16} />, description: "How numbers are made" },
];

interface TabIndicatorProps {
  currentTab: DashboardTab;
  onTabChange: (tab: DashboardTab) => void;
}

export default function TabIndicator({ currentTab, onTabChange }: TabIndicatorProps) {
  return (
    <div className="grid grid-cols-8 gap-1 bg-zinc-900 rounded-xl p-2 border border-zinc-800">
      {TABS.map((tab) => {
        const isActive = tab.id === currentTab;
        return (
          <button
            key={tab.id}
            onClick={() => onTabChange(tab.id)}
            className={`flex items-center gap-2 px-2 py-2 rounded-lg transition-all min-w-0 ${
              isActive
                ? "bg-emerald-600/20 border border-emerald-500/40 text-emerald-400"
                : "text-zinc-400 hover:bg-zinc-800 hover:text-zinc-300 border border-transparent"
            }`}
          >
            <div
              className={`flex items-center justify-center w-7 h-7 rounded-full shrink-0 ${
                isActive ? "bg-emerald-600 text-white" : "bg-zinc-700 text-zinc-400"
              }`}
            >
              {tab.icon}
            </div>
            <div className="text-left min-w-0">
              <div className="text-xs font-semibold truncate">{tab.label}</div>
              <div className="text-[10px] text-zinc-500 truncate">{tab.description}</div>
            </div>
          </button>
        );
      })}
    </div>
  );
}
