"use client";

import { SlidersHorizontal, Globe } from "lucide-react";
import { BIOMES, GAME_MODES, RESOURCES } from "@/lib/types";
import type { Biome, FilterParams, GameMode, Resource } from "@/lib/types";
import { GENERATOR_PRESETS, PRESET_KEYS } from "@/lib/telemetry-synth-engine";
import type { GeneratorPresetKey } from "@/lib/telemetry-synth-engine";

interface FilterSidebarProps {
  params: FilterParams;
  maxDays: number;
  preset: GeneratorPresetKey;
  onParamsChange: (params: FilterParams) => void;
  onPresetChange: (preset: GeneratorPresetKey) => void;
}

function toggle<T>(list: T[], value: T): T[] {
  return list.includes(value) ? list.filter((v) => v !== value) : [...list, value];
}

function isGameMode(value: string): value is GameMode {
  return GAME_MODES.some((m) => m === value);
}

function isPresetKey(value: string): value is GeneratorPresetKey {
  return PRESET_KEYS.some((k) => k === value);
}

export default function FilterSidebar({ params, maxDays, preset, onParamsChange, onPresetChange }: FilterSidebarProps) {
  const [dayLo, dayHi] = params.dayRange;
  const update = (patch: Partial<FilterParams>) => onParamsChange({ ...params, ...patch });

  return (
    <aside className="bg-zinc-900 border border-zinc-800 rounded-xl p-4 space-y-5 text-xs">
      <div className="flex items-center gap-2 text-sm font-bold text-zinc-200">
        <SlidersHorizontal size={14} className="text-emerald-400" />
        Settings
      </div>

      <label className="block space-y-1.5">
        <span className="flex items-center gap-1.5 text-zinc-400"><Globe size={12} />World</span>
        <select
          value={preset}
          onChange={(e) => { if (isPresetKey(e.target.value)) onPresetChange(e.target.value); }}
          className="w-full bg-zinc-950 border border-zinc-700 rounded-lg px-2 py-1.5 text-zinc-200"
        >
          {PRESET_KEYS.map((key) => (
            <option key={key} value={key}>{GENERATOR_PRESETS[key].label}</option>
          ))}
        </select>
        <span className="block text-[10px] text-zinc-600">{GENERATOR_PRESETS[preset].description}</span>
      </label>

      <label className="block space-y-1.5">
        <span className="text-zinc-400">Mode</span>
        <select
          value={params.mode}
          onChange={(e) => { if (isGameMode(e.target.value)) update({ mode: e.target.value }); }}
          className="w-full bg-zinc-950 border border-zinc-700 rounded-lg px-2 py-1.5 text-zinc-200"
        >
          {GAME_MODES.map((m) => <option key={m} value={m}>{m}</option>)}
        </select>
      </label>

      <div className="space-y-1.5">
        <div className="flex justify-between text-zinc-400">
          <span>Range of days</span>
          <span className="font-mono text-zinc-300">{dayLo} – {dayHi}</span>
        </div>
        <input
          type="range"
          min={1}
          max={maxDays}
          value={dayLo}
          onChange={(e) => update({ dayRange: [Math.min(Number(e.target.value), dayHi), dayHi] })}
          className="w-full accent-emerald-500"
        />
        <input
          type="range"
          min={1}
          max={maxDays}
          value={dayHi}
          onChange={(e) => update({ dayRange: [dayLo, Math.max(Number(e.target.value), dayLo)] })}
          className="w-full accent-emerald-500"
        />
      </div>

      <fieldset className="space-y-1">
        <legend className="text-zinc-400 mb-1">Biomes</legend>
        {[...BIOMES].sort().map((b: Biome) => (
          <label key={b} className="flex items-center gap-2 text-zinc-300">
            <input type="checkbox" checked={params.biomes.includes(b)} onChange={() => update({ biomes: toggle(params.biomes, b) })} />
            {b}
          </label>
        ))}
      </fieldset>

      <fieldset className="space-y-1">
        <legend className="text-zinc-400 mb-1">Resources</legend>
        {[...RESOURCES].sort().map((r: Resource) => (
          <label key={r} className="flex items-center gap-2 text-zinc-300">
            <input type="checkbox" checked={params.resources.includes(r)} onChange={() => update({ resources: toggle(params.resources, r) })} />
            {r}
          </label>
        ))}
      </fieldset>

      <div className="space-y-1.5 pt-2 border-t border-zinc-800">
        <label className="flex items-center gap-2 text-zinc-300">
          <input type="checkbox" checked={params.activeOnly} onChange={(e) => update({ activeOnly: e.target.checked })} />
          Only active players (&gt;2 hours)
        </label>
        <label className="flex items-center gap-2 text-zinc-300">
          <input type="checkbox" checked={params.honestOnly} onChange={(e) => update({ honestOnly: e.target.checked })} />
          No cheaters
        </label>
      </div>
    </aside>
  );
}
