import { z } from "zod";
import { ValidationError } from "./errors";
import { formatIssues } from "./validation";
import { BIOMES, RESOURCES } from "./types";
import type { FilterParams } from "./types";
import { GENERATOR_PRESETS, PRESET_KEYS, getDefaultGeneratorConfig } from "./telemetry-synth-engine";
import type { GeneratorConfig } from "./telemetry-synth-engine";

export const DASHBOARD_DEFAULTS = {
  topN: 15,
  depthBins: 60,
  wealthBins: 40,
  activeHoursThreshold: 2,
  emptySentinel: "—",
} as const;

export function defaultFilterParams(maxDays: number): FilterParams {
  return {
    mode: "Survival",
    dayRange: [1, maxDays],
    biomes: [...BIOMES],
    resources: [...RESOURCES],
    activeOnly: false,
    honestOnly: false,
  };
}

// ─── Server environment ─────────────────────────────────────────────────────

const ServerEnvZ = z.object({
  TELEMETRY_PRESET: z.enum(PRESET_KEYS).optional(),
  TELEMETRY_SEED: z.coerce.number().int().optional(),
});

type EnvSource = Record<string, string | undefined>;

/**
 * Generator config for the API routes. `TELEMETRY_PRESET` picks a preset,
 * `TELEMETRY_SEED` replaces its seed; blank values count as unset.
 */
export function resolveServerGeneratorConfig(env: EnvSource = process.env): GeneratorConfig {
  const blankToUndefined = (v: string | undefined) => (v === undefined || v.trim() === "" ? undefined : v.trim());
  const parsed = ServerEnvZ.safeParse({
    TELEMETRY_PRESET: blankToUndefined(env.TELEMETRY_PRESET),
    TELEMETRY_SEED: blankToUndefined(env.TELEMETRY_SEED),
  });
  if (!parsed.success) throw new ValidationError("Invalid telemetry environment", formatIssues(parsed.error));

  const { TELEMETRY_PRESET: preset, TELEMETRY_SEED: seed } = parsed.data;
  const base = preset ? { ...GENERATOR_PRESETS[preset].config } : getDefaultGeneratorConfig();
  return seed === undefined ? base : { ...base, seed };
}
