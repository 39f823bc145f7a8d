// ─── World Telemetry Generator ──────────────────────────────────────────────
// Seeded, in-memory generator for the four raw telemetry tables the dashboard
// filters: activity, mining, economy and deaths. Same config, same tables.

import { validateGeneratorConfig } from "./validation";
import {
  BIOMES,
  DEATH_CAUSES,
  GAME_MODES,
  PLAY_STYLES,
  RESOURCES,
} from "./types";
import type {
  ActivityRecord,
  DeathRecord,
  EconomyRecord,
  MiningRecord,
  TelemetryTables,
} from "./types";

// ═══════════════════════════════════════════════════════════════════════════════
// Config Types
// ═══════════════════════════════════════════════════════════════════════════════

export interface GeneratorConfig {
  seed: number;
  nPlayers: number;
  maxDays: number;
  miningEvents: number;
  deathEvents: number;
  economyTxnPerPlayer: number;
}

export interface TelemetryStats {
  seed: number;
  players: number;
  days: number;
  activityRows: number;
  miningRows: number;
  economyRows: number;
  deathRows: number;
}

export interface TelemetrySynthResult {
  tables: TelemetryTables;
  players: string[];
  stats: TelemetryStats;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Presets
// ═══════════════════════════════════════════════════════════════════════════════

export const PRESET_KEYS = ["reference", "smallServer", "busyRealm"] as const;
export type GeneratorPresetKey = (typeof PRESET_KEYS)[number];

export const GENERATOR_PRESETS: Record<GeneratorPresetKey, { label: string; description: string; config: GeneratorConfig }> = {
  reference: {
    label: "Reference World",
    description: "120 players over a full year, 12k mining events, 4k deaths",
    config: { seed: 42, nPlayers: 120, maxDays: 365, miningEvents: 12000, deathEvents: 4000, economyTxnPerPlayer: 8 },
  },
  smallServer: {
    label: "Small Server",
    description: "A friends-only server running one season",
    config: { seed: 42, nPlayers: 24, maxDays: 90, miningEvents: 3000, deathEvents: 1000, economyTxnPerPlayer: 8 },
  },
  busyRealm: {
    label: "Busy Realm",
    description: "Crowded public realm with heavy mining and frequent deaths",
    config: { seed: 42, nPlayers: 300, maxDays: 365, miningEvents: 30000, deathEvents: 10000, economyTxnPerPlayer: 8 },
  },
};

export function getDefaultGeneratorConfig(): GeneratorConfig {
  return { ...GENERATOR_PRESETS.reference.config };
}

// ═══════════════════════════════════════════════════════════════════════════════
// Seeded RNG
// ═══════════════════════════════════════════════════════════════════════════════

const MODULUS = 2147483647;

export class SeededRNG {
  private s: number;
  constructor(seed: number) { this.s = ((seed % MODULUS) + MODULUS) % MODULUS || 1; }
  next(): number { this.s = (this.s * 16807) % MODULUS; return (this.s - 1) / (MODULUS - 1); }
  int(min: number, max: number): number { return Math.floor(this.next() * (max - min + 1)) + min; }
  pick<T>(arr: readonly T[]): T { return arr[Math.floor(this.next() * arr.length)]; }
  weighted<T>(arr: readonly T[], weights: readonly number[]): T {
    const r = this.next();
    let cum = 0;
    for (let i = 0; i < arr.length; i++) {
      cum += weights[i];
      if (r < cum) return arr[i];
    }
    return arr[arr.length - 1];
  }
  chance(p: number): boolean { return this.next() < p; }
  normal(): number {
    const u1 = Math.max(1e-12, this.next());
    const u2 = this.next();
    return Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
  }
  lognormal(mu: number, sigma: number): number {
    return Math.exp(mu + sigma * this.normal());
  }
  // Marsaglia–Tsang; shape < 1 is boosted through shape + 1
  gamma(shape: number, scale = 1): number {
    if (shape < 1) {
      const u = Math.max(1e-12, this.next());
      return this.gamma(shape + 1, scale) * Math.pow(u, 1 / shape);
    }
    const d = shape - 1 / 3;
    const c = 1 / Math.sqrt(9 * d);
    for (;;) {
      const x = this.normal();
      const t = 1 + c * x;
      if (t <= 0) continue;
      const v = t * t * t;
      const u = this.next();
      if (u < 1 - 0.0331 * x ** 4) return d * v * scale;
      if (Math.log(Math.max(1e-12, u)) < 0.5 * x * x + d * (1 - v + Math.log(v))) return d * v * scale;
    }
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Distribution constants
// ═══════════════════════════════════════════════════════════════════════════════

const MODE_WEIGHTS = [0.55, 0.25, 0.20];              // Survival / Creative / Hardcore
const RESOURCE_WEIGHTS = [0.08, 0.32, 0.18, 0.22, 0.20]; // Diamond / Iron / Gold / Redstone / Coal
const CHEATER_RATE = 0.12;
const HOURS_GAMMA = { shape: 2.2, scale: 1.8 };
const BALANCE_LOGNORMAL = { mu: 3.2, sigma: 0.9 };
export const Y_LEVEL_MIN = -64;
export const Y_LEVEL_MAX = 127;

export function playerIds(nPlayers: number): string[] {
  return Array.from({ length: nPlayers }, (_, i) => `Player_${i + 1}`);
}

// ═══════════════════════════════════════════════════════════════════════════════
// Full Generation
// ═══════════════════════════════════════════════════════════════════════════════

export function generateTelemetryData(input: GeneratorConfig): TelemetrySynthResult {
  const cfg = validateGeneratorConfig(input);
  const rng = new SeededRNG(cfg.seed);
  const players = playerIds(cfg.nPlayers);
  const day = () => rng.int(1, cfg.maxDays);

  const activity: ActivityRecord[] = [];
  const activityRows = cfg.nPlayers * cfg.maxDays;
  for (let i = 0; i < activityRows; i++) {
    activity.push({
      day: day(),
      player: rng.pick(players),
      hours_played: rng.gamma(HOURS_GAMMA.shape, HOURS_GAMMA.scale),
      style: rng.pick(PLAY_STYLES),
      mode: rng.weighted(GAME_MODES, MODE_WEIGHTS),
    });
  }

  const mining: MiningRecord[] = [];
  for (let i = 0; i < cfg.miningEvents; i++) {
    mining.push({
      day: day(),
      player: rng.pick(players),
      resource: rng.weighted(RESOURCES, RESOURCE_WEIGHTS),
      y_level: rng.int(Y_LEVEL_MIN, Y_LEVEL_MAX),
      biome: rng.pick(BIOMES),
      mode: rng.weighted(GAME_MODES, MODE_WEIGHTS),
    });
  }

  const economy: EconomyRecord[] = [];
  const economyRows = cfg.nPlayers * cfg.economyTxnPerPlayer;
  for (let i = 0; i < economyRows; i++) {
    economy.push({
      day: day(),
      player: rng.pick(players),
      balance: rng.lognormal(BALANCE_LOGNORMAL.mu, BALANCE_LOGNORMAL.sigma),
      mode: rng.pick(GAME_MODES),
      cheater: rng.chance(CHEATER_RATE),
    });
  }

  const deaths: DeathRecord[] = [];
  for (let i = 0; i < cfg.deathEvents; i++) {
    deaths.push({
      day: day(),
      player: rng.pick(players),
      cause: rng.pick(DEATH_CAUSES),
      mode: rng.pick(GAME_MODES),
    });
  }

  return {
    tables: { activity, mining, economy, deaths },
    players,
    stats: {
      seed: cfg.seed,
      players: cfg.nPlayers,
      days: cfg.maxDays,
      activityRows: activity.length,
      miningRows: mining.length,
      economyRows: economy.length,
      deathRows: deaths.length,
    },
  };
}

/** Reference-sized tables for a seed and world size. */
export function generateTables(seed: number, nPlayers: number, maxDays: number): TelemetryTables {
  return generateTelemetryData({ ...getDefaultGeneratorConfig(), seed, nPlayers, maxDays }).tables;
}
