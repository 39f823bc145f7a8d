// ─── Enum domains ───────────────────────────────────────────────────────────

export const GAME_MODES = ["Survival", "Creative", "Hardcore"] as const;
export const PLAY_STYLES = ["Builder", "Miner", "Fighter", "Explorer"] as const;
export const RESOURCES = ["Diamond", "Iron", "Gold", "Redstone", "Coal"] as const;
export const BIOMES = ["Forest", "Plains", "Desert", "Mountains", "Swamp", "Nether", "End"] as const;
export const DEATH_CAUSES = ["Lava", "Creeper", "Fall", "PvP", "Skeleton", "Void"] as const;

export type GameMode = (typeof GAME_MODES)[number];
export type PlayStyle = (typeof PLAY_STYLES)[number];
export type Resource = (typeof RESOURCES)[number];
export type Biome = (typeof BIOMES)[number];
export type DeathCause = (typeof DEATH_CAUSES)[number];

// ─── Telemetry records ──────────────────────────────────────────────────────

export interface ActivityRecord {
  readonly day: number;
  readonly player: string;
  readonly hours_played: number;
  readonly style: PlayStyle;
  readonly mode: GameMode;
}

export interface MiningRecord {
  readonly day: number;
  readonly player: string;
  readonly resource: Resource;
  readonly y_level: number;      // -64..127
  readonly biome: Biome;
  readonly mode: GameMode;
}

export interface EconomyRecord {
  readonly day: number;
  readonly player: string;
  readonly balance: number;
  readonly mode: GameMode;
  readonly cheater: boolean;
}

export interface DeathRecord {
  readonly day: number;
  readonly player: string;
  readonly cause: DeathCause;
  readonly mode: GameMode;
}

export interface TelemetryTables {
  readonly activity: readonly ActivityRecord[];
  readonly mining: readonly MiningRecord[];
  readonly economy: readonly EconomyRecord[];
  readonly deaths: readonly DeathRecord[];
}

export type TableName = keyof TelemetryTables;

export const TABLE_NAMES = ["activity", "mining", "economy", "deaths"] as const satisfies readonly TableName[];

/** Whether an export reads the filtered selection or the full generated tables. */
export const EXPORT_SCOPES = ["filtered", "raw"] as const;
export type ExportScope = (typeof EXPORT_SCOPES)[number];

// ─── Filter parameters ──────────────────────────────────────────────────────

export interface FilterParams {
  mode: GameMode;
  dayRange: [number, number];   // inclusive on both ends
  biomes: Biome[];
  resources: Resource[];
  activeOnly: boolean;           // hours_played > 2
  honestOnly: boolean;           // drop cheaters from economy
}

// ─── KPIs ───────────────────────────────────────────────────────────────────

export interface KpiSet {
  unique_players: number;
  total_playtime: number;
  avg_playtime_per_player: number;
  avg_session_length: number;
  mining_events: number;
  deaths_count: number;
  chaos_index: number;
  top_biome: Biome | "—";
  top_resource: Resource | "—";
}

// ─── Chart tables ───────────────────────────────────────────────────────────

export interface DailyPlaytimePoint {
  day: number;
  hours_played: number;
}

export interface PlayerPlaytime {
  player: string;
  hours_played: number;
}

export type DepthBin = {
  binStart: number;
  binEnd: number;
  binLabel: string;
  total: number;
} & Record<Resource, number>;

export interface BiomeResourceCount {
  biome: Biome;
  resource: Resource;
  count: number;
}

export interface BiomeFootprint {
  biome: Biome;
  area: number;
}

export interface PlayerWealth {
  player: string;
  balance: number;
}

export interface WealthBin {
  binStart: number;
  binEnd: number;
  binLabel: string;
  count: number;
}

export interface DeathCauseCount {
  cause: DeathCause;
  count: number;
}

export interface ChartTables {
  dailyPlaytime: DailyPlaytimePoint[];
  topPlayers: PlayerPlaytime[];
  depthHistogram: DepthBin[];
  biomeResources: BiomeResourceCount[];
  biomeFootprint: BiomeFootprint[];
  wealth: PlayerWealth[];
  wealthHistogram: WealthBin[];
  richestPlayers: PlayerWealth[];
  deathCauses: DeathCauseCount[];
}

export interface DashboardSnapshot {
  params: FilterParams;
  filtered: TelemetryTables;
  kpis: KpiSet;
  charts: ChartTables;
}

// ─── UI ─────────────────────────────────────────────────────────────────────

export type DashboardTab =
  | "statistics"
  | "players"
  | "mining"
  | "biomes"
  | "economy"
  | "chaos"
  | "raw_data"
  | "pipeline";
