// ─── Parameter validation ───────────────────────────────────────────────────
// zod schemas for everything that enters the pipeline from outside: generator
// config, filter params, and the query strings the API routes receive.

import { z } from "zod";
import { ValidationError } from "./errors";
import { BIOMES, EXPORT_SCOPES, GAME_MODES, RESOURCES, TABLE_NAMES } from "./types";
import type { ExportScope, FilterParams, TableName } from "./types";
import type { GeneratorConfig } from "./telemetry-synth-engine";

export const GameModeZ = z.enum(GAME_MODES);
export const ResourceZ = z.enum(RESOURCES);
export const BiomeZ = z.enum(BIOMES);

export const GeneratorConfigZ = z.object({
  seed: z.number().int(),
  nPlayers: z.number().int().positive(),
  maxDays: z.number().int().positive(),
  miningEvents: z.number().int().nonnegative(),
  deathEvents: z.number().int().nonnegative(),
  economyTxnPerPlayer: z.number().int().nonnegative(),
});

export const FilterParamsZ = z.object({
  mode: GameModeZ,
  dayRange: z
    .tuple([z.number().int(), z.number().int()])
    .refine(([lo, hi]) => lo <= hi, { message: "range start must not exceed range end" }),
  biomes: z.array(BiomeZ),
  resources: z.array(ResourceZ),
  activeOnly: z.boolean(),
  honestOnly: z.boolean(),
});

const TableNameZ = z.enum(TABLE_NAMES);
const ExportScopeZ = z.enum(EXPORT_SCOPES);

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
}

export function validateGeneratorConfig(input: unknown): GeneratorConfig {
  const parsed = GeneratorConfigZ.safeParse(input);
  if (!parsed.success) throw new ValidationError("Invalid generator config", formatIssues(parsed.error));
  return parsed.data;
}

export function validateFilterParams(input: unknown): FilterParams {
  const parsed = FilterParamsZ.safeParse(input);
  if (!parsed.success) throw new ValidationError("Invalid filter parameters", formatIssues(parsed.error));
  return parsed.data;
}

export function validateTableName(input: string | null): TableName {
  const parsed = TableNameZ.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError("Invalid table", [`table: expected one of ${TABLE_NAMES.join(", ")}`]);
  }
  return parsed.data;
}

/** `scope` query value; absent means the filtered selection. */
export function validateExportScope(input: string | null): ExportScope {
  if (input === null) return "filtered";
  const parsed = ExportScopeZ.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError("Invalid scope", [`scope: expected one of ${EXPORT_SCOPES.join(", ")}`]);
  }
  return parsed.data;
}

// ─── Query-string decoding ──────────────────────────────────────────────────

function listParam(raw: string | null, fallback: string[]): string[] {
  if (raw === null) return fallback;
  return raw.split(",").map((s) => s.trim()).filter((s) => s.length > 0);
}

const INTEGER_PARAM = /^-?\d+$/;

// Plain decimal integers only; hex, exponents and the like go to the schema as strings
function numberParam(raw: string | null, fallback: number): number | string {
  if (raw === null || raw.trim() === "") return fallback;
  const trimmed = raw.trim();
  return INTEGER_PARAM.test(trimmed) ? Number(trimmed) : raw;
}

function booleanParam(raw: string | null, fallback: boolean): boolean | string {
  if (raw === null) return fallback;
  if (raw === "true" || raw === "1") return true;
  if (raw === "false" || raw === "0") return false;
  return raw; // left for the schema to reject
}

/**
 * Builds filter params from URL search params, taking anything absent from
 * `defaults`. Lists are comma-separated; an empty list (`biomes=`) selects
 * nothing.
 */
export function filterParamsFromQuery(search: URLSearchParams, defaults: FilterParams): FilterParams {
  return validateFilterParams({
    mode: search.get("mode") ?? defaults.mode,
    dayRange: [
      numberParam(search.get("dayLo"), defaults.dayRange[0]),
      numberParam(search.get("dayHi"), defaults.dayRange[1]),
    ],
    biomes: listParam(search.get("biomes"), defaults.biomes),
    resources: listParam(search.get("resources"), defaults.resources),
    activeOnly: booleanParam(search.get("activeOnly"), defaults.activeOnly),
    honestOnly: booleanParam(search.get("honestOnly"), defaults.honestOnly),
  });
}
