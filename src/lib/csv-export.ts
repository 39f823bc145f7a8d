// ─── CSV Serialization ──────────────────────────────────────────────────────

import Papa from "papaparse";
import type { TableName, TelemetryTables } from "./types";

const COLUMNS: Record<TableName, string[]> = {
  activity: ["day", "player", "hours_played", "style", "mode"],
  mining: ["day", "player", "resource", "y_level", "biome", "mode"],
  economy: ["day", "player", "balance", "mode", "cheater"],
  deaths: ["day", "player", "cause", "mode"],
};

export function tableColumns(table: TableName): string[] {
  return COLUMNS[table];
}

export function serializeTableCsv(tables: TelemetryTables, table: TableName): string {
  return Papa.unparse([...tables[table]], { columns: COLUMNS[table], newline: "\n" });
}

export function csvFileName(table: TableName, mode: string, dayRange: [number, number]): string {
  return `${table}_${mode.toLowerCase()}_d${dayRange[0]}-${dayRange[1]}.csv`;
}

export function rawCsvFileName(table: TableName): string {
  return `${table}_raw.csv`;
}
