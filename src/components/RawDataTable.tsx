"use client";

import { useState } from "react";
import { Download, Table } from "lucide-react";
import { csvFileName, rawCsvFileName, serializeTableCsv, tableColumns } from "@/lib/csv-export";
import { EXPORT_SCOPES, TABLE_NAMES } from "@/lib/types";
import type { ExportScope, FilterParams, TableName, TelemetryTables } from "@/lib/types";

const PREVIEW_ROWS = 100;

const SCOPE_LABELS: Record<ExportScope, string> = {
  filtered: "Filtered",
  raw: "All generated",
};

interface RawDataTableProps {
  raw: TelemetryTables;
  filtered: TelemetryTables;
  params: FilterParams;
}

function formatCell(value: unknown): string {
  if (typeof value === "number") return Number.isInteger(value) ? String(value) : value.toFixed(2);
  return String(value);
}

export default function RawDataTable({ raw, filtered, params }: RawDataTableProps) {
  const [table, setTable] = useState<TableName>("activity");
  const [scope, setScope] = useState<ExportScope>("filtered");
  const source = scope === "raw" ? raw : filtered;
  const rows: readonly object[] = source[table];
  const columns = tableColumns(table);

  const handleDownload = () => {
    try {
      const blob = new Blob([serializeTableCsv(source, table)], { type: "text/csv;charset=utf-8" });
      const url = URL.createObjectURL(blob);
      const a = document.createElement("a");
      a.href = url;
      a.download = scope === "raw" ? rawCsvFileName(table) : csvFileName(table, params.mode, params.dayRange);
      a.click();
      URL.revokeObjectURL(url);
    } catch (err) {
      console.error("Failed to export CSV:", err);
    }
  };

  return (
    <div className="bg-zinc-900 border border-zinc-800 rounded-xl p-4 space-y-3">
      <div className="flex items-center gap-2">
        <Table size={14} className="text-emerald-400" />
        <div className="flex gap-1">
          {TABLE_NAMES.map((name) => (
            <button
              key={name}
              onClick={() => setTable(name)}
              className={`px-3 py-1 rounded-lg text-xs capitalize transition-all ${
                name === table ? "bg-emerald-600/20 text-emerald-400 border border-emerald-500/40" : "text-zinc-400 hover:bg-zinc-800 border border-transparent"
              }`}
            >
              {name} <span className="text-zinc-600">({source[name].length})</span>
            </button>
          ))}
        </div>
        <div className="flex gap-1 ml-4 border-l border-zinc-800 pl-4">
          {EXPORT_SCOPES.map((s) => (
            <button
              key={s}
              onClick={() => setScope(s)}
              className={`px-3 py-1 rounded-lg text-xs transition-all ${
                s === scope ? "bg-zinc-800 text-zinc-200 border border-zinc-600" : "text-zinc-500 hover:bg-zinc-800 border border-transparent"
              }`}
            >
              {SCOPE_LABELS[s]}
            </button>
          ))}
        </div>
        <button
          onClick={handleDownload}
          className="ml-auto flex items-center gap-1.5 px-3 py-1.5 rounded-lg text-xs border border-zinc-700 text-zinc-300 hover:bg-zinc-800"
        >
          <Download size={12} />
          Download CSV
        </button>
      </div>

      <div className="overflow-auto max-h-[560px] rounded-lg border border-zinc-800">
        <table className="w-full text-xs">
          <thead className="bg-zinc-950 sticky top-0">
            <tr>
              {columns.map((c) => (
                <th key={c} className="text-left px-3 py-2 text-zinc-400 font-medium">{c}</th>
              ))}
            </tr>
          </thead>
          <tbody>
            {rows.slice(0, PREVIEW_ROWS).map((row, i) => {
              const cells = new Map(Object.entries(row));
              return (
                <tr key={i} className="border-t border-zinc-800/60 hover:bg-zinc-800/40">
                  {columns.map((c) => (
                    <td key={c} className="px-3 py-1.5 text-zinc-300 font-mono">{formatCell(cells.get(c))}</td>
                  ))}
                </tr>
              );
            })}
          </tbody>
        </table>
      </div>
      <p className="text-[10px] text-zinc-600">
        Showing {Math.min(PREVIEW_ROWS, rows.length)} of {rows.length} rows. The download contains every {scope === "raw" ? "generated" : "filtered"} row.
      </p>
    </div>
  );
}
