import { NextRequest, NextResponse } from "next/server";
import { AnalyticsPipeline } from "@/lib/analytics-pipeline";
import { errorResponse } from "@/lib/api-errors";
import { defaultFilterParams } from "@/lib/config";
import { csvFileName, rawCsvFileName, serializeTableCsv } from "@/lib/csv-export";
import { getServerDataset } from "@/lib/server-dataset";
import { filterParamsFromQuery, validateExportScope, validateTableName } from "@/lib/validation";

export const dynamic = "force-dynamic";

function csvResponse(body: string, fileName: string): NextResponse {
  return new NextResponse(body, {
    headers: {
      "Content-Type": "text/csv; charset=utf-8",
      "Content-Disposition": `attachment; filename="${fileName}"`,
    },
  });
}

// ?scope=raw exports the generated table as-is; filter params are ignored then
export async function GET(req: NextRequest) {
  try {
    const search = req.nextUrl.searchParams;
    const table = validateTableName(search.get("table"));
    const scope = validateExportScope(search.get("scope"));
    const { tables, stats } = getServerDataset();

    if (scope === "raw") return csvResponse(serializeTableCsv(tables, table), rawCsvFileName(table));

    const params = filterParamsFromQuery(search, defaultFilterParams(stats.days));
    const filtered = new AnalyticsPipeline(tables).filter(params);
    return csvResponse(serializeTableCsv(filtered, table), csvFileName(table, params.mode, params.dayRange));
  } catch (err) {
    return errorResponse(err, "Failed to export raw data");
  }
}
