import { NextRequest, NextResponse } from "next/server";
import { AnalyticsPipeline, rowCounts } from "@/lib/analytics-pipeline";
import { errorResponse } from "@/lib/api-errors";
import { defaultFilterParams } from "@/lib/config";
import { getServerDataset } from "@/lib/server-dataset";
import { filterParamsFromQuery } from "@/lib/validation";

export const dynamic = "force-dynamic";

export async function GET(req: NextRequest) {
  try {
    const { tables, stats } = getServerDataset();
    const params = filterParamsFromQuery(req.nextUrl.searchParams, defaultFilterParams(stats.days));
    const { kpis, charts, filtered } = new AnalyticsPipeline(tables).run(params);

    return NextResponse.json({ ok: true, params, kpis, charts, counts: rowCounts(filtered) });
  } catch (err) {
    return errorResponse(err, "Failed to compute dashboard");
  }
}
