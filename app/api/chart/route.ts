/**
 * GET /api/chart?date=YYYY-MM-DD&size=10
 * Chart week (snapped to Saturday) with one link per entry.
 */

import { NextResponse } from "next/server";
import { getDefaultChartService } from "@/lib/chartService";
import { errorMessage, isChartFailure } from "@/lib/errors";
import { parseChartDate } from "@/ingest/chart/chartDate";
import { MAX_CHART_SIZE } from "@/ingest/hot100";

export const dynamic = "force-dynamic";
export const maxDuration = 60;

export async function GET(request: Request) {
  const { searchParams } = new URL(request.url);
  const dateParam = searchParams.get("date") ?? "";
  const sizeParam = searchParams.get("size") ?? "10";

  if (!parseChartDate(dateParam)) {
    return NextResponse.json({ ok: false, error: "date must be YYYY-MM-DD" }, { status: 400 });
  }
  const size = Number(sizeParam);
  if (!Number.isInteger(size) || size < 1 || size > MAX_CHART_SIZE) {
    return NextResponse.json(
      { ok: false, error: `size must be an integer from 1 to ${MAX_CHART_SIZE}` },
      { status: 400 }
    );
  }

  try {
    const chart = await getDefaultChartService().getChartWithLinks(dateParam, size);
    return NextResponse.json({ ok: true, ...chart });
  } catch (err) {
    if (isChartFailure(err)) {
      console.warn("[api/chart] chart unavailable", { date: dateParam, error: err.message });
      return NextResponse.json(
        { ok: false, error: "Could not load chart for this date", detail: err.message },
        { status: 502 }
      );
    }
    console.error("[api/chart] error:", err);
    return NextResponse.json({ ok: false, error: errorMessage(err) }, { status: 500 });
  }
}
