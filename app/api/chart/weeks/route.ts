/**
 * GET /api/chart/weeks?year=2015&month=1 → chart dates (Saturdays) in that month.
 */

import { NextResponse } from "next/server";
import { monthSaturdays } from "@/ingest/chart/chartDate";

export async function GET(request: Request) {
  const { searchParams } = new URL(request.url);
  const year = Number(searchParams.get("year"));
  const month = Number(searchParams.get("month"));

  if (!Number.isInteger(year) || year < 1958 || !Number.isInteger(month) || month < 1 || month > 12) {
    return NextResponse.json({ ok: false, error: "year (>= 1958) and month (1-12) are required" }, { status: 400 });
  }
  return NextResponse.json({ ok: true, weeks: monthSaturdays(year, month) });
}
