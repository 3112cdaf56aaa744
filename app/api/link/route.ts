/**
 * GET /api/link?title=...&artist=... → best-effort Spotify link. Never 5xx on
 * provider failure: the answer degrades to a search URL.
 */

import { NextResponse } from "next/server";
import { getDefaultChartService } from "@/lib/chartService";

export const dynamic = "force-dynamic";

export async function GET(request: Request) {
  const { searchParams } = new URL(request.url);
  const title = (searchParams.get("title") ?? "").trim();
  const artist = (searchParams.get("artist") ?? "").trim();

  if (!title || !artist) {
    return NextResponse.json({ ok: false, error: "title and artist are required" }, { status: 400 });
  }

  const link = await getDefaultChartService().getLink(title, artist);
  return NextResponse.json({ ok: true, ...link });
}
