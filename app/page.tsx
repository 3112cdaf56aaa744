import { getDefaultChartService } from "@/lib/chartService";
import type { ChartWithLinks } from "@/lib/chartService";
import { isChartFailure } from "@/lib/errors";
import { formatChartDate, parseChartDate } from "@/ingest/chart/chartDate";

export const dynamic = "force-dynamic";

const SIZES = [10, 20, 50, 100];

type PageProps = {
  searchParams: Promise<{ date?: string; size?: string }>;
};

export default async function Home({ searchParams }: PageProps) {
  const params = await searchParams;
  const today = formatChartDate(new Date());
  const dateParam = params.date ?? "";
  const size = SIZES.includes(Number(params.size)) ? Number(params.size) : 10;
  const date = parseChartDate(dateParam);

  let chart: ChartWithLinks | null = null;
  let error: string | null = null;
  if (dateParam && !date) {
    error = "Enter a date as YYYY-MM-DD";
  } else if (date) {
    try {
      chart = await getDefaultChartService().getChartWithLinks(date, size);
    } catch (err) {
      if (!isChartFailure(err)) throw err;
      console.warn("[page] chart unavailable", { date: dateParam, error: err.message });
      error = "Could not load chart for this date";
    }
  }

  return (
    <main>
      <h1>Hot 100 Links</h1>
      <p className="muted">Pick a date; it is snapped to the nearest chart Saturday.</p>

      <form method="get">
        <div>
          <label htmlFor="date">Date</label>
          <input id="date" name="date" type="date" min="1958-08-04" max={today} defaultValue={dateParam} />
        </div>
        <div>
          <label htmlFor="size">Entries</label>
          <select id="size" name="size" defaultValue={String(size)}>
            {SIZES.map((n) => (
              <option key={n} value={n}>
                Top {n}
              </option>
            ))}
          </select>
        </div>
        <button type="submit">Show chart</button>
      </form>

      {error && <p className="error">{error}</p>}

      {chart && (
        <>
          <p className="muted">
            Chart week {chart.date}
            {date && formatChartDate(date) !== chart.date ? ` (snapped from ${formatChartDate(date)})` : ""}
            {" · "}parsed via {chart.strategy}
          </p>
          <table>
            <thead>
              <tr>
                <th>#</th>
                <th>Title</th>
                <th>Artist</th>
                <th>Spotify</th>
              </tr>
            </thead>
            <tbody>
              {chart.rows.map((row) => (
                <tr key={row.rank}>
                  <td>{row.rank}</td>
                  <td>{row.title}</td>
                  <td>{row.artist}</td>
                  <td>
                    <a href={row.url} target="_blank" rel="noopener noreferrer">
                      {row.source === "provider-chain" ? "Open" : "Search"}
                    </a>
                  </td>
                </tr>
              ))}
            </tbody>
          </table>
        </>
      )}
    </main>
  );
}
