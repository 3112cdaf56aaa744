/**
 * Failure kinds shared by the chart and link pipelines.
 * FetchFailed and ExtractionFailed reach the caller; ProviderUnavailable never
 * leaves the link resolver.
 */

export class FetchFailedError extends Error {
  readonly kind = "fetch_failed" as const;
  readonly url: string;
  readonly attempts: number;
  readonly status: number | null;

  constructor(
    reason: string,
    details: { url: string; attempts?: number; status?: number | null; cause?: unknown }
  ) {
    super(`Fetch failed for ${details.url}: ${reason}`, { cause: details.cause });
    this.name = "FetchFailedError";
    this.url = details.url;
    this.attempts = details.attempts ?? 1;
    this.status = details.status ?? null;
  }
}

export class ExtractionFailedError extends Error {
  readonly kind = "extraction_failed" as const;

  constructor(reason: string) {
    super(`Extraction failed: ${reason}`);
    this.name = "ExtractionFailedError";
  }
}

export class ProviderUnavailableError extends Error {
  readonly kind = "provider_unavailable" as const;
  readonly provider: string;

  constructor(provider: string, reason: string, cause?: unknown) {
    super(`${provider}: ${reason}`, { cause });
    this.name = "ProviderUnavailableError";
    this.provider = provider;
  }
}

/** True for the failures a chart request surfaces to its caller. */
export function isChartFailure(err: unknown): err is FetchFailedError | ExtractionFailedError {
  return err instanceof FetchFailedError || err instanceof ExtractionFailedError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
