export class JobSheetError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Missing or invalid settings. Fatal at startup. */
export class ConfigurationError extends JobSheetError {}

/** Request or parse failure inside a single provider. */
export class ProviderError extends JobSheetError {
  constructor(
    readonly provider: string,
    message: string,
  ) {
    super(`${provider}: ${message}`);
  }
}

/** AI enrichment failed after all attempts, or could not start. */
export class EnrichmentError extends JobSheetError {}

export class RepositoryError extends JobSheetError {}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
