/**
 * Selection found zero eligible providers: the registry is empty or every
 * registered provider is excluded.
 */
export class NoCandidateAvailableError extends Error {
  readonly excluded: string[];

  constructor(excluded: Iterable<string>) {
    const list = [...excluded];
    super(
      list.length > 0
        ? `No candidate provider available (excluded: ${list.join(', ')})`
        : 'No candidate provider available (registry is empty)',
    );
    this.name = 'NoCandidateAvailableError';
    this.excluded = list;
  }
}

/**
 * A provider call failed. Carries the upstream HTTP status when there is one,
 * so callers can react to 429s.
 */
export class ProviderExecutionError extends Error {
  readonly providerName: string;
  readonly status?: number;

  constructor(providerName: string, message: string, status?: number) {
    super(message);
    this.name = 'ProviderExecutionError';
    this.providerName = providerName;
    this.status = status;
  }
}

export const VALIDATION_FAILURE_MESSAGE = 'Content validation failed';

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
