/**
 * Invalid or missing configuration. Aborts the run.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * A single (term, source) call failed. The collector records it and moves on.
 */
export class FetchError extends Error {
  constructor(
    readonly source: string,
    readonly term: string,
    cause: unknown
  ) {
    super(
      `Source ${source} failed for "${term}": ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause }
    );
    this.name = 'FetchError';
  }
}

/**
 * Every (term, source) call in the run failed
 */
export class CollectionFailedError extends Error {
  constructor(readonly failures: FetchError[]) {
    super(`All ${failures.length} source call(s) failed`);
    this.name = 'CollectionFailedError';
  }
}
