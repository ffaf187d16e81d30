// src/lib/errors.ts
export class InsightsError extends Error {
  readonly status: number = 500;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Malformed or unreadable input. The load is aborted and the cache is untouched. */
export class ParseError extends InsightsError {
  readonly status = 400;
}

export class ResourceNotFoundError extends InsightsError {
  readonly status = 404;

  constructor(readonly resource: string) {
    super(`${resource} not found`);
  }
}

export class FilterSpecError extends InsightsError {
  readonly status = 400;
}

export class NoDatasetError extends InsightsError {
  readonly status = 409;

  constructor() {
    super("No dataset loaded. Upload a CSV file or load the sample dataset first.");
  }
}
