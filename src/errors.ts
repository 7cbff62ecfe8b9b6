/** Malformed or incomplete input: a missing identity field or required sub-structure. */
export class ValidationError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ValidationError';
  }
}

/** Constraint violation, connectivity or transaction failure. The unit of work was rolled back. */
export class PersistenceError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'PersistenceError';
  }
}

/** The upstream data API answered with an error status or could not be reached. */
export class UpstreamError extends Error {
  readonly statusCode: number | null;

  constructor(message: string, statusCode: number | null, options?: ErrorOptions) {
    super(message, options);
    this.name = 'UpstreamError';
    this.statusCode = statusCode;
  }
}
