/**
 * Base class for queries the datastore cannot fulfill natively.
 * Never thrown directly: see UnsupportedOperatorError and UnsupportedFeatureError.
 */
export class UnsupportedQueryError extends Error {
  override readonly name: string = 'UnsupportedQueryError';

  constructor(
    readonly queryText: string,
    message: string,
  ) {
    super(`Problem with query <${queryText}>: ${message}`);
    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class UnsupportedOperatorError extends UnsupportedQueryError {
  override readonly name = 'UnsupportedOperatorError';

  constructor(
    queryText: string,
    readonly operator: string,
    detail?: string,
  ) {
    super(
      queryText,
      `the datastore does not support operator ${operator}` + (detail !== undefined ? `. ${detail}` : ''),
    );
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class UnsupportedFeatureError extends UnsupportedQueryError {
  override readonly name = 'UnsupportedFeatureError';

  constructor(
    queryText: string,
    readonly reason: string,
  ) {
    super(queryText, reason);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * A mistake in the query or the schema rather than a datastore limitation:
 * unknown members, missing metadata, unbound or malformed parameters.
 */
export class QueryValidationError extends Error {
  override readonly name = 'QueryValidationError';
  readonly fatal = true;

  constructor(
    message: string,
    readonly queryText?: string,
  ) {
    super(queryText !== undefined ? `Problem with query <${queryText}>: ${message}` : message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class DatastoreError extends Error {
  override readonly name = 'DatastoreError';

  constructor(
    message: string,
    override readonly cause?: unknown,
  ) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
