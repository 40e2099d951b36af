/**
 * Application-level errors. Unlike domain errors these abort a whole run.
 */
export class UsageError extends Error {
  readonly code = 'USAGE';

  constructor(message = 'Command line usage error') {
    super(message);
    this.name = 'UsageError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export interface RecordIssue {
  path: string;
  message: string;
}

/**
 * Malformed CSV or a record whose shape cannot be turned into a transaction.
 * `recordNumber` is 1-based and does not count the header row.
 */
export class RecordFormatError extends Error {
  readonly code = 'INVALID_RECORD';

  constructor(
    message: string,
    public readonly recordNumber?: number,
    public readonly issues: RecordIssue[] = []
  ) {
    super(message);
    this.name = 'RecordFormatError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
