export type AccountStoreErrorCode =
  | 'NOT_FOUND'
  | 'DUPLICATE_KEY'
  | 'READ_FAILED'
  | 'WRITE_FAILED';

/**
 * Error thrown by AccountStore implementations.
 * `detail` is the human-readable reason the reconciler reports per record.
 */
export class AccountStoreError extends Error {
  constructor(
    public readonly detail: string,
    public readonly code: AccountStoreErrorCode,
    options?: { cause?: unknown }
  ) {
    super(detail, options);
    this.name = 'AccountStoreError';
    Object.setPrototypeOf(this, AccountStoreError.prototype);
  }
}
