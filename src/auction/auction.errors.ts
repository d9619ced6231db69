/**
 * The row lock could not be taken in time, or the database aborted the
 * transaction as a serialization/deadlock victim. Safe to retry.
 */
export class LockUnavailableError extends Error {
  constructor(
    message = 'Auction row is locked by another transaction',
    readonly sqlState?: string,
  ) {
    super(message);
    this.name = 'LockUnavailableError';
  }
}
