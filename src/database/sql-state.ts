import { QueryFailedError } from 'typeorm';

/** SQLSTATE of a failed PostgreSQL query, if the error carries one. */
export function sqlStateOf(err: unknown): string | undefined {
  if (!(err instanceof QueryFailedError)) return undefined;
  const driverError: unknown = err.driverError;
  if (
    typeof driverError === 'object' &&
    driverError !== null &&
    'code' in driverError &&
    typeof driverError.code === 'string'
  ) {
    return driverError.code;
  }
  return undefined;
}
