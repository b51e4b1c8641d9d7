import { QueryFailedError } from 'typeorm';

const UNIQUE_VIOLATION = 'SQLITE_CONSTRAINT_UNIQUE';

/** True when a write lost the race for a unique index. */
export function isUniqueViolation(err: unknown): boolean {
  if (!(err instanceof QueryFailedError)) return false;

  const driverError: unknown = err.driverError;
  return (
    typeof driverError === 'object' &&
    driverError !== null &&
    'code' in driverError &&
    driverError.code === UNIQUE_VIOLATION
  );
}
