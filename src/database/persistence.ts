import {
  PersistenceConflictError,
  PersistenceError,
  SchedulingError,
} from '../common/errors/scheduling.errors.js';
import { hasPgErrorCode, PG_EXCLUSION_VIOLATION } from './pg-errors.js';

/**
 * Runs a store call and translates driver failures into the scheduling
 * error taxonomy. An exclusion-constraint violation becomes
 * `PersistenceConflictError`; anything else becomes `PersistenceError`.
 */
export async function guardPersistence<T>(
  operation: string,
  run: () => Promise<T>,
): Promise<T> {
  try {
    return await run();
  } catch (error: unknown) {
    if (error instanceof SchedulingError) throw error;
    if (hasPgErrorCode(error, PG_EXCLUSION_VIOLATION)) {
      throw new PersistenceConflictError(
        'The requested time overlaps an existing reservation for this employee',
      );
    }
    throw new PersistenceError(`Failed to ${operation}`, error);
  }
}
