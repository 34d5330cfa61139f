import { guardPersistence } from './persistence';
import {
  PersistenceConflictError,
  PersistenceError,
  ServiceNotFoundError,
} from '../common/errors/scheduling.errors';

describe('guardPersistence', () => {
  it('should return the result of a successful call', async () => {
    await expect(guardPersistence('load', async () => 42)).resolves.toBe(42);
  });

  it('should translate an exclusion violation into a conflict', async () => {
    const driverError = Object.assign(new Error('conflicting key value'), {
      code: '23P01',
    });

    await expect(
      guardPersistence('create reservation', async () => {
        throw driverError;
      }),
    ).rejects.toThrow(PersistenceConflictError);
  });

  it('should find the SQLSTATE on a wrapped cause', async () => {
    const wrapped = new Error('query failed', {
      cause: { code: '23P01' },
    });

    await expect(
      guardPersistence('create reservation', async () => {
        throw wrapped;
      }),
    ).rejects.toMatchObject({ kind: 'state_conflict' });
  });

  it('should wrap any other driver failure as a persistence error', async () => {
    const driverError = new Error('connection reset');

    const failure = guardPersistence('load service', async () => {
      throw driverError;
    });

    await expect(failure).rejects.toThrow(PersistenceError);
    await expect(failure).rejects.toMatchObject({
      message: 'Failed to load service',
      cause: driverError,
    });
  });

  it('should pass scheduling errors through untouched', async () => {
    const notFound = new ServiceNotFoundError(3);

    await expect(
      guardPersistence('load service', async () => {
        throw notFound;
      }),
    ).rejects.toBe(notFound);
  });
});
