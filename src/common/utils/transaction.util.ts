import { DataSource, EntityManager } from 'typeorm';

/**
 * Run `work` inside the caller's transaction when one is supplied, otherwise open a new one.
 * Store services take an optional manager so business operations can compose several
 * governed writes and their audit rows into a single commit.
 */
export function inTransaction<T>(
  dataSource: DataSource,
  manager: EntityManager | undefined,
  work: (manager: EntityManager) => Promise<T>,
): Promise<T> {
  if (manager) {
    return work(manager);
  }
  return dataSource.transaction(work);
}
