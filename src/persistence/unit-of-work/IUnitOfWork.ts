import { BuildRepository, SqlDiffRepository } from '../repositories';

export interface IUnitOfWork {
  readonly builds: BuildRepository;
  readonly sqlDiffs: SqlDiffRepository;
  withTransaction<T>(work: () => T): T;
}
