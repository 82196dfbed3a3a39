export * from './IUnitOfWork';
export * from './UnitOfWork';
