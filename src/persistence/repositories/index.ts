export * from './BuildRepository';
export * from './SqlDiffRepository';
